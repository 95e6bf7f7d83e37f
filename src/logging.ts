/**
 * Structured Logging
 *
 * Factory for pino-based structured logger.
 * Supports JSON and pretty output via CONNECT_LOG_FORMAT env var.
 */

import pino from 'pino';
import { z } from 'zod';

const LogFormatSchema = z.enum(['json', 'pretty']);
const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

export type LogFormat = z.infer<typeof LogFormatSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;

export interface LoggerOptions {
  format?: LogFormat;
  level?: LogLevel;
  name?: string;
}

function envOption<T>(schema: z.ZodType<T>, name: string): T | undefined {
  const parsed = schema.safeParse(process.env[name]);
  return parsed.success ? parsed.data : undefined;
}

/**
 * Create a pino logger instance.
 *
 * Reads from env:
 *   CONNECT_LOG_FORMAT = json | pretty (default: pretty)
 *   CONNECT_LOG_LEVEL  = trace | debug | info | warn | error | fatal | silent (default: info)
 */
export function createLogger(options?: LoggerOptions): pino.Logger {
  const format = options?.format ?? envOption(LogFormatSchema, 'CONNECT_LOG_FORMAT') ?? 'pretty';
  const level = options?.level ?? envOption(LogLevelSchema, 'CONNECT_LOG_LEVEL') ?? 'info';

  const pinoOptions: pino.LoggerOptions = {
    level,
    name: options?.name ?? 'connect-client',
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level(label) {
        return { level: label };
      },
    },
  };

  if (format === 'pretty') {
    return pino({
      ...pinoOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    });
  }

  return pino(pinoOptions);
}

/** Logger shared by every client that is not given its own */
let _logger: pino.Logger | undefined;

export function getLogger(): pino.Logger {
  if (!_logger) {
    _logger = createLogger();
  }
  return _logger;
}

/** Replace the global logger (useful for testing) */
export function setLogger(logger: pino.Logger): void {
  _logger = logger;
}

/** Create a child logger with additional bindings */
export function createChildLogger(bindings: Record<string, unknown>): pino.Logger {
  return getLogger().child(bindings);
}
