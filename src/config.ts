/**
 * Client Configuration Loader
 *
 * Reads client settings from environment variables (with Docker secrets
 * `_FILE` support for the access token) and builds a `ConnectClient`.
 */

import { StaticTokenAuthorizer } from './auth/authorizer.js';
import type { ConnectClientOptions } from './client.js';
import { ConnectClient } from './client.js';
import { ConfigError } from './core/errors.js';
import type { ServiceInstance } from './core/service-location.js';
import { resolveServiceInstance } from './core/service-location.js';
import { resolveSecret } from './secrets.js';

export interface ClientConfig {
  serviceInstance: ServiceInstance;
  test: boolean;
  accessToken?: string;
  requestTimeoutMs?: number;
}

const TRUE_VALUES = ['true', '1', 'yes'];
const FALSE_VALUES = ['false', '0', 'no'];

function parseBoolean(name: string, fallback: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  const value = raw.trim().toLowerCase();
  if (TRUE_VALUES.includes(value)) return true;
  if (FALSE_VALUES.includes(value)) return false;
  throw new ConfigError(`${name} must be one of ${[...TRUE_VALUES, ...FALSE_VALUES].join(', ')}, not '${raw}'`);
}

function parsePositiveInt(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return undefined;
  const value = parseInt(raw, 10);
  if (!/^\s*\d+\s*$/.test(raw) || value <= 0) {
    throw new ConfigError(`${name} must be a positive integer, not '${raw}'`);
  }
  return value;
}

/**
 * Load client configuration from environment variables.
 *
 * Env vars:
 * - `CONNECT_SERVICE_INSTANCE`: prod | production | dev | development (default: prod)
 * - `CONNECT_TEST`: true/false, 1/0, yes/no (default: false)
 * - `CONNECT_ACCESS_TOKEN`: bearer token; supports `_FILE`
 * - `CONNECT_REQUEST_TIMEOUT_MS`: per-request timeout (default: none)
 *
 * @throws ConfigError on a value it cannot use
 */
export function loadClientConfigFromEnv(): ClientConfig {
  const config: ClientConfig = {
    serviceInstance: resolveServiceInstance(process.env['CONNECT_SERVICE_INSTANCE'] || undefined),
    test: parseBoolean('CONNECT_TEST', false),
  };

  const accessToken = resolveSecret('CONNECT_ACCESS_TOKEN');
  if (accessToken) {
    config.accessToken = accessToken;
  }
  const requestTimeoutMs = parsePositiveInt('CONNECT_REQUEST_TIMEOUT_MS');
  if (requestTimeoutMs !== undefined) {
    config.requestTimeoutMs = requestTimeoutMs;
  }
  return config;
}

/**
 * Build a client from the environment. Explicit options win over it.
 *
 * @throws ConfigError when there is neither an access token nor an authorizer
 */
export function createClientFromEnv(overrides: ConnectClientOptions = {}): ConnectClient {
  const config = loadClientConfigFromEnv();
  const authorizer =
    overrides.authorizer ??
    (config.accessToken ? new StaticTokenAuthorizer(config.accessToken) : undefined);
  if (!authorizer) {
    throw new ConfigError(
      'Unable to authenticate: set CONNECT_ACCESS_TOKEN (or CONNECT_ACCESS_TOKEN_FILE)'
    );
  }

  return new ConnectClient({
    serviceInstance: config.serviceInstance,
    test: config.test,
    requestTimeoutMs: config.requestTimeoutMs,
    ...overrides,
    authorizer,
  });
}
