/**
 * Docker Secrets Support (`_FILE` suffix pattern)
 *
 * Resolves environment variables with support for Docker secrets.
 * When `ENV_NAME_FILE` is set, reads the file contents instead of `ENV_NAME`.
 * `_FILE` variant takes precedence over plain env var.
 */

import { readFileSync } from 'node:fs';
import { ConfigError } from './core/errors.js';

/**
 * Resolve a secret from environment variables with `_FILE` suffix support.
 *
 * @param name - Environment variable name (e.g., 'CONNECT_ACCESS_TOKEN')
 * @returns The resolved value, or undefined if neither is set
 * @throws ConfigError if `_FILE` is set but the file cannot be read
 */
export function resolveSecret(name: string): string | undefined {
  const filePath = process.env[`${name}_FILE`];

  if (filePath) {
    try {
      return readFileSync(filePath, 'utf-8').trim();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ConfigError(
        `Failed to read secret file for ${name}_FILE (${filePath}): ${message}`
      );
    }
  }

  return process.env[name] || undefined;
}
