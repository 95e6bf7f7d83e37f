import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { createClientFromEnv, loadClientConfigFromEnv } from '../src/config.js';
import { NullAuthorizer } from '../src/auth/authorizer.js';
import { ConfigError } from '../src/core/errors.js';
import { SERVICE_LOCATIONS } from '../src/core/service-location.js';
import { FakeTransport } from './helpers/fake-transport.js';

const ENV_KEYS = [
  'CONNECT_SERVICE_INSTANCE',
  'CONNECT_TEST',
  'CONNECT_ACCESS_TOKEN',
  'CONNECT_ACCESS_TOKEN_FILE',
  'CONNECT_REQUEST_TIMEOUT_MS',
];

describe('client configuration from env', () => {
  const saved: Record<string, string | undefined> = {};
  let tempDir: string;

  beforeEach(() => {
    for (const key of ENV_KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
    tempDir = mkdtempSync(join(tmpdir(), 'connect-config-'));
  });

  afterEach(() => {
    for (const key of ENV_KEYS) {
      const value = saved[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
    rmSync(tempDir, { recursive: true, force: true });
  });

  describe('loadClientConfigFromEnv', () => {
    it('defaults to production without test mode', () => {
      expect(loadClientConfigFromEnv()).toEqual({ serviceInstance: 'prod', test: false });
    });

    it('reads every setting', () => {
      process.env['CONNECT_SERVICE_INSTANCE'] = 'development';
      process.env['CONNECT_TEST'] = ' Yes ';
      process.env['CONNECT_ACCESS_TOKEN'] = 'test-secret';
      process.env['CONNECT_REQUEST_TIMEOUT_MS'] = '5000';

      expect(loadClientConfigFromEnv()).toEqual({
        serviceInstance: 'dev',
        test: true,
        accessToken: 'test-secret',
        requestTimeoutMs: 5000,
      });
    });

    it('reads the access token from a file', () => {
      const tokenPath = join(tempDir, 'token');
      writeFileSync(tokenPath, 'test-secret-from-file\n');
      process.env['CONNECT_ACCESS_TOKEN_FILE'] = tokenPath;

      expect(loadClientConfigFromEnv().accessToken).toBe('test-secret-from-file');
    });

    it('rejects an unknown test flag', () => {
      process.env['CONNECT_TEST'] = 'maybe';
      expect(() => loadClientConfigFromEnv()).toThrow(ConfigError);
      expect(() => loadClientConfigFromEnv()).toThrow(
        "CONNECT_TEST must be one of true, 1, yes, false, 0, no, not 'maybe'"
      );
    });

    it.each(['soon', '0', '-5', '1.5'])('rejects the timeout %s', value => {
      process.env['CONNECT_REQUEST_TIMEOUT_MS'] = value;
      expect(() => loadClientConfigFromEnv()).toThrow(
        `CONNECT_REQUEST_TIMEOUT_MS must be a positive integer, not '${value}'`
      );
    });

    it('rejects an unknown service instance', () => {
      process.env['CONNECT_SERVICE_INSTANCE'] = 'staging';
      expect(() => loadClientConfigFromEnv()).toThrow(
        "'serviceInstance' must be 'prod' or 'dev', not 'staging'"
      );
    });
  });

  describe('createClientFromEnv', () => {
    it('needs a token or an authorizer', () => {
      expect(() => createClientFromEnv()).toThrow(
        'Unable to authenticate: set CONNECT_ACCESS_TOKEN (or CONNECT_ACCESS_TOKEN_FILE)'
      );
    });

    it('builds a client from the environment', () => {
      process.env['CONNECT_SERVICE_INSTANCE'] = 'dev';
      process.env['CONNECT_TEST'] = 'true';
      process.env['CONNECT_ACCESS_TOKEN'] = 'test-secret';

      const client = createClientFromEnv();

      expect(client.serviceInstance).toBe('dev');
      expect(client.serviceLocation).toBe(SERVICE_LOCATIONS.dev);
      expect(client.submission.test).toBe(true);
    });

    it('lets explicit options win', async () => {
      process.env['CONNECT_TEST'] = 'true';
      const transport = new FakeTransport().reply(200, {
        status: { active: false, status_message: 'Done' },
      });

      const client = createClientFromEnv({
        authorizer: new NullAuthorizer(),
        transport,
        test: false,
      });
      await client.checkStatus('abc');

      expect(client.submission.test).toBe(false);
      expect(transport.requests[0]?.headers).toEqual({});
    });
  });
});
