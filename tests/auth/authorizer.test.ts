import { describe, it, expect, vi } from 'vitest';
import {
  NullAuthorizer,
  RefreshingTokenAuthorizer,
  StaticTokenAuthorizer,
} from '../../src/auth/authorizer.js';

describe('authorizers', () => {
  it('StaticTokenAuthorizer sends a bearer token and cannot refresh it', async () => {
    const authorizer = new StaticTokenAuthorizer('test-secret');
    await authorizer.handleMissingAuthorization();
    await expect(authorizer.getAuthorizationHeader()).resolves.toBe('Bearer test-secret');
  });

  it('RefreshingTokenAuthorizer swaps in the refreshed token', async () => {
    const refresh = vi.fn().mockResolvedValue('test-secret-2');
    const authorizer = new RefreshingTokenAuthorizer('test-secret', refresh);

    await expect(authorizer.getAuthorizationHeader()).resolves.toBe('Bearer test-secret');
    await authorizer.handleMissingAuthorization();
    await expect(authorizer.getAuthorizationHeader()).resolves.toBe('Bearer test-secret-2');
    expect(refresh).toHaveBeenCalledTimes(1);
  });

  it('NullAuthorizer sends no header', async () => {
    await expect(new NullAuthorizer().getAuthorizationHeader()).resolves.toBeNull();
  });
});
