/**
 * Tests for the Google token broker
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  GcloudAuthenticator,
  GcloudAuthenticatorFactory,
  GoogleAccessTokenSource,
  OAUTH2_USERNAME,
  type AccessToken,
  type AccessTokenClient,
} from '../gcloud.js';
import { RegistryAuthError, RegistryAuthErrorKind } from '../../errors.js';
import { yieldTurns } from '../../__mocks__/collaborators.mock.js';

const HOUR_MS = 3600 * 1000;

function tokenSource(tokens: string[], ttlMs = HOUR_MS) {
  let index = 0;
  return {
    fetchToken: vi.fn(async (): Promise<AccessToken> => {
      await yieldTurns(1);
      const token = tokens[Math.min(index, tokens.length - 1)] ?? 'test-token';
      index++;
      return { token, expiresAt: new Date(Date.now() + ttlMs) };
    }),
  };
}

describe('GcloudAuthenticator', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('presents the access token as oauth2accesstoken password', async () => {
    const authenticator = new GcloudAuthenticator(tokenSource(['test-access-token']));

    await expect(authenticator.authorization()).resolves.toEqual({
      username: OAUTH2_USERNAME,
      password: 'test-access-token',
    });
  });

  it('reuses a token while most of its lifetime remains', async () => {
    const source = tokenSource(['token-1', 'token-2']);
    const authenticator = new GcloudAuthenticator(source);

    await authenticator.getToken();
    const second = await authenticator.getToken();

    expect(second).toBe('token-1');
    expect(source.fetchToken).toHaveBeenCalledTimes(1);
  });

  it('refreshes when less than a fifth of the lifetime remains', async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
    const source = tokenSource(['token-1', 'token-2']);
    const authenticator = new GcloudAuthenticator(source);

    await authenticator.getToken();
    vi.setSystemTime(new Date('2026-01-01T00:50:00Z'));
    const refreshed = await authenticator.getToken();

    expect(refreshed).toBe('token-2');
    expect(source.fetchToken).toHaveBeenCalledTimes(2);
  });

  it('coalesces concurrent refreshes', async () => {
    const source = tokenSource(['token-1', 'token-2']);
    const authenticator = new GcloudAuthenticator(source);

    const tokens = await Promise.all([
      authenticator.getToken(),
      authenticator.getToken(),
      authenticator.getToken(),
    ]);

    expect(tokens).toEqual(['token-1', 'token-1', 'token-1']);
    expect(source.fetchToken).toHaveBeenCalledTimes(1);
  });

  it('fetches again after clearCache', async () => {
    const source = tokenSource(['token-1', 'token-2']);
    const authenticator = new GcloudAuthenticator(source);

    await authenticator.getToken();
    authenticator.clearCache();

    await expect(authenticator.getToken()).resolves.toBe('token-2');
  });

  it('wraps source failures as TokenRefreshFailed', async () => {
    const authenticator = new GcloudAuthenticator({
      fetchToken: async () => {
        throw new Error('metadata server unreachable');
      },
    });

    await expect(authenticator.authorization()).rejects.toMatchObject({
      kind: RegistryAuthErrorKind.TokenRefreshFailed,
      message: 'Failed to refresh token: metadata server unreachable',
    });
  });

  it('maps missing default credentials to CredentialsNotFound', async () => {
    const authenticator = new GcloudAuthenticator({
      fetchToken: async () => {
        throw new Error('Could not load the default credentials. Browse to ...');
      },
    });

    await expect(authenticator.authorization()).rejects.toMatchObject({
      kind: RegistryAuthErrorKind.CredentialsNotFound,
    });
  });
});

describe('GoogleAccessTokenSource', () => {
  function authWith(client: AccessTokenClient) {
    return { getClient: vi.fn(async () => client) };
  }

  it('uses the client expiry when reported', async () => {
    const expiry = Date.parse('2026-01-01T01:00:00Z');
    const source = new GoogleAccessTokenSource(
      authWith({
        getAccessToken: async () => ({ token: 'test-access-token' }),
        credentials: { expiry_date: expiry },
      })
    );

    await expect(source.fetchToken()).resolves.toEqual({
      token: 'test-access-token',
      expiresAt: new Date(expiry),
    });
  });

  it('fails when the client returns no token', async () => {
    const source = new GoogleAccessTokenSource(
      authWith({ getAccessToken: async () => ({ token: null }) })
    );

    await expect(source.fetchToken()).rejects.toBeInstanceOf(RegistryAuthError);
  });
});

describe('GcloudAuthenticatorFactory', () => {
  it('creates an authenticator when credentials are available', async () => {
    const factory = new GcloudAuthenticatorFactory({
      createAuth: () => ({
        getClient: async () => ({
          getAccessToken: async () => ({ token: 'test-access-token' }),
        }),
      }),
    });

    const authenticator = await factory.create();

    expect(authenticator).toBeInstanceOf(GcloudAuthenticator);
    await expect(authenticator.authorization()).resolves.toEqual({
      username: OAUTH2_USERNAME,
      password: 'test-access-token',
    });
  });

  it('rejects with CredentialsNotFound when no credentials exist', async () => {
    const factory = new GcloudAuthenticatorFactory({
      createAuth: () => ({
        getClient: async () => {
          throw new Error('Could not load the default credentials.');
        },
      }),
    });

    await expect(factory.create()).rejects.toMatchObject({
      kind: RegistryAuthErrorKind.CredentialsNotFound,
    });
  });
});
