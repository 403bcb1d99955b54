/**
 * Tests for GcloudAuthenticatorFactory backed by GoogleAuth
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { GcloudAuthenticatorFactory, OAUTH2_USERNAME } from '../gcloud.js';

const google = vi.hoisted(() => ({ issued: 0, lifetimeMs: 5 * 60 * 1000 }));

vi.mock('google-auth-library', () => {
  // Mirrors the library's clients, which assign a fresh credentials object on each refresh
  class FakeClient {
    credentials: { access_token?: string; expiry_date?: number | null } = {};

    async getAccessToken(): Promise<{ token?: string | null }> {
      google.issued += 1;
      const token = `token-${google.issued}`;
      this.credentials = { access_token: token, expiry_date: Date.now() + google.lifetimeMs };
      return { token };
    }
  }

  const client = new FakeClient();

  class GoogleAuth {
    async getClient(): Promise<FakeClient> {
      return client;
    }
  }

  return { GoogleAuth };
});

describe('GcloudAuthenticatorFactory with GoogleAuth', () => {
  beforeEach(() => {
    google.issued = 0;
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2024-01-01T00:00:00.000Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('uses the expiry reported by the refreshed credentials', async () => {
    const authenticator = await new GcloudAuthenticatorFactory().create();

    const first = await authenticator.authorization();
    expect(first).toEqual({ username: OAUTH2_USERNAME, password: 'token-1' });

    vi.setSystemTime(new Date('2024-01-01T00:03:00.000Z'));
    expect((await authenticator.authorization()).password).toBe('token-1');

    vi.setSystemTime(new Date('2024-01-01T00:10:00.000Z'));
    expect((await authenticator.authorization()).password).toBe('token-2');
  });
});
