/**
 * Authenticator handle safe for concurrent callers.
 * @module cache/locked-authenticator
 */

import type { AuthConfig, Authenticator } from '../auth/authenticator.js';
import { Mutex } from './mutex.js';

/**
 * Wraps one authenticator so that at most one `authorization()` call runs
 * against it at a time. Providers that refresh tokens internally are not
 * safe to call concurrently.
 */
export class LockedAuthenticator implements Authenticator {
  readonly delegate: Authenticator;
  private readonly lock = new Mutex();

  constructor(delegate: Authenticator) {
    this.delegate = delegate;
  }

  /**
   * Forwards to the delegate under the handle's lock.
   * Delegate errors are rethrown unchanged.
   */
  async authorization(): Promise<AuthConfig> {
    return this.lock.runExclusive(() => this.delegate.authorization());
  }
}

/**
 * Handle returned by the authenticator cache.
 */
export type AuthenticatorHandle = LockedAuthenticator;
