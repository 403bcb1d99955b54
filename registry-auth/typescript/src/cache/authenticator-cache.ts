/**
 * Per-registry authenticator cache.
 * @module cache/authenticator-cache
 */

import type { Authenticator } from '../auth/authenticator.js';
import { NoOpLogger, type Logger } from '../observability/index.js';
import type { RegistryReference } from '../types/reference.js';
import { LockedAuthenticator, type AuthenticatorHandle } from './locked-authenticator.js';
import { Mutex } from './mutex.js';

/**
 * Selects an authenticator for a registry reference. Must not reject.
 */
export interface AuthenticatorSelector {
  select(ref: RegistryReference): Promise<Authenticator>;
}

/**
 * Memoizes one authenticator handle per registry host.
 *
 * The whole check-then-create sequence runs under a single cache-wide lock,
 * so concurrent first lookups for a host all receive the same handle and
 * the policy runs once per host. Lookups for other hosts wait while a
 * policy runs; this happens once per distinct host.
 */
export class AuthenticatorCache {
  private readonly byRegistry = new Map<string, LockedAuthenticator>();
  private readonly lock = new Mutex();
  private readonly selector: AuthenticatorSelector;
  private readonly logger: Logger;

  constructor(selector: AuthenticatorSelector, logger: Logger = new NoOpLogger()) {
    this.selector = selector;
    this.logger = logger;
  }

  /**
   * Returns the handle for the reference's registry, creating it on first use.
   */
  async resolve(ref: RegistryReference): Promise<AuthenticatorHandle> {
    const host = ref.registryHost();

    return this.lock.runExclusive(async () => {
      const existing = this.byRegistry.get(host);
      if (existing) {
        return existing;
      }

      const handle = new LockedAuthenticator(await this.selector.select(ref));
      this.byRegistry.set(host, handle);
      this.logger.debug('Cached authenticator', { host });
      return handle;
    });
  }

  /**
   * Drops every cached handle. Handles already given out keep working.
   */
  async reset(): Promise<void> {
    await this.lock.runExclusive(() => {
      this.byRegistry.clear();
    });
    this.logger.debug('Authenticator cache reset');
  }

  /**
   * Number of cached hosts.
   */
  get size(): number {
    return this.byRegistry.size;
  }

  /**
   * Cached hosts, in insertion order.
   */
  hosts(): string[] {
    return Array.from(this.byRegistry.keys());
  }
}
