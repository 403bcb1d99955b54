/**
 * Authenticator cache module.
 * @module cache
 */

export { Mutex } from './mutex.js';
export { LockedAuthenticator, type AuthenticatorHandle } from './locked-authenticator.js';
export {
  ResolutionPolicy,
  type Resolution,
  type ResolutionStep,
  type ResolutionPolicyOptions,
} from './policy.js';
export { AuthenticatorCache, type AuthenticatorSelector } from './authenticator-cache.js';
export { createAuthenticatorCache, type AuthenticatorCacheOptions } from './factory.js';
