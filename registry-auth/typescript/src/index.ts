/**
 * Registry Authentication Library
 *
 * Resolves and memoizes one authenticator per container registry host:
 * - Fixed-order resolution policy (cloud helper, keychain, cloud host, anonymous)
 * - One handle per host, shared by all callers
 * - Serialized authorization calls per handle
 * - Docker config.json, credential helpers and Google token broker support
 *
 * @example
 * ```typescript
 * import {
 *   createAuthenticatorCache,
 *   parseImageReference,
 * } from '@integrations/registry-auth';
 *
 * const cache = createAuthenticatorCache();
 *
 * const ref = parseImageReference('gcr.io/my-project/app:1.0.0');
 * const handle = await cache.resolve(ref);
 * const auth = await handle.authorization();
 * ```
 *
 * @module @integrations/registry-auth
 */

// Configuration
export {
  type RegistryAuthConfig,
  RegistryAuthConfigBuilder,
  DEFAULT_CLOUD_HELPER_NAME,
  DEFAULT_CLOUD_REGISTRY_HOST,
  DEFAULT_CLOUD_REGISTRY_SUFFIX,
  DEFAULT_LOG_LEVEL,
  createDefaultConfig,
  configFromEnv,
  validateConfig,
  defaultDockerConfigDir,
} from './config.js';

// Namespace export
export { RegistryAuthConfig as RegistryAuthConfigNamespace } from './config.js';

// Errors
export {
  RegistryAuthError,
  RegistryAuthErrorKind,
  isRegistryAuthError,
  isAuthError,
} from './errors.js';

// Logging
export { ConsoleLogger, NoOpLogger, type Logger, type LogLevel } from './observability/index.js';

// Types
export * from './types/index.js';

// Authenticators
export * from './auth/index.js';

// Credential sources
export * from './credentials/index.js';

// Cache
export * from './cache/index.js';
