/**
 * Wires an authenticator cache with its default collaborators.
 * @module cache/factory
 */

import { GcloudAuthenticatorFactory, type CloudTokenBrokerFactory } from '../auth/gcloud.js';
import { createDefaultConfig, validateConfig, type RegistryAuthConfig } from '../config.js';
import {
  FileCredentialConfigLoader,
  type CredentialConfigLoader,
} from '../credentials/docker-config.js';
import { DefaultKeychain, type Keychain } from '../credentials/keychain.js';
import { ConsoleLogger, type Logger } from '../observability/index.js';
import { AuthenticatorCache } from './authenticator-cache.js';
import { ResolutionPolicy } from './policy.js';

/**
 * Options for {@link createAuthenticatorCache}. Every collaborator is
 * optional and defaults to the real implementation.
 */
export interface AuthenticatorCacheOptions {
  /** Configuration (defaults to {@link createDefaultConfig}) */
  config?: RegistryAuthConfig;
  /** Logger (defaults to a console logger at the configured level) */
  logger?: Logger;
  /** Credential config loader */
  configLoader?: CredentialConfigLoader;
  /** Keychain */
  keychain?: Keychain;
  /** Cloud token broker factory */
  cloudFactory?: CloudTokenBrokerFactory;
}

/**
 * Creates a new, empty authenticator cache.
 * Each call returns an independent cache.
 */
export function createAuthenticatorCache(
  options: AuthenticatorCacheOptions = {}
): AuthenticatorCache {
  const config = options.config ?? createDefaultConfig();
  validateConfig(config);

  const logger = options.logger ?? new ConsoleLogger({ minLevel: config.logLevel });
  const configLoader = options.configLoader ?? new FileCredentialConfigLoader();
  const keychain =
    options.keychain ??
    new DefaultKeychain({ configDir: config.dockerConfigDir, loader: configLoader, logger });

  const policy = new ResolutionPolicy({
    configDir: config.dockerConfigDir,
    configLoader,
    keychain,
    cloudFactory: options.cloudFactory ?? new GcloudAuthenticatorFactory(),
    cloudHelperName: config.cloudHelperName,
    cloudRegistryHost: config.cloudRegistryHost,
    cloudRegistrySuffix: config.cloudRegistrySuffix,
    logger,
  });

  return new AuthenticatorCache(policy, logger);
}
