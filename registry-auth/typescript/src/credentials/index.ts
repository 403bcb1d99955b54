/**
 * Credential sources: Docker config, credential helpers and the keychain.
 * @module credentials
 */

export {
  FileCredentialConfigLoader,
  DockerConfigSchema,
  AuthEntrySchema,
  DOCKER_CONFIG_FILE,
  emptyDockerConfig,
  parseDockerConfig,
  type AuthEntry,
  type DockerConfig,
  type CredentialConfigLoader,
} from './docker-config.js';
export {
  CredentialHelperAuthenticator,
  spawnHelper,
  HELPER_PREFIX,
  IDENTITY_TOKEN_USERNAME,
  type HelperRunner,
  type HelperProcessResult,
} from './helper.js';
export {
  DefaultKeychain,
  DOCKER_HUB_SERVER_ADDRESS,
  authenticatorFromEntry,
  serverAddressFor,
  type Keychain,
  type DefaultKeychainOptions,
} from './keychain.js';
