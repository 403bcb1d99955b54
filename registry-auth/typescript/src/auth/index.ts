/**
 * Authentication providers.
 * @module auth
 */

export { SecretString } from './secret.js';
export {
  Anonymous,
  isAnonymous,
  BasicAuthenticator,
  BearerAuthenticator,
  StaticAuthenticator,
  type AuthConfig,
  type Authenticator,
} from './authenticator.js';
export {
  GcloudAuthenticator,
  GcloudAuthenticatorFactory,
  GoogleAccessTokenSource,
  OAUTH2_USERNAME,
  CLOUD_PLATFORM_SCOPES,
  type AccessToken,
  type AccessTokenSource,
  type AccessTokenClient,
  type GoogleAuthLike,
  type CloudTokenBrokerFactory,
  type GcloudAuthenticatorFactoryOptions,
} from './gcloud.js';
