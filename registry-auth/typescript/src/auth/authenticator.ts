/**
 * Authenticator contract and static providers.
 * @module auth/authenticator
 */

import { SecretString } from './secret.js';

/**
 * Authorization material for one registry request.
 * Field names follow the Docker client's auth config.
 */
export interface AuthConfig {
  /** Registry username */
  username?: string;
  /** Registry password or access token */
  password?: string;
  /** Base64 `username:password` */
  auth?: string;
  /** Refresh token exchanged for registry tokens */
  identityToken?: string;
  /** Bearer token sent to the registry as is */
  registryToken?: string;
}

/**
 * Produces authorization material on demand for requests to one registry.
 */
export interface Authenticator {
  authorization(): Promise<AuthConfig>;
}

/**
 * Authenticator that never presents credentials.
 */
class AnonymousAuthenticator implements Authenticator {
  async authorization(): Promise<AuthConfig> {
    return {};
  }

  toString(): string {
    return 'Anonymous';
  }
}

/**
 * The canonical anonymous authenticator. Compared by identity.
 */
export const Anonymous: Authenticator = Object.freeze(new AnonymousAuthenticator());

/**
 * Returns true if the authenticator is the anonymous sentinel.
 */
export function isAnonymous(authenticator: Authenticator): boolean {
  return authenticator === Anonymous;
}

/**
 * Username/password authenticator.
 */
export class BasicAuthenticator implements Authenticator {
  private readonly username: string;
  private readonly password: SecretString;

  constructor(username: string, password: string) {
    this.username = username;
    this.password = new SecretString(password);
  }

  async authorization(): Promise<AuthConfig> {
    return { username: this.username, password: this.password.expose() };
  }
}

/**
 * Authenticator that presents a fixed registry bearer token.
 */
export class BearerAuthenticator implements Authenticator {
  private readonly token: SecretString;

  constructor(token: string) {
    this.token = new SecretString(token);
  }

  async authorization(): Promise<AuthConfig> {
    return { registryToken: this.token.expose() };
  }
}

/**
 * Authenticator backed by a fixed auth config, such as an inline
 * `auths` entry from the Docker config file.
 */
export class StaticAuthenticator implements Authenticator {
  private readonly config: AuthConfig;

  constructor(config: AuthConfig) {
    this.config = { ...config };
  }

  async authorization(): Promise<AuthConfig> {
    return { ...this.config };
  }

  toString(): string {
    return `StaticAuthenticator(${this.config.username ?? '<token>'})`;
  }
}
