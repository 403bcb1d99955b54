/**
 * Keychain backed by the Docker client configuration.
 * @module credentials/keychain
 */

import {
  Anonymous,
  BasicAuthenticator,
  BearerAuthenticator,
  StaticAuthenticator,
  type Authenticator,
} from '../auth/authenticator.js';
import { NoOpLogger, type Logger } from '../observability/index.js';
import { DEFAULT_REGISTRY } from '../types/reference.js';
import {
  FileCredentialConfigLoader,
  type AuthEntry,
  type CredentialConfigLoader,
  type DockerConfig,
} from './docker-config.js';
import { CredentialHelperAuthenticator, spawnHelper, type HelperRunner } from './helper.js';

/**
 * Server address the Docker client uses for Docker Hub credentials.
 */
export const DOCKER_HUB_SERVER_ADDRESS = 'https://index.docker.io/v1/';

/**
 * Resolves a registry host to an authenticator.
 * Returns {@link Anonymous} when nothing is configured for the host.
 */
export interface Keychain {
  resolve(host: string): Promise<Authenticator>;
}

/**
 * Options for {@link DefaultKeychain}.
 */
export interface DefaultKeychainOptions {
  /** Directory holding config.json */
  configDir: string;
  /** Config loader (defaults to reading from disk) */
  loader?: CredentialConfigLoader;
  /** Credential helper runner */
  runHelper?: HelperRunner;
  /** Logger */
  logger?: Logger;
}

/**
 * Server address used when talking to credential helpers for a host.
 */
export function serverAddressFor(host: string): string {
  return host === DEFAULT_REGISTRY ? DOCKER_HUB_SERVER_ADDRESS : host;
}

/**
 * Decodes an `auths` entry into an authenticator, or undefined when the
 * entry holds no usable credentials.
 */
export function authenticatorFromEntry(entry: AuthEntry): Authenticator | undefined {
  if (entry.registrytoken) {
    return new BearerAuthenticator(entry.registrytoken);
  }

  if (entry.identitytoken) {
    return new StaticAuthenticator({
      username: entry.username,
      identityToken: entry.identitytoken,
    });
  }

  if (entry.username && entry.password) {
    return new BasicAuthenticator(entry.username, entry.password);
  }

  if (entry.auth) {
    const decoded = Buffer.from(entry.auth, 'base64').toString('utf-8');
    const separator = decoded.indexOf(':');
    if (separator > 0) {
      return new BasicAuthenticator(decoded.slice(0, separator), decoded.slice(separator + 1));
    }
  }

  return undefined;
}

/**
 * Keychain that reads the Docker client configuration on each lookup.
 *
 * Lookup order for a host:
 * 1. per-registry credential helper (`credHelpers`)
 * 2. global credential store (`credsStore`)
 * 3. inline credentials (`auths`)
 */
export class DefaultKeychain implements Keychain {
  private readonly configDir: string;
  private readonly loader: CredentialConfigLoader;
  private readonly runHelper: HelperRunner;
  private readonly logger: Logger;

  constructor(options: DefaultKeychainOptions) {
    this.configDir = options.configDir;
    this.loader = options.loader ?? new FileCredentialConfigLoader();
    this.runHelper = options.runHelper ?? spawnHelper;
    this.logger = options.logger ?? new NoOpLogger();
  }

  async resolve(host: string): Promise<Authenticator> {
    let config: DockerConfig;
    try {
      config = await this.loader.load(this.configDir);
    } catch (error) {
      this.logger.debug('Credential config unavailable, using anonymous', {
        host,
        error: error instanceof Error ? error.message : String(error),
      });
      return Anonymous;
    }

    return this.fromConfig(host, config);
  }

  private fromConfig(host: string, config: DockerConfig): Authenticator {
    const serverAddress = serverAddressFor(host);

    const helper = config.credHelpers[host] ?? config.credHelpers[serverAddress];
    if (helper) {
      return new CredentialHelperAuthenticator(helper, serverAddress, this.runHelper);
    }

    if (config.credsStore) {
      return new CredentialHelperAuthenticator(config.credsStore, serverAddress, this.runHelper);
    }

    const candidates = [host, `https://${host}`, `http://${host}`, serverAddress];
    for (const key of candidates) {
      const entry = config.auths[key];
      if (!entry) {
        continue;
      }
      const authenticator = authenticatorFromEntry(entry);
      if (authenticator) {
        return authenticator;
      }
      this.logger.warn('Ignoring auths entry without usable credentials', { host, key });
    }

    return Anonymous;
  }
}
