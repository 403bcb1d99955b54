/**
 * Authenticator resolution policy.
 * @module cache/policy
 */

import { Anonymous, isAnonymous, type Authenticator } from '../auth/authenticator.js';
import type { CloudTokenBrokerFactory } from '../auth/gcloud.js';
import type { CredentialConfigLoader } from '../credentials/docker-config.js';
import type { Keychain } from '../credentials/keychain.js';
import { NoOpLogger, type Logger } from '../observability/index.js';
import type { RegistryReference } from '../types/reference.js';
import {
  DEFAULT_CLOUD_HELPER_NAME,
  DEFAULT_CLOUD_REGISTRY_HOST,
  DEFAULT_CLOUD_REGISTRY_SUFFIX,
} from '../config.js';

/**
 * Policy step that produced an authenticator.
 */
export type ResolutionStep =
  | 'configured-cloud-helper'
  | 'keychain'
  | 'cloud-host'
  | 'anonymous';

/**
 * Outcome of running the policy for one host.
 */
export interface Resolution {
  host: string;
  step: ResolutionStep;
  authenticator: Authenticator;
}

/**
 * Collaborators and settings for {@link ResolutionPolicy}.
 */
export interface ResolutionPolicyOptions {
  /** Directory holding the credential config */
  configDir: string;
  /** Credential config loader */
  configLoader: CredentialConfigLoader;
  /** Generic keychain */
  keychain: Keychain;
  /** Cloud token broker factory */
  cloudFactory: CloudTokenBrokerFactory;
  /** Helper name that selects the cloud token broker */
  cloudHelperName?: string;
  /** Cloud registry host */
  cloudRegistryHost?: string;
  /** Cloud registry host suffix */
  cloudRegistrySuffix?: string;
  /** Logger */
  logger?: Logger;
}

/**
 * Picks an authenticator for a registry host. First success wins:
 *
 * 1. the cloud token broker, when config.json names the cloud helper for the host
 * 2. whatever non-anonymous authenticator the keychain returns
 * 3. the cloud token broker, when the host is a cloud registry host
 * 4. anonymous
 *
 * The keychain is consulted before the cloud host check, so a generic
 * helper configured for a cloud host takes precedence over the broker.
 * Never rejects.
 */
export class ResolutionPolicy {
  private readonly configDir: string;
  private readonly configLoader: CredentialConfigLoader;
  private readonly keychain: Keychain;
  private readonly cloudFactory: CloudTokenBrokerFactory;
  private readonly cloudHelperName: string;
  private readonly cloudRegistryHost: string;
  private readonly cloudRegistrySuffix: string;
  private readonly logger: Logger;

  constructor(options: ResolutionPolicyOptions) {
    this.configDir = options.configDir;
    this.configLoader = options.configLoader;
    this.keychain = options.keychain;
    this.cloudFactory = options.cloudFactory;
    this.cloudHelperName = options.cloudHelperName ?? DEFAULT_CLOUD_HELPER_NAME;
    this.cloudRegistryHost = options.cloudRegistryHost ?? DEFAULT_CLOUD_REGISTRY_HOST;
    this.cloudRegistrySuffix = options.cloudRegistrySuffix ?? DEFAULT_CLOUD_REGISTRY_SUFFIX;
    this.logger = options.logger ?? new NoOpLogger();
  }

  /**
   * Selects the authenticator for a reference's registry.
   */
  async select(ref: RegistryReference): Promise<Authenticator> {
    const resolution = await this.resolve(ref.registryHost());
    return resolution.authenticator;
  }

  /**
   * Runs the policy for a host and reports which step won.
   */
  async resolve(host: string): Promise<Resolution> {
    const resolution = await this.run(host);
    this.logger.debug('Selected authenticator', { host, step: resolution.step });
    return resolution;
  }

  /**
   * Whether the host is served by the cloud registry.
   */
  isCloudRegistryHost(host: string): boolean {
    return host === this.cloudRegistryHost || host.endsWith(this.cloudRegistrySuffix);
  }

  private async run(host: string): Promise<Resolution> {
    if (await this.hasConfiguredCloudHelper(host)) {
      const broker = await this.tryCloudBroker(host);
      if (broker) {
        return { host, step: 'configured-cloud-helper', authenticator: broker };
      }
    }

    const fromKeychain = await this.tryKeychain(host);
    if (!isAnonymous(fromKeychain)) {
      return { host, step: 'keychain', authenticator: fromKeychain };
    }

    if (this.isCloudRegistryHost(host)) {
      const broker = await this.tryCloudBroker(host);
      if (broker) {
        return { host, step: 'cloud-host', authenticator: broker };
      }
    }

    return { host, step: 'anonymous', authenticator: Anonymous };
  }

  private async hasConfiguredCloudHelper(host: string): Promise<boolean> {
    try {
      const config = await this.configLoader.load(this.configDir);
      return config.credHelpers[host] === this.cloudHelperName;
    } catch (error) {
      this.logger.debug('Credential config unavailable', {
        host,
        error: describe(error),
      });
      return false;
    }
  }

  private async tryKeychain(host: string): Promise<Authenticator> {
    try {
      return await this.keychain.resolve(host);
    } catch (error) {
      this.logger.debug('Keychain lookup failed', { host, error: describe(error) });
      return Anonymous;
    }
  }

  private async tryCloudBroker(host: string): Promise<Authenticator | undefined> {
    try {
      return await this.cloudFactory.create();
    } catch (error) {
      this.logger.debug('Cloud token broker unavailable', {
        host,
        error: describe(error),
      });
      return undefined;
    }
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
