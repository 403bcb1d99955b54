/**
 * Configuration types for registry authentication.
 * @module config
 */

import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import { RegistryAuthError } from './errors.js';
import type { LogLevel } from './observability/index.js';

/**
 * Credential helper name that selects the Google token broker.
 */
export const DEFAULT_CLOUD_HELPER_NAME = 'gcloud';

/**
 * Canonical Google Container Registry host.
 */
export const DEFAULT_CLOUD_REGISTRY_HOST = 'gcr.io';

/**
 * Suffix shared by regional Google Container Registry hosts.
 */
export const DEFAULT_CLOUD_REGISTRY_SUFFIX = '.gcr.io';

/**
 * Default log level.
 */
export const DEFAULT_LOG_LEVEL: LogLevel = 'info';

/**
 * Registry authentication configuration.
 */
export interface RegistryAuthConfig {
  /** Directory holding the Docker client config.json */
  dockerConfigDir: string;
  /** Credential helper name that maps to the cloud token broker */
  cloudHelperName: string;
  /** Host for which the cloud token broker is tried without configuration */
  cloudRegistryHost: string;
  /** Host suffix for which the cloud token broker is tried without configuration */
  cloudRegistrySuffix: string;
  /** Minimum log level */
  logLevel: LogLevel;
}

/**
 * Zod schema for configuration validation.
 */
const configSchema = z.object({
  dockerConfigDir: z.string().min(1, 'Docker config directory cannot be empty'),
  cloudHelperName: z.string().min(1, 'Cloud helper name cannot be empty'),
  cloudRegistryHost: z.string().min(1, 'Cloud registry host cannot be empty'),
  cloudRegistrySuffix: z
    .string()
    .regex(/^\.[^.]/, 'Cloud registry suffix must start with a single "."'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']),
});

/**
 * Resolves the Docker config directory the way the Docker client does.
 */
export function defaultDockerConfigDir(): string {
  return process.env['DOCKER_CONFIG'] || join(homedir(), '.docker');
}

/**
 * Creates a default configuration.
 */
export function createDefaultConfig(): RegistryAuthConfig {
  return {
    dockerConfigDir: defaultDockerConfigDir(),
    cloudHelperName: DEFAULT_CLOUD_HELPER_NAME,
    cloudRegistryHost: DEFAULT_CLOUD_REGISTRY_HOST,
    cloudRegistrySuffix: DEFAULT_CLOUD_REGISTRY_SUFFIX,
    logLevel: DEFAULT_LOG_LEVEL,
  };
}

/**
 * Validates a configuration.
 */
export function validateConfig(config: RegistryAuthConfig): void {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw RegistryAuthError.configuration(
      issue ? `${issue.path.join('.')}: ${issue.message}` : 'Invalid configuration'
    );
  }
}

/**
 * Creates configuration from environment variables.
 */
export function configFromEnv(): RegistryAuthConfig {
  const config = createDefaultConfig();

  const cloudHelper = process.env['REGISTRY_AUTH_CLOUD_HELPER'];
  if (cloudHelper) {
    config.cloudHelperName = cloudHelper;
  }

  const logLevel = process.env['REGISTRY_AUTH_LOG_LEVEL'];
  if (logLevel === 'debug' || logLevel === 'info' || logLevel === 'warn' || logLevel === 'error') {
    config.logLevel = logLevel;
  }

  return config;
}

/**
 * Builder for RegistryAuthConfig.
 */
export class RegistryAuthConfigBuilder {
  private config: RegistryAuthConfig;

  constructor() {
    this.config = createDefaultConfig();
  }

  /**
   * Sets the Docker config directory.
   */
  dockerConfigDir(dir: string): this {
    this.config.dockerConfigDir = dir;
    return this;
  }

  /**
   * Sets the helper name that selects the cloud token broker.
   */
  cloudHelperName(name: string): this {
    this.config.cloudHelperName = name;
    return this;
  }

  /**
   * Sets the cloud registry host and suffix.
   */
  cloudRegistry(host: string, suffix: string): this {
    this.config.cloudRegistryHost = host;
    this.config.cloudRegistrySuffix = suffix;
    return this;
  }

  /**
   * Sets the minimum log level.
   */
  logLevel(level: LogLevel): this {
    this.config.logLevel = level;
    return this;
  }

  /**
   * Builds and validates the configuration.
   */
  build(): RegistryAuthConfig {
    validateConfig(this.config);
    return { ...this.config };
  }
}

/**
 * Namespace for RegistryAuthConfig utilities.
 */
export namespace RegistryAuthConfig {
  /**
   * Creates a new configuration builder.
   */
  export function builder(): RegistryAuthConfigBuilder {
    return new RegistryAuthConfigBuilder();
  }

  /**
   * Creates configuration from environment variables.
   */
  export function fromEnv(): RegistryAuthConfig {
    return configFromEnv();
  }

  /**
   * Creates a default configuration.
   */
  export function defaultConfig(): RegistryAuthConfig {
    return createDefaultConfig();
  }
}
