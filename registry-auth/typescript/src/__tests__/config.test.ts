/**
 * Tests for configuration
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import {
  RegistryAuthConfigBuilder,
  configFromEnv,
  createDefaultConfig,
  validateConfig,
} from '../config.js';
import { RegistryAuthError, RegistryAuthErrorKind } from '../errors.js';

describe('config', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('creates defaults for Google registries', () => {
    vi.stubEnv('DOCKER_CONFIG', '/test/.docker');

    expect(createDefaultConfig()).toEqual({
      dockerConfigDir: '/test/.docker',
      cloudHelperName: 'gcloud',
      cloudRegistryHost: 'gcr.io',
      cloudRegistrySuffix: '.gcr.io',
      logLevel: 'info',
    });
  });

  it('reads overrides from the environment', () => {
    vi.stubEnv('DOCKER_CONFIG', '/test/.docker');
    vi.stubEnv('REGISTRY_AUTH_CLOUD_HELPER', 'corp-cloud');
    vi.stubEnv('REGISTRY_AUTH_LOG_LEVEL', 'debug');

    const config = configFromEnv();

    expect(config.cloudHelperName).toBe('corp-cloud');
    expect(config.logLevel).toBe('debug');
  });

  it('ignores an unknown log level from the environment', () => {
    vi.stubEnv('REGISTRY_AUTH_LOG_LEVEL', 'verbose');

    expect(configFromEnv().logLevel).toBe('info');
  });

  it('builds a validated configuration', () => {
    const config = new RegistryAuthConfigBuilder()
      .dockerConfigDir('/test/.docker')
      .cloudHelperName('gcloud')
      .cloudRegistry('pkg.example.io', '.pkg.example.io')
      .logLevel('warn')
      .build();

    expect(config).toEqual({
      dockerConfigDir: '/test/.docker',
      cloudHelperName: 'gcloud',
      cloudRegistryHost: 'pkg.example.io',
      cloudRegistrySuffix: '.pkg.example.io',
      logLevel: 'warn',
    });
  });

  it('rejects a suffix without a leading dot', () => {
    const config = { ...createDefaultConfig(), cloudRegistrySuffix: 'gcr.io' };

    try {
      validateConfig(config);
      expect.fail('Should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(RegistryAuthError);
      expect((error as RegistryAuthError).kind).toBe(RegistryAuthErrorKind.InvalidConfiguration);
      expect((error as RegistryAuthError).message).toBe(
        'cloudRegistrySuffix: Cloud registry suffix must start with a single "."'
      );
    }
  });

  it('rejects an empty config directory', () => {
    expect(() => new RegistryAuthConfigBuilder().dockerConfigDir('').build()).toThrow(
      'dockerConfigDir: Docker config directory cannot be empty'
    );
  });
});
