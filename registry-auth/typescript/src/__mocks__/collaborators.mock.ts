import { vi } from 'vitest';
import { Anonymous, type AuthConfig, type Authenticator } from '../auth/authenticator.js';
import type { DockerConfig } from '../credentials/docker-config.js';
import type { RegistryReference } from '../types/reference.js';

/**
 * Reference to a fixed host.
 */
export function hostRef(host: string): RegistryReference {
  return { registryHost: () => host };
}

/**
 * Authenticator returning a fixed auth config.
 */
export function fakeAuthenticator(config: AuthConfig = { username: 'test-user', password: 'test-secret' }): Authenticator {
  return { authorization: vi.fn(async () => ({ ...config })) };
}

export function mockConfigLoader(config: DockerConfig = { auths: {}, credHelpers: {} }) {
  return { load: vi.fn(async (_configDir: string): Promise<DockerConfig> => config) };
}

export function failingConfigLoader(error: Error = new Error('config unreadable')) {
  return {
    load: vi.fn(async (_configDir: string): Promise<DockerConfig> => {
      throw error;
    }),
  };
}

export function mockKeychain(result: Authenticator = Anonymous) {
  return { resolve: vi.fn(async (_host: string): Promise<Authenticator> => result) };
}

export function mockCloudFactory(result: Authenticator = fakeAuthenticator()) {
  return { create: vi.fn(async (): Promise<Authenticator> => result) };
}

export function failingCloudFactory(error: Error = new Error('no cloud credentials')) {
  return {
    create: vi.fn(async (): Promise<Authenticator> => {
      throw error;
    }),
  };
}

/**
 * Resolves after the given number of macrotask turns, letting other
 * pending callers interleave.
 */
export async function yieldTurns(turns = 1): Promise<void> {
  for (let i = 0; i < turns; i++) {
    await new Promise<void>((resolve) => setTimeout(resolve, 0));
  }
}
