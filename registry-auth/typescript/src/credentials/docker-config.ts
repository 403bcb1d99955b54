/**
 * Docker client credential configuration (config.json).
 * @module credentials/docker-config
 */

import { readFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import { RegistryAuthError } from '../errors.js';

/**
 * File name of the Docker client configuration.
 */
export const DOCKER_CONFIG_FILE = 'config.json';

/**
 * Inline credentials stored for one registry under `auths`.
 */
export const AuthEntrySchema = z.object({
  auth: z.string().optional(),
  username: z.string().optional(),
  password: z.string().optional(),
  identitytoken: z.string().optional(),
  registrytoken: z.string().optional(),
});

export type AuthEntry = z.infer<typeof AuthEntrySchema>;

/**
 * The subset of config.json used for credential lookup.
 */
export const DockerConfigSchema = z.object({
  auths: z.record(AuthEntrySchema).default({}),
  credHelpers: z.record(z.string()).default({}),
  credsStore: z.string().optional(),
});

export type DockerConfig = z.infer<typeof DockerConfigSchema>;

/**
 * Returns an empty configuration.
 */
export function emptyDockerConfig(): DockerConfig {
  return { auths: {}, credHelpers: {} };
}

/**
 * Loads credential configuration from a config directory.
 */
export interface CredentialConfigLoader {
  load(configDir: string): Promise<DockerConfig>;
}

/**
 * Parses the contents of a config.json file.
 */
export function parseDockerConfig(content: string, path = DOCKER_CONFIG_FILE): DockerConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw RegistryAuthError.configInvalid(
      path,
      error instanceof Error ? error.message : String(error)
    );
  }

  const result = DockerConfigSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw RegistryAuthError.configInvalid(
      path,
      issue ? `${issue.path.join('.') || '<root>'}: ${issue.message}` : 'schema mismatch'
    );
  }
  return result.data;
}

/**
 * Reads `<configDir>/config.json` from disk.
 * A missing file loads as an empty configuration, like the Docker client.
 */
export class FileCredentialConfigLoader implements CredentialConfigLoader {
  async load(configDir: string): Promise<DockerConfig> {
    const path = join(configDir, DOCKER_CONFIG_FILE);

    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return emptyDockerConfig();
      }
      throw RegistryAuthError.configLoadFailed(
        path,
        error instanceof Error ? error : undefined
      );
    }

    return parseDockerConfig(content, path);
  }
}

function isNotFound(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}
