/**
 * Registry and image references.
 * @module types/reference
 */

import { RegistryAuthError } from '../errors.js';

/**
 * Default registry for references without a registry component.
 */
export const DEFAULT_REGISTRY = 'index.docker.io';

/**
 * Hostnames that all mean Docker Hub.
 */
const DOCKER_HUB_ALIASES = new Set(['docker.io', 'index.docker.io', 'registry-1.docker.io']);

/**
 * Tag validation pattern.
 */
export const TAG_PATTERN = /^[a-zA-Z0-9_][a-zA-Z0-9._-]{0,127}$/;

/**
 * Digest validation pattern (algorithm:hex).
 */
export const DIGEST_PATTERN = /^[a-z0-9]+(?:[.+_-][a-z0-9]+)*:[a-f0-9]{32,}$/;

/**
 * Repository path validation pattern (one or more lowercase components).
 */
export const REPOSITORY_PATTERN =
  /^[a-z0-9]+(?:(?:[._]|__|-+)[a-z0-9]+)*(?:\/[a-z0-9]+(?:(?:[._]|__|-+)[a-z0-9]+)*)*$/;

/**
 * Registry host validation pattern (hostname with optional port).
 */
export const REGISTRY_HOST_PATTERN = /^[a-z0-9](?:[a-z0-9.-]*[a-z0-9])?(?::\d+)?$/;

/**
 * Anything that points at a registry.
 */
export interface RegistryReference {
  /** Registry host (hostname with optional port), already normalized */
  registryHost(): string;
}

/**
 * Tag or digest reference for an image.
 */
export type TagOrDigest =
  | { type: 'tag'; value: string }
  | { type: 'digest'; value: string };

/**
 * Normalizes a registry host: lowercase, Docker Hub aliases collapsed.
 */
export function normalizeRegistryHost(host: string): string {
  const lower = host.trim().toLowerCase();
  return DOCKER_HUB_ALIASES.has(lower) ? DEFAULT_REGISTRY : lower;
}

/**
 * A reference to a bare registry host.
 */
export class RegistryHostReference implements RegistryReference {
  private readonly host: string;

  constructor(host: string) {
    const normalized = normalizeRegistryHost(host);
    if (!REGISTRY_HOST_PATTERN.test(normalized)) {
      throw RegistryAuthError.invalidReference(host, 'invalid registry host');
    }
    this.host = normalized;
  }

  registryHost(): string {
    return this.host;
  }

  toString(): string {
    return this.host;
  }
}

/**
 * Image reference: registry, repository and tag or digest.
 */
export class ImageReference implements RegistryReference {
  readonly registry: string;
  readonly repository: string;
  readonly reference: TagOrDigest;

  constructor(registry: string, repository: string, reference: TagOrDigest) {
    this.registry = normalizeRegistryHost(registry);
    this.repository = repository;
    this.reference = reference;
  }

  registryHost(): string {
    return this.registry;
  }

  /**
   * Formats the reference back to its canonical string form.
   */
  toString(): string {
    const base = `${this.registry}/${this.repository}`;
    return this.reference.type === 'digest'
      ? `${base}@${this.reference.value}`
      : `${base}:${this.reference.value}`;
  }
}

/**
 * Whether the first path component of a reference names a registry.
 */
function isRegistryComponent(component: string): boolean {
  return component.includes('.') || component.includes(':') || component === 'localhost';
}

/**
 * Parses an image reference string.
 *
 * Accepts `[registry/]repository[:tag][@digest]`. Without a registry the
 * reference points at Docker Hub, and single-component repositories get the
 * `library/` namespace. A digest wins over a tag when both are present.
 */
export function parseImageReference(input: string): ImageReference {
  const trimmed = input.trim();
  if (trimmed.length === 0) {
    throw RegistryAuthError.invalidReference(input, 'reference cannot be empty');
  }

  let remainder = trimmed;
  let digest: string | undefined;

  const at = remainder.indexOf('@');
  if (at !== -1) {
    digest = remainder.slice(at + 1);
    remainder = remainder.slice(0, at);
    if (!DIGEST_PATTERN.test(digest)) {
      throw RegistryAuthError.invalidReference(input, `invalid digest "${digest}"`);
    }
  }

  let tag: string | undefined;
  const lastSlash = remainder.lastIndexOf('/');
  const lastColon = remainder.lastIndexOf(':');
  if (lastColon > lastSlash) {
    tag = remainder.slice(lastColon + 1);
    remainder = remainder.slice(0, lastColon);
    if (!TAG_PATTERN.test(tag)) {
      throw RegistryAuthError.invalidReference(input, `invalid tag "${tag}"`);
    }
  }

  const parts = remainder.split('/');
  let registry = DEFAULT_REGISTRY;
  const first = parts[0];
  if (parts.length > 1 && first !== undefined && isRegistryComponent(first)) {
    registry = first;
    parts.shift();
  }

  let repository = parts.join('/');
  if (normalizeRegistryHost(registry) === DEFAULT_REGISTRY && parts.length === 1) {
    repository = `library/${repository}`;
  }

  if (!REGISTRY_HOST_PATTERN.test(normalizeRegistryHost(registry))) {
    throw RegistryAuthError.invalidReference(input, `invalid registry "${registry}"`);
  }
  if (!REPOSITORY_PATTERN.test(repository)) {
    throw RegistryAuthError.invalidReference(input, `invalid repository "${repository}"`);
  }

  const reference: TagOrDigest = digest
    ? { type: 'digest', value: digest }
    : { type: 'tag', value: tag ?? 'latest' };

  return new ImageReference(registry, repository, reference);
}
