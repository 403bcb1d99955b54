/**
 * Type exports for registry authentication.
 * @module types
 */

export type { RegistryReference, TagOrDigest } from './reference.js';

export {
  ImageReference,
  RegistryHostReference,
  parseImageReference,
  normalizeRegistryHost,
  DEFAULT_REGISTRY,
  TAG_PATTERN,
  DIGEST_PATTERN,
  REPOSITORY_PATTERN,
  REGISTRY_HOST_PATTERN,
} from './reference.js';
