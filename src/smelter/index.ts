/**
 * Manifest splitting: split, sanitize, normalize namespaces, emit
 */

export { splitDocuments, toCanonicalYaml } from './splitter';
export {
  sanitizeDocument,
  isNoiseLine,
  stripProvenanceMetadata,
  PROVENANCE_KEYS,
  type SanitizeOptions,
} from './sanitizer';
export {
  createScopeClassifier,
  isClusterScoped,
  apiGroupOf,
  BUILTIN_CLUSTER_SCOPED,
  type ScopeClassifier,
} from './scope';
export {
  normalizeDocument,
  projectIdentity,
  type NormalizeOptions,
  type NormalizedManifest,
} from './normalizer';
export { ensureGroupDirectory, emitManifest, manifestFileName } from './emitter';
export { splitManifests, type SplitOptions } from './pipeline';
export {
  smelterFailure,
  getSmelterErrorCode,
  isSmelterErrorCode,
  SMELTER_ERROR_CODES,
  type SmelterErrorCode,
} from './errors';
