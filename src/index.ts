/**
 * manifest-smelter public API
 */

/** @public */
export {
  splitManifests,
  splitDocuments,
  sanitizeDocument,
  stripProvenanceMetadata,
  normalizeDocument,
  createScopeClassifier,
  isClusterScoped,
  ensureGroupDirectory,
  emitManifest,
  getSmelterErrorCode,
  type SplitOptions,
  type NormalizeOptions,
  type ScopeClassifier,
  type SmelterErrorCode,
} from './smelter';

/** @public */
export { loadForgeConfig, parseForgeConfig, selectTargets, type ForgeConfig } from './config/forge-config';

/** @public */
export { createLogger } from './lib/logger';

/** @public */
export type {
  Result,
  ErrorGuidance,
  ResourceIdentity,
  ResourceScope,
  ClusterScopedEntry,
  ProvenanceFilter,
  SplitConfig,
  SplitSummary,
  EmittedFile,
} from './types';
