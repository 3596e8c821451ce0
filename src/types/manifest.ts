/**
 * Manifest and split-run types
 */

/**
 * Identity fields projected from one manifest document.
 * Derived on every parse; never stored separately from the document.
 */
export interface ResourceIdentity {
  kind: string;
  apiVersion: string;
  name: string;
  namespace?: string;
  labels?: Record<string, unknown>;
  annotations?: Record<string, unknown>;
}

export type ResourceScope = 'Cluster' | 'Namespaced';

/**
 * A cluster-scoped resource kind within an API group ('' is the core group)
 */
export interface ClusterScopedEntry {
  kind: string;
  group: string;
}

/**
 * How provenance labels injected by chart renderers are removed.
 * - `line`: drop any text line mentioning a provenance key
 * - `structural`: delete the keys from metadata.labels and metadata.annotations
 */
export type ProvenanceFilter = 'line' | 'structural';

/**
 * One bundle to split
 */
export interface SplitConfig {
  /** Group name, used as the output subdirectory */
  name: string;
  /** Path to the multi-document YAML bundle */
  filename: string;
  /** Namespace injected into namespace-scoped resources that have none */
  namespace: string;
}

export interface EmittedFile {
  kind: string;
  name: string;
  namespace?: string;
  path: string;
  namespaceInjected: boolean;
}

export interface SplitSummary {
  group: string;
  namespace: string;
  outputDir: string;
  /** Non-empty documents found in the bundle */
  documents: number;
  /** Files written, in document order (a collision appears twice with the same path) */
  files: EmittedFile[];
}
