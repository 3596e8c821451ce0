/**
 * Scope Classifier
 *
 * Static lookup of cluster-scoped resource kinds. Anything not listed is
 * namespace-scoped. Classification depends only on (kind, apiVersion).
 */

import type { ClusterScopedEntry, ResourceScope } from '@/types';
import builtinEntries from './cluster-scoped-resources.json';

export const BUILTIN_CLUSTER_SCOPED: readonly ClusterScopedEntry[] = builtinEntries;

/**
 * API group of an apiVersion: `rbac.authorization.k8s.io/v1` -> `rbac.authorization.k8s.io`,
 * `v1` -> `` (core group)
 */
export function apiGroupOf(apiVersion: string): string {
  const slash = apiVersion.lastIndexOf('/');
  return slash === -1 ? '' : apiVersion.slice(0, slash);
}

function entryKey(kind: string, group: string): string {
  return `${group}/${kind}`;
}

export interface ScopeClassifier {
  isClusterScoped(kind: string, apiVersion: string): boolean;
  scopeOf(kind: string, apiVersion: string): ResourceScope;
  readonly entries: readonly ClusterScopedEntry[];
}

/**
 * Build a classifier from the built-in table plus any extra entries
 */
export function createScopeClassifier(
  extraEntries: readonly ClusterScopedEntry[] = [],
): ScopeClassifier {
  const entries = [...BUILTIN_CLUSTER_SCOPED, ...extraEntries];
  const keys = new Set(entries.map((entry) => entryKey(entry.kind, entry.group)));

  const isClusterScoped = (kind: string, apiVersion: string): boolean =>
    keys.has(entryKey(kind, apiGroupOf(apiVersion)));

  return {
    entries,
    isClusterScoped,
    scopeOf: (kind, apiVersion) => (isClusterScoped(kind, apiVersion) ? 'Cluster' : 'Namespaced'),
  };
}

const defaultClassifier = createScopeClassifier();

export function isClusterScoped(kind: string, apiVersion: string): boolean {
  return defaultClassifier.isClusterScoped(kind, apiVersion);
}
