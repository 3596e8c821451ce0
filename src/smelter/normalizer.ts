/**
 * Namespace Normalizer
 *
 * Each document is read twice: as a YAML Document, which keeps every field and
 * its order for reserialization, and as a typed identity projection validated
 * with zod. Only the projection is reasoned about; only the Document is written.
 */

import { isMap, isScalar, parseDocument, type Document } from 'yaml';
import { z } from 'zod';
import { Success, type ResourceIdentity, type Result } from '@/types';
import { smelterFailure } from './errors';
import { stripProvenanceMetadata } from './sanitizer';
import { isClusterScoped as isBuiltinClusterScoped, type ScopeClassifier } from './scope';

const resourceIdentitySchema = z.object({
  kind: z.string().min(1, 'kind must be a non-empty string'),
  apiVersion: z.string().min(1, 'apiVersion must be a non-empty string'),
  // A manifest without a name (generateName, List) is written as `<Kind>_.yaml`
  metadata: z
    .object({
      name: z.string().nullish(),
      namespace: z.string().nullish(),
      labels: z.record(z.string(), z.unknown()).nullish(),
      annotations: z.record(z.string(), z.unknown()).nullish(),
    })
    .nullish(),
});

const METADATA_MAPS = ['labels', 'annotations'] as const;

export interface NormalizeOptions {
  /** Namespace injected when a namespace-scoped resource has none */
  defaultNamespace: string;
  /** Defaults to the built-in cluster-scoped table */
  classifier?: Pick<ScopeClassifier, 'isClusterScoped'>;
  /** Remove provenance labels/annotations from the parsed document */
  stripProvenance?: boolean;
}

export interface NormalizedManifest {
  identity: ResourceIdentity;
  content: string;
  namespaceInjected: boolean;
}

/**
 * Project the identity fields out of a parsed document value
 */
export function projectIdentity(value: unknown): Result<ResourceIdentity> {
  const parsed = resourceIdentitySchema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', ');
    return smelterFailure('PARSE_ERROR', `Invalid manifest identity: ${issues}`, {
      hint: 'Every manifest needs non-empty string kind and apiVersion fields',
      resolution: 'Add the missing identity fields to the document',
    });
  }

  const { kind, apiVersion } = parsed.data;
  const metadata = parsed.data.metadata ?? {};
  const identity: ResourceIdentity = { kind, apiVersion, name: metadata.name ?? '' };
  if (metadata.namespace) identity.namespace = metadata.namespace;
  if (metadata.labels) identity.labels = metadata.labels;
  if (metadata.annotations) identity.annotations = metadata.annotations;

  return Success(identity);
}

function parseManifestDocument(text: string): Result<Document> {
  const doc = parseDocument(text);
  const [firstError] = doc.errors;
  if (firstError) {
    return smelterFailure('PARSE_ERROR', `Cannot parse manifest: ${firstError.message}`, {
      hint: 'The document became invalid YAML after sanitizing',
      details: { reason: firstError.code },
    });
  }
  if (!isMap(doc.contents)) {
    return smelterFailure('PARSE_ERROR', 'Manifest is not a mapping', {
      hint: 'A Kubernetes manifest must be a YAML mapping at the top level',
    });
  }
  return Success(doc);
}

/**
 * Set `metadata.namespace`, creating the metadata map when it is missing or null.
 * Null or empty labels/annotations are dropped from the rewritten metadata.
 */
function injectNamespace(doc: Document, identity: ResourceIdentity, namespace: string): void {
  if (!isMap(doc.get('metadata', true))) {
    doc.set('metadata', doc.createNode({}));
  }

  for (const section of METADATA_MAPS) {
    const node = doc.getIn(['metadata', section], true);
    if (node === undefined) continue;
    if (isMap(node) ? node.items.length === 0 : isScalar(node) && node.value === null) {
      doc.deleteIn(['metadata', section]);
      delete identity[section];
    }
  }

  doc.setIn(['metadata', 'namespace'], namespace);
  identity.namespace = namespace;
}

/**
 * Inject the default namespace into a namespace-scoped resource that has none.
 *
 * An explicit namespace is never overwritten, and a cluster-scoped resource is
 * never given one (an existing field passes through untouched).
 */
export function normalizeDocument(
  text: string,
  options: NormalizeOptions,
): Result<NormalizedManifest> {
  const docResult = parseManifestDocument(text);
  if (!docResult.ok) return docResult;
  const doc = docResult.value;

  const identityResult = projectIdentity(doc.toJS());
  if (!identityResult.ok) return identityResult;
  let identity = identityResult.value;

  if (options.stripProvenance && stripProvenanceMetadata(doc) > 0) {
    const refreshed = projectIdentity(doc.toJS());
    if (!refreshed.ok) return refreshed;
    identity = refreshed.value;
  }

  const clusterScoped = options.classifier
    ? options.classifier.isClusterScoped(identity.kind, identity.apiVersion)
    : isBuiltinClusterScoped(identity.kind, identity.apiVersion);

  let namespaceInjected = false;
  if (!clusterScoped && !identity.namespace) {
    injectNamespace(doc, identity, options.defaultNamespace);
    namespaceInjected = true;
  }

  return Success({ identity, content: doc.toString({ lineWidth: 0 }), namespaceInjected });
}
