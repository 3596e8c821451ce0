/**
 * Unit tests for namespace normalization
 */

import { describe, it, expect } from '@jest/globals';
import { parse } from 'yaml';
import { normalizeDocument, projectIdentity } from '@/smelter/normalizer';
import { getSmelterErrorCode } from '@/smelter/errors';
import { createScopeClassifier } from '@/smelter/scope';

const lines = (...parts: string[]): string => `${parts.join('\n')}\n`;

describe('normalizeDocument', () => {
  it('should inject the default namespace into a namespace-scoped resource', () => {
    const text = lines('apiVersion: apps/v1', 'kind: Deployment', 'metadata:', '  name: web', 'spec:', '  replicas: 2');

    const result = normalizeDocument(text, { defaultNamespace: 'prod' });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.namespaceInjected).toBe(true);
    expect(result.value.identity).toEqual({
      kind: 'Deployment',
      apiVersion: 'apps/v1',
      name: 'web',
      namespace: 'prod',
    });
    expect(result.value.content).toBe(
      lines(
        'apiVersion: apps/v1',
        'kind: Deployment',
        'metadata:',
        '  name: web',
        '  namespace: prod',
        'spec:',
        '  replicas: 2',
      ),
    );
  });

  it('should produce identical text when run on its own output', () => {
    const text = lines('apiVersion: apps/v1', 'kind: Deployment', 'metadata:', '  name: web', 'spec:', '  replicas: 2');

    const first = normalizeDocument(text, { defaultNamespace: 'prod' });
    expect(first.ok).toBe(true);
    if (!first.ok) return;
    const second = normalizeDocument(first.value.content, { defaultNamespace: 'prod' });

    expect(second.ok).toBe(true);
    if (!second.ok) return;
    expect(second.value.content).toBe(first.value.content);
    expect(second.value.namespaceInjected).toBe(false);
  });

  it('should never overwrite an explicit namespace', () => {
    const text = lines('apiVersion: v1', 'kind: Service', 'metadata:', '  name: api', '  namespace: other');

    const result = normalizeDocument(text, { defaultNamespace: 'prod' });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.namespaceInjected).toBe(false);
    expect(result.value.identity.namespace).toBe('other');
    expect(result.value.content).toBe(text);
  });

  it('should not give a cluster-scoped resource a namespace', () => {
    const text = lines('apiVersion: v1', 'kind: Namespace', 'metadata:', '  name: team');

    const result = normalizeDocument(text, { defaultNamespace: 'prod' });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.namespaceInjected).toBe(false);
    expect(result.value.identity.namespace).toBeUndefined();
    expect(result.value.content).toBe(text);
  });

  it('should pass through a namespace already present on a cluster-scoped resource', () => {
    const text = lines(
      'apiVersion: rbac.authorization.k8s.io/v1',
      'kind: ClusterRole',
      'metadata:',
      '  name: reader',
      '  namespace: stray',
    );

    const result = normalizeDocument(text, { defaultNamespace: 'prod' });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.content).toBe(text);
  });

  it.each([['""'], ['null'], ['~']])('should treat namespace %s as absent', (value) => {
    const text = lines('apiVersion: v1', 'kind: ConfigMap', 'metadata:', '  name: cfg', `  namespace: ${value}`);

    const result = normalizeDocument(text, { defaultNamespace: 'prod' });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.namespaceInjected).toBe(true);
    expect(parse(result.value.content)).toEqual({
      apiVersion: 'v1',
      kind: 'ConfigMap',
      metadata: { name: 'cfg', namespace: 'prod' },
    });
  });

  it('should keep unknown fields, their order and their quoting', () => {
    const text = lines(
      'apiVersion: v1',
      'kind: ConfigMap',
      'metadata:',
      '  name: cfg',
      '  labels:',
      '    app: web',
      'data:',
      '  b: "2"',
      '  a: "1"',
    );

    const result = normalizeDocument(text, { defaultNamespace: 'prod' });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.content).toBe(
      lines(
        'apiVersion: v1',
        'kind: ConfigMap',
        'metadata:',
        '  name: cfg',
        '  labels:',
        '    app: web',
        '  namespace: prod',
        'data:',
        '  b: "2"',
        '  a: "1"',
      ),
    );
    expect(result.value.identity.labels).toEqual({ app: 'web' });
  });

  it('should classify with a supplied classifier', () => {
    const classifier = createScopeClassifier([{ kind: 'Tenant', group: 'example.com' }]);
    const text = lines('apiVersion: example.com/v1', 'kind: Tenant', 'metadata:', '  name: acme');

    const result = normalizeDocument(text, { defaultNamespace: 'prod', classifier });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.namespaceInjected).toBe(false);
    expect(result.value.content).toBe(text);
  });

  it('should strip provenance metadata when asked', () => {
    const text = lines(
      'apiVersion: v1',
      'kind: Service',
      'metadata:',
      '  name: api',
      '  labels:',
      '    app.kubernetes.io/managed-by: Helm',
      '    tier: backend',
      '  annotations:',
      '    note: rendered by helm.sh/chart tooling',
    );

    const result = normalizeDocument(text, { defaultNamespace: 'demo', stripProvenance: true });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.identity.labels).toEqual({ tier: 'backend' });
    expect(result.value.content).toBe(
      lines(
        'apiVersion: v1',
        'kind: Service',
        'metadata:',
        '  name: api',
        '  labels:',
        '    tier: backend',
        '  annotations:',
        '    note: rendered by helm.sh/chart tooling',
        '  namespace: demo',
      ),
    );
  });

  it('should accept a manifest without a name', () => {
    const text = lines('apiVersion: batch/v1', 'kind: Job', 'metadata:', '  generateName: migrate-');

    const result = normalizeDocument(text, { defaultNamespace: 'prod' });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.identity).toEqual({ kind: 'Job', apiVersion: 'batch/v1', name: '', namespace: 'prod' });
    expect(result.value.content).toBe(
      lines('apiVersion: batch/v1', 'kind: Job', 'metadata:', '  generateName: migrate-', '  namespace: prod'),
    );
  });

  it.each([
    ['no metadata', lines('apiVersion: v1', 'kind: List', 'items: []')],
    ['null metadata', lines('apiVersion: v1', 'kind: List', 'metadata:', 'items: []')],
  ])(
    'should create metadata for a manifest with %s',
    (_label, text) => {
      const result = normalizeDocument(text, { defaultNamespace: 'prod' });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.identity.name).toBe('');
      expect(parse(result.value.content)).toEqual({
        apiVersion: 'v1',
        kind: 'List',
        metadata: { namespace: 'prod' },
        items: [],
      });
    },
  );

  it('should drop null and empty label maps when injecting a namespace', () => {
    const text = lines('apiVersion: v1', 'kind: ConfigMap', 'metadata:', '  name: cfg', '  labels: {}', '  annotations:');

    const result = normalizeDocument(text, { defaultNamespace: 'prod' });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.identity.labels).toBeUndefined();
    expect(result.value.content).toBe(lines('apiVersion: v1', 'kind: ConfigMap', 'metadata:', '  name: cfg', '  namespace: prod'));
  });

  it('should fail with PARSE_ERROR when kind is missing', () => {
    const result = normalizeDocument(lines('apiVersion: v1', 'metadata:', '  name: cfg'), {
      defaultNamespace: 'prod',
    });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(getSmelterErrorCode(result)).toBe('PARSE_ERROR');
    expect(result.error).toBe('Invalid manifest identity: kind: Required');
  });

  it('should fail with PARSE_ERROR when the document is not a mapping', () => {
    const result = normalizeDocument('- a\n- b\n', { defaultNamespace: 'prod' });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(getSmelterErrorCode(result)).toBe('PARSE_ERROR');
    expect(result.error).toBe('Manifest is not a mapping');
  });

  it('should fail with PARSE_ERROR on an empty document', () => {
    const result = normalizeDocument('', { defaultNamespace: 'prod' });

    expect(getSmelterErrorCode(result)).toBe('PARSE_ERROR');
  });

  it('should fail with PARSE_ERROR on invalid YAML', () => {
    const result = normalizeDocument('a: b: c\n', { defaultNamespace: 'prod' });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(getSmelterErrorCode(result)).toBe('PARSE_ERROR');
    expect(result.error).toMatch(/^Cannot parse manifest: /);
  });
});

describe('projectIdentity', () => {
  it('should project kind, apiVersion and metadata fields', () => {
    const result = projectIdentity({
      apiVersion: 'v1',
      kind: 'Pod',
      metadata: { name: 'p', namespace: 'ns', labels: { app: 'x' }, uid: 'abc' },
      spec: {},
    });

    expect(result).toEqual({
      ok: true,
      value: { kind: 'Pod', apiVersion: 'v1', name: 'p', namespace: 'ns', labels: { app: 'x' } },
    });
  });

  it('should reject a non-string kind', () => {
    const result = projectIdentity({ apiVersion: 'v1', kind: 5, metadata: { name: 'p' } });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBe('Invalid manifest identity: kind: Expected string, received number');
  });

  it('should project an empty name when the name is missing or empty', () => {
    expect(projectIdentity({ apiVersion: 'v1', kind: 'Pod', metadata: { name: '' } })).toEqual({
      ok: true,
      value: { kind: 'Pod', apiVersion: 'v1', name: '' },
    });
    expect(projectIdentity({ apiVersion: 'v1', kind: 'Pod', metadata: { generateName: 'p-' } })).toEqual({
      ok: true,
      value: { kind: 'Pod', apiVersion: 'v1', name: '' },
    });
  });

  it('should accept a missing metadata block', () => {
    expect(projectIdentity({ apiVersion: 'v1', kind: 'List' })).toEqual({
      ok: true,
      value: { kind: 'List', apiVersion: 'v1', name: '' },
    });
  });

  it('should reject an empty apiVersion', () => {
    const result = projectIdentity({ apiVersion: '', kind: 'Pod' });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBe('Invalid manifest identity: apiVersion: apiVersion must be a non-empty string');
  });
});
