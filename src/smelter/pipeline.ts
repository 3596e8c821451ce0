/**
 * Split Pipeline
 *
 * Reads a bundle and drives Splitter -> Sanitizer -> Normalizer -> Emitter one
 * document at a time, in input order. The first failure ends the run; files
 * written before it stay on disk.
 */

import { promises as fs } from 'node:fs';
import type { Logger } from 'pino';
import { config } from '@/config';
import { extractErrorMessage } from '@/lib/error-utils';
import { createLogger, createTimer } from '@/lib/logger';
import { logStepComplete, logStepFailure, logStepStart } from '@/lib/runtime-logging';
import {
  Success,
  type ClusterScopedEntry,
  type EmittedFile,
  type ProvenanceFilter,
  type Result,
  type SplitConfig,
  type SplitSummary,
} from '@/types';
import { ensureGroupDirectory, emitManifest } from './emitter';
import { smelterFailure } from './errors';
import { normalizeDocument } from './normalizer';
import { sanitizeDocument } from './sanitizer';
import { createScopeClassifier } from './scope';
import { splitDocuments } from './splitter';

const STEP = 'split-manifests';

type FailedResult = Extract<Result<unknown>, { ok: false }>;

export interface SplitOptions {
  /** Root of the output tree; files land in `<outputRoot>/<name>` */
  outputRoot?: string;
  provenanceFilter?: ProvenanceFilter;
  /** Cluster-scoped kinds beyond the built-in table */
  clusterScoped?: readonly ClusterScopedEntry[];
  logger?: Logger;
}

async function readBundle(filename: string): Promise<Result<string>> {
  try {
    return Success(await fs.readFile(filename, 'utf-8'));
  } catch (error) {
    return smelterFailure('IO_ERROR', `Failed to read bundle ${filename}: ${extractErrorMessage(error)}`, {
      hint: 'The manifest bundle could not be read',
      resolution: `Check that the file exists and is readable: ls -la ${filename}`,
      details: { path: filename },
    });
  }
}

/**
 * Split one bundle into per-resource files under `<outputRoot>/<config.name>`
 */
export async function splitManifests(
  splitConfig: SplitConfig,
  options: SplitOptions = {},
): Promise<Result<SplitSummary>> {
  const logger = options.logger ?? createLogger({ name: STEP });
  const outputRoot = options.outputRoot ?? config.outputRoot;
  const provenanceFilter = options.provenanceFilter ?? config.provenanceFilter;
  const classifier = createScopeClassifier(options.clusterScoped);
  const timer = createTimer(logger, STEP);

  logStepStart(
    STEP,
    { group: splitConfig.name, file: splitConfig.filename, namespace: splitConfig.namespace },
    logger,
  );

  const fail = (failure: FailedResult, context: Record<string, unknown> = {}): Result<SplitSummary> => {
    logStepFailure(STEP, failure, logger, { group: splitConfig.name, ...context });
    timer.error(failure.error);
    return failure;
  };

  const content = await readBundle(splitConfig.filename);
  if (!content.ok) return fail(content);

  const documents = splitDocuments(content.value);
  if (!documents.ok) return fail(documents);
  timer.checkpoint('decoded', { documents: documents.value.length });

  const dir = await ensureGroupDirectory(outputRoot, splitConfig.name);
  if (!dir.ok) return fail(dir);

  const files: EmittedFile[] = [];
  for (const [index, document] of documents.value.entries()) {
    const sanitized = sanitizeDocument(document, {
      stripProvenanceLines: provenanceFilter === 'line',
    });

    const normalized = normalizeDocument(sanitized, {
      defaultNamespace: splitConfig.namespace,
      classifier,
      stripProvenance: provenanceFilter === 'structural',
    });
    if (!normalized.ok) return fail(normalized, { document: index + 1 });

    const { identity, content: manifest, namespaceInjected } = normalized.value;
    const written = await emitManifest(dir.value, identity, manifest);
    if (!written.ok) return fail(written, { document: index + 1 });

    logger.debug(
      { kind: identity.kind, name: identity.name, path: written.value, namespaceInjected },
      'Wrote manifest',
    );

    const file: EmittedFile = {
      kind: identity.kind,
      name: identity.name,
      path: written.value,
      namespaceInjected,
    };
    if (identity.namespace) file.namespace = identity.namespace;
    files.push(file);
  }

  const summary: SplitSummary = {
    group: splitConfig.name,
    namespace: splitConfig.namespace,
    outputDir: dir.value,
    documents: documents.value.length,
    files,
  };

  timer.end({ files: files.length });
  logStepComplete(STEP, { group: summary.group, documents: summary.documents, files: files.length }, logger);

  return Success(summary);
}
