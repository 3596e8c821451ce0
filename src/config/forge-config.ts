/**
 * Forge configuration: the list of bundles one `smelt` run splits.
 *
 * @example
 * ```yaml
 * outputRoot: working
 * provenanceFilter: line
 * clusterScoped:
 *   - kind: ClusterIssuer
 *     group: cert-manager.io
 * targets:
 *   - name: demo
 *     filename: bundles/demo.yaml
 *     namespace: prod
 * ```
 */

import fs from 'node:fs';
import path from 'node:path';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { extractErrorMessage } from '@/lib/error-utils';
import { DNS_LABEL_PATTERN } from '@/lib/validation';
import { smelterFailure } from '@/smelter/errors';
import {
  Success,
  type ClusterScopedEntry,
  type ProvenanceFilter,
  type Result,
  type SplitConfig,
} from '@/types';

const dnsLabel = z
  .string()
  .max(63)
  .regex(DNS_LABEL_PATTERN, 'must be lowercase alphanumeric with hyphens');

const TargetSchema = z.object({
  name: dnsLabel,
  filename: z.string().min(1),
  namespace: dnsLabel.optional(),
});

const ForgeConfigSchema = z.object({
  outputRoot: z.string().min(1).optional(),
  provenanceFilter: z.enum(['line', 'structural']).optional(),
  clusterScoped: z
    .array(z.object({ kind: z.string().min(1), group: z.string().default('') }))
    .default([]),
  targets: z.array(TargetSchema).min(1, 'at least one target is required'),
});

export interface ForgeConfig {
  outputRoot?: string;
  provenanceFilter?: ProvenanceFilter;
  clusterScoped: ClusterScopedEntry[];
  targets: SplitConfig[];
}

/**
 * Validate a forge configuration document.
 * Target namespaces default to the target name; relative filenames resolve
 * against `baseDir`.
 */
export function parseForgeConfig(content: string, baseDir = process.cwd()): Result<ForgeConfig> {
  let raw: unknown;
  try {
    raw = yaml.load(content);
  } catch (error) {
    return smelterFailure('CONFIG_ERROR', `Invalid forge configuration YAML: ${extractErrorMessage(error)}`, {
      hint: 'The configuration file is not valid YAML',
    });
  }

  const parsed = ForgeConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', ');
    return smelterFailure('CONFIG_ERROR', `Forge configuration validation failed: ${issues}`, {
      hint: 'Each target needs a name and a filename',
      resolution: 'Names and namespaces must be DNS-1123 labels, e.g. "demo" or "kube-system"',
    });
  }

  const names = new Set<string>();
  for (const target of parsed.data.targets) {
    if (names.has(target.name)) {
      return smelterFailure('CONFIG_ERROR', `Duplicate target name: ${target.name}`, {
        hint: 'Targets sharing a name would write into the same output directory',
        details: { name: target.name },
      });
    }
    names.add(target.name);
  }

  const { outputRoot, provenanceFilter, clusterScoped, targets } = parsed.data;
  const forgeConfig: ForgeConfig = {
    clusterScoped,
    targets: targets.map((target) => ({
      name: target.name,
      filename: path.resolve(baseDir, target.filename),
      namespace: target.namespace ?? target.name,
    })),
  };
  if (outputRoot !== undefined) forgeConfig.outputRoot = outputRoot;
  if (provenanceFilter !== undefined) forgeConfig.provenanceFilter = provenanceFilter;

  return Success(forgeConfig);
}

/**
 * Load a forge configuration file
 */
export function loadForgeConfig(filePath: string): Result<ForgeConfig> {
  if (!fs.existsSync(filePath)) {
    return smelterFailure('CONFIG_ERROR', `Forge configuration not found: ${filePath}`, {
      resolution: 'Pass an existing file with --config',
      details: { path: filePath },
    });
  }

  try {
    const content = fs.readFileSync(filePath, 'utf-8');
    return parseForgeConfig(content, path.dirname(path.resolve(filePath)));
  } catch (error) {
    return smelterFailure('CONFIG_ERROR', `Failed to load forge configuration: ${extractErrorMessage(error)}`, {
      details: { path: filePath },
    });
  }
}

/**
 * Keep only the named targets. Unknown names are a configuration error.
 */
export function selectTargets(forgeConfig: ForgeConfig, only: readonly string[]): Result<SplitConfig[]> {
  if (only.length === 0) return Success(forgeConfig.targets);

  const known = new Set(forgeConfig.targets.map((target) => target.name));
  const unknown = only.filter((name) => !known.has(name));
  if (unknown.length > 0) {
    return smelterFailure('CONFIG_ERROR', `Unknown target(s): ${unknown.join(', ')}`, {
      hint: `Available targets: ${[...known].join(', ')}`,
    });
  }

  return Success(forgeConfig.targets.filter((target) => only.includes(target.name)));
}
