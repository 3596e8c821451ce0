/**
 * CLI Options Validation Module
 * Checks command options before any file is read or written
 */

import { statSync } from 'node:fs';
import { LOG_LEVELS, PROVENANCE_FILTERS } from '@/config/constants';
import { extractErrorMessage } from '@/lib/error-utils';
import { validateBundlePath, validateGroupName, validateNamespace } from '@/lib/validation';

/**
 * Validation result containing validity status and error messages
 */
export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

export interface CommonOptions {
  logLevel?: string;
  output?: string;
  provenanceFilter?: string;
}

export interface SplitCommandOptions extends CommonOptions {
  file?: string;
  name?: string;
  namespace?: string;
}

export interface SmeltCommandOptions extends CommonOptions {
  config?: string;
  only?: string[];
}

function includes(values: readonly string[], value: string): boolean {
  return values.some((candidate) => candidate === value);
}

function validateLogLevel(logLevel: string | undefined): string[] {
  if (logLevel && !includes(LOG_LEVELS, logLevel)) {
    return [`Invalid log level: ${logLevel}. Valid options: ${LOG_LEVELS.join(', ')}`];
  }
  return [];
}

function validateProvenanceFilter(filter: string | undefined): string[] {
  if (filter && !includes(PROVENANCE_FILTERS, filter)) {
    return [`Invalid provenance filter: ${filter}. Valid options: ${PROVENANCE_FILTERS.join(', ')}`];
  }
  return [];
}

/**
 * An existing output root must be a directory; a missing one is created later
 */
function validateOutputRoot(output: string | undefined): string[] {
  if (!output) return [];

  try {
    if (!statSync(output).isDirectory()) {
      return [`Output path is not a directory: ${output}`];
    }
  } catch (error) {
    const errorMsg = extractErrorMessage(error);
    if (errorMsg.includes('ENOENT')) return [];
    if (errorMsg.includes('EACCES')) return [`Permission denied accessing output directory: ${output}`];
    return [`Cannot access output directory: ${output} (${errorMsg})`];
  }

  return [];
}

function validateCommon(opts: CommonOptions): string[] {
  return [
    ...validateLogLevel(opts.logLevel),
    ...validateProvenanceFilter(opts.provenanceFilter),
    ...validateOutputRoot(opts.output),
  ];
}

export function validateSplitOptions(opts: SplitCommandOptions): ValidationResult {
  const errors = validateCommon(opts);

  if (!opts.file) {
    errors.push('Missing bundle file: pass --file <path>');
  } else {
    const bundle = validateBundlePath(opts.file);
    if (!bundle.ok) errors.push(bundle.error);
  }

  if (!opts.name) {
    errors.push('Missing group name: pass --name <group>');
  } else {
    const name = validateGroupName(opts.name);
    if (!name.ok) errors.push(name.error);
  }

  if (opts.namespace !== undefined) {
    const namespace = validateNamespace(opts.namespace);
    if (!namespace.ok) errors.push(namespace.error);
  }

  return { valid: errors.length === 0, errors };
}

export function validateSmeltOptions(opts: SmeltCommandOptions): ValidationResult {
  const errors = validateCommon(opts);

  if (!opts.config) {
    errors.push('Missing forge configuration: pass --config <path>');
  } else {
    try {
      statSync(opts.config);
    } catch (error) {
      errors.push(`Configuration file not found: ${opts.config} - ${extractErrorMessage(error)}`);
    }
  }

  return { valid: errors.length === 0, errors };
}
