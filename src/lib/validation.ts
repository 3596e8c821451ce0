/**
 * Input validation for split targets.
 * Group names become directory names and namespaces are injected into manifests,
 * so both are held to Kubernetes DNS-1123 label rules.
 */

import { statSync } from 'node:fs';
import path from 'node:path';

import { Failure, Success, type Result } from '@/types';

/** Lowercase alphanumerics and hyphens, starting and ending alphanumeric */
export const DNS_LABEL_PATTERN = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/;

const MAX_LABEL_LENGTH = 63;

function validateDnsLabel(value: string, what: 'Namespace' | 'Group name'): Result<string> {
  if (!value?.trim()) {
    return Failure(`${what} cannot be empty`, {
      message: `${what} cannot be empty`,
      hint: `${what}s must contain at least one character`,
      resolution: 'Provide a value using lowercase letters, numbers, and hyphens',
    });
  }

  if (value.length > MAX_LABEL_LENGTH) {
    return Failure(`${what} too long (max ${MAX_LABEL_LENGTH} characters)`, {
      message: `${what} exceeds maximum length`,
      hint: `${what}s cannot exceed ${MAX_LABEL_LENGTH} characters`,
      details: { length: value.length, maxLength: MAX_LABEL_LENGTH },
    });
  }

  if (!DNS_LABEL_PATTERN.test(value)) {
    return Failure(`Invalid ${what.toLowerCase()}. Must be lowercase alphanumeric with hyphens`, {
      message: `Invalid ${what.toLowerCase()} format`,
      hint: 'Only lowercase letters (a-z), numbers (0-9), and hyphens (-) are allowed',
      resolution: 'Must start and end with an alphanumeric character. Example: "production"',
      details: { provided: value },
    });
  }

  return Success(value);
}

export function validateNamespace(namespace: string): Result<string> {
  return validateDnsLabel(namespace, 'Namespace');
}

export function validateGroupName(name: string): Result<string> {
  return validateDnsLabel(name, 'Group name');
}

/**
 * Resolve a bundle path and check that it names a regular file
 */
export function validateBundlePath(bundlePath: string): Result<string> {
  const absolutePath = path.resolve(bundlePath);

  try {
    if (!statSync(absolutePath).isFile()) {
      return Failure(`Bundle path is not a file: ${absolutePath}`, {
        message: `Bundle path is not a file: ${absolutePath}`,
        hint: 'The path exists but is a directory',
        resolution: 'Point --file at a multi-document YAML file',
      });
    }
  } catch {
    return Failure(`Bundle file not found: ${absolutePath}`, {
      message: `Bundle file not found: ${absolutePath}`,
      resolution: 'Check the path passed with --file',
    });
  }

  return Success(absolutePath);
}
