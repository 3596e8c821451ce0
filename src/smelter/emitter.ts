/**
 * File Emitter
 *
 * Writes normalized manifests to `<outputRoot>/<group>/<Kind>_<name>.yaml`.
 * A second document with the same kind and name overwrites the first.
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import { extractErrorMessage } from '@/lib/error-utils';
import { Success, type ResourceIdentity, type Result } from '@/types';
import { smelterFailure } from './errors';

export function manifestFileName(identity: Pick<ResourceIdentity, 'kind' | 'name'>): string {
  return `${identity.kind}_${identity.name}.yaml`;
}

/**
 * Create the group's output directory if it does not exist
 */
export async function ensureGroupDirectory(
  outputRoot: string,
  group: string,
): Promise<Result<string>> {
  const dir = path.join(outputRoot, group);
  try {
    await fs.mkdir(dir, { recursive: true });
    return Success(dir);
  } catch (error) {
    return smelterFailure('IO_ERROR', `Failed to create output directory ${dir}: ${extractErrorMessage(error)}`, {
      hint: 'The output root must be writable',
      resolution: `Check permissions: ls -ld ${outputRoot}`,
      details: { path: dir },
    });
  }
}

/**
 * Write one manifest into a group directory
 * @returns the written file path
 */
export async function emitManifest(
  dir: string,
  identity: Pick<ResourceIdentity, 'kind' | 'name'>,
  content: string,
): Promise<Result<string>> {
  const filePath = path.join(dir, manifestFileName(identity));
  try {
    await fs.writeFile(filePath, content, 'utf-8');
    return Success(filePath);
  } catch (error) {
    return smelterFailure('IO_ERROR', `Failed to write ${filePath}: ${extractErrorMessage(error)}`, {
      hint: 'The manifest could not be written to the output directory',
      details: { path: filePath, kind: identity.kind, name: identity.name },
    });
  }
}
