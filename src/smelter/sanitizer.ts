/**
 * Line Sanitizer
 *
 * Chart renderers leave separators, comments and provenance labels in their
 * output. These are removed before a document is written on its own.
 */

import { isMap, type Document } from 'yaml';

/** Metadata keys added by chart tooling */
export const PROVENANCE_KEYS = ['helm.sh/chart', 'app.kubernetes.io/managed-by'] as const;

const DOCUMENT_SEPARATOR = '---';

export interface SanitizeOptions {
  /**
   * Drop lines mentioning a provenance key. Disable when provenance metadata is
   * removed structurally with {@link stripProvenanceMetadata}.
   * @default true
   */
  stripProvenanceLines?: boolean;
}

/**
 * Whether a line is noise: a separator, a comment, or (optionally) provenance metadata.
 *
 * This is a textual heuristic. A value that merely contains `---` or a
 * provenance key on its line is dropped too.
 */
export function isNoiseLine(line: string, options: SanitizeOptions = {}): boolean {
  const { stripProvenanceLines = true } = options;

  if (line.includes(DOCUMENT_SEPARATOR)) return true;
  if (line.trimStart().startsWith('#')) return true;
  if (stripProvenanceLines && PROVENANCE_KEYS.some((key) => line.includes(key))) return true;

  return false;
}

/**
 * Remove noise lines from one document's text.
 * Kept lines are preserved verbatim, each followed by a newline.
 */
export function sanitizeDocument(text: string, options: SanitizeOptions = {}): string {
  const lines = text.split('\n');
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }

  let output = '';
  for (const rawLine of lines) {
    const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;
    if (isNoiseLine(line, options)) continue;
    output += `${line}\n`;
  }
  return output;
}

/**
 * Delete provenance keys from `metadata.labels` and `metadata.annotations`.
 * A map left empty by the deletion is removed as well.
 *
 * @returns the number of keys removed
 */
export function stripProvenanceMetadata(doc: Document): number {
  let removed = 0;

  for (const section of ['labels', 'annotations'] as const) {
    const path = ['metadata', section];
    const map = doc.getIn(path, true);
    if (!isMap(map)) continue;

    let removedHere = 0;
    for (const key of PROVENANCE_KEYS) {
      if (map.delete(key)) removedHere++;
    }
    removed += removedHere;

    if (removedHere > 0 && map.items.length === 0) {
      doc.deleteIn(path);
    }
  }

  return removed;
}
