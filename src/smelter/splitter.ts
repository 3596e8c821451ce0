/**
 * Document Splitter
 *
 * Decodes a multi-document YAML stream and re-serializes each non-empty document
 * on its own. Separators are handled by the YAML parser, not by scanning text.
 */

import { parseAllDocuments, stringify } from 'yaml';
import { extractErrorMessage } from '@/lib/error-utils';
import { Success, type Result } from '@/types';
import { smelterFailure } from './errors';

/**
 * Serialize a decoded value to the canonical text form used by later stages.
 * Line folding is disabled so a long value never wraps onto a line the
 * sanitizer could mistake for noise. Aliased values are written out in full,
 * never as generated anchors.
 */
export function toCanonicalYaml(value: unknown): string {
  return stringify(value, { lineWidth: 0, aliasDuplicateObjects: false });
}

/**
 * Split a YAML stream into canonical single-document strings, in stream order.
 * Empty (null) documents are dropped. The first invalid document fails the
 * whole split.
 */
export function splitDocuments(content: string): Result<string[]> {
  const documents = parseAllDocuments(content);
  const result: string[] = [];

  let index = 0;
  for (const doc of documents) {
    index++;

    const [firstError] = doc.errors;
    if (firstError) {
      return smelterFailure('DECODE_ERROR', `Invalid YAML in document ${index}: ${firstError.message}`, {
        hint: 'The bundle is not a valid multi-document YAML stream',
        resolution: 'Fix the YAML syntax of the reported document and run the split again',
        details: { document: index, reason: firstError.code },
      });
    }

    let value: unknown;
    try {
      value = doc.toJS();
    } catch (error) {
      return smelterFailure(
        'DECODE_ERROR',
        `Cannot decode document ${index}: ${extractErrorMessage(error)}`,
        {
          hint: 'The document parsed but could not be converted to data (e.g. an unresolved alias)',
          details: { document: index },
        },
      );
    }

    if (value === null || value === undefined) {
      continue;
    }

    result.push(toCanonicalYaml(value));
  }

  return Success(result);
}
