/**
 * Failure codes raised by the split pipeline
 */

import { Failure, type ErrorGuidance, type Result } from '@/types';

export const SMELTER_ERROR_CODES = [
  'DECODE_ERROR',
  'PARSE_ERROR',
  'IO_ERROR',
  'CONFIG_ERROR',
] as const;

export type SmelterErrorCode = (typeof SMELTER_ERROR_CODES)[number];

export function isSmelterErrorCode(value: unknown): value is SmelterErrorCode {
  return SMELTER_ERROR_CODES.some((code) => code === value);
}

/**
 * Build a failure whose guidance carries the error code in `details.code`
 */
export function smelterFailure<T>(
  code: SmelterErrorCode,
  error: string,
  guidance: Partial<ErrorGuidance> = {},
): Result<T> {
  return Failure(error, {
    ...guidance,
    message: guidance.message ?? error,
    details: { ...guidance.details, code },
  });
}

/**
 * Read the error code back from a failed result
 */
export function getSmelterErrorCode(result: Result<unknown>): SmelterErrorCode | undefined {
  if (result.ok) return undefined;
  const code = result.guidance?.details?.code;
  return isSmelterErrorCode(code) ? code : undefined;
}
