/**
 * Core type definitions for the manifest smelter.
 * Result types shared by the pipeline, configuration loader and CLI.
 */

// ===== RESULT TYPE SYSTEM =====

/**
 * Structured error information with actionable guidance
 */
export interface ErrorGuidance {
  /** Primary error message */
  message: string;
  /** Actionable hint for the operator (what went wrong in user terms) */
  hint?: string;
  /** Specific resolution steps to fix the issue */
  resolution?: string;
  /** Additional context or details */
  details?: Record<string, unknown>;
}

/**
 * Result type for functional error handling
 *
 * Every stage of the split pipeline reports failure through this union instead of
 * throwing, so the caller decides how a failed run ends.
 *
 * @example
 * ```typescript
 * const result = splitDocuments(content);
 * if (result.ok) {
 *   console.log(result.value.length);
 * } else {
 *   console.error(result.error);
 *   if (result.guidance?.hint) console.error('Hint:', result.guidance.hint);
 * }
 * ```
 */
export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: string; guidance?: ErrorGuidance };

/** Create a success result */
export const Success = <T>(value: T): Result<T> => ({ ok: true, value });

/**
 * Create a failure result with optional guidance
 * @param error - Error message
 * @param guidance - Optional structured guidance for operators
 */
export const Failure = <T>(error: string, guidance?: ErrorGuidance): Result<T> => {
  // Always create a new guidance object to avoid mutating the input parameter
  const resultGuidance = guidance ? { ...guidance, message: guidance.message || error } : undefined;
  return resultGuidance ? { ok: false, error, guidance: resultGuidance } : { ok: false, error };
};
