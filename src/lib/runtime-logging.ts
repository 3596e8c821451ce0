/**
 * Step logging helpers
 *
 * Every pipeline step logs the same "Starting X" / "Completed X" / "Failed X" lines.
 */

import type { Logger } from 'pino';
import type { Result } from '@/types';
import { extractErrorMessage } from './error-utils';

export function logStepStart(step: string, params: Record<string, unknown>, logger: Logger): void {
  logger.info(params, `Starting ${step}`);
}

export function logStepComplete(
  step: string,
  result: Record<string, unknown>,
  logger: Logger,
  durationMs?: number,
): void {
  const context = durationMs === undefined ? result : { ...result, durationMs };
  logger.info(context, `Completed ${step}`);
}

export function logStepFailure(
  step: string,
  failure: Result<unknown> | Error | string,
  logger: Logger,
  context: Record<string, unknown> = {},
): void {
  let error: string;
  let details: Record<string, unknown> | undefined;

  if (typeof failure === 'string') {
    error = failure;
  } else if (failure instanceof Error) {
    error = extractErrorMessage(failure);
  } else if (failure.ok) {
    return;
  } else {
    error = failure.error;
    details = failure.guidance?.details;
  }

  logger.error({ ...context, ...details, error }, `Failed ${step}`);
}
