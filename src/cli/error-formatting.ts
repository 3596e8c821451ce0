/**
 * Centralized error formatting for CLI commands
 * Ensures consistent error messages and exit behavior
 */

import type { Result } from '@/types/core';

/**
 * Standard error formatting for CLI commands
 */
export function formatError(message: string, error?: unknown): string {
  const baseMessage = `❌ ${message}`;

  if (!error) {
    return baseMessage;
  }

  if (typeof error === 'string') {
    return `${baseMessage}: ${error}`;
  }

  if (error instanceof Error) {
    return `${baseMessage}: ${error.message}`;
  }

  return `${baseMessage}: ${String(error)}`;
}

/**
 * Lines printed for a failed result: the error, then hint and resolution when present
 */
export function formatResultError(result: Result<unknown>, message: string): string[] {
  if (result.ok) return [];

  const lines = [formatError(message, result.error)];
  if (result.guidance?.hint) lines.push(`  Hint: ${result.guidance.hint}`);
  if (result.guidance?.resolution) lines.push(`  Resolution: ${result.guidance.resolution}`);
  return lines;
}

/**
 * Handle Result errors consistently across CLI commands
 */
export function handleResultError<T>(result: Result<T>, message: string): never {
  if (result.ok) {
    throw new Error('Called handleResultError on successful result');
  }

  formatResultError(result, message).forEach((line) => console.error(line));
  process.exit(1);
}

/**
 * Report option validation errors and exit
 */
export function handleValidationErrors(errors: string[]): never {
  console.error('❌ Invalid options:');
  errors.forEach((error) => console.error(`  • ${error}`));
  console.error('\nUse --help for usage information');
  process.exit(1);
}

/**
 * Handle generic errors consistently across CLI commands
 */
export function handleGenericError(message: string, error?: unknown): never {
  console.error(formatError(message, error));
  process.exit(1);
}
