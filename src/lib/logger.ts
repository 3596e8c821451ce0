/**
 * Logger
 *
 * Pino loggers write to stderr so stdout stays free for command output.
 */

import pino, { type Logger } from 'pino';
import { APP_NAME, config } from '@/config';

export type { Logger };

export interface LoggerOptions {
  name?: string;
  level?: string;
}

/**
 * Create a named logger. Level precedence: option > config (LOG_LEVEL, validated).
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? config.logLevel;

  return pino(
    {
      name: options.name ?? APP_NAME,
      level,
      base: null,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination(2),
  );
}

export interface Timer {
  end(additionalContext?: Record<string, unknown>): void;
  error(error: unknown, additionalContext?: Record<string, unknown>): void;
  checkpoint(label: string, additionalContext?: Record<string, unknown>): number;
}

/**
 * Measure an operation and log its duration when it ends or fails
 */
export function createTimer(logger: Logger, operation: string): Timer {
  const start = Date.now();

  return {
    end(additionalContext = {}) {
      logger.debug({ operation, durationMs: Date.now() - start, ...additionalContext }, `${operation} finished`);
    },
    error(error, additionalContext = {}) {
      logger.error(
        { operation, durationMs: Date.now() - start, error, ...additionalContext },
        `${operation} failed`,
      );
    },
    checkpoint(label, additionalContext = {}) {
      const elapsed = Date.now() - start;
      logger.trace({ operation, label, elapsedMs: elapsed, ...additionalContext }, 'checkpoint');
      return elapsed;
    },
  };
}
