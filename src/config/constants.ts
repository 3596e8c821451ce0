/**
 * Application constants and defaults
 */

import type { ProvenanceFilter } from '@/types';

export const APP_NAME = 'manifest-smelter';

export const DEFAULT_OUTPUT_ROOT = 'working';

export const PROVENANCE_FILTERS: readonly ProvenanceFilter[] = ['line', 'structural'];

export const DEFAULT_PROVENANCE_FILTER: ProvenanceFilter = 'line';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function toProvenanceFilter(value: string | undefined): ProvenanceFilter | undefined {
  return PROVENANCE_FILTERS.find((filter) => filter === value);
}
