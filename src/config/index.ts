/**
 * Runtime configuration read from the environment
 */
import { parseEnumEnv, parseStringEnv } from './env-utils';
import {
  DEFAULT_OUTPUT_ROOT,
  DEFAULT_PROVENANCE_FILTER,
  LOG_LEVELS,
  PROVENANCE_FILTERS,
} from './constants';

export * from './constants';

export const config = {
  logLevel: parseEnumEnv('LOG_LEVEL', LOG_LEVELS, 'info'),
  outputRoot: parseStringEnv('SMELTER_OUTPUT_DIR', DEFAULT_OUTPUT_ROOT),
  provenanceFilter: parseEnumEnv(
    'SMELTER_PROVENANCE_FILTER',
    PROVENANCE_FILTERS,
    DEFAULT_PROVENANCE_FILTER,
  ),
} as const;

export type AppConfig = typeof config;
