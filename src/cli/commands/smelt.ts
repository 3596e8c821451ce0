/**
 * Smelt CLI Command
 *
 * Splits every target listed in a forge configuration file, in file order.
 * The first failing target stops the run.
 */

import { Command, Option } from 'commander';
import { LOG_LEVELS, PROVENANCE_FILTERS, toProvenanceFilter } from '@/config/constants';
import { loadForgeConfig, selectTargets } from '@/config/forge-config';
import { createLogger, type Logger } from '@/lib/logger';
import { splitManifests } from '@/smelter/pipeline';
import { Success, type Result, type SplitSummary } from '@/types';
import { handleResultError, handleValidationErrors } from '../error-formatting';
import { renderSummaries } from '../render';
import { validateSmeltOptions, type SmeltCommandOptions } from '../validation';

export interface SmeltRequest {
  config: string;
  only?: string[];
  /** Overrides the configuration file's outputRoot */
  output?: string;
  /** Overrides the configuration file's provenanceFilter */
  provenanceFilter?: string;
}

export async function runSmelt(request: SmeltRequest, logger: Logger): Promise<Result<SplitSummary[]>> {
  const forgeConfig = loadForgeConfig(request.config);
  if (!forgeConfig.ok) return forgeConfig;

  const targets = selectTargets(forgeConfig.value, request.only ?? []);
  if (!targets.ok) return targets;

  const outputRoot = request.output ?? forgeConfig.value.outputRoot;
  const provenanceFilter =
    toProvenanceFilter(request.provenanceFilter) ?? forgeConfig.value.provenanceFilter;

  logger.info({ targets: targets.value.map((target) => target.name) }, 'Smelting targets');

  const summaries: SplitSummary[] = [];
  for (const target of targets.value) {
    const result = await splitManifests(target, {
      logger: logger.child({ group: target.name }),
      clusterScoped: forgeConfig.value.clusterScoped,
      outputRoot,
      provenanceFilter,
    });
    if (!result.ok) return result;
    summaries.push(result.value);
  }

  return Success(summaries);
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, ...value.split(',').map((s) => s.trim()).filter(Boolean)];
}

export function createSmeltCommand(): Command {
  return new Command('smelt')
    .description('Split every bundle listed in a forge configuration file')
    .requiredOption('-c, --config <path>', 'forge configuration file (YAML)')
    .option('--only <names>', 'only these targets (repeatable or comma-separated)', collect)
    .option('-o, --output <dir>', 'output root (overrides the configuration file)')
    .addOption(
      new Option('--provenance-filter <mode>', 'how chart provenance labels are removed').choices(
        PROVENANCE_FILTERS,
      ),
    )
    .addOption(new Option('--log-level <level>', 'logging level').choices(LOG_LEVELS))
    .option('--json', 'print the summaries as JSON')
    .action(async (options: SmeltCommandOptions & { json?: boolean }) => {
      const validation = validateSmeltOptions(options);
      if (!validation.valid || !options.config) {
        handleValidationErrors(validation.errors);
      }

      const logger = createLogger({ name: 'smelt', level: options.logLevel });
      const request: SmeltRequest = { config: options.config };
      if (options.only !== undefined) request.only = options.only;
      if (options.output !== undefined) request.output = options.output;
      if (options.provenanceFilter !== undefined) request.provenanceFilter = options.provenanceFilter;

      const result = await runSmelt(request, logger);
      if (!result.ok) {
        handleResultError(result, 'Smelt failed');
      }

      renderSummaries(result.value, options.json ? 'json' : 'text');
    });
}
