/**
 * Split CLI Command
 *
 * Splits one bundle given entirely by flags.
 */

import { Command, Option } from 'commander';
import { LOG_LEVELS, PROVENANCE_FILTERS, toProvenanceFilter } from '@/config/constants';
import { createLogger, type Logger } from '@/lib/logger';
import { splitManifests } from '@/smelter/pipeline';
import type { Result, SplitSummary } from '@/types';
import { handleResultError, handleValidationErrors } from '../error-formatting';
import { renderSummaries } from '../render';
import { validateSplitOptions, type SplitCommandOptions } from '../validation';

export interface SplitRequest {
  file: string;
  name: string;
  /** Defaults to the group name */
  namespace?: string;
  output?: string;
  provenanceFilter?: string;
}

export async function runSplit(request: SplitRequest, logger: Logger): Promise<Result<SplitSummary>> {
  const provenanceFilter = toProvenanceFilter(request.provenanceFilter);

  return splitManifests(
    {
      name: request.name,
      filename: request.file,
      namespace: request.namespace ?? request.name,
    },
    {
      logger,
      outputRoot: request.output,
      provenanceFilter,
    },
  );
}

export function createSplitCommand(): Command {
  return new Command('split')
    .description('Split a multi-document YAML bundle into one file per resource')
    .requiredOption('-f, --file <path>', 'multi-document YAML bundle')
    .requiredOption('-n, --name <group>', 'group name, used as the output subdirectory')
    .option('--namespace <namespace>', 'namespace for resources without one (default: group name)')
    .option('-o, --output <dir>', 'output root (default: $SMELTER_OUTPUT_DIR or ./working)')
    .addOption(
      new Option('--provenance-filter <mode>', 'how chart provenance labels are removed').choices(
        PROVENANCE_FILTERS,
      ),
    )
    .addOption(new Option('--log-level <level>', 'logging level').choices(LOG_LEVELS))
    .option('--json', 'print the summary as JSON')
    .action(async (options: SplitCommandOptions & { json?: boolean }) => {
      const validation = validateSplitOptions(options);
      if (!validation.valid || !options.file || !options.name) {
        handleValidationErrors(validation.errors);
      }

      const logger = createLogger({ name: 'split', level: options.logLevel });
      const request: SplitRequest = { file: options.file, name: options.name };
      if (options.namespace !== undefined) request.namespace = options.namespace;
      if (options.output !== undefined) request.output = options.output;
      if (options.provenanceFilter !== undefined) request.provenanceFilter = options.provenanceFilter;

      const result = await runSplit(request, logger);
      if (!result.ok) {
        handleResultError(result, `Split of ${options.name} failed`);
      }

      renderSummaries([result.value], options.json ? 'json' : 'text');
    });
}
