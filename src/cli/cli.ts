#!/usr/bin/env node
/**
 * manifest-smelter CLI
 * Splits Kubernetes manifest bundles into per-resource files
 */

import { program } from 'commander';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { argv } from 'node:process';
import { z } from 'zod';
import { APP_NAME } from '@/config/constants';
import { createSmeltCommand } from './commands/smelt';
import { createSplitCommand } from './commands/split';
import { handleGenericError } from './error-formatting';

// src/cli and dist/cli both sit two levels below the package root
const packageJson = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(join(__dirname, '../../package.json'), 'utf-8')));

program
  .name(APP_NAME)
  .description('Split Kubernetes manifest bundles into per-resource files with namespaces filled in')
  .version(packageJson.version)
  .addCommand(createSplitCommand())
  .addCommand(createSmeltCommand())
  .addHelpText(
    'after',
    `

Examples:
  $ ${APP_NAME} split -f rendered.yaml -n demo --namespace prod
  $ ${APP_NAME} smelt -c forge.yaml
  $ ${APP_NAME} smelt -c forge.yaml --only demo,infra -o ./out

Environment Variables:
  LOG_LEVEL                    Logging level (trace, debug, info, warn, error, silent)
  SMELTER_OUTPUT_DIR           Output root (default: working)
  SMELTER_PROVENANCE_FILTER    line | structural (default: line)
`,
  );

async function main(): Promise<void> {
  try {
    await program.parseAsync(argv);
  } catch (error) {
    handleGenericError('Unexpected failure', error);
  }
}

void main();
