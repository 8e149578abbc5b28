/**
 * Diff Command - envcompare compare --diff <env1> <env2>
 *
 * Shows the packages present in only one of two environments.
 *
 * @module packages/cli/commands/compare/diff
 */

import ora from 'ora';
import type { Logger } from 'pino';
import {
  OptionsError,
  compareEnvironments,
  type IEnvironmentInventoryLister,
  type ILineDiffer,
} from '@envcompare/core';
import type { RuntimeConfig } from '../../config.js';
import { CondaListLister } from './adapters/CondaListLister.js';
import { GnuDiffer } from './adapters/GnuDiffer.js';
import { formatDiffJson, formatDiffTable } from './formatters.js';
import type { CompareOptions } from './options.js';
import { isInteractive } from './utils.js';

export interface DiffCommandDeps {
  logger: Logger;
  config: RuntimeConfig;
  cwd: string;
  lister?: IEnvironmentInventoryLister;
  differ?: ILineDiffer;
  interactive?: boolean;
}

/**
 * Diff two environments and print the table (or JSON report)
 *
 * @throws CompareError on any fatal condition
 */
export async function diffCommand(options: CompareOptions, deps: DiffCommandDeps): Promise<0> {
  const { logger, config, cwd } = deps;
  if (options.environments === undefined) {
    throw new OptionsError('--diff takes exactly two environment names');
  }
  const [labelA, labelB] = options.environments;

  const lister = deps.lister ?? new CondaListLister({ logger, condaExe: config.condaExe });
  const differ = deps.differ ?? new GnuDiffer({ logger, workingDirectory: cwd });

  // Only show spinner in interactive TTY mode
  const interactive = deps.interactive ?? isInteractive();
  const spinner = interactive && !options.json ? ora().start() : null;

  try {
    const report = await compareEnvironments({
      lister,
      differ,
      labelA,
      labelB,
      onProgress: (message) => {
        logger.debug(message);
        if (spinner) spinner.text = message;
      },
    });
    spinner?.stop();

    console.log(options.json ? formatDiffJson(report) : formatDiffTable(report));
    return 0;
  } catch (error) {
    spinner?.fail('Comparison failed');
    throw error;
  }
}
