/**
 * Compare Command - envcompare compare <file>
 *
 * Reconciles the packages installed in an environment against an
 * environment file and prints one line per missing or mismatched entry,
 * or the success line.
 *
 * @module packages/cli/commands/compare/compare
 */

import type { Logger } from 'pino';
import {
  EnvironmentLocationNotFoundError,
  OptionsError,
  buildInventory,
  reconcile,
  specificationEntries,
  type IInventoryProvider,
  type ISpecificationProvider,
  type OutcomeCode,
} from '@envcompare/core';
import type { RuntimeConfig } from '../../config.js';
import { EnvironmentFileSource } from './adapters/EnvironmentFileSource.js';
import { PrefixInventoryReader, isCondaEnvironment } from './adapters/PrefixInventoryReader.js';
import { resolveTargetPrefix } from './adapters/TargetPrefix.js';
import { formatComparisonOutput } from './formatters.js';
import type { CompareOptions } from './options.js';

export interface CompareCommandDeps {
  logger: Logger;
  config: RuntimeConfig;
  cwd: string;
  inventory?: IInventoryProvider;
  specifications?: ISpecificationProvider;
  isEnvironment?: (prefix: string) => Promise<boolean>;
}

/**
 * Run a reconciliation and print its result
 *
 * @returns 0 when every entry matched, 1 otherwise
 * @throws CompareError on any fatal condition
 */
export async function compareCommand(
  options: CompareOptions,
  deps: CompareCommandDeps
): Promise<OutcomeCode> {
  const { logger, config, cwd } = deps;
  if (options.file === undefined) {
    throw new OptionsError('An environment file is required');
  }

  const inventory = deps.inventory ?? new PrefixInventoryReader({ logger });
  const specifications =
    deps.specifications ??
    new EnvironmentFileSource({ logger, cwd, env: config.env, homeDir: config.homeDir });

  // An explicit or active environment is resolved before the file is read
  const selected =
    options.prefix !== undefined || options.name !== undefined || config.activePrefix !== undefined;
  let prefix = selected
    ? await resolveTargetPrefix({ prefix: options.prefix, name: options.name }, config, cwd)
    : undefined;
  const isEnvironment = deps.isEnvironment ?? isCondaEnvironment;
  if (prefix !== undefined && !(await isEnvironment(prefix))) {
    throw new EnvironmentLocationNotFoundError(prefix);
  }

  const spec = await specifications.load(options.file, { name: options.name });
  prefix ??= await resolveTargetPrefix({ fileName: spec.name }, config, cwd);
  logger.debug({ prefix, source: spec.source }, 'Comparing environment');

  const { inventory: installed, duplicates } = buildInventory(await inventory.list(prefix));
  if (duplicates.length > 0) {
    logger.warn({ prefix, duplicates }, 'Duplicate package names in inventory; the last record wins');
  }

  const result = reconcile(installed, specificationEntries(spec));
  console.log(formatComparisonOutput(result, options.json));
  return result.exitCode;
}
