/**
 * conda list Lister
 *
 * Implements IEnvironmentInventoryLister with `conda list`.
 *
 * @module packages/cli/commands/compare/adapters/CondaListLister
 */

import type { Logger } from 'pino';
import {
  ExternalToolError,
  ExternalToolUnavailableError,
  type IEnvironmentInventoryLister,
} from '@envcompare/core';
import { isMissingExecutable, runCommand, type CommandResult, type RunCommand } from './process.js';

export interface CondaListListerConfig {
  logger: Logger;
  /** conda executable (default "conda") */
  condaExe?: string;
  run?: RunCommand;
}

/**
 * Arguments selecting an environment: paths go to --prefix, names to --name
 */
export function environmentArgs(environment: string): string[] {
  const looksLikePath = /[\\/]/.test(environment) || environment.startsWith('~');
  return looksLikePath ? ['--prefix', environment] : ['--name', environment];
}

export class CondaListLister implements IEnvironmentInventoryLister {
  private readonly logger: Logger;
  private readonly condaExe: string;
  private readonly run: RunCommand;

  constructor(config: CondaListListerConfig) {
    this.logger = config.logger;
    this.condaExe = config.condaExe ?? 'conda';
    this.run = config.run ?? runCommand;
  }

  async list(environment: string): Promise<string[]> {
    const args = ['list', ...environmentArgs(environment)];
    this.logger.debug({ command: this.condaExe, args }, 'Listing environment');

    let result: CommandResult;
    try {
      result = await this.run(this.condaExe, args);
    } catch (error) {
      if (isMissingExecutable(error)) {
        throw new ExternalToolUnavailableError('conda');
      }
      throw new ExternalToolError('conda', null, '', error);
    }

    if (result.exitCode !== 0) {
      throw new ExternalToolError('conda', result.exitCode, result.stderr);
    }

    // header lines ("# packages in environment at ...") are not packages
    return result.stdout
      .split(/\r?\n/)
      .map((line) => line.trimEnd())
      .filter((line) => line !== '' && !line.startsWith('#'));
  }
}
