/**
 * diff Line Differ
 *
 * Implements ILineDiffer with the system `diff` utility. Both listings are
 * written to fixed file names in the working directory, so two runs must
 * not share a working directory. The files are removed on every exit path.
 *
 * @module packages/cli/commands/compare/adapters/GnuDiffer
 */

import { rm, writeFile } from 'fs/promises';
import * as path from 'path';
import type { Logger } from 'pino';
import {
  ExternalToolError,
  ExternalToolUnavailableError,
  type ILineDiffer,
} from '@envcompare/core';
import {
  commandExists as defaultCommandExists,
  runCommand,
  type CommandResult,
  type RunCommand,
} from './process.js';

export const DEFAULT_DIFF_FILES = ['env1_packages.txt', 'env2_packages.txt'] as const;

export interface GnuDifferConfig {
  logger: Logger;
  workingDirectory: string;
  run?: RunCommand;
  commandExists?: (name: string) => boolean;
  fileNames?: readonly [string, string];
}

export class GnuDiffer implements ILineDiffer {
  private readonly logger: Logger;
  private readonly workingDirectory: string;
  private readonly run: RunCommand;
  private readonly commandExists: (name: string) => boolean;
  private readonly fileNames: readonly [string, string];

  constructor(config: GnuDifferConfig) {
    this.logger = config.logger;
    this.workingDirectory = config.workingDirectory;
    this.run = config.run ?? runCommand;
    this.commandExists = config.commandExists ?? defaultCommandExists;
    this.fileNames = config.fileNames ?? DEFAULT_DIFF_FILES;
  }

  async assertAvailable(): Promise<void> {
    if (!this.commandExists('diff')) {
      throw new ExternalToolUnavailableError('diff');
    }
  }

  async diff(left: readonly string[], right: readonly string[]): Promise<string> {
    const [leftName, rightName] = this.fileNames;
    const leftPath = path.join(this.workingDirectory, leftName);
    const rightPath = path.join(this.workingDirectory, rightName);

    try {
      await writeFile(leftPath, toFileContent(left), 'utf-8');
      await writeFile(rightPath, toFileContent(right), 'utf-8');

      let result: CommandResult;
      try {
        result = await this.run('diff', [leftName, rightName], { cwd: this.workingDirectory });
      } catch (error) {
        throw new ExternalToolError('diff', null, '', error);
      }

      // 0: identical, 1: differences found, anything else: trouble
      if (result.exitCode !== 0 && result.exitCode !== 1) {
        throw new ExternalToolError('diff', result.exitCode, result.stderr);
      }

      this.logger.debug({ exitCode: result.exitCode }, 'diff completed');
      return result.stdout;
    } finally {
      await rm(leftPath, { force: true });
      await rm(rightPath, { force: true });
    }
  }
}

function toFileContent(lines: readonly string[]): string {
  return lines.length > 0 ? `${lines.join('\n')}\n` : '';
}
