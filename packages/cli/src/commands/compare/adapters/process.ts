/**
 * Process Helpers
 *
 * Thin wrappers over child_process used by the external tool adapters.
 * Adapters take a RunCommand so tests can substitute a fake.
 *
 * @module packages/cli/commands/compare/adapters/process
 */

import { spawn, spawnSync } from 'child_process';

export interface CommandResult {
  /** Exit status, or null when the process was killed by a signal */
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  cwd?: string;
}

export type RunCommand = (
  command: string,
  args: readonly string[],
  options?: RunOptions
) => Promise<CommandResult>;

/**
 * Run a command to completion and collect its output.
 * Rejects only when the process cannot be started (e.g. ENOENT).
 */
export const runCommand: RunCommand = (command, args, options = {}) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, [...args], {
      cwd: options.cwd,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

    child.once('error', reject);
    child.once('close', (exitCode) => {
      resolve({
        exitCode,
        stdout: Buffer.concat(stdout).toString('utf-8'),
        stderr: Buffer.concat(stderr).toString('utf-8'),
      });
    });
  });

/**
 * Check whether an executable is on PATH
 */
export function commandExists(name: string): boolean {
  const locator = process.platform === 'win32' ? 'where' : 'which';
  const result = spawnSync(locator, [name], { stdio: 'ignore' });
  return result.status === 0;
}

/**
 * True for the error spawn raises when the executable does not exist
 */
export function isMissingExecutable(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
