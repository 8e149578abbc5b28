/**
 * Runtime Configuration
 *
 * Reads the conda-related environment variables the CLI depends on and
 * validates them with zod. Empty values count as unset.
 *
 * | Variable              | Meaning                                       |
 * |-----------------------|-----------------------------------------------|
 * | CONDA_PREFIX          | Prefix of the active environment              |
 * | CONDA_EXE             | conda executable (root prefix is derived)     |
 * | CONDA_ROOT            | Root installation prefix                      |
 * | CONDA_ENVS_PATH       | Extra directories holding named environments  |
 * | ENVCOMPARE_LOG_LEVEL  | Log level when --verbose is not given         |
 *
 * @module packages/cli/config
 */

import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import type { LevelWithSilent } from 'pino';
import { OptionsError } from '@envcompare/core';

// =============================================================================
// Schema
// =============================================================================

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === '' ? undefined : value));

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const RuntimeEnvSchema = z.object({
  CONDA_PREFIX: optionalString,
  CONDA_EXE: optionalString,
  CONDA_ROOT: optionalString,
  CONDA_ENVS_PATH: optionalString,
  ENVCOMPARE_LOG_LEVEL: optionalString.pipe(z.enum(LOG_LEVELS).optional()),
});

// =============================================================================
// Types
// =============================================================================

export interface RuntimeConfig {
  /** Prefix of the currently active environment */
  activePrefix?: string;
  /** conda executable to run */
  condaExe: string;
  /** Root installation prefix, when it can be determined */
  rootPrefix?: string;
  /** Directories searched for named environments, in order */
  envsDirs: string[];
  homeDir: string;
  logLevel?: LevelWithSilent;
  /** Variables used for path expansion */
  env: Readonly<Record<string, string | undefined>>;
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Build the runtime configuration from environment variables
 *
 * @throws OptionsError if a variable has an invalid value
 */
export function loadRuntimeConfig(
  env: Readonly<Record<string, string | undefined>> = process.env,
  homeDir: string = os.homedir()
): RuntimeConfig {
  const result = RuntimeEnvSchema.safeParse(env);
  if (!result.success) {
    throw new OptionsError(
      'Invalid environment configuration',
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const vars = result.data;
  const rootPrefix =
    vars.CONDA_ROOT ?? (vars.CONDA_EXE ? path.dirname(path.dirname(vars.CONDA_EXE)) : undefined);

  const envsDirs: string[] = [];
  if (vars.CONDA_ENVS_PATH) {
    envsDirs.push(...vars.CONDA_ENVS_PATH.split(path.delimiter).filter((dir) => dir !== ''));
  }
  if (rootPrefix) {
    envsDirs.push(path.join(rootPrefix, 'envs'));
  }
  envsDirs.push(path.join(homeDir, '.conda', 'envs'));

  return {
    activePrefix: vars.CONDA_PREFIX,
    condaExe: vars.CONDA_EXE ?? 'conda',
    rootPrefix,
    envsDirs,
    homeDir,
    logLevel: vars.ENVCOMPARE_LOG_LEVEL,
    env,
  };
}
