/**
 * Target Prefix Resolution
 *
 * Decides which environment a reconciliation inspects:
 *
 * 1. --prefix, expanded and resolved against the working directory
 * 2. --name, looked up in the environment directories
 * 3. the active environment (CONDA_PREFIX)
 * 4. the name declared by the environment file
 *
 * @module packages/cli/commands/compare/adapters/TargetPrefix
 */

import { stat } from 'fs/promises';
import * as path from 'path';
import { EnvironmentLocationNotFoundError } from '@envcompare/core';
import type { RuntimeConfig } from '../../../config.js';
import { resolveUserPath } from '../../../utils/paths.js';

/** Names that refer to the root installation */
const ROOT_NAMES = new Set(['base', 'root']);

export interface TargetSelection {
  prefix?: string;
  name?: string;
  /** Environment name declared by the environment file */
  fileName?: string;
}

async function isDirectory(candidate: string): Promise<boolean> {
  try {
    return (await stat(candidate)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Find the prefix of a named environment
 *
 * @throws EnvironmentLocationNotFoundError if no environment directory holds `name`
 */
export async function locateNamedEnvironment(name: string, config: RuntimeConfig): Promise<string> {
  if (ROOT_NAMES.has(name)) {
    if (config.rootPrefix !== undefined) {
      return config.rootPrefix;
    }
    throw new EnvironmentLocationNotFoundError(name, {
      suggestion: 'Set CONDA_ROOT or CONDA_EXE so the root environment can be found.',
    });
  }

  for (const dir of config.envsDirs) {
    const candidate = path.join(dir, name);
    if (await isDirectory(candidate)) {
      return candidate;
    }
  }

  throw new EnvironmentLocationNotFoundError(name, {
    suggestion: `No environment named "${name}" in: ${config.envsDirs.join(', ')}`,
  });
}

/**
 * Resolve the prefix to inspect
 *
 * @throws EnvironmentLocationNotFoundError if nothing identifies an environment
 */
export async function resolveTargetPrefix(
  selection: TargetSelection,
  config: RuntimeConfig,
  cwd: string
): Promise<string> {
  if (selection.prefix !== undefined) {
    return resolveUserPath(selection.prefix, cwd, config.env, config.homeDir);
  }
  if (selection.name !== undefined) {
    return locateNamedEnvironment(selection.name, config);
  }
  if (config.activePrefix !== undefined) {
    return config.activePrefix;
  }
  if (selection.fileName !== undefined) {
    return locateNamedEnvironment(selection.fileName, config);
  }

  throw new EnvironmentLocationNotFoundError('no environment selected', {
    suggestion:
      'Activate an environment, pass -n/--name or -p/--prefix, or give the environment file a name.',
  });
}
