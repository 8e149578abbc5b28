/**
 * Path Expansion
 *
 * @module packages/cli/utils/paths
 */

import * as path from 'path';

/**
 * Expand $VAR / ${VAR} references and a leading "~".
 * Unset variables are left as written.
 *
 * @example
 * expandPath('~/envs/$PROJECT', { PROJECT: 'demo' }, '/home/dev')  // '/home/dev/envs/demo'
 */
export function expandPath(
  input: string,
  env: Readonly<Record<string, string | undefined>>,
  homeDir: string
): string {
  const expanded = input.replace(
    /\$(?:\{([A-Za-z_][A-Za-z0-9_]*)\}|([A-Za-z_][A-Za-z0-9_]*))/g,
    (match: string, braced: string | undefined, bare: string | undefined) => {
      const value = env[braced ?? bare ?? ''];
      return value === undefined ? match : value;
    }
  );

  if (expanded === '~') {
    return homeDir;
  }
  if (expanded.startsWith('~/') || expanded.startsWith('~\\')) {
    return path.join(homeDir, expanded.slice(2));
  }
  return expanded;
}

/**
 * Expand and resolve a user-supplied path against a working directory
 */
export function resolveUserPath(
  input: string,
  cwd: string,
  env: Readonly<Record<string, string | undefined>>,
  homeDir: string
): string {
  return path.resolve(cwd, expandPath(input, env, homeDir));
}
