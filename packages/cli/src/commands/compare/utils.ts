/**
 * Compare CLI Utilities
 *
 * @module packages/cli/commands/compare/utils
 */

import chalk from 'chalk';
import { getErrorCode, isCompareError } from '@envcompare/core';

// =============================================================================
// TTY Detection & Color Control
// =============================================================================

/**
 * Determines if colors should be used in output
 *
 * - NO_COLOR env var set → no color
 * - TERM=dumb → no color
 * - stdout is not a TTY → no color
 */
export function shouldUseColor(
  env: Readonly<Record<string, string | undefined>> = process.env,
  isTTY: boolean = process.stdout.isTTY === true
): boolean {
  if (env.NO_COLOR !== undefined) return false;
  if (env.TERM === 'dumb') return false;
  return isTTY;
}

/**
 * Whether spinners may be shown
 */
export function isInteractive(): boolean {
  return process.stdout.isTTY === true;
}

// =============================================================================
// Error Handling
// =============================================================================

export const ExitCodes = {
  SUCCESS: 0,
  FAILURE: 1,
} as const;

/**
 * Format an error for the terminal
 */
export function formatError(error: unknown): string {
  if (isCompareError(error)) {
    return error.toDisplayString();
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Report a fatal error and exit with status 1
 *
 * @param error - Error to handle
 * @param json - Whether to output as JSON
 */
export function handleError(error: unknown, json: boolean = false): never {
  if (json) {
    console.log(
      JSON.stringify(
        {
          success: false,
          error: {
            message: error instanceof Error ? error.message : String(error),
            code: getErrorCode(error),
          },
        },
        null,
        2
      )
    );
  } else {
    console.error(chalk.red(`Error: ${formatError(error)}`));
  }

  process.exit(ExitCodes.FAILURE);
}
