/**
 * CLI Logger
 *
 * Structured diagnostics for the CLI. Logs go to stderr so that stdout
 * carries only command output (and stays valid JSON under --json).
 *
 * Level resolution:
 * - --verbose → debug
 * - ENVCOMPARE_LOG_LEVEL
 * - warn
 *
 * @module packages/cli/utils/logger
 */

import pino from 'pino';
import type { LevelWithSilent, Logger } from 'pino';

export const DEFAULT_LOG_LEVEL: LevelWithSilent = 'warn';

/**
 * Create the CLI logger
 *
 * @param level - Minimum level to emit
 */
export function createLogger(level: LevelWithSilent = DEFAULT_LOG_LEVEL): Logger {
  return pino(
    {
      name: 'envcompare',
      level,
      formatters: {
        level: (label) => ({ level: label }),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination(2)
  );
}

/**
 * Pick the log level from the --verbose flag and the configured level
 */
export function resolveLogLevel(verbose: boolean, configured?: LevelWithSilent): LevelWithSilent {
  if (verbose) return 'debug';
  return configured ?? DEFAULT_LOG_LEVEL;
}
