/**
 * CLI Commands Registry
 *
 * Registers all commands with the main program.
 *
 * @module packages/cli/commands
 */

import type { Command } from 'commander';
import { createCompareCommand } from './compare/index.js';

/**
 * Registers all commands with the program
 *
 * @param program - Commander program instance
 */
export function registerCommands(program: Command): void {
  program.addCommand(createCompareCommand());
}

export { createCompareCommand };
