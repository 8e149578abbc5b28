#!/usr/bin/env node
/**
 * envcompare CLI
 *
 * Entry point for the `envcompare` command.
 *
 * @module packages/cli/bin/envcompare
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { registerCommands } from '../commands/index.js';
import { suggestCommand } from '../utils/suggest.js';

const program = new Command();

program
  .name('envcompare')
  .description('Compare conda environments with environment files and with each other')
  .version('0.1.0');

registerCommands(program);

// Unknown command: one hint, then the help pointer
program.on('command:*', (operands: string[]) => {
  const typed = operands[0] ?? '';
  const hint = suggestCommand(
    typed,
    program.commands.map((cmd) => cmd.name())
  );

  console.error(chalk.red(`error: unknown command '${typed}'`));
  if (hint !== undefined) {
    console.error(`Did you mean ${chalk.cyan(hint)}?`);
  }
  console.error(`Run ${chalk.cyan('envcompare --help')} for a list of available commands.`);
  process.exit(1);
});

await program.parseAsync();
