/**
 * Compare Command
 *
 * Registers `envcompare compare`, which either reconciles an environment
 * against an environment file or, with --diff, lists the packages that
 * differ between two environments.
 *
 * @module packages/cli/commands/compare
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { handleError, shouldUseColor } from './utils.js';

type CompareCommandFlags = {
  name?: string;
  prefix?: string;
  json?: boolean;
  diff?: boolean;
  color?: boolean;
  verbose?: boolean;
};

/**
 * Creates the compare command
 */
export function createCompareCommand(): Command {
  return new Command('compare')
    .description('Compare an environment against an environment file, or diff two environments')
    .argument('[targets...]', 'environment file, or two environment names with --diff')
    .option('-n, --name <env>', 'Name of the environment to check')
    .option('-p, --prefix <path>', 'Full path to the environment to check')
    .option('--diff', 'Show packages that differ between two environments')
    .option('--json', 'Output as JSON')
    .option('--no-color', 'Disable colored output')
    .option('-v, --verbose', 'Log diagnostics to stderr')
    .hook('preAction', (thisCommand) => {
      const opts = thisCommand.opts<CompareCommandFlags>();
      // Disable colors if --no-color flag, NO_COLOR env, TERM=dumb, or non-TTY
      if (opts.color === false || !shouldUseColor()) {
        chalk.level = 0;
      }
    })
    .addHelpText(
      'after',
      `
Examples:
  $ envcompare compare environment.yml               Check the active environment
  $ envcompare compare -n analysis environment.yml   Check the environment named "analysis"
  $ envcompare compare -p ./env requirements.txt     Check the environment at ./env
  $ envcompare compare --json environment.yml        Print the result lines as JSON
  $ envcompare compare --diff analysis reporting     Packages that differ between two environments
`
    )
    .action(async (targets: string[], flags: CompareCommandFlags) => {
      const json = flags.json === true;
      try {
        const [{ parseCompareOptions }, { loadRuntimeConfig }, { createLogger, resolveLogLevel }] =
          await Promise.all([
            import('./options.js'),
            import('../../config.js'),
            import('../../utils/logger.js'),
          ]);

        const options = parseCompareOptions({
          prefix: flags.prefix,
          name: flags.name,
          json,
          diff: flags.diff === true,
          verbose: flags.verbose === true,
          targets,
        });
        const config = loadRuntimeConfig();
        const logger = createLogger(resolveLogLevel(options.verbose, config.logLevel));
        const deps = { logger, config, cwd: process.cwd() };

        if (options.diff) {
          const { diffCommand } = await import('./diff.js');
          process.exitCode = await diffCommand(options, deps);
        } else {
          const { compareCommand } = await import('./compare.js');
          process.exitCode = await compareCommand(options, deps);
        }
      } catch (error) {
        handleError(error, json);
      }
    });
}
