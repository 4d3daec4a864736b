/**
 * The paritykit command-line program.
 */

import { Command } from 'commander';
import { createCompareCommand } from './commands/compare.js';
import { createCorpusCommand } from './commands/corpus.js';
import { createDriftCommand } from './commands/drift.js';
import { createReadinessCommand } from './commands/readiness.js';
import { createReleaseCommand } from './commands/release.js';
import { LOG_OVERRIDE_ENV } from './commands/shared.js';
import { configureOutput } from './output.js';
import { configureLogger, isLogLevel } from '../logging/logger.js';
import { VERSION } from '../version.js';
import { EXIT_CODES } from '../constants.js';

const examples = `
Examples:

  Build the deterministic corpus:
    $ paritykit corpus --seed nightly --size 500

  Compare an implementation against the reference:
    $ paritykit compare                       # catalogue templates
    $ paritykit compare --expand              # full corpus

  Produce release evidence and roll it up:
    $ paritykit release --flake-runs 5
    $ paritykit drift --baseline fixtures/v1.yaml --candidate fixtures/v2.yaml
    $ paritykit readiness

Exit codes: 0 success, 1 unexpected failure, 2 invalid input, 3 gate failed
`;

/**
 * Build the paritykit program. Usage errors exit with the invalid-input code.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('paritykit')
    .description('Differential compatibility testing for MongoDB wire-protocol servers')
    .version(VERSION)
    .option('--log-level <level>', 'Log level: debug, info, warn, error, silent')
    .option('--log-file <path>', 'Write logs to file instead of stderr')
    .option('-q, --quiet', 'Only print warnings and errors')
    .hook('preAction', (thisCommand) => {
      const opts = thisCommand.opts();
      const logLevel: unknown = opts.logLevel;
      const logFile: unknown = opts.logFile;

      if (logLevel !== undefined && (typeof logLevel !== 'string' || !isLogLevel(logLevel))) {
        thisCommand.error(`error: invalid log level '${String(logLevel)}'`, { exitCode: EXIT_CODES.INVALID });
      }
      if (logLevel !== undefined || logFile !== undefined) {
        process.env[LOG_OVERRIDE_ENV] = '1';
        configureLogger({
          level: typeof logLevel === 'string' && isLogLevel(logLevel) ? logLevel : undefined,
          file: typeof logFile === 'string' ? logFile : undefined,
        });
      }
      if (opts.quiet === true) {
        configureOutput({ quiet: true });
      }
    })
    .addHelpText('after', examples);

  program.addCommand(createCorpusCommand());
  program.addCommand(createCompareCommand());
  program.addCommand(createReleaseCommand());
  program.addCommand(createReadinessCommand());
  program.addCommand(createDriftCommand());

  program.configureHelp({
    sortSubcommands: false,
    subcommandTerm: (cmd) => cmd.name() + ' ' + cmd.usage(),
  });

  for (const command of [program, ...program.commands]) {
    command.exitOverride((error) => {
      process.exit(error.exitCode === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.INVALID);
    });
  }

  return program;
}
