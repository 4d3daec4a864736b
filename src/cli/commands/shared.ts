/**
 * Option parsing, config loading and exit handling shared by every command.
 */

import { InvalidArgumentError, type Command } from 'commander';
import { resolve } from 'path';
import { z } from 'zod';
import { loadConfig } from '../../config/loader.js';
import type { ParityConfig } from '../../config/validator.js';
import { EXIT_CODES, type ExitCode } from '../../constants.js';
import { ValidationError, getErrorMessage, isInputError } from '../../errors/types.js';
import { configureLogger, getLogger } from '../../logging/logger.js';
import type { WorkflowProgress } from '../../workflow/context.js';
import * as output from '../output.js';
import { printErrorHints } from '../utils/error-hints.js';
import { ScenarioProgressBar, formatRunBanner } from '../utils/progress.js';

const logger = getLogger('cli');

/** Set when --log-level or --log-file was given; config logging is then ignored */
export const LOG_OVERRIDE_ENV = 'PARITYKIT_LOG_OVERRIDE';

const commandOptionsSchema = z.object({
  config: z.string().min(1).optional(),
  outputDir: z.string().min(1).optional(),
  seed: z.string().trim().min(1).optional(),
  size: z.number().int().min(1).optional(),
  expand: z.boolean().optional(),
  flakeRuns: z.number().int().min(0).optional(),
  reproSamples: z.number().int().min(1).optional(),
  reproScenario: z.string().min(1).optional(),
  failOnGate: z.boolean().optional(),
  progress: z.boolean().default(true),
  baseline: z.string().min(1).optional(),
  candidate: z.string().min(1).optional(),
});

export type CommandOptions = z.infer<typeof commandOptionsSchema>;

export function parseCommandOptions(raw: unknown): CommandOptions {
  const result = commandOptionsSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `--${issue.path.join('.')}: ${issue.message}`);
    throw new ValidationError(`Invalid options: ${issues.join('; ')}`);
  }
  return result.data;
}

export function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

export function parseNonNegativeInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

// ==================== Option groups ====================

export function addConfigOptions(command: Command): Command {
  return command
    .option('-c, --config <path>', 'Path to config file (default: paritykit.yaml in the working directory)')
    .option('-o, --output-dir <dir>', 'Artifact directory (overrides output.dir)');
}

export function addCorpusOptions(command: Command): Command {
  return command
    .option('--seed <seed>', 'Corpus seed (overrides corpus.seed)')
    .option('--size <count>', 'Corpus size (overrides corpus.size)', parsePositiveInteger);
}

export function addGateOptions(command: Command): Command {
  return command
    .option('--fail-on-gate', 'Exit with code 3 when a gate fails (overrides gates.failOnGate)')
    .option('--no-fail-on-gate', 'Report gate failures without failing the process');
}

export function addProgressOption(command: Command): Command {
  return command.option('--no-progress', 'Do not draw the progress bar');
}

// ==================== Config ====================

/**
 * Apply command-line overrides on top of the loaded configuration. Paths
 * given on the command line resolve against `cwd`.
 */
export function applyOverrides(config: ParityConfig, options: CommandOptions, cwd = process.cwd()): ParityConfig {
  const at = (path: string | undefined, fallback: string | undefined): string | undefined =>
    path === undefined ? fallback : resolve(cwd, path);

  return {
    ...config,
    corpus: {
      ...config.corpus,
      seed: options.seed ?? config.corpus.seed,
      size: options.size ?? config.corpus.size,
      expand: options.expand ?? config.corpus.expand,
    },
    gates: {
      ...config.gates,
      flakeRuns: options.flakeRuns ?? config.gates.flakeRuns,
      reproSamples: options.reproSamples ?? config.gates.reproSamples,
      failOnGate: options.failOnGate ?? config.gates.failOnGate,
    },
    repro: { scenarioId: options.reproScenario ?? config.repro.scenarioId },
    drift: {
      ...config.drift,
      baseline: at(options.baseline, config.drift.baseline),
      candidate: at(options.candidate, config.drift.candidate),
    },
    output: { ...config.output, dir: at(options.outputDir, config.output.dir) ?? config.output.dir },
  };
}

/**
 * Load the configuration for a command and apply its logging settings,
 * unless logging was set on the command line.
 */
export function loadCommandConfig(options: CommandOptions, cwd = process.cwd()): ParityConfig {
  const { config, path } = loadConfig(options.config, cwd);
  const merged = applyOverrides(config, options, cwd);

  if (!process.env[LOG_OVERRIDE_ENV]) {
    configureLogger({ level: merged.logging.level, file: merged.logging.file });
  }
  logger.debug({ path, outputDir: merged.output.dir }, 'Configuration loaded');
  return merged;
}

// ==================== Progress ====================

/**
 * Progress observer that prints the run banner and drives a progress bar.
 */
export function createProgress(enabled: boolean): WorkflowProgress {
  const bar = new ScenarioProgressBar({ enabled });
  return {
    begin(plan) {
      output.info(formatRunBanner(plan));
      output.newline();
      bar.start(plan.executions);
    },
    phase(name) {
      bar.beginPhase(name);
      return bar.listener();
    },
    end() {
      bar.stop();
    },
  };
}

// ==================== Exit handling ====================

export function gateExitCode(gateFailed: boolean, config: ParityConfig): ExitCode {
  return gateFailed && config.gates.failOnGate ? EXIT_CODES.GATE_FAILED : EXIT_CODES.SUCCESS;
}

/**
 * Wrap a command handler: parse its options, print failures and set the
 * process exit code.
 */
export function commandAction(
  handler: (options: CommandOptions) => Promise<ExitCode> | ExitCode
): (rawOptions: unknown) => Promise<void> {
  return async (rawOptions) => {
    try {
      const exitCode = await handler(parseCommandOptions(rawOptions));
      if (exitCode === EXIT_CODES.GATE_FAILED) {
        output.warn(`Gate failed; exiting with code ${exitCode}`);
      }
      process.exitCode = exitCode;
    } catch (error) {
      logger.debug({ error: getErrorMessage(error) }, 'Command failed');
      output.error(`Error: ${getErrorMessage(error)}`);
      printErrorHints(error);
      process.exitCode = isInputError(error) ? EXIT_CODES.INVALID : EXIT_CODES.ERROR;
    }
  };
}

export function reportArtifacts(...paths: string[]): void {
  for (const path of paths) {
    output.success(`Wrote ${path}`);
  }
}
