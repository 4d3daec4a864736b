/**
 * release command - compatibility, flake, latency and repro-time evidence
 * held against the release gates.
 */

import { Command } from 'commander';
import { runRelease } from '../../workflow/release.js';
import * as output from '../output.js';
import { formatReleaseSummary } from '../output/terminal-reporter.js';
import {
  addConfigOptions,
  addCorpusOptions,
  addGateOptions,
  addProgressOption,
  commandAction,
  createProgress,
  gateExitCode,
  loadCommandConfig,
  parseNonNegativeInteger,
  parsePositiveInteger,
  reportArtifacts,
} from './shared.js';

export function createReleaseCommand(): Command {
  const command = new Command('release').description(
    'Measure release evidence over the corpus and evaluate the release gates'
  );
  addConfigOptions(command);
  addCorpusOptions(command);
  command
    .option('--flake-runs <count>', 'Reruns of the corpus for flake detection (overrides gates.flakeRuns)', parseNonNegativeInteger)
    .option('--repro-samples <count>', 'Replays timed for the repro metric (overrides gates.reproSamples)', parsePositiveInteger)
    .option('--repro-scenario <id>', 'Failing scenario to replay (overrides repro.scenarioId)');
  addGateOptions(command);
  addProgressOption(command);

  return command.action(
    commandAction(async (options) => {
      const config = loadCommandConfig(options);
      const result = await runRelease({ config, progress: createProgress(options.progress) });

      output.lines(...formatReleaseSummary(result));
      reportArtifacts(result.artifacts.json, result.artifacts.markdown);
      return gateExitCode(!result.evidence.gates.overallPassed, config);
    })
  );
}
