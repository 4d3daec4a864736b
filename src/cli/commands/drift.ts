/**
 * drift command - score fixture drift between two snapshots.
 */

import { Command } from 'commander';
import { runDrift } from '../../workflow/drift.js';
import * as output from '../output.js';
import { formatDriftSummary } from '../output/terminal-reporter.js';
import { addConfigOptions, addGateOptions, commandAction, gateExitCode, loadCommandConfig, reportArtifacts } from './shared.js';

export function createDriftCommand(): Command {
  const command = new Command('drift').description(
    'Score drift between baseline and candidate fixture snapshots'
  );
  addConfigOptions(command);
  command
    .option('--baseline <path>', 'Baseline fixture snapshot (overrides drift.baseline)')
    .option('--candidate <path>', 'Candidate fixture snapshot (overrides drift.candidate)');
  addGateOptions(command);

  return command.action(
    commandAction((options) => {
      const config = loadCommandConfig(options);
      const { report, artifacts } = runDrift({ config });

      output.lines(...formatDriftSummary(report));
      reportArtifacts(artifacts.json, artifacts.markdown);
      return gateExitCode(report.hasFailures, config);
    })
  );
}
