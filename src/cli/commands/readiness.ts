/**
 * readiness command - roll gate artifacts up into one verdict.
 */

import { Command } from 'commander';
import { runReadiness } from '../../workflow/readiness.js';
import * as output from '../output.js';
import { formatReadinessSummary } from '../output/terminal-reporter.js';
import { addConfigOptions, addGateOptions, commandAction, gateExitCode, loadCommandConfig, reportArtifacts } from './shared.js';

export function createReadinessCommand(): Command {
  const command = new Command('readiness').description(
    'Aggregate gate artifacts into the release readiness report'
  );
  addConfigOptions(command);
  addGateOptions(command);

  return command.action(
    commandAction((options) => {
      const config = loadCommandConfig(options);
      const { run, artifacts } = runReadiness({ config });

      output.lines(...formatReadinessSummary(run));
      reportArtifacts(artifacts.json, artifacts.markdown);
      return gateExitCode(!run.overallPassed, config);
    })
  );
}
