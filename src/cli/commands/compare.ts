/**
 * compare command - run every scenario against both backends and diff the
 * outcomes.
 */

import { Command } from 'commander';
import { runCompare } from '../../workflow/compare.js';
import * as output from '../output.js';
import { formatCompareSummary, formatSkipped } from '../output/terminal-reporter.js';
import {
  addConfigOptions,
  addCorpusOptions,
  addGateOptions,
  addProgressOption,
  commandAction,
  createProgress,
  gateExitCode,
  loadCommandConfig,
  reportArtifacts,
} from './shared.js';

export function createCompareCommand(): Command {
  const command = new Command('compare').description(
    'Compare the implementation against the reference backend and write the differential report'
  );
  addConfigOptions(command);
  addCorpusOptions(command);
  command.option('--expand', 'Run the expanded corpus instead of the catalogue templates');
  addGateOptions(command);
  addProgressOption(command);

  return command.action(
    commandAction(async (options) => {
      const config = loadCommandConfig(options);
      const result = await runCompare({ config, progress: createProgress(options.progress) });

      for (const skip of result.skipped) {
        output.info(formatSkipped(skip));
      }
      output.lines(...formatCompareSummary(result));
      reportArtifacts(result.artifacts.json, result.artifacts.markdown);
      return gateExitCode(result.gate.status === 'FAIL', config);
    })
  );
}
