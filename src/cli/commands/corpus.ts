/**
 * corpus command - expand scenario catalogues into a deterministic corpus.
 */

import { Command } from 'commander';
import { EXIT_CODES } from '../../constants.js';
import { runCorpus } from '../../workflow/corpus.js';
import * as output from '../output.js';
import { formatCorpusSummary, formatSkipped } from '../output/terminal-reporter.js';
import { addConfigOptions, addCorpusOptions, commandAction, loadCommandConfig, reportArtifacts } from './shared.js';

export function createCorpusCommand(): Command {
  const command = new Command('corpus').description(
    'Expand the scenario catalogues into a seeded corpus and write corpus.json'
  );
  addConfigOptions(command);
  addCorpusOptions(command);

  return command.action(
    commandAction((options) => {
      const config = loadCommandConfig(options);
      const result = runCorpus({ config });

      for (const skip of result.skipped) {
        output.info(formatSkipped(skip));
      }
      output.lines(...formatCorpusSummary(result));
      reportArtifacts(result.artifactPath);
      return EXIT_CODES.SUCCESS;
    })
  );
}
