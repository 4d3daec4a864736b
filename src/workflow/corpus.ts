/**
 * `corpus` workflow: expand the catalogues into a deterministic corpus and
 * write it to corpus.json.
 */

import { scenarioToJson } from '../backends/types.js';
import { PATHS } from '../constants.js';
import { getLogger } from '../logging/logger.js';
import type { SkipReason } from '../scenarios/loader.js';
import type { Scenario } from '../scenarios/types.js';
import type { JsonValue } from '../scenarios/values.js';
import { contextClock, writeArtifact, type WorkflowContext } from './context.js';
import { resolveScenarios } from './scenarios.js';

const logger = getLogger('workflow');

export interface CorpusResult {
  readonly scenarios: readonly Scenario[];
  readonly templateCount: number;
  readonly skipped: readonly SkipReason[];
  readonly seed: string;
  readonly artifactPath: string;
}

export function corpusJson(
  generatedAt: Date,
  seed: string,
  templateCount: number,
  scenarios: readonly Scenario[],
  skipped: readonly SkipReason[]
): { [key: string]: JsonValue } {
  return {
    generatedAt: generatedAt.toISOString(),
    seed,
    size: scenarios.length,
    templateCount,
    skipped: skipped.map((skip) => {
      const entry: { [key: string]: JsonValue } = { source: skip.source, index: skip.index, reason: skip.reason };
      if (skip.id !== undefined) {
        entry.id = skip.id;
      }
      return entry;
    }),
    scenarios: scenarios.map(scenarioToJson),
  };
}

export function runCorpus(context: WorkflowContext): CorpusResult {
  const { config } = context;
  const { scenarios, templateCount, skipped } = resolveScenarios(config, true);
  const seed = config.corpus.seed;

  const document = corpusJson(contextClock(context)(), seed, templateCount, scenarios, skipped);
  const artifactPath = writeArtifact(config.output.dir, PATHS.CORPUS_FILE, `${JSON.stringify(document, null, 2)}\n`);

  logger.info({ scenarios: scenarios.length, templates: templateCount, seed, artifactPath }, 'Corpus written');
  return { scenarios, templateCount, skipped, seed, artifactPath };
}
