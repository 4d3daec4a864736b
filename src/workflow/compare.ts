/**
 * `compare` workflow: one differential run, gated, with its report written
 * as JSON and Markdown.
 */

import { PATHS } from '../constants.js';
import { summarizeReport, type DifferentialReport } from '../diff/types.js';
import { renderDifferentialJson, renderDifferentialMarkdown, type DifferentialArtifact } from '../docs/differential.js';
import { evaluateDifferentialGate, type DifferentialGateResult } from '../gates/differential.js';
import { DifferentialHarness } from '../harness/harness.js';
import { getLogger } from '../logging/logger.js';
import type { SkipReason } from '../scenarios/loader.js';
import { topRegressions, type RegressionSample } from '../summary/regressions.js';
import { configuredBackends } from './backends.js';
import {
  contextClock,
  createDiffEngine,
  writeArtifactPair,
  type ArtifactPaths,
  type WorkflowContext,
} from './context.js';
import { resolveScenarios } from './scenarios.js';

const logger = getLogger('workflow');

export interface CompareOptions {
  /** Build the corpus instead of running the catalogue as-is (default: `corpus.expand`) */
  expand?: boolean;
}

export interface CompareResult {
  readonly report: DifferentialReport;
  readonly gate: DifferentialGateResult;
  readonly regressions: readonly RegressionSample[];
  readonly skipped: readonly SkipReason[];
  readonly seed?: string;
  readonly artifacts: ArtifactPaths;
}

export async function runCompare(context: WorkflowContext, options: CompareOptions = {}): Promise<CompareResult> {
  const { config, progress } = context;
  const backends = context.backends ?? configuredBackends(config);
  const left = backends('left');
  const right = backends('right');
  const { scenarios, skipped, seed } = resolveScenarios(config, options.expand ?? config.corpus.expand);

  const harness = new DifferentialHarness(left, right, {
    engine: createDiffEngine(config),
    clock: contextClock(context),
  });

  progress?.begin({
    title: 'compare',
    leftBackend: left.name,
    rightBackend: right.name,
    scenarioCount: scenarios.length,
    seed,
    executions: scenarios.length,
  });
  let report: DifferentialReport;
  try {
    report = await harness.run(scenarios, progress?.phase('Comparing'));
  } finally {
    progress?.end();
  }

  const gate = evaluateDifferentialGate(report, {
    maxMismatch: config.gates.maxMismatch,
    maxError: config.gates.maxError,
    minPassRate: config.gates.minPassRate,
  });
  const regressions = topRegressions(report, config.gates.topRegressions);
  const artifact: DifferentialArtifact = { report, seed, gate, regressions };

  const artifacts = writeArtifactPair(
    config.output.dir,
    { json: PATHS.DIFFERENTIAL_JSON, markdown: PATHS.DIFFERENTIAL_MARKDOWN },
    {
      json: renderDifferentialJson(artifact, { validate: config.output.validateArtifacts }),
      markdown: renderDifferentialMarkdown(artifact),
    }
  );

  logger.info({ ...summarizeReport(report), gate: gate.status }, 'Differential run complete');
  return { report, gate, regressions, skipped, seed, artifacts };
}
