/**
 * `readiness` workflow: roll gate artifacts from earlier runs up into one
 * release-readiness verdict.
 */

import { join } from 'path';
import { PATHS } from '../constants.js';
import { renderReadinessJson, renderReadinessMarkdown } from '../docs/readiness.js';
import { ReadinessAggregator, type ReadinessGateSpec, type ReadinessRun } from '../gates/readiness.js';
import { getLogger } from '../logging/logger.js';
import { contextClock, writeArtifactPair, type ArtifactPaths, type WorkflowContext } from './context.js';

const logger = getLogger('workflow');

export interface ReadinessResult {
  readonly run: ReadinessRun;
  readonly artifacts: ArtifactPaths;
}

/**
 * Gates over the artifacts paritykit itself writes to `outputDir`.
 */
export function defaultReadinessGates(outputDir: string): ReadinessGateSpec[] {
  return [
    { id: 'differential', kind: 'differential-summary', artifact: join(outputDir, PATHS.DIFFERENTIAL_JSON) },
    { id: 'release-gates', kind: 'overall-status', artifact: join(outputDir, PATHS.RELEASE_JSON) },
    { id: 'fixture-drift', kind: 'overall-status', artifact: join(outputDir, PATHS.DRIFT_JSON) },
  ];
}

export function runReadiness(context: WorkflowContext): ReadinessResult {
  const { config } = context;
  const gates = config.readiness.gates.length > 0 ? config.readiness.gates : defaultReadinessGates(config.output.dir);

  const run = new ReadinessAggregator(contextClock(context)).run(gates);
  const artifacts = writeArtifactPair(
    config.output.dir,
    { json: PATHS.READINESS_JSON, markdown: PATHS.READINESS_MARKDOWN },
    {
      json: renderReadinessJson(run, { validate: config.output.validateArtifacts }),
      markdown: renderReadinessMarkdown(run),
    }
  );

  logger.info(
    { overallPassed: run.overallPassed, pass: run.passCount, fail: run.failCount, missing: run.missingCount },
    'Readiness evaluated'
  );
  return { run, artifacts };
}
