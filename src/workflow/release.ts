/**
 * `release` workflow: gathers the four release metrics over the corpus and
 * evaluates them against the release thresholds.
 *
 * - compatibility pass rate: the baseline differential run
 * - flake rate: `gates.flakeRuns` reruns compared with the baseline
 * - p95 latency: every timed `execute` on the backend under test
 * - repro time p50: `gates.reproSamples` replays of one failing scenario
 *   on fresh backends
 */

import type { ParityConfig } from '../config/validator.js';
import { PATHS } from '../constants.js';
import { FailureSignatureParser } from '../diff/failure-signature.js';
import { summarizeReport, type DifferentialReport } from '../diff/types.js';
import { renderReleaseJson, renderReleaseMarkdown, type ReleaseEvidence } from '../docs/release.js';
import { ConfigError, ReproductionError } from '../errors/types.js';
import { PassRate } from '../gates/pass-rate.js';
import { QualityGateEvaluator } from '../gates/quality.js';
import { DifferentialHarness } from '../harness/harness.js';
import { getLogger, startTiming } from '../logging/logger.js';
import type { Scenario } from '../scenarios/types.js';
import { FlakeRateEvaluator, type FlakeRun } from '../stability/flake.js';
import { percentile } from '../stability/percentile.js';
import { ReproTimer, type ReproSummary } from '../stability/repro.js';
import { topRegressions } from '../summary/regressions.js';
import { TimedBackend, configuredBackends, type BackendProvider } from './backends.js';
import {
  contextClock,
  contextNow,
  createDiffEngine,
  writeArtifactPair,
  type ArtifactPaths,
  type WorkflowContext,
} from './context.js';
import { resolveScenarios } from './scenarios.js';

const logger = getLogger('workflow');

const P95 = 0.95;

export interface ReleaseResult {
  readonly evidence: ReleaseEvidence;
  readonly baseline: DifferentialReport;
  readonly artifacts: ArtifactPaths;
}

type ReproOutcome =
  | { readonly measured: true; readonly scenarioId: string; readonly summary: ReproSummary }
  | { readonly measured: false; readonly diagnostic?: string };

export async function runRelease(context: WorkflowContext): Promise<ReleaseResult> {
  const { config, progress } = context;
  const now = contextNow(context);
  const clock = contextClock(context);
  const endTiming = startTiming(logger, 'release', now);

  const backends = context.backends ?? configuredBackends(config);
  const left = new TimedBackend(backends('left'), now);
  const right = backends('right');
  const { scenarios, seed } = resolveScenarios(config, true);
  const corpusSeed = seed ?? config.corpus.seed;
  const flakeRuns = config.gates.flakeRuns;

  const harness = new DifferentialHarness(left, right, { engine: createDiffEngine(config), clock });

  progress?.begin({
    title: 'release',
    leftBackend: left.name,
    rightBackend: right.name,
    scenarioCount: scenarios.length,
    seed: corpusSeed,
    executions: scenarios.length * (flakeRuns + 1),
  });
  let flake: FlakeRun;
  try {
    flake = await new FlakeRateEvaluator().run(harness, scenarios, flakeRuns, (batch) => progress?.phase(batch));
  } finally {
    progress?.end();
  }

  const latency = { sampleCount: left.samplesMillis.length, p95Millis: percentile(left.samplesMillis, P95) };
  const repro = await measureRepro(config, backends, scenarios, flake.baseline, now);

  const gates = new QualityGateEvaluator(clock).evaluate(
    {
      compatibilityPassRate: PassRate.from(flake.baseline).ratio(),
      flakeRate: flake.summary.rate,
      p95LatencyMillis: latency.p95Millis,
      reproTimeP50Minutes: repro.measured ? repro.summary.p50Minutes : 0,
    },
    config.gates.release
  );

  const timing = endTiming();
  timing.log();

  const evidence: ReleaseEvidence = {
    gates,
    durationMillis: Math.round(timing.durationMs),
    seed: corpusSeed,
    compatibility: summarizeReport(flake.baseline),
    flake: flake.summary,
    latency,
    repro: repro.measured ? repro.summary : undefined,
    reproScenarioId: repro.measured ? repro.scenarioId : undefined,
    reproDiagnostic: repro.measured ? undefined : repro.diagnostic,
    regressions: topRegressions(flake.baseline, config.gates.topRegressions),
  };

  const artifacts = writeArtifactPair(
    config.output.dir,
    { json: PATHS.RELEASE_JSON, markdown: PATHS.RELEASE_MARKDOWN },
    {
      json: renderReleaseJson(evidence, { validate: config.output.validateArtifacts }),
      markdown: renderReleaseMarkdown(evidence),
    }
  );

  logger.info(
    { overallPassed: gates.overallPassed, passCount: gates.passCount, failCount: gates.failCount },
    'Release gates evaluated'
  );
  return { evidence, baseline: flake.baseline, artifacts };
}

/**
 * Time replays of the configured repro scenario or, without one, of the
 * first non-matching scenario whose backend under test actually fails.
 * Non-matching scenarios that never fail on replay leave the metric
 * unmeasured, with a diagnostic for the evidence.
 */
async function measureRepro(
  config: ParityConfig,
  backends: BackendProvider,
  scenarios: readonly Scenario[],
  baseline: DifferentialReport,
  now: () => number
): Promise<ReproOutcome> {
  const timer = new ReproTimer(() => backends('left'), {
    signatures: new FailureSignatureParser(config.diff.failureSignature.pattern),
    now,
  });
  const byId = new Map(scenarios.map((scenario) => [scenario.id, scenario]));
  const samples = config.gates.reproSamples;

  const explicitId = config.repro.scenarioId;
  if (explicitId !== undefined) {
    const scenario = byId.get(explicitId);
    if (!scenario) {
      throw new ConfigError(`repro.scenarioId "${explicitId}" is not in the corpus`, {
        operation: 'measureRepro',
        scenarioId: explicitId,
      });
    }
    const trace = await timer.capture(scenario);
    return { measured: true, scenarioId: explicitId, summary: await timer.measure(trace, samples) };
  }

  let candidates = 0;
  for (const result of baseline.results) {
    const scenario = byId.get(result.scenarioId);
    if (result.status === 'MATCH' || !scenario) {
      continue;
    }
    candidates++;
    try {
      const trace = await timer.capture(scenario);
      return { measured: true, scenarioId: scenario.id, summary: await timer.measure(trace, samples) };
    } catch (error) {
      if (!(error instanceof ReproductionError)) {
        throw error;
      }
      logger.debug({ scenarioId: scenario.id, reason: error.message }, 'Scenario not usable for repro timing');
    }
  }

  if (candidates === 0) {
    logger.info('No failing scenario to replay; repro time reported as 0');
    return { measured: false };
  }
  const diagnostic =
    `${candidates} non-matching ${candidates === 1 ? 'scenario' : 'scenarios'} did not fail on replay; ` +
    'repro time not measured';
  logger.warn({ candidates }, diagnostic);
  return { measured: false, diagnostic };
}
