/**
 * Flake-rate estimation.
 *
 * A scenario observation is flaky when its fingerprint on a rerun differs
 * from the baseline run, or when the baseline has no result for it.
 */

import type { DifferentialReport } from '../diff/types.js';
import type { DifferentialHarness, ProgressListener } from '../harness/harness.js';
import { getLogger } from '../logging/logger.js';
import type { Scenario } from '../scenarios/types.js';
import { requireNonNegativeInteger } from '../utils/preconditions.js';
import { fingerprint } from './fingerprint.js';

const logger = getLogger('flake');

export interface FlakeSummary {
  /** Number of reruns compared against the baseline */
  readonly runs: number;
  readonly observations: number;
  readonly flakyObservations: number;
  /** flakyObservations / observations, 0 when nothing was observed */
  readonly rate: number;
}

export interface FlakeRun {
  readonly baseline: DifferentialReport;
  readonly reruns: readonly DifferentialReport[];
  readonly summary: FlakeSummary;
}

/**
 * Supplies a progress listener for each harness batch, labelled
 * `Baseline` or `Rerun <n>/<count>`.
 */
export type BatchListenerFactory = (batch: string) => ProgressListener | undefined;

export class FlakeRateEvaluator {
  evaluate(baseline: DifferentialReport, reruns: readonly DifferentialReport[]): FlakeSummary {
    const baselineFingerprints = new Map<string, string>();
    for (const result of baseline.results) {
      baselineFingerprints.set(result.scenarioId, fingerprint(result));
    }

    let observations = 0;
    let flakyObservations = 0;
    for (const rerun of reruns) {
      for (const result of rerun.results) {
        observations++;
        const expected = baselineFingerprints.get(result.scenarioId);
        if (expected === undefined || expected !== fingerprint(result)) {
          flakyObservations++;
        }
      }
    }

    return {
      runs: reruns.length,
      observations,
      flakyObservations,
      rate: observations === 0 ? 0 : flakyObservations / observations,
    };
  }

  /**
   * Run the scenarios once as a baseline, then `rerunCount` more times, and
   * summarize how often a rerun disagreed with the baseline.
   */
  async run(
    harness: DifferentialHarness,
    scenarios: readonly Scenario[],
    rerunCount: number,
    listenerFor?: BatchListenerFactory
  ): Promise<FlakeRun> {
    requireNonNegativeInteger(rerunCount, 'rerunCount');

    const baseline = await harness.run(scenarios, listenerFor?.('Baseline'));
    const reruns: DifferentialReport[] = [];
    for (let i = 0; i < rerunCount; i++) {
      reruns.push(await harness.run(scenarios, listenerFor?.(`Rerun ${i + 1}/${rerunCount}`)));
    }

    const summary = this.evaluate(baseline, reruns);
    logger.debug(
      { runs: summary.runs, observations: summary.observations, flaky: summary.flakyObservations },
      'Flake rate evaluated'
    );
    return { baseline, reruns, summary };
  }
}
