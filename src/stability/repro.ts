/**
 * Reproduction-time measurement.
 *
 * A failing scenario is captured once, then replayed `sampleCount` times,
 * each time against a freshly built backend so no state leaks between
 * samples. Every replay must fail again with an equivalent failure
 * signature; the median replay time is the reproduction time.
 */

import type { DifferentialBackend } from '../backends/types.js';
import { FailureSignatureParser } from '../diff/failure-signature.js';
import { ReproductionError, getErrorMessage } from '../errors/types.js';
import { getLogger } from '../logging/logger.js';
import type { Scenario, ScenarioOutcome } from '../scenarios/types.js';
import { requirePositiveInteger } from '../utils/preconditions.js';
import { percentile } from './percentile.js';

const logger = getLogger('repro');

const MILLIS_PER_MINUTE = 60_000;

/**
 * A scenario together with the failure it produced when captured.
 */
export interface FailureTrace {
  readonly scenario: Scenario;
  readonly failureMessage: string;
}

export interface ReproSummary {
  readonly sampleCount: number;
  readonly samplesMinutes: readonly number[];
  readonly p50Minutes: number;
}

/**
 * Builds a backend in a clean state. Called once per capture and per sample.
 */
export type BackendFactory = () => DifferentialBackend | Promise<DifferentialBackend>;

export interface ReproTimerOptions {
  signatures?: FailureSignatureParser;
  /** Monotonic millisecond clock (default: `performance.now`) */
  now?: () => number;
}

export function formatMinutes(minutes: number): string {
  return `${minutes.toFixed(4)}min`;
}

export class ReproTimer {
  private readonly factory: BackendFactory;
  private readonly signatures: FailureSignatureParser;
  private readonly now: () => number;

  constructor(factory: BackendFactory, options: ReproTimerOptions = {}) {
    this.factory = factory;
    this.signatures = options.signatures ?? new FailureSignatureParser();
    this.now = options.now ?? (() => performance.now());
  }

  /**
   * Run a scenario once and keep its failure as the trace to replay.
   */
  async capture(scenario: Scenario): Promise<FailureTrace> {
    const outcome = await this.execute(scenario);
    if (outcome.success) {
      throw new ReproductionError(`scenario ${scenario.id} did not fail; nothing to reproduce`, {
        operation: 'capture',
        scenarioId: scenario.id,
      });
    }
    return { scenario, failureMessage: outcome.errorMessage };
  }

  async measure(trace: FailureTrace, sampleCount: number): Promise<ReproSummary> {
    requirePositiveInteger(sampleCount, 'sampleCount');

    const samplesMinutes: number[] = [];
    for (let i = 0; i < sampleCount; i++) {
      samplesMinutes.push(await this.measureSample(trace, i));
    }
    const p50Minutes = percentile(samplesMinutes, 0.5);

    logger.debug(
      { scenarioId: trace.scenario.id, sampleCount, p50Minutes: formatMinutes(p50Minutes) },
      'Reproduction time measured'
    );
    return { sampleCount, samplesMinutes, p50Minutes };
  }

  private async measureSample(trace: FailureTrace, sampleIndex: number): Promise<number> {
    const backend = await this.factory();
    const startedAt = this.now();
    const outcome = await this.replay(backend, trace.scenario);
    const elapsedMs = Math.max(0, this.now() - startedAt);

    if (outcome.success) {
      throw new ReproductionError('replay did not reproduce a failing command', {
        operation: 'replay',
        scenarioId: trace.scenario.id,
        metadata: { sampleIndex },
      });
    }
    if (!this.signatures.equivalent(trace.failureMessage, outcome.errorMessage)) {
      throw new ReproductionError(
        `replay failed differently: expected "${trace.failureMessage}", got "${outcome.errorMessage}"`,
        { operation: 'replay', scenarioId: trace.scenario.id, metadata: { sampleIndex } }
      );
    }
    return elapsedMs / MILLIS_PER_MINUTE;
  }

  private async execute(scenario: Scenario): Promise<ScenarioOutcome> {
    return this.replay(await this.factory(), scenario);
  }

  private async replay(backend: DifferentialBackend, scenario: Scenario): Promise<ScenarioOutcome> {
    try {
      return await backend.execute(scenario);
    } catch (error) {
      throw new ReproductionError(
        `backend ${backend.name} failed while replaying ${scenario.id}: ${getErrorMessage(error)}`,
        { operation: 'replay', scenarioId: scenario.id, backend: backend.name },
        error instanceof Error ? error : undefined
      );
    }
  }
}
