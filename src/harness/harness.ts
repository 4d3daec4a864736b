/**
 * Differential harness: runs scenarios against two backends and diffs the
 * outcomes.
 */

import type { DifferentialBackend } from '../backends/types.js';
import { DiffEngine } from '../diff/engine.js';
import { DiffResults, createReport, type DiffResult, type DifferentialReport } from '../diff/types.js';
import { describeFault } from '../errors/types.js';
import { getLogger } from '../logging/logger.js';
import type { Scenario, ScenarioOutcome } from '../scenarios/types.js';

const logger = getLogger('harness');

export type Clock = () => Date;

/**
 * Called after each scenario of a batch completes, with its 1-based
 * position in the batch.
 */
export type ProgressListener = (result: DiffResult, completed: number, total: number) => void;

export interface HarnessOptions {
  engine?: DiffEngine;
  /** Source of `generatedAt` timestamps (default: wall clock) */
  clock?: Clock;
}

export class DifferentialHarness {
  readonly left: DifferentialBackend;
  readonly right: DifferentialBackend;
  private readonly engine: DiffEngine;
  private readonly clock: Clock;

  constructor(left: DifferentialBackend, right: DifferentialBackend, options: HarnessOptions = {}) {
    this.left = left;
    this.right = right;
    this.engine = options.engine ?? new DiffEngine();
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Run scenarios strictly in input order. Each scenario completes on both
   * backends before the next one starts.
   */
  async run(scenarios: readonly Scenario[], onResult?: ProgressListener): Promise<DifferentialReport> {
    const results: DiffResult[] = [];
    for (const scenario of scenarios) {
      const result = await this.runScenario(scenario);
      results.push(result);
      onResult?.(result, results.length, scenarios.length);
    }
    return createReport(this.clock(), this.left.name, this.right.name, results);
  }

  /**
   * Run one scenario. A backend that throws produces an ERROR result; the
   * fault never escapes.
   */
  async runScenario(scenario: Scenario): Promise<DiffResult> {
    let leftOutcome: ScenarioOutcome;
    let rightOutcome: ScenarioOutcome;
    try {
      leftOutcome = await this.left.execute(scenario);
      rightOutcome = await this.right.execute(scenario);
    } catch (error) {
      const message = describeFault(error);
      logger.debug({ scenarioId: scenario.id, status: 'ERROR', error: message }, 'Scenario errored');
      return DiffResults.error(scenario.id, this.left.name, this.right.name, message);
    }

    const entries = this.engine.compare(leftOutcome, rightOutcome);
    if (entries.length === 0) {
      logger.debug({ scenarioId: scenario.id, status: 'MATCH' }, 'Scenario matched');
      return DiffResults.match(scenario.id, this.left.name, this.right.name);
    }
    logger.debug({ scenarioId: scenario.id, status: 'MISMATCH', entries: entries.length }, 'Scenario mismatched');
    return DiffResults.mismatch(scenario.id, this.left.name, this.right.name, entries);
  }
}
