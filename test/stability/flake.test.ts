import { describe, it, expect } from 'vitest';
import { FlakeRateEvaluator } from '../../src/stability/flake.js';
import { DiffResults, createDiffEntry, createReport, type DiffResult } from '../../src/diff/types.js';
import { DifferentialHarness } from '../../src/harness/harness.js';
import { findScenario, insertBackend, insertScenario, shufflingBackend } from '../fixtures/backends.js';

const AT = new Date('2026-03-01T12:00:00.000Z');

function report(...results: DiffResult[]) {
  return createReport(AT, 'impl', 'reference', results);
}

const countMismatch = DiffResults.mismatch('b', 'impl', 'reference', [
  createDiffEntry('$.commandResults[0].n', 3, 2, 'value mismatch'),
]);

describe('stability/flake', () => {
  const evaluator = new FlakeRateEvaluator();

  describe('evaluate', () => {
    it('should count reruns that differ from the baseline', () => {
      const baseline = report(DiffResults.match('a', 'impl', 'reference'), countMismatch);
      const stable = report(DiffResults.match('a', 'impl', 'reference'), countMismatch);
      const drifted = report(
        DiffResults.match('a', 'impl', 'reference'),
        DiffResults.match('b', 'impl', 'reference')
      );

      expect(evaluator.evaluate(baseline, [stable, drifted])).toEqual({
        runs: 2,
        observations: 4,
        flakyObservations: 1,
        rate: 0.25,
      });
    });

    it('should treat a scenario missing from the baseline as flaky', () => {
      const baseline = report(DiffResults.match('a', 'impl', 'reference'));
      const rerun = report(DiffResults.match('a', 'impl', 'reference'), DiffResults.match('z', 'impl', 'reference'));

      expect(evaluator.evaluate(baseline, [rerun]).flakyObservations).toBe(1);
    });

    it('should report a zero rate when there are no reruns', () => {
      expect(evaluator.evaluate(report(countMismatch), [])).toEqual({
        runs: 0,
        observations: 0,
        flakyObservations: 0,
        rate: 0,
      });
    });

    it('should treat a different error message as flaky', () => {
      const baseline = report(DiffResults.error('a', 'impl', 'reference', 'Error: timeout'));
      const rerun = report(DiffResults.error('a', 'impl', 'reference', 'Error: reset'));

      expect(evaluator.evaluate(baseline, [rerun]).rate).toBe(1);
    });
  });

  describe('run', () => {
    it('should report zero flakes for deterministic backends', async () => {
      const harness = new DifferentialHarness(insertBackend('impl'), insertBackend('reference', 1));

      const { baseline, reruns, summary } = await evaluator.run(
        harness,
        [insertScenario('a'), insertScenario('b')],
        30
      );

      expect(baseline.results.map((r) => r.status)).toEqual(['MISMATCH', 'MISMATCH']);
      expect(reruns).toHaveLength(30);
      expect(summary).toEqual({ runs: 30, observations: 60, flakyObservations: 0, rate: 0 });
    });

    it('should detect order-dependent results', async () => {
      let draw = 0;
      const alternating = () => (draw++ % 2 === 0 ? 0.9 : 0.1);
      const harness = new DifferentialHarness(
        shufflingBackend('impl', () => 0.9),
        shufflingBackend('reference', alternating)
      );

      const { baseline, summary } = await evaluator.run(harness, [findScenario()], 4);

      expect(baseline.results[0].status).toBe('MATCH');
      expect(summary).toEqual({ runs: 4, observations: 4, flakyObservations: 2, rate: 0.5 });
    });

    it('should ask for a listener per batch', async () => {
      const harness = new DifferentialHarness(insertBackend('impl'), insertBackend('reference'));
      const seen: string[] = [];

      await evaluator.run(harness, [insertScenario('a'), insertScenario('b')], 2, (batch) => (result, completed) =>
        seen.push(`${batch}:${result.scenarioId}:${completed}`)
      );

      expect(seen).toEqual([
        'Baseline:a:1',
        'Baseline:b:2',
        'Rerun 1/2:a:1',
        'Rerun 1/2:b:2',
        'Rerun 2/2:a:1',
        'Rerun 2/2:b:2',
      ]);
    });

    it('should reject a negative rerun count', async () => {
      const harness = new DifferentialHarness(insertBackend('impl'), insertBackend('reference'));

      await expect(evaluator.run(harness, [insertScenario()], -1)).rejects.toThrow('rerunCount must be >= 0');
    });
  });
});
