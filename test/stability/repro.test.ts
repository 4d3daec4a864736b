import { describe, it, expect } from 'vitest';
import { ReproTimer, formatMinutes } from '../../src/stability/repro.js';
import { ReproductionError } from '../../src/errors/types.js';
import { failureOutcome, successOutcome } from '../../src/scenarios/types.js';
import { FunctionBackend, failingBackend, insertScenario } from '../fixtures/backends.js';

const DUPLICATE = "command 'insert' failed at index 0: E11000 duplicate key (code=11000, codeName=DuplicateKey)";

function scriptedClock(times: number[]): () => number {
  let index = 0;
  return () => times[index++];
}

describe('stability/repro', () => {
  describe('formatMinutes', () => {
    it('should print four decimals', () => {
      expect(formatMinutes(0.5)).toBe('0.5000min');
      expect(formatMinutes(1 / 3)).toBe('0.3333min');
    });
  });

  describe('ReproTimer', () => {
    it('should capture a failing scenario', async () => {
      const timer = new ReproTimer(() => failingBackend('impl', DUPLICATE));

      const trace = await timer.capture(insertScenario());

      expect(trace.scenario.id).toBe('insert-three');
      expect(trace.failureMessage).toBe(DUPLICATE);
    });

    it('should refuse to capture a passing scenario', async () => {
      const timer = new ReproTimer(() => new FunctionBackend('impl', () => successOutcome([{ ok: 1 }])));

      await expect(timer.capture(insertScenario())).rejects.toThrow(
        'scenario insert-three did not fail; nothing to reproduce'
      );
    });

    it('should time each replay on a fresh backend and report the median', async () => {
      let builds = 0;
      const timer = new ReproTimer(
        () => {
          builds++;
          return failingBackend('impl', DUPLICATE);
        },
        { now: scriptedClock([0, 60_000, 100_000, 130_000, 200_000, 320_000]) }
      );

      const trace = await timer.capture(insertScenario());
      const summary = await timer.measure(trace, 3);

      expect(builds).toBe(4);
      expect(summary).toEqual({ sampleCount: 3, samplesMinutes: [1, 0.5, 2], p50Minutes: 1 });
    });

    it('should accept a replay that fails with an equivalent signature', async () => {
      const timer = new ReproTimer(
        () => failingBackend('impl', "command 'insert' failed at index 0: duplicate key error (code=11000)"),
        { now: () => 0 }
      );

      const summary = await timer.measure({ scenario: insertScenario(), failureMessage: DUPLICATE }, 2);

      expect(summary.samplesMinutes).toEqual([0, 0]);
    });

    it('should fail when a replay succeeds', async () => {
      const timer = new ReproTimer(() => new FunctionBackend('impl', () => successOutcome([{ ok: 1, n: 3 }])));

      await expect(
        timer.measure({ scenario: insertScenario(), failureMessage: DUPLICATE }, 1)
      ).rejects.toThrow('replay did not reproduce a failing command');
    });

    it('should fail when a replay fails with another error class', async () => {
      const timer = new ReproTimer(() =>
        new FunctionBackend('impl', () => failureOutcome("command 'insert' failed at index 0: bad value (code=2)"))
      );

      await expect(
        timer.measure({ scenario: insertScenario(), failureMessage: DUPLICATE }, 1)
      ).rejects.toBeInstanceOf(ReproductionError);
    });

    it('should wrap a backend fault during replay', async () => {
      const timer = new ReproTimer(
        () =>
          new FunctionBackend('impl', () => {
            throw new Error('connection refused');
          })
      );

      await expect(
        timer.measure({ scenario: insertScenario(), failureMessage: DUPLICATE }, 1)
      ).rejects.toThrow('backend impl failed while replaying insert-three: connection refused');
    });

    it('should reject a non-positive sample count', async () => {
      const timer = new ReproTimer(() => failingBackend('impl', DUPLICATE));

      await expect(
        timer.measure({ scenario: insertScenario(), failureMessage: DUPLICATE }, 0)
      ).rejects.toThrow('sampleCount must be > 0');
    });
  });
});
