import { describe, it, expect } from 'vitest';
import { evaluateDifferentialGate } from '../../src/gates/differential.js';
import { DiffResults, createDiffEntry, createReport, type DiffResult } from '../../src/diff/types.js';

function match(id: string): DiffResult {
  return DiffResults.match(id, 'impl', 'reference');
}

function mismatch(id: string): DiffResult {
  return DiffResults.mismatch(id, 'impl', 'reference', [createDiffEntry('$.commandResults[0].n', 3, 2, 'value mismatch')]);
}

function report(results: DiffResult[]) {
  return createReport(new Date(0), 'impl', 'reference', results);
}

describe('gates/differential', () => {
  it('should pass a clean report', () => {
    const result = evaluateDifferentialGate(report([match('a'), match('b')]), { maxMismatch: 0, maxError: 0 });

    expect(result).toEqual({
      status: 'PASS',
      mismatchCount: 0,
      errorCount: 0,
      passRate: 1,
      thresholds: { maxMismatch: 0, maxError: 0 },
      failureReasons: [],
    });
  });

  it('should collect every failure reason', () => {
    const result = evaluateDifferentialGate(
      report([
        match('a'),
        mismatch('b'),
        mismatch('c'),
        mismatch('d'),
        DiffResults.error('e', 'impl', 'reference', 'Error: down'),
      ]),
      { maxMismatch: 0, maxError: 0, minPassRate: 0.95 }
    );

    expect(result.status).toBe('FAIL');
    expect(result.failureReasons).toEqual([
      'mismatch threshold exceeded: 3 > 0',
      'error threshold exceeded: 1 > 0',
      'passRate threshold not met: 0.2000 < 0.9500',
    ]);
  });

  it('should gate on pass rate alone when counts are tolerated', () => {
    const results = ['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h', 'i'].map(match);
    const result = evaluateDifferentialGate(report([...results, mismatch('j')]), {
      maxMismatch: 1,
      maxError: 0,
      minPassRate: 0.95,
    });

    expect(result.failureReasons).toEqual(['passRate threshold not met: 0.9000 < 0.9500']);
  });

  it('should not gate on pass rate when no minimum is set', () => {
    const result = evaluateDifferentialGate(report([mismatch('a')]), { maxMismatch: 1, maxError: 0 });
    expect(result.status).toBe('PASS');
    expect(result.passRate).toBe(0);
  });

  it('should reject invalid thresholds', () => {
    expect(() => evaluateDifferentialGate(report([]), { maxMismatch: -1, maxError: 0 })).toThrow(
      'maxMismatch must be >= 0'
    );
    expect(() => evaluateDifferentialGate(report([]), { maxMismatch: 0, maxError: 0, minPassRate: 1.5 })).toThrow(
      'minPassRate must be in range [0.0, 1.0]'
    );
  });
});
