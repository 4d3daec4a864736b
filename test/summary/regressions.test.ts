import { describe, it, expect } from 'vitest';
import { topRegressions } from '../../src/summary/regressions.js';
import { DiffResults, createDiffEntry, createReport } from '../../src/diff/types.js';

const entry = (path: string) => createDiffEntry(path, 1, 2, 'value mismatch');

const report = createReport(new Date(0), 'impl', 'reference', [
  DiffResults.match('a-match', 'impl', 'reference'),
  DiffResults.mismatch('b-one', 'impl', 'reference', [entry('$.commandResults[0].n')]),
  DiffResults.mismatch('c-two', 'impl', 'reference', [entry('$.commandResults[0].ok'), entry('$.commandResults[1].n')]),
  DiffResults.error('d-error', 'impl', 'reference', 'TypeError: socket closed'),
  DiffResults.mismatch('a-one', 'impl', 'reference', [entry('$.success')]),
]);

describe('summary/regressions', () => {
  it('should rank errors first, then by entry count, then by id', () => {
    expect(topRegressions(report, 10).map((s) => s.scenarioId)).toEqual(['d-error', 'c-two', 'a-one', 'b-one']);
  });

  it('should describe errors by their message', () => {
    expect(topRegressions(report, 1)).toEqual([
      { scenarioId: 'd-error', status: 'ERROR', entryCount: 0, errorMessage: 'TypeError: socket closed' },
    ]);
  });

  it('should describe mismatches by their first entry', () => {
    expect(topRegressions(report, 2)[1]).toEqual({
      scenarioId: 'c-two',
      status: 'MISMATCH',
      entryCount: 2,
      entryPath: '$.commandResults[0].ok',
      entryNote: 'value mismatch',
    });
  });

  it('should not reorder the report', () => {
    topRegressions(report, 10);
    expect(report.results[0].scenarioId).toBe('a-match');
  });

  it('should reject a non-positive limit', () => {
    expect(() => topRegressions(report, 0)).toThrow('limit must be > 0');
  });
});
