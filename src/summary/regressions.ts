import type { DiffResult, DiffStatus, DifferentialReport } from '../diff/types.js';
import { requirePositiveInteger } from '../utils/preconditions.js';

/**
 * Compact description of one non-matching scenario for human-facing reports.
 */
export interface RegressionSample {
  readonly scenarioId: string;
  readonly status: Exclude<DiffStatus, 'MATCH'>;
  readonly entryCount: number;
  /** First discrepancy, for mismatches */
  readonly entryPath?: string;
  readonly entryNote?: string;
  /** For errors */
  readonly errorMessage?: string;
}

const SEVERITY: Record<DiffStatus, number> = { ERROR: 2, MISMATCH: 1, MATCH: 0 };

/**
 * Most severe non-matching results first: errors before mismatches, then
 * more entries before fewer, then scenario id ascending.
 */
export function topRegressions(report: DifferentialReport, limit: number): RegressionSample[] {
  requirePositiveInteger(limit, 'limit');

  return report.results
    .filter((result) => result.status !== 'MATCH')
    .sort(compareSeverity)
    .slice(0, limit)
    .map(toSample);
}

function compareSeverity(a: DiffResult, b: DiffResult): number {
  const bySeverity = SEVERITY[b.status] - SEVERITY[a.status];
  if (bySeverity !== 0) {
    return bySeverity;
  }
  const byEntries = b.entries.length - a.entries.length;
  if (byEntries !== 0) {
    return byEntries;
  }
  if (a.scenarioId === b.scenarioId) {
    return 0;
  }
  return a.scenarioId < b.scenarioId ? -1 : 1;
}

function toSample(result: DiffResult): RegressionSample {
  if (result.status === 'ERROR') {
    return {
      scenarioId: result.scenarioId,
      status: 'ERROR',
      entryCount: 0,
      errorMessage: result.errorMessage ?? 'unknown error',
    };
  }
  const [first] = result.entries;
  return {
    scenarioId: result.scenarioId,
    status: 'MISMATCH',
    entryCount: result.entries.length,
    entryPath: first?.path,
    entryNote: first?.note,
  };
}
