/**
 * Differential comparison results.
 */

import { ValidationError } from '../errors/types.js';
import { cloneValue, type StructuredValue } from '../scenarios/values.js';
import { optionalText, requireText } from '../utils/preconditions.js';

/**
 * One localized discrepancy between two outcomes.
 *
 * `undefined` on a side means the value is absent there (a missing key),
 * which is distinct from an explicit `null`.
 */
export interface DiffEntry {
  /** JSONPath-like location, e.g. `$.commandResults[0].n` */
  readonly path: string;
  readonly leftValue: StructuredValue | undefined;
  readonly rightValue: StructuredValue | undefined;
  readonly note: string;
}

export type DiffStatus = 'MATCH' | 'MISMATCH' | 'ERROR';

export const DIFF_STATUSES: readonly DiffStatus[] = ['MATCH', 'MISMATCH', 'ERROR'];

export interface DiffResult {
  readonly scenarioId: string;
  readonly leftBackend: string;
  readonly rightBackend: string;
  readonly status: DiffStatus;
  /** Non-empty exactly when status is MISMATCH */
  readonly entries: readonly DiffEntry[];
  /** Present exactly when status is ERROR */
  readonly errorMessage?: string;
}

/**
 * Aggregate of one differential run. Counters are derived with
 * {@link summarizeReport}, never stored.
 */
export interface DifferentialReport {
  readonly generatedAt: Date;
  readonly leftBackend: string;
  readonly rightBackend: string;
  readonly results: readonly DiffResult[];
}

export interface ReportCounts {
  total: number;
  match: number;
  mismatch: number;
  error: number;
}

export function createDiffEntry(
  path: string,
  leftValue: StructuredValue | undefined,
  rightValue: StructuredValue | undefined,
  note?: string | null
): DiffEntry {
  return Object.freeze({
    path: requireText(path, 'path'),
    leftValue: leftValue === undefined ? undefined : cloneValue(leftValue),
    rightValue: rightValue === undefined ? undefined : cloneValue(rightValue),
    note: optionalText(note),
  });
}

function identity(scenarioId: string, leftBackend: string, rightBackend: string) {
  return {
    scenarioId: requireText(scenarioId, 'scenarioId'),
    leftBackend: requireText(leftBackend, 'leftBackend'),
    rightBackend: requireText(rightBackend, 'rightBackend'),
  };
}

/**
 * Factories for the three result shapes.
 */
export const DiffResults = {
  match(scenarioId: string, leftBackend: string, rightBackend: string): DiffResult {
    const result: DiffResult = {
      ...identity(scenarioId, leftBackend, rightBackend),
      status: 'MATCH',
      entries: Object.freeze([]),
    };
    return Object.freeze(result);
  },

  mismatch(
    scenarioId: string,
    leftBackend: string,
    rightBackend: string,
    entries: readonly DiffEntry[]
  ): DiffResult {
    if (entries.length === 0) {
      throw new ValidationError('entries must not be empty for mismatches', 'entries', { scenarioId });
    }
    const result: DiffResult = {
      ...identity(scenarioId, leftBackend, rightBackend),
      status: 'MISMATCH',
      entries: Object.freeze([...entries]),
    };
    return Object.freeze(result);
  },

  error(scenarioId: string, leftBackend: string, rightBackend: string, errorMessage: string): DiffResult {
    const result: DiffResult = {
      ...identity(scenarioId, leftBackend, rightBackend),
      status: 'ERROR',
      entries: Object.freeze([]),
      errorMessage: requireText(errorMessage, 'errorMessage'),
    };
    return Object.freeze(result);
  },
};

export function createReport(
  generatedAt: Date,
  leftBackend: string,
  rightBackend: string,
  results: readonly DiffResult[]
): DifferentialReport {
  return Object.freeze({
    generatedAt,
    leftBackend: requireText(leftBackend, 'leftBackend'),
    rightBackend: requireText(rightBackend, 'rightBackend'),
    results: Object.freeze([...results]),
  });
}

export function summarizeReport(report: DifferentialReport): ReportCounts {
  const counts: ReportCounts = { total: report.results.length, match: 0, mismatch: 0, error: 0 };
  for (const result of report.results) {
    if (result.status === 'MATCH') {
      counts.match++;
    } else if (result.status === 'MISMATCH') {
      counts.mismatch++;
    } else {
      counts.error++;
    }
  }
  return counts;
}
