/**
 * Threshold gate over a differential report.
 */

import type { DifferentialReport } from '../diff/types.js';
import { summarizeReport } from '../diff/types.js';
import { requireNonNegativeInteger, requireRatio } from '../utils/preconditions.js';
import { PassRate, formatRatio } from './pass-rate.js';
import type { GateStatus } from './types.js';

export interface DifferentialGateThresholds {
  maxMismatch: number;
  maxError: number;
  /** Optional; when absent the pass rate is reported but not gated */
  minPassRate?: number;
}

export interface DifferentialGateResult {
  readonly status: GateStatus;
  readonly mismatchCount: number;
  readonly errorCount: number;
  readonly passRate: number;
  readonly thresholds: DifferentialGateThresholds;
  /** Every violated threshold, in a fixed order */
  readonly failureReasons: readonly string[];
}

export function evaluateDifferentialGate(
  report: DifferentialReport,
  thresholds: DifferentialGateThresholds
): DifferentialGateResult {
  requireNonNegativeInteger(thresholds.maxMismatch, 'maxMismatch');
  requireNonNegativeInteger(thresholds.maxError, 'maxError');
  if (thresholds.minPassRate !== undefined) {
    requireRatio(thresholds.minPassRate, 'minPassRate');
  }

  const counts = summarizeReport(report);
  const passRate = PassRate.from(report).ratio();
  const failureReasons: string[] = [];

  if (counts.mismatch > thresholds.maxMismatch) {
    failureReasons.push(`mismatch threshold exceeded: ${counts.mismatch} > ${thresholds.maxMismatch}`);
  }
  if (counts.error > thresholds.maxError) {
    failureReasons.push(`error threshold exceeded: ${counts.error} > ${thresholds.maxError}`);
  }
  if (thresholds.minPassRate !== undefined && passRate < thresholds.minPassRate) {
    failureReasons.push(
      `passRate threshold not met: ${formatRatio(passRate)} < ${formatRatio(thresholds.minPassRate)}`
    );
  }

  return {
    status: failureReasons.length === 0 ? 'PASS' : 'FAIL',
    mismatchCount: counts.mismatch,
    errorCount: counts.error,
    passRate,
    thresholds: { ...thresholds },
    failureReasons,
  };
}
