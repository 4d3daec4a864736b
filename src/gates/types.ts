/**
 * Gate checks: a measured value held against a threshold.
 */

import { requireFinite, requireText } from '../utils/preconditions.js';

export type GateOperator = '>=' | '<=';

export type GateStatus = 'PASS' | 'FAIL';

export interface GateCheck {
  readonly gateId: string;
  readonly metricKey: string;
  readonly operator: GateOperator;
  readonly measuredValue: number;
  readonly thresholdValue: number;
  readonly status: GateStatus;
}

/**
 * A set of checks evaluated together. Passes only when every check passes.
 */
export interface GateRun {
  readonly generatedAt: Date;
  readonly checks: readonly GateCheck[];
  readonly overallPassed: boolean;
  readonly passCount: number;
  readonly failCount: number;
}

export function operatorHolds(operator: GateOperator, measured: number, threshold: number): boolean {
  return operator === '>=' ? measured >= threshold : measured <= threshold;
}

export function evaluateGate(
  gateId: string,
  metricKey: string,
  operator: GateOperator,
  measuredValue: number,
  thresholdValue: number
): GateCheck {
  const check: GateCheck = {
    gateId: requireText(gateId, 'gateId'),
    metricKey: requireText(metricKey, 'metricKey'),
    operator,
    measuredValue: requireFinite(measuredValue, 'measuredValue'),
    thresholdValue: requireFinite(thresholdValue, 'thresholdValue'),
    status: operatorHolds(operator, measuredValue, thresholdValue) ? 'PASS' : 'FAIL',
  };
  return Object.freeze(check);
}

export function createGateRun(generatedAt: Date, checks: readonly GateCheck[]): GateRun {
  const passCount = checks.filter((check) => check.status === 'PASS').length;
  return Object.freeze({
    generatedAt,
    checks: Object.freeze([...checks]),
    overallPassed: passCount === checks.length,
    passCount,
    failCount: checks.length - passCount,
  });
}
