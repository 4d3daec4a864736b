export type { GateOperator, GateStatus, GateCheck, GateRun } from './types.js';
export { evaluateGate, operatorHolds, createGateRun } from './types.js';
export { PassRate, formatRatio } from './pass-rate.js';
export type { DifferentialGateThresholds, DifferentialGateResult } from './differential.js';
export { evaluateDifferentialGate } from './differential.js';
export type { QualityMetrics, QualityThresholds, QualityGateReport } from './quality.js';
export { QualityGateEvaluator, RECOMMENDED_THRESHOLDS, METRIC_KEYS, GATE_IDS } from './quality.js';
export type {
  ReadinessKind,
  ReadinessStatus,
  ReadinessGateSpec,
  ReadinessGateResult,
  ReadinessRun,
} from './readiness.js';
export { ReadinessAggregator, READINESS_KINDS, readEvidence } from './readiness.js';
