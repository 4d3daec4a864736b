/**
 * Release metrics evaluated against fixed thresholds.
 */

import { GATE_DEFAULTS } from '../constants.js';
import type { Clock } from '../harness/harness.js';
import { requireNonNegative, requireRatio } from '../utils/preconditions.js';
import { createGateRun, evaluateGate, type GateOperator, type GateRun } from './types.js';

export const METRIC_KEYS = {
  COMPATIBILITY_PASS_RATE: 'compatibilityPassRate',
  FLAKE_RATE: 'flakeRate',
  P95_LATENCY_MILLIS: 'p95LatencyMillis',
  REPRO_TIME_P50_MINUTES: 'reproTimeP50Minutes',
} as const;

export const GATE_IDS = {
  COMPATIBILITY_PASS_RATE: 'compatibility-pass-rate',
  FLAKE_RATE: 'flake-rate',
  P95_LATENCY: 'p95-latency',
  REPRO_TIME_P50: 'repro-time-p50',
} as const;

export interface QualityMetrics {
  compatibilityPassRate: number;
  flakeRate: number;
  p95LatencyMillis: number;
  reproTimeP50Minutes: number;
}

export interface QualityThresholds {
  minCompatibilityPassRate: number;
  maxFlakeRate: number;
  maxP95LatencyMillis: number;
  maxReproTimeP50Minutes: number;
}

export const RECOMMENDED_THRESHOLDS: Readonly<QualityThresholds> = Object.freeze({
  minCompatibilityPassRate: GATE_DEFAULTS.MIN_COMPATIBILITY_PASS_RATE,
  maxFlakeRate: GATE_DEFAULTS.MAX_FLAKE_RATE,
  maxP95LatencyMillis: GATE_DEFAULTS.MAX_P95_LATENCY_MILLIS,
  maxReproTimeP50Minutes: GATE_DEFAULTS.MAX_REPRO_P50_MINUTES,
});

export interface QualityGateReport extends GateRun {
  readonly metrics: QualityMetrics;
}

interface GateDefinition {
  gateId: string;
  metricKey: keyof QualityMetrics;
  operator: GateOperator;
  threshold: keyof QualityThresholds;
}

const GATES: readonly GateDefinition[] = [
  {
    gateId: GATE_IDS.COMPATIBILITY_PASS_RATE,
    metricKey: METRIC_KEYS.COMPATIBILITY_PASS_RATE,
    operator: '>=',
    threshold: 'minCompatibilityPassRate',
  },
  { gateId: GATE_IDS.FLAKE_RATE, metricKey: METRIC_KEYS.FLAKE_RATE, operator: '<=', threshold: 'maxFlakeRate' },
  {
    gateId: GATE_IDS.P95_LATENCY,
    metricKey: METRIC_KEYS.P95_LATENCY_MILLIS,
    operator: '<=',
    threshold: 'maxP95LatencyMillis',
  },
  {
    gateId: GATE_IDS.REPRO_TIME_P50,
    metricKey: METRIC_KEYS.REPRO_TIME_P50_MINUTES,
    operator: '<=',
    threshold: 'maxReproTimeP50Minutes',
  },
];

export class QualityGateEvaluator {
  private readonly clock: Clock;

  constructor(clock: Clock = () => new Date()) {
    this.clock = clock;
  }

  evaluate(metrics: QualityMetrics, thresholds: QualityThresholds = RECOMMENDED_THRESHOLDS): QualityGateReport {
    validateMetrics(metrics);
    validateThresholds(thresholds);

    const checks = GATES.map((gate) =>
      evaluateGate(gate.gateId, gate.metricKey, gate.operator, metrics[gate.metricKey], thresholds[gate.threshold])
    );
    return { ...createGateRun(this.clock(), checks), metrics: { ...metrics } };
  }
}

function validateMetrics(metrics: QualityMetrics): void {
  requireRatio(metrics.compatibilityPassRate, 'compatibilityPassRate');
  requireRatio(metrics.flakeRate, 'flakeRate');
  requireNonNegative(metrics.p95LatencyMillis, 'p95LatencyMillis');
  requireNonNegative(metrics.reproTimeP50Minutes, 'reproTimeP50Minutes');
}

function validateThresholds(thresholds: QualityThresholds): void {
  requireRatio(thresholds.minCompatibilityPassRate, 'minCompatibilityPassRate');
  requireRatio(thresholds.maxFlakeRate, 'maxFlakeRate');
  requireNonNegative(thresholds.maxP95LatencyMillis, 'maxP95LatencyMillis');
  requireNonNegative(thresholds.maxReproTimeP50Minutes, 'maxReproTimeP50Minutes');
}
