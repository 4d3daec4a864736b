/**
 * Release gate evidence (JSON and Markdown).
 */

import type { ReportCounts } from '../diff/types.js';
import { METRIC_KEYS, type QualityGateReport } from '../gates/quality.js';
import type { GateCheck } from '../gates/types.js';
import type { JsonValue } from '../scenarios/values.js';
import type { FlakeSummary } from '../stability/flake.js';
import { formatMinutes, type ReproSummary } from '../stability/repro.js';
import type { RegressionSample } from '../summary/regressions.js';
import { encodeArtifact, formatPercent, type JsonArtifactOptions } from './json.js';
import { finishDocument, regressionJson, renderRegressionList } from './shared.js';

export const RELEASE_SCHEMA_FILE = 'schemas/release-gates.schema.json';

export interface LatencyEvidence {
  /** Timed executions on the backend under test */
  readonly sampleCount: number;
  readonly p95Millis: number;
}

export interface ReleaseEvidence {
  readonly gates: QualityGateReport;
  readonly durationMillis: number;
  readonly seed: string;
  readonly compatibility: ReportCounts;
  readonly flake: FlakeSummary;
  readonly latency: LatencyEvidence;
  /** Absent when no scenario failed, so nothing could be replayed */
  readonly repro?: ReproSummary;
  readonly reproScenarioId?: string;
  /** Why repro time went unmeasured although scenarios did not match */
  readonly reproDiagnostic?: string;
  readonly regressions: readonly RegressionSample[];
}

export function releaseJson(evidence: ReleaseEvidence): { [key: string]: JsonValue } {
  const { gates } = evidence;
  const metrics: { [key: string]: JsonValue } = { ...gates.metrics };
  return {
    generatedAt: gates.generatedAt.toISOString(),
    overallStatus: gates.overallPassed ? 'PASS' : 'FAIL',
    summary: { pass: gates.passCount, fail: gates.failCount },
    buildInfo: { durationMillis: evidence.durationMillis, seed: evidence.seed },
    metrics,
    compatibility: { ...evidence.compatibility },
    flake: { ...evidence.flake },
    latency: { ...evidence.latency },
    repro:
      evidence.repro === undefined
        ? null
        : {
            scenarioId: evidence.reproScenarioId ?? null,
            sampleCount: evidence.repro.sampleCount,
            p50Minutes: evidence.repro.p50Minutes,
            samplesMinutes: [...evidence.repro.samplesMinutes],
          },
    reproDiagnostic: evidence.reproDiagnostic ?? null,
    gates: gates.checks.map((check) => ({
      gateId: check.gateId,
      metricKey: check.metricKey,
      measuredValue: check.measuredValue,
      operator: check.operator,
      thresholdValue: check.thresholdValue,
      status: check.status,
    })),
    topRegressions: evidence.regressions.map(regressionJson),
  };
}

export function renderReleaseJson(evidence: ReleaseEvidence, options: JsonArtifactOptions = {}): string {
  return encodeArtifact(releaseJson(evidence), RELEASE_SCHEMA_FILE, options);
}

export function renderReleaseMarkdown(evidence: ReleaseEvidence): string {
  const { gates, compatibility, flake, latency, repro } = evidence;
  const lines: string[] = [
    '# Release Gates',
    '',
    `- generatedAt: ${gates.generatedAt.toISOString()}`,
    `- overallStatus: ${gates.overallPassed ? 'PASS' : 'FAIL'}`,
    `- passed: ${gates.passCount}`,
    `- failed: ${gates.failCount}`,
    `- seed: ${evidence.seed}`,
    `- durationMillis: ${evidence.durationMillis}`,
    '',
    '## Metrics',
    ...gates.checks.map(renderCheck),
    '',
    '## Compatibility Summary',
    `- total: ${compatibility.total}`,
    `- match: ${compatibility.match}`,
    `- mismatch: ${compatibility.mismatch}`,
    `- error: ${compatibility.error}`,
    '',
    '## Flake Evidence',
    `- runs: ${flake.runs}`,
    `- observations: ${flake.observations}`,
    `- flakyObservations: ${flake.flakyObservations}`,
    `- rate: ${formatPercent(flake.rate)}`,
    '',
    '## Latency Evidence',
    `- sampleCount: ${latency.sampleCount}`,
    `- p95: ${formatMillis(latency.p95Millis)}`,
    '',
    '## Repro Evidence',
  ];

  if (repro === undefined) {
    lines.push(`- ${evidence.reproDiagnostic ?? 'no failing scenario to replay'}`);
  } else {
    lines.push(
      `- scenario: ${evidence.reproScenarioId ?? 'unknown'}`,
      `- sampleCount: ${repro.sampleCount}`,
      `- p50: ${formatMinutes(repro.p50Minutes)}`,
      `- samples: ${repro.samplesMinutes.map(formatMinutes).join(', ')}`
    );
  }

  lines.push('', '## Top Regressions', ...renderRegressionList(evidence.regressions));
  return finishDocument(lines);
}

/**
 * Render a metric in its natural unit: percentages for rates, minutes for
 * repro time, milliseconds for latency.
 */
export function formatMetricValue(metricKey: string, value: number): string {
  switch (metricKey) {
    case METRIC_KEYS.COMPATIBILITY_PASS_RATE:
    case METRIC_KEYS.FLAKE_RATE:
      return formatPercent(value);
    case METRIC_KEYS.REPRO_TIME_P50_MINUTES:
      return formatMinutes(value);
    case METRIC_KEYS.P95_LATENCY_MILLIS:
      return formatMillis(value);
    default:
      return value.toFixed(4);
  }
}

function formatMillis(value: number): string {
  return `${value.toFixed(2)}ms`;
}

function renderCheck(check: GateCheck): string {
  const measured = formatMetricValue(check.metricKey, check.measuredValue);
  const threshold = formatMetricValue(check.metricKey, check.thresholdValue);
  return `- ${check.metricKey}: ${measured} (${check.operator} ${threshold}) ${check.status}`;
}
