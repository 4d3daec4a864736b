/**
 * Terminal summaries for workflow results.
 */

import chalk from 'chalk';
import { summarizeReport } from '../../diff/types.js';
import { formatMetricValue } from '../../docs/release.js';
import { PassRate } from '../../gates/pass-rate.js';
import type { ReadinessRun } from '../../gates/readiness.js';
import type { SkipReason } from '../../scenarios/loader.js';
import { formatMinutes } from '../../stability/repro.js';
import type { RegressionSample } from '../../summary/regressions.js';
import type { DriftReport } from '../../summary/drift.js';
import type { CompareResult } from '../../workflow/compare.js';
import type { CorpusResult } from '../../workflow/corpus.js';
import type { ReleaseResult } from '../../workflow/release.js';
import { getOutputConfig } from '../output.js';

const SYMBOLS = {
  PASS: '✓',
  WARN: '⚠',
  FAIL: '✗',
} as const;

type Tone = keyof typeof SYMBOLS;

const STATUS_TONES: Record<string, Tone> = {
  PASS: 'PASS',
  MATCH: 'PASS',
  OK: 'PASS',
  WARN: 'WARN',
  MISSING: 'WARN',
};

function toneOf(status: string): Tone {
  return STATUS_TONES[status] ?? 'FAIL';
}

export function colorizeStatus(status: string): string {
  if (!supportsColor()) {
    return status;
  }
  switch (toneOf(status)) {
    case 'PASS':
      return chalk.green(status);
    case 'WARN':
      return chalk.yellow(status);
    case 'FAIL':
      return chalk.red(status);
  }
}

export function statusSymbol(status: string): string {
  return SYMBOLS[toneOf(status)];
}

export function formatSkipped(skip: SkipReason): string {
  const entry = skip.id === undefined ? `#${skip.index}` : `#${skip.index} (${skip.id})`;
  return `Skipped ${skip.source} ${entry}: ${skip.reason}`;
}

export function formatCorpusSummary(result: CorpusResult): string[] {
  return [`Corpus: ${result.scenarios.length} scenarios from ${result.templateCount} templates (seed "${result.seed}")`];
}

export function formatCompareSummary(result: CompareResult): string[] {
  const counts = summarizeReport(result.report);
  const lines = [
    `Scenarios: ${counts.total} (${counts.match} match, ${counts.mismatch} mismatch, ${counts.error} error)`,
    `Pass rate: ${PassRate.from(result.report).formatted()}`,
    `Gate: ${statusSymbol(result.gate.status)} ${colorizeStatus(result.gate.status)}`,
    ...result.gate.failureReasons.map((reason) => `  - ${reason}`),
  ];
  lines.push(...formatRegressions(result.regressions));
  return lines;
}

export function formatReleaseSummary(result: ReleaseResult): string[] {
  const { gates, repro, reproScenarioId, reproDiagnostic } = result.evidence;
  const lines = gates.checks.map(
    (check) =>
      `${statusSymbol(check.status)} ${check.gateId}: ${formatMetricValue(check.metricKey, check.measuredValue)} ` +
      `(${check.operator} ${formatMetricValue(check.metricKey, check.thresholdValue)})`
  );
  if (repro === undefined) {
    lines.push(`Repro: ${reproDiagnostic ?? 'no failing scenario to replay'}`);
  } else {
    lines.push(`Repro: ${reproScenarioId ?? 'unknown'} p50 ${formatMinutes(repro.p50Minutes)} over ${repro.sampleCount} samples`);
  }
  const overall = gates.overallPassed ? 'PASS' : 'FAIL';
  lines.push(`Release gates: ${colorizeStatus(overall)} (${gates.passCount} passed, ${gates.failCount} failed)`);
  lines.push(...formatRegressions(result.evidence.regressions));
  return lines;
}

export function formatReadinessSummary(run: ReadinessRun): string[] {
  const lines: string[] = [];
  for (const gate of run.gates) {
    lines.push(`${statusSymbol(gate.status)} ${gate.gateId}: ${colorizeStatus(gate.status)}`);
    for (const diagnostic of gate.diagnostics) {
      lines.push(`    ${diagnostic}`);
    }
  }
  const overall = run.overallPassed ? 'PASS' : 'FAIL';
  lines.push(
    `Readiness: ${colorizeStatus(overall)} (${run.passCount} pass, ${run.failCount} fail, ${run.missingCount} missing)`
  );
  return lines;
}

export function formatDriftSummary(report: DriftReport): string[] {
  const lines = report.collections.map(
    (collection) =>
      `${statusSymbol(collection.status)} ${collection.namespace}: score ${collection.score.toFixed(4)} ` +
      `${colorizeStatus(collection.status)}`
  );
  if (lines.length === 0) {
    lines.push('No collections compared.');
  }
  lines.push(
    `Fixture drift: ${report.failingCollections} failing, ${report.warningCollections} warning ` +
      `(warn >= ${report.warnThreshold.toFixed(4)}, fail >= ${report.failThreshold.toFixed(4)})`
  );
  return lines;
}

function formatRegressions(regressions: readonly RegressionSample[]): string[] {
  if (regressions.length === 0) {
    return [];
  }
  return [
    'Top regressions:',
    ...regressions.map((sample) => {
      const detail =
        sample.status === 'ERROR'
          ? sample.errorMessage ?? 'unknown error'
          : `${sample.entryPath ?? '$'} (${sample.entryNote ?? ''})`;
      return `  ${statusSymbol(sample.status)} ${sample.scenarioId}: ${detail}`;
    }),
  ];
}

function supportsColor(): boolean {
  if (getOutputConfig().noColor) {
    return false;
  }
  return process.stdout.isTTY ?? false;
}
