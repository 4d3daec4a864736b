/**
 * Differential report artifacts (JSON and Markdown).
 */

import type { DiffEntry, DiffResult, DifferentialReport } from '../diff/types.js';
import { summarizeReport } from '../diff/types.js';
import type { DifferentialGateResult } from '../gates/differential.js';
import { PassRate, formatRatio } from '../gates/pass-rate.js';
import { canonicalJson, toJsonValue, type JsonValue, type StructuredValue } from '../scenarios/values.js';
import type { RegressionSample } from '../summary/regressions.js';
import { escapeInlineCode } from '../utils/markdown.js';
import { encodeArtifact, type JsonArtifactOptions } from './json.js';
import { finishDocument, regressionJson, renderRegressionList } from './shared.js';

export const DIFFERENTIAL_SCHEMA_FILE = 'schemas/differential-report.schema.json';

export interface DifferentialArtifact {
  readonly report: DifferentialReport;
  /** Corpus seed, when the scenarios came from the corpus builder */
  readonly seed?: string;
  readonly gate: DifferentialGateResult;
  readonly regressions: readonly RegressionSample[];
}

export function differentialJson(artifact: DifferentialArtifact): { [key: string]: JsonValue } {
  const { report, gate } = artifact;
  const counts = summarizeReport(report);

  const root: { [key: string]: JsonValue } = {
    generatedAt: report.generatedAt.toISOString(),
    overallStatus: gate.status,
  };
  if (artifact.seed !== undefined) {
    root.seed = artifact.seed;
  }
  root.leftBackend = report.leftBackend;
  root.rightBackend = report.rightBackend;
  root.summary = { ...counts, passRate: PassRate.from(report).ratio() };
  root.gate = {
    status: gate.status,
    thresholds: {
      maxMismatch: gate.thresholds.maxMismatch,
      maxError: gate.thresholds.maxError,
      minPassRate: gate.thresholds.minPassRate ?? null,
    },
    measured: { mismatch: gate.mismatchCount, error: gate.errorCount, passRate: gate.passRate },
    failureReasons: [...gate.failureReasons],
  };
  root.topRegressions = artifact.regressions.map(regressionJson);
  root.results = report.results.map(resultJson);
  return root;
}

export function renderDifferentialJson(artifact: DifferentialArtifact, options: JsonArtifactOptions = {}): string {
  return encodeArtifact(differentialJson(artifact), DIFFERENTIAL_SCHEMA_FILE, options);
}

export function renderDifferentialMarkdown(artifact: DifferentialArtifact): string {
  const { report, gate } = artifact;
  const counts = summarizeReport(report);
  const lines: string[] = ['# Differential Report', ''];

  lines.push(`- generatedAt: ${report.generatedAt.toISOString()}`);
  if (artifact.seed !== undefined) {
    lines.push(`- seed: ${artifact.seed}`);
  }
  lines.push(
    `- backends: ${report.leftBackend} vs ${report.rightBackend}`,
    `- total: ${counts.total}`,
    `- match: ${counts.match}`,
    `- mismatch: ${counts.mismatch}`,
    `- error: ${counts.error}`,
    `- passRate: ${PassRate.from(report).formatted()}`,
    ''
  );

  lines.push(
    '## Gate',
    `- status: ${gate.status}`,
    `- measuredMismatch: ${gate.mismatchCount}`,
    `- measuredError: ${gate.errorCount}`,
    `- measuredPassRate: ${formatRatio(gate.passRate)}`,
    `- maxMismatch: ${gate.thresholds.maxMismatch}`,
    `- maxError: ${gate.thresholds.maxError}`,
    `- minPassRate: ${gate.thresholds.minPassRate === undefined ? 'none' : formatRatio(gate.thresholds.minPassRate)}`
  );
  if (gate.failureReasons.length === 0) {
    lines.push('- gateFailures: none');
  } else {
    lines.push('- gateFailures:', ...gate.failureReasons.map((reason) => `  - ${reason}`));
  }
  lines.push('');

  lines.push('## Top Regressions', ...renderRegressionList(artifact.regressions), '');

  lines.push('## Results', '');
  for (const result of report.results) {
    lines.push(...renderResult(result), '');
  }
  return finishDocument(lines);
}

function renderResult(result: DiffResult): string[] {
  const heading = `### ${result.scenarioId} (${result.status})`;
  if (result.status === 'MATCH') {
    return [heading, '- No material differences'];
  }
  if (result.status === 'ERROR') {
    return [heading, `- Error: ${result.errorMessage ?? 'unknown error'}`];
  }
  return [heading, ...result.entries.map(renderEntry)];
}

function renderEntry(entry: DiffEntry): string {
  const values = `${formatValue(entry.leftValue)} <> ${formatValue(entry.rightValue)}`;
  const note = entry.note.length > 0 ? ` (${entry.note})` : '';
  return `- ${escapeInlineCode(entry.path)}: ${values}${note}`;
}

function formatValue(value: StructuredValue | undefined): string {
  return value === undefined ? '(absent)' : canonicalJson(value);
}

function resultJson(result: DiffResult): JsonValue {
  return {
    scenarioId: result.scenarioId,
    status: result.status,
    leftBackend: result.leftBackend,
    rightBackend: result.rightBackend,
    errorMessage: result.errorMessage ?? null,
    entries: result.entries.map((entry) => ({
      path: entry.path,
      leftValue: toJsonValue(entry.leftValue),
      rightValue: toJsonValue(entry.rightValue),
      note: entry.note,
    })),
  };
}
