/**
 * Release-readiness rollup (JSON and Markdown).
 */

import type { ReadinessGateResult, ReadinessRun } from '../gates/readiness.js';
import type { JsonValue } from '../scenarios/values.js';
import { escapeListItem } from '../utils/markdown.js';
import { encodeArtifact, type JsonArtifactOptions } from './json.js';
import { finishDocument } from './shared.js';

export const READINESS_SCHEMA_FILE = 'schemas/release-readiness.schema.json';

export function readinessJson(run: ReadinessRun): { [key: string]: JsonValue } {
  const missing = run.gates.filter((gate) => gate.status === 'MISSING');
  return {
    generatedAt: run.generatedAt.toISOString(),
    overallStatus: run.overallPassed ? 'PASS' : 'FAIL',
    summary: { pass: run.passCount, fail: run.failCount, missing: run.missingCount },
    gates: run.gates.map((gate) => ({
      gateId: gate.gateId,
      kind: gate.kind,
      status: gate.status,
      artifactPath: gate.artifactPath,
      artifactGeneratedAt: gate.artifactGeneratedAt,
      evidenceGenerated: gate.status !== 'MISSING',
      metrics: { ...gate.metrics },
      diagnostics: [...gate.diagnostics],
    })),
    missingEvidence: missing.map((gate) => ({
      gateId: gate.gateId,
      artifactPath: gate.artifactPath,
      diagnostics: [...gate.diagnostics],
    })),
  };
}

export function renderReadinessJson(run: ReadinessRun, options: JsonArtifactOptions = {}): string {
  return encodeArtifact(readinessJson(run), READINESS_SCHEMA_FILE, options);
}

export function renderReadinessMarkdown(run: ReadinessRun): string {
  const lines: string[] = [
    '# Release Readiness',
    '',
    `- generatedAt: ${run.generatedAt.toISOString()}`,
    `- overallStatus: ${run.overallPassed ? 'PASS' : 'FAIL'}`,
    `- pass: ${run.passCount}`,
    `- fail: ${run.failCount}`,
    `- missing: ${run.missingCount}`,
    '',
    '## Gates',
  ];

  if (run.gates.length === 0) {
    lines.push('- none');
  }
  for (const gate of run.gates) {
    lines.push(...renderGate(gate));
  }

  lines.push('', '## Missing Evidence Diagnostics');
  const missing = run.gates.filter((gate) => gate.status === 'MISSING');
  if (missing.length === 0) {
    lines.push('- none');
  }
  for (const gate of missing) {
    lines.push(`- ${gate.gateId}: ${gate.artifactPath}`);
    lines.push(...gate.diagnostics.map((diagnostic) => `  - ${escapeListItem(diagnostic)}`));
  }
  return finishDocument(lines);
}

function renderGate(gate: ReadinessGateResult): string[] {
  const lines = [
    `- ${gate.gateId}: ${gate.status} (artifact: ${gate.artifactPath})`,
    `  - kind: ${gate.kind}`,
    `  - artifactGeneratedAt: ${gate.artifactGeneratedAt ?? 'unknown'}`,
  ];
  for (const [key, value] of Object.entries(gate.metrics)) {
    lines.push(`  - metric ${key}: ${value}`);
  }
  for (const diagnostic of gate.diagnostics) {
    lines.push(`  - diagnostic: ${escapeListItem(diagnostic)}`);
  }
  return lines;
}
