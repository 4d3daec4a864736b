/**
 * Fixture drift report (JSON and Markdown).
 */

import type { CollectionDrift, DriftReport, FieldDrift } from '../summary/drift.js';
import type { JsonValue } from '../scenarios/values.js';
import { buildTable } from '../utils/markdown.js';
import { encodeArtifact, type JsonArtifactOptions } from './json.js';
import { finishDocument } from './shared.js';

export const DRIFT_SCHEMA_FILE = 'schemas/fixture-drift.schema.json';

export function driftJson(report: DriftReport, generatedAt: Date): { [key: string]: JsonValue } {
  return {
    generatedAt: generatedAt.toISOString(),
    overallStatus: report.hasFailures ? 'FAIL' : 'PASS',
    warnThreshold: report.warnThreshold,
    failThreshold: report.failThreshold,
    summary: {
      collections: report.collections.length,
      warning: report.warningCollections,
      failing: report.failingCollections,
    },
    collections: report.collections.map((collection, index) => ({
      rank: index + 1,
      namespace: collection.namespace,
      score: collection.score,
      status: collection.status.toLowerCase(),
      baselineCount: collection.baselineCount,
      candidateCount: collection.candidateCount,
      rowCountDelta: collection.rowCountDelta,
      avgNullRatioDelta: collection.avgNullRatioDelta,
      avgCardinalityDelta: collection.avgCardinalityDelta,
      maxDistributionDelta: collection.maxDistributionDelta,
      topFields: collection.topFields.map(fieldJson),
    })),
  };
}

export function renderDriftJson(report: DriftReport, generatedAt: Date, options: JsonArtifactOptions = {}): string {
  return encodeArtifact(driftJson(report, generatedAt), DRIFT_SCHEMA_FILE, options);
}

export function renderDriftMarkdown(report: DriftReport, generatedAt: Date): string {
  const lines: string[] = [
    '# Fixture Drift',
    '',
    `- generatedAt: ${generatedAt.toISOString()}`,
    `- overallStatus: ${report.hasFailures ? 'FAIL' : 'PASS'}`,
    `- warnThreshold: ${fixed(report.warnThreshold)}`,
    `- failThreshold: ${fixed(report.failThreshold)}`,
    `- collections: ${report.collections.length}`,
    `- warning: ${report.warningCollections}`,
    `- failing: ${report.failingCollections}`,
    '',
  ];

  if (report.collections.length === 0) {
    lines.push('No collections compared.');
    return finishDocument(lines);
  }

  lines.push(
    buildTable(
      ['rank', 'namespace', 'score', 'status', 'rowDelta', 'nullDelta', 'cardDelta', 'distDelta'],
      report.collections.map(tableRow),
      ['right', 'left', 'right', 'left', 'right', 'right', 'right', 'right']
    ),
    ''
  );

  for (const collection of report.collections) {
    if (collection.topFields.length === 0) {
      continue;
    }
    lines.push(`## ${collection.namespace} (Top Field Drift)`, ...collection.topFields.map(renderField), '');
  }
  return finishDocument(lines);
}

function tableRow(collection: CollectionDrift, index: number): string[] {
  return [
    String(index + 1),
    collection.namespace,
    fixed(collection.score),
    collection.status.toLowerCase(),
    fixed(collection.rowCountDelta),
    fixed(collection.avgNullRatioDelta),
    fixed(collection.avgCardinalityDelta),
    fixed(collection.maxDistributionDelta),
  ];
}

function renderField(field: FieldDrift): string {
  return `- ${field.field}: nullDelta=${fixed(field.nullRatioDelta)}, cardDelta=${fixed(field.cardinalityDelta)}, distDelta=${fixed(field.distributionDelta)}`;
}

function fieldJson(field: FieldDrift): JsonValue {
  return {
    field: field.field,
    baselineNullRatio: field.baselineNullRatio,
    candidateNullRatio: field.candidateNullRatio,
    nullRatioDelta: field.nullRatioDelta,
    baselineCardinality: field.baselineCardinality,
    candidateCardinality: field.candidateCardinality,
    cardinalityDelta: field.cardinalityDelta,
    distributionDelta: field.distributionDelta,
  };
}

function fixed(value: number): string {
  return value.toFixed(4);
}
