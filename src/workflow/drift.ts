/**
 * `drift` workflow: score how far a candidate fixture snapshot has moved
 * from a baseline snapshot.
 *
 * Snapshot files are YAML or JSON mapping each namespace to its documents:
 *
 * ```yaml
 * app.users:
 *   - { _id: 1, email: a@example.test, plan: free }
 *   - { _id: 2, email: b@example.test, plan: null }
 * app.orders: []
 * ```
 */

import { existsSync, readFileSync } from 'fs';
import { z } from 'zod';
import { PATHS } from '../constants.js';
import { renderDriftJson, renderDriftMarkdown } from '../docs/drift.js';
import { ConfigError, ValidationError } from '../errors/types.js';
import { getLogger } from '../logging/logger.js';
import { toStructuredMap, type StructuredMap } from '../scenarios/values.js';
import { analyzeDrift, type DriftReport, type FixtureSnapshot } from '../summary/drift.js';
import { parseYamlDocument } from '../utils/yaml-parser.js';
import { contextClock, writeArtifactPair, type ArtifactPaths, type WorkflowContext } from './context.js';

const logger = getLogger('workflow');

const snapshotSchema = z.record(z.array(z.unknown()));

export interface DriftResult {
  readonly report: DriftReport;
  readonly artifacts: ArtifactPaths;
}

export function loadFixtureSnapshot(path: string): FixtureSnapshot {
  if (!existsSync(path)) {
    throw new ValidationError(`Fixture snapshot not found: ${path}`, 'drift');
  }

  const document = parseYamlDocument(readFileSync(path, 'utf-8'), path, { losslessNumbers: true });
  const parsed = snapshotSchema.safeParse(document ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new ValidationError(
      `Invalid fixture snapshot ${path}${where}: expected namespaces mapped to lists of documents`
    );
  }

  const snapshot: Record<string, StructuredMap[]> = {};
  for (const [namespace, documents] of Object.entries(parsed.data)) {
    snapshot[namespace] = documents.map((document, index) => toStructuredMap(document, `${namespace}[${index}]`));
  }
  return snapshot;
}

export function runDrift(context: WorkflowContext): DriftResult {
  const { config } = context;
  const baselinePath = config.drift.baseline;
  const candidatePath = config.drift.candidate;
  if (baselinePath === undefined || candidatePath === undefined) {
    throw new ConfigError('drift.baseline and drift.candidate are required', { operation: 'runDrift' });
  }

  const report = analyzeDrift(
    loadFixtureSnapshot(baselinePath),
    loadFixtureSnapshot(candidatePath),
    config.drift.warnThreshold,
    config.drift.failThreshold
  );
  const generatedAt = contextClock(context)();

  const artifacts = writeArtifactPair(
    config.output.dir,
    { json: PATHS.DRIFT_JSON, markdown: PATHS.DRIFT_MARKDOWN },
    {
      json: renderDriftJson(report, generatedAt, { validate: config.output.validateArtifacts }),
      markdown: renderDriftMarkdown(report, generatedAt),
    }
  );

  logger.info(
    {
      collections: report.collections.length,
      warning: report.warningCollections,
      failing: report.failingCollections,
    },
    'Fixture drift analyzed'
  );
  return { report, artifacts };
}
