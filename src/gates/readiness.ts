/**
 * Release-readiness rollup over gate artifacts written by earlier runs.
 *
 * Each gate points at a JSON artifact on disk:
 * - missing file: MISSING
 * - unreadable or not a JSON object: FAIL
 * - otherwise the gate kind decides PASS or FAIL
 *
 * Every gate is evaluated and every diagnostic kept, so a single rollup
 * lists all problems. The rollup passes only when every gate passes;
 * missing evidence never counts as passing, and neither does an empty gate
 * list.
 */

import { existsSync, readFileSync } from 'fs';
import { z } from 'zod';
import { EvidenceError, getErrorMessage } from '../errors/types.js';
import type { Clock } from '../harness/harness.js';
import { getLogger } from '../logging/logger.js';
import { requireText } from '../utils/preconditions.js';

const logger = getLogger('readiness');

export const READINESS_KINDS = ['overall-status', 'differential-summary'] as const;

/**
 * - `overall-status`: the artifact's `overallStatus` must be `"PASS"`;
 *   numeric `metrics` are carried over.
 * - `differential-summary`: `summary.total > 0`, `summary.mismatch == 0`
 *   and `summary.error == 0`.
 */
export type ReadinessKind = (typeof READINESS_KINDS)[number];

export type ReadinessStatus = 'PASS' | 'FAIL' | 'MISSING';

export interface ReadinessGateSpec {
  id: string;
  kind: ReadinessKind;
  artifact: string;
}

export interface ReadinessGateResult {
  readonly gateId: string;
  readonly kind: ReadinessKind;
  readonly status: ReadinessStatus;
  readonly artifactPath: string;
  readonly artifactGeneratedAt: string | null;
  readonly metrics: Readonly<Record<string, number>>;
  readonly diagnostics: readonly string[];
}

export interface ReadinessRun {
  readonly generatedAt: Date;
  readonly gates: readonly ReadinessGateResult[];
  readonly overallPassed: boolean;
  readonly passCount: number;
  readonly failCount: number;
  readonly missingCount: number;
}

type ArtifactRoot = Record<string, unknown>;

const artifactRootSchema = z.record(z.unknown());
const integerSchema = z.number().int();
const numberSchema = z.number().finite();
const stringSchema = z.string();

/**
 * Read a gate artifact as a JSON object.
 *
 * @throws EvidenceError when the file cannot be read or is not a JSON object
 */
export function readEvidence(path: string): ArtifactRoot {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new EvidenceError(getErrorMessage(error), path, error instanceof Error ? error : undefined);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new EvidenceError(getErrorMessage(error), path, error instanceof Error ? error : undefined);
  }

  const root = artifactRootSchema.safeParse(parsed);
  if (!root.success) {
    throw new EvidenceError('expected a JSON object', path);
  }
  return root.data;
}

export class ReadinessAggregator {
  private readonly clock: Clock;

  constructor(clock: Clock = () => new Date()) {
    this.clock = clock;
  }

  run(gates: readonly ReadinessGateSpec[]): ReadinessRun {
    const results = gates.map((gate) => this.evaluate(gate));
    const passCount = results.filter((r) => r.status === 'PASS').length;
    const missingCount = results.filter((r) => r.status === 'MISSING').length;
    if (results.length === 0) {
      logger.warn('No readiness gates to evaluate; rollup fails');
    }

    return {
      generatedAt: this.clock(),
      gates: results,
      overallPassed: results.length > 0 && passCount === results.length,
      passCount,
      failCount: results.length - passCount - missingCount,
      missingCount,
    };
  }

  evaluate(gate: ReadinessGateSpec): ReadinessGateResult {
    const gateId = requireText(gate.id, 'gateId');
    const artifactPath = requireText(gate.artifact, 'artifact');
    const base = { gateId, kind: gate.kind, artifactPath };

    if (!existsSync(artifactPath)) {
      logger.debug({ gateId, artifactPath }, 'Gate evidence missing');
      return {
        ...base,
        status: 'MISSING',
        artifactGeneratedAt: null,
        metrics: {},
        diagnostics: [`missing artifact: ${artifactPath}`],
      };
    }

    let root: ArtifactRoot;
    try {
      root = readEvidence(artifactPath);
    } catch (error) {
      if (!(error instanceof EvidenceError)) {
        throw error;
      }
      return {
        ...base,
        status: 'FAIL',
        artifactGeneratedAt: null,
        metrics: {},
        diagnostics: [`invalid JSON artifact: ${error.message}`],
      };
    }

    const artifactGeneratedAt = readString(root.generatedAt);
    const verdict = gate.kind === 'overall-status' ? checkOverallStatus(root) : checkDifferentialSummary(root);
    logger.debug({ gateId, status: verdict.status }, 'Gate evaluated');
    return { ...base, artifactGeneratedAt, ...verdict };
  }
}

interface Verdict {
  status: ReadinessStatus;
  metrics: Record<string, number>;
  diagnostics: string[];
}

function checkOverallStatus(root: ArtifactRoot): Verdict {
  const metrics: Record<string, number> = {};
  const metricSource = artifactRootSchema.safeParse(root.metrics);
  if (metricSource.success) {
    for (const [key, value] of Object.entries(metricSource.data)) {
      const parsed = numberSchema.safeParse(value);
      if (parsed.success) {
        metrics[key] = parsed.data;
      }
    }
  }

  const overallStatus = readString(root.overallStatus);
  if (overallStatus === 'PASS') {
    return { status: 'PASS', metrics, diagnostics: [] };
  }
  const diagnostic =
    overallStatus === 'FAIL'
      ? 'artifact overallStatus=FAIL'
      : `artifact overallStatus missing or invalid: ${overallStatus ?? 'null'}`;
  return { status: 'FAIL', metrics, diagnostics: [diagnostic] };
}

function checkDifferentialSummary(root: ArtifactRoot): Verdict {
  const summary = artifactRootSchema.safeParse(root.summary);
  if (!summary.success) {
    return { status: 'FAIL', metrics: {}, diagnostics: ['missing summary object'] };
  }

  const total = readInteger(summary.data.total);
  const mismatch = readInteger(summary.data.mismatch);
  const error = readInteger(summary.data.error);
  const passRate = readNumber(summary.data.passRate);

  const metrics: Record<string, number> = {};
  for (const [key, value] of Object.entries({ total, mismatch, error, passRate })) {
    if (value !== null) {
      metrics[key] = value;
    }
  }

  const diagnostics: string[] = [];
  if (total === null || total <= 0) {
    diagnostics.push('expected summary.total > 0');
  }
  if (mismatch === null) {
    diagnostics.push('missing summary.mismatch');
  }
  if (error === null) {
    diagnostics.push('missing summary.error');
  }
  if (diagnostics.length > 0 || mismatch === null || error === null) {
    return { status: 'FAIL', metrics, diagnostics };
  }

  if (mismatch !== 0) {
    diagnostics.push(`expected mismatch=0 but was ${mismatch}`);
  }
  if (error !== 0) {
    diagnostics.push(`expected error=0 but was ${error}`);
  }
  return { status: diagnostics.length === 0 ? 'PASS' : 'FAIL', metrics, diagnostics };
}

function readString(value: unknown): string | null {
  const parsed = stringSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

function readInteger(value: unknown): number | null {
  const parsed = integerSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

function readNumber(value: unknown): number | null {
  const parsed = numberSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}
