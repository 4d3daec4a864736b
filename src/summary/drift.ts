/**
 * Fixture drift scoring.
 *
 * Compares two snapshots of fixture data (namespace -> documents) and scores
 * how far the candidate has moved from the baseline. Per top-level field:
 *
 * - null-ratio delta: change in the share of documents where the field is
 *   absent or null
 * - cardinality delta: relative change in the number of distinct values
 * - distribution delta: total-variation distance between value histograms
 *
 * Per namespace the score is
 * `0.4 * rowCountDelta + 0.2 * avgNullDelta + 0.2 * avgCardinalityDelta + 0.2 * maxDistributionDelta`.
 * All figures are rounded half-up to four decimal places.
 */

import Decimal from 'decimal.js';
import { DRIFT_DEFAULTS } from '../constants.js';
import { ValidationError } from '../errors/types.js';
import {
  canonicalJson,
  isNumericValue,
  isStructuredList,
  type StructuredMap,
  type StructuredValue,
} from '../scenarios/values.js';
import { requireRatio } from '../utils/preconditions.js';

export type DriftStatus = 'OK' | 'WARN' | 'FAIL';

/** Namespace (e.g. `app.users`) to its documents */
export type FixtureSnapshot = Readonly<Record<string, readonly StructuredMap[]>>;

export interface FieldDrift {
  readonly field: string;
  readonly baselineNullRatio: number;
  readonly candidateNullRatio: number;
  readonly nullRatioDelta: number;
  readonly baselineCardinality: number;
  readonly candidateCardinality: number;
  readonly cardinalityDelta: number;
  readonly distributionDelta: number;
}

export interface CollectionDrift {
  readonly namespace: string;
  readonly baselineCount: number;
  readonly candidateCount: number;
  readonly rowCountDelta: number;
  readonly avgNullRatioDelta: number;
  readonly avgCardinalityDelta: number;
  readonly maxDistributionDelta: number;
  readonly score: number;
  readonly status: DriftStatus;
  readonly topFields: readonly FieldDrift[];
  readonly fields: readonly FieldDrift[];
}

export interface DriftReport {
  readonly warnThreshold: number;
  readonly failThreshold: number;
  /** Ranked by score, highest first */
  readonly collections: readonly CollectionDrift[];
  readonly warningCollections: number;
  readonly failingCollections: number;
  readonly hasFailures: boolean;
}

interface FieldStats {
  nullRatio: number;
  cardinality: number;
  distribution: Map<string, number>;
}

const WEIGHTS = {
  ROW_COUNT: 0.4,
  NULL_RATIO: 0.2,
  CARDINALITY: 0.2,
  DISTRIBUTION: 0.2,
} as const;

export function analyzeDrift(
  baseline: FixtureSnapshot,
  candidate: FixtureSnapshot,
  warnThreshold: number = DRIFT_DEFAULTS.WARN_THRESHOLD,
  failThreshold: number = DRIFT_DEFAULTS.FAIL_THRESHOLD
): DriftReport {
  requireRatio(warnThreshold, 'warnThreshold');
  requireRatio(failThreshold, 'failThreshold');
  if (warnThreshold > failThreshold) {
    throw new ValidationError('warnThreshold must be <= failThreshold', 'warnThreshold');
  }

  const namespaces = [...new Set([...Object.keys(baseline), ...Object.keys(candidate)])].sort();
  const collections = namespaces
    .map((namespace) =>
      analyzeCollection(namespace, baseline[namespace] ?? [], candidate[namespace] ?? [], warnThreshold, failThreshold)
    )
    .sort((a, b) => b.score - a.score);

  const warningCollections = collections.filter((c) => c.status === 'WARN').length;
  const failingCollections = collections.filter((c) => c.status === 'FAIL').length;
  return {
    warnThreshold,
    failThreshold,
    collections,
    warningCollections,
    failingCollections,
    hasFailures: failingCollections > 0,
  };
}

function analyzeCollection(
  namespace: string,
  baselineDocs: readonly StructuredMap[],
  candidateDocs: readonly StructuredMap[],
  warnThreshold: number,
  failThreshold: number
): CollectionDrift {
  const rowCountDelta = ratioDelta(candidateDocs.length, baselineDocs.length);
  const fieldNames = new Set<string>();
  for (const doc of [...baselineDocs, ...candidateDocs]) {
    for (const key of Object.keys(doc)) {
      fieldNames.add(key);
    }
  }

  const fields = [...fieldNames].sort().map((field): FieldDrift => {
    const before = fieldStats(baselineDocs, field);
    const after = fieldStats(candidateDocs, field);
    return {
      field,
      baselineNullRatio: before.nullRatio,
      candidateNullRatio: after.nullRatio,
      nullRatioDelta: round4(Math.abs(after.nullRatio - before.nullRatio)),
      baselineCardinality: before.cardinality,
      candidateCardinality: after.cardinality,
      cardinalityDelta: round4(ratioDelta(after.cardinality, before.cardinality)),
      distributionDelta: round4(distributionDelta(before.distribution, after.distribution)),
    };
  });

  const avgNullRatioDelta = round4(average(fields.map((f) => f.nullRatioDelta)));
  const avgCardinalityDelta = round4(average(fields.map((f) => f.cardinalityDelta)));
  const maxDistributionDelta = round4(Math.max(0, ...fields.map((f) => f.distributionDelta)));
  const score = round4(
    rowCountDelta * WEIGHTS.ROW_COUNT +
      avgNullRatioDelta * WEIGHTS.NULL_RATIO +
      avgCardinalityDelta * WEIGHTS.CARDINALITY +
      maxDistributionDelta * WEIGHTS.DISTRIBUTION
  );

  const topFields = [...fields]
    .sort(
      (a, b) =>
        b.distributionDelta - a.distributionDelta ||
        b.nullRatioDelta - a.nullRatioDelta ||
        b.cardinalityDelta - a.cardinalityDelta
    )
    .slice(0, DRIFT_DEFAULTS.TOP_FIELDS);

  return {
    namespace,
    baselineCount: baselineDocs.length,
    candidateCount: candidateDocs.length,
    rowCountDelta,
    avgNullRatioDelta,
    avgCardinalityDelta,
    maxDistributionDelta,
    score,
    status: statusFor(score, warnThreshold, failThreshold),
    topFields,
    fields,
  };
}

function fieldStats(docs: readonly StructuredMap[], field: string): FieldStats {
  const distribution = new Map<string, number>();
  let nullCount = 0;
  for (const doc of docs) {
    const value = Object.hasOwn(doc, field) ? doc[field] : null;
    if (value === null) {
      nullCount++;
      continue;
    }
    const key = distributionKey(value);
    distribution.set(key, (distribution.get(key) ?? 0) + 1);
  }
  return {
    nullRatio: docs.length === 0 ? 0 : round4(nullCount / docs.length),
    cardinality: distribution.size,
    distribution,
  };
}

/**
 * Histogram bucket of a non-null value, prefixed by kind so that `"1"` and
 * `1` land in different buckets.
 */
function distributionKey(value: Exclude<StructuredValue, null>): string {
  if (typeof value === 'string') {
    return `str:${value}`;
  }
  if (typeof value === 'boolean') {
    return `bool:${value}`;
  }
  if (isNumericValue(value)) {
    return `num:${canonicalJson(value)}`;
  }
  if (isStructuredList(value)) {
    return `arr:${canonicalJson(value)}`;
  }
  return `doc:${canonicalJson(value)}`;
}

/**
 * Total-variation distance between two histograms, in [0, 1].
 */
function distributionDelta(baseline: Map<string, number>, candidate: Map<string, number>): number {
  const baselineTotal = sum(baseline.values());
  const candidateTotal = sum(candidate.values());
  if (baselineTotal === 0 && candidateTotal === 0) {
    return 0;
  }

  let tvd = 0;
  for (const key of new Set([...baseline.keys(), ...candidate.keys()])) {
    const before = baselineTotal === 0 ? 0 : (baseline.get(key) ?? 0) / baselineTotal;
    const after = candidateTotal === 0 ? 0 : (candidate.get(key) ?? 0) / candidateTotal;
    tvd += Math.abs(before - after);
  }
  return tvd * 0.5;
}

function ratioDelta(current: number, baseline: number): number {
  return round4(Math.abs(current - baseline) / Math.max(1, baseline));
}

function statusFor(score: number, warnThreshold: number, failThreshold: number): DriftStatus {
  if (score >= failThreshold) {
    return 'FAIL';
  }
  return score >= warnThreshold ? 'WARN' : 'OK';
}

function average(values: readonly number[]): number {
  return values.length === 0 ? 0 : sum(values) / values.length;
}

function sum(values: Iterable<number>): number {
  let total = 0;
  for (const value of values) {
    total += value;
  }
  return total;
}

export function round4(value: number): number {
  return new Decimal(value).toDecimalPlaces(4, Decimal.ROUND_HALF_UP).toNumber();
}
