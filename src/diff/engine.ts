/**
 * Structural diff between two scenario outcomes.
 */

import { EPHEMERAL_KEYS } from '../constants.js';
import type { ScenarioOutcome } from '../scenarios/types.js';
import {
  isNumericValue,
  isStructuredList,
  isStructuredMap,
  numericEquals,
  type StructuredMap,
  type StructuredValue,
} from '../scenarios/values.js';
import { FailureSignatureParser } from './failure-signature.js';
import { stripMapKeys } from './normalize.js';
import { createDiffEntry, type DiffEntry } from './types.js';

export const DIFF_NOTES = {
  MISSING_KEY: 'missing key',
  LIST_SIZE: 'list size mismatch',
  VALUE: 'value mismatch',
  ERROR_MESSAGE: 'error message mismatch',
} as const;

export interface DiffEngineOptions {
  /** Keys removed from successful command results before comparison */
  ephemeralKeys?: readonly string[];
  /** Failure suffix grammar; see {@link FailureSignatureParser} */
  failureSignaturePattern?: string;
}

export class DiffEngine {
  private readonly ephemeralKeys: ReadonlySet<string>;
  private readonly signatures: FailureSignatureParser;

  constructor(options: DiffEngineOptions = {}) {
    this.ephemeralKeys = new Set(options.ephemeralKeys ?? EPHEMERAL_KEYS);
    this.signatures = new FailureSignatureParser(options.failureSignaturePattern);
  }

  /**
   * Compare two outcomes. An empty list means the outcomes are equivalent.
   */
  compare(left: ScenarioOutcome, right: ScenarioOutcome): DiffEntry[] {
    const entries: DiffEntry[] = [];
    compareValue('$.success', left.success, right.success, entries);

    if (left.success && right.success) {
      compareValue(
        '$.commandResults',
        this.normalizeResults(left.commandResults),
        this.normalizeResults(right.commandResults),
        entries
      );
      return entries;
    }

    if (!left.success && !right.success) {
      if (!this.signatures.equivalent(left.errorMessage, right.errorMessage)) {
        entries.push(
          createDiffEntry('$.errorMessage', left.errorMessage, right.errorMessage, DIFF_NOTES.ERROR_MESSAGE)
        );
      }
      return entries;
    }

    entries.push(
      createDiffEntry(
        '$.errorMessage',
        left.success ? null : left.errorMessage,
        right.success ? null : right.errorMessage,
        DIFF_NOTES.ERROR_MESSAGE
      )
    );
    return entries;
  }

  private normalizeResults(results: readonly StructuredMap[]): StructuredMap[] {
    return results.map((result) => stripMapKeys(result, this.ephemeralKeys));
  }
}

/**
 * Recursive value comparison, appending one entry per divergence.
 */
export function compareValue(
  path: string,
  left: StructuredValue,
  right: StructuredValue,
  entries: DiffEntry[]
): void {
  if (valuesEqual(left, right)) {
    return;
  }
  if (isStructuredMap(left) && isStructuredMap(right)) {
    compareMap(path, left, right, entries);
    return;
  }
  if (isStructuredList(left) && isStructuredList(right)) {
    compareList(path, left, right, entries);
    return;
  }
  entries.push(createDiffEntry(path, left, right, DIFF_NOTES.VALUE));
}

function compareMap(path: string, left: StructuredMap, right: StructuredMap, entries: DiffEntry[]): void {
  const keys = [...new Set([...Object.keys(left), ...Object.keys(right)])].sort();
  for (const key of keys) {
    const hasLeft = Object.hasOwn(left, key);
    const hasRight = Object.hasOwn(right, key);
    if (!hasLeft || !hasRight) {
      entries.push(
        createDiffEntry(
          `${path}.${key}`,
          hasLeft ? left[key] : undefined,
          hasRight ? right[key] : undefined,
          DIFF_NOTES.MISSING_KEY
        )
      );
      continue;
    }
    compareValue(`${path}.${key}`, left[key], right[key], entries);
  }
}

function compareList(
  path: string,
  left: readonly StructuredValue[],
  right: readonly StructuredValue[],
  entries: DiffEntry[]
): void {
  if (left.length !== right.length) {
    entries.push(createDiffEntry(`${path}.length`, left.length, right.length, DIFF_NOTES.LIST_SIZE));
  }
  const limit = Math.min(left.length, right.length);
  for (let i = 0; i < limit; i++) {
    compareValue(`${path}[${i}]`, left[i], right[i], entries);
  }
}

function valuesEqual(left: StructuredValue, right: StructuredValue): boolean {
  if (left === right) {
    return true;
  }
  if (isNumericValue(left) && isNumericValue(right)) {
    return numericEquals(left, right);
  }
  return false;
}
