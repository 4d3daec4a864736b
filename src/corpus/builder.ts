/**
 * Deterministic corpus builder.
 *
 * Grows a small template catalogue into a large, reproducible corpus:
 *
 * 1. Templates are sorted by id and kept as-is.
 * 2. Passes over the templates add variants `v0001`, `v0002`, ... until the
 *    target size is reached. Each variant rewrites only identity fields
 *    (collection names, session ids, emails, transaction numbers, `_id`s)
 *    so the same logical scenario replays against fresh data.
 * 3. The list is shuffled with a generator seeded from the seed text and
 *    truncated to the target size.
 *
 * The same templates, seed and size always produce the same corpus.
 */

import Decimal from 'decimal.js';
import { CORPUS_DEFAULTS } from '../constants.js';
import { ValidationError } from '../errors/types.js';
import { getLogger } from '../logging/logger.js';
import { createCommand, createScenario, type Scenario, type ScenarioCommand } from '../scenarios/types.js';
import {
  isDecimal,
  isStructuredList,
  isStructuredMap,
  type NumericValue,
  type StructuredMap,
  type StructuredValue,
} from '../scenarios/values.js';
import { requirePositiveInteger } from '../utils/preconditions.js';
import { SeededRandom, seededShuffle } from './random.js';
import { deterministicSeed } from './seed.js';

const logger = getLogger('corpus');

interface VariantContext {
  readonly index: number;
  readonly tag: string;
  /** Added to every `_id` on top of the per-variant stride */
  readonly idOffset: bigint;
  readonly scenarioId: string;
}

/**
 * Build a corpus of exactly `size` scenarios (fewer only when `size` is
 * smaller than the template count, in which case templates are sampled).
 */
export function buildCorpus(templates: readonly Scenario[], seedText: string, size: number): Scenario[] {
  requirePositiveInteger(size, 'size');
  const seed = deterministicSeed(seedText);
  if (templates.length === 0) {
    throw new ValidationError('templates must not be empty', 'templates');
  }

  const sorted = [...templates].sort((a, b) => compareIds(a.id, b.id));
  const expanded = expandTemplates(sorted, seed, size);
  const shuffled = seededShuffle(expanded, new SeededRandom(seed));

  logger.debug(
    { templates: sorted.length, expanded: expanded.length, size, seed: seed.toString() },
    'Built corpus'
  );
  return shuffled.slice(0, size);
}

/**
 * Zero-padded variant tag, e.g. `v0007`.
 */
export function variantTag(index: number): string {
  return `v${String(index).padStart(4, '0')}`;
}

function expandTemplates(templates: readonly Scenario[], seed: bigint, targetSize: number): Scenario[] {
  const expanded = [...templates];
  const idOffset = seed % BigInt(CORPUS_DEFAULTS.ID_SEED_MODULUS);

  for (let index = 1; expanded.length < targetSize; index++) {
    for (const template of templates) {
      if (expanded.length >= targetSize) {
        break;
      }
      expanded.push(variantScenario(template, index, idOffset));
    }
  }
  return expanded;
}

function variantScenario(template: Scenario, index: number, idOffset: bigint): Scenario {
  const tag = variantTag(index);
  const id = `${tag}.${template.id}`;
  const context: VariantContext = { index, tag, idOffset, scenarioId: id };
  return createScenario({
    id,
    description: `${template.description} [variant ${tag}]`,
    commands: template.commands.map((command) => variantCommand(command, context)),
  });
}

function variantCommand(command: ScenarioCommand, context: VariantContext): ScenarioCommand {
  return createCommand(command.commandName, rewriteMap(command.payload, null, context));
}

function rewriteMap(map: StructuredMap, parentKey: string | null, context: VariantContext): StructuredMap {
  return Object.fromEntries(
    Object.entries(map).map(([key, value]): [string, StructuredValue] => [
      key,
      rewriteValue(key, parentKey, value, context),
    ])
  );
}

/**
 * Rewrite one value. `key` is the map key holding the value (null for list
 * elements) and `parentKey` the key holding the enclosing container; list
 * elements inherit the list's key as their parent.
 */
function rewriteValue(
  key: string | null,
  parentKey: string | null,
  value: StructuredValue,
  context: VariantContext
): StructuredValue {
  if (isStructuredList(value)) {
    return value.map((item) => rewriteValue(null, key, item, context));
  }
  if (isStructuredMap(value)) {
    return rewriteMap(value, key, context);
  }
  if (typeof value === 'string') {
    return rewriteString(key, parentKey, value, context.tag);
  }
  if (typeof value === 'number' || typeof value === 'bigint' || isDecimal(value)) {
    return rewriteNumber(key, value, context);
  }
  return value;
}

function rewriteString(key: string | null, parentKey: string | null, value: string, tag: string): string {
  if (key === 'collection') {
    return `${value}_${tag}`;
  }
  if (key === 'id' && parentKey === 'lsid') {
    return `${value}-${tag}`;
  }
  if (key === 'email') {
    const at = value.indexOf('@');
    if (at > 0 && at < value.length - 1) {
      return `${value.slice(0, at)}+${tag}${value.slice(at)}`;
    }
  }
  return value;
}

function rewriteNumber(key: string | null, value: NumericValue, context: VariantContext): NumericValue {
  if (key === 'txnNumber') {
    return addInteger(value, BigInt(context.index), key, context);
  }
  if (key === '_id') {
    const shift = BigInt(context.index) * BigInt(CORPUS_DEFAULTS.ID_STRIDE) + context.idOffset;
    return addInteger(value, shift, key, context);
  }
  return value;
}

/**
 * Add an integer to an identity field, keeping its numeric variant. A
 * `number` that would leave the safe-integer range is widened to `bigint`.
 */
function addInteger(value: NumericValue, delta: bigint, key: string, context: VariantContext): NumericValue {
  if (typeof value === 'bigint') {
    return value + delta;
  }
  if (isDecimal(value)) {
    if (!value.isInteger()) {
      throw nonIntegerIdentity(key, value.toString(), context);
    }
    return value.plus(new Decimal(delta.toString()));
  }
  if (!Number.isSafeInteger(value)) {
    throw nonIntegerIdentity(key, String(value), context);
  }
  const sum = BigInt(value) + delta;
  return sum <= BigInt(Number.MAX_SAFE_INTEGER) && sum >= BigInt(Number.MIN_SAFE_INTEGER) ? Number(sum) : sum;
}

function nonIntegerIdentity(key: string, value: string, context: VariantContext): ValidationError {
  return new ValidationError(`${key} must be an integer to be rewritten, got ${value}`, key, {
    scenarioId: context.scenarioId,
  });
}

function compareIds(a: string, b: string): number {
  if (a < b) {
    return -1;
  }
  return a > b ? 1 : 0;
}
