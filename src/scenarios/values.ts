/**
 * Structured values exchanged with backends.
 *
 * A closed set of variants: null, booleans, the three numeric variants
 * (`number`, `bigint`, `Decimal`), strings, lists and string-keyed maps.
 * Maps keep insertion order. Relaxed Extended JSON wrappers
 * (`$numberLong`, `$numberDecimal`, ...) are accepted on input and produced
 * by {@link toJsonValue} so artifacts keep the numeric variant.
 */

import Decimal from 'decimal.js';
import { ValidationError } from '../errors/types.js';

export type NumericValue = number | bigint | Decimal;

export interface StructuredMap {
  readonly [key: string]: StructuredValue;
}

export type StructuredValue =
  | null
  | boolean
  | NumericValue
  | string
  | readonly StructuredValue[]
  | StructuredMap;

/** JSON-compatible rendition of a structured value. */
export type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };

export function isDecimal(value: unknown): value is Decimal {
  return Decimal.isDecimal(value);
}

export function isNumericValue(value: unknown): value is NumericValue {
  return typeof value === 'number' || typeof value === 'bigint' || isDecimal(value);
}

export function isStructuredList(
  value: StructuredValue | undefined
): value is readonly StructuredValue[] {
  return Array.isArray(value);
}

export function isStructuredMap(value: StructuredValue | undefined): value is StructuredMap {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !isDecimal(value);
}

/**
 * Exact decimal form of a numeric value, or null for NaN and infinities.
 */
export function toDecimal(value: NumericValue): Decimal | null {
  if (isDecimal(value)) {
    return value.isFinite() ? value : null;
  }
  if (typeof value === 'bigint') {
    return new Decimal(value.toString());
  }
  return Number.isFinite(value) ? new Decimal(String(value)) : null;
}

/**
 * Numeric equality across variants: `2`, `2n`, `Decimal('2.00')` are equal.
 */
export function numericEquals(left: NumericValue, right: NumericValue): boolean {
  if (typeof left === 'number' && typeof right === 'number' && Object.is(left, right)) {
    return true;
  }
  const l = toDecimal(left);
  const r = toDecimal(right);
  if (l === null || r === null) {
    return false;
  }
  return l.eq(r);
}

/**
 * Deep copy of a value. Lists and maps are rebuilt and frozen; `Decimal`
 * instances are immutable and shared.
 */
export function cloneValue(value: StructuredValue): StructuredValue {
  if (isStructuredList(value)) {
    return Object.freeze(value.map((item) => cloneValue(item)));
  }
  if (isStructuredMap(value)) {
    return cloneMap(value);
  }
  return value;
}

export function cloneMap(map: StructuredMap): StructuredMap {
  return Object.freeze(
    Object.fromEntries(Object.entries(map).map(([key, item]): [string, StructuredValue] => [key, cloneValue(item)]))
  );
}

/**
 * Sorted-key JSON used for fingerprints and distribution keys. Numeric
 * variants print in their decimal form; a missing value prints as `null`.
 */
export function canonicalJson(value: StructuredValue | undefined): string {
  if (value === undefined || value === null) {
    return 'null';
  }
  if (typeof value === 'boolean') {
    return value ? 'true' : 'false';
  }
  if (typeof value === 'string') {
    return JSON.stringify(value);
  }
  if (typeof value === 'number' || typeof value === 'bigint') {
    return String(value);
  }
  if (isDecimal(value)) {
    return value.toString();
  }
  if (isStructuredList(value)) {
    return `[${value.map((item) => canonicalJson(item)).join(',')}]`;
  }
  const keys = Object.keys(value).sort();
  return `{${keys.map((key) => `${JSON.stringify(key)}:${canonicalJson(value[key])}`).join(',')}}`;
}

/**
 * Convert to plain JSON, wrapping variants JSON cannot carry.
 */
export function toJsonValue(value: StructuredValue | undefined): JsonValue {
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value === 'boolean' || typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : { $numberDouble: String(value) };
  }
  if (typeof value === 'bigint') {
    return { $numberLong: value.toString() };
  }
  if (isDecimal(value)) {
    return { $numberDecimal: value.toString() };
  }
  if (isStructuredList(value)) {
    return value.map((item) => toJsonValue(item));
  }
  return Object.fromEntries(
    Object.entries(value).map(([key, item]): [string, JsonValue] => [key, toJsonValue(item)])
  );
}

/**
 * Convert untrusted parsed input (JSON or YAML) into a structured value.
 *
 * @param path - location used in error messages
 */
export function toStructuredValue(input: unknown, path = '$'): StructuredValue {
  if (input === null || typeof input === 'boolean' || typeof input === 'string') {
    return input;
  }
  if (typeof input === 'number' || typeof input === 'bigint') {
    return input;
  }
  if (isDecimal(input)) {
    return input;
  }
  if (Array.isArray(input)) {
    return Object.freeze(input.map((item: unknown, index) => toStructuredValue(item, `${path}[${index}]`)));
  }
  if (typeof input === 'object') {
    const entries = Object.entries(input);
    const wrapped = entries.length === 1 ? unwrapNumeric(entries[0][0], entries[0][1], path) : undefined;
    if (wrapped !== undefined) {
      return wrapped;
    }
    // fromEntries defines keys as own properties, so `__proto__` stays a key
    const map = Object.fromEntries(
      entries.map(([key, item]): [string, StructuredValue] => [key, toStructuredValue(item, `${path}.${key}`)])
    );
    return Object.freeze(map);
  }
  throw new ValidationError(`unsupported value type at ${path}: ${typeof input}`, path);
}

const INTEGER_LITERAL = /^[-+]?[0-9]+$/;

/**
 * Numeric value of a JSON or YAML number literal, without rounding through a
 * double. Integers outside the safe range become `bigint`; other literals
 * become a `Decimal` unless a `number` holds them exactly.
 *
 * @throws ValidationError when the text is not a decimal number
 */
export function parseNumericLiteral(text: string): NumericValue {
  if (INTEGER_LITERAL.test(text)) {
    const integer = BigInt(text);
    return Number.isSafeInteger(Number(integer)) ? Number(integer) : integer;
  }

  let exact: Decimal;
  try {
    exact = new Decimal(text);
  } catch (error) {
    throw new ValidationError(
      `invalid number literal ${JSON.stringify(text)}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  const approximate = Number(text);
  return Number.isFinite(approximate) && exact.eq(new Decimal(approximate)) ? approximate : exact;
}

/**
 * Convert untrusted input that must be a map.
 */
export function toStructuredMap(input: unknown, path = '$'): StructuredMap {
  const value = toStructuredValue(input, path);
  if (!isStructuredMap(value)) {
    throw new ValidationError(`expected an object at ${path}`, path);
  }
  return value;
}

function unwrapNumeric(key: string, raw: unknown, path: string): NumericValue | undefined {
  if (typeof raw !== 'string') {
    return undefined;
  }
  try {
    switch (key) {
      case '$numberLong':
        return BigInt(raw);
      case '$numberDecimal':
        return new Decimal(raw);
      case '$numberInt':
      case '$numberDouble':
        return Number(raw);
      default:
        return undefined;
    }
  } catch (error) {
    throw new ValidationError(
      `invalid ${key} at ${path}: ${error instanceof Error ? error.message : String(error)}`,
      path
    );
  }
}
