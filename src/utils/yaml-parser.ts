/**
 * YAML parsing with limits on aliases, nesting and input size.
 *
 * Used for config files, scenario catalogues, fixture snapshots, recordings
 * and adapter output. The last four carry server values, so they are parsed
 * with lossless numbers: integer and float literals resolve through
 * {@link parseNumericLiteral} instead of a double.
 */

import { parse as yamlParse, type ScalarTag } from 'yaml';
import { ValidationError } from '../errors/types.js';
import { isDecimal, parseNumericLiteral } from '../scenarios/values.js';

export const YAML_LIMITS = {
  /** Maximum number of aliases to resolve */
  MAX_ALIAS_COUNT: 100,
  /** Maximum nesting depth for parsed structures */
  MAX_DEPTH: 64,
  /** Maximum size of input in characters (16MB) */
  MAX_INPUT_SIZE: 16 * 1024 * 1024,
} as const;

export interface ParseDocumentOptions {
  /** Keep integers beyond 2^53 and long fractions exact (`bigint` / `Decimal`) */
  losslessNumbers?: boolean;
}

/**
 * Replacements for the core schema's decimal int and float tags. Listed ahead
 * of the defaults, so they win for plain scalars.
 */
const LOSSLESS_NUMBER_TAGS: ScalarTag[] = [
  {
    tag: 'tag:yaml.org,2002:int',
    default: true,
    test: /^[-+]?[0-9]+$/,
    resolve: (text) => parseNumericLiteral(text),
  },
  {
    tag: 'tag:yaml.org,2002:float',
    default: true,
    test: /^[-+]?(?:\.[0-9]+|[0-9]+(?:\.[0-9]*)?)(?:[eE][-+]?[0-9]+)?$/,
    resolve: (text) => parseNumericLiteral(text),
  },
];

function validateDepth(value: unknown, source: string, depth = 0): void {
  if (depth > YAML_LIMITS.MAX_DEPTH) {
    throw new ValidationError(`${source}: nesting depth exceeds maximum of ${YAML_LIMITS.MAX_DEPTH}`);
  }
  if (Array.isArray(value)) {
    for (const item of value) {
      validateDepth(item, source, depth + 1);
    }
  } else if (value !== null && typeof value === 'object' && !isDecimal(value)) {
    for (const item of Object.values(value)) {
      validateDepth(item, source, depth + 1);
    }
  }
}

function checkSize(content: string, source: string): void {
  if (content.length > YAML_LIMITS.MAX_INPUT_SIZE) {
    throw new ValidationError(
      `${source}: input size (${content.length} bytes) exceeds maximum of ${YAML_LIMITS.MAX_INPUT_SIZE} bytes`
    );
  }
}

function parseWithLimits(content: string, options: ParseDocumentOptions & { uniqueKeys?: boolean }): unknown {
  return yamlParse(content, {
    maxAliasCount: YAML_LIMITS.MAX_ALIAS_COUNT,
    uniqueKeys: options.uniqueKeys ?? true,
    customTags: options.losslessNumbers ? (tags) => [...LOSSLESS_NUMBER_TAGS, ...tags] : undefined,
  });
}

/**
 * Parse YAML (a superset of JSON) into an untyped value for schema validation.
 *
 * @param source - file name used in error messages
 */
export function parseYamlDocument(content: string, source: string, options: ParseDocumentOptions = {}): unknown {
  checkSize(content, source);

  let parsed: unknown;
  try {
    parsed = parseWithLimits(content, options);
  } catch (error) {
    throw new ValidationError(
      `Invalid YAML in ${source}: ${error instanceof Error ? error.message : 'Unknown error'}`
    );
  }

  validateDepth(parsed, source);
  return parsed;
}

/**
 * Parse strict JSON with lossless numbers.
 *
 * `JSON.parse` checks the syntax; the document is then rebuilt by the YAML
 * parser, for which JSON is valid flow syntax, so numbers keep every digit.
 * Duplicate keys keep the last value, as in `JSON.parse`.
 */
export function parseJsonDocument(content: string, source: string): unknown {
  checkSize(content, source);

  try {
    JSON.parse(content);
  } catch (error) {
    throw new ValidationError(`Invalid JSON in ${source}: ${error instanceof Error ? error.message : String(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = parseWithLimits(content, { losslessNumbers: true, uniqueKeys: false });
  } catch (error) {
    throw new ValidationError(`Invalid JSON in ${source}: ${error instanceof Error ? error.message : String(error)}`);
  }

  validateDepth(parsed, source);
  return parsed;
}
