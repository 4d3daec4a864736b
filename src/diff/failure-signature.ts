/**
 * Failure-signature parsing.
 *
 * Servers word the same error differently, so two failures are compared by
 * the error class carried in a trailing suffix rather than by their text:
 *
 *   command 'insert' failed at index 0: E11000 duplicate key (code=11000, codeName=DuplicateKey)
 *   command 'insert' failed at index 0: duplicate key error (code=11000)
 *
 * The suffix grammar is a regular expression with the named groups `code`
 * and/or `codeName`.
 */

import { FAILURE_SIGNATURE_PATTERN } from '../constants.js';
import { ConfigError } from '../errors/types.js';

export interface FailureSignature {
  /** Numeric server error code */
  code?: number;
  /** Symbolic error name, e.g. `DuplicateKey` */
  codeName?: string;
}

export class FailureSignatureParser {
  private readonly pattern: RegExp;

  constructor(pattern: string = FAILURE_SIGNATURE_PATTERN) {
    this.pattern = compilePattern(pattern);
  }

  /**
   * Extract the signature from a failure message, or null when the message
   * carries no recognizable suffix.
   */
  parse(message: string): FailureSignature | null {
    const groups = this.pattern.exec(message)?.groups;
    if (!groups) {
      return null;
    }

    const signature: FailureSignature = {};
    const code = groups.code === undefined ? Number.NaN : Number(groups.code);
    if (Number.isSafeInteger(code)) {
      signature.code = code;
    }
    if (groups.codeName) {
      signature.codeName = groups.codeName;
    }
    return signature.code === undefined && signature.codeName === undefined ? null : signature;
  }

  /**
   * Two failures are equivalent when both expose a code and the codes match;
   * otherwise when both expose a codeName and the names match; otherwise
   * when the messages are identical.
   */
  equivalent(left: string, right: string): boolean {
    const l = this.parse(left);
    const r = this.parse(right);
    if (l?.code !== undefined && r?.code !== undefined) {
      return l.code === r.code;
    }
    if (l?.codeName !== undefined && r?.codeName !== undefined) {
      return l.codeName === r.codeName;
    }
    return left === right;
  }
}

function compilePattern(source: string): RegExp {
  let pattern: RegExp;
  try {
    pattern = new RegExp(source);
  } catch (error) {
    throw new ConfigError(
      `invalid failure signature pattern: ${error instanceof Error ? error.message : String(error)}`,
      { operation: 'diff.failureSignature.pattern' }
    );
  }
  if (!source.includes('(?<code>') && !source.includes('(?<codeName>')) {
    throw new ConfigError('failure signature pattern must define a named group "code" or "codeName"', {
      operation: 'diff.failureSignature.pattern',
    });
  }
  return pattern;
}
