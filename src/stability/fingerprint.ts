import type { DiffResult } from '../diff/types.js';
import { canonicalJson } from '../scenarios/values.js';

/**
 * Stable textual identity of a diff result.
 *
 * Two results with the same fingerprint are observationally the same:
 * same status, same error text and the same entries in the same order.
 * Scenario id and backend names are not part of it.
 */
export function fingerprint(result: DiffResult): string {
  let text = result.status;
  if (result.errorMessage !== undefined) {
    text += `|error=${result.errorMessage}`;
  }
  for (const entry of result.entries) {
    text +=
      `|path=${entry.path}` +
      `|left=${canonicalJson(entry.leftValue)}` +
      `|right=${canonicalJson(entry.rightValue)}` +
      `|note=${entry.note}`;
  }
  return text;
}
