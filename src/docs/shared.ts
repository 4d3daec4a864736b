/**
 * Pieces shared by several report renderers.
 */

import type { JsonValue } from '../scenarios/values.js';
import type { RegressionSample } from '../summary/regressions.js';
import { escapeListItem } from '../utils/markdown.js';

/**
 * `- <id> (<STATUS>): <first path> (<note>)` per sample, or `- none`.
 */
export function renderRegressionList(samples: readonly RegressionSample[]): string[] {
  if (samples.length === 0) {
    return ['- none'];
  }
  return samples.map((sample) => {
    const detail =
      sample.status === 'ERROR'
        ? sample.errorMessage ?? 'unknown error'
        : `${sample.entryPath ?? ''} (${sample.entryNote ?? ''})`;
    return `- ${sample.scenarioId} (${sample.status}): ${escapeListItem(detail)}`;
  });
}

export function regressionJson(sample: RegressionSample): JsonValue {
  const item: { [key: string]: JsonValue } = {
    scenarioId: sample.scenarioId,
    status: sample.status,
    entryCount: sample.entryCount,
  };
  if (sample.entryPath !== undefined) {
    item.entryPath = sample.entryPath;
  }
  if (sample.entryNote !== undefined) {
    item.entryNote = sample.entryNote;
  }
  if (sample.errorMessage !== undefined) {
    item.errorMessage = sample.errorMessage;
  }
  return item;
}

/**
 * Join rendered lines into a document ending in exactly one newline.
 */
export function finishDocument(lines: readonly string[]): string {
  return `${lines.join('\n').trimEnd()}\n`;
}
