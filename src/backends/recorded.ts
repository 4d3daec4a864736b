/**
 * Backend that replays outcomes captured earlier, keyed by scenario id.
 *
 * Recording file format:
 *
 * ```json
 * {
 *   "recordings": {
 *     "insert-basic": { "success": true, "commandResults": [{ "ok": 1, "n": 3 }] },
 *     "dup-key": { "success": false, "errorMessage": "... (code=11000)" }
 *   }
 * }
 * ```
 *
 * Corpus variants (`v0003.insert-basic`) fall back to the template's
 * recording when they have none of their own.
 */

import { existsSync, readFileSync } from 'fs';
import { z } from 'zod';
import { BackendExecutionError, ValidationError } from '../errors/types.js';
import { getLogger } from '../logging/logger.js';
import type { Scenario, ScenarioOutcome } from '../scenarios/types.js';
import { parseJsonDocument } from '../utils/yaml-parser.js';
import { parseOutcome, type DifferentialBackend } from './types.js';

const logger = getLogger('recorded-backend');

const VARIANT_PREFIX = /^v\d{4,}\./;

const recordingFileSchema = z.object({
  recordings: z.record(z.unknown()),
});

export class RecordedBackend implements DifferentialBackend {
  readonly name: string;
  private readonly recordings: ReadonlyMap<string, ScenarioOutcome>;

  constructor(name: string, recordings: ReadonlyMap<string, ScenarioOutcome>) {
    this.name = name;
    this.recordings = recordings;
  }

  async execute(scenario: Scenario): Promise<ScenarioOutcome> {
    const outcome = this.recordings.get(scenario.id) ?? this.recordings.get(templateId(scenario.id));
    if (!outcome) {
      throw new BackendExecutionError(`no recording for scenario ${scenario.id}`, this.name, {
        scenarioId: scenario.id,
      });
    }
    logger.debug({ backend: this.name, scenarioId: scenario.id }, 'Replaying recorded outcome');
    return outcome;
  }
}

/**
 * Load a {@link RecordedBackend} from a recording file.
 */
export function loadRecordedBackend(name: string, path: string): RecordedBackend {
  if (!existsSync(path)) {
    throw new ValidationError(`Recording file not found: ${path}`, 'backends.path');
  }

  const raw = parseJsonDocument(readFileSync(path, 'utf-8'), `recording file ${path}`);
  const parsed = recordingFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(`Invalid recording file ${path}: expected a "recordings" object`);
  }

  const recordings = new Map<string, ScenarioOutcome>();
  for (const [scenarioId, outcome] of Object.entries(parsed.data.recordings)) {
    recordings.set(scenarioId, parseOutcome(outcome, `recording "${scenarioId}" in ${path}`));
  }
  logger.debug({ backend: name, path, recordings: recordings.size }, 'Loaded recordings');

  return new RecordedBackend(name, recordings);
}

function templateId(scenarioId: string): string {
  return scenarioId.replace(VARIANT_PREFIX, '');
}
