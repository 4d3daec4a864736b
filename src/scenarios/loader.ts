/**
 * Scenario catalogue loader - reads scenarios from YAML or JSON files.
 *
 * A catalogue file looks like:
 *
 * ```yaml
 * scenarios:
 *   - id: insert-basic
 *     description: insert three documents
 *     commands:
 *       - name: insert
 *         payload: { insert: users, documents: [{ _id: 1 }] }
 *   - id: change-streams
 *     skip: change streams are not supported
 * ```
 *
 * File-level problems (missing file, bad YAML, wrong top-level shape) throw.
 * Individual entries never throw: each becomes a loaded scenario or a
 * {@link SkipReason}, and callers decide what to do with the skips.
 */

import { existsSync, readFileSync } from 'fs';
import { z } from 'zod';
import { ValidationError, getErrorMessage } from '../errors/types.js';
import { getLogger } from '../logging/logger.js';
import { parseYamlDocument } from '../utils/yaml-parser.js';
import { createCommand, createScenario, type Scenario } from './types.js';
import { toStructuredMap } from './values.js';

const logger = getLogger('scenario-loader');

export interface SkipReason {
  /** Catalogue file */
  readonly source: string;
  /** Zero-based entry index */
  readonly index: number;
  /** Entry id, when the entry has one */
  readonly id?: string;
  readonly reason: string;
}

export type ScenarioLoadResult =
  | { readonly loaded: true; readonly scenario: Scenario }
  | { readonly loaded: false; readonly skip: SkipReason };

export interface LoadedCatalogue {
  readonly source: string;
  readonly results: readonly ScenarioLoadResult[];
}

const commandSchema = z.object({
  name: z.string().min(1, 'command name is required'),
  // Checked by toStructuredMap, which keeps every key and numeric variant
  payload: z.unknown().optional(),
});

const entrySchema = z.object({
  id: z.string().min(1, 'id is required'),
  description: z.string().optional(),
  skip: z.string().optional(),
  commands: z.array(commandSchema).default([]),
});

const catalogueSchema = z.object({
  scenarios: z.array(z.unknown()),
});

/**
 * Load a scenario catalogue file.
 */
export function loadScenarioCatalogue(path: string): LoadedCatalogue {
  if (!existsSync(path)) {
    throw new ValidationError(`Scenario catalogue not found: ${path}`, 'scenarios.paths');
  }

  const document = parseYamlDocument(readFileSync(path, 'utf-8'), path, { losslessNumbers: true });
  const parsed = catalogueSchema.safeParse(document);
  if (!parsed.success) {
    throw new ValidationError(`Invalid scenario catalogue ${path}: expected a top-level "scenarios" list`);
  }

  const results = parsed.data.scenarios.map((raw, index) => parseEntry(raw, index, path));
  const skipped = results.filter((result) => !result.loaded).length;
  logger.debug({ path, entries: results.length, skipped }, 'Loaded scenario catalogue');

  return { source: path, results };
}

/**
 * Load several catalogues and split their entries into scenarios and skips.
 * Duplicate ids are skipped after the first occurrence.
 */
export function loadScenarios(paths: readonly string[]): { scenarios: Scenario[]; skipped: SkipReason[] } {
  const scenarios: Scenario[] = [];
  const skipped: SkipReason[] = [];
  const seen = new Set<string>();

  for (const path of paths) {
    const catalogue = loadScenarioCatalogue(path);
    catalogue.results.forEach((result, index) => {
      if (!result.loaded) {
        skipped.push(result.skip);
      } else if (seen.has(result.scenario.id)) {
        skipped.push({ source: path, index, id: result.scenario.id, reason: 'duplicate scenario id' });
      } else {
        seen.add(result.scenario.id);
        scenarios.push(result.scenario);
      }
    });
  }

  return { scenarios, skipped };
}

function parseEntry(raw: unknown, index: number, source: string): ScenarioLoadResult {
  const entry = entrySchema.safeParse(raw);
  if (!entry.success) {
    const reason = entry.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    return { loaded: false, skip: { source, index, reason } };
  }

  const { id, description, skip, commands } = entry.data;
  if (skip !== undefined) {
    return { loaded: false, skip: { source, index, id, reason: skip } };
  }

  try {
    const scenario = createScenario({
      id,
      description,
      commands: commands.map((command, i) =>
        createCommand(command.name, toStructuredMap(command.payload ?? {}, `commands[${i}].payload`))
      ),
    });
    return { loaded: true, scenario };
  } catch (error) {
    return { loaded: false, skip: { source, index, id, reason: getErrorMessage(error) } };
  }
}
