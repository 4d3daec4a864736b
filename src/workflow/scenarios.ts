/**
 * Scenario selection for workflows: catalogue templates, optionally grown
 * into a deterministic corpus.
 */

import type { ParityConfig } from '../config/validator.js';
import { buildCorpus } from '../corpus/builder.js';
import { ConfigError, ValidationError } from '../errors/types.js';
import { getLogger } from '../logging/logger.js';
import { loadScenarios, type SkipReason } from '../scenarios/loader.js';
import type { Scenario } from '../scenarios/types.js';

const logger = getLogger('workflow');

export interface ResolvedScenarios {
  readonly scenarios: Scenario[];
  readonly templateCount: number;
  readonly skipped: readonly SkipReason[];
  /** Set when the scenarios are a built corpus */
  readonly seed?: string;
}

/**
 * Load the configured catalogues.
 *
 * @throws ConfigError when no catalogue is configured
 * @throws ValidationError when the catalogues hold no runnable scenario
 */
export function loadTemplates(config: ParityConfig): { scenarios: Scenario[]; skipped: SkipReason[] } {
  const paths = config.scenarios.paths;
  if (paths.length === 0) {
    throw new ConfigError('scenarios.paths must list at least one catalogue', { operation: 'loadTemplates' });
  }

  const loaded = loadScenarios(paths);
  for (const skip of loaded.skipped) {
    logger.info(
      { source: skip.source, index: skip.index, id: skip.id, reason: skip.reason },
      'Skipped catalogue entry'
    );
  }
  if (loaded.scenarios.length === 0) {
    throw new ValidationError(`No runnable scenarios in ${paths.join(', ')}`, 'scenarios.paths');
  }
  return loaded;
}

/**
 * Load templates and, when `expand` is set, build the corpus from them.
 */
export function resolveScenarios(config: ParityConfig, expand: boolean): ResolvedScenarios {
  const templates = loadTemplates(config);
  if (!expand) {
    return { scenarios: templates.scenarios, templateCount: templates.scenarios.length, skipped: templates.skipped };
  }

  const { seed, size } = config.corpus;
  return {
    scenarios: buildCorpus(templates.scenarios, seed, size),
    templateCount: templates.scenarios.length,
    skipped: templates.skipped,
    seed,
  };
}
