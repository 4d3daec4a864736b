/**
 * Locate, parse and validate paritykit.yaml.
 */

import { existsSync, readFileSync } from 'fs';
import { dirname, join, resolve } from 'path';
import { PATHS } from '../constants.js';
import { ConfigError, ConfigNotFoundError, ValidationError } from '../errors/types.js';
import { getLogger } from '../logging/logger.js';
import { parseYamlDocument } from '../utils/yaml-parser.js';
import { validateConfig, type BackendConfig, type ParityConfig } from './validator.js';

const logger = getLogger('config');

export interface LoadedConfig {
  readonly config: ParityConfig;
  /** Config file the values came from; null when running on defaults */
  readonly path: string | null;
}

/**
 * Find a config file: the explicit path when given, otherwise the first of
 * PATHS.CONFIG_NAMES present in `cwd`.
 */
export function findConfigFile(explicitPath?: string, cwd = process.cwd()): string | null {
  if (explicitPath) {
    const path = resolve(cwd, explicitPath);
    return existsSync(path) ? path : null;
  }

  for (const name of PATHS.CONFIG_NAMES) {
    const path = join(cwd, name);
    if (existsSync(path)) {
      return path;
    }
  }
  return null;
}

/**
 * Load configuration. An explicit path must exist; without one, a missing
 * config file means defaults. Relative paths inside the file are resolved
 * against the file's directory (against `cwd` for defaults).
 *
 * @throws ConfigNotFoundError when an explicit path does not exist
 * @throws ConfigValidationError when the file does not match the schema
 */
export function loadConfig(explicitPath?: string, cwd = process.cwd()): LoadedConfig {
  const path = findConfigFile(explicitPath, cwd);
  if (!path) {
    if (explicitPath) {
      throw new ConfigNotFoundError([resolve(cwd, explicitPath)]);
    }
    logger.debug({ cwd }, 'No config file found, using defaults');
    return { config: resolveConfigPaths(validateConfig({}), cwd), path: null };
  }

  let parsed: unknown;
  try {
    parsed = parseYamlDocument(readFileSync(path, 'utf-8'), path);
  } catch (error) {
    if (error instanceof ValidationError) {
      throw new ConfigError(error.message, { operation: 'loadConfig' }, error);
    }
    throw error;
  }

  const config = validateConfig(parsed, path);
  logger.debug({ path }, 'Loaded config');
  return { config: resolveConfigPaths(config, dirname(path)), path };
}

/**
 * Make every file path in the configuration absolute.
 */
export function resolveConfigPaths(config: ParityConfig, baseDir: string): ParityConfig {
  const at = (path: string): string => resolve(baseDir, path);
  const optionalAt = (path: string | undefined): string | undefined => (path === undefined ? undefined : at(path));

  return {
    ...config,
    backends: {
      left: config.backends.left && resolveBackend(config.backends.left, at),
      right: config.backends.right && resolveBackend(config.backends.right, at),
    },
    scenarios: { paths: config.scenarios.paths.map(at) },
    readiness: {
      gates: config.readiness.gates.map((gate) => ({ ...gate, artifact: at(gate.artifact) })),
    },
    drift: {
      ...config.drift,
      baseline: optionalAt(config.drift.baseline),
      candidate: optionalAt(config.drift.candidate),
    },
    output: { ...config.output, dir: at(config.output.dir) },
    logging: { ...config.logging, file: optionalAt(config.logging.file) },
  };
}

function resolveBackend(backend: BackendConfig, at: (path: string) => string): BackendConfig {
  if (backend.type === 'recorded') {
    return { ...backend, path: at(backend.path) };
  }
  return backend.cwd === undefined ? backend : { ...backend, cwd: at(backend.cwd) };
}
