/**
 * paritykit - differential compatibility testing for MongoDB wire-protocol
 * servers.
 *
 * @packageDocumentation
 */

// Scenarios and structured values
export * from './scenarios/index.js';

// Backends
export * from './backends/index.js';

// Diffing
export * from './diff/index.js';

// Harness
export * from './harness/index.js';

// Corpus
export * from './corpus/index.js';

// Gates
export * from './gates/index.js';

// Stability metrics
export * from './stability/index.js';

// Summaries
export * from './summary/index.js';

// Report artifacts
export * from './docs/index.js';

// Workflows
export * from './workflow/index.js';

// Config
export { loadConfig, findConfigFile, resolveConfigPaths } from './config/loader.js';
export type { LoadedConfig } from './config/loader.js';
export { validateConfig, parityConfigSchema } from './config/validator.js';
export type { ParityConfig, BackendConfig, ReleaseThresholdsConfig } from './config/validator.js';
export { CONFIG_DEFAULTS } from './config/defaults.js';

// Errors
export {
  ParityError,
  ConfigError,
  ConfigNotFoundError,
  ConfigValidationError,
  ValidationError,
  BackendExecutionError,
  ReproductionError,
  EvidenceError,
  isParityError,
  isInputError,
  getErrorMessage,
  describeFault,
} from './errors/types.js';
export type { ErrorContext } from './errors/types.js';

// Logging
export { createLogger, getLogger, configureLogger, resetLogger, startTiming } from './logging/logger.js';
export type { LogLevel, LoggerConfig, Logger, TimingResult } from './logging/logger.js';

// Constants
export { EXIT_CODES, PATHS } from './constants.js';
export type { ExitCode } from './constants.js';

export { VERSION, PACKAGE_NAME } from './version.js';
