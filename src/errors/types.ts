/**
 * Error types for paritykit.
 *
 * Error hierarchy:
 * - ParityError (base)
 *   - ConfigError (configuration issues)
 *     - ConfigNotFoundError
 *     - ConfigValidationError
 *   - ValidationError (malformed input, violated preconditions)
 *   - BackendExecutionError (a backend could not produce an outcome)
 *   - ReproductionError (a captured failure did not replay)
 *   - EvidenceError (a gate artifact could not be read)
 *
 * Only configuration and validation errors abort a run. Backend faults are
 * converted into ERROR diff results by the harness, and evidence problems are
 * reported as MISSING/FAIL gates by the readiness aggregator.
 */

/**
 * Error context for debugging.
 */
export interface ErrorContext {
  /** Operation that failed */
  operation?: string;
  /** Component where error occurred */
  component?: string;
  /** Scenario id if applicable */
  scenarioId?: string;
  /** Backend name if applicable */
  backend?: string;
  /** Additional metadata */
  metadata?: Record<string, unknown>;
}

/**
 * Base error class for all paritykit errors.
 */
export class ParityError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;
  /** Error context for debugging */
  readonly context: ErrorContext;
  /** Original error if this wraps another */
  readonly cause?: Error;

  constructor(
    message: string,
    options: {
      code: string;
      context?: ErrorContext;
      cause?: Error;
    }
  ) {
    super(message);
    this.name = 'ParityError';
    this.code = options.code;
    this.context = options.context ?? {};
    this.cause = options.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert to JSON for logging.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      cause: this.cause
        ? {
            name: this.cause.name,
            message: this.cause.message,
          }
        : undefined,
    };
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

/**
 * Configuration-related error.
 */
export class ConfigError extends ParityError {
  constructor(message: string, context?: ErrorContext, cause?: Error) {
    super(message, { code: 'CONFIG_ERROR', context, cause });
    this.name = 'ConfigError';
  }
}

/**
 * Configuration file not found.
 */
export class ConfigNotFoundError extends ConfigError {
  /** Paths that were searched */
  readonly searchedPaths: string[];

  constructor(searchedPaths: string[]) {
    super(
      `No paritykit config file found. Searched:\n${searchedPaths.map((p) => `  - ${p}`).join('\n')}\n\n` +
        'Create paritykit.yaml or pass --config <path>.',
      { metadata: { searchedPaths } }
    );
    this.name = 'ConfigNotFoundError';
    this.searchedPaths = searchedPaths;
  }
}

/**
 * Configuration validation failed.
 */
export class ConfigValidationError extends ConfigError {
  /** Validation issues as `path: message` lines */
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(`Invalid configuration in ${source}:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`, {
      metadata: { source, issues },
    });
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}

// =============================================================================
// Input Errors
// =============================================================================

/**
 * Malformed input or a violated precondition (blank ids, empty command
 * lists, non-finite samples, out-of-range percentiles, ...).
 */
export class ValidationError extends ParityError {
  /** Name of the offending field, when there is one */
  readonly field?: string;

  constructor(message: string, field?: string, context?: ErrorContext) {
    super(message, {
      code: 'VALIDATION_ERROR',
      context: { ...context, metadata: { ...context?.metadata, field } },
    });
    this.name = 'ValidationError';
    this.field = field;
  }
}

// =============================================================================
// Execution Errors
// =============================================================================

/**
 * A backend failed to produce a structured outcome.
 */
export class BackendExecutionError extends ParityError {
  readonly backend: string;

  constructor(message: string, backend: string, context?: ErrorContext, cause?: Error) {
    super(message, {
      code: 'BACKEND_EXECUTION_FAILED',
      context: { ...context, backend },
      cause,
    });
    this.name = 'BackendExecutionError';
    this.backend = backend;
  }
}

/**
 * Replaying a captured failing trace did not re-observe the failure.
 */
export class ReproductionError extends ParityError {
  constructor(message: string, context?: ErrorContext, cause?: Error) {
    super(message, { code: 'REPRODUCTION_FAILED', context, cause });
    this.name = 'ReproductionError';
  }
}

/**
 * A gate evidence artifact exists but could not be read.
 */
export class EvidenceError extends ParityError {
  readonly artifactPath: string;

  constructor(message: string, artifactPath: string, cause?: Error) {
    super(message, {
      code: 'EVIDENCE_UNREADABLE',
      context: { metadata: { artifactPath } },
      cause,
    });
    this.name = 'EvidenceError';
    this.artifactPath = artifactPath;
  }
}

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Check if an error is a ParityError.
 */
export function isParityError(error: unknown): error is ParityError {
  return error instanceof ParityError;
}

/**
 * Check if an error should abort a run with the validation exit code.
 */
export function isInputError(error: unknown): boolean {
  return error instanceof ConfigError || error instanceof ValidationError;
}

/**
 * Extract error message from any error type.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Describe a thrown value as `<kind>: <text>`.
 */
export function describeFault(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return `${typeof error}: ${String(error)}`;
}
