/**
 * Centralized constants for the paritykit CLI.
 */

// ==================== Exit Codes ====================

/**
 * Process exit codes.
 */
export const EXIT_CODES = {
  /** Run completed (gates passed, or gate failures were not fatal) */
  SUCCESS: 0,
  /** Unexpected failure */
  ERROR: 1,
  /** Configuration, parse or validation failure */
  INVALID: 2,
  /** A release gate failed and --fail-on-gate is in effect */
  GATE_FAILED: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

// ==================== Paths ====================

/**
 * File and directory names.
 */
export const PATHS = {
  /** Config file names, in search order */
  CONFIG_NAMES: ['paritykit.yaml', 'paritykit.yml', '.paritykit.yaml'],
  /** Default artifact directory */
  DEFAULT_OUTPUT_DIR: 'build/reports/parity',
  /** Corpus artifact */
  CORPUS_FILE: 'corpus.json',
  /** Differential report artifacts */
  DIFFERENTIAL_JSON: 'differential-report.json',
  DIFFERENTIAL_MARKDOWN: 'differential-report.md',
  /** Release gate evidence */
  RELEASE_JSON: 'release-gates.json',
  RELEASE_MARKDOWN: 'release-gates.md',
  /** Readiness rollup */
  READINESS_JSON: 'release-readiness.json',
  READINESS_MARKDOWN: 'release-readiness.md',
  /** Fixture drift report */
  DRIFT_JSON: 'fixture-drift.json',
  DRIFT_MARKDOWN: 'fixture-drift.md',
} as const;

// ==================== Diff ====================

/**
 * Result keys that legitimately differ between servers and are removed before
 * successful results are compared.
 */
export const EPHEMERAL_KEYS: readonly string[] = ['$clusterTime', 'operationTime', 'electionId', 'opTime'];

/**
 * Trailing failure suffix, e.g. `(code=11000, codeName=DuplicateKey)`.
 */
export const FAILURE_SIGNATURE_PATTERN =
  '\\(code=(?<code>-?\\d+)(?:,\\s*codeName=(?<codeName>[A-Za-z0-9_]+))?\\)\\s*$';

// ==================== Corpus ====================

export const CORPUS_DEFAULTS = {
  SEED: 'paritykit-corpus-v1',
  SIZE: 2000,
  /** Spacing between `_id` ranges of consecutive variants */
  ID_STRIDE: 100000,
  /** Modulus applied to the seed for the `_id` offset */
  ID_SEED_MODULUS: 10000,
} as const;

// ==================== Gates ====================

/**
 * Release gate defaults.
 */
export const GATE_DEFAULTS = {
  MAX_MISMATCH: 0,
  MAX_ERROR: 0,
  FLAKE_RUNS: 30,
  REPRO_SAMPLES: 21,
  TOP_REGRESSIONS: 10,
  MIN_COMPATIBILITY_PASS_RATE: 0.95,
  MAX_FLAKE_RATE: 0.005,
  MAX_P95_LATENCY_MILLIS: 5.0,
  MAX_REPRO_P50_MINUTES: 5.0,
} as const;

// ==================== Drift ====================

export const DRIFT_DEFAULTS = {
  WARN_THRESHOLD: 0.15,
  FAIL_THRESHOLD: 0.3,
  TOP_FIELDS: 3,
} as const;

// ==================== Backends ====================

export const BACKEND_DEFAULTS = {
  /** Per-scenario adapter timeout (30 seconds) */
  PROCESS_TIMEOUT_MS: 30000,
  /** Grace period between SIGTERM and SIGKILL */
  SHUTDOWN_KILL_MS: 5000,
} as const;
