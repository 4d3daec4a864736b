import {
  BACKEND_DEFAULTS,
  CORPUS_DEFAULTS,
  DRIFT_DEFAULTS,
  EPHEMERAL_KEYS,
  FAILURE_SIGNATURE_PATTERN,
  GATE_DEFAULTS,
  PATHS,
} from '../constants.js';

/**
 * Values applied for every setting paritykit.yaml leaves out.
 */
export const CONFIG_DEFAULTS = {
  backends: {
    process: {
      args: [] as string[],
      timeoutMs: BACKEND_DEFAULTS.PROCESS_TIMEOUT_MS,
    },
  },
  scenarios: {
    paths: [] as string[],
  },
  corpus: {
    seed: CORPUS_DEFAULTS.SEED,
    size: CORPUS_DEFAULTS.SIZE,
    /** Expand catalogues into a corpus for `compare` as well as `release` */
    expand: false,
  },
  diff: {
    ephemeralKeys: [...EPHEMERAL_KEYS],
    failureSignaturePattern: FAILURE_SIGNATURE_PATTERN,
  },
  gates: {
    maxMismatch: GATE_DEFAULTS.MAX_MISMATCH,
    maxError: GATE_DEFAULTS.MAX_ERROR,
    flakeRuns: GATE_DEFAULTS.FLAKE_RUNS,
    reproSamples: GATE_DEFAULTS.REPRO_SAMPLES,
    topRegressions: GATE_DEFAULTS.TOP_REGRESSIONS,
    failOnGate: true,
    release: {
      minCompatibilityPassRate: GATE_DEFAULTS.MIN_COMPATIBILITY_PASS_RATE,
      maxFlakeRate: GATE_DEFAULTS.MAX_FLAKE_RATE,
      maxP95LatencyMillis: GATE_DEFAULTS.MAX_P95_LATENCY_MILLIS,
      maxReproTimeP50Minutes: GATE_DEFAULTS.MAX_REPRO_P50_MINUTES,
    },
  },
  drift: {
    warnThreshold: DRIFT_DEFAULTS.WARN_THRESHOLD,
    failThreshold: DRIFT_DEFAULTS.FAIL_THRESHOLD,
  },
  output: {
    dir: PATHS.DEFAULT_OUTPUT_DIR,
    validateArtifacts: true,
  },
  logging: {
    level: 'warn' as const,
  },
};
