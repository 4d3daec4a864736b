/**
 * paritykit.yaml schema.
 *
 * Every section is optional; omitted values take their defaults from
 * CONFIG_DEFAULTS, so an empty file is a valid configuration.
 */

import { z } from 'zod';
import { ConfigValidationError } from '../errors/types.js';
import { READINESS_KINDS } from '../gates/readiness.js';
import { LOG_LEVELS, type LogLevel } from '../logging/logger.js';
import { CONFIG_DEFAULTS } from './defaults.js';

const ratio = z.number().min(0).max(1);
const nonNegativeInt = z.number().int().min(0);
const positiveInt = z.number().int().min(1);
const logLevel = z.custom<LogLevel>(
  (value) => typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value),
  { message: `expected one of ${LOG_LEVELS.join(', ')}` }
);

/**
 * Outcomes replayed from a JSON file keyed by scenario id.
 */
export const recordedBackendSchema = z.object({
  type: z.literal('recorded'),
  name: z.string().min(1),
  path: z.string().min(1),
});

/**
 * External adapter spawned once per scenario.
 */
export const processBackendSchema = z.object({
  type: z.literal('process'),
  name: z.string().min(1),
  command: z.string().min(1),
  args: z.array(z.string()).default(CONFIG_DEFAULTS.backends.process.args),
  /** Per-scenario timeout (ms) */
  timeoutMs: z.number().int().min(1).max(600000).default(CONFIG_DEFAULTS.backends.process.timeoutMs),
  env: z.record(z.string()).default({}),
  cwd: z.string().optional(),
});

export const backendConfigSchema = z.discriminatedUnion('type', [recordedBackendSchema, processBackendSchema]);

export const backendsConfigSchema = z
  .object({
    /** Implementation under test */
    left: backendConfigSchema.optional(),
    /** Reference server */
    right: backendConfigSchema.optional(),
  })
  .default({});

export const scenariosConfigSchema = z
  .object({
    /** Scenario catalogue files (YAML or JSON) */
    paths: z.array(z.string().min(1)).default(CONFIG_DEFAULTS.scenarios.paths),
  })
  .default({});

export const corpusConfigSchema = z
  .object({
    seed: z.string().trim().min(1).default(CONFIG_DEFAULTS.corpus.seed),
    size: positiveInt.default(CONFIG_DEFAULTS.corpus.size),
    expand: z.boolean().default(CONFIG_DEFAULTS.corpus.expand),
  })
  .default({});

export const diffConfigSchema = z
  .object({
    ephemeralKeys: z.array(z.string().min(1)).default(CONFIG_DEFAULTS.diff.ephemeralKeys),
    failureSignature: z
      .object({
        /** Regex with named groups `code` and `codeName` */
        pattern: z.string().min(1).default(CONFIG_DEFAULTS.diff.failureSignaturePattern),
      })
      .default({}),
  })
  .default({});

export const releaseThresholdsSchema = z
  .object({
    minCompatibilityPassRate: ratio.default(CONFIG_DEFAULTS.gates.release.minCompatibilityPassRate),
    maxFlakeRate: ratio.default(CONFIG_DEFAULTS.gates.release.maxFlakeRate),
    maxP95LatencyMillis: z.number().min(0).default(CONFIG_DEFAULTS.gates.release.maxP95LatencyMillis),
    maxReproTimeP50Minutes: z.number().min(0).default(CONFIG_DEFAULTS.gates.release.maxReproTimeP50Minutes),
  })
  .default({});

export const gatesConfigSchema = z
  .object({
    maxMismatch: nonNegativeInt.default(CONFIG_DEFAULTS.gates.maxMismatch),
    maxError: nonNegativeInt.default(CONFIG_DEFAULTS.gates.maxError),
    minPassRate: ratio.optional(),
    flakeRuns: nonNegativeInt.default(CONFIG_DEFAULTS.gates.flakeRuns),
    reproSamples: positiveInt.default(CONFIG_DEFAULTS.gates.reproSamples),
    topRegressions: positiveInt.default(CONFIG_DEFAULTS.gates.topRegressions),
    /** Exit non-zero when a gate fails */
    failOnGate: z.boolean().default(CONFIG_DEFAULTS.gates.failOnGate),
    release: releaseThresholdsSchema,
  })
  .default({});

export const reproConfigSchema = z
  .object({
    /** Failing scenario replayed for repro timing (default: first failure) */
    scenarioId: z.string().min(1).optional(),
  })
  .default({});

export const readinessGateSchema = z.object({
  id: z.string().min(1),
  kind: z.enum(READINESS_KINDS),
  artifact: z.string().min(1),
});

export const readinessConfigSchema = z
  .object({
    /** Empty means the artifacts paritykit itself writes to output.dir */
    gates: z.array(readinessGateSchema).default([]),
  })
  .default({});

export const driftConfigSchema = z
  .object({
    warnThreshold: ratio.default(CONFIG_DEFAULTS.drift.warnThreshold),
    failThreshold: ratio.default(CONFIG_DEFAULTS.drift.failThreshold),
    /** Fixture snapshot files (namespace -> documents) */
    baseline: z.string().min(1).optional(),
    candidate: z.string().min(1).optional(),
  })
  .default({})
  .refine((drift) => drift.warnThreshold <= drift.failThreshold, {
    message: 'warnThreshold must be <= failThreshold',
    path: ['warnThreshold'],
  });

export const outputConfigSchema = z
  .object({
    dir: z.string().min(1).default(CONFIG_DEFAULTS.output.dir),
    /** Check JSON artifacts against the bundled schemas before writing */
    validateArtifacts: z.boolean().default(CONFIG_DEFAULTS.output.validateArtifacts),
  })
  .default({});

export const loggingConfigSchema = z
  .object({
    level: logLevel.default(CONFIG_DEFAULTS.logging.level),
    file: z.string().min(1).optional(),
  })
  .default({});

/**
 * Complete paritykit.yaml schema.
 */
export const parityConfigSchema = z
  .object({
    backends: backendsConfigSchema,
    scenarios: scenariosConfigSchema,
    corpus: corpusConfigSchema,
    diff: diffConfigSchema,
    gates: gatesConfigSchema,
    repro: reproConfigSchema,
    readiness: readinessConfigSchema,
    drift: driftConfigSchema,
    output: outputConfigSchema,
    logging: loggingConfigSchema,
  })
  .strict();

export type ParityConfig = z.infer<typeof parityConfigSchema>;
export type BackendConfig = z.infer<typeof backendConfigSchema>;
export type ReleaseThresholdsConfig = z.infer<typeof releaseThresholdsSchema>;

/**
 * Validate a parsed configuration document, applying defaults.
 *
 * @param source - file name used in error messages
 * @throws ConfigValidationError listing every issue as `path: message`
 */
export function validateConfig(config: unknown, source = 'configuration'): ParityConfig {
  const result = parityConfigSchema.safeParse(config ?? {});

  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const path = issue.path.join('.');
      return `${path || 'root'}: ${issue.message}`;
    });
    throw new ConfigValidationError(source, issues);
  }

  return result.data;
}
