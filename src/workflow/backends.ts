/**
 * Backends built from configuration, and the latency-recording wrapper used
 * by release runs.
 */

import { ProcessBackend } from '../backends/process.js';
import { loadRecordedBackend } from '../backends/recorded.js';
import type { DifferentialBackend } from '../backends/types.js';
import type { BackendConfig, ParityConfig } from '../config/validator.js';
import { ConfigError } from '../errors/types.js';
import type { Scenario, ScenarioOutcome } from '../scenarios/types.js';

export type BackendSide = 'left' | 'right';

/**
 * Builds a backend for one side. Each call returns a fresh instance, so
 * repro sampling can start every replay from a clean state.
 */
export type BackendProvider = (side: BackendSide) => DifferentialBackend;

export function createBackend(config: BackendConfig): DifferentialBackend {
  if (config.type === 'recorded') {
    return loadRecordedBackend(config.name, config.path);
  }
  return new ProcessBackend(config.name, {
    command: config.command,
    args: config.args,
    timeoutMs: config.timeoutMs,
    env: config.env,
    cwd: config.cwd,
  });
}

/**
 * Provider over the `backends` section of the configuration.
 *
 * @throws ConfigError when the requested side is not configured
 */
export function configuredBackends(config: ParityConfig): BackendProvider {
  return (side) => {
    const backend = config.backends[side];
    if (!backend) {
      throw new ConfigError(`backends.${side} is required`, { operation: 'createBackend' });
    }
    return createBackend(backend);
  };
}

/**
 * Records how long each `execute` call on the wrapped backend takes,
 * including calls that throw.
 */
export class TimedBackend implements DifferentialBackend {
  readonly name: string;
  private readonly inner: DifferentialBackend;
  private readonly now: () => number;
  private readonly samples: number[] = [];

  constructor(inner: DifferentialBackend, now: () => number = () => performance.now()) {
    this.name = inner.name;
    this.inner = inner;
    this.now = now;
  }

  /** Milliseconds per call, in call order */
  get samplesMillis(): readonly number[] {
    return this.samples;
  }

  async execute(scenario: Scenario): Promise<ScenarioOutcome> {
    const startedAt = this.now();
    try {
      return await this.inner.execute(scenario);
    } finally {
      this.samples.push(Math.max(0, this.now() - startedAt));
    }
  }
}
