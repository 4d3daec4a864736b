/**
 * Backend that delegates each scenario to an external adapter process.
 *
 * The adapter receives the scenario as a JSON document on stdin and must
 * print one outcome document on stdout, then exit 0:
 *
 *   { "success": true, "commandResults": [...] }
 *   { "success": false, "errorMessage": "command 'insert' failed at index 0: ... (code=11000)" }
 *
 * Adapters are expected to start from a clean state for every invocation.
 * PARITYKIT_USER_AGENT in the adapter environment names the calling version.
 */

import { spawn } from 'child_process';
import { BACKEND_DEFAULTS } from '../constants.js';
import { BackendExecutionError, getErrorMessage } from '../errors/types.js';
import { getLogger } from '../logging/logger.js';
import type { Scenario, ScenarioOutcome } from '../scenarios/types.js';
import { TimeoutError, withTimeout } from '../utils/timeout.js';
import { USER_AGENT } from '../version.js';
import { parseOutcomeJson, scenarioToJson, type DifferentialBackend } from './types.js';

const logger = getLogger('process-backend');

/** Stderr kept for diagnostics */
const MAX_STDERR_CHARS = 500;

export interface ProcessBackendOptions {
  command: string;
  args?: string[];
  /** Per-scenario timeout (default: 30s) */
  timeoutMs?: number;
  /** Extra environment variables for the adapter */
  env?: Record<string, string>;
  /** Working directory for the adapter */
  cwd?: string;
}

interface ProcessResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

export class ProcessBackend implements DifferentialBackend {
  readonly name: string;
  private readonly options: ProcessBackendOptions;

  constructor(name: string, options: ProcessBackendOptions) {
    this.name = name;
    this.options = options;
  }

  async execute(scenario: Scenario): Promise<ScenarioOutcome> {
    const timeoutMs = this.options.timeoutMs ?? BACKEND_DEFAULTS.PROCESS_TIMEOUT_MS;
    const context = { scenarioId: scenario.id, operation: 'execute' };

    let result: ProcessResult;
    try {
      result = await this.runAdapter(JSON.stringify(scenarioToJson(scenario)), timeoutMs);
    } catch (error) {
      if (error instanceof TimeoutError) {
        throw new BackendExecutionError(
          `adapter timed out after ${timeoutMs}ms for scenario ${scenario.id}`,
          this.name,
          context,
          error
        );
      }
      throw new BackendExecutionError(
        `failed to run adapter "${this.options.command}": ${getErrorMessage(error)}`,
        this.name,
        context,
        error instanceof Error ? error : undefined
      );
    }

    if (result.exitCode !== 0) {
      const stderr = result.stderr.trim();
      throw new BackendExecutionError(
        `adapter exited with code ${result.exitCode}${stderr ? `: ${stderr}` : ''}`,
        this.name,
        context
      );
    }

    try {
      return parseOutcomeJson(result.stdout, `adapter output for ${scenario.id}`);
    } catch (error) {
      throw new BackendExecutionError(
        getErrorMessage(error),
        this.name,
        context,
        error instanceof Error ? error : undefined
      );
    }
  }

  private runAdapter(input: string, timeoutMs: number): Promise<ProcessResult> {
    const child = spawn(this.options.command, this.options.args ?? [], {
      cwd: this.options.cwd,
      env: { ...process.env, PARITYKIT_USER_AGENT: USER_AGENT, ...this.options.env },
    });

    const completion = new Promise<ProcessResult>((resolve, reject) => {
      let stdout = '';
      let stderr = '';

      child.stdout.setEncoding('utf-8');
      child.stderr.setEncoding('utf-8');
      child.stdout.on('data', (chunk: string) => {
        stdout += chunk;
      });
      child.stderr.on('data', (chunk: string) => {
        if (stderr.length < MAX_STDERR_CHARS) {
          stderr = (stderr + chunk).slice(0, MAX_STDERR_CHARS);
        }
      });

      child.on('error', reject);
      child.on('close', (exitCode) => {
        logger.debug({ backend: this.name, exitCode }, 'Adapter exited');
        resolve({ exitCode, stdout, stderr });
      });
    });

    // The adapter may exit before reading its input.
    child.stdin.on('error', (error) => {
      logger.debug({ backend: this.name, error: error.message }, 'Adapter stdin closed early');
    });
    child.stdin.end(input);

    return withTimeout(completion, timeoutMs, `${this.name} adapter`, () => {
      child.kill('SIGTERM');
      setTimeout(() => {
        if (child.exitCode === null && child.signalCode === null) {
          child.kill('SIGKILL');
        }
      }, BACKEND_DEFAULTS.SHUTDOWN_KILL_MS).unref();
    });
  }
}
