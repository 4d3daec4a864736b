/**
 * Progress bar for differential runs.
 */

import cliProgress from 'cli-progress';
import type { DiffResult } from '../../diff/types.js';
import type { ProgressListener } from '../../harness/harness.js';
import { suppressLogs, restoreLogLevel } from '../../logging/logger.js';

export interface ProgressBarOptions {
  /** Whether to show the progress bar (false for verbose mode) */
  enabled?: boolean;
  /** Stream to write to (defaults to stderr) */
  stream?: NodeJS.WriteStream;
}

interface ProgressPayload {
  phase: string;
  scenario: string;
  mismatches: number;
  errors: number;
}

/**
 * Shows scenario progress across one or more harness batches (baseline run,
 * flake reruns). Only drawn on a TTY; otherwise every call is a no-op.
 */
export class ScenarioProgressBar {
  private bar: cliProgress.SingleBar | null = null;
  private readonly enabled: boolean;
  private started = false;
  private phase = 'Running';
  private offset = 0;
  private total = 0;
  private value = 0;
  private mismatches = 0;
  private errors = 0;

  constructor(options: ProgressBarOptions = {}) {
    const stream = options.stream ?? process.stderr;
    this.enabled = (options.enabled ?? true) && (stream.isTTY ?? false);

    if (this.enabled) {
      this.bar = new cliProgress.SingleBar(
        {
          format: '{bar} {percentage}% | {phase}: {scenario} ({value}/{total}) | {mismatches} mismatch, {errors} error',
          barCompleteChar: '█',
          barIncompleteChar: '░',
          hideCursor: true,
          clearOnComplete: true,
          stream,
          forceRedraw: true,
          linewrap: false,
          synchronousUpdate: true,
        },
        cliProgress.Presets.shades_classic
      );
    }
  }

  get isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Start the bar for `total` scenario executions across all phases.
   */
  start(total: number): void {
    if (!this.bar) return;

    suppressLogs();
    this.total = total;
    this.value = 0;
    this.offset = 0;
    this.bar.start(total, 0, this.payload('...'));
    this.started = true;
  }

  /**
   * Begin a new batch; results reported afterwards count from the current
   * position.
   */
  beginPhase(phase: string): void {
    this.phase = phase;
    this.offset = this.value;
  }

  /**
   * Listener to hand to `DifferentialHarness.run`.
   */
  listener(): ProgressListener {
    return (result, completed) => this.update(result, completed);
  }

  update(result: DiffResult, completedInPhase: number): void {
    if (result.status === 'MISMATCH') {
      this.mismatches++;
    } else if (result.status === 'ERROR') {
      this.errors++;
    }
    if (!this.bar || !this.started) return;

    this.value = Math.min(this.total, this.offset + completedInPhase);
    this.bar.update(this.value, this.payload(result.scenarioId));
  }

  stop(): void {
    if (!this.bar || !this.started) return;

    this.bar.stop();
    this.started = false;
    restoreLogLevel();
  }

  private payload(scenario: string): ProgressPayload {
    return { phase: this.phase, scenario, mismatches: this.mismatches, errors: this.errors };
  }
}

/**
 * Startup banner for commands that drive two backends.
 */
export function formatRunBanner(options: {
  title: string;
  leftBackend: string;
  rightBackend: string;
  scenarioCount: number;
  seed?: string;
}): string {
  const row = (label: string, value: string): string => {
    const text = value.length > 38 ? `${value.slice(0, 35)}...` : value;
    return `│ ${label.padEnd(11)}${text.padEnd(38)}│`;
  };

  const lines = [
    `paritykit ${options.title}`,
    '',
    '┌' + '─'.repeat(50) + '┐',
    row('Left:', options.leftBackend),
    row('Right:', options.rightBackend),
    row('Scenarios:', String(options.scenarioCount)),
  ];
  if (options.seed !== undefined) {
    lines.push(row('Seed:', options.seed));
  }
  lines.push('└' + '─'.repeat(50) + '┘');
  return lines.join('\n');
}
