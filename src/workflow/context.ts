/**
 * Shared plumbing for the automation workflows behind the CLI commands.
 */

import { mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import type { ParityConfig } from '../config/validator.js';
import { DiffEngine } from '../diff/engine.js';
import type { Clock, ProgressListener } from '../harness/harness.js';
import { getLogger } from '../logging/logger.js';
import type { BackendProvider } from './backends.js';

const logger = getLogger('workflow');

/**
 * What a run is about to do, reported before the first scenario executes.
 */
export interface RunPlan {
  readonly title: string;
  readonly leftBackend: string;
  readonly rightBackend: string;
  readonly scenarioCount: number;
  readonly seed?: string;
  /** Scenario executions across every batch (baseline plus reruns) */
  readonly executions: number;
}

/**
 * Observer for long runs; the CLI drives a progress bar from it.
 */
export interface WorkflowProgress {
  begin(plan: RunPlan): void;
  /** Start a named batch and return the listener for its scenarios */
  phase(name: string): ProgressListener;
  end(): void;
}

export interface WorkflowContext {
  readonly config: ParityConfig;
  /** Backend source (default: the backends declared in the config) */
  readonly backends?: BackendProvider;
  /** Source of `generatedAt` timestamps */
  readonly clock?: Clock;
  /** Monotonic millisecond clock for latency and repro timing */
  readonly now?: () => number;
  readonly progress?: WorkflowProgress;
}

export interface ArtifactPaths {
  readonly json: string;
  readonly markdown: string;
}

export function contextClock(context: WorkflowContext): Clock {
  return context.clock ?? (() => new Date());
}

export function contextNow(context: WorkflowContext): () => number {
  return context.now ?? (() => performance.now());
}

export function createDiffEngine(config: ParityConfig): DiffEngine {
  return new DiffEngine({
    ephemeralKeys: config.diff.ephemeralKeys,
    failureSignaturePattern: config.diff.failureSignature.pattern,
  });
}

/**
 * Write one artifact into the output directory, creating it when needed.
 *
 * @returns the artifact's path
 */
export function writeArtifact(dir: string, fileName: string, content: string): string {
  mkdirSync(dir, { recursive: true });
  const path = join(dir, fileName);
  writeFileSync(path, content, 'utf-8');
  logger.debug({ path, bytes: content.length }, 'Wrote artifact');
  return path;
}

/**
 * Write the JSON and Markdown renderings of an artifact side by side.
 */
export function writeArtifactPair(
  dir: string,
  names: { json: string; markdown: string },
  content: { json: string; markdown: string }
): ArtifactPaths {
  return {
    json: writeArtifact(dir, names.json, content.json),
    markdown: writeArtifact(dir, names.markdown, content.markdown),
  };
}
