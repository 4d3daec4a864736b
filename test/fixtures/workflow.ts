/**
 * Temp-directory helpers for workflow and CLI tests.
 */

import { mkdirSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import type { DifferentialBackend } from '../../src/backends/types.js';
import { validateConfig, type ParityConfig } from '../../src/config/validator.js';
import type { BackendProvider } from '../../src/workflow/backends.js';

export const CATALOGUE_YAML = [
  'scenarios:',
  '  - id: insert-two',
  '    description: insert two users',
  '    commands:',
  '      - name: insert',
  '        payload:',
  '          insert: users',
  '          documents:',
  '            - { _id: 1, email: a@example.test }',
  '            - { _id: 2, email: b@example.test }',
  '  - id: ping',
  '    commands:',
  '      - name: ping',
  '        payload: { ping: 1 }',
  '  - id: later',
  '    skip: needs transactions',
  '',
].join('\n');

export function createTempDir(label: string): string {
  const dir = join(tmpdir(), `paritykit-${label}-${Date.now()}-${Math.random().toString(16).slice(2)}`);
  mkdirSync(dir, { recursive: true });
  return dir;
}

export function removeTempDir(dir: string): void {
  try {
    rmSync(dir, { recursive: true, force: true });
  } catch {
    // Ignore cleanup errors
  }
}

export function writeFixture(dir: string, name: string, content: string): string {
  const path = join(dir, name);
  writeFileSync(path, content, 'utf-8');
  return path;
}

/**
 * Validated config whose artifacts go to `<dir>/out` and whose catalogue is
 * CATALOGUE_YAML, with `overrides` merged in before validation.
 */
export function workflowConfig(dir: string, overrides: Record<string, unknown> = {}): ParityConfig {
  const catalogue = writeFixture(dir, 'catalogue.yaml', CATALOGUE_YAML);
  return validateConfig({
    scenarios: { paths: [catalogue] },
    output: { dir: join(dir, 'out') },
    ...overrides,
  });
}

/**
 * Provider that builds a new backend on every call and counts the calls per side.
 */
export function countingProvider(
  build: Record<'left' | 'right', () => DifferentialBackend>
): { provider: BackendProvider; calls: Record<'left' | 'right', number> } {
  const calls = { left: 0, right: 0 };
  const provider: BackendProvider = (side) => {
    calls[side]++;
    return build[side]();
  };
  return { provider, calls };
}

/**
 * Monotonic clock that advances by one millisecond per reading.
 */
export function steppingNow(): () => number {
  let t = 0;
  return () => ++t;
}
