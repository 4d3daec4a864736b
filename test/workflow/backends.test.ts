import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { TimedBackend, configuredBackends, createBackend } from '../../src/workflow/backends.js';
import { ProcessBackend } from '../../src/backends/process.js';
import { RecordedBackend } from '../../src/backends/recorded.js';
import { validateConfig } from '../../src/config/validator.js';
import { BackendExecutionError, ConfigError } from '../../src/errors/types.js';
import { insertBackend, insertScenario, throwingBackend } from '../fixtures/backends.js';
import { createTempDir, removeTempDir, steppingNow, writeFixture } from '../fixtures/workflow.js';

describe('workflow/backends', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = createTempDir('backends');
  });

  afterEach(() => {
    removeTempDir(testDir);
  });

  describe('createBackend', () => {
    it('should load a recorded backend from its file', async () => {
      const path = writeFixture(
        testDir,
        'impl.json',
        JSON.stringify({ recordings: { 'insert-three': { success: true, commandResults: [{ ok: 1, n: 3 }] } } })
      );

      const backend = createBackend({ type: 'recorded', name: 'impl', path });

      expect(backend).toBeInstanceOf(RecordedBackend);
      expect(backend.name).toBe('impl');
      await expect(backend.execute(insertScenario())).resolves.toEqual({
        success: true,
        commandResults: [{ ok: 1, n: 3 }],
      });
    });

    it('should build a process backend from its command', () => {
      const backend = createBackend({
        type: 'process',
        name: 'reference',
        command: 'node',
        args: ['adapter.js'],
        timeoutMs: 1000,
        env: {},
      });

      expect(backend).toBeInstanceOf(ProcessBackend);
      expect(backend.name).toBe('reference');
    });
  });

  describe('configuredBackends', () => {
    it('should build a new backend on every call', () => {
      const config = validateConfig({
        backends: { right: { type: 'process', name: 'reference', command: 'node' } },
      });
      const backends = configuredBackends(config);

      expect(backends('right')).not.toBe(backends('right'));
    });

    it('should name the missing side', () => {
      const backends = configuredBackends(validateConfig({}));

      expect(() => backends('left')).toThrow(ConfigError);
      expect(() => backends('right')).toThrow('backends.right is required');
    });
  });

  describe('TimedBackend', () => {
    it('should record one sample per execute call', async () => {
      const timed = new TimedBackend(insertBackend('impl'), steppingNow());

      await timed.execute(insertScenario('a'));
      await timed.execute(insertScenario('b'));

      expect(timed.name).toBe('impl');
      expect(timed.samplesMillis).toEqual([1, 1]);
    });

    it('should time calls that throw', async () => {
      const timed = new TimedBackend(
        throwingBackend('impl', new BackendExecutionError('adapter crashed', 'impl')),
        steppingNow()
      );

      await expect(timed.execute(insertScenario())).rejects.toThrow('adapter crashed');
      expect(timed.samplesMillis).toEqual([1]);
    });
  });
});
