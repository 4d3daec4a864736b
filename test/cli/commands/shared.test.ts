/**
 * Tests for shared command utilities.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { join } from 'path';
import {
  applyOverrides,
  commandAction,
  createProgress,
  gateExitCode,
  loadCommandConfig,
  parseCommandOptions,
  parseNonNegativeInteger,
  parsePositiveInteger,
  LOG_OVERRIDE_ENV,
} from '../../../src/cli/commands/shared.js';
import * as output from '../../../src/cli/output.js';
import { formatRunBanner } from '../../../src/cli/utils/progress.js';
import { validateConfig } from '../../../src/config/validator.js';
import { EXIT_CODES } from '../../../src/constants.js';
import { ConfigError, ValidationError } from '../../../src/errors/types.js';
import { createTempDir, removeTempDir, writeFixture } from '../../fixtures/workflow.js';

// Mock the output module
vi.mock('../../../src/cli/output.js', () => ({
  error: vi.fn(),
  warn: vi.fn(),
  info: vi.fn(),
  success: vi.fn(),
  newline: vi.fn(),
  lines: vi.fn(),
}));

describe('cli/commands/shared', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  afterEach(() => {
    process.exitCode = undefined;
  });

  describe('parseCommandOptions', () => {
    it('should default progress to on', () => {
      expect(parseCommandOptions({})).toEqual({ progress: true });
    });

    it('should reject out-of-range values', () => {
      expect(() => parseCommandOptions({ size: 0 })).toThrow(ValidationError);
      expect(() => parseCommandOptions({ size: 0 })).toThrow(
        'Invalid options: --size: Number must be greater than or equal to 1'
      );
    });
  });

  describe('integer parsers', () => {
    it('should accept positive integers', () => {
      expect(parsePositiveInteger('5')).toBe(5);
      expect(parseNonNegativeInteger('0')).toBe(0);
    });

    it('should reject values outside their range', () => {
      expect(() => parsePositiveInteger('0')).toThrow(InvalidArgumentError);
      expect(() => parsePositiveInteger('1.5')).toThrow('Expected a positive integer.');
      expect(() => parseNonNegativeInteger('-1')).toThrow('Expected a non-negative integer.');
      expect(() => parseNonNegativeInteger('many')).toThrow(InvalidArgumentError);
    });
  });

  describe('applyOverrides', () => {
    it('should replace configured values with flags', () => {
      const config = applyOverrides(
        validateConfig({}),
        parseCommandOptions({
          seed: 'nightly',
          size: 10,
          flakeRuns: 0,
          reproScenario: 'dup-key',
          failOnGate: false,
          outputDir: 'reports',
          baseline: 'fixtures/v1.yaml',
        }),
        '/work'
      );

      expect(config.corpus).toEqual({ seed: 'nightly', size: 10, expand: false });
      expect(config.gates.flakeRuns).toBe(0);
      expect(config.gates.reproSamples).toBe(21);
      expect(config.gates.failOnGate).toBe(false);
      expect(config.repro.scenarioId).toBe('dup-key');
      expect(config.output.dir).toBe(join('/work', 'reports'));
      expect(config.drift.baseline).toBe(join('/work', 'fixtures', 'v1.yaml'));
      expect(config.drift.candidate).toBeUndefined();
    });

    it('should keep the configuration without flags', () => {
      const base = validateConfig({ corpus: { expand: true } });

      expect(applyOverrides(base, parseCommandOptions({}), '/work')).toEqual(base);
    });
  });

  describe('loadCommandConfig', () => {
    let testDir: string;

    beforeEach(() => {
      testDir = createTempDir('shared');
      process.env[LOG_OVERRIDE_ENV] = '1';
    });

    afterEach(() => {
      delete process.env[LOG_OVERRIDE_ENV];
      removeTempDir(testDir);
    });

    it('should layer flags over the config file', () => {
      writeFixture(testDir, 'paritykit.yaml', 'corpus:\n  seed: file-seed\n  size: 50\n');

      const config = loadCommandConfig(parseCommandOptions({ seed: 'cli-seed' }), testDir);

      expect(config.corpus.seed).toBe('cli-seed');
      expect(config.corpus.size).toBe(50);
      expect(config.output.dir).toBe(join(testDir, 'build', 'reports', 'parity'));
    });

    it('should fail for a missing explicit config', () => {
      expect(() => loadCommandConfig(parseCommandOptions({ config: 'missing.yaml' }), testDir)).toThrow(
        ConfigError
      );
    });
  });

  describe('createProgress', () => {
    it('should print the run banner when a run begins', () => {
      const plan = { title: 'compare', leftBackend: 'impl', rightBackend: 'reference', scenarioCount: 2, executions: 2 };
      const progress = createProgress(false);

      progress.begin(plan);
      const listener = progress.phase('Comparing');
      progress.end();

      expect(vi.mocked(output.info)).toHaveBeenCalledWith(formatRunBanner(plan));
      expect(vi.mocked(output.newline)).toHaveBeenCalledTimes(1);
      expect(typeof listener).toBe('function');
    });
  });

  describe('gateExitCode', () => {
    it('should fail only when gates are fatal', () => {
      expect(gateExitCode(true, validateConfig({}))).toBe(EXIT_CODES.GATE_FAILED);
      expect(gateExitCode(true, validateConfig({ gates: { failOnGate: false } }))).toBe(EXIT_CODES.SUCCESS);
      expect(gateExitCode(false, validateConfig({}))).toBe(EXIT_CODES.SUCCESS);
    });
  });

  describe('commandAction', () => {
    it('should set the handler exit code', async () => {
      await commandAction(() => EXIT_CODES.SUCCESS)({});

      expect(process.exitCode).toBe(0);
      expect(vi.mocked(output.warn)).not.toHaveBeenCalled();
    });

    it('should warn when a gate fails', async () => {
      await commandAction(async () => EXIT_CODES.GATE_FAILED)({});

      expect(process.exitCode).toBe(3);
      expect(vi.mocked(output.warn)).toHaveBeenCalledWith('Gate failed; exiting with code 3');
    });

    it('should exit with the invalid-input code for config errors', async () => {
      await commandAction(() => {
        throw new ConfigError('backends.left is required');
      })({});

      expect(process.exitCode).toBe(2);
      expect(vi.mocked(output.error).mock.calls[0]).toEqual(['Error: backends.left is required']);
    });

    it('should exit with the invalid-input code for bad options', async () => {
      const handler = vi.fn(() => EXIT_CODES.SUCCESS);

      await commandAction(handler)({ flakeRuns: -1 });

      expect(handler).not.toHaveBeenCalled();
      expect(process.exitCode).toBe(2);
    });

    it('should exit with the error code for unexpected failures', async () => {
      await commandAction(() => {
        throw new Error('disk full');
      })({});

      expect(process.exitCode).toBe(1);
      expect(vi.mocked(output.error)).toHaveBeenCalledWith('Error: disk full');
    });
  });
});
