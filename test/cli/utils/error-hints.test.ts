import { describe, it, expect, vi, afterEach } from 'vitest';
import { errorHints, printErrorHints } from '../../../src/cli/utils/error-hints.js';
import { ConfigError, ConfigNotFoundError, ValidationError } from '../../../src/errors/types.js';

describe('cli/utils/error-hints', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('errorHints', () => {
    it('should suggest creating a config file', () => {
      expect(errorHints(new ConfigNotFoundError(['/repo/paritykit.yaml']))).toEqual([
        'Run paritykit from the directory that holds paritykit.yaml',
        'Or pass --config <path>',
      ]);
    });

    it('should explain how to declare a missing backend', () => {
      expect(errorHints(new ConfigError('backends.right is required'))[0]).toBe(
        'Declare backends.left (implementation) and backends.right (reference) in paritykit.yaml'
      );
    });

    it('should point at scenarios.paths when nothing is runnable', () => {
      expect(errorHints(new ValidationError('No runnable scenarios in /repo/catalogue.yaml'))[0]).toBe(
        'List scenario catalogue files under scenarios.paths'
      );
    });

    it('should explain relative recording paths', () => {
      expect(errorHints(new ValidationError('Recording file not found: /repo/impl.json'))).toEqual([
        'Relative backend paths resolve against the directory of the config file',
      ]);
    });

    it('should mention the drift flags', () => {
      expect(errorHints(new ConfigError('drift.baseline and drift.candidate are required'))).toEqual([
        'Pass --baseline and --candidate, or set drift.baseline and drift.candidate',
      ]);
    });

    it('should return nothing for unrelated errors', () => {
      expect(errorHints(new Error('disk full'))).toEqual([]);
    });
  });

  describe('printErrorHints', () => {
    it('should print the hints to stderr', () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

      printErrorHints(new ValidationError('Recording file not found: /repo/impl.json'));

      expect(errorSpy.mock.calls.map((call) => call[0])).toEqual([
        '\nTry:',
        '  - Relative backend paths resolve against the directory of the config file',
      ]);
    });

    it('should print nothing without hints', () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

      printErrorHints(new Error('disk full'));

      expect(errorSpy).not.toHaveBeenCalled();
    });
  });
});
