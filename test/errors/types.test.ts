import { describe, expect, it } from 'vitest';
import {
  BackendExecutionError,
  ConfigError,
  ConfigNotFoundError,
  ConfigValidationError,
  EvidenceError,
  ParityError,
  ReproductionError,
  ValidationError,
  describeFault,
  getErrorMessage,
  isInputError,
  isParityError,
} from '../../src/errors/types.js';

describe('errors/types', () => {
  describe('ParityError', () => {
    it('should serialize code, context and cause', () => {
      const cause = new TypeError('bad payload');
      const error = new ParityError('run failed', { code: 'RUN_FAILED', context: { scenarioId: 'a' }, cause });

      expect(error.toJSON()).toEqual({
        name: 'ParityError',
        code: 'RUN_FAILED',
        message: 'run failed',
        context: { scenarioId: 'a' },
        cause: { name: 'TypeError', message: 'bad payload' },
      });
    });

    it('should default to an empty context', () => {
      const error = new ParityError('x', { code: 'X' });

      expect(error.context).toEqual({});
      expect(error.toJSON().cause).toBeUndefined();
    });
  });

  describe('ConfigNotFoundError', () => {
    it('should list the searched paths', () => {
      const error = new ConfigNotFoundError(['/work/paritykit.yaml', '/work/paritykit.yml']);

      expect(error).toBeInstanceOf(ConfigError);
      expect(error.code).toBe('CONFIG_ERROR');
      expect(error.searchedPaths).toEqual(['/work/paritykit.yaml', '/work/paritykit.yml']);
      expect(error.message).toBe(
        'No paritykit config file found. Searched:\n  - /work/paritykit.yaml\n  - /work/paritykit.yml\n\n' +
          'Create paritykit.yaml or pass --config <path>.'
      );
    });
  });

  describe('ConfigValidationError', () => {
    it('should format one line per issue', () => {
      const error = new ConfigValidationError('paritykit.yaml', ['corpus.size: too small', 'root: unknown key']);

      expect(error.name).toBe('ConfigValidationError');
      expect(error.issues).toHaveLength(2);
      expect(error.message).toBe(
        'Invalid configuration in paritykit.yaml:\n  - corpus.size: too small\n  - root: unknown key'
      );
    });
  });

  describe('ValidationError', () => {
    it('should record the offending field in its metadata', () => {
      const error = new ValidationError('id must not be blank', 'id', { scenarioId: 'x' });

      expect(error.code).toBe('VALIDATION_ERROR');
      expect(error.field).toBe('id');
      expect(error.context).toEqual({ scenarioId: 'x', metadata: { field: 'id' } });
    });
  });

  describe('BackendExecutionError', () => {
    it('should carry the backend name in its context', () => {
      const error = new BackendExecutionError('adapter crashed', 'reference', { scenarioId: 's1' });

      expect(error.backend).toBe('reference');
      expect(error.code).toBe('BACKEND_EXECUTION_FAILED');
      expect(error.context).toEqual({ scenarioId: 's1', backend: 'reference' });
    });
  });

  describe('EvidenceError', () => {
    it('should keep the artifact path', () => {
      const error = new EvidenceError('unreadable', '/reports/release-gates.json');

      expect(error.artifactPath).toBe('/reports/release-gates.json');
      expect(error.context.metadata).toEqual({ artifactPath: '/reports/release-gates.json' });
    });
  });

  describe('isInputError', () => {
    it('should accept configuration and validation errors only', () => {
      expect(isInputError(new ConfigError('x'))).toBe(true);
      expect(isInputError(new ValidationError('x'))).toBe(true);
      expect(isInputError(new ReproductionError('x'))).toBe(false);
      expect(isInputError(new Error('x'))).toBe(false);
    });
  });

  describe('isParityError', () => {
    it('should recognize subclasses', () => {
      expect(isParityError(new EvidenceError('x', 'p'))).toBe(true);
      expect(isParityError(new Error('x'))).toBe(false);
    });
  });

  describe('getErrorMessage', () => {
    it('should read messages from errors and stringify everything else', () => {
      expect(getErrorMessage(new Error('boom'))).toBe('boom');
      expect(getErrorMessage(42)).toBe('42');
    });
  });

  describe('describeFault', () => {
    it('should prefix the error name or value type', () => {
      expect(describeFault(new BackendExecutionError('no recording', 'left'))).toBe(
        'BackendExecutionError: no recording'
      );
      expect(describeFault('plain')).toBe('string: plain');
    });
  });
});
