import { describe, it, expect } from 'vitest';
import {
  createCommand,
  createScenario,
  failureOutcome,
  formatCommandFailure,
  successOutcome,
} from '../../src/scenarios/types.js';
import { ValidationError } from '../../src/errors/types.js';

describe('scenarios/types', () => {
  describe('createScenario', () => {
    it('should trim id and description', () => {
      const scenario = createScenario({
        id: '  insert-basic ',
        description: ' insert one document ',
        commands: [createCommand('insert', { insert: 'users' })],
      });

      expect(scenario.id).toBe('insert-basic');
      expect(scenario.description).toBe('insert one document');
      expect(scenario.commands).toHaveLength(1);
    });

    it('should default a missing description to empty', () => {
      const scenario = createScenario({ id: 'a', commands: [createCommand('ping')] });
      expect(scenario.description).toBe('');
    });

    it('should reject a blank id', () => {
      expect(() => createScenario({ id: '  ', commands: [createCommand('ping')] })).toThrow(
        'id must not be blank'
      );
    });

    it('should reject an empty command list', () => {
      expect(() => createScenario({ id: 'a', commands: [] })).toThrow('commands must not be empty');
    });

    it('should freeze the scenario and copy payloads', () => {
      const payload = { insert: 'users', documents: [{ _id: 1 }] };
      const scenario = createScenario({ id: 'a', commands: [createCommand('insert', payload)] });
      payload.documents.push({ _id: 2 });

      expect(Object.isFrozen(scenario)).toBe(true);
      expect(scenario.commands[0].payload.documents).toEqual([{ _id: 1 }]);
    });
  });

  describe('createCommand', () => {
    it('should reject a blank command name', () => {
      expect(() => createCommand(' ')).toThrow(ValidationError);
    });
  });

  describe('outcomes', () => {
    it('should build a success outcome', () => {
      const outcome = successOutcome([{ ok: 1, n: 3 }]);
      expect(outcome.success).toBe(true);
      expect(outcome.commandResults).toEqual([{ ok: 1, n: 3 }]);
    });

    it('should trim the failure message', () => {
      expect(failureOutcome('  boom ').errorMessage).toBe('boom');
    });

    it('should require a failure message', () => {
      expect(() => failureOutcome('')).toThrow('errorMessage must not be blank');
    });
  });

  describe('formatCommandFailure', () => {
    it('should append code and codeName', () => {
      expect(formatCommandFailure('insert', 0, 'duplicate key', 11000, 'DuplicateKey')).toBe(
        "command 'insert' failed at index 0: duplicate key (code=11000, codeName=DuplicateKey)"
      );
    });

    it('should append only the code when no name is known', () => {
      expect(formatCommandFailure('find', 2, 'bad filter', 2)).toBe(
        "command 'find' failed at index 2: bad filter (code=2)"
      );
    });

    it('should omit the suffix without a code', () => {
      expect(formatCommandFailure('find', 1, 'oops')).toBe("command 'find' failed at index 1: oops");
    });
  });
});
