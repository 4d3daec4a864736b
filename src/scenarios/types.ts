/**
 * Scenario model: named command sequences replayed against both backends,
 * and the outcomes they produce.
 */

import { ValidationError } from '../errors/types.js';
import { optionalText, requireText } from '../utils/preconditions.js';
import { cloneMap, type StructuredMap } from './values.js';

/**
 * One command of a scenario, e.g. `insert` with its payload document.
 */
export interface ScenarioCommand {
  readonly commandName: string;
  readonly payload: StructuredMap;
}

export interface Scenario {
  readonly id: string;
  readonly description: string;
  readonly commands: readonly ScenarioCommand[];
}

export interface SuccessOutcome {
  readonly success: true;
  /** One result document per executed command */
  readonly commandResults: readonly StructuredMap[];
}

export interface FailureOutcome {
  readonly success: false;
  readonly errorMessage: string;
}

/**
 * Observed result of executing a scenario on one backend.
 */
export type ScenarioOutcome = SuccessOutcome | FailureOutcome;

export function createCommand(commandName: string, payload: StructuredMap = {}): ScenarioCommand {
  return Object.freeze({
    commandName: requireText(commandName, 'commandName'),
    payload: cloneMap(payload),
  });
}

export function createScenario(input: {
  id: string;
  description?: string | null;
  commands: readonly ScenarioCommand[];
}): Scenario {
  const id = requireText(input.id, 'id');
  if (input.commands.length === 0) {
    throw new ValidationError('commands must not be empty', 'commands', { scenarioId: id });
  }
  return Object.freeze({
    id,
    description: optionalText(input.description),
    commands: Object.freeze(input.commands.map((c) => createCommand(c.commandName, c.payload))),
  });
}

export function successOutcome(commandResults: readonly StructuredMap[]): SuccessOutcome {
  const outcome: SuccessOutcome = {
    success: true,
    commandResults: Object.freeze(commandResults.map((result) => cloneMap(result))),
  };
  return Object.freeze(outcome);
}

export function failureOutcome(errorMessage: string): FailureOutcome {
  const outcome: FailureOutcome = {
    success: false,
    errorMessage: requireText(errorMessage, 'errorMessage'),
  };
  return Object.freeze(outcome);
}

/**
 * Format a command failure the way backends report it:
 * `command 'insert' failed at index 0: duplicate key (code=11000, codeName=DuplicateKey)`.
 */
export function formatCommandFailure(
  commandName: string,
  index: number,
  message: string,
  code?: number,
  codeName?: string
): string {
  let text = `command '${commandName}' failed at index ${index}: ${message}`;
  if (code !== undefined) {
    text += codeName ? ` (code=${code}, codeName=${codeName})` : ` (code=${code})`;
  }
  return text;
}
