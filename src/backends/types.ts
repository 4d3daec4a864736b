/**
 * Backend capability and the outcome wire format shared by adapters.
 */

import { z } from 'zod';
import { ValidationError, getErrorMessage } from '../errors/types.js';
import {
  failureOutcome,
  successOutcome,
  type Scenario,
  type ScenarioOutcome,
} from '../scenarios/types.js';
import { toJsonValue, toStructuredMap, type JsonValue } from '../scenarios/values.js';
import { parseJsonDocument } from '../utils/yaml-parser.js';

/**
 * Anything that can execute a scenario and report a structured outcome.
 *
 * A structured server failure is returned as a failure outcome. Throwing is
 * reserved for faults where no outcome exists (crash, timeout, bad output);
 * the harness turns those into ERROR results.
 */
export interface DifferentialBackend {
  readonly name: string;
  execute(scenario: Scenario): Promise<ScenarioOutcome>;
}

// Results stay `unknown` here: zod rebuilds records it parses, and
// toStructuredMap checks them without dropping any key.
const outcomeSchema = z.discriminatedUnion('success', [
  z.object({
    success: z.literal(true),
    commandResults: z.array(z.unknown()),
  }),
  z.object({
    success: z.literal(false),
    errorMessage: z.string().trim().min(1, 'errorMessage must not be blank'),
  }),
]);

/**
 * Validate an untyped outcome document (as produced by {@link parseJsonDocument}).
 */
export function parseOutcome(raw: unknown, source = 'outcome'): ScenarioOutcome {
  const parsed = outcomeSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new ValidationError(`Invalid ${source}: ${issues.join('; ')}`);
  }
  if (parsed.data.success) {
    try {
      return successOutcome(
        parsed.data.commandResults.map((result, index) => toStructuredMap(result, `$.commandResults[${index}]`))
      );
    } catch (error) {
      throw new ValidationError(`Invalid ${source}: ${getErrorMessage(error)}`);
    }
  }
  return failureOutcome(parsed.data.errorMessage);
}

/**
 * Parse adapter output text into an outcome.
 */
export function parseOutcomeJson(text: string, source = 'outcome'): ScenarioOutcome {
  return parseOutcome(parseJsonDocument(text, source), source);
}

/**
 * JSON document sent to adapters for one scenario.
 */
export function scenarioToJson(scenario: Scenario): JsonValue {
  return {
    id: scenario.id,
    description: scenario.description,
    commands: scenario.commands.map((command) => ({
      commandName: command.commandName,
      payload: toJsonValue(command.payload),
    })),
  };
}

export function outcomeToJson(outcome: ScenarioOutcome): JsonValue {
  if (outcome.success) {
    return { success: true, commandResults: outcome.commandResults.map((result) => toJsonValue(result)) };
  }
  return { success: false, errorMessage: outcome.errorMessage };
}
