/**
 * Scenario model, structured values and catalogue loading.
 */

export type {
  Scenario,
  ScenarioCommand,
  ScenarioOutcome,
  SuccessOutcome,
  FailureOutcome,
} from './types.js';
export {
  createCommand,
  createScenario,
  successOutcome,
  failureOutcome,
  formatCommandFailure,
} from './types.js';

export type { StructuredValue, StructuredMap, NumericValue, JsonValue } from './values.js';
export {
  canonicalJson,
  cloneMap,
  cloneValue,
  isDecimal,
  isNumericValue,
  isStructuredList,
  isStructuredMap,
  numericEquals,
  toDecimal,
  toJsonValue,
  toStructuredMap,
  toStructuredValue,
} from './values.js';

export type { SkipReason, ScenarioLoadResult, LoadedCatalogue } from './loader.js';
export { loadScenarioCatalogue, loadScenarios } from './loader.js';
