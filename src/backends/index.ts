export type { DifferentialBackend } from './types.js';
export { parseOutcome, parseOutcomeJson, scenarioToJson, outcomeToJson } from './types.js';
export { RecordedBackend, loadRecordedBackend } from './recorded.js';
export type { ProcessBackendOptions } from './process.js';
export { ProcessBackend } from './process.js';
