export type { DiffEntry, DiffStatus, DiffResult, DifferentialReport, ReportCounts } from './types.js';
export { DIFF_STATUSES, DiffResults, createDiffEntry, createReport, summarizeReport } from './types.js';
export type { DiffEngineOptions } from './engine.js';
export { DiffEngine, DIFF_NOTES, compareValue } from './engine.js';
export type { FailureSignature } from './failure-signature.js';
export { FailureSignatureParser } from './failure-signature.js';
export { stripKeys, stripMapKeys } from './normalize.js';
