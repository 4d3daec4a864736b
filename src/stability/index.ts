export { fingerprint } from './fingerprint.js';
export type { FlakeSummary, FlakeRun, BatchListenerFactory } from './flake.js';
export { FlakeRateEvaluator } from './flake.js';
export { percentile } from './percentile.js';
export type { FailureTrace, ReproSummary, BackendFactory, ReproTimerOptions } from './repro.js';
export { ReproTimer, formatMinutes } from './repro.js';
