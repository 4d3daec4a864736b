export type { Clock, HarnessOptions, ProgressListener } from './harness.js';
export { DifferentialHarness } from './harness.js';
