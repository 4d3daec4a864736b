export type { RegressionSample } from './regressions.js';
export { topRegressions } from './regressions.js';
export type { DriftStatus, FixtureSnapshot, FieldDrift, CollectionDrift, DriftReport } from './drift.js';
export { analyzeDrift, round4 } from './drift.js';
