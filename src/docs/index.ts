/**
 * Report artifacts.
 *
 * Every run writes a machine-readable JSON artifact (optionally checked
 * against the bundled JSON schema) and a Markdown summary for humans.
 */

export type { JsonArtifactOptions } from './json.js';
export { encodeArtifact, formatPercent } from './json.js';

export type { DifferentialArtifact } from './differential.js';
export { differentialJson, renderDifferentialJson, renderDifferentialMarkdown } from './differential.js';

export type { LatencyEvidence, ReleaseEvidence } from './release.js';
export { formatMetricValue, releaseJson, renderReleaseJson, renderReleaseMarkdown } from './release.js';

export { readinessJson, renderReadinessJson, renderReadinessMarkdown } from './readiness.js';

export { driftJson, renderDriftJson, renderDriftMarkdown } from './drift.js';

export { renderRegressionList } from './shared.js';
