export type { RunPlan, WorkflowProgress, WorkflowContext, ArtifactPaths } from './context.js';
export { createDiffEngine, writeArtifact, writeArtifactPair } from './context.js';
export type { BackendSide, BackendProvider } from './backends.js';
export { createBackend, configuredBackends, TimedBackend } from './backends.js';
export type { ResolvedScenarios } from './scenarios.js';
export { loadTemplates, resolveScenarios } from './scenarios.js';
export type { CorpusResult } from './corpus.js';
export { corpusJson, runCorpus } from './corpus.js';
export type { CompareOptions, CompareResult } from './compare.js';
export { runCompare } from './compare.js';
export type { ReleaseResult } from './release.js';
export { runRelease } from './release.js';
export type { ReadinessResult } from './readiness.js';
export { defaultReadinessGates, runReadiness } from './readiness.js';
export type { DriftResult } from './drift.js';
export { loadFixtureSnapshot, runDrift } from './drift.js';
