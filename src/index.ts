// loadplan: library entry point
export {
  RunController,
  computeExitStatus,
  type ExitStatus,
  type GlobalConfig,
  type RunControllerOptions,
  type RunResult
} from './engine/RunController.js';
export { Scheduler, type SchedulerOptions, type SchedulerResult } from './engine/Scheduler.js';
export { ExecutorInstance, type ExecutorInstanceSnapshot, type StateChange } from './engine/ExecutorInstance.js';
export {
  MetricsAggregator,
  OVERALL_KEY,
  type AggregateReport,
  type ExecutorSummary,
  type LatencyStats
} from './engine/MetricsAggregator.js';
export { ArtifactStore, type ArtifactStoreOptions } from './artifacts/ArtifactStore.js';
export {
  ExecutorRegistry,
  createDefaultRegistry,
  type DriverContext,
  type ExecutorDefinition
} from './executors/registry.js';
export { ProcessDriver, type CommandLine, type ProcessDriverOptions } from './executors/ProcessDriver.js';
export { JsonLinesDriver } from './executors/JsonLinesDriver.js';
export type {
  DriverHandle,
  DriverState,
  ExecutorDriver,
  HarvestResult,
  LifecycleState,
  MetricKind,
  PollResult,
  Sample
} from './executors/types.js';
export { buildTestPlan, type ExecutorSpec, type TestPlan } from './plan/TestPlan.js';
export { loadSettingsDir, parsePlanText, readPlanDocument, readPlanDocuments } from './plan/documents.js';
export { applyOverrides, parseOverride } from './plan/overrides.js';
export { toRunSettings, type RunSettings } from './config/settings.js';
export { formatRunSummary } from './reporting/summary.js';
export { createRunLogger, createSilentLogger } from './utils/logger.js';
export * from './errors.js';
