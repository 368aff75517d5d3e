/**
 * Product sync - provider pages reconciled into the catalog
 */

export { Reconciler, diffProduct, emptyReport } from "./reconciler.js";
export type { ReconcileReport, RecordFailure } from "./reconciler.js";
export { SyncOrchestrator, applyPage, describeRunFailure } from "./orchestrator.js";
export type { SyncOrchestratorOptions, TriggerResult } from "./orchestrator.js";
export { SyncStatusReporter } from "./status.js";
export { SyncScheduler } from "./scheduler.js";
export { DatabaseSyncRunStore } from "./run-store.js";
export type { SyncRunStore } from "./run-store.js";
export * from "./errors.js";
export * from "./types.js";
