// Sync Services - Re-exports
export { SyncService, type StartSyncOptions, type StartSyncResult } from "./service.js";
export { SyncScheduler, type SchedulerOptions } from "./scheduler.js";
export { SyncWorkerPool, type PoolStats } from "./worker-pool.js";
export {
  SyncOrchestrator,
  DEFAULT_ORCHESTRATOR_CONFIG,
  type OrchestratorConfig,
  type SyncProgress,
} from "./orchestrator.js";
export { SyncEvents, type SyncEventMap, type SyncEventName } from "./events.js";
export { RunLedger, type SyncStatus } from "./runs.js";
export { SourceRegistry, type SourceInput, type SourceSnapshot } from "./sources.js";
export {
  upsertEntity,
  commitBatch,
  getEntity,
  listSyncedSince,
  countEntitiesByType,
  type UpsertOutcome,
  type UpsertResult,
  type StoredEntity,
} from "./upsert.js";
export {
  recordEdges,
  resolvePending,
  listEdges,
  listOrphans,
  requeueOrphans,
  countRelationsByStatus,
  DEFAULT_ORPHAN_AFTER_RUNS,
} from "./relations.js";
export { normalize, type NormalizeResult } from "./canonical/index.js";
