import type { SyncErrorKind } from "../errors.js";
import type {
  EntityCountersMap,
  EntityType,
  RelationStatus,
  RelationSummary,
  RelationType,
  RunState,
  SyncMode,
} from "../types/index.js";
import type {
  ColumnType,
  Generated,
  Insertable,
  Selectable,
  Updateable,
} from "kysely";

// ============================================================================
// Conventions
// ============================================================================
//
// Timestamps are ISO-8601 UTC strings and JSON documents are serialized
// text, so the same schema runs on PostgreSQL and on SQLite.

type Timestamp = string;

/**
 * JSON column: written and read as serialized text
 */
type JsonText = string;

// ============================================================================
// sources - one row per municipality endpoint
// ============================================================================

export interface SourcesTable {
  id: Generated<number>;
  name: string;
  base_url: string;
  credential: string | null;
  request_timeout_seconds: number;
  max_retries: number;
  default_mode: SyncMode;
  enabled: ColumnType<number, number | undefined, number>;
  high_water_mark: Timestamp | null;
  lease_owner: string | null;
  lease_expires_at: Timestamp | null;
  last_run_id: number | null;
  system_payload: JsonText | null;
  created_at: Timestamp;
  updated_at: Timestamp;
}

// ============================================================================
// entities - every canonical record, projected per type by oparl_* views
// ============================================================================

export interface EntitiesTable {
  id: Generated<number>;
  source_id: number;
  entity_type: EntityType;
  external_id: string;
  body_external_id: string | null;
  name: string | null;
  fields: JsonText;
  raw_payload: JsonText;
  content_hash: string;
  upstream_created_at: Timestamp | null;
  upstream_modified_at: Timestamp | null;
  deleted: number;
  created_at: Timestamp;
  updated_at: Timestamp;
  last_synced_at: Timestamp;
}

// ============================================================================
// entity_relations - resolved and pending edges between records
// ============================================================================

export interface EntityRelationsTable {
  id: Generated<number>;
  source_id: number;
  relation_type: RelationType;
  from_entity_id: number;
  target_external_id: string;
  target_entity_id: number | null;
  status: RelationStatus;
  unresolved_attempts: number;
  last_attempt_run_id: number | null;
  created_at: Timestamp;
  updated_at: Timestamp;
}

// ============================================================================
// sync_runs - one row per source invocation
// ============================================================================

export interface SyncRunsTable {
  id: Generated<number>;
  source_id: number;
  mode: SyncMode;
  state: RunState;
  requested_by: RunRequester;
  worker_id: string | null;
  counters: JsonText;
  errors: JsonText;
  error_counts: JsonText;
  relations: JsonText | null;
  high_water_mark_used: Timestamp | null;
  high_water_mark_produced: Timestamp | null;
  created_at: Timestamp;
  started_at: Timestamp | null;
  finished_at: Timestamp | null;
}

export type RunRequester = "cli" | "api" | "scheduler";

// ============================================================================
// Database Interface
// ============================================================================

export interface Database {
  sources: SourcesTable;
  entities: EntitiesTable;
  entity_relations: EntityRelationsTable;
  sync_runs: SyncRunsTable;
}

// ============================================================================
// Row Types (for convenience)
// ============================================================================

export type Source = Selectable<SourcesTable>;
export type NewSource = Insertable<SourcesTable>;
export type SourceUpdate = Updateable<SourcesTable>;

export type Entity = Selectable<EntitiesTable>;
export type NewEntity = Insertable<EntitiesTable>;
export type EntityUpdate = Updateable<EntitiesTable>;

export type EntityRelation = Selectable<EntityRelationsTable>;
export type NewEntityRelation = Insertable<EntityRelationsTable>;

export type SyncRun = Selectable<SyncRunsTable>;
export type NewSyncRun = Insertable<SyncRunsTable>;
export type SyncRunUpdate = Updateable<SyncRunsTable>;

// ============================================================================
// Decoded JSON columns
// ============================================================================

export interface RunErrorSample {
  kind: SyncErrorKind;
  entityType: EntityType | null;
  message: string;
  url?: string;
  externalId?: string;
  at: string;
}

export type ErrorCounts = Partial<Record<SyncErrorKind, number>>;

export interface DecodedSyncRun {
  id: number;
  sourceId: number;
  mode: SyncMode;
  state: RunState;
  requestedBy: RunRequester;
  workerId: string | null;
  counters: EntityCountersMap;
  errors: RunErrorSample[];
  errorCounts: ErrorCounts;
  relations: RelationSummary | null;
  highWaterMarkUsed: string | null;
  highWaterMarkProduced: string | null;
  createdAt: string;
  startedAt: string | null;
  finishedAt: string | null;
}
