/**
 * RunLedger - one row per sync run with its counters and diagnostics
 */

import { hostname } from "node:os";

import { jsonText, parseJsonText } from "../../db/connection.js";
import { NotFoundError, type SyncErrorKind } from "../../errors.js";
import { syncLogger } from "../../logger.js";

import type {
  Database,
  DecodedSyncRun,
  ErrorCounts,
  NewSyncRun,
  RunErrorSample,
  RunRequester,
  SyncRun,
} from "../../db/types.js";
import type {
  EntityCounters,
  EntityCountersMap,
  EntityType,
  RelationSummary,
  RunState,
  SyncMode,
} from "../../types/index.js";
import type { Kysely } from "kysely";

// ============================================================================
// Constants
// ============================================================================

export const MAX_ERROR_SAMPLES = 50;

const ACTIVE_STATES: RunState[] = ["PENDING", "RUNNING"];

export function createWorkerId(): string {
  return `${hostname()}-${String(process.pid)}-${Math.random().toString(36).slice(2, 8)}`;
}

export function emptyCounters(): EntityCounters {
  return { fetched: 0, upserted: 0, skipped: 0, failed: 0, inserted: 0, updated: 0 };
}

// ============================================================================
// Diagnostics
// ============================================================================

/**
 * Per-run error aggregation: every error is counted by kind, the first
 * MAX_ERROR_SAMPLES are kept in full.
 */
export class RunDiagnostics {
  readonly samples: RunErrorSample[] = [];
  readonly counts: ErrorCounts = {};

  record(
    kind: SyncErrorKind,
    entityType: EntityType | null,
    message: string,
    extra: { url?: string; externalId?: string } = {}
  ): void {
    this.counts[kind] = (this.counts[kind] ?? 0) + 1;
    if (this.samples.length < MAX_ERROR_SAMPLES) {
      this.samples.push({
        kind,
        entityType,
        message,
        ...extra,
        at: new Date().toISOString(),
      });
    }
  }

  count(kind: SyncErrorKind): number {
    return this.counts[kind] ?? 0;
  }
}

// ============================================================================
// Status
// ============================================================================

/**
 * What `getSyncStatus` reports for a run
 */
export interface SyncStatus {
  runId: number;
  sourceId: number;
  mode: SyncMode;
  state: RunState;
  requestedBy: RunRequester;
  workerId: string | null;
  perEntityType: EntityCountersMap;
  errors: RunErrorSample[];
  errorCounts: ErrorCounts;
  relations: RelationSummary | null;
  createdAt: string;
  startedAt: string | null;
  finishedAt: string | null;
  highWaterMarkUsed: string | null;
  highWaterMarkProduced: string | null;
}

export function decodeRun(row: SyncRun): DecodedSyncRun {
  return {
    id: row.id,
    sourceId: row.source_id,
    mode: row.mode,
    state: row.state,
    requestedBy: row.requested_by,
    workerId: row.worker_id,
    counters: parseJsonText<EntityCountersMap>(row.counters),
    errors: parseJsonText<RunErrorSample[]>(row.errors),
    errorCounts: parseJsonText<ErrorCounts>(row.error_counts),
    relations:
      row.relations !== null ? parseJsonText<RelationSummary>(row.relations) : null,
    highWaterMarkUsed: row.high_water_mark_used,
    highWaterMarkProduced: row.high_water_mark_produced,
    createdAt: row.created_at,
    startedAt: row.started_at,
    finishedAt: row.finished_at,
  };
}

export function toSyncStatus(run: DecodedSyncRun): SyncStatus {
  return {
    runId: run.id,
    sourceId: run.sourceId,
    mode: run.mode,
    state: run.state,
    requestedBy: run.requestedBy,
    workerId: run.workerId,
    perEntityType: run.counters,
    errors: run.errors,
    errorCounts: run.errorCounts,
    relations: run.relations,
    createdAt: run.createdAt,
    startedAt: run.startedAt,
    finishedAt: run.finishedAt,
    highWaterMarkUsed: run.highWaterMarkUsed,
    highWaterMarkProduced: run.highWaterMarkProduced,
  };
}

export interface RunOutcome {
  state: Extract<RunState, "SUCCESS" | "PARTIAL" | "FAILED">;
  counters: EntityCountersMap;
  diagnostics: RunDiagnostics;
  relations: RelationSummary | null;
  highWaterMarkProduced: string | null;
}

// ============================================================================
// RunLedger
// ============================================================================

export class RunLedger {
  constructor(private readonly db: Kysely<Database>) {}

  /**
   * Create a PENDING run, or return the source's active run if it has one.
   */
  async createRun(
    sourceId: number,
    mode: SyncMode,
    requestedBy: RunRequester
  ): Promise<{ run: DecodedSyncRun; isNew: boolean }> {
    const existing = await this.db
      .selectFrom("sync_runs")
      .selectAll()
      .where("source_id", "=", sourceId)
      .where("state", "in", ACTIVE_STATES)
      .orderBy("id")
      .executeTakeFirst();

    if (existing !== undefined) {
      return { run: decodeRun(existing), isNew: false };
    }

    const row: NewSyncRun = {
      source_id: sourceId,
      mode,
      state: "PENDING",
      requested_by: requestedBy,
      worker_id: null,
      counters: jsonText({}),
      errors: jsonText([]),
      error_counts: jsonText({}),
      relations: null,
      high_water_mark_used: null,
      high_water_mark_produced: null,
      created_at: new Date().toISOString(),
      started_at: null,
      finished_at: null,
    };

    const run = await this.db
      .insertInto("sync_runs")
      .values(row)
      .returningAll()
      .executeTakeFirstOrThrow();

    syncLogger.info({ runId: run.id, sourceId, mode, requestedBy }, "Created sync run");
    return { run: decodeRun(run), isNew: true };
  }

  async getRun(runId: number): Promise<DecodedSyncRun | null> {
    const row = await this.db
      .selectFrom("sync_runs")
      .selectAll()
      .where("id", "=", runId)
      .executeTakeFirst();
    return row !== undefined ? decodeRun(row) : null;
  }

  async requireRun(runId: number): Promise<DecodedSyncRun> {
    const run = await this.getRun(runId);
    if (run === null) {
      throw new NotFoundError("run", runId);
    }
    return run;
  }

  async listRuns(
    sourceId: number,
    options: { limit?: number; offset?: number } = {}
  ): Promise<DecodedSyncRun[]> {
    const rows = await this.db
      .selectFrom("sync_runs")
      .selectAll()
      .where("source_id", "=", sourceId)
      .orderBy("id", "desc")
      .limit(options.limit ?? 20)
      .offset(options.offset ?? 0)
      .execute();
    return rows.map(decodeRun);
  }

  async listByState(state: RunState): Promise<DecodedSyncRun[]> {
    const rows = await this.db
      .selectFrom("sync_runs")
      .selectAll()
      .where("state", "=", state)
      .orderBy("id")
      .execute();
    return rows.map(decodeRun);
  }

  // ==========================================================================
  // Transitions
  // ==========================================================================

  async markRunning(
    runId: number,
    workerId: string,
    highWaterMarkUsed: string | null
  ): Promise<void> {
    await this.db
      .updateTable("sync_runs")
      .set({
        state: "RUNNING",
        worker_id: workerId,
        high_water_mark_used: highWaterMarkUsed,
        started_at: new Date().toISOString(),
      })
      .where("id", "=", runId)
      .execute();
  }

  async saveProgress(runId: number, counters: EntityCountersMap): Promise<void> {
    await this.db
      .updateTable("sync_runs")
      .set({ counters: jsonText(counters) })
      .where("id", "=", runId)
      .execute();
  }

  async finishRun(runId: number, outcome: RunOutcome): Promise<void> {
    await this.db
      .updateTable("sync_runs")
      .set({
        state: outcome.state,
        counters: jsonText(outcome.counters),
        errors: jsonText(outcome.diagnostics.samples),
        error_counts: jsonText(outcome.diagnostics.counts),
        relations: outcome.relations !== null ? jsonText(outcome.relations) : null,
        high_water_mark_produced: outcome.highWaterMarkProduced,
        finished_at: new Date().toISOString(),
      })
      .where("id", "=", runId)
      .execute();
  }

  /**
   * Fail a run that never got to process anything
   */
  async failRun(runId: number, kind: SyncErrorKind, message: string): Promise<void> {
    const diagnostics = new RunDiagnostics();
    diagnostics.record(kind, null, message);
    await this.finishRun(runId, {
      state: "FAILED",
      counters: {},
      diagnostics,
      relations: null,
      highWaterMarkProduced: null,
    });
  }

  /**
   * Mark RUNNING runs whose source lease has expired (or is gone) as
   * FAILED. Their worker is no longer renewing them.
   */
  async recoverStaleRuns(now: Date = new Date()): Promise<number[]> {
    const nowIso = now.toISOString();
    const stale = await this.db
      .selectFrom("sync_runs")
      .innerJoin("sources", "sources.id", "sync_runs.source_id")
      .select(["sync_runs.id", "sync_runs.source_id"])
      .where("sync_runs.state", "=", "RUNNING")
      .where((eb) =>
        eb.or([
          eb("sources.lease_expires_at", "is", null),
          eb("sources.lease_expires_at", "<", nowIso),
        ])
      )
      .execute();

    for (const run of stale) {
      await this.failRun(run.id, "stale_run", "Run abandoned: its lease expired");
      syncLogger.warn({ runId: run.id, sourceId: run.source_id }, "Recovered stale run");
    }

    return stale.map((run) => run.id);
  }
}
