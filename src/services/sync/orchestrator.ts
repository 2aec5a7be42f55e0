/**
 * Sync Orchestrator - drives one run for one source
 *
 * System → bodies → per-body entity lists in dependency order, page by
 * page through normalization and batched storage, then the relation
 * reconciliation pass. Counters and diagnostics are aggregated per entity
 * type; a type that fails does not stop the others.
 */

import { jsonText } from "../../db/connection.js";
import {
  FetchError,
  LeaseError,
  ParseError,
  RelationResolutionFailure,
  StorageError,
  SyncCancelledError,
  errorMessage,
} from "../../errors.js";
import { syncLogger } from "../../logger.js";
import {
  CircuitBreaker,
  DEFAULT_CIRCUIT_BREAKER_OPTIONS,
} from "../../scraper/circuit-breaker.js";
import { OParlClient, type FetchLike } from "../../scraper/client.js";
import {
  RetryPolicy,
  type RetryEvent,
  type RetryOptions,
} from "../../scraper/retry.js";
import { BODY_ENTITY_SEQUENCE } from "../../types/index.js";

import { normalize } from "./canonical/index.js";
import { isJsonObject, text } from "./canonical/fields.js";
import { LeaseKeeper } from "./lease-keeper.js";
import { resolvePending, DEFAULT_ORPHAN_AFTER_RUNS } from "./relations.js";
import {
  RunDiagnostics,
  RunLedger,
  createWorkerId,
  emptyCounters,
  toSyncStatus,
  type RunOutcome,
  type SyncStatus,
} from "./runs.js";
import { SourceRegistry, type SourceSnapshot } from "./sources.js";
import { commitBatch } from "./upsert.js";

import type { SyncEvents } from "./events.js";
import type { Database } from "../../db/types.js";
import type {
  CanonicalRecord,
  EntityCounters,
  EntityCountersMap,
  EntityType,
  JsonValue,
  RelationSummary,
  SyncMode,
} from "../../types/index.js";
import type { Kysely } from "kysely";

// ============================================================================
// Types
// ============================================================================

export interface OrchestratorConfig {
  leaseTtlSeconds: number;
  orphanAfterRuns: number;
  pageDelayMs: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  maxPages: number;
  circuitFailureThreshold: number;
  circuitRecoveryMs: number;
  circuitSuccessThreshold: number;
}

export const DEFAULT_ORCHESTRATOR_CONFIG: OrchestratorConfig = {
  leaseTtlSeconds: 600,
  orphanAfterRuns: DEFAULT_ORPHAN_AFTER_RUNS,
  pageDelayMs: 100,
  retryBaseDelayMs: 500,
  retryMaxDelayMs: 30_000,
  maxPages: 10_000,
  circuitFailureThreshold: DEFAULT_CIRCUIT_BREAKER_OPTIONS.failureThreshold,
  circuitRecoveryMs: DEFAULT_CIRCUIT_BREAKER_OPTIONS.recoveryTimeoutMs,
  circuitSuccessThreshold: DEFAULT_CIRCUIT_BREAKER_OPTIONS.successThreshold,
};

const MIN_LEASE_RENEW_INTERVAL_MS = 1000;

export interface OrchestratorOptions {
  config?: Partial<OrchestratorConfig>;
  workerId?: string;
  /** Replaces the global fetch for every client this orchestrator builds */
  fetch?: FetchLike;
  events?: SyncEvents;
  /** Jitter and sleep overrides for the retry policy */
  retryHooks?: Pick<RetryOptions, "random" | "sleep">;
  /** Called for every retried request, after the failed attempt */
  onRetry?: (event: RetryEvent & { runId: number; sourceId: number }) => void;
  now?: () => Date;
}

export interface SyncProgress {
  runId: number;
  phase: "system" | "relations" | EntityType;
  bodyExternalId: string | null;
  pages: number;
  counters: EntityCountersMap;
}

type ProgressCallback = (progress: SyncProgress) => void;

export interface ExecuteOptions {
  signal?: AbortSignal;
  onProgress?: ProgressCallback;
}

// ============================================================================
// Run State
// ============================================================================

/**
 * Mutable state of one run in progress
 */
class RunContext {
  readonly counters = new Map<EntityType, EntityCounters>();
  readonly diagnostics = new RunDiagnostics();
  readonly failedTypes = new Set<EntityType>();
  readonly processedTypes = new Set<EntityType>();
  /** External ids already handled in this run */
  readonly seen = new Set<string>();
  pages = 0;

  constructor(
    readonly runId: number,
    readonly source: SourceSnapshot,
    readonly mode: SyncMode,
    readonly highWaterMark: string | null,
    readonly client: OParlClient,
    readonly lease: LeaseKeeper,
    readonly signal: AbortSignal | undefined
  ) {}

  countersFor(entityType: EntityType): EntityCounters {
    let counters = this.counters.get(entityType);
    if (counters === undefined) {
      counters = emptyCounters();
      this.counters.set(entityType, counters);
    }
    return counters;
  }

  snapshot(): EntityCountersMap {
    const result: EntityCountersMap = {};
    for (const [entityType, counters] of this.counters) {
      result[entityType] = { ...counters };
    }
    return result;
  }
}

function isOlderThan(modified: string | null, since: string): boolean {
  if (modified === null) {
    return false;
  }
  const modifiedAt = Date.parse(modified);
  return !Number.isNaN(modifiedAt) && modifiedAt < Date.parse(since);
}

// ============================================================================
// Sync Orchestrator
// ============================================================================

export class SyncOrchestrator {
  readonly workerId: string;
  private readonly config: OrchestratorConfig;
  private readonly ledger: RunLedger;
  private readonly registry: SourceRegistry;
  private readonly now: () => Date;

  constructor(
    private readonly db: Kysely<Database>,
    private readonly options: OrchestratorOptions = {}
  ) {
    this.config = { ...DEFAULT_ORCHESTRATOR_CONFIG, ...options.config };
    this.workerId = options.workerId ?? createWorkerId();
    this.ledger = new RunLedger(db);
    this.registry = new SourceRegistry(db);
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Execute a PENDING run to completion and return its final status.
   * Runs that are no longer PENDING are returned untouched.
   */
  async execute(runId: number, options: ExecuteOptions = {}): Promise<SyncStatus> {
    const run = await this.ledger.requireRun(runId);
    if (run.state !== "PENDING") {
      syncLogger.warn({ runId, state: run.state }, "Run is not pending, skipping");
      return toSyncStatus(run);
    }

    const source = await this.registry.requireSource(run.sourceId);
    const startedAt = Date.now();

    const leased = await this.registry.acquireLease(
      source.id,
      this.workerId,
      this.config.leaseTtlSeconds,
      this.now()
    );
    if (!leased) {
      const message = `Source ${String(source.id)} is leased by another worker`;
      syncLogger.warn({ runId, sourceId: source.id }, message);
      await this.ledger.failRun(runId, "lease_unavailable", message);
      await this.registry.setLastRun(source.id, runId);
      this.emitFinished(runId, source.id, "FAILED", startedAt, 1);
      return toSyncStatus(await this.ledger.requireRun(runId));
    }

    const lease = new LeaseKeeper(this.registry, {
      sourceId: source.id,
      owner: this.workerId,
      ttlSeconds: this.config.leaseTtlSeconds,
      now: this.now,
    });
    lease.start(
      Math.max(MIN_LEASE_RENEW_INTERVAL_MS, (this.config.leaseTtlSeconds * 1000) / 2)
    );

    try {
      const outcome = await this.runLeased(runId, run.mode, source, lease, options);
      this.emitFinished(
        runId,
        source.id,
        outcome.state,
        startedAt,
        outcome.diagnostics.samples.length
      );
    } finally {
      await lease.stop();
      await this.registry.releaseLease(source.id, this.workerId);
    }

    return toSyncStatus(await this.ledger.requireRun(runId));
  }

  private emitFinished(
    runId: number,
    sourceId: number,
    state: RunOutcome["state"],
    startedAt: number,
    errorCount: number
  ): void {
    this.options.events?.emit("run:finished", {
      runId,
      sourceId,
      state,
      durationMs: Date.now() - startedAt,
      errorCount,
    });
  }

  private createClient(
    runId: number,
    source: SourceSnapshot,
    signal: AbortSignal | undefined
  ): OParlClient {
    const onRetry = this.options.onRetry;
    return new OParlClient({
      credential: source.credential,
      requestTimeoutSeconds: source.requestTimeoutSeconds,
      retry: new RetryPolicy({
        maxRetries: source.maxRetries,
        baseDelayMs: this.config.retryBaseDelayMs,
        maxDelayMs: this.config.retryMaxDelayMs,
        ...this.options.retryHooks,
      }),
      minRequestIntervalMs: this.config.pageDelayMs,
      maxPages: this.config.maxPages,
      fetch: this.options.fetch,
      signal,
      circuitBreaker: new CircuitBreaker({
        name: source.name,
        failureThreshold: this.config.circuitFailureThreshold,
        recoveryTimeoutMs: this.config.circuitRecoveryMs,
        successThreshold: this.config.circuitSuccessThreshold,
      }),
      onRetry:
        onRetry === undefined
          ? undefined
          : (event) => {
              onRetry({ ...event, runId, sourceId: source.id });
            },
    });
  }

  private async runLeased(
    runId: number,
    mode: SyncMode,
    source: SourceSnapshot,
    lease: LeaseKeeper,
    options: ExecuteOptions
  ): Promise<RunOutcome> {
    const fetchTimestamp = this.now().toISOString();
    // Incremental without a mark yet behaves as a full run
    const highWaterMark = mode === "INCREMENTAL" ? source.highWaterMark : null;

    await this.ledger.markRunning(runId, this.workerId, highWaterMark);
    this.options.events?.emit("run:started", {
      runId,
      sourceId: source.id,
      mode,
      highWaterMarkUsed: highWaterMark,
    });

    syncLogger.info(
      { runId, sourceId: source.id, mode, highWaterMark, workerId: this.workerId },
      "Sync run started"
    );

    const ctx = new RunContext(
      runId,
      source,
      mode,
      highWaterMark,
      this.createClient(runId, source, options.signal),
      lease,
      options.signal
    );

    let outcome: RunOutcome;
    try {
      outcome = await this.process(ctx, fetchTimestamp, options.onProgress);
    } catch (error) {
      outcome = this.abortedOutcome(ctx, error);
    }

    await this.ledger.finishRun(runId, outcome);
    if (outcome.highWaterMarkProduced !== null) {
      await this.registry.advanceHighWaterMark(
        source.id,
        outcome.highWaterMarkProduced,
        runId
      );
    } else {
      await this.registry.setLastRun(source.id, runId);
    }

    syncLogger.info(
      {
        runId,
        sourceId: source.id,
        state: outcome.state,
        errorCounts: outcome.diagnostics.counts,
        relations: outcome.relations,
        client: ctx.client.stats,
      },
      "Sync run finished"
    );

    return outcome;
  }

  /**
   * Cancellation, lease loss and unexpected errors end the run as FAILED
   * without the reconciliation pass
   */
  private abortedOutcome(ctx: RunContext, error: unknown): RunOutcome {
    if (error instanceof SyncCancelledError) {
      ctx.diagnostics.record("cancelled", null, error.message);
    } else if (error instanceof LeaseError) {
      ctx.diagnostics.record(error.kind, null, error.message);
    } else {
      syncLogger.error({ runId: ctx.runId, error }, "Sync run crashed");
      ctx.diagnostics.record("internal", null, errorMessage(error));
    }
    return {
      state: "FAILED",
      counters: ctx.snapshot(),
      diagnostics: ctx.diagnostics,
      relations: null,
      highWaterMarkProduced: null,
    };
  }

  // ==========================================================================
  // Phases
  // ==========================================================================

  private async process(
    ctx: RunContext,
    fetchTimestamp: string,
    onProgress: ProgressCallback | undefined
  ): Promise<RunOutcome> {
    const report = (phase: SyncProgress["phase"], bodyExternalId: string | null): void => {
      onProgress?.({
        runId: ctx.runId,
        phase,
        bodyExternalId,
        pages: ctx.pages,
        counters: ctx.snapshot(),
      });
    };

    // System
    report("system", null);
    let bodyListUrl: string;
    try {
      const { system, raw } = await ctx.client.fetchSystem(ctx.source.baseUrl);
      await this.registry.saveSystemPayload(ctx.source.id, jsonText(raw));
      bodyListUrl = system.bodyListUrl;
    } catch (error) {
      if (!(error instanceof FetchError) && !(error instanceof ParseError)) {
        throw error;
      }
      ctx.diagnostics.record(error.kind, null, error.message, { url: error.url });
      return this.finalOutcome(ctx, null, null);
    }

    // Bodies are always listed in full: their list URLs are needed even
    // when the body itself did not change
    const bodies: CanonicalRecord<"body">[] = [];
    report("body", null);
    await this.processList(ctx, "body", bodyListUrl, null, null, (record) => {
      bodies.push(record);
    });

    // Per-body entity lists
    for (const body of bodies) {
      for (const entityType of BODY_ENTITY_SEQUENCE) {
        this.checkCancelled(ctx);
        const url = body.fields.lists[entityType];
        if (url === undefined) {
          continue;
        }
        report(entityType, body.externalId);
        await this.processList(
          ctx,
          entityType,
          url,
          ctx.highWaterMark,
          body.externalId
        );
      }
    }

    if (ctx.processedTypes.size === 0) {
      return this.finalOutcome(ctx, null, null);
    }

    // Reconciliation
    this.checkCancelled(ctx);
    await ctx.lease.ensure();
    report("relations", null);
    let relations: RelationSummary | null = null;
    try {
      const result = await resolvePending(this.db, ctx.source.id, {
        runId: ctx.runId,
        orphanAfterRuns: this.config.orphanAfterRuns,
        now: this.now().toISOString(),
        onOrphaned: (edge) => {
          const failure = new RelationResolutionFailure(
            edge.relation_type,
            edge.from_entity_id,
            edge.target_external_id,
            edge.unresolved_attempts
          );
          ctx.diagnostics.record(failure.kind, null, failure.message, {
            externalId: failure.targetExternalId,
          });
          this.options.events?.emit("relation:orphaned", {
            runId: ctx.runId,
            sourceId: ctx.source.id,
            relationType: edge.relation_type,
            fromEntityId: edge.from_entity_id,
            targetExternalId: edge.target_external_id,
          });
        },
      });
      relations = {
        resolved: result.resolved,
        stillPending: result.stillPending,
        orphaned: result.orphaned,
      };
    } catch (error) {
      syncLogger.error({ runId: ctx.runId, error }, "Relation resolution failed");
      ctx.diagnostics.record("storage", null, `Relation resolution failed: ${errorMessage(error)}`);
    }

    return this.finalOutcome(ctx, relations, fetchTimestamp);
  }

  private finalOutcome(
    ctx: RunContext,
    relations: RelationSummary | null,
    fetchTimestamp: string | null
  ): RunOutcome {
    let state: RunOutcome["state"];
    if (ctx.processedTypes.size === 0) {
      state = "FAILED";
    } else if (ctx.failedTypes.size > 0 || relations === null) {
      state = "PARTIAL";
    } else {
      state = "SUCCESS";
    }

    return {
      state,
      counters: ctx.snapshot(),
      diagnostics: ctx.diagnostics,
      relations,
      highWaterMarkProduced: state === "FAILED" ? null : fetchTimestamp,
    };
  }

  // ==========================================================================
  // Page Boundaries
  // ==========================================================================

  private checkCancelled(ctx: RunContext): void {
    if (ctx.signal?.aborted === true) {
      throw new SyncCancelledError();
    }
  }

  // ==========================================================================
  // Entity Lists
  // ==========================================================================

  /**
   * Walk one list endpoint. Returns false when the entity type failed.
   */
  private async processList<T extends EntityType>(
    ctx: RunContext,
    entityType: T,
    url: string,
    since: string | null,
    bodyExternalId: string | null,
    onRecord?: (record: CanonicalRecord<T>) => void
  ): Promise<boolean> {
    const counters = ctx.countersFor(entityType);

    try {
      for await (const page of ctx.client.fetchList(url, { since })) {
        // A page that arrived is stored while the lease holds; cancellation
        // takes effect once it is written
        await ctx.lease.ensure();
        ctx.pages++;

        if (page.kind === "parse_error") {
          ctx.diagnostics.record("parse", entityType, page.error.message, {
            url: page.url,
          });
        } else {
          const batch = this.normalizePage(
            ctx,
            entityType,
            page.url,
            page.items,
            since,
            bodyExternalId,
            onRecord
          );
          if (!(await this.storeBatch(ctx, entityType, batch))) {
            return false;
          }
          await this.ledger.saveProgress(ctx.runId, ctx.snapshot());
        }

        this.checkCancelled(ctx);
      }
    } catch (error) {
      if (error instanceof SyncCancelledError || error instanceof LeaseError) {
        throw error;
      }
      ctx.failedTypes.add(entityType);
      if (error instanceof FetchError || error instanceof ParseError) {
        syncLogger.error(
          { runId: ctx.runId, entityType, url: error.url, error: error.message },
          "Entity list failed"
        );
        ctx.diagnostics.record(error.kind, entityType, error.message, { url: error.url });
      } else {
        syncLogger.error({ runId: ctx.runId, entityType, url, error }, "Entity list crashed");
        ctx.diagnostics.record("internal", entityType, errorMessage(error), { url });
      }
      return false;
    }

    ctx.processedTypes.add(entityType);
    syncLogger.info(
      { runId: ctx.runId, entityType, bodyExternalId, ...counters },
      "Entity list synced"
    );
    return true;
  }

  private normalizePage<T extends EntityType>(
    ctx: RunContext,
    entityType: T,
    url: string,
    items: JsonValue[],
    since: string | null,
    bodyExternalId: string | null,
    onRecord?: (record: CanonicalRecord<T>) => void
  ): CanonicalRecord[] {
    const counters = ctx.countersFor(entityType);
    const batch: CanonicalRecord[] = [];

    for (const item of items) {
      counters.fetched++;

      if (!isJsonObject(item)) {
        counters.failed++;
        ctx.diagnostics.record(
          "validation",
          entityType,
          `${entityType} list entry is not an object`,
          { url }
        );
        continue;
      }

      const externalId = text(item.id);
      if (externalId !== null && ctx.seen.has(externalId)) {
        counters.skipped++;
        continue;
      }
      if (since !== null && isOlderThan(text(item.modified), since)) {
        counters.skipped++;
        continue;
      }

      const result = normalize(entityType, item, { bodyExternalId });
      if (!result.ok) {
        counters.failed++;
        ctx.diagnostics.record("validation", entityType, result.failure.message, {
          externalId: result.failure.externalId ?? undefined,
        });
        continue;
      }

      ctx.seen.add(result.record.externalId);
      batch.push(result.record);
      onRecord?.(result.record);

      for (const nested of result.nested) {
        if (!ctx.seen.has(nested.externalId)) {
          ctx.seen.add(nested.externalId);
          batch.push(nested);
        }
      }
      for (const failure of result.nestedFailures) {
        ctx.countersFor(failure.entityType).failed++;
        ctx.diagnostics.record("validation", failure.entityType, failure.message, {
          externalId: failure.externalId ?? undefined,
        });
      }
    }

    return batch;
  }

  private async storeBatch(
    ctx: RunContext,
    entityType: EntityType,
    batch: CanonicalRecord[]
  ): Promise<boolean> {
    try {
      const result = await commitBatch(
        this.db,
        ctx.source.id,
        batch,
        this.now().toISOString()
      );

      for (const { record, result: upsert } of result.written) {
        const counters = ctx.countersFor(record.entityType);
        counters.upserted++;
        if (upsert.outcome === "unchanged") {
          continue;
        }
        counters[upsert.outcome]++;
        this.options.events?.emit("entity:changed", {
          runId: ctx.runId,
          sourceId: ctx.source.id,
          entityType: record.entityType,
          entityId: upsert.id,
          externalId: record.externalId,
          change: upsert.outcome,
        });
      }

      for (const { record, error } of result.failures) {
        ctx.countersFor(record.entityType).failed++;
        ctx.diagnostics.record("storage", record.entityType, error.message, {
          externalId: record.externalId,
        });
      }
      return true;
    } catch (error) {
      if (!(error instanceof StorageError)) {
        throw error;
      }
      for (const record of batch) {
        ctx.countersFor(record.entityType).failed++;
      }
      ctx.failedTypes.add(entityType);
      ctx.diagnostics.record("storage", entityType, error.message);
      syncLogger.error(
        { runId: ctx.runId, entityType, error: error.message },
        "Batch could not be stored"
      );
      return false;
    }
  }
}
