/**
 * SyncService - the trigger interface
 *
 * `startSync` creates (or returns) the run of a source and hands it to the
 * worker pool; `getSyncStatus` reads the run ledger. The CLI and the HTTP
 * API are thin layers over this class.
 */

import { syncLogger } from "../../logger.js";

import { SyncEvents } from "./events.js";
import {
  SyncOrchestrator,
  type OrchestratorConfig,
  type OrchestratorOptions,
  type SyncProgress,
} from "./orchestrator.js";
import { RunLedger, createWorkerId, toSyncStatus, type SyncStatus } from "./runs.js";
import { SourceRegistry, type SourceDefaults } from "./sources.js";
import { SyncWorkerPool } from "./worker-pool.js";

import type { Database, RunRequester } from "../../db/types.js";
import type { RunState, SyncMode } from "../../types/index.js";
import type { Kysely } from "kysely";

// ============================================================================
// Types
// ============================================================================

export interface SyncServiceOptions
  extends Omit<OrchestratorOptions, "config" | "events" | "workerId"> {
  concurrency: number;
  orchestrator?: Partial<OrchestratorConfig>;
  sourceDefaults?: SourceDefaults;
  workerId?: string;
  events?: SyncEvents;
}

export interface StartSyncOptions {
  mode?: SyncMode;
  requestedBy?: RunRequester;
}

export interface StartSyncResult {
  runId: number;
  sourceId: number;
  mode: SyncMode;
  state: RunState;
  /** False when the source already had a pending or running run */
  isNew: boolean;
}

// ============================================================================
// SyncService
// ============================================================================

export class SyncService {
  readonly events: SyncEvents;
  readonly sources: SourceRegistry;
  readonly runs: RunLedger;
  readonly workerId: string;
  private readonly orchestrator: SyncOrchestrator;
  private readonly pool: SyncWorkerPool;
  private readonly progressListeners = new Map<number, (progress: SyncProgress) => void>();

  constructor(db: Kysely<Database>, options: SyncServiceOptions) {
    this.events = options.events ?? new SyncEvents();
    this.workerId = options.workerId ?? createWorkerId();
    this.sources = new SourceRegistry(db, options.sourceDefaults);
    this.runs = new RunLedger(db);
    this.orchestrator = new SyncOrchestrator(db, {
      config: options.orchestrator,
      workerId: this.workerId,
      fetch: options.fetch,
      events: this.events,
      retryHooks: options.retryHooks,
      onRetry: options.onRetry,
      now: options.now,
    });
    this.pool = new SyncWorkerPool(
      (runId, signal) =>
        this.orchestrator.execute(runId, {
          signal,
          onProgress: (progress) => this.progressListeners.get(runId)?.(progress),
        }),
      options.concurrency
    );
  }

  /**
   * Fail runs abandoned by a dead worker and queue the PENDING runs left
   * behind by a previous process
   */
  async start(): Promise<{ recovered: number[]; resumed: number[] }> {
    const recovered = await this.runs.recoverStaleRuns();
    const pending = await this.runs.listByState("PENDING");
    for (const run of pending) {
      void this.enqueue(run.id, run.sourceId);
    }
    syncLogger.info(
      { recovered: recovered.length, resumed: pending.length, workerId: this.workerId },
      "Sync service started"
    );
    return { recovered, resumed: pending.map((run) => run.id) };
  }

  private enqueue(runId: number, sourceId: number): Promise<void> {
    return this.pool.enqueue({ runId, sourceId }).finally(() => {
      this.progressListeners.delete(runId);
    });
  }

  // ==========================================================================
  // Trigger Interface
  // ==========================================================================

  /**
   * Request a sync of one source. Returns the existing run when the source
   * already has one pending or running.
   */
  startSync(sourceId: number, options: StartSyncOptions = {}): Promise<StartSyncResult> {
    return this.trigger(sourceId, options);
  }

  private async trigger(
    sourceId: number,
    options: StartSyncOptions,
    onProgress?: (progress: SyncProgress) => void
  ): Promise<StartSyncResult> {
    const source = await this.sources.requireSource(sourceId);
    const mode = options.mode ?? source.defaultMode;

    const { run, isNew } = await this.runs.createRun(
      source.id,
      mode,
      options.requestedBy ?? "api"
    );

    if (isNew && onProgress !== undefined) {
      this.progressListeners.set(run.id, onProgress);
    }
    if (isNew || run.state === "PENDING") {
      void this.enqueue(run.id, run.sourceId);
    }

    return {
      runId: run.id,
      sourceId: run.sourceId,
      mode: run.mode,
      state: run.state,
      isNew,
    };
  }

  async getSyncStatus(runId: number): Promise<SyncStatus> {
    return toSyncStatus(await this.runs.requireRun(runId));
  }

  /**
   * Start a sync and wait for it to finish
   */
  async runToCompletion(
    sourceId: number,
    options: StartSyncOptions & { onProgress?: (progress: SyncProgress) => void } = {}
  ): Promise<SyncStatus> {
    const started = await this.trigger(sourceId, options, options.onProgress);
    await this.waitForRun(started.runId);
    return this.getSyncStatus(started.runId);
  }

  /**
   * Resolves when the run has left the pool of this process
   */
  async waitForRun(runId: number): Promise<void> {
    const run = await this.runs.requireRun(runId);
    if (run.state === "PENDING" || run.state === "RUNNING") {
      await this.pool.enqueue({ runId: run.id, sourceId: run.sourceId });
    }
  }

  /**
   * Queue a run for every enabled source
   */
  async syncAllEnabled(
    mode: SyncMode | undefined,
    requestedBy: RunRequester
  ): Promise<StartSyncResult[]> {
    const sources = await this.sources.listSources({ enabledOnly: true });
    const results: StartSyncResult[] = [];
    for (const source of sources) {
      results.push(await this.startSync(source.id, { mode, requestedBy }));
    }
    return results;
  }

  /**
   * Abort a running run, or drop a queued one and fail it in the ledger so
   * that the next trigger for its source creates a new run. False when
   * this process does not hold the run.
   */
  async cancel(runId: number): Promise<boolean> {
    const queued = this.pool.isQueued(runId);
    if (!this.pool.cancel(runId)) {
      return false;
    }
    if (queued) {
      await this.runs.failRun(runId, "cancelled", "Sync run cancelled before it started");
      syncLogger.info({ runId }, "Queued sync run cancelled");
    }
    return true;
  }

  poolStats(): ReturnType<SyncWorkerPool["stats"]> {
    return this.pool.stats();
  }

  async onIdle(): Promise<void> {
    await this.pool.onIdle();
  }

  async shutdown(): Promise<void> {
    await this.pool.shutdown();
  }
}
