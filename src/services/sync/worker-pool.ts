/**
 * SyncWorkerPool - bounded concurrent execution of sync runs
 *
 * Runs for different sources execute side by side up to `concurrency`;
 * a source never has two runs active in the same process. Waiting runs
 * start in FIFO order as soon as their source is free.
 */

import { syncLogger } from "../../logger.js";

// ============================================================================
// Types
// ============================================================================

export interface PoolJob {
  runId: number;
  sourceId: number;
}

/**
 * Executes one run; must observe the signal at its page boundaries
 */
export type RunExecutor = (runId: number, signal: AbortSignal) => Promise<unknown>;

interface QueuedJob extends PoolJob {
  done: () => void;
  settled: Promise<void>;
}

interface ActiveJob extends QueuedJob {
  controller: AbortController;
}

export interface PoolStats {
  concurrency: number;
  active: number;
  queued: number;
  activeSources: number[];
}

// ============================================================================
// SyncWorkerPool
// ============================================================================

export class SyncWorkerPool {
  private readonly queue: QueuedJob[] = [];
  private readonly active = new Map<number, ActiveJob>();
  private closed = false;

  constructor(
    private readonly executor: RunExecutor,
    readonly concurrency: number
  ) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer, got ${String(concurrency)}`);
    }
  }

  /**
   * Queue a run. The returned promise settles when the run has finished
   * (or was dropped by shutdown); it never rejects, executor errors are
   * logged.
   */
  enqueue(job: PoolJob): Promise<void> {
    const known = this.find(job.runId);
    if (known !== undefined) {
      return known.settled;
    }
    if (this.closed) {
      syncLogger.warn({ runId: job.runId }, "Pool is shut down, run not queued");
      return Promise.resolve();
    }

    let done: () => void = () => undefined;
    const settled = new Promise<void>((resolve) => {
      done = resolve;
    });

    this.queue.push({ ...job, done, settled });
    syncLogger.debug(
      { runId: job.runId, sourceId: job.sourceId, queued: this.queue.length },
      "Run queued"
    );
    this.pump();
    return settled;
  }

  private find(runId: number): QueuedJob | undefined {
    return this.active.get(runId) ?? this.queue.find((job) => job.runId === runId);
  }

  private isSourceActive(sourceId: number): boolean {
    for (const job of this.active.values()) {
      if (job.sourceId === sourceId) {
        return true;
      }
    }
    return false;
  }

  private pump(): void {
    let index = 0;
    while (this.active.size < this.concurrency && index < this.queue.length) {
      const next = this.queue[index];
      if (next === undefined || this.isSourceActive(next.sourceId)) {
        index++;
        continue;
      }
      this.queue.splice(index, 1);
      this.start(next);
    }
  }

  private start(job: QueuedJob): void {
    const controller = new AbortController();
    const activeJob: ActiveJob = { ...job, controller };
    this.active.set(job.runId, activeJob);

    syncLogger.info({ runId: job.runId, sourceId: job.sourceId }, "Run started in pool");

    void this.executor(job.runId, controller.signal)
      .catch((error: unknown) => {
        syncLogger.error({ runId: job.runId, error }, "Run execution failed");
      })
      .finally(() => {
        this.active.delete(job.runId);
        job.done();
        this.pump();
      });
  }

  // ==========================================================================
  // Control
  // ==========================================================================

  isSourceBusy(sourceId: number): boolean {
    return (
      this.isSourceActive(sourceId) ||
      this.queue.some((job) => job.sourceId === sourceId)
    );
  }

  isQueued(runId: number): boolean {
    return this.queue.some((job) => job.runId === runId);
  }

  /**
   * Abort an active run (it stops at its next page boundary) or drop a
   * queued one. False when the run is unknown to this pool.
   */
  cancel(runId: number): boolean {
    const activeJob = this.active.get(runId);
    if (activeJob !== undefined) {
      activeJob.controller.abort();
      return true;
    }
    const index = this.queue.findIndex((job) => job.runId === runId);
    if (index === -1) {
      return false;
    }
    const [removed] = this.queue.splice(index, 1);
    removed?.done();
    return true;
  }

  /**
   * Resolves once nothing is active or queued
   */
  async onIdle(): Promise<void> {
    while (this.active.size > 0 || this.queue.length > 0) {
      const pending = [...this.active.values(), ...this.queue].map((job) => job.settled);
      await Promise.all(pending);
    }
  }

  /**
   * Stop accepting runs, drop the queue, abort active runs and wait for
   * them to settle. Dropped runs stay PENDING in the ledger.
   */
  async shutdown(): Promise<void> {
    this.closed = true;
    for (const job of this.queue.splice(0)) {
      job.done();
    }
    for (const job of this.active.values()) {
      job.controller.abort();
    }
    await Promise.all([...this.active.values()].map((job) => job.settled));
    syncLogger.info("Worker pool shut down");
  }

  stats(): PoolStats {
    return {
      concurrency: this.concurrency,
      active: this.active.size,
      queued: this.queue.length,
      activeSources: [...this.active.values()].map((job) => job.sourceId),
    };
  }
}
