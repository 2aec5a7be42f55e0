/**
 * SyncScheduler - periodic runs for every enabled source
 *
 * Queues an INCREMENTAL run every `intervalMinutes` and a FULL run every
 * `fullIntervalHours`. Sources that already have an active run keep it;
 * `startSync` returns the existing run instead of queueing a second one.
 */

import { errorMessage } from "../../errors.js";
import { syncLogger } from "../../logger.js";

import type { StartSyncResult, SyncService } from "./service.js";
import type { SyncMode } from "../../types/index.js";

export interface SchedulerOptions {
  intervalMinutes: number;
  fullIntervalHours: number;
  /** Queue a FULL run immediately on start */
  fullOnStart?: boolean;
}

export class SyncScheduler {
  private incrementalTimer: NodeJS.Timeout | null = null;
  private fullTimer: NodeJS.Timeout | null = null;
  private ticking = false;

  constructor(
    private readonly service: SyncService,
    private readonly options: SchedulerOptions
  ) {}

  get running(): boolean {
    return this.incrementalTimer !== null;
  }

  start(): void {
    if (this.running) {
      return;
    }

    const incrementalMs = this.options.intervalMinutes * 60_000;
    const fullMs = this.options.fullIntervalHours * 3_600_000;

    this.incrementalTimer = setInterval(() => {
      void this.tickIncremental();
    }, incrementalMs);
    this.fullTimer = setInterval(() => {
      void this.tickFull();
    }, fullMs);

    syncLogger.info(
      {
        intervalMinutes: this.options.intervalMinutes,
        fullIntervalHours: this.options.fullIntervalHours,
      },
      "Scheduler started"
    );

    if (this.options.fullOnStart === true) {
      void this.tickFull();
    }
  }

  stop(): void {
    if (this.incrementalTimer !== null) {
      clearInterval(this.incrementalTimer);
      this.incrementalTimer = null;
    }
    if (this.fullTimer !== null) {
      clearInterval(this.fullTimer);
      this.fullTimer = null;
    }
    syncLogger.info("Scheduler stopped");
  }

  tickIncremental(): Promise<StartSyncResult[]> {
    return this.tick("INCREMENTAL");
  }

  tickFull(): Promise<StartSyncResult[]> {
    return this.tick("FULL");
  }

  /**
   * Never rejects: a failing tick is logged and the next one tries again
   */
  private async tick(mode: SyncMode): Promise<StartSyncResult[]> {
    if (this.ticking) {
      syncLogger.debug({ mode }, "Previous tick still queueing, skipped");
      return [];
    }
    this.ticking = true;
    try {
      const results = await this.service.syncAllEnabled(mode, "scheduler");
      syncLogger.info(
        {
          mode,
          queued: results.filter((result) => result.isNew).length,
          alreadyActive: results.filter((result) => !result.isNew).length,
        },
        "Scheduled sync runs"
      );
      return results;
    } catch (error) {
      syncLogger.error({ mode, error: errorMessage(error) }, "Scheduler tick failed");
      return [];
    } finally {
      this.ticking = false;
    }
  }
}
