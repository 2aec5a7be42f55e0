import { LeaseError } from "../../errors.js";
import { syncLogger } from "../../logger.js";

import type { SourceRegistry } from "./sources.js";

export interface LeaseKeeperOptions {
  sourceId: number;
  owner: string;
  ttlSeconds: number;
  now: () => Date;
}

/**
 * Keeps a held source lease alive for the length of a run.
 *
 * A timer renews it in the background, so long waits inside one request
 * or retry backoff do not let it expire. Page boundaries call `ensure`,
 * which also renews when half of the TTL has passed since the last
 * renewal and throws once the lease belongs to someone else.
 */
export class LeaseKeeper {
  private lostLease = false;
  private lastRenewal = Date.now();
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;

  constructor(
    private readonly registry: SourceRegistry,
    private readonly options: LeaseKeeperOptions
  ) {}

  get lost(): boolean {
    return this.lostLease;
  }

  start(intervalMs: number): void {
    this.stopTimer();
    this.timer = setInterval(() => {
      void this.renew();
    }, intervalMs);
    this.timer.unref();
  }

  /**
   * One renewal; concurrent callers share the call in flight. Database
   * errors are logged and the next tick tries again.
   */
  renew(): Promise<void> {
    if (this.inFlight !== null) {
      return this.inFlight;
    }
    this.inFlight = this.registry
      .renewLease(
        this.options.sourceId,
        this.options.owner,
        this.options.ttlSeconds,
        this.options.now()
      )
      .then((renewed) => {
        if (renewed) {
          this.lastRenewal = Date.now();
          return;
        }
        if (!this.lostLease) {
          syncLogger.warn(
            { sourceId: this.options.sourceId, owner: this.options.owner },
            "Lease lost"
          );
        }
        this.lostLease = true;
      })
      .catch((error: unknown) => {
        syncLogger.error(
          { sourceId: this.options.sourceId, error },
          "Lease renewal failed"
        );
      })
      .finally(() => {
        this.inFlight = null;
      });
    return this.inFlight;
  }

  async ensure(): Promise<void> {
    const halfTtlMs = (this.options.ttlSeconds * 1000) / 2;
    if (!this.lostLease && Date.now() - this.lastRenewal >= halfTtlMs) {
      await this.renew();
    }
    if (this.lostLease) {
      throw new LeaseError(
        `Lease on source ${String(this.options.sourceId)} was lost`,
        "lease_lost",
        this.options.sourceId
      );
    }
  }

  /**
   * Stops the timer and waits for a renewal still in flight
   */
  async stop(): Promise<void> {
    this.stopTimer();
    if (this.inFlight !== null) {
      await this.inFlight;
    }
  }

  private stopTimer(): void {
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}
