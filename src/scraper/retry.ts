import { setTimeout as delay } from "node:timers/promises";

import { FetchError, SyncCancelledError } from "../errors.js";
import { apiLogger } from "../logger.js";

// ============================================================================
// Types
// ============================================================================

export interface RetryEvent {
  url: string;
  /** 1-based number of the attempt that failed */
  attempt: number;
  delayMs: number;
  error: FetchError;
}

export interface RetryOptions {
  /** Retries after the first attempt; at most maxRetries + 1 attempts */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Jitter source in [0, 1) */
  random?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface RetryContext {
  url: string;
  signal?: AbortSignal;
  onRetry?: (event: RetryEvent) => void;
}

export const DEFAULT_RETRY_OPTIONS = {
  maxRetries: 5,
  baseDelayMs: 500,
  maxDelayMs: 30_000,
} as const satisfies RetryOptions;

async function defaultSleep(ms: number, signal?: AbortSignal): Promise<void> {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (signal?.aborted === true) {
      throw new SyncCancelledError();
    }
    throw error;
  }
}

// ============================================================================
// RetryPolicy
// ============================================================================

/**
 * Bounded retries with exponential backoff and equal jitter.
 *
 * Only `FetchError`s flagged retryable are retried; anything else is
 * rethrown at once. When retries run out the last error is rethrown.
 */
export class RetryPolicy {
  readonly maxRetries: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly random: () => number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(options: RetryOptions) {
    this.maxRetries = Math.max(0, options.maxRetries);
    this.baseDelayMs = options.baseDelayMs;
    this.maxDelayMs = options.maxDelayMs;
    this.random = options.random ?? Math.random;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Delay before retry number `retryIndex` (0-based). The exponential part
   * is capped at maxDelayMs; half of it is fixed and half is jitter. A
   * Retry-After hint wins when it is longer, within the same cap.
   */
  delayFor(retryIndex: number, retryAfterMs: number | null = null): number {
    const exponential = Math.min(
      this.maxDelayMs,
      this.baseDelayMs * 2 ** retryIndex
    );
    const half = exponential / 2;
    const computed = Math.round(half + this.random() * half);

    if (retryAfterMs !== null) {
      return Math.max(computed, Math.min(retryAfterMs, this.maxDelayMs));
    }
    return computed;
  }

  async execute<T>(
    operation: (attempt: number) => Promise<T>,
    context: RetryContext
  ): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      if (context.signal?.aborted === true) {
        throw new SyncCancelledError();
      }

      try {
        return await operation(attempt);
      } catch (error) {
        if (!(error instanceof FetchError) || !error.retryable) {
          throw error;
        }
        if (attempt > this.maxRetries) {
          apiLogger.warn(
            { url: context.url, attempts: attempt, status: error.status },
            "Retries exhausted"
          );
          throw error;
        }

        const delayMs = this.delayFor(attempt - 1, error.retryAfterMs);
        apiLogger.warn(
          {
            url: context.url,
            attempt,
            delayMs,
            status: error.status,
            reason: error.message,
          },
          "Transient fetch failure, retrying"
        );
        context.onRetry?.({ url: context.url, attempt, delayMs, error });

        await this.sleep(delayMs, context.signal);
      }
    }
  }
}
