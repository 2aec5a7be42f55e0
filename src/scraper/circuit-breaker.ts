import { FetchError } from "../errors.js";
import { apiLogger } from "../logger.js";

// ============================================================================
// Types
// ============================================================================

export type CircuitState = "CLOSED" | "OPEN" | "HALF_OPEN";

export interface CircuitBreakerOptions {
  /** Label used in logs and in the fail-fast error */
  name: string;
  /** Consecutive failures that open the circuit */
  failureThreshold: number;
  /** Time the circuit stays open before a trial request is let through */
  recoveryTimeoutMs: number;
  /** Successes in HALF_OPEN needed to close the circuit again */
  successThreshold: number;
  now?: () => number;
}

export const DEFAULT_CIRCUIT_BREAKER_OPTIONS = {
  failureThreshold: 5,
  recoveryTimeoutMs: 60_000,
  successThreshold: 2,
} as const satisfies Omit<CircuitBreakerOptions, "name">;

// ============================================================================
// CircuitBreaker
// ============================================================================

/**
 * Per-source circuit breaker.
 *
 * CLOSED counts consecutive failures and opens at the threshold. OPEN
 * rejects every request until the recovery timeout has passed, then moves
 * to HALF_OPEN. HALF_OPEN closes after enough successes and reopens on the
 * first failure.
 */
export class CircuitBreaker {
  private current: CircuitState = "CLOSED";
  private failures = 0;
  private successes = 0;
  private openedAt = 0;
  private readonly now: () => number;

  constructor(private readonly options: CircuitBreakerOptions) {
    this.now = options.now ?? Date.now;
  }

  get state(): CircuitState {
    return this.current;
  }

  /**
   * Throws a non-retryable FetchError while the circuit is open
   */
  beforeRequest(url: string): void {
    if (this.current !== "OPEN") {
      return;
    }
    const remainingMs = this.openedAt + this.options.recoveryTimeoutMs - this.now();
    if (remainingMs > 0) {
      throw new FetchError(
        `Circuit open for ${this.options.name}, retry in ${String(Math.ceil(remainingMs / 1000))}s`,
        url,
        null,
        false
      );
    }
    this.transition("HALF_OPEN");
  }

  recordSuccess(): void {
    if (this.current === "HALF_OPEN") {
      this.successes++;
      if (this.successes >= this.options.successThreshold) {
        this.transition("CLOSED");
      }
      return;
    }
    this.failures = 0;
  }

  recordFailure(): void {
    if (this.current === "HALF_OPEN") {
      this.transition("OPEN");
      return;
    }
    this.failures++;
    if (this.current === "CLOSED" && this.failures >= this.options.failureThreshold) {
      this.transition("OPEN");
    }
  }

  private transition(next: CircuitState): void {
    apiLogger.warn(
      { breaker: this.options.name, from: this.current, to: next },
      "Circuit breaker state changed"
    );
    this.current = next;
    this.failures = 0;
    this.successes = 0;
    if (next === "OPEN") {
      this.openedAt = this.now();
    }
  }
}
