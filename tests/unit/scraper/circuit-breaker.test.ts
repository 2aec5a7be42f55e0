import { describe, it, expect } from "vitest";

import { FetchError } from "../../../src/errors.js";
import { CircuitBreaker } from "../../../src/scraper/circuit-breaker.js";

const PERSONS_URL = "https://oparl.example.org/bodies/1/persons";

describe("scraper/circuit-breaker", () => {
  let clock = 0;

  function createBreaker(): CircuitBreaker {
    clock = 1_000;
    return new CircuitBreaker({
      name: "Beispielstadt",
      failureThreshold: 3,
      recoveryTimeoutMs: 10_000,
      successThreshold: 2,
      now: () => clock,
    });
  }

  function failTimes(breaker: CircuitBreaker, count: number): void {
    for (let i = 0; i < count; i++) {
      breaker.recordFailure();
    }
  }

  it("should stay closed below the failure threshold", () => {
    const breaker = createBreaker();

    failTimes(breaker, 2);

    expect(breaker.state).toBe("CLOSED");
    expect(() => breaker.beforeRequest(PERSONS_URL)).not.toThrow();
  });

  it("should reset the failure count on success", () => {
    const breaker = createBreaker();

    failTimes(breaker, 2);
    breaker.recordSuccess();
    failTimes(breaker, 2);

    expect(breaker.state).toBe("CLOSED");
  });

  it("should open at the threshold and reject requests", () => {
    const breaker = createBreaker();

    failTimes(breaker, 3);
    clock += 4_000;

    expect(breaker.state).toBe("OPEN");
    expect(() => breaker.beforeRequest(PERSONS_URL)).toThrow(
      new FetchError("Circuit open for Beispielstadt, retry in 6s", PERSONS_URL, null, false)
    );
  });

  it("should let a trial request through after the recovery timeout", () => {
    const breaker = createBreaker();
    failTimes(breaker, 3);
    clock += 10_000;

    breaker.beforeRequest(PERSONS_URL);

    expect(breaker.state).toBe("HALF_OPEN");
  });

  it("should close after enough successes in half-open", () => {
    const breaker = createBreaker();
    failTimes(breaker, 3);
    clock += 10_000;
    breaker.beforeRequest(PERSONS_URL);

    breaker.recordSuccess();
    expect(breaker.state).toBe("HALF_OPEN");
    breaker.recordSuccess();

    expect(breaker.state).toBe("CLOSED");
  });

  it("should reopen on a failure in half-open", () => {
    const breaker = createBreaker();
    failTimes(breaker, 3);
    clock += 10_000;
    breaker.beforeRequest(PERSONS_URL);

    breaker.recordFailure();

    expect(breaker.state).toBe("OPEN");
    expect(() => breaker.beforeRequest(PERSONS_URL)).toThrow("retry in 10s");
  });
});
