import { describe, it, expect } from "vitest";
import { CircuitBreaker } from "../circuit-breaker.js";

function makeBreaker(): CircuitBreaker {
  return new CircuitBreaker({ failureThreshold: 3, cooldownMs: 1000 });
}

describe("CircuitBreaker", () => {
  it("admits calls while closed", () => {
    const breaker = makeBreaker();
    expect(breaker.state).toBe("closed");
    expect(breaker.admit(0)).toBe("call");
  });

  it("opens after consecutive failures reach the threshold", () => {
    const breaker = makeBreaker();
    expect(breaker.recordFailure(10)).toBe(false);
    expect(breaker.recordFailure(20)).toBe(false);
    expect(breaker.recordFailure(30)).toBe(true);
    expect(breaker.state).toBe("open");
    expect(breaker.retryAt).toBe(1030);
    expect(breaker.admit(500)).toBe("reject");
  });

  it("resets the failure count on success", () => {
    const breaker = makeBreaker();
    breaker.recordFailure(0);
    breaker.recordFailure(0);
    breaker.recordSuccess();
    expect(breaker.consecutiveFailures).toBe(0);
    expect(breaker.recordFailure(0)).toBe(false);
    expect(breaker.state).toBe("closed");
  });

  it("lets exactly one trial through after the cool-down", () => {
    const breaker = makeBreaker();
    for (let i = 0; i < 3; i++) breaker.recordFailure(0);

    expect(breaker.admit(1000)).toBe("trial");
    expect(breaker.state).toBe("half_open");
    expect(breaker.admit(1001)).toBe("reject");
  });

  it("closes when the trial succeeds", () => {
    const breaker = makeBreaker();
    for (let i = 0; i < 3; i++) breaker.recordFailure(0);
    breaker.admit(1000);
    breaker.recordSuccess();
    expect(breaker.state).toBe("closed");
    expect(breaker.admit(1001)).toBe("call");
  });

  it("reopens with a fresh cool-down when the trial fails", () => {
    const breaker = makeBreaker();
    for (let i = 0; i < 3; i++) breaker.recordFailure(0);
    breaker.admit(1000);
    expect(breaker.recordFailure(1200)).toBe(true);
    expect(breaker.state).toBe("open");
    expect(breaker.retryAt).toBe(2200);
    expect(breaker.admit(2000)).toBe("reject");
  });

  it("hands the trial to the next caller when released", () => {
    const breaker = makeBreaker();
    for (let i = 0; i < 3; i++) breaker.recordFailure(0);
    expect(breaker.admit(1000)).toBe("trial");
    breaker.releaseTrial();
    expect(breaker.state).toBe("open");
    expect(breaker.admit(1001)).toBe("trial");
  });
});
