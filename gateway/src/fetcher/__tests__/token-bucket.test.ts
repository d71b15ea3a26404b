import { describe, it, expect } from "vitest";
import { TokenBucket } from "../token-bucket.js";

describe("TokenBucket", () => {
  it("starts full and refuses once empty", () => {
    const bucket = new TokenBucket({ capacity: 2, refillPerSecond: 0 }, 0);
    expect(bucket.tryTake(0)).toBe(true);
    expect(bucket.tryTake(0)).toBe(true);
    expect(bucket.tryTake(0)).toBe(false);
  });

  it("refills continuously over time", () => {
    const bucket = new TokenBucket({ capacity: 1, refillPerSecond: 1 }, 0);
    expect(bucket.tryTake(0)).toBe(true);
    expect(bucket.tryTake(500)).toBe(false);
    expect(bucket.tryTake(2000)).toBe(true);
  });

  it("never holds more than its capacity", () => {
    const bucket = new TokenBucket({ capacity: 3, refillPerSecond: 10 }, 0);
    expect(bucket.tokens(100_000)).toBe(3);
  });
});
