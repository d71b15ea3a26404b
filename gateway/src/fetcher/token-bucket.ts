export type TokenBucketOptions = {
  capacity: number;
  refillPerSecond: number;
};

/** Continuous-refill token bucket; starts full. */
export class TokenBucket {
  private readonly capacity: number;
  private readonly refillPerMs: number;
  private _tokens: number;
  private lastRefill: number;

  constructor(options: TokenBucketOptions, now = Date.now()) {
    this.capacity = options.capacity;
    this.refillPerMs = options.refillPerSecond / 1000;
    this._tokens = options.capacity;
    this.lastRefill = now;
  }

  tokens(now = Date.now()): number {
    this.refill(now);
    return this._tokens;
  }

  tryTake(now = Date.now()): boolean {
    this.refill(now);
    if (this._tokens < 1) return false;
    this._tokens -= 1;
    return true;
  }

  private refill(now: number): void {
    const elapsed = now - this.lastRefill;
    if (elapsed <= 0) return;
    this._tokens = Math.min(this.capacity, this._tokens + elapsed * this.refillPerMs);
    this.lastRefill = now;
  }
}
