import type { CircuitState } from "@marketlens/shared";

export type CircuitBreakerOptions = {
  failureThreshold: number;
  cooldownMs: number;
};

export type Admission = "call" | "trial" | "reject";

export class CircuitBreaker {
  private readonly failureThreshold: number;
  private readonly cooldownMs: number;
  private _state: CircuitState = "closed";
  private _failures = 0;
  private _lastFailure: number | undefined;
  private openedAt = 0;
  private trialInFlight = false;

  constructor(options: CircuitBreakerOptions) {
    this.failureThreshold = options.failureThreshold;
    this.cooldownMs = options.cooldownMs;
  }

  get state(): CircuitState {
    return this._state;
  }

  get consecutiveFailures(): number {
    return this._failures;
  }

  get lastFailure(): number | undefined {
    return this._lastFailure;
  }

  get retryAt(): number {
    return this.openedAt + this.cooldownMs;
  }

  /**
   * Decide whether a call may go upstream. Once the cool-down has elapsed the
   * first caller becomes the single half-open trial.
   */
  admit(now = Date.now()): Admission {
    switch (this._state) {
      case "closed":
        return "call";
      case "open":
        if (now < this.retryAt) return "reject";
        this._state = "half_open";
        this.trialInFlight = true;
        return "trial";
      case "half_open":
        if (this.trialInFlight) return "reject";
        this.trialInFlight = true;
        return "trial";
    }
  }

  /** The trial never reached upstream (e.g. no token); let the next caller take it. */
  releaseTrial(): void {
    if (this._state !== "half_open") return;
    this.trialInFlight = false;
    this._state = "open";
  }

  recordSuccess(): void {
    this._failures = 0;
    this._state = "closed";
    this.trialInFlight = false;
  }

  /** Returns true when this failure opened the circuit. */
  recordFailure(now = Date.now()): boolean {
    this._lastFailure = now;
    this._failures++;

    if (this._state === "half_open") {
      this.trialInFlight = false;
      this.trip(now);
      return true;
    }

    if (this._state === "closed" && this._failures >= this.failureThreshold) {
      this.trip(now);
      return true;
    }

    return false;
  }

  private trip(now: number): void {
    this._state = "open";
    this.openedAt = now;
  }
}
