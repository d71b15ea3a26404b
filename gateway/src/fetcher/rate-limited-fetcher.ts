import type { SourceHealth, SourceLimits } from "@marketlens/shared";
import {
  CircuitOpenError,
  GatewayError,
  RateLimitedError,
  TimeoutError,
  UnavailableError,
} from "../errors.js";
import { withDeadline, type Deadline } from "../utils/deadline.js";
import { createLogger, errorMessage } from "../utils/logger.js";
import { CircuitBreaker } from "./circuit-breaker.js";
import { TokenBucket } from "./token-bucket.js";
import type { Upstream } from "./types.js";

export type FetcherOptions = {
  defaults: SourceLimits;
  sources?: Record<string, Partial<SourceLimits>>;
};

type SourceState = {
  bucket: TokenBucket;
  breaker: CircuitBreaker;
  lastSuccess: number;
  latencyMs: number;
};

/**
 * Admission control in front of every upstream: one token bucket and one
 * circuit breaker per source id. All state changes happen synchronously
 * before or after the awaited call, so callers sharing a source never
 * interleave inside a transition.
 */
export class RateLimitedFetcher {
  private readonly states = new Map<string, SourceState>();
  private readonly options: FetcherOptions;
  private log = createLogger("fetcher");

  constructor(options: FetcherOptions) {
    this.options = options;
  }

  async fetch<P, T>(source: Upstream<P, T>, params: P, deadline: Deadline): Promise<T> {
    if (deadline.expired) {
      throw new TimeoutError(`${source.id} call`);
    }

    const state = this.stateFor(source.id);
    const admission = state.breaker.admit();
    if (admission === "reject") {
      throw new CircuitOpenError(source.id, state.breaker.retryAt);
    }

    if (!state.bucket.tryTake()) {
      state.breaker.releaseTrial();
      throw new RateLimitedError(source.id);
    }

    if (admission === "trial") {
      this.log.info("Probing half-open source", { sourceId: source.id });
    }

    const callDeadline = deadline.child();
    const startedAt = Date.now();
    try {
      const result = await withDeadline(source.call(params, callDeadline), callDeadline, `${source.id} call`);
      state.latencyMs = Date.now() - startedAt;
      state.lastSuccess = Date.now();
      if (state.breaker.state !== "closed" || state.breaker.consecutiveFailures > 0) {
        this.log.info("Source recovered", { sourceId: source.id });
      }
      state.breaker.recordSuccess();
      return result;
    } catch (err) {
      const cancelled =
        callDeadline.signal.aborted && !(callDeadline.signal.reason instanceof TimeoutError);
      if (cancelled) {
        // The caller gave up; says nothing about the upstream
        state.breaker.releaseTrial();
        throw err;
      }

      state.latencyMs = Date.now() - startedAt;
      const opened = state.breaker.recordFailure();
      if (opened) {
        this.log.warn("Circuit opened", {
          sourceId: source.id,
          failures: state.breaker.consecutiveFailures,
          retryAt: state.breaker.retryAt,
        });
      } else {
        this.log.debug("Upstream call failed", { sourceId: source.id, error: errorMessage(err) });
      }

      // Our own deadline fired; the label is already ours.
      if (err instanceof TimeoutError && callDeadline.signal.aborted) throw err;
      // Upstream messages never reach clients; only the kind survives.
      if (err instanceof GatewayError) {
        throw new GatewayError(err.kind, `Upstream ${source.id} failed`, { cause: err });
      }
      throw new UnavailableError(`Upstream ${source.id} failed`, { cause: err });
    } finally {
      callDeadline.dispose();
    }
  }

  health(): SourceHealth[] {
    const now = Date.now();
    const results: SourceHealth[] = [];
    for (const [sourceId, state] of this.states) {
      const circuit = state.breaker.state;
      const failCount = state.breaker.consecutiveFailures;
      results.push({
        sourceId,
        status: circuit === "open" ? "offline" : circuit === "half_open" || failCount > 0 ? "degraded" : "healthy",
        circuit,
        tokens: Math.floor(state.bucket.tokens(now)),
        lastSuccess: state.lastSuccess,
        lastFailure: state.breaker.lastFailure,
        failCount,
        latencyMs: state.latencyMs,
      });
    }
    return results;
  }

  limitsFor(sourceId: string): SourceLimits {
    return { ...this.options.defaults, ...this.options.sources?.[sourceId] };
  }

  private stateFor(sourceId: string): SourceState {
    let state = this.states.get(sourceId);
    if (!state) {
      const limits = this.limitsFor(sourceId);
      state = {
        bucket: new TokenBucket(limits),
        breaker: new CircuitBreaker(limits),
        lastSuccess: 0,
        latencyMs: 0,
      };
      this.states.set(sourceId, state);
    }
    return state;
  }
}
