import { EventEmitter } from "node:events";
import { keyOf, normalizeSymbol, normalizeTimeframe, type FeedSchedule, type MarketUpdate } from "@marketlens/shared";
import { latestUpdateKey } from "../cache/cache-key.js";
import type { TtlCache } from "../cache/ttl-cache.js";
import { CircuitOpenError, RateLimitedError } from "../errors.js";
import type { RateLimitedFetcher } from "../fetcher/rate-limited-fetcher.js";
import type { Upstream } from "../fetcher/types.js";
import type { BroadcastEngine } from "../streaming/broadcast-engine.js";
import { Deadline } from "../utils/deadline.js";
import { createLogger, errorMessage } from "../utils/logger.js";
import { normalizeBatch } from "./normalizer.js";
import type { FeedParams, FeedSource, RawUpdate } from "./types.js";

export type FeedPollerOptions = {
  fetcher: RateLimitedFetcher;
  cache: TtlCache;
  broadcast: BroadcastEngine;
  /** How long the latest update of a key stays replayable to new subscribers. */
  latestTtlMs: number;
  maxBackoffMs?: number;
  backoffMultiplier?: number;
  /** Upper bound on a single poll; the interval caps it too. */
  pollTimeoutMs?: number;
};

type ScheduledFeed = {
  upstream: Upstream<FeedParams, RawUpdate[]>;
  params: FeedParams;
  baseIntervalMs: number;
  currentBackoff: number;
  timer: ReturnType<typeof setTimeout> | null;
};

const DEFAULT_MAX_BACKOFF_MS = 300000;
const DEFAULT_BACKOFF_MULTIPLIER = 2;
const DEFAULT_POLL_TIMEOUT_MS = 10000;

/**
 * Polls feed sources on their interval and pushes what they return through
 * the broadcast engine. Events: "updates" (published updates, sourceId) and
 * "error" (error, sourceId).
 */
export class FeedPoller extends EventEmitter {
  private scheduled = new Map<string, ScheduledFeed>();
  private readonly fetcher: RateLimitedFetcher;
  private readonly cache: TtlCache;
  private readonly broadcast: BroadcastEngine;
  private readonly latestTtlMs: number;
  private maxBackoffMs: number;
  private backoffMultiplier: number;
  private pollTimeoutMs: number;
  private log = createLogger("feed-poller");

  constructor(options: FeedPollerOptions) {
    super();
    this.fetcher = options.fetcher;
    this.cache = options.cache;
    this.broadcast = options.broadcast;
    this.latestTtlMs = options.latestTtlMs;
    this.maxBackoffMs = options.maxBackoffMs ?? DEFAULT_MAX_BACKOFF_MS;
    this.backoffMultiplier = options.backoffMultiplier ?? DEFAULT_BACKOFF_MULTIPLIER;
    this.pollTimeoutMs = options.pollTimeoutMs ?? DEFAULT_POLL_TIMEOUT_MS;
  }

  get size(): number {
    return this.scheduled.size;
  }

  schedule(source: FeedSource, schedule: FeedSchedule): void {
    if (source.id !== schedule.sourceId) {
      throw new Error(`Feed schedule ${schedule.sourceId} does not match source ${source.id}`);
    }
    this.unschedule(source.id);

    const entry: ScheduledFeed = {
      upstream: {
        id: source.id,
        call: (params, deadline) => source.fetchUpdates(params, deadline),
      },
      params: {
        symbols: schedule.symbols.map(normalizeSymbol),
        timeframe: normalizeTimeframe(schedule.timeframe),
      },
      baseIntervalMs: schedule.intervalMs,
      currentBackoff: 0,
      timer: null,
    };

    this.scheduled.set(source.id, entry);
    this.scheduleNext(entry);
    this.log.info("Feed scheduled", { sourceId: source.id, symbols: entry.params.symbols, intervalMs: schedule.intervalMs });
  }

  unschedule(sourceId: string): void {
    const entry = this.scheduled.get(sourceId);
    if (entry?.timer) {
      clearTimeout(entry.timer);
      entry.timer = null;
    }
    this.scheduled.delete(sourceId);
  }

  stopAll(): void {
    for (const entry of this.scheduled.values()) {
      if (entry.timer) {
        clearTimeout(entry.timer);
        entry.timer = null;
      }
    }
    this.scheduled.clear();
  }

  /**
   * Poll one source immediately and resolve with the updates the broadcast
   * engine accepted. Rejects with whatever the fetch rejected with.
   */
  async pollOnce(sourceId: string): Promise<MarketUpdate[]> {
    const entry = this.scheduled.get(sourceId);
    if (!entry) {
      throw new Error(`Feed not scheduled: ${sourceId}`);
    }

    const deadline = Deadline.after(Math.min(entry.baseIntervalMs, this.pollTimeoutMs));
    try {
      const raws = await this.fetcher.fetch(entry.upstream, entry.params, deadline);
      const { updates, rejected } = normalizeBatch(raws, sourceId, { timeframe: entry.params.timeframe });
      if (rejected.length > 0) {
        this.log.warn("Dropped invalid feed updates", {
          sourceId,
          count: rejected.length,
          first: rejected[0]?.message,
        });
      }

      const published: MarketUpdate[] = [];
      for (const update of updates) {
        if (this.broadcast.publish(update).accepted) {
          this.cache.put(latestUpdateKey(keyOf(update)), update, this.latestTtlMs);
          published.push(update);
        }
      }
      return published;
    } finally {
      deadline.dispose();
    }
  }

  private scheduleNext(entry: ScheduledFeed): void {
    const delay =
      entry.currentBackoff > 0
        ? Math.min(entry.baseIntervalMs * Math.pow(this.backoffMultiplier, entry.currentBackoff), this.maxBackoffMs)
        : entry.baseIntervalMs;

    entry.timer = setTimeout(() => {
      void this.poll(entry);
    }, delay);

    // Don't block process exit
    if (typeof entry.timer === "object" && "unref" in entry.timer) {
      entry.timer.unref();
    }
  }

  private async poll(entry: ScheduledFeed): Promise<void> {
    const sourceId = entry.upstream.id;
    // Check if still scheduled (may have been unscheduled during timeout)
    if (this.scheduled.get(sourceId) !== entry) return;

    try {
      const published = await this.pollOnce(sourceId);
      entry.currentBackoff = 0;
      if (published.length > 0) {
        this.emit("updates", published, sourceId);
      }
    } catch (err) {
      // Admission rejections are not upstream failures.
      if (!(err instanceof RateLimitedError || err instanceof CircuitOpenError)) {
        entry.currentBackoff++;
      }
      const error = err instanceof Error ? err : new Error(String(err));
      if (this.listenerCount("error") > 0) {
        this.emit("error", error, sourceId);
      } else {
        this.log.warn("Feed poll failed", { sourceId, error: errorMessage(error) });
      }
    }

    if (this.scheduled.get(sourceId) === entry) {
      this.scheduleNext(entry);
    }
  }
}
