import {
  isAnalyzerKind,
  type AnalyzerKind,
  type ContextBundle,
  type ContextSlot,
} from "@marketlens/shared";
import type { TtlCache } from "../cache/ttl-cache.js";
import { cacheKey } from "../cache/cache-key.js";
import { toClientError, UnavailableError } from "../errors.js";
import type { RateLimitedFetcher } from "../fetcher/rate-limited-fetcher.js";
import type { Upstream } from "../fetcher/types.js";
import type { Deadline } from "../utils/deadline.js";
import { createLogger } from "../utils/logger.js";
import type { AnalyzerRegistry } from "./analyzer-registry.js";
import type { AnalysisRequest, AnalyzerParams } from "./types.js";

export type ContextAssemblerOptions = {
  analyzers: AnalyzerRegistry;
  fetcher: RateLimitedFetcher;
  cache: TtlCache;
  ttlMs: Record<AnalyzerKind, number>;
  /** Caps how long slots may run; defaults to the whole request deadline. */
  contextBudgetMs?: number;
};

type AnalyzerCall = { symbol: string; params: AnalyzerParams };

export function analyzerSourceId(kind: AnalyzerKind): string {
  return `analyzer:${kind}`;
}

/**
 * Gathers one slot per (analyzer kind, symbol). Slots run concurrently and
 * settle independently; the request deadline bounds them all.
 */
export class ContextAssembler {
  private readonly analyzers: AnalyzerRegistry;
  private readonly fetcher: RateLimitedFetcher;
  private readonly cache: TtlCache;
  private readonly ttlMs: Record<AnalyzerKind, number>;
  private readonly contextBudgetMs: number | undefined;
  private log = createLogger("context-assembler");

  constructor(options: ContextAssemblerOptions) {
    this.analyzers = options.analyzers;
    this.fetcher = options.fetcher;
    this.cache = options.cache;
    this.ttlMs = options.ttlMs;
    this.contextBudgetMs = options.contextBudgetMs;
  }

  async assemble(request: AnalysisRequest): Promise<ContextBundle> {
    const kinds = request.kinds.filter(isAnalyzerKind);
    const slotDeadline = request.deadline.child(this.contextBudgetMs);
    const jobs: Promise<ContextSlot>[] = [];
    for (const kind of kinds) {
      for (const symbol of request.symbols) {
        jobs.push(this.fillSlot(kind, symbol, request, slotDeadline));
      }
    }

    let slots: ContextSlot[];
    try {
      slots = await Promise.all(jobs);
    } finally {
      slotDeadline.dispose();
    }
    const complete = slots.length > 0 && slots.every((s) => s.status === "ok");

    this.log.debug("Context assembled", {
      requestId: request.id,
      slots: slots.length,
      failed: slots.filter((s) => s.status === "error").length,
      complete,
    });

    return {
      requestId: request.id,
      symbols: [...request.symbols],
      timeframe: request.timeframe,
      slots,
      complete,
      assembledAt: Date.now(),
    };
  }

  private async fillSlot(
    kind: AnalyzerKind,
    symbol: string,
    request: AnalysisRequest,
    deadline: Deadline,
  ): Promise<ContextSlot> {
    const startedAt = Date.now();
    const params: AnalyzerParams = { ...request.params, timeframe: request.timeframe };
    const key = cacheKey(analyzerSourceId(kind), symbol, params);

    const cached = this.cache.get(key);
    if (cached !== undefined) {
      return { kind, symbol, status: "ok", data: cached, cached: true, latencyMs: 0 };
    }

    try {
      const upstream = this.upstreamFor(kind);
      const data = await this.fetcher.fetch(upstream, { symbol, params }, deadline);
      this.cache.put(key, data, this.ttlMs[kind]);
      return { kind, symbol, status: "ok", data, cached: false, latencyMs: Date.now() - startedAt };
    } catch (err) {
      const error = toClientError(err);
      this.log.debug("Analyzer slot failed", { requestId: request.id, kind, symbol, kindOfError: error.kind });
      return { kind, symbol, status: "error", error, latencyMs: Date.now() - startedAt };
    }
  }

  private upstreamFor(kind: AnalyzerKind): Upstream<AnalyzerCall, unknown> {
    const backend = this.analyzers.get(kind);
    if (!backend) {
      throw new UnavailableError(`No ${kind} analyzer is available`);
    }
    return {
      id: analyzerSourceId(kind),
      call: ({ symbol, params }, deadline) => backend.analyze(symbol, params, deadline),
    };
  }
}
