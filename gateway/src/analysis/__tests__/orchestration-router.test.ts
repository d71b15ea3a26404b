import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { AnalyzerKind, ContextBundle, InsightDraft } from "@marketlens/shared";
import { TtlCache } from "../../cache/ttl-cache.js";
import {
  DeadlineExceededError,
  DisconnectedError,
  NoContextError,
  UnavailableError,
} from "../../errors.js";
import { RateLimitedFetcher } from "../../fetcher/rate-limited-fetcher.js";
import { AllBackendsFailedError } from "../../reasoning/fallback.js";
import { Deadline } from "../../utils/deadline.js";
import { AnalyzerRegistry } from "../analyzer-registry.js";
import { ContextAssembler } from "../context-assembler.js";
import { OrchestrationRouter } from "../orchestration-router.js";
import type { AnalysisRequest, AnalyzerBackend, ReasoningBackend } from "../types.js";

const DRAFT: InsightDraft = {
  summary: "EURUSD holds its uptrend",
  recommendation: "buy",
  confidence: 0.7,
  reasoning: ["RSI at 61"],
  riskFactors: ["Central bank meeting"],
};

function analyzer(kind: AnalyzerKind, impl: () => Promise<unknown> = async () => ({ kind })): AnalyzerBackend {
  return { kind, analyze: impl };
}

const never = () => new Promise<never>(() => {});

function backend(id: string, impl: (bundle: ContextBundle) => Promise<InsightDraft>) {
  return { id, infer: vi.fn((bundle: ContextBundle, _deadline: Deadline) => impl(bundle)) };
}

type Setup = {
  analyzers: AnalyzerBackend[];
  local?: ReasoningBackend;
  cloud?: ReasoningBackend;
  localBudgetMs?: number;
  contextBudgetMs?: number;
};

function makeRouter(setup: Setup): OrchestrationRouter {
  const registry = new AnalyzerRegistry();
  for (const a of setup.analyzers) registry.register(a);
  const assembler = new ContextAssembler({
    analyzers: registry,
    fetcher: new RateLimitedFetcher({
      defaults: { capacity: 100, refillPerSecond: 100, failureThreshold: 5, cooldownMs: 30000 },
    }),
    cache: new TtlCache(),
    ttlMs: { technical: 60000, pattern: 60000, sentiment: 60000 },
    contextBudgetMs: setup.contextBudgetMs,
  });
  return new OrchestrationRouter({
    assembler,
    local: setup.local,
    cloud: setup.cloud,
    localBudgetMs: setup.localBudgetMs ?? 3000,
  });
}

function makeRequest(overrides: Partial<AnalysisRequest> = {}): AnalysisRequest {
  const budgetMs = overrides.budgetMs ?? 10_000;
  return {
    id: "req-1",
    requester: "tester",
    symbols: ["EURUSD"],
    timeframe: "1h",
    kinds: ["technical"],
    params: {},
    deadline: Deadline.after(budgetMs),
    budgetMs,
    ...overrides,
  };
}

describe("OrchestrationRouter", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("answers from the local backend when it responds in time", async () => {
    const local = backend("local-llm", async () => DRAFT);
    const cloud = backend("cloud-llm", async () => DRAFT);
    const router = makeRouter({ analyzers: [analyzer("technical")], local, cloud });

    const insight = await router.handle(makeRequest());

    expect(insight).toMatchObject({
      ...DRAFT,
      requestId: "req-1",
      symbols: ["EURUSD"],
      timeframe: "1h",
      partial: false,
      missing: [],
      backend: "local",
    });
    expect(cloud.infer).not.toHaveBeenCalled();
  });

  it("falls back to the cloud backend when local fails", async () => {
    const local = backend("local-llm", async () => {
      throw new Error("model not loaded");
    });
    const cloud = backend("cloud-llm", async () => ({ ...DRAFT, summary: "from cloud" }));
    const router = makeRouter({ analyzers: [analyzer("technical")], local, cloud });

    const insight = await router.handle(makeRequest());

    expect(insight.backend).toBe("cloud");
    expect(insight.summary).toBe("from cloud");
  });

  it("falls back to the cloud backend when local exceeds its budget", async () => {
    const local = backend("local-llm", never);
    const cloud = backend("cloud-llm", async () => DRAFT);
    const router = makeRouter({ analyzers: [analyzer("technical")], local, cloud, localBudgetMs: 300 });

    const request = makeRequest();
    const pending = router.handle(request);
    await vi.advanceTimersByTimeAsync(300);

    await expect(pending).resolves.toMatchObject({ backend: "cloud" });
    // Cloud gets whatever is left of the request budget.
    expect(cloud.infer.mock.calls[0]?.[1].at).toBe(request.deadline.at);
  });

  it("returns a partial insight when one analyzer times out", async () => {
    const local = backend("local-llm", async () => DRAFT);
    const router = makeRouter({
      analyzers: [analyzer("technical"), analyzer("sentiment", never)],
      local,
      contextBudgetMs: 1000,
    });

    const pending = router.handle(makeRequest({ kinds: ["technical", "sentiment"] }));
    await vi.advanceTimersByTimeAsync(1000);
    const insight = await pending;

    expect(insight.partial).toBe(true);
    expect(insight.backend).toBe("local");
    expect(insight.missing).toEqual([
      {
        kind: "sentiment",
        symbol: "EURUSD",
        error: { kind: "Timeout", message: "analyzer:sentiment call timed out" },
      },
    ]);
    const bundle = local.infer.mock.calls[0]?.[0];
    expect(bundle?.complete).toBe(false);
    expect(bundle?.slots.map((s) => s.status)).toEqual(["ok", "error"]);
  });

  it("rejects with NoContext when every analyzer failed", async () => {
    const local = backend("local-llm", async () => DRAFT);
    const failing = analyzer("technical", async () => {
      throw new Error("down");
    });
    const router = makeRouter({ analyzers: [failing], local });

    await expect(router.handle(makeRequest())).rejects.toBeInstanceOf(NoContextError);
    expect(local.infer).not.toHaveBeenCalled();
  });

  it("rejects with Unavailable when both backends fail before the deadline", async () => {
    const fail = async (): Promise<InsightDraft> => {
      throw new Error("boom");
    };
    const router = makeRouter({
      analyzers: [analyzer("technical")],
      local: backend("local-llm", fail),
      cloud: backend("cloud-llm", fail),
    });

    const err = await router.handle(makeRequest()).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(AllBackendsFailedError);
    expect(err).toBeInstanceOf(UnavailableError);
    expect(err).toMatchObject({ kind: "Unavailable", message: "No reasoning backend produced an insight" });
  });

  it("rejects with DeadlineExceeded when neither backend answers in time", async () => {
    const router = makeRouter({
      analyzers: [analyzer("technical")],
      local: backend("local-llm", never),
      cloud: backend("cloud-llm", never),
      localBudgetMs: 300,
    });

    const pending = expect(router.handle(makeRequest({ budgetMs: 2000 }))).rejects.toThrow(
      new DeadlineExceededError(2000).message,
    );
    await vi.advanceTimersByTimeAsync(2000);
    await pending;
  });

  it("rejects with Unavailable when no reasoning backend is configured", async () => {
    const router = makeRouter({ analyzers: [analyzer("technical")] });
    await expect(router.handle(makeRequest())).rejects.toThrow("No reasoning backend is configured");
  });

  it("stops with the cancel reason when the caller goes away", async () => {
    const local = backend("local-llm", never);
    const cloud = backend("cloud-llm", async () => DRAFT);
    const router = makeRouter({ analyzers: [analyzer("technical")], local, cloud });
    const request = makeRequest();

    const pending = router.handle(request);
    await vi.advanceTimersByTimeAsync(10);
    request.deadline.cancel(new DisconnectedError());

    await expect(pending).rejects.toBeInstanceOf(DisconnectedError);
    expect(cloud.infer).not.toHaveBeenCalled();
  });
});
