import type { Insight, MissingSlot } from "@marketlens/shared";
import { DeadlineExceededError, NoContextError, TimeoutError } from "../errors.js";
import {
  AllBackendsFailedError,
  inferWithFallback,
  type FallbackResult,
  type ReasoningTier,
} from "../reasoning/fallback.js";
import type { Deadline } from "../utils/deadline.js";
import { createLogger } from "../utils/logger.js";
import type { ContextAssembler } from "./context-assembler.js";
import type { AnalysisRequest, ReasoningBackend } from "./types.js";

export type OrchestrationRouterOptions = {
  assembler: ContextAssembler;
  local?: ReasoningBackend;
  cloud?: ReasoningBackend;
  /** Longest the local tier may run before the cloud tier takes over. */
  localBudgetMs: number;
};

/**
 * Runs one analysis request end to end: assemble context, then reason over
 * it locally with cloud fallback. Always settles by the request deadline.
 */
export class OrchestrationRouter {
  private readonly assembler: ContextAssembler;
  private readonly tiers: ReasoningTier[];
  private log = createLogger("router");

  constructor(options: OrchestrationRouterOptions) {
    this.assembler = options.assembler;
    this.tiers = [];
    if (options.local) {
      this.tiers.push({ tier: "local", backend: options.local, budgetMs: options.localBudgetMs });
    }
    if (options.cloud) {
      this.tiers.push({ tier: "cloud", backend: options.cloud });
    }
  }

  async handle(request: AnalysisRequest): Promise<Insight> {
    const { deadline } = request;
    const startedAt = Date.now();

    try {
      const bundle = await this.assembler.assemble(request);
      throwIfCancelled(deadline);

      if (bundle.slots.every((slot) => slot.status === "error")) {
        throw new NoContextError();
      }
      if (deadline.expired) {
        throw new DeadlineExceededError(request.budgetMs);
      }

      let result: FallbackResult;
      try {
        result = await inferWithFallback(this.tiers, bundle, deadline);
      } catch (err) {
        throwIfCancelled(deadline);
        if (err instanceof AllBackendsFailedError && deadline.expired) {
          throw new DeadlineExceededError(request.budgetMs);
        }
        throw err;
      }

      const missing: MissingSlot[] = [];
      for (const slot of bundle.slots) {
        if (slot.status === "error") {
          missing.push({ kind: slot.kind, symbol: slot.symbol, error: slot.error });
        }
      }

      this.log.info("Insight generated", {
        requestId: request.id,
        backend: result.tier,
        partial: !bundle.complete,
        durationMs: Date.now() - startedAt,
      });

      return {
        ...result.draft,
        requestId: request.id,
        symbols: [...request.symbols],
        timeframe: request.timeframe,
        partial: !bundle.complete,
        missing,
        backend: result.tier,
        generatedAt: Date.now(),
      };
    } finally {
      deadline.dispose();
    }
  }
}

function throwIfCancelled(deadline: Deadline): void {
  const { signal } = deadline;
  if (signal.aborted && !(signal.reason instanceof TimeoutError)) {
    signal.throwIfAborted();
  }
}
