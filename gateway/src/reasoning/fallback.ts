import type { ContextBundle, InsightDraft } from "@marketlens/shared";
import type { ReasoningBackend } from "../analysis/types.js";
import { TimeoutError, UnavailableError } from "../errors.js";
import { withDeadline, type Deadline } from "../utils/deadline.js";
import { createLogger, errorMessage } from "../utils/logger.js";

export type ReasoningTierName = "local" | "cloud";

export type ReasoningTier = {
  tier: ReasoningTierName;
  backend: ReasoningBackend;
  /** Caps this tier's share of the request deadline. */
  budgetMs?: number;
};

export type BackendFailure = {
  backendId: string;
  tier: ReasoningTierName;
  error: Error;
};

export type FallbackResult = {
  draft: InsightDraft;
  tier: ReasoningTierName;
  backendId: string;
};

export class AllBackendsFailedError extends UnavailableError {
  readonly failures: BackendFailure[];

  constructor(failures: BackendFailure[]) {
    super("No reasoning backend produced an insight", { cause: failures[failures.length - 1]?.error });
    this.name = "AllBackendsFailedError";
    this.failures = failures;
  }
}

const log = createLogger("reasoning");

/**
 * Try each tier in order until one returns a draft. Every tier runs under a
 * child of the request deadline, so a slow local backend leaves the rest of
 * the budget to the next tier.
 */
export async function inferWithFallback(
  tiers: ReasoningTier[],
  bundle: ContextBundle,
  deadline: Deadline,
): Promise<FallbackResult> {
  if (tiers.length === 0) {
    throw new UnavailableError("No reasoning backend is configured");
  }

  const failures: BackendFailure[] = [];

  for (const { tier, backend, budgetMs } of tiers) {
    if (deadline.expired) break;

    const child = deadline.child(budgetMs);
    try {
      const draft = await withDeadline(backend.infer(bundle, child), child, `${tier} reasoning`);
      return { draft, tier, backendId: backend.id };
    } catch (err) {
      // Caller cancellation ends the chain; only timeouts and backend errors fall through.
      if (deadline.signal.aborted && !(deadline.signal.reason instanceof TimeoutError)) {
        throw err;
      }
      const error = err instanceof Error ? err : new Error(String(err));
      failures.push({ backendId: backend.id, tier, error });
      log.warn("Reasoning backend failed", {
        requestId: bundle.requestId,
        tier,
        backendId: backend.id,
        error: errorMessage(error),
      });
    } finally {
      child.dispose();
    }
  }

  throw new AllBackendsFailedError(failures);
}
