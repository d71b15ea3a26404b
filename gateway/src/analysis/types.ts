import type { AnalysisKind, AnalyzerKind, ContextBundle, InsightDraft } from "@marketlens/shared";
import type { Deadline } from "../utils/deadline.js";

export type AnalyzerParams = {
  timeframe: string;
  [key: string]: unknown;
};

export interface AnalyzerBackend {
  readonly kind: AnalyzerKind;
  analyze(symbol: string, params: AnalyzerParams, deadline: Deadline): Promise<unknown>;
}

export interface ReasoningBackend {
  readonly id: string;
  infer(bundle: ContextBundle, deadline: Deadline): Promise<InsightDraft>;
}

export type AnalysisRequest = {
  id: string;
  requester: string;
  symbols: string[];
  timeframe: string;
  kinds: AnalysisKind[];
  params: Record<string, unknown>;
  deadline: Deadline;
  /** The budget the deadline was derived from, for error messages. */
  budgetMs: number;
};
