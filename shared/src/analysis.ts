import type { ClientError } from "./errors.js";

export type AnalyzerKind = "technical" | "pattern" | "sentiment";

/** "ai-insight" names the reasoning step, not an analyzer. */
export type AnalysisKind = AnalyzerKind | "ai-insight";

export const ANALYZER_KINDS: readonly AnalyzerKind[] = ["technical", "pattern", "sentiment"];

export function isAnalyzerKind(kind: AnalysisKind): kind is AnalyzerKind {
  return kind !== "ai-insight";
}

export type ContextSlot =
  | {
      kind: AnalyzerKind;
      symbol: string;
      status: "ok";
      data: unknown;
      cached: boolean;
      latencyMs: number;
    }
  | {
      kind: AnalyzerKind;
      symbol: string;
      status: "error";
      error: ClientError;
      latencyMs: number;
    };

export type ContextBundle = {
  requestId: string;
  symbols: string[];
  timeframe: string;
  slots: ContextSlot[];
  /** True only if every required slot succeeded before the deadline. */
  complete: boolean;
  assembledAt: number;
};

export type Recommendation =
  | "strong_buy"
  | "buy"
  | "hold"
  | "sell"
  | "strong_sell"
  | "no_recommendation";

/** What a reasoning backend produces; the router stamps the rest. */
export type InsightDraft = {
  summary: string;
  recommendation: Recommendation;
  confidence: number;
  reasoning: string[];
  riskFactors: string[];
};

export type MissingSlot = {
  kind: AnalyzerKind;
  symbol: string;
  error: ClientError;
};

export type Insight = InsightDraft & {
  requestId: string;
  symbols: string[];
  timeframe: string;
  /** Set when some analyzer slots failed and the insight rests on partial context. */
  partial: boolean;
  missing: MissingSlot[];
  backend: "local" | "cloud";
  generatedAt: number;
};
