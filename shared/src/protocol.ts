import { z } from "zod";
import type { AnalysisKind, Insight } from "./analysis.js";
import type { SourceHealth } from "./data.js";
import type { ClientError } from "./errors.js";
import type { MarketUpdate, SubscriptionKey } from "./market.js";
import { isValidSymbol } from "./symbol.js";
import { normalizeTimeframe, TimeframeError } from "./timeframe.js";

const SymbolSchema = z
  .string()
  .trim()
  .refine(isValidSymbol, { message: "symbol must be 1-20 characters of A-Z, 0-9, '.' or '-'" })
  .transform((s) => s.toUpperCase());

const TimeframeSchema = z.string().transform((value, ctx) => {
  try {
    return normalizeTimeframe(value);
  } catch (err) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: err instanceof TimeframeError ? err.message : "invalid timeframe",
    });
    return z.NEVER;
  }
});

const TopicSchema = z.enum(["market-data", "news", "indicators", "alerts"]);

export const SubscribeParamsSchema = z.object({
  topic: TopicSchema.default("market-data"),
  symbol: SymbolSchema,
  timeframe: TimeframeSchema,
});

const AnalysisKindSchema = z.enum(["technical", "pattern", "sentiment", "ai-insight"]);

export const MAX_SYMBOLS_PER_REQUEST = 10;

export const AnalyzeParamsSchema = z
  .object({
    symbol: SymbolSchema.optional(),
    symbols: z.array(SymbolSchema).max(MAX_SYMBOLS_PER_REQUEST).optional(),
    kinds: z.array(AnalysisKindSchema).min(1),
    timeframe: TimeframeSchema.default("1h"),
    deadlineMs: z.number().int().positive().optional(),
    params: z.record(z.unknown()).default({}),
  })
  .transform((p, ctx) => {
    const symbols = [...new Set([...(p.symbol ? [p.symbol] : []), ...(p.symbols ?? [])])];
    if (symbols.length === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "symbol or symbols is required" });
      return z.NEVER;
    }
    const kinds: AnalysisKind[] = [...new Set(p.kinds)];
    return {
      symbols,
      kinds,
      timeframe: p.timeframe,
      deadlineMs: p.deadlineMs,
      params: p.params,
    };
  });

export type SubscribeParams = z.output<typeof SubscribeParamsSchema>;
export type AnalyzeParams = z.output<typeof AnalyzeParamsSchema>;

// Client -> gateway (JSON-RPC requests)
export type GatewayMethods = {
  subscribe: (params: SubscribeParams) => { subscribed: boolean; key: SubscriptionKey };
  unsubscribe: (params: SubscribeParams) => { unsubscribed: boolean; key: SubscriptionKey };
  analyze: (params: AnalyzeParams) => Insight;
  ping: () => { status: "ok"; timestamp: number };
  health: () => SourceHealth[];
};

// Gateway -> client (JSON-RPC notifications, fire-and-forget)
export type GatewayNotifications = {
  "market:update": MarketUpdate;
  "connection:error": ClientError;
};
