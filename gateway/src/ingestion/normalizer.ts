import {
  isTopic,
  normalizeSymbol,
  normalizeTimeframe,
  type MarketPayload,
  type MarketUpdate,
  type Topic,
} from "@marketlens/shared";
import type { RawUpdate } from "./types.js";

export class NormalizationError extends Error {
  constructor(message: string, public readonly update?: Partial<RawUpdate>) {
    super(message);
    this.name = "NormalizationError";
  }
}

/**
 * Alias map: feed metric name -> canonical name.
 * Keys are lowercase for case-insensitive matching.
 */
const METRIC_ALIASES: Record<string, string> = {
  o: "open",
  h: "high",
  l: "low",
  c: "close",
  last: "price",
  vol: "volume",
  v: "volume",
  qty: "size",
};

function canonicalizeMetricName(name: string): string {
  const lower = name.toLowerCase();
  return METRIC_ALIASES[lower] ?? lower;
}

function normalizeMetrics(raw: RawUpdate): Record<string, number> {
  const metrics: Record<string, number> = {};
  for (const [key, value] of Object.entries(raw.metrics ?? {})) {
    if (!Number.isFinite(value)) {
      throw new NormalizationError(`metric '${key}' has non-finite value: ${value}`, raw);
    }
    metrics[canonicalizeMetricName(key)] = value;
  }
  return metrics;
}

function validateBar(open: number, high: number, low: number, close: number, raw: RawUpdate): void {
  if (open <= 0 || high <= 0 || low <= 0 || close <= 0) {
    throw new NormalizationError("prices must be positive", raw);
  }
  if (high < low) {
    throw new NormalizationError("high must not be below low", raw);
  }
  if (open < low || open > high) {
    throw new NormalizationError("open must lie between low and high", raw);
  }
  if (close < low || close > high) {
    throw new NormalizationError("close must lie between low and high", raw);
  }
}

function buildPayload(raw: RawUpdate): MarketPayload {
  if (raw.headline !== undefined) {
    const headline = raw.headline.trim();
    if (headline.length === 0) {
      throw new NormalizationError("headline must not be empty", raw);
    }
    return {
      kind: "news",
      headline,
      ...(raw.url !== undefined ? { url: raw.url } : {}),
      ...(raw.sentiment !== undefined && Number.isFinite(raw.sentiment) ? { sentiment: raw.sentiment } : {}),
    };
  }

  const m = normalizeMetrics(raw);
  const { open, high, low, close, volume, price, size, bid, ask } = m;

  if (volume !== undefined && volume < 0) {
    throw new NormalizationError("volume must not be negative", raw);
  }

  if (open !== undefined && high !== undefined && low !== undefined && close !== undefined) {
    validateBar(open, high, low, close, raw);
    return { kind: "ohlcv", open, high, low, close, volume: volume ?? 0 };
  }

  const last = price ?? close;
  if (last !== undefined) {
    if (last <= 0) {
      throw new NormalizationError("price must be positive", raw);
    }
    if (size !== undefined && size < 0) {
      throw new NormalizationError("size must not be negative", raw);
    }
    return {
      kind: "tick",
      price: last,
      ...(size !== undefined ? { size } : {}),
      ...(bid !== undefined ? { bid } : {}),
      ...(ask !== undefined ? { ask } : {}),
    };
  }

  throw new NormalizationError("update carries neither a headline nor price metrics", raw);
}

export type NormalizeOptions = {
  /** Used when the feed does not say which timeframe an update belongs to. */
  timeframe: string;
};

export function normalizeUpdate(raw: RawUpdate, sourceId: string, options: NormalizeOptions): MarketUpdate {
  if (sourceId.trim().length === 0) {
    throw new NormalizationError("sourceId is required", raw);
  }

  if (!Number.isFinite(raw.timestamp) || raw.timestamp <= 0) {
    throw new NormalizationError("timestamp must be positive", raw);
  }

  let symbol: string;
  let timeframe: string;
  try {
    symbol = normalizeSymbol(raw.symbol);
    timeframe = normalizeTimeframe(raw.timeframe ?? options.timeframe);
  } catch (err) {
    throw new NormalizationError(err instanceof Error ? err.message : String(err), raw);
  }

  const payload = buildPayload(raw);

  let topic: Topic;
  if (raw.topic === undefined) {
    topic = payload.kind === "news" ? "news" : "market-data";
  } else if (isTopic(raw.topic)) {
    topic = raw.topic;
  } else {
    throw new NormalizationError(`unknown topic: ${raw.topic}`, raw);
  }

  return Object.freeze({
    topic,
    symbol,
    timeframe,
    timestamp: raw.timestamp,
    sourceId,
    payload: Object.freeze(payload),
  });
}

export type NormalizedBatch = {
  updates: MarketUpdate[];
  rejected: NormalizationError[];
};

/** Invalid entries are collected, not thrown. */
export function normalizeBatch(raws: RawUpdate[], sourceId: string, options: NormalizeOptions): NormalizedBatch {
  const updates: MarketUpdate[] = [];
  const rejected: NormalizationError[] = [];

  for (const raw of raws) {
    try {
      updates.push(normalizeUpdate(raw, sourceId, options));
    } catch (err) {
      if (!(err instanceof NormalizationError)) throw err;
      rejected.push(err);
    }
  }

  // Feeds may report out of order; publish oldest first.
  updates.sort((a, b) => a.timestamp - b.timestamp);
  return { updates, rejected };
}
