import type { SubscriptionKey } from "@marketlens/shared";

function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(stableStringify).join(",")}]`;
  }
  if (value !== null && typeof value === "object") {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`).join(",")}}`;
  }
  return JSON.stringify(value) ?? "null";
}

/** Deterministic key: equal params in any property order map to the same key. */
export function cacheKey(source: string, symbol: string, params: Record<string, unknown> = {}): string {
  return `${source}:${symbol}:${stableStringify(params)}`;
}

/** Where the most recent update of a subscription key is kept for replay. */
export function latestUpdateKey(key: SubscriptionKey): string {
  return cacheKey(`latest:${key.topic}`, key.symbol, { timeframe: key.timeframe });
}
