export type Topic = "market-data" | "news" | "indicators" | "alerts";

export const TOPICS: readonly Topic[] = ["market-data", "news", "indicators", "alerts"];

export type SubscriptionKey = {
  topic: Topic;
  symbol: string;
  timeframe: string;
};

export type OhlcvPayload = {
  kind: "ohlcv";
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
};

export type TickPayload = {
  kind: "tick";
  price: number;
  size?: number;
  bid?: number;
  ask?: number;
};

export type NewsPayload = {
  kind: "news";
  headline: string;
  url?: string;
  sentiment?: number;
};

export type MarketPayload = OhlcvPayload | TickPayload | NewsPayload;

export type MarketUpdate = {
  readonly topic: Topic;
  readonly symbol: string;
  readonly timeframe: string;
  /** Source-supplied epoch milliseconds; monotonic per subscription key. */
  readonly timestamp: number;
  readonly sourceId: string;
  readonly payload: Readonly<MarketPayload>;
};

export function subscriptionKeyId(key: SubscriptionKey): string {
  return `${key.topic}|${key.symbol}|${key.timeframe}`;
}

export function keyOf(update: MarketUpdate): SubscriptionKey {
  return { topic: update.topic, symbol: update.symbol, timeframe: update.timeframe };
}

const TOPIC_SET: ReadonlySet<string> = new Set(TOPICS);

export function isTopic(value: unknown): value is Topic {
  return typeof value === "string" && TOPIC_SET.has(value);
}

export function isMarketUpdate(value: unknown): value is MarketUpdate {
  if (value === null || typeof value !== "object") return false;
  const v: Record<string, unknown> = { ...value };
  return (
    isTopic(v.topic) &&
    typeof v.symbol === "string" &&
    typeof v.timeframe === "string" &&
    typeof v.timestamp === "number" &&
    typeof v.sourceId === "string" &&
    v.payload !== null &&
    typeof v.payload === "object"
  );
}
