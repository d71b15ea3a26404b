export type {
  Topic,
  SubscriptionKey,
  OhlcvPayload,
  TickPayload,
  NewsPayload,
  MarketPayload,
  MarketUpdate,
} from "./market.js";
export { TOPICS, subscriptionKeyId, keyOf, isTopic, isMarketUpdate } from "./market.js";

export type {
  AnalyzerKind,
  AnalysisKind,
  ContextSlot,
  ContextBundle,
  Recommendation,
  InsightDraft,
  MissingSlot,
  Insight,
} from "./analysis.js";
export { ANALYZER_KINDS, isAnalyzerKind } from "./analysis.js";

export type { ErrorKind, ClientError } from "./errors.js";
export { ERROR_CODES } from "./errors.js";

export type { CircuitState, SourceHealth, SourceHealthStatus } from "./data.js";

export type {
  StreamEvent,
  LLMMessage,
  ResponseFormat,
  CreateMessageParams,
  LLMProvider,
} from "./provider.js";

export type {
  SubscribeParams,
  AnalyzeParams,
  GatewayMethods,
  GatewayNotifications,
} from "./protocol.js";
export { SubscribeParamsSchema, AnalyzeParamsSchema, MAX_SYMBOLS_PER_REQUEST } from "./protocol.js";

export type { TimeUnit, Timeframe, StandardTimeframe } from "./timeframe.js";
export {
  parseTimeframe,
  formatTimeframe,
  timeframeToSeconds,
  normalizeTimeframe,
  isStandardTimeframe,
  STANDARD_TIMEFRAMES,
  TimeframeError,
} from "./timeframe.js";

export { isValidSymbol, normalizeSymbol, SymbolError } from "./symbol.js";

export type { Config, SourceLimits, FeedSchedule, Principal } from "./config.js";
export { ConfigSchema, parseConfig } from "./config.js";
