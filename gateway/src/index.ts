export { createGatewayRuntime } from "./runtime.js";
export type { GatewayDeps, GatewayRuntime } from "./runtime.js";
export { loadConfig, ConfigError } from "./config/load-config.js";

export {
  GatewayError,
  RateLimitedError,
  CircuitOpenError,
  TimeoutError,
  NoContextError,
  DeadlineExceededError,
  AuthFailedError,
  DisconnectedError,
  UnavailableError,
  InvalidRequestError,
  toClientError,
} from "./errors.js";

export { Deadline, withDeadline } from "./utils/deadline.js";
export { createLogger, setLogHandler, setLogLevel } from "./utils/logger.js";
export type { LogEntry, LogLevel, Logger } from "./utils/logger.js";

export { RateLimitedFetcher } from "./fetcher/rate-limited-fetcher.js";
export type { Upstream } from "./fetcher/types.js";
export { TtlCache } from "./cache/ttl-cache.js";
export { cacheKey } from "./cache/cache-key.js";

export { SubscriptionRegistry } from "./streaming/subscription-registry.js";
export { BroadcastEngine } from "./streaming/broadcast-engine.js";
export type { SubscriberHandle } from "./streaming/types.js";

export { AnalyzerRegistry } from "./analysis/analyzer-registry.js";
export { ContextAssembler } from "./analysis/context-assembler.js";
export { OrchestrationRouter } from "./analysis/orchestration-router.js";
export type { AnalysisRequest, AnalyzerBackend, AnalyzerParams, ReasoningBackend } from "./analysis/types.js";
export { LlmReasoningBackend } from "./reasoning/llm-backend.js";
export { AllBackendsFailedError } from "./reasoning/fallback.js";

export { FeedPoller } from "./ingestion/feed-poller.js";
export type { FeedSource, FeedParams, RawUpdate } from "./ingestion/types.js";

export { Gateway } from "./server/gateway.js";
export { StaticTokenAuthenticator } from "./server/auth.js";
export type { Authenticator } from "./server/auth.js";
export type { ClientTransport, ConnectionState } from "./server/connection.js";
