import type { Config } from "@marketlens/shared";
import { AnalyzerRegistry } from "./analysis/analyzer-registry.js";
import { ContextAssembler } from "./analysis/context-assembler.js";
import { OrchestrationRouter } from "./analysis/orchestration-router.js";
import type { AnalyzerBackend, ReasoningBackend } from "./analysis/types.js";
import { TtlCache } from "./cache/ttl-cache.js";
import { RateLimitedFetcher } from "./fetcher/rate-limited-fetcher.js";
import { FeedPoller } from "./ingestion/feed-poller.js";
import type { FeedSource } from "./ingestion/types.js";
import { StaticTokenAuthenticator, type Authenticator } from "./server/auth.js";
import { Gateway } from "./server/gateway.js";
import { startWsServer, type WsServerHandle } from "./server/ws-server.js";
import { BroadcastEngine } from "./streaming/broadcast-engine.js";
import { SubscriptionRegistry } from "./streaming/subscription-registry.js";
import { createLogger, setLogLevel } from "./utils/logger.js";

export type GatewayDeps = {
  feeds?: FeedSource[];
  analyzers?: AnalyzerBackend[];
  reasoning?: { local?: ReasoningBackend; cloud?: ReasoningBackend };
  /** Defaults to the tokens under `auth.tokens`. */
  authenticator?: Authenticator;
};

export type GatewayRuntime = {
  readonly config: Config;
  readonly cache: TtlCache;
  readonly fetcher: RateLimitedFetcher;
  readonly registry: SubscriptionRegistry;
  readonly broadcast: BroadcastEngine;
  readonly analyzers: AnalyzerRegistry;
  readonly router: OrchestrationRouter;
  readonly poller: FeedPoller;
  readonly gateway: Gateway;
  /** Schedule configured feeds and start listening. */
  start(): Promise<WsServerHandle>;
  stop(): Promise<void>;
};

const log = createLogger("runtime");

/** Build every shared service once and wire them together. */
export function createGatewayRuntime(config: Config, deps: GatewayDeps = {}): GatewayRuntime {
  setLogLevel(config.logging.level);

  const cache = new TtlCache({ sweepIntervalMs: config.cache.sweepIntervalMs });
  const fetcher = new RateLimitedFetcher({ defaults: config.fetcher.defaults, sources: config.fetcher.sources });
  const registry = new SubscriptionRegistry();
  const broadcast = new BroadcastEngine(registry);

  const analyzers = new AnalyzerRegistry();
  for (const analyzer of deps.analyzers ?? []) {
    analyzers.register(analyzer);
  }

  const { ttlMs } = config.cache;
  const assembler = new ContextAssembler({
    analyzers,
    fetcher,
    cache,
    ttlMs: { technical: ttlMs.technical, pattern: ttlMs.pattern, sentiment: ttlMs.sentiment },
    contextBudgetMs: config.analysis.contextBudgetMs,
  });
  const router = new OrchestrationRouter({
    assembler,
    local: deps.reasoning?.local,
    cloud: deps.reasoning?.cloud,
    localBudgetMs: config.analysis.localBudgetMs,
  });

  const poller = new FeedPoller({ fetcher, cache, broadcast, latestTtlMs: ttlMs.marketData });

  const gateway = new Gateway({
    config,
    registry,
    cache,
    fetcher,
    router,
    authenticator: deps.authenticator ?? new StaticTokenAuthenticator(config.auth.tokens),
  });

  let server: WsServerHandle | null = null;

  return {
    config,
    cache,
    fetcher,
    registry,
    broadcast,
    analyzers,
    router,
    poller,
    gateway,

    async start() {
      if (server) return server;

      const sources = new Map((deps.feeds ?? []).map((feed) => [feed.id, feed]));
      for (const schedule of config.feeds) {
        if (!schedule.enabled) continue;
        const source = sources.get(schedule.sourceId);
        if (!source) {
          log.warn("No feed source for schedule", { sourceId: schedule.sourceId });
          continue;
        }
        poller.schedule(source, schedule);
      }

      server = await startWsServer(gateway, config.server);
      return server;
    },

    async stop() {
      poller.stopAll();
      if (server) {
        await server.close();
        server = null;
      } else {
        await gateway.shutdown();
      }
      cache.destroy();
    },
  };
}
