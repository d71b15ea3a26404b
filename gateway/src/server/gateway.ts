import { randomUUID } from "node:crypto";
import type { z } from "zod";
import {
  ANALYZER_KINDS,
  AnalyzeParamsSchema,
  isAnalyzerKind,
  isMarketUpdate,
  SubscribeParamsSchema,
  subscriptionKeyId,
  type AnalysisKind,
  type Config,
  type Insight,
  type Principal,
  type SourceHealth,
  type SubscriptionKey,
} from "@marketlens/shared";
import type { OrchestrationRouter } from "../analysis/orchestration-router.js";
import { latestUpdateKey } from "../cache/cache-key.js";
import type { TtlCache } from "../cache/ttl-cache.js";
import {
  AuthFailedError,
  DisconnectedError,
  InvalidRequestError,
  RateLimitedError,
} from "../errors.js";
import type { RateLimitedFetcher } from "../fetcher/rate-limited-fetcher.js";
import { createJsonRpcNotification, type JsonRpcResponse } from "../ipc/json-rpc.js";
import { gatewayErrorResponse, JsonRpcServer } from "../ipc/json-rpc-server.js";
import type { SubscriptionRegistry } from "../streaming/subscription-registry.js";
import { Deadline } from "../utils/deadline.js";
import { createLogger, errorMessage } from "../utils/logger.js";
import type { Authenticator } from "./auth.js";
import { Connection, type ClientTransport } from "./connection.js";

export const CLOSE_NORMAL = 1000;
export const CLOSE_GOING_AWAY = 1001;
export const CLOSE_PROTOCOL_ERROR = 1002;
export const CLOSE_AUTH_FAILED = 4401;

export type GatewayConfig = Pick<Config, "connection" | "analysis" | "features">;

export type GatewayOptions = {
  config: GatewayConfig;
  registry: SubscriptionRegistry;
  cache: TtlCache;
  fetcher: RateLimitedFetcher;
  router: OrchestrationRouter;
  authenticator: Authenticator;
};

/**
 * Owns every client connection and is the only thing that moves one between
 * states: connecting -> active -> draining -> closed.
 */
export class Gateway {
  private readonly config: GatewayConfig;
  private readonly registry: SubscriptionRegistry;
  private readonly cache: TtlCache;
  private readonly fetcher: RateLimitedFetcher;
  private readonly router: OrchestrationRouter;
  private readonly authenticator: Authenticator;
  private readonly rpc = new JsonRpcServer<Connection>();
  private connections = new Map<string, Connection>();
  private stopping = false;
  private log = createLogger("gateway");

  constructor(options: GatewayOptions) {
    this.config = options.config;
    this.registry = options.registry;
    this.cache = options.cache;
    this.fetcher = options.fetcher;
    this.router = options.router;
    this.authenticator = options.authenticator;
    this.registerMethods();
  }

  get connectionCount(): number {
    return this.connections.size;
  }

  get methods(): string[] {
    return this.rpc.listMethods();
  }

  /** Authenticate a new transport. Never rejects; a refused peer comes back closed. */
  async accept(transport: ClientTransport, credential: string | undefined): Promise<Connection> {
    const conn = new Connection({
      id: randomUUID(),
      transport,
      channelCapacity: this.config.connection.channelCapacity,
    });
    this.connections.set(conn.id, conn);

    if (this.stopping) {
      this.finalize(conn);
      transport.close(CLOSE_GOING_AWAY, "Server shutting down");
      return conn;
    }

    let principal: Principal | null = null;
    try {
      principal = await this.authenticator.authenticate(credential);
    } catch (err) {
      this.log.error("Authenticator failed", { connectionId: conn.id, error: errorMessage(err) });
    }

    // The peer may have gone away while we were authenticating.
    if (conn.state !== "connecting") return conn;

    if (!principal) {
      this.log.warn("Authentication failed", { connectionId: conn.id });
      await this.notify(conn, "connection:error", new AuthFailedError().toClient());
      // A failed notify has already finalized; the socket still needs its close code.
      this.finalize(conn);
      transport.close(CLOSE_AUTH_FAILED, "Authentication failed");
      return conn;
    }

    conn.activate(principal);
    void conn.startPump((err) => {
      this.log.warn("Outbound write failed", { connectionId: conn.id, error: errorMessage(err) });
      this.disconnect(conn);
    });
    this.log.info("Connection established", { connectionId: conn.id, principal: principal.id });
    return conn;
  }

  /** Handle one inbound frame. Never rejects. */
  async handleFrame(conn: Connection, raw: string): Promise<void> {
    if (conn.state === "closed" || conn.state === "connecting") return;

    const parsed = this.rpc.parse(raw);
    if ("rejection" in parsed) {
      this.log.warn("Protocol violation", { connectionId: conn.id, error: parsed.rejection.error?.message });
      await this.send(conn, parsed.rejection);
      await this.close(conn, CLOSE_PROTOCOL_ERROR, "Protocol violation");
      return;
    }

    if (conn.state !== "active") {
      await this.send(conn, gatewayErrorResponse(parsed.id, new DisconnectedError()));
      return;
    }

    const { maxInflight } = this.config.connection;
    if (conn.inflightCount >= maxInflight) {
      const err = new RateLimitedError("requests", `At most ${maxInflight} requests may be in flight`);
      await this.send(conn, gatewayErrorResponse(parsed.id, err));
      return;
    }

    const task = this.rpc.dispatch(parsed, conn).then((response) => this.send(conn, response));
    conn.track(task);
    await task;
  }

  /**
   * Server-initiated close: stop taking requests, let in-flight ones finish
   * within drainTimeoutMs, then cancel the rest and close the socket.
   */
  close(conn: Connection, code = CLOSE_NORMAL, reason = "Closing"): Promise<void> {
    if (conn.closing) return conn.closing;
    if (conn.state === "closed") return Promise.resolve();

    if (conn.state === "connecting") {
      if (this.finalize(conn)) conn.transport.close(code, reason);
      return Promise.resolve();
    }

    conn.transition("draining");
    conn.closing = this.drain(conn, code, reason);
    return conn.closing;
  }

  /** The peer went away: cancel its work and release everything it held. */
  disconnect(conn: Connection): void {
    if (conn.state === "closed") return;
    const cancelled = conn.cancelAll(new DisconnectedError("Client disconnected"));
    if (cancelled > 0) {
      this.log.debug("Cancelled in-flight requests", { connectionId: conn.id, cancelled });
    }
    this.finalize(conn);
  }

  async shutdown(): Promise<void> {
    this.stopping = true;
    const open = [...this.connections.values()];
    await Promise.all(open.map((conn) => this.close(conn, CLOSE_GOING_AWAY, "Server shutting down")));
    this.log.info("Gateway stopped", { closed: open.length });
  }

  private async drain(conn: Connection, code: number, reason: string): Promise<void> {
    const idle = await conn.whenIdle(this.config.connection.drainTimeoutMs);
    if (!idle) {
      const cancelled = conn.cancelAll(new DisconnectedError());
      this.log.warn("Drain timed out", { connectionId: conn.id, cancelled });
    }
    if (this.finalize(conn)) {
      conn.transport.close(code, reason);
    }
  }

  /** Returns false if the connection was already closed. */
  private finalize(conn: Connection): boolean {
    if (conn.state === "closed") return false;
    conn.transition("closed");
    const dropped = this.registry.dropConnection(conn);
    conn.channel.close();
    this.connections.delete(conn.id);
    this.log.info("Connection closed", {
      connectionId: conn.id,
      subscriptions: dropped,
      droppedUpdates: conn.channel.dropped,
    });
    return true;
  }

  private async send(conn: Connection, response: JsonRpcResponse): Promise<void> {
    await this.write(conn, JSON.stringify(response));
  }

  private async notify(conn: Connection, method: string, params: unknown): Promise<void> {
    await this.write(conn, JSON.stringify(createJsonRpcNotification(method, params)));
  }

  private async write(conn: Connection, frame: string): Promise<void> {
    if (conn.state === "closed") return;
    try {
      await conn.transport.send(frame);
    } catch (err) {
      this.log.warn("Write failed", { connectionId: conn.id, error: errorMessage(err) });
      this.disconnect(conn);
    }
  }

  private registerMethods(): void {
    this.rpc.register("subscribe", async (params, conn) => this.subscribe(conn, params));
    this.rpc.register("unsubscribe", async (params, conn) => this.unsubscribe(conn, params));
    this.rpc.register("analyze", async (params, conn) => this.analyze(conn, params));
    this.rpc.register("ping", async () => ({ status: "ok", timestamp: Date.now() }));
    this.rpc.register("health", async (): Promise<SourceHealth[]> => this.fetcher.health());
  }

  private subscribe(conn: Connection, params: unknown): { subscribed: boolean; key: SubscriptionKey } {
    if (!this.config.features.realTimeUpdates) {
      throw new InvalidRequestError("Real-time updates are disabled");
    }
    const key = parseParams(SubscribeParamsSchema, params);

    const { maxSubscriptions } = this.config.connection;
    if (this.registry.countFor(conn.id) >= maxSubscriptions) {
      const id = subscriptionKeyId(key);
      if (!this.registry.subscriptionsOf(conn.id).some((k) => subscriptionKeyId(k) === id)) {
        throw new RateLimitedError("subscriptions", `At most ${maxSubscriptions} subscriptions per connection`);
      }
    }

    const subscribed = this.registry.subscribe(conn, key);
    if (subscribed) {
      const latest = this.cache.get(latestUpdateKey(key));
      if (isMarketUpdate(latest)) {
        conn.deliver(latest);
      }
    }
    return { subscribed, key };
  }

  private unsubscribe(conn: Connection, params: unknown): { unsubscribed: boolean; key: SubscriptionKey } {
    const key = parseParams(SubscribeParamsSchema, params);
    return { unsubscribed: this.registry.unsubscribe(conn, key), key };
  }

  private async analyze(conn: Connection, params: unknown): Promise<Insight> {
    const p = parseParams(AnalyzeParamsSchema, params);
    const kinds = this.resolveKinds(p.kinds);
    const { defaultDeadlineMs, maxDeadlineMs } = this.config.analysis;
    const budgetMs = Math.min(p.deadlineMs ?? defaultDeadlineMs, maxDeadlineMs);

    const deadline = Deadline.after(budgetMs);
    conn.addDeadline(deadline);
    try {
      return await this.router.handle({
        id: randomUUID(),
        requester: conn.principal?.id ?? conn.id,
        symbols: p.symbols,
        timeframe: p.timeframe,
        kinds,
        params: p.params,
        deadline,
        budgetMs,
      });
    } finally {
      conn.removeDeadline(deadline);
    }
  }

  /** Drop kinds switched off by feature flags; "ai-insight" alone means every enabled analyzer. */
  private resolveKinds(requested: AnalysisKind[]): AnalysisKind[] {
    const { features } = this.config;
    const analyzers = requested.filter(isAnalyzerKind);
    const wantsInsight = requested.includes("ai-insight");

    if (analyzers.length === 0) {
      const all = ANALYZER_KINDS.filter((kind) => features[kind]);
      if (all.length === 0) {
        throw new InvalidRequestError("All analyzers are disabled");
      }
      return [...all, "ai-insight"];
    }

    const allowed = analyzers.filter((kind) => features[kind]);
    if (allowed.length === 0) {
      throw new InvalidRequestError(`Analysis disabled for: ${analyzers.join(", ")}`);
    }
    return wantsInsight ? [...allowed, "ai-insight"] : allowed;
  }
}

function parseParams<S extends z.ZodTypeAny>(schema: S, params: unknown): z.output<S> {
  const result = schema.safeParse(params);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new InvalidRequestError(`Invalid params: ${where}${issue?.message ?? "malformed"}`);
  }
  return result.data;
}
