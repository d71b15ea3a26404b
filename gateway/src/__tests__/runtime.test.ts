import { describe, it, expect, vi } from "vitest";
import { parseConfig, type InsightDraft } from "@marketlens/shared";
import type { ClientTransport } from "../server/connection.js";
import { createGatewayRuntime } from "../runtime.js";

class FakeTransport implements ClientTransport {
  frames: string[] = [];
  closed: { code: number; reason: string } | null = null;

  async send(frame: string): Promise<void> {
    this.frames.push(frame);
  }

  close(code: number, reason: string): void {
    this.closed = { code, reason };
  }
}

const DRAFT: InsightDraft = {
  summary: "Range-bound",
  recommendation: "hold",
  confidence: 0.5,
  reasoning: [],
  riskFactors: [],
};

const config = parseConfig({
  auth: { tokens: { "test-token": { id: "alice" } } },
  logging: { level: "error" },
  feeds: [{ sourceId: "fx-feed", symbols: ["EURUSD"], timeframe: "1m", intervalMs: 1000 }],
});

function makeRuntime() {
  return createGatewayRuntime(config, {
    analyzers: [{ kind: "technical", analyze: async () => ({ rsi: 48 }) }],
    reasoning: { local: { id: "local-test", infer: async () => DRAFT } },
  });
}

describe("createGatewayRuntime", () => {
  it("authenticates with the configured tokens", async () => {
    const runtime = makeRuntime();
    const conn = await runtime.gateway.accept(new FakeTransport(), "test-token");

    expect(conn.state).toBe("active");
    expect(conn.principal).toEqual({ id: "alice" });
    await runtime.stop();
  });

  it("registers the given analyzers", async () => {
    const runtime = makeRuntime();
    expect(runtime.analyzers.kinds()).toEqual(["technical"]);
    await runtime.stop();
  });

  it("streams polled feed updates to subscribers", async () => {
    const runtime = makeRuntime();
    const transport = new FakeTransport();
    const conn = await runtime.gateway.accept(transport, "test-token");
    await runtime.gateway.handleFrame(
      conn,
      JSON.stringify({ jsonrpc: "2.0", id: 1, method: "subscribe", params: { symbol: "EURUSD", timeframe: "1m" } }),
    );

    runtime.poller.schedule(
      { id: "fx-feed", fetchUpdates: async () => [{ symbol: "EURUSD", timestamp: 100, metrics: { last: 1.1 } }] },
      { sourceId: "fx-feed", symbols: ["EURUSD"], timeframe: "1m", intervalMs: 1000, enabled: true },
    );
    await runtime.poller.pollOnce("fx-feed");

    await vi.waitFor(() => expect(transport.frames).toHaveLength(2));
    expect(JSON.parse(transport.frames[1] ?? "")).toEqual({
      jsonrpc: "2.0",
      method: "market:update",
      params: {
        topic: "market-data",
        symbol: "EURUSD",
        timeframe: "1m",
        timestamp: 100,
        sourceId: "fx-feed",
        payload: { kind: "tick", price: 1.1 },
      },
    });
    await runtime.stop();
  });

  it("answers analyze through the configured reasoning backend", async () => {
    const runtime = makeRuntime();
    const transport = new FakeTransport();
    const conn = await runtime.gateway.accept(transport, "test-token");

    await runtime.gateway.handleFrame(
      conn,
      JSON.stringify({ jsonrpc: "2.0", id: 7, method: "analyze", params: { symbol: "EURUSD", kinds: ["technical"] } }),
    );

    expect(JSON.parse(transport.frames[0] ?? "")).toMatchObject({
      id: 7,
      result: { summary: "Range-bound", backend: "local", partial: false },
    });
    await runtime.stop();
  });

  it("closes open connections on stop", async () => {
    const runtime = makeRuntime();
    const transport = new FakeTransport();
    await runtime.gateway.accept(transport, "test-token");

    await runtime.stop();

    expect(transport.closed).toEqual({ code: 1001, reason: "Server shutting down" });
    expect(runtime.gateway.connectionCount).toBe(0);
  });
});
