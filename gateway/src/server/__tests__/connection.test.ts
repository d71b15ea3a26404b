import { describe, it, expect, vi, afterEach } from "vitest";
import type { MarketUpdate } from "@marketlens/shared";
import { DisconnectedError } from "../../errors.js";
import { Deadline } from "../../utils/deadline.js";
import { Connection, type ClientTransport } from "../connection.js";

class RecordingTransport implements ClientTransport {
  frames: string[] = [];
  closed: { code: number; reason: string } | null = null;
  failSends = false;

  async send(frame: string): Promise<void> {
    if (this.failSends) throw new Error("socket gone");
    this.frames.push(frame);
  }

  close(code: number, reason: string): void {
    this.closed = { code, reason };
  }
}

function tick(timestamp: number, symbol = "EURUSD"): MarketUpdate {
  return {
    topic: "market-data",
    symbol,
    timeframe: "1m",
    timestamp,
    sourceId: "test-feed",
    payload: { kind: "tick", price: 1.1 },
  };
}

function makeConnection(transport = new RecordingTransport()): Connection {
  return new Connection({ id: "conn-1", transport, channelCapacity: 8 });
}

describe("Connection", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("starts in connecting and records the principal on activation", () => {
    const conn = makeConnection();
    expect(conn.state).toBe("connecting");
    expect(conn.principal).toBeNull();

    conn.activate({ id: "alice" });

    expect(conn.state).toBe("active");
    expect(conn.principal).toEqual({ id: "alice" });
  });

  it("follows connecting -> active -> draining -> closed", () => {
    const conn = makeConnection();
    conn.activate({ id: "alice" });
    conn.transition("draining");
    conn.transition("closed");
    expect(conn.state).toBe("closed");
  });

  it("rejects transitions that skip or reverse states", () => {
    const conn = makeConnection();
    expect(() => conn.transition("draining")).toThrow("Invalid connection transition: connecting -> draining");
    conn.transition("closed");
    expect(() => conn.transition("active")).toThrow("Invalid connection transition: closed -> active");
  });

  it("refuses updates unless active", () => {
    const conn = makeConnection();
    expect(conn.deliver(tick(100))).toBe(false);

    conn.activate({ id: "alice" });
    expect(conn.deliver(tick(100))).toBe(true);

    conn.transition("draining");
    expect(conn.deliver(tick(101))).toBe(false);
  });

  it("refuses an update older than the last one delivered on its stream", () => {
    const conn = makeConnection();
    conn.activate({ id: "alice" });

    expect(conn.deliver(tick(105))).toBe(true);
    expect(conn.deliver(tick(104))).toBe(false);
    expect(conn.deliver(tick(105))).toBe(true);
    expect(conn.deliver(tick(100, "GBPUSD"))).toBe(true);
    expect(conn.channel.size).toBe(3);
  });

  it("tracks ordering separately for each topic", () => {
    const conn = makeConnection();
    conn.activate({ id: "alice" });

    expect(conn.deliver({ ...tick(2000), topic: "news" })).toBe(true);
    expect(conn.deliver(tick(1500))).toBe(true);
  });

  it("pumps queued updates to the transport as notifications", async () => {
    const transport = new RecordingTransport();
    const conn = makeConnection(transport);
    conn.activate({ id: "alice" });
    conn.deliver(tick(100));
    conn.deliver(tick(101));

    const onError = vi.fn();
    const done = conn.startPump(onError);
    await vi.waitFor(() => expect(transport.frames).toHaveLength(2));
    conn.channel.close();
    await done;

    expect(JSON.parse(transport.frames[0] ?? "")).toEqual({
      jsonrpc: "2.0",
      method: "market:update",
      params: tick(100),
    });
    expect(onError).not.toHaveBeenCalled();
  });

  it("reports a failed send to the pump's error handler", async () => {
    const transport = new RecordingTransport();
    transport.failSends = true;
    const conn = makeConnection(transport);
    conn.activate({ id: "alice" });
    conn.deliver(tick(100));

    const onError = vi.fn();
    await conn.startPump(onError);

    expect(onError).toHaveBeenCalledOnce();
    expect(onError.mock.calls[0]?.[0]).toEqual(new Error("socket gone"));
  });

  it("counts tracked requests until they settle", async () => {
    const conn = makeConnection();
    let finish: () => void = () => {};
    const task = new Promise<void>((resolve) => {
      finish = resolve;
    });

    conn.track(task);
    expect(conn.inflightCount).toBe(1);

    finish();
    await task;
    await Promise.resolve();
    expect(conn.inflightCount).toBe(0);
  });

  it("reports idle once tracked requests settle", async () => {
    const conn = makeConnection();
    conn.track(Promise.resolve());
    await expect(conn.whenIdle(1000)).resolves.toBe(true);
  });

  it("gives up waiting for idle after the timeout", async () => {
    vi.useFakeTimers();
    const conn = makeConnection();
    conn.track(new Promise<void>(() => {}));

    const idle = conn.whenIdle(100);
    await vi.advanceTimersByTimeAsync(100);

    await expect(idle).resolves.toBe(false);
  });

  it("cancels every registered deadline with the given reason", () => {
    const conn = makeConnection();
    const first = Deadline.after(10000);
    const second = Deadline.after(10000);
    conn.addDeadline(first);
    conn.addDeadline(second);
    const reason = new DisconnectedError("Client disconnected");

    expect(conn.cancelAll(reason)).toBe(2);

    expect(first.signal.reason).toBe(reason);
    expect(second.signal.aborted).toBe(true);
    expect(conn.cancelAll(reason)).toBe(0);
    first.dispose();
    second.dispose();
  });

  it("forgets a deadline once removed", () => {
    const conn = makeConnection();
    const deadline = Deadline.after(10000);
    conn.addDeadline(deadline);
    conn.removeDeadline(deadline);

    expect(conn.cancelAll(new DisconnectedError())).toBe(0);
    expect(deadline.signal.aborted).toBe(false);
    deadline.dispose();
  });
});
