import { keyOf, subscriptionKeyId, type MarketUpdate, type Principal } from "@marketlens/shared";
import { createJsonRpcNotification } from "../ipc/json-rpc.js";
import { OutboundChannel } from "../streaming/outbound-channel.js";
import type { SubscriberHandle } from "../streaming/types.js";
import type { Deadline } from "../utils/deadline.js";

export type ConnectionState = "connecting" | "active" | "draining" | "closed";

/** The socket as the gateway sees it. */
export interface ClientTransport {
  send(frame: string): Promise<void>;
  close(code: number, reason: string): void;
}

const TRANSITIONS: Record<ConnectionState, readonly ConnectionState[]> = {
  connecting: ["active", "closed"],
  active: ["draining", "closed"],
  draining: ["closed"],
  closed: [],
};

export type ConnectionOptions = {
  id: string;
  transport: ClientTransport;
  channelCapacity: number;
};

/**
 * One client session. The gateway drives its state; the broadcast engine
 * only ever sees it through deliver().
 */
export class Connection implements SubscriberHandle {
  readonly id: string;
  readonly transport: ClientTransport;
  readonly channel: OutboundChannel<MarketUpdate>;
  readonly openedAt = Date.now();
  /** Set by the gateway while a server-initiated close is draining. */
  closing: Promise<void> | null = null;

  private _state: ConnectionState = "connecting";
  private _principal: Principal | null = null;
  private lastDelivered = new Map<string, number>();
  private inflight = new Set<Promise<void>>();
  private deadlines = new Set<Deadline>();

  constructor(options: ConnectionOptions) {
    this.id = options.id;
    this.transport = options.transport;
    this.channel = new OutboundChannel<MarketUpdate>({ capacity: options.channelCapacity });
  }

  get state(): ConnectionState {
    return this._state;
  }

  get principal(): Principal | null {
    return this._principal;
  }

  get inflightCount(): number {
    return this.inflight.size;
  }

  transition(next: ConnectionState): void {
    if (!TRANSITIONS[this._state].includes(next)) {
      throw new Error(`Invalid connection transition: ${this._state} -> ${next}`);
    }
    this._state = next;
  }

  activate(principal: Principal): void {
    this.transition("active");
    this._principal = principal;
  }

  deliver(update: MarketUpdate): boolean {
    if (this._state !== "active") return false;

    const stream = subscriptionKeyId(keyOf(update));
    const last = this.lastDelivered.get(stream);
    if (last !== undefined && update.timestamp < last) return false;

    if (!this.channel.push(update)) return false;
    this.lastDelivered.set(stream, update.timestamp);
    return true;
  }

  /** Writes queued updates to the transport until the channel closes. */
  startPump(onError: (err: unknown) => void): Promise<void> {
    return this.pump().catch(onError);
  }

  track(task: Promise<void>): void {
    this.inflight.add(task);
    const done = () => {
      this.inflight.delete(task);
    };
    task.then(done, done);
  }

  /** True if every in-flight request settled within timeoutMs. */
  async whenIdle(timeoutMs: number): Promise<boolean> {
    if (this.inflight.size === 0) return true;

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    try {
      return await Promise.race([Promise.allSettled([...this.inflight]).then(() => true), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  addDeadline(deadline: Deadline): void {
    this.deadlines.add(deadline);
  }

  removeDeadline(deadline: Deadline): void {
    this.deadlines.delete(deadline);
  }

  /** Abort every request still running on this connection. */
  cancelAll(reason: unknown): number {
    const count = this.deadlines.size;
    for (const deadline of this.deadlines) {
      deadline.cancel(reason);
    }
    this.deadlines.clear();
    return count;
  }

  private async pump(): Promise<void> {
    for (;;) {
      const update = await this.channel.next();
      if (update === null) return;
      await this.transport.send(JSON.stringify(createJsonRpcNotification("market:update", update)));
    }
  }
}
