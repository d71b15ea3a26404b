import { EventEmitter } from "node:events";

export type OutboundChannelOptions = {
  capacity: number;
};

/**
 * Bounded FIFO between the broadcast engine (producer) and one connection's
 * writer (consumer). push() never waits: when full, the oldest item is
 * discarded to make room.
 */
export class OutboundChannel<T> extends EventEmitter {
  private items: T[] = [];
  private waiter: ((item: T | null) => void) | null = null;
  private closed = false;
  private _dropped = 0;
  readonly capacity: number;

  constructor(options: OutboundChannelOptions) {
    super();
    if (options.capacity < 1) {
      throw new Error("Channel capacity must be at least 1");
    }
    this.capacity = options.capacity;
  }

  get size(): number {
    return this.items.length;
  }

  get dropped(): number {
    return this._dropped;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Returns false if the channel is closed and the item was refused. */
  push(item: T): boolean {
    if (this.closed) return false;

    if (this.waiter) {
      const wake = this.waiter;
      this.waiter = null;
      wake(item);
      return true;
    }

    if (this.items.length >= this.capacity) {
      this.items.shift();
      this._dropped++;
      this.emit("overflow", this._dropped);
    }
    this.items.push(item);
    return true;
  }

  /** Resolves with the next item, or null once the channel is closed. */
  next(): Promise<T | null> {
    const item = this.items.shift();
    if (item !== undefined) {
      return Promise.resolve(item);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }
    if (this.waiter) {
      return Promise.reject(new Error("Channel already has a pending consumer"));
    }
    return new Promise<T | null>((resolve) => {
      this.waiter = resolve;
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.items = [];

    if (this.waiter) {
      const wake = this.waiter;
      this.waiter = null;
      wake(null);
    }

    this.emit("close");
    this.removeAllListeners();
  }
}
