import { keyOf, subscriptionKeyId, type MarketUpdate } from "@marketlens/shared";
import { createLogger, errorMessage } from "../utils/logger.js";
import type { SubscriptionRegistry } from "./subscription-registry.js";

export type PublishResult = {
  /** False when the update was older than the last one published on its subscription key. */
  accepted: boolean;
  delivered: number;
  refused: number;
};

/**
 * Fans each update out to the current subscribers of its key. publish() is
 * synchronous: every enqueue is a bounded, non-blocking push, so a stalled
 * consumer only ever loses its own oldest updates.
 */
export class BroadcastEngine {
  private readonly registry: SubscriptionRegistry;
  private lastTimestamp = new Map<string, number>();
  private _published = 0;
  private log = createLogger("broadcast");

  constructor(registry: SubscriptionRegistry) {
    this.registry = registry;
  }

  get publishedCount(): number {
    return this._published;
  }

  publish(update: MarketUpdate): PublishResult {
    const stream = subscriptionKeyId(keyOf(update));
    const last = this.lastTimestamp.get(stream);
    if (last !== undefined && update.timestamp < last) {
      this.log.debug("Dropping stale update", { stream, timestamp: update.timestamp, last });
      return { accepted: false, delivered: 0, refused: 0 };
    }
    this.lastTimestamp.set(stream, update.timestamp);

    const frozen: MarketUpdate = Object.isFrozen(update)
      ? update
      : Object.freeze({ ...update, payload: Object.freeze({ ...update.payload }) });
    let delivered = 0;
    let refused = 0;

    for (const subscriber of this.registry.subscribersOf(keyOf(frozen))) {
      try {
        if (subscriber.deliver(frozen)) {
          delivered++;
        } else {
          refused++;
        }
      } catch (err) {
        refused++;
        this.log.warn("Subscriber delivery failed", { connectionId: subscriber.id, error: errorMessage(err) });
      }
    }

    this._published++;
    return { accepted: true, delivered, refused };
  }
}
