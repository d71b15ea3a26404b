import { subscriptionKeyId, type SubscriptionKey } from "@marketlens/shared";
import type { SubscriberHandle } from "./types.js";

/**
 * Which connection wants which (topic, symbol, timeframe). Keyed both ways so
 * publish-time lookups and disconnect cleanup are map operations.
 */
export class SubscriptionRegistry {
  private byKey = new Map<string, Map<string, SubscriberHandle>>();
  private byConnection = new Map<string, Map<string, SubscriptionKey>>();

  /** Idempotent; returns false if the subscription already existed. */
  subscribe(handle: SubscriberHandle, key: SubscriptionKey): boolean {
    const keyId = subscriptionKeyId(key);

    let subscribers = this.byKey.get(keyId);
    if (!subscribers) {
      subscribers = new Map();
      this.byKey.set(keyId, subscribers);
    }
    if (subscribers.has(handle.id)) return false;
    subscribers.set(handle.id, handle);

    let keys = this.byConnection.get(handle.id);
    if (!keys) {
      keys = new Map();
      this.byConnection.set(handle.id, keys);
    }
    keys.set(keyId, { ...key });
    return true;
  }

  /** Returns false if there was nothing to remove. */
  unsubscribe(handle: SubscriberHandle, key: SubscriptionKey): boolean {
    const keyId = subscriptionKeyId(key);
    const subscribers = this.byKey.get(keyId);
    if (!subscribers?.delete(handle.id)) return false;
    if (subscribers.size === 0) {
      this.byKey.delete(keyId);
    }

    const keys = this.byConnection.get(handle.id);
    keys?.delete(keyId);
    if (keys?.size === 0) {
      this.byConnection.delete(handle.id);
    }
    return true;
  }

  subscribersOf(key: SubscriptionKey): SubscriberHandle[] {
    const subscribers = this.byKey.get(subscriptionKeyId(key));
    return subscribers ? [...subscribers.values()] : [];
  }

  subscriptionsOf(connectionId: string): SubscriptionKey[] {
    const keys = this.byConnection.get(connectionId);
    return keys ? [...keys.values()] : [];
  }

  countFor(connectionId: string): number {
    return this.byConnection.get(connectionId)?.size ?? 0;
  }

  /** Removes every subscription of the connection; returns how many. */
  dropConnection(handle: SubscriberHandle | string): number {
    const connectionId = typeof handle === "string" ? handle : handle.id;
    const keys = this.byConnection.get(connectionId);
    if (!keys) return 0;

    for (const keyId of keys.keys()) {
      const subscribers = this.byKey.get(keyId);
      subscribers?.delete(connectionId);
      if (subscribers?.size === 0) {
        this.byKey.delete(keyId);
      }
    }
    this.byConnection.delete(connectionId);
    return keys.size;
  }

  /** Number of distinct keys with at least one subscriber. */
  get size(): number {
    return this.byKey.size;
  }
}
