import type { MarketUpdate } from "@marketlens/shared";

/**
 * Non-owning view of a connection, held by the registry and the broadcast
 * engine. deliver() must not block; it returns false when the update was
 * refused (connection closed, or older than what it already accepted).
 */
export interface SubscriberHandle {
  readonly id: string;
  deliver(update: MarketUpdate): boolean;
}
