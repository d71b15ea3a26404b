import type { Deadline } from "../utils/deadline.js";

/** An update as a feed reports it, before validation. */
export type RawUpdate = {
  topic?: string;
  symbol: string;
  timeframe?: string;
  timestamp: number;
  metrics?: Record<string, number>;
  headline?: string;
  url?: string;
  sentiment?: number;
};

export type FeedParams = {
  symbols: string[];
  timeframe: string;
};

export interface FeedSource {
  readonly id: string;
  fetchUpdates(params: FeedParams, deadline: Deadline): Promise<RawUpdate[]>;
}
