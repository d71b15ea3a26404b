import type { Deadline } from "../utils/deadline.js";

/** Anything reached through the fetcher: a feed, an analyzer backend. */
export interface Upstream<P, T> {
  readonly id: string;
  call(params: P, deadline: Deadline): Promise<T>;
}
