type CacheEntry<V> = {
  readonly value: V;
  readonly insertedAt: number;
  readonly ttlMs: number;
};

export type TtlCacheOptions = {
  /** Opportunistic removal of expired entries; reads never wait on it. */
  sweepIntervalMs?: number;
};

/**
 * Key-value store with per-entry TTL. Expiry is enforced on read: a stale
 * entry is reported absent but stays in the map until the next sweep.
 */
export class TtlCache<V = unknown> {
  private entries = new Map<string, CacheEntry<V>>();
  private sweepTimer: ReturnType<typeof setInterval> | null = null;

  constructor(options: TtlCacheOptions = {}) {
    if (options.sweepIntervalMs !== undefined) {
      this.sweepTimer = setInterval(() => this.sweep(), options.sweepIntervalMs);
      // Don't block process exit
      if (typeof this.sweepTimer === "object" && "unref" in this.sweepTimer) {
        this.sweepTimer.unref();
      }
    }
  }

  /** Number of stored entries, expired ones included until swept. */
  get size(): number {
    return this.entries.size;
  }

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (Date.now() - entry.insertedAt >= entry.ttlMs) return undefined;
    return entry.value;
  }

  has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  /** Last writer wins. */
  put(key: string, value: V, ttlMs: number): void {
    if (ttlMs <= 0) {
      this.entries.delete(key);
      return;
    }
    this.entries.set(key, Object.freeze({ value, insertedAt: Date.now(), ttlMs }));
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  /** Returns the number of expired entries removed. */
  sweep(): number {
    const now = Date.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (now - entry.insertedAt >= entry.ttlMs) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    this.entries.clear();
  }

  destroy(): void {
    if (this.sweepTimer !== null) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    this.entries.clear();
  }
}
