// ═══════════════════════════════════════════════════════════════════════════════
// TTL CACHE — In-memory cache with entry expiry
// ═══════════════════════════════════════════════════════════════════════════════
//
// Used by the price provider so a long-lived process that rebuilds the
// dataset several times a day does not re-download identical history.
// Nothing is written to disk; a fresh process always starts empty.
//
//   Expired entries are evicted on read.
//   A TTL of 0 disables caching (every get misses).
//
// ═══════════════════════════════════════════════════════════════════════════════

interface InternalEntry<T> {
  data: T;
  cachedAt: number;
}

export class TtlCache<T> {
  private readonly store = new Map<string, InternalEntry<T>>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(ttlMs: number, now: () => number = Date.now) {
    this.ttlMs = ttlMs;
    this.now = now;
  }

  /** Returns null if the key is missing or its TTL has elapsed */
  get(key: string): T | null {
    const entry = this.store.get(key);
    if (!entry) return null;

    if (this.now() - entry.cachedAt >= this.ttlMs) {
      this.store.delete(key);
      return null;
    }
    return entry.data;
  }

  set(key: string, data: T): void {
    this.store.set(key, { data, cachedAt: this.now() });
  }
}
