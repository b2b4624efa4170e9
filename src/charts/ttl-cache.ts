interface CacheEntry<V> {
  value: V;
  storedAt: number;
}

/**
 * String-keyed cache whose entries are served for `ttlMs` after they were
 * stored. Concurrent misses on one key share a single computation.
 */
export class TtlCache<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();
  private readonly inFlight = new Map<string, Promise<V>>();

  constructor(private readonly ttlMs: number) {}

  get size(): number {
    return this.entries.size;
  }

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry || Date.now() - entry.storedAt >= this.ttlMs) {
      return undefined;
    }
    return entry.value;
  }

  set(key: string, value: V): void {
    this.entries.set(key, { value, storedAt: Date.now() });
  }

  delete(key: string): void {
    this.entries.delete(key);
  }

  getOrCompute(key: string, compute: () => Promise<V>): Promise<V> {
    const cached = this.get(key);
    if (cached !== undefined) {
      return Promise.resolve(cached);
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      return pending;
    }

    const promise = compute()
      .then((value) => {
        this.set(key, value);
        return value;
      })
      .finally(() => {
        this.inFlight.delete(key);
      });
    this.inFlight.set(key, promise);
    return promise;
  }

  /** Removes entries stored more than `maxAgeMs` ago and returns their values. */
  evictOlderThan(maxAgeMs: number): V[] {
    const now = Date.now();
    const evicted: V[] = [];
    for (const [key, entry] of this.entries) {
      if (now - entry.storedAt > maxAgeMs) {
        this.entries.delete(key);
        evicted.push(entry.value);
      }
    }
    return evicted;
  }
}
