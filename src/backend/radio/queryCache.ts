interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

/**
 * In-memory TTL cache keyed by query name, with one value type per key.
 * Entries disappear only by expiring.
 */
export class QueryCache<M extends object> {
  private readonly entries: { [K in keyof M]?: CacheEntry<M[K]> } = {};

  constructor(private readonly now: () => number = Date.now) {}

  /** Live value for `key`, or undefined when missing or expired. */
  get<K extends keyof M>(key: K): M[K] | undefined {
    const entry = this.entries[key];
    if (!entry) return undefined;

    if (this.now() >= entry.expiresAt) {
      delete this.entries[key];
      return undefined;
    }
    return entry.value;
  }

  set<K extends keyof M>(key: K, value: M[K], ttlMs: number): void {
    this.entries[key] = { value, expiresAt: this.now() + ttlMs };
  }

  /** Expiry timestamp of a live entry. */
  expiresAt<K extends keyof M>(key: K): number | undefined {
    return this.get(key) === undefined ? undefined : this.entries[key]?.expiresAt;
  }
}

export default QueryCache;
