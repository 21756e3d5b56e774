// packages/cache/src/cache-manager.ts

/** Default time-to-live for cached entries (5 minutes). */
export const DEFAULT_EXPIRATION_MS = 5 * 60_000;

/** Default interval for sweeping expired entries (10 minutes). */
export const DEFAULT_CLEANUP_INTERVAL_MS = 10 * 60_000;

/** Pass as `ttlMs` to keep an entry until it is deleted or flushed. */
export const NO_EXPIRATION = 0;

/**
 * Key/value cache contract used by the read-through cache and the executor.
 * Implementations must tolerate interleaved calls from concurrent async callers.
 */
export interface CacheManager<K, V> {
  get(key: K): V | undefined;
  getMultiple(keys: K[]): Map<K, V> | null;
  set(key: K, value: V, ttlMs?: number): void;
  /** Returns the value and pushes its expiry `ttlMs` into the future. */
  getWithRefresh(key: K, ttlMs?: number): V | undefined;
  delete(...keys: K[]): void;
  flush(): void;
}

type Entry<V> = {
  value: V;
  expires_at: number | null; // epoch ms, null = never
};

export type InMemoryCacheOptions = {
  defaultTtlMs?: number;
  /** 0 disables the background sweep; expired entries are then dropped on read. */
  cleanupIntervalMs?: number;
  now?: () => number;
};

export class InMemoryCacheManager<K, V> implements CacheManager<K, V> {
  readonly name: string;
  private entries = new Map<K, Entry<V>>();
  private readonly defaultTtlMs: number;
  private readonly now: () => number;
  private sweeper: ReturnType<typeof setInterval> | null = null;

  constructor(name: string, opts: InMemoryCacheOptions = {}) {
    this.name = name;
    this.defaultTtlMs = opts.defaultTtlMs ?? DEFAULT_EXPIRATION_MS;
    this.now = opts.now ?? (() => Date.now());

    const interval = opts.cleanupIntervalMs ?? DEFAULT_CLEANUP_INTERVAL_MS;
    if (interval > 0) {
      this.sweeper = setInterval(() => this.deleteExpired(), interval);
      // never keep the process alive just for the sweep
      this.sweeper.unref();
    }
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: K): V | undefined {
    const entry = this.liveEntry(key);
    return entry?.value;
  }

  getMultiple(keys: K[]): Map<K, V> | null {
    if (keys.length === 0) return null;

    const found = new Map<K, V>();
    for (const key of keys) {
      const entry = this.liveEntry(key);
      if (entry) found.set(key, entry.value);
    }
    return found.size > 0 ? found : null;
  }

  set(key: K, value: V, ttlMs?: number): void {
    this.entries.set(key, { value, expires_at: this.expiryFor(ttlMs) });
  }

  getWithRefresh(key: K, ttlMs?: number): V | undefined {
    const entry = this.liveEntry(key);
    if (!entry) return undefined;
    entry.expires_at = this.expiryFor(ttlMs);
    return entry.value;
  }

  delete(...keys: K[]): void {
    for (const key of keys) this.entries.delete(key);
  }

  flush(): void {
    this.entries.clear();
  }

  deleteExpired(): void {
    const t = this.now();
    for (const [key, entry] of this.entries) {
      if (entry.expires_at !== null && entry.expires_at <= t) this.entries.delete(key);
    }
  }

  /** Stops the background sweep. The cache stays usable. */
  close(): void {
    if (this.sweeper) {
      clearInterval(this.sweeper);
      this.sweeper = null;
    }
  }

  private expiryFor(ttlMs: number | undefined): number | null {
    const ttl = ttlMs ?? this.defaultTtlMs;
    return ttl === NO_EXPIRATION ? null : this.now() + ttl;
  }

  private liveEntry(key: K): Entry<V> | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expires_at !== null && entry.expires_at <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }
}
