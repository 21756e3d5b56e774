// packages/cache/src/read-through-cache.ts
import type { CacheManager } from "./cache-manager.js";

/** `signal` aborts only once every caller waiting on the load has aborted. */
export type Loader<K, V, I> = (input: I, key: K, signal: AbortSignal) => Promise<V>;

type Flight<V> = {
  promise: Promise<V>;
  controller: AbortController;
  waiters: number;
  aborted: number;
};

/**
 * Read-through cache over a CacheManager.
 *
 * - miss: runs the loader, stores the value, returns it
 * - concurrent misses for one key share a single loader call
 * - loader failures are propagated and never cached
 * - `disabled` bypasses the manager entirely (every call loads)
 *
 * A caller's `signal` rejects that caller alone with its reason; the shared
 * load is aborted when no waiter is left.
 */
export class ReadThroughCache<K, V, I> {
  private inflight = new Map<K, Flight<V>>();

  constructor(
    private readonly manager: CacheManager<K, V>,
    private readonly loader: Loader<K, V, I>,
    private readonly disabled = false
  ) {}

  async get(key: K, input: I, ttlMs?: number, signal?: AbortSignal): Promise<V> {
    signal?.throwIfAborted();
    if (this.disabled) return this.loader(input, key, signal ?? new AbortController().signal);

    const hit = this.manager.get(key);
    if (hit !== undefined) return hit;
    return this.load(key, input, ttlMs, signal);
  }

  async getWithRefresh(key: K, input: I, ttlMs?: number, signal?: AbortSignal): Promise<V> {
    signal?.throwIfAborted();
    if (this.disabled) return this.loader(input, key, signal ?? new AbortController().signal);

    const hit = this.manager.getWithRefresh(key, ttlMs);
    if (hit !== undefined) return hit;
    return this.load(key, input, ttlMs, signal);
  }

  /** Drops the cached value; a load already in flight will not be stored. */
  invalidate(key: K): void {
    this.inflight.delete(key);
    this.manager.delete(key);
  }

  /** Drops every cached value and detaches running loads. */
  invalidateAll(): void {
    this.inflight.clear();
    this.manager.flush();
  }

  /** Number of loads currently running. */
  get pending(): number {
    return this.inflight.size;
  }

  private load(key: K, input: I, ttlMs?: number, signal?: AbortSignal): Promise<V> {
    const flight = this.inflight.get(key) ?? this.start(key, input, ttlMs);
    flight.waiters++;
    return signal ? this.wait(key, flight, signal) : flight.promise;
  }

  private start(key: K, input: I, ttlMs?: number): Flight<V> {
    const controller = new AbortController();
    const promise: Promise<V> = this.loader(input, key, controller.signal).then(
      (value) => {
        if (this.inflight.get(key)?.promise === promise) {
          this.inflight.delete(key);
          this.manager.set(key, value, ttlMs);
        }
        return value;
      },
      (e: unknown) => {
        if (this.inflight.get(key)?.promise === promise) this.inflight.delete(key);
        throw e;
      }
    );

    const flight: Flight<V> = { promise, controller, waiters: 0, aborted: 0 };
    this.inflight.set(key, flight);
    return flight;
  }

  private wait(key: K, flight: Flight<V>, signal: AbortSignal): Promise<V> {
    return new Promise<V>((resolve, reject) => {
      const onAbort = () => {
        flight.aborted++;
        if (flight.aborted === flight.waiters) {
          // later callers start a fresh load
          if (this.inflight.get(key) === flight) this.inflight.delete(key);
          flight.controller.abort(signal.reason);
        }
        reject(signal.reason);
      };
      signal.addEventListener("abort", onAbort, { once: true });

      flight.promise.then(
        (value) => {
          signal.removeEventListener("abort", onAbort);
          resolve(value);
        },
        (e: unknown) => {
          signal.removeEventListener("abort", onAbort);
          reject(e);
        }
      );
    });
  }
}
