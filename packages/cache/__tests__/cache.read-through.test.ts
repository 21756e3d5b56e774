// packages/cache/__tests__/cache.read-through.test.ts
import { describe, expect, it, vi } from "vitest";

import { InMemoryCacheManager } from "../src/cache-manager.js";
import { ReadThroughCache } from "../src/read-through-cache.js";

type Example = { id: number; name?: string };
type Input = { id: number };

function manager() {
  return new InMemoryCacheManager<string, Example[]>("examples", { cleanupIntervalMs: 0 });
}

function deferred<T>() {
  const handle: { resolve: (v: T) => void } = { resolve: () => undefined };
  const promise = new Promise<T>((res) => {
    handle.resolve = res;
  });
  return { promise, resolve: (v: T) => handle.resolve(v) };
}

describe("cache: read-through", () => {
  it("loads on every call when disabled", async () => {
    const m = manager();
    const loader = vi.fn(async (input: Input) => [{ id: input.id }]);
    const cache = new ReadThroughCache(m, loader, true);

    expect(await cache.get("key", { id: 1 }, 60_000)).toEqual([{ id: 1 }]);
    expect(await cache.getWithRefresh("key", { id: 1 }, 60_000)).toEqual([{ id: 1 }]);
    expect(loader).toHaveBeenCalledTimes(2);
    expect(m.size).toBe(0);
  });

  it("returns the cached value without loading", async () => {
    const m = manager();
    m.set("key", [{ id: 1, name: "Example" }]);
    const loader = vi.fn(async (input: Input) => [{ id: input.id }]);
    const cache = new ReadThroughCache(m, loader);

    expect(await cache.get("key", { id: 2 })).toEqual([{ id: 1, name: "Example" }]);
    expect(loader).not.toHaveBeenCalled();
  });

  it("loads and stores on a miss", async () => {
    const m = manager();
    const loader = vi.fn(async (input: Input) => [{ id: input.id }]);
    const cache = new ReadThroughCache(m, loader);

    expect(await cache.getWithRefresh("key", { id: 1 }, 60_000)).toEqual([{ id: 1 }]);
    expect(m.get("key")).toEqual([{ id: 1 }]);

    await cache.getWithRefresh("key", { id: 1 }, 60_000);
    expect(loader).toHaveBeenCalledTimes(1);
  });

  it("does not cache loader failures", async () => {
    const m = manager();
    const loader = vi
      .fn<(input: Input) => Promise<Example[]>>()
      .mockRejectedValueOnce(new Error("store unavailable"))
      .mockResolvedValueOnce([{ id: 7 }]);
    const cache = new ReadThroughCache(m, loader);

    await expect(cache.get("key", { id: 7 })).rejects.toThrow("store unavailable");
    expect(m.get("key")).toBeUndefined();
    expect(cache.pending).toBe(0);

    expect(await cache.get("key", { id: 7 })).toEqual([{ id: 7 }]);
  });

  it("shares one load between concurrent misses for the same key", async () => {
    const m = manager();
    const gate = deferred<Example[]>();
    const loader = vi.fn(() => gate.promise);
    const cache = new ReadThroughCache<string, Example[], Input>(m, loader);

    const a = cache.get("key", { id: 1 });
    const b = cache.getWithRefresh("key", { id: 1 });
    expect(cache.pending).toBe(1);

    gate.resolve([{ id: 1 }]);
    const [ra, rb] = await Promise.all([a, b]);

    expect(loader).toHaveBeenCalledTimes(1);
    expect(ra).toBe(rb);
    expect(cache.pending).toBe(0);
  });

  it("loads distinct keys independently", async () => {
    const m = manager();
    const loader = vi.fn(async (input: Input) => [{ id: input.id }]);
    const cache = new ReadThroughCache(m, loader);

    const [a, b] = await Promise.all([cache.get("a", { id: 1 }), cache.get("b", { id: 2 })]);
    expect(a).toEqual([{ id: 1 }]);
    expect(b).toEqual([{ id: 2 }]);
    expect(loader).toHaveBeenCalledTimes(2);
  });

  it("invalidate drops the value and discards a load already in flight", async () => {
    const m = manager();
    const gate = deferred<Example[]>();
    const loader = vi.fn(() => gate.promise);
    const cache = new ReadThroughCache<string, Example[], Input>(m, loader);

    const stale = cache.get("key", { id: 1 });
    cache.invalidate("key");
    gate.resolve([{ id: 1, name: "stale" }]);

    expect(await stale).toEqual([{ id: 1, name: "stale" }]);
    expect(m.get("key")).toBeUndefined();
  });

  it("invalidateAll flushes every key", async () => {
    const m = manager();
    const loader = vi.fn(async (input: Input) => [{ id: input.id }]);
    const cache = new ReadThroughCache<string, Example[], Input>(m, loader);

    await cache.get("a", { id: 1 });
    await cache.get("b", { id: 2 });
    expect(m.size).toBe(2);

    cache.invalidateAll();
    expect(m.size).toBe(0);

    await cache.get("a", { id: 1 });
    expect(loader).toHaveBeenCalledTimes(3);
  });

  it("rejects an aborted caller alone and keeps loading for the others", async () => {
    const m = manager();
    const gate = deferred<Example[]>();
    const seen: AbortSignal[] = [];
    const loader = vi.fn((_input: Input, _key: string, signal: AbortSignal) => {
      seen.push(signal);
      return gate.promise;
    });
    const cache = new ReadThroughCache<string, Example[], Input>(m, loader);

    const controller = new AbortController();
    const reason = new Error("gone");
    const a = cache.get("key", { id: 1 }, undefined, controller.signal);
    const b = cache.get("key", { id: 1 });
    controller.abort(reason);

    await expect(a).rejects.toBe(reason);
    expect(seen[0]?.aborted).toBe(false);

    gate.resolve([{ id: 1 }]);
    expect(await b).toEqual([{ id: 1 }]);
    expect(m.get("key")).toEqual([{ id: 1 }]);
  });

  it("aborts the load once every waiting caller has aborted", async () => {
    const m = manager();
    const seen: AbortSignal[] = [];
    const loader = vi.fn(
      (_input: Input, _key: string, signal: AbortSignal) =>
        new Promise<Example[]>((_resolve, reject) => {
          seen.push(signal);
          signal.addEventListener("abort", () => reject(signal.reason), { once: true });
        })
    );
    const cache = new ReadThroughCache<string, Example[], Input>(m, loader);

    const first = new AbortController();
    const second = new AbortController();
    const a = cache.get("key", { id: 1 }, undefined, first.signal);
    const b = cache.getWithRefresh("key", { id: 1 }, undefined, second.signal);

    first.abort(new Error("first"));
    expect(seen[0]?.aborted).toBe(false);

    const last = new Error("second");
    second.abort(last);
    expect(seen[0]?.reason).toBe(last);

    expect(cache.pending).toBe(0);

    await expect(a).rejects.toThrow("first");
    await expect(b).rejects.toBe(last);
    expect(m.get("key")).toBeUndefined();

    // a caller arriving after the abort gets a load of its own
    const fresh = new AbortController();
    const c = cache.get("key", { id: 1 }, undefined, fresh.signal);
    expect(loader).toHaveBeenCalledTimes(2);
    expect(seen[1]?.aborted).toBe(false);

    fresh.abort(new Error("done"));
    await expect(c).rejects.toThrow("done");
  });

  it("rejects an already aborted caller without loading", async () => {
    const loader = vi.fn(async (input: Input) => [{ id: input.id }]);
    const cache = new ReadThroughCache(manager(), loader);
    const controller = new AbortController();
    const reason = new Error("early");
    controller.abort(reason);

    await expect(cache.get("key", { id: 1 }, undefined, controller.signal)).rejects.toBe(reason);
    expect(loader).not.toHaveBeenCalled();
  });
});
