// packages/engine/__tests__/engine.store-watcher.test.ts
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import type { WatchFn, WatchListener } from "../src/store-watcher.js";
import { watchStore } from "../src/store-watcher.js";

function fakeWatch() {
  const state: { dir: string; listener: WatchListener | null; closed: boolean } = {
    dir: "",
    listener: null,
    closed: false,
  };

  const watch: WatchFn = (dir, listener) => {
    state.dir = dir;
    state.listener = listener;
    return {
      close: () => {
        state.closed = true;
      },
    };
  };

  const emit = (filename: string | null) => state.listener?.("change", filename);
  return { state, watch, emit };
}

describe("engine: store watcher", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("watches the database directory", () => {
    const fake = fakeWatch();
    watchStore("/data/issues.db", () => undefined, { watch: fake.watch });
    expect(fake.state.dir).toBe("/data");
  });

  it("debounces a burst of writes into one call", () => {
    const fake = fakeWatch();
    const onChange = vi.fn();
    watchStore("/data/issues.db", onChange, { watch: fake.watch, debounceMs: 100 });

    fake.emit("issues.db");
    vi.advanceTimersByTime(50);
    fake.emit("issues.db-wal");
    vi.advanceTimersByTime(50);
    fake.emit("issues.db-shm");
    expect(onChange).not.toHaveBeenCalled();

    vi.advanceTimersByTime(100);
    expect(onChange).toHaveBeenCalledTimes(1);
  });

  it("ignores other files in the directory", () => {
    const fake = fakeWatch();
    const onChange = vi.fn();
    watchStore("/data/issues.db", onChange, { watch: fake.watch, debounceMs: 10 });

    fake.emit("notes.txt");
    fake.emit("issues.db-journal");
    fake.emit(null);
    vi.advanceTimersByTime(50);

    expect(onChange).not.toHaveBeenCalled();
  });

  it("stops watching and drops a pending call on cleanup", () => {
    const fake = fakeWatch();
    const onChange = vi.fn();
    const stop = watchStore("/data/issues.db", onChange, { watch: fake.watch, debounceMs: 10 });

    fake.emit("issues.db");
    stop();
    vi.advanceTimersByTime(50);

    expect(onChange).not.toHaveBeenCalled();
    expect(fake.state.closed).toBe(true);
  });
});
