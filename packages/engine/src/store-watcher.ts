// packages/engine/src/store-watcher.ts
import { watch as fsWatch } from "node:fs";
import { basename, dirname } from "node:path";

export type WatchListener = (event: string, filename: string | null) => void;
export type WatchFn = (dir: string, listener: WatchListener) => { close(): void };

export type WatchStoreOptions = {
  debounceMs?: number;
  watch?: WatchFn;
};

export const DEFAULT_WATCH_DEBOUNCE_MS = 250;

const defaultWatch: WatchFn = (dir, listener) => fsWatch(dir, listener);

/**
 * Calls `onChange` once per burst of writes to the database file or its
 * -wal/-shm companions. The directory is watched because SQLite replaces and
 * recreates the companions. Returns a function that stops watching.
 */
export function watchStore(dbPath: string, onChange: () => void, opts: WatchStoreOptions = {}): () => void {
  const debounceMs = opts.debounceMs ?? DEFAULT_WATCH_DEBOUNCE_MS;
  const name = basename(dbPath);
  const names = new Set([name, `${name}-wal`, `${name}-shm`]);

  let timer: ReturnType<typeof setTimeout> | null = null;

  const watcher = (opts.watch ?? defaultWatch)(dirname(dbPath), (_event, filename) => {
    if (!filename || !names.has(filename)) return;

    if (timer) clearTimeout(timer);
    timer = setTimeout(() => {
      timer = null;
      onChange();
    }, debounceMs);
  });

  return () => {
    if (timer) clearTimeout(timer);
    timer = null;
    watcher.close();
  };
}
