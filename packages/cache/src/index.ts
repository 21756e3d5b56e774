export type { CacheManager, InMemoryCacheOptions } from "./cache-manager.js";
export {
  InMemoryCacheManager,
  DEFAULT_EXPIRATION_MS,
  DEFAULT_CLEANUP_INTERVAL_MS,
  NO_EXPIRATION,
} from "./cache-manager.js";

export type { Loader } from "./read-through-cache.js";
export { ReadThroughCache } from "./read-through-cache.js";
