/**
 * Tiergate: Cache Hierarchy
 *
 * @module
 */

export type {
  CacheLayer,
  CacheLookup,
  CacheStats,
  LayerStats,
  SkipEntry,
  ResultEntry,
  CacheHierarchyOptions,
} from "./types.js";

export { CacheHierarchy, FULL_SCOPE } from "./hierarchy.js";
export { CompiledPatternCache } from "./compiled.js";
export { LruCache } from "./lru.js";
export {
  fingerprint,
  normalizeInput,
  DEFAULT_FINGERPRINT_LENGTH,
} from "./fingerprint.js";
