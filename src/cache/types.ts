/**
 * Tiergate: Cache Hierarchy: Type Definitions
 */

import type { Verdict } from "../engine/types.js";

export type CacheLayer = "skip" | "result";

export interface SkipEntry {
  version: number;
  storedAt: number;
}

export interface ResultEntry {
  version: number;
  storedAt: number;
  verdict: Verdict;
}

export type CacheLookup =
  | { hit: true; layer: "skip"; entry: SkipEntry }
  | { hit: true; layer: "result"; entry: ResultEntry }
  | { hit: false };

export interface LayerStats {
  hits: number;
  misses: number;
  /** Entries ignored and dropped because their version is outdated */
  stale: number;
  evictions: number;
  size: number;
}

export interface CacheStats {
  version: number;
  skip: LayerStats;
  result: LayerStats;
  compiled: {
    hits: number;
    misses: number;
    size: number;
  };
}

export interface CacheHierarchyOptions {
  /** Capacity of each input-keyed layer */
  maxEntries: number;
  clock?: () => number;
}
