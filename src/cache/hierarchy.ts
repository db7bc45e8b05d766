/**
 * Tiergate: Cache Hierarchy
 *
 * Consulted before any pattern runs, in a fixed order:
 *
 *   1. skip cache    fingerprint -> "no match at any tier"
 *   2. result cache  scope + fingerprint -> complete Verdict
 *
 * The compiled-pattern cache sits beside them and is used while loading
 * patterns. Input-keyed entries carry the pattern-set version they were
 * computed under; a version change makes them invisible at once and they are
 * dropped as lookups run into them. Degraded verdicts and verdicts where a
 * pattern threw are never stored.
 */

import type { Verdict } from "../engine/types.js";
import { CompiledPatternCache } from "./compiled.js";
import { LruCache } from "./lru.js";
import type {
  CacheHierarchyOptions,
  CacheLookup,
  CacheStats,
  LayerStats,
  ResultEntry,
  SkipEntry,
} from "./types.js";

/** Scope of a call that evaluated every tier. */
export const FULL_SCOPE = "*";

interface Counters {
  hits: number;
  misses: number;
  stale: number;
}

export class CacheHierarchy {
  readonly compiled = new CompiledPatternCache();

  private skip: LruCache<string, SkipEntry>;
  private results: LruCache<string, ResultEntry>;
  private clock: () => number;
  private version = 0;
  private skipCounters: Counters = { hits: 0, misses: 0, stale: 0 };
  private resultCounters: Counters = { hits: 0, misses: 0, stale: 0 };

  constructor(options: CacheHierarchyOptions) {
    this.skip = new LruCache(options.maxEntries);
    this.results = new LruCache(options.maxEntries);
    this.clock = options.clock ?? Date.now;
  }

  get currentVersion(): number {
    return this.version;
  }

  /**
   * Look an input up. A skip hit answers every scope: an input with no match
   * at any tier has none in a subset of tiers either.
   */
  lookup(fingerprint: string, scope: string, version: number): CacheLookup {
    const skipEntry = this.skip.get(fingerprint);
    if (skipEntry) {
      if (skipEntry.version === version) {
        this.skipCounters.hits++;
        return { hit: true, layer: "skip", entry: skipEntry };
      }
      this.skip.delete(fingerprint);
      this.skipCounters.stale++;
    }
    this.skipCounters.misses++;

    const key = resultKey(scope, fingerprint);
    const resultEntry = this.results.get(key);
    if (resultEntry) {
      if (resultEntry.version === version) {
        this.resultCounters.hits++;
        return { hit: true, layer: "result", entry: resultEntry };
      }
      this.results.delete(key);
      this.resultCounters.stale++;
    }
    this.resultCounters.misses++;

    return { hit: false };
  }

  /**
   * Remember a verdict. Returns the layer it went to, or null when it is not
   * eligible (degraded, a pattern failed, or computed under another version).
   */
  store(fingerprint: string, scope: string, verdict: Verdict): "skip" | "result" | null {
    if (verdict.degraded || verdict.errors > 0 || verdict.version !== this.version) {
      return null;
    }

    const storedAt = this.clock();

    if (verdict.matches.length === 0 && scope === FULL_SCOPE) {
      this.skip.set(fingerprint, { version: verdict.version, storedAt });
      return "skip";
    }

    this.results.set(resultKey(scope, fingerprint), {
      version: verdict.version,
      storedAt,
      verdict: Object.freeze({ ...verdict }),
    });
    return "result";
  }

  /**
   * Move to a new pattern-set version. Older entries stay in memory until a
   * lookup or `prune()` finds them.
   */
  invalidate(version: number): void {
    this.version = version;
    this.compiled.invalidate(version);
  }

  /** Drop every entry from an older version. Returns how many went. */
  prune(): number {
    const current = this.version;
    return (
      this.skip.deleteWhere((entry) => entry.version !== current) +
      this.results.deleteWhere((entry) => entry.version !== current)
    );
  }

  clear(): void {
    this.skip.clear();
    this.results.clear();
  }

  stats(): CacheStats {
    return {
      version: this.version,
      skip: layerStats(this.skipCounters, this.skip),
      result: layerStats(this.resultCounters, this.results),
      compiled: {
        hits: this.compiled.hits,
        misses: this.compiled.misses,
        size: this.compiled.size,
      },
    };
  }
}

function resultKey(scope: string, fingerprint: string): string {
  return `${scope}:${fingerprint}`;
}

function layerStats<V>(counters: Counters, cache: LruCache<string, V>): LayerStats {
  return {
    ...counters,
    evictions: cache.evictions,
    size: cache.size,
  };
}
