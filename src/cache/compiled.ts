import type { Matcher } from "../patterns/types.js";

/**
 * Memoizes compiled matchers for one pattern-set version. Asking for another
 * version drops everything compiled for the previous one.
 */
export class CompiledPatternCache {
  private version = -1;
  private matchers = new Map<string, Matcher>();
  private hitCount = 0;
  private missCount = 0;

  resolve(version: number, key: string, compile: () => Matcher): Matcher {
    if (version !== this.version) {
      this.invalidate(version);
    }

    const cached = this.matchers.get(key);
    if (cached) {
      this.hitCount++;
      return cached;
    }

    this.missCount++;
    const matcher = compile();
    this.matchers.set(key, matcher);
    return matcher;
  }

  invalidate(version: number): void {
    if (version === this.version) return;
    this.version = version;
    this.matchers.clear();
  }

  get size(): number {
    return this.matchers.size;
  }

  get hits(): number {
    return this.hitCount;
  }

  get misses(): number {
    return this.missCount;
  }
}
