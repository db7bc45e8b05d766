/**
 * Cache Hierarchy Tests
 */

import { describe, it, expect, beforeEach } from "vitest";
import { CacheHierarchy, FULL_SCOPE } from "../../src/cache/hierarchy.js";
import { makeMatch, makeVerdict } from "../helpers.js";

describe("CacheHierarchy", () => {
  let cache: CacheHierarchy;

  beforeEach(() => {
    cache = new CacheHierarchy({ maxEntries: 10, clock: () => 1000 });
    cache.invalidate(1);
  });

  it("misses on an empty cache", () => {
    expect(cache.lookup("fp", FULL_SCOPE, 1)).toEqual({ hit: false });
  });

  it("stores a clean full-scope verdict in the skip layer", () => {
    expect(cache.store("fp", FULL_SCOPE, makeVerdict())).toBe("skip");
    expect(cache.lookup("fp", FULL_SCOPE, 1)).toEqual({
      hit: true,
      layer: "skip",
      entry: { version: 1, storedAt: 1000 },
    });
  });

  it("answers a narrower scope from the skip layer", () => {
    cache.store("fp", FULL_SCOPE, makeVerdict());
    const lookup = cache.lookup("fp", "INFO", 1);
    expect(lookup.hit && lookup.layer).toBe("skip");
  });

  it("stores a clean partial-scope verdict in the result layer", () => {
    const verdict = makeVerdict({ tiersEvaluated: ["INFO"] });
    expect(cache.store("fp", "INFO", verdict)).toBe("result");
    expect(cache.lookup("fp", FULL_SCOPE, 1)).toEqual({ hit: false });

    const lookup = cache.lookup("fp", "INFO", 1);
    expect(lookup.hit && lookup.layer).toBe("result");
  });

  it("stores verdicts with matches in the result layer", () => {
    const verdict = makeVerdict({ severity: "CRITICAL_FAST", matches: [makeMatch()] });
    expect(cache.store("fp", FULL_SCOPE, verdict)).toBe("result");

    const lookup = cache.lookup("fp", FULL_SCOPE, 1);
    if (!lookup.hit || lookup.layer !== "result") {
      throw new Error("expected a result hit");
    }
    expect(lookup.entry.verdict.severity).toBe("CRITICAL_FAST");
    expect(lookup.entry.verdict.matches).toHaveLength(1);
  });

  it("never stores a degraded verdict", () => {
    expect(cache.store("fp", FULL_SCOPE, makeVerdict({ degraded: true }))).toBeNull();
    expect(cache.stats().skip.size).toBe(0);
    expect(cache.stats().result.size).toBe(0);
  });

  it("never stores a verdict where a pattern threw", () => {
    expect(cache.store("fp", FULL_SCOPE, makeVerdict({ errors: 1 }))).toBeNull();
    expect(cache.store("fp", FULL_SCOPE, makeVerdict({ errors: 1, matches: [makeMatch()] }))).toBeNull();
    expect(cache.stats().skip.size).toBe(0);
    expect(cache.stats().result.size).toBe(0);
  });

  it("refuses a verdict computed under another version", () => {
    expect(cache.store("fp", FULL_SCOPE, makeVerdict({ version: 0 }))).toBeNull();
  });

  it("drops entries of an older version on lookup", () => {
    cache.store("clean", FULL_SCOPE, makeVerdict());
    cache.store("dirty", FULL_SCOPE, makeVerdict({ matches: [makeMatch()] }));
    cache.invalidate(2);

    expect(cache.currentVersion).toBe(2);
    expect(cache.lookup("clean", FULL_SCOPE, 2)).toEqual({ hit: false });
    expect(cache.lookup("dirty", FULL_SCOPE, 2)).toEqual({ hit: false });

    const stats = cache.stats();
    expect(stats.skip.stale).toBe(1);
    expect(stats.result.stale).toBe(1);
    expect(stats.skip.size).toBe(0);
    expect(stats.result.size).toBe(0);
  });

  it("prune drops every outdated entry at once", () => {
    cache.store("a", FULL_SCOPE, makeVerdict());
    cache.store("b", FULL_SCOPE, makeVerdict());
    cache.store("c", "INFO", makeVerdict());
    cache.invalidate(2);
    cache.store("d", FULL_SCOPE, makeVerdict({ version: 2 }));

    expect(cache.prune()).toBe(3);
    expect(cache.stats().skip.size).toBe(1);
  });

  it("counts hits and misses per layer", () => {
    cache.store("a", FULL_SCOPE, makeVerdict());
    cache.lookup("a", FULL_SCOPE, 1);
    cache.lookup("b", FULL_SCOPE, 1);

    const stats = cache.stats();
    expect(stats.skip).toEqual({ hits: 1, misses: 1, stale: 0, evictions: 0, size: 1 });
    expect(stats.result).toEqual({ hits: 0, misses: 1, stale: 0, evictions: 0, size: 0 });
  });

  it("bounds each layer by maxEntries", () => {
    const small = new CacheHierarchy({ maxEntries: 2 });
    small.store("a", FULL_SCOPE, makeVerdict({ version: 0 }));
    small.store("b", FULL_SCOPE, makeVerdict({ version: 0 }));
    small.store("c", FULL_SCOPE, makeVerdict({ version: 0 }));

    expect(small.stats().skip.size).toBe(2);
    expect(small.stats().skip.evictions).toBe(1);
    expect(small.lookup("a", FULL_SCOPE, 0)).toEqual({ hit: false });
  });

  it("drops compiled matchers when the version changes", () => {
    const compile = () => ({ source: "x", match: () => null });
    cache.compiled.resolve(1, "re:i:x", compile);
    cache.compiled.resolve(1, "re:i:x", compile);
    expect(cache.stats().compiled).toEqual({ hits: 1, misses: 1, size: 1 });

    cache.invalidate(2);
    expect(cache.compiled.size).toBe(0);
  });
});
