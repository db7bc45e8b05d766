/**
 * Tiergate: Pattern Store
 *
 * Holds the active rule set as an immutable snapshot. Loads and weight
 * updates build a new snapshot and swap the reference; a reader that took a
 * snapshot keeps a consistent view for as long as it holds it.
 */

import { PatternLoadError } from "../errors.js";
import type { EventBus } from "../events/types.js";
import { compileMatcher, renderMessage } from "./matcher.js";
import { formatIssues, patternDefinitionSchema } from "./schema.js";
import {
  DEFAULT_TIER_WEIGHT,
  TIERS,
  type ExcludedPattern,
  type LoadReport,
  type MatcherCompiler,
  type Pattern,
  type PatternKey,
  type PatternOutcome,
  type PatternSnapshot,
  type Tier,
} from "./types.js";

// ─── Snapshots ───────────────────────────────────────────────

export function patternKey(tier: Tier, id: string): PatternKey {
  return `${tier}/${id}`;
}

function buildSnapshot(
  version: number,
  revision: number,
  patterns: readonly Pattern[],
): PatternSnapshot {
  const tiers: Record<Tier, Pattern[]> = {
    ULTRA_CRITICAL: [],
    CRITICAL_FAST: [],
    HIGH_NORMAL: [],
    INFO: [],
  };
  const byKey = new Map<PatternKey, Pattern>();

  for (const pattern of patterns) {
    tiers[pattern.tier].push(pattern);
    byKey.set(pattern.key, pattern);
  }
  for (const tier of TIERS) {
    Object.freeze(tiers[tier]);
  }

  return Object.freeze({
    version,
    revision,
    tiers: Object.freeze(tiers),
    patterns: byKey,
    size: byKey.size,
  });
}

function clampWeight(weight: number): number {
  return Math.min(Math.max(weight, 0), 1);
}

// ─── Store ───────────────────────────────────────────────────

export class PatternStore {
  private current: PatternSnapshot = buildSnapshot(0, 0, []);

  constructor(private events?: EventBus) {}

  get version(): number {
    return this.current.version;
  }

  snapshot(): PatternSnapshot {
    return this.current;
  }

  /**
   * Validate, compile and activate a new pattern set.
   *
   * Bad definitions are excluded one by one. Throws only when the input is not
   * an array or nothing survives; the previous snapshot then stays active.
   */
  load(
    definitions: unknown,
    compile: MatcherCompiler = (def) => compileMatcher(def),
  ): LoadReport {
    if (!Array.isArray(definitions)) {
      throw new PatternLoadError("Pattern definitions must be an array");
    }

    const version = this.current.version + 1;
    const outcomes = definitions.map((raw, index) =>
      this.prepare(raw, index, version, compile),
    );

    const loaded: Pattern[] = [];
    const excluded: ExcludedPattern[] = [];
    const seen = new Set<PatternKey>();

    for (const outcome of outcomes) {
      if (outcome.status === "excluded") {
        excluded.push(outcome);
        continue;
      }
      if (seen.has(outcome.pattern.key)) {
        excluded.push({
          status: "excluded",
          id: outcome.pattern.id,
          tier: outcome.pattern.tier,
          reason: `duplicate id in tier ${outcome.pattern.tier}`,
        });
        continue;
      }
      seen.add(outcome.pattern.key);
      loaded.push(outcome.pattern);
    }

    for (const ex of excluded) {
      this.events?.emit({
        type: "pattern-excluded",
        version,
        id: ex.id,
        tier: ex.tier,
        reason: ex.reason,
      });
    }

    if (loaded.length === 0) {
      throw new PatternLoadError(
        `No valid patterns among ${definitions.length} definitions`,
        excluded,
      );
    }

    this.current = buildSnapshot(version, 0, loaded);
    this.events?.emit({
      type: "patterns-loaded",
      version,
      loaded: loaded.length,
      excluded: excluded.length,
    });

    return { version, loaded: loaded.length, excluded };
  }

  applyWeight(key: PatternKey, weight: number): PatternSnapshot {
    return this.applyWeights([[key, weight]]);
  }

  /**
   * Publish several weights as one snapshot swap. Unknown keys and unchanged
   * weights are skipped; if nothing changes the current snapshot is returned.
   */
  applyWeights(
    updates: Iterable<readonly [PatternKey, number]>,
  ): PatternSnapshot {
    const base = this.current;
    const next = new Map<PatternKey, number>();

    for (const [key, weight] of updates) {
      const pattern = base.patterns.get(key);
      if (!pattern || !Number.isFinite(weight)) continue;
      const clamped = clampWeight(weight);
      if (clamped !== pattern.weight) {
        next.set(key, clamped);
      }
    }

    if (next.size === 0) {
      return base;
    }

    const patterns = [...base.patterns.values()].map((pattern) => {
      const weight = next.get(pattern.key);
      return weight === undefined
        ? pattern
        : Object.freeze({ ...pattern, weight });
    });

    this.current = buildSnapshot(base.version, base.revision + 1, patterns);
    return this.current;
  }

  private prepare(
    raw: unknown,
    index: number,
    version: number,
    compile: MatcherCompiler,
  ): PatternOutcome {
    const parsed = patternDefinitionSchema.safeParse(raw);
    if (!parsed.success) {
      return {
        status: "excluded",
        id: describeId(raw, index),
        reason: formatIssues(parsed.error).join("; "),
      };
    }

    const def = parsed.data;
    try {
      const matcher = compile(def, version);
      const category = def.category ?? "general";
      return {
        status: "loaded",
        pattern: Object.freeze({
          id: def.id,
          key: patternKey(def.tier, def.id),
          tier: def.tier,
          category,
          message: renderMessage(def.message, {
            id: def.id,
            tier: def.tier,
            category,
          }),
          matcher,
          weight: def.weight ?? DEFAULT_TIER_WEIGHT[def.tier],
        }),
      };
    } catch (error) {
      return {
        status: "excluded",
        id: def.id,
        tier: def.tier,
        reason: error instanceof Error ? error.message : String(error),
      };
    }
  }
}

function describeId(raw: unknown, index: number): string {
  if (typeof raw === "object" && raw !== null && "id" in raw) {
    const { id } = raw;
    if (typeof id === "string" && id.length > 0) return id;
  }
  return `#${index}`;
}
