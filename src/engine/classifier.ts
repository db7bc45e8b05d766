/**
 * Tiergate: Classification Engine
 *
 * Produces a Verdict for one input:
 *
 *   fingerprint → skip cache → result cache → tiers in severity order
 *   under the budget controller → verdict → cache (complete only)
 *   → learning samples onto the bounded queue
 *
 * Each call works on the snapshot it took at entry, so a reload or weight
 * publication mid-call never applies partially. ULTRA_CRITICAL always runs in
 * full; if it overruns its own ceiling the remaining tiers are skipped and the
 * verdict is degraded. Nothing thrown by a pattern,
 * an event sink or the learning queue reaches the caller.
 */

import { performance } from "node:perf_hooks";
import { TierBudgetController } from "../budget/controller.js";
import type { BudgetRun } from "../budget/controller.js";
import type { Clock } from "../budget/types.js";
import { fingerprint } from "../cache/fingerprint.js";
import { CacheHierarchy, FULL_SCOPE } from "../cache/hierarchy.js";
import { resolveConfig, type EngineConfig } from "../config/index.js";
import { EngineEventEmitter } from "../events/emitter.js";
import { logger as rootLogger, type Logger } from "../events/logger.js";
import type { EngineEvent, EventBus } from "../events/types.js";
import { BoundedQueue } from "../learning/queue.js";
import type { LearningSample } from "../learning/types.js";
import { compileMatcher, matcherKey } from "../patterns/matcher.js";
import { PatternStore } from "../patterns/store.js";
import {
  TIERS,
  TIER_ACTIVATION,
  TIER_RANK,
  ULTRA_CRITICAL_MULTIPLIER,
  type LoadReport,
  type Pattern,
  type PatternDefinition,
  type PatternKey,
  type PatternSnapshot,
  type Severity,
  type Tier,
} from "../patterns/types.js";
import { prepareInput } from "./excerpt.js";
import type {
  ClassifyOptions,
  EngineOptions,
  EngineStats,
  EvaluationOutcome,
  FeedbackOutcome,
  Verdict,
  VerdictMatch,
  VerdictSource,
} from "./types.js";

// ============================================================================
// Pattern Evaluation
// ============================================================================

/**
 * Run one pattern. A matcher that throws becomes an `error` outcome.
 */
export function evaluatePattern(pattern: Pattern, text: string): EvaluationOutcome {
  try {
    const span = pattern.matcher.match(text);
    return span ? { kind: "match", span } : { kind: "non-match" };
  } catch (error) {
    return { kind: "error", error };
  }
}

function selectTiers(filter?: readonly Tier[]): Tier[] {
  if (!filter || filter.length === 0) {
    return [...TIERS];
  }
  return TIERS.filter((tier) => filter.includes(tier));
}

function highestSeverity(matches: readonly VerdictMatch[]): Severity {
  let best: Severity = "NONE";
  for (const match of matches) {
    if (!match.active) continue;
    if (best === "NONE" || TIER_RANK[match.tier] > TIER_RANK[best]) {
      best = match.tier;
    }
  }
  return best;
}

interface EngineCounters {
  classifications: number;
  bySource: Record<VerdictSource, number>;
  patternEvaluations: number;
  patternErrors: number;
  degraded: number;
  tierOverruns: number;
  earlyStops: number;
  truncated: number;
  samplesEnqueued: number;
  samplesDropped: number;
}

interface TierResult {
  evaluated: number;
  errors: number;
  /** The tier's allowance ran out before every pattern ran */
  cut: boolean;
  earlyStop: boolean;
}

// ============================================================================
// Engine
// ============================================================================

export class ClassificationEngine {
  readonly config: EngineConfig;
  readonly store: PatternStore;
  readonly cache: CacheHierarchy;
  readonly queue: BoundedQueue<LearningSample>;
  readonly budget: TierBudgetController;

  private events: EventBus;
  private log: Logger;
  private clock: Clock;
  private lastReport: LoadReport | null = null;

  /** Patterns whose failure was already reported for the current version */
  private reportedErrors = new Set<PatternKey>();

  private counters: EngineCounters = {
    classifications: 0,
    bySource: { evaluated: 0, "skip-cache": 0, "result-cache": 0 },
    patternEvaluations: 0,
    patternErrors: 0,
    degraded: 0,
    tierOverruns: 0,
    earlyStops: 0,
    truncated: 0,
    samplesEnqueued: 0,
    samplesDropped: 0,
  };

  constructor(options: EngineOptions = {}) {
    this.config = resolveConfig(options.config);
    const logger = options.logger ?? rootLogger;
    this.log = logger.child({ component: "engine" });
    this.events = options.events ?? new EngineEventEmitter(undefined, logger);
    this.clock = options.clock ?? (() => performance.now());

    this.store = new PatternStore(this.events);
    this.cache =
      options.cache ??
      new CacheHierarchy({ maxEntries: this.config.maxCacheEntries });
    this.queue = options.queue ?? new BoundedQueue(this.config.queueCapacity);
    this.budget = new TierBudgetController(
      {
        overallMs: this.config.overallBudgetMs,
        perTierMs: this.config.perTierBudgetMs,
      },
      { clock: this.clock, adaptRate: this.config.budgetAdaptRate },
    );

    if (options.patterns) {
      this.reloadPatterns(options.patterns);
    }
  }

  /**
   * Replace the active pattern set. Returns the new version. Cached verdicts
   * from older versions stop being served at once.
   */
  reloadPatterns(definitions: readonly PatternDefinition[]): number {
    const report = this.store.load(definitions, (def, version) =>
      this.cache.compiled.resolve(version, matcherKey(def), () =>
        compileMatcher(def),
      ),
    );
    this.cache.invalidate(report.version);
    this.reportedErrors.clear();
    this.budget.reset();
    this.lastReport = report;
    return report.version;
  }

  /** Outcome of the last successful reload */
  get loadReport(): LoadReport | null {
    return this.lastReport;
  }

  snapshot(): PatternSnapshot {
    return this.store.snapshot();
  }

  classify(text: string, options: ClassifyOptions = {}): Verdict {
    const startedAt = this.clock();
    const snapshot = this.store.snapshot();
    const tiers = selectTiers(options.tiers);
    const scope = tiers.length === TIERS.length ? FULL_SCOPE : tiers.join(",");
    const fp = fingerprint(text, this.config.maxFingerprintLength);

    this.counters.classifications++;

    const cached = this.cache.lookup(fp, scope, snapshot.version);
    if (cached.hit) {
      const elapsedMs = this.clock() - startedAt;

      if (cached.layer === "skip") {
        this.counters.bySource["skip-cache"]++;
        const verdict: Verdict = {
          severity: "NONE",
          matches: [],
          elapsedMs,
          degraded: false,
          overrunTier: null,
          errors: 0,
          truncated: text.length > this.config.maxInputLength,
          earlyStop: false,
          tiersEvaluated: tiers,
          tiersSkipped: [],
          evaluated: 0,
          source: "skip-cache",
          version: snapshot.version,
          fingerprint: fp,
        };
        return Object.freeze(verdict);
      }

      this.counters.bySource["result-cache"]++;
      const verdict: Verdict = {
        ...cached.entry.verdict,
        elapsedMs,
        evaluated: 0,
        source: "result-cache",
      };
      return Object.freeze(verdict);
    }

    return this.evaluate(text, fp, scope, tiers, snapshot, startedAt);
  }

  /**
   * Host feedback on a reported match. Goes through the learning queue like
   * any other sample.
   */
  feedback(key: PatternKey, outcome: FeedbackOutcome): boolean {
    const snapshot = this.store.snapshot();
    const pattern = snapshot.patterns.get(key);
    if (!pattern) return false;

    this.enqueue([
      {
        key,
        tier: pattern.tier,
        version: snapshot.version,
        matched: true,
        elapsedMs: 0,
        signal: outcome === "confirmed" ? 1 : 0,
      },
    ]);
    return true;
  }

  stats(): EngineStats {
    const snapshot = this.store.snapshot();
    return {
      ...this.counters,
      bySource: { ...this.counters.bySource },
      version: snapshot.version,
      revision: snapshot.revision,
      patterns: snapshot.size,
      cache: this.cache.stats(),
    };
  }

  // ─── Evaluation ────────────────────────────────────────────

  private evaluate(
    text: string,
    fp: string,
    scope: string,
    tiers: readonly Tier[],
    snapshot: PatternSnapshot,
    startedAt: number,
  ): Verdict {
    const input = prepareInput(
      text,
      this.config.maxInputLength,
      this.config.truncation,
    );
    const run = this.budget.begin();

    const matches: VerdictMatch[] = [];
    const samples: LearningSample[] = [];
    const tiersEvaluated: Tier[] = [];
    const tiersSkipped: Tier[] = [];
    let degraded = false;
    let earlyStop = false;
    let evaluated = 0;
    let errors = 0;

    for (const tier of tiers) {
      if (degraded || earlyStop) {
        tiersSkipped.push(tier);
        continue;
      }

      if (!run.allow(tier)) {
        degraded = true;
        tiersSkipped.push(tier);
        continue;
      }

      const result = this.evaluateTier(tier, snapshot, input.text, run, matches, samples);
      run.finish(tier);
      evaluated += result.evaluated;
      errors += result.errors;

      if (result.cut) {
        degraded = true;
        tiersSkipped.push(tier);
      } else {
        tiersEvaluated.push(tier);
      }
      earlyStop = result.earlyStop;
      if (run.overrunTier === tier) {
        degraded = true;
      }
    }

    if (!degraded && run.overrun()) {
      degraded = true;
    }

    const verdict: Verdict = {
      severity: highestSeverity(matches),
      matches: Object.freeze(matches),
      elapsedMs: this.clock() - startedAt,
      degraded,
      overrunTier: run.overrunTier,
      errors,
      truncated: input.truncated,
      earlyStop,
      tiersEvaluated: Object.freeze(tiersEvaluated),
      tiersSkipped: Object.freeze(tiersSkipped),
      evaluated,
      source: "evaluated",
      version: snapshot.version,
      fingerprint: fp,
    };
    Object.freeze(verdict);

    this.counters.bySource.evaluated++;
    this.counters.patternEvaluations += evaluated;
    if (earlyStop) this.counters.earlyStops++;
    if (run.overrunTier) this.counters.tierOverruns++;
    if (input.truncated) this.counters.truncated++;

    if (degraded) {
      this.counters.degraded++;
      this.emit({
        type: "budget-exhausted",
        version: snapshot.version,
        elapsedMs: verdict.elapsedMs,
        tiersEvaluated,
        tiersSkipped,
        overrunTier: run.overrunTier,
      });
    } else {
      this.cache.store(fp, scope, verdict);
    }

    this.enqueue(samples);
    return verdict;
  }

  private evaluateTier(
    tier: Tier,
    snapshot: PatternSnapshot,
    text: string,
    run: BudgetRun,
    matches: VerdictMatch[],
    samples: LearningSample[],
  ): TierResult {
    let evaluated = 0;
    let errors = 0;

    for (const pattern of snapshot.tiers[tier]) {
      if (run.expired()) {
        return { evaluated, errors, cut: true, earlyStop: false };
      }

      const before = this.clock();
      const outcome = evaluatePattern(pattern, text);
      const elapsedMs = this.clock() - before;
      evaluated++;

      samples.push({
        key: pattern.key,
        tier,
        version: snapshot.version,
        matched: outcome.kind === "match",
        elapsedMs,
      });

      if (outcome.kind === "error") {
        errors++;
        this.reportPatternError(pattern, snapshot.version, outcome.error);
        continue;
      }
      if (outcome.kind === "non-match") {
        continue;
      }

      matches.push(
        Object.freeze({
          id: pattern.id,
          key: pattern.key,
          tier,
          category: pattern.category,
          message: pattern.message,
          confidence: pattern.weight,
          active: pattern.weight >= TIER_ACTIVATION[tier],
          index: outcome.span.index,
          length: outcome.span.text.length,
        }),
      );

      if (
        tier === "ULTRA_CRITICAL" &&
        pattern.weight * ULTRA_CRITICAL_MULTIPLIER >= 1
      ) {
        return { evaluated, errors, cut: false, earlyStop: true };
      }
    }

    return { evaluated, errors, cut: false, earlyStop: false };
  }

  // ─── Side channels ─────────────────────────────────────────

  private reportPatternError(pattern: Pattern, version: number, error: unknown): void {
    this.counters.patternErrors++;
    if (this.reportedErrors.has(pattern.key)) return;
    this.reportedErrors.add(pattern.key);

    this.emit({
      type: "pattern-error",
      version,
      key: pattern.key,
      error: error instanceof Error ? error.message : String(error),
    });
  }

  private enqueue(samples: LearningSample[]): void {
    if (samples.length === 0) return;
    try {
      const dropped = this.queue.pushAll(samples);
      this.counters.samplesEnqueued += samples.length;
      if (dropped > 0) {
        this.counters.samplesDropped += dropped;
        this.emit({ type: "samples-dropped", count: dropped, total: this.queue.dropped });
      }
    } catch (error) {
      this.log.error({ err: error }, "failed to enqueue learning samples");
    }
  }

  private emit(event: EngineEvent): void {
    try {
      this.events.emit(event);
    } catch (error) {
      this.log.error({ err: error, event: event.type }, "event delivery failed");
    }
  }
}

export function createEngine(options?: EngineOptions): ClassificationEngine {
  return new ClassificationEngine(options);
}
