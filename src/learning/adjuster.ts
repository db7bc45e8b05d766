/**
 * Tiergate: Background Weight Adjuster
 *
 * Drains learning samples off the bounded queue on its own schedule and moves
 * pattern weights by exponential moving average:
 *
 *   w' = w + rate[tier] * (signal - w)      clamped to [floor[tier], 1]
 *
 * Changes accumulate per pattern and are published only once they reach the
 * tier's minimum change, all in one snapshot swap per wake-up. Nothing here
 * runs on the classify call stack.
 */

import { performance } from "node:perf_hooks";
import type { Clock } from "../budget/types.js";
import { resolveConfig, type LearningConfig } from "../config/index.js";
import type { EventBus } from "../events/types.js";
import { logger as rootLogger, type Logger } from "../events/logger.js";
import type { PatternStore } from "../patterns/store.js";
import type { PatternKey, PatternSnapshot } from "../patterns/types.js";
import type { BoundedQueue } from "./queue.js";
import type {
  AdjusterStats,
  AdjustmentReport,
  LearningSample,
} from "./types.js";

export interface WeightAdjusterOptions {
  config?: LearningConfig;
  events?: EventBus;
  clock?: Clock;
  logger?: Logger;
}

interface CostAccumulator {
  total: number;
  count: number;
}

export class WeightAdjuster {
  private config: LearningConfig;
  private clock: Clock;
  private log: Logger;

  /** Learned but not yet published weights, for `pendingVersion` */
  private pending = new Map<PatternKey, number>();
  private pendingVersion = -1;
  private costs = new Map<PatternKey, CostAccumulator>();

  private timer: NodeJS.Timeout | null = null;
  private immediate: NodeJS.Immediate | null = null;
  private unsubscribe: (() => void) | null = null;
  private deferredUntilTick = false;

  private totals = {
    wakeups: 0,
    processed: 0,
    stale: 0,
    observations: 0,
    published: 0,
    deferrals: 0,
  };

  constructor(
    private store: PatternStore,
    private queue: BoundedQueue<LearningSample>,
    private options: WeightAdjusterOptions = {},
  ) {
    this.config = options.config ?? resolveConfig().learning;
    this.clock = options.clock ?? (() => performance.now());
    this.log = (options.logger ?? rootLogger).child({ component: "adjuster" });
  }

  get running(): boolean {
    return this.timer !== null;
  }

  /**
   * Begin background processing: a wake-up is queued whenever samples arrive,
   * plus a periodic tick that picks up deferred work.
   */
  start(): void {
    if (this.timer) return;

    this.timer = setInterval(() => {
      this.deferredUntilTick = false;
      this.wake();
    }, this.config.intervalMs);
    this.timer.unref();

    this.unsubscribe = this.queue.onAvailable(() => this.schedule());
    if (this.queue.size > 0) this.schedule();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.immediate) {
      clearImmediate(this.immediate);
      this.immediate = null;
    }
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  /**
   * Process one batch now. The periodic timer and queued wake-ups call this;
   * tests and hosts may call it directly.
   */
  runOnce(): AdjustmentReport {
    const startedAt = this.clock();
    const snapshot = this.store.snapshot();
    this.totals.wakeups++;

    if (snapshot.version !== this.pendingVersion) {
      this.pending.clear();
      this.costs.clear();
      this.pendingVersion = snapshot.version;
    }

    let processed = 0;
    let stale = 0;
    let observations = 0;
    let deferred = false;

    while (processed < this.config.batchSize && this.queue.size > 0) {
      if (this.clock() - startedAt > this.config.budgetMs) {
        deferred = true;
        break;
      }

      const sample = this.queue.shift();
      if (!sample) break;
      processed++;

      if (sample.version !== snapshot.version) {
        stale++;
        continue;
      }
      if (!this.learn(sample, snapshot)) {
        observations++;
      }
    }

    const published = this.publish(snapshot);

    this.totals.processed += processed;
    this.totals.stale += stale;
    this.totals.observations += observations;
    this.totals.published += published;
    if (deferred) this.totals.deferrals++;

    return {
      processed,
      stale,
      observations,
      published,
      deferred,
      remaining: this.queue.size,
      durationMs: this.clock() - startedAt,
    };
  }

  /**
   * Process batches until the queue is empty or `maxBatches` ran.
   */
  drain(maxBatches = Number.POSITIVE_INFINITY): AdjustmentReport[] {
    const reports: AdjustmentReport[] = [];
    while (this.queue.size > 0 && reports.length < maxBatches) {
      const report = this.runOnce();
      reports.push(report);
      if (report.processed === 0) break;
    }
    return reports;
  }

  stats(): AdjusterStats {
    const meanCostMs: Record<PatternKey, number> = {};
    for (const [key, cost] of this.costs) {
      meanCostMs[key] = cost.count > 0 ? cost.total / cost.count : 0;
    }
    return { ...this.totals, pending: this.pending.size, meanCostMs };
  }

  /**
   * Returns false when the sample is an observation only (cost, no signal).
   */
  private learn(sample: LearningSample, snapshot: PatternSnapshot): boolean {
    const pattern = snapshot.patterns.get(sample.key);
    if (!pattern) return false;

    // Feedback samples carry no timing
    if (sample.signal === undefined) {
      const cost = this.costs.get(sample.key) ?? { total: 0, count: 0 };
      cost.total += sample.elapsedMs;
      cost.count++;
      this.costs.set(sample.key, cost);
    }

    const signal = sample.signal ?? (sample.matched ? 1 : undefined);
    if (signal === undefined) return false;

    const policy = this.config.tiers[pattern.tier];
    const current = this.pending.get(sample.key) ?? pattern.weight;
    const next = current + policy.learningRate * (signal - current);
    this.pending.set(sample.key, Math.min(Math.max(next, policy.floor), 1));
    return true;
  }

  private publish(snapshot: PatternSnapshot): number {
    const updates: [PatternKey, number][] = [];

    for (const [key, weight] of this.pending) {
      const pattern = snapshot.patterns.get(key);
      if (!pattern) {
        this.pending.delete(key);
        continue;
      }
      const { minChange } = this.config.tiers[pattern.tier];
      if (Math.abs(weight - pattern.weight) >= minChange) {
        updates.push([key, weight]);
      }
    }

    if (updates.length === 0) return 0;

    const next = this.store.applyWeights(updates);
    for (const [key] of updates) {
      this.pending.delete(key);
    }

    this.options.events?.emit({
      type: "weights-published",
      version: next.version,
      revision: next.revision,
      updates: updates.length,
    });
    return updates.length;
  }

  private schedule(): void {
    if (this.immediate || this.deferredUntilTick || !this.timer) return;
    this.immediate = setImmediate(() => {
      this.immediate = null;
      this.wake();
    });
  }

  private wake(): void {
    try {
      const report = this.runOnce();
      if (report.deferred) {
        // Out of budget: leave the rest for the next periodic tick
        this.deferredUntilTick = true;
      } else if (report.remaining > 0) {
        this.schedule();
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.log.error({ err: error }, "weight adjustment failed");
      this.options.events?.emit({ type: "adjuster-error", error: message });
    }
  }
}
