/**
 * Tiergate: Tier Budget Controller
 *
 * Time-boxes one classification. Tiers are offered in severity order; a tier
 * is refused once its estimated cost no longer fits into what is left of the
 * overall ceiling, and a tier in progress is cut between patterns once its
 * allowance is spent. Work already started is never preempted. The mandatory
 * tier is never cut; running past its own ceiling is recorded on the run.
 */

import { performance } from "node:perf_hooks";
import { MANDATORY_TIER, TIERS, type Tier } from "../patterns/types.js";
import type { BudgetControllerOptions, Clock, TierBudget } from "./types.js";

const DEFAULT_ADAPT_RATE = 0.2;

// ─── Controller ──────────────────────────────────────────────

export class TierBudgetController {
  readonly clock: Clock;
  private budgetConfig: TierBudget;
  private adaptRate: number;
  private estimates: Record<Tier, number>;

  constructor(budget: TierBudget, options: BudgetControllerOptions = {}) {
    this.budgetConfig = {
      overallMs: budget.overallMs,
      perTierMs: { ...budget.perTierMs },
    };
    this.clock = options.clock ?? (() => performance.now());
    this.adaptRate = options.adaptRate ?? DEFAULT_ADAPT_RATE;
    this.estimates = { ...budget.perTierMs };
  }

  get budget(): TierBudget {
    return {
      overallMs: this.budgetConfig.overallMs,
      perTierMs: { ...this.budgetConfig.perTierMs },
    };
  }

  /**
   * Start the deadline clock for one classification.
   */
  begin(overallMs: number = this.budgetConfig.overallMs): BudgetRun {
    return new BudgetRun(this, overallMs);
  }

  /**
   * Expected cost of a tier. Starts at the configured ceiling and follows
   * measured time, never rising above the ceiling.
   */
  estimate(tier: Tier): number {
    return this.estimates[tier];
  }

  ceiling(tier: Tier): number {
    return this.budgetConfig.perTierMs[tier];
  }

  record(tier: Tier, elapsedMs: number): void {
    if (!Number.isFinite(elapsedMs) || elapsedMs < 0) return;
    const current = this.estimates[tier];
    const next = current + this.adaptRate * (elapsedMs - current);
    this.estimates[tier] = Math.min(Math.max(next, 0), this.ceiling(tier));
  }

  reset(): void {
    for (const tier of TIERS) {
      this.estimates[tier] = this.ceiling(tier);
    }
  }
}

// ─── Run (one classification) ────────────────────────────────

export class BudgetRun {
  readonly startedAt: number;
  readonly deadline: number;

  private current: Tier | null = null;
  private tierStartedAt = 0;
  private tierDeadline = 0;
  private refused = false;
  private overran: Tier | null = null;

  constructor(
    private controller: TierBudgetController,
    readonly overallMs: number,
  ) {
    this.startedAt = controller.clock();
    this.deadline = this.startedAt + overallMs;
  }

  /**
   * Whether to attempt `tier`. The mandatory tier is always attempted; other
   * tiers need their estimated cost to fit into the remaining time. The
   * allowance granted is capped by what is left overall, so allowances in one
   * run never add up past the ceiling.
   */
  allow(tier: Tier): boolean {
    const now = this.controller.clock();
    const remaining = this.deadline - now;

    if (tier === MANDATORY_TIER) {
      this.open(tier, now, this.controller.ceiling(tier));
      return true;
    }

    if (remaining <= 0 || this.controller.estimate(tier) > remaining) {
      this.refused = true;
      return false;
    }

    this.open(tier, now, Math.min(this.controller.ceiling(tier), remaining));
    return true;
  }

  /**
   * Whether the tier in progress has used up its allowance. Checked between
   * patterns; the mandatory tier always runs to completion.
   */
  expired(): boolean {
    if (this.current === null || this.current === MANDATORY_TIER) {
      return false;
    }
    const now = this.controller.clock();
    return now > this.tierDeadline || now > this.deadline;
  }

  /**
   * Close the tier in progress and feed its measured time back.
   */
  finish(tier: Tier): number {
    const elapsed = this.controller.clock() - this.tierStartedAt;
    this.controller.record(tier, elapsed);
    if (tier === MANDATORY_TIER && elapsed > this.controller.ceiling(tier)) {
      this.overran = tier;
    }
    this.current = null;
    return elapsed;
  }

  elapsed(): number {
    return this.controller.clock() - this.startedAt;
  }

  /** The overall ceiling has been breached. */
  overrun(): boolean {
    return this.controller.clock() > this.deadline;
  }

  /** A tier was refused during this run. */
  get exhausted(): boolean {
    return this.refused;
  }

  /** The mandatory tier, if it ran past its own ceiling. */
  get overrunTier(): Tier | null {
    return this.overran;
  }

  private open(tier: Tier, now: number, allowanceMs: number): void {
    this.current = tier;
    this.tierStartedAt = now;
    this.tierDeadline = now + allowanceMs;
  }
}
