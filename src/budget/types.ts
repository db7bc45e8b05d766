/**
 * Tiergate: Tier Budget Controller: Type Definitions
 */

import type { Tier } from "../patterns/types.js";

/** Monotonic millisecond clock. */
export type Clock = () => number;

export interface TierBudget {
  /** Ceiling for one classification */
  overallMs: number;

  /** Ceiling per tier; an allowance never exceeds what is left overall */
  perTierMs: Record<Tier, number>;
}

export interface BudgetControllerOptions {
  clock?: Clock;

  /** EMA rate for moving tier estimates toward measured time (0-1] */
  adaptRate?: number;
}
