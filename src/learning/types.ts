/**
 * Tiergate: Background Weight Adjuster: Type Definitions
 */

import type { PatternKey, Tier } from "../patterns/types.js";

/**
 * One pattern's outcome in one classification. Produced by the engine,
 * consumed only by the adjuster.
 */
export interface LearningSample {
  key: PatternKey;
  tier: Tier;

  /** Pattern-set version the sample was taken under */
  version: number;

  matched: boolean;
  elapsedMs: number;

  /** Explicit target weight (host feedback); overrides `matched` */
  signal?: number;
}

export interface AdjustmentReport {
  /** Samples taken off the queue */
  processed: number;

  /** Samples from another pattern-set version */
  stale: number;

  /** Samples that carried no learning signal */
  observations: number;

  /** Weights swapped into the store */
  published: number;

  /** The wake-up ran out of time and left samples queued */
  deferred: boolean;

  remaining: number;
  durationMs: number;
}

export interface AdjusterStats {
  wakeups: number;
  processed: number;
  stale: number;
  observations: number;
  published: number;
  deferrals: number;
  pending: number;
  /** Mean observed evaluation cost per pattern (ms) */
  meanCostMs: Record<PatternKey, number>;
}
