/**
 * Tiergate: Classification Engine: Type Definitions
 */

import type { Clock } from "../budget/types.js";
import type { CacheHierarchy } from "../cache/hierarchy.js";
import type { CacheStats } from "../cache/types.js";
import type { EventBus } from "../events/types.js";
import type { Logger } from "../events/logger.js";
import type { EngineConfigInput } from "../config/schema.js";
import type { BoundedQueue } from "../learning/queue.js";
import type { LearningSample } from "../learning/types.js";
import type {
  MatchSpan,
  PatternDefinition,
  PatternKey,
  Severity,
  Tier,
} from "../patterns/types.js";

// ============================================================================
// Verdict
// ============================================================================

export interface VerdictMatch {
  id: string;
  key: PatternKey;
  tier: Tier;
  category: string;
  message: string;

  /** Pattern weight at evaluation time */
  confidence: number;

  /** Weight reached the tier activation threshold; counts toward severity */
  active: boolean;

  /** Position of the match in the evaluated text */
  index: number;
  length: number;
}

export type VerdictSource = "evaluated" | "skip-cache" | "result-cache";

export interface Verdict {
  /** Highest tier with an active match */
  severity: Severity;

  /** Matches in evaluation order */
  matches: readonly VerdictMatch[];

  elapsedMs: number;

  /** A budget was exceeded and evaluation was cut short */
  degraded: boolean;

  /** ULTRA_CRITICAL ran in full but past its own ceiling */
  overrunTier: Tier | null;

  /** Patterns that threw during this evaluation */
  errors: number;

  /** The input was reduced before evaluation */
  truncated: boolean;

  /** An ULTRA_CRITICAL match ended evaluation; not a budget abort */
  earlyStop: boolean;

  tiersEvaluated: readonly Tier[];
  tiersSkipped: readonly Tier[];

  /** Patterns evaluated by this call (0 when served from cache) */
  evaluated: number;

  source: VerdictSource;

  /** Pattern-set version the verdict was computed under */
  version: number;

  fingerprint: string;
}

// ============================================================================
// Evaluation
// ============================================================================

export type EvaluationOutcome =
  | { kind: "match"; span: MatchSpan }
  | { kind: "non-match" }
  | { kind: "error"; error: unknown };

export interface ClassifyOptions {
  /** Only evaluate these tiers (still in severity order) */
  tiers?: readonly Tier[];
}

export type FeedbackOutcome = "confirmed" | "false-positive";

// ============================================================================
// Engine
// ============================================================================

export interface EngineOptions {
  config?: EngineConfigInput;

  /** Initial pattern set */
  patterns?: readonly PatternDefinition[];

  events?: EventBus;
  cache?: CacheHierarchy;
  queue?: BoundedQueue<LearningSample>;
  clock?: Clock;
  logger?: Logger;
}

export interface EngineStats {
  version: number;
  revision: number;
  patterns: number;
  classifications: number;
  bySource: Record<VerdictSource, number>;
  patternEvaluations: number;
  patternErrors: number;
  degraded: number;
  /** Calls where the mandatory tier ran past its ceiling */
  tierOverruns: number;
  earlyStops: number;
  truncated: number;
  samplesEnqueued: number;
  samplesDropped: number;
  cache: CacheStats;
}
