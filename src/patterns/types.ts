/**
 * Tiergate: Pattern Store: Type Definitions
 */

// ============================================================================
// Tiers
// ============================================================================

/** Severity tiers, most urgent first. Evaluation always follows this order. */
export const TIERS = [
  "ULTRA_CRITICAL",
  "CRITICAL_FAST",
  "HIGH_NORMAL",
  "INFO",
] as const;

export type Tier = (typeof TIERS)[number];

export type Severity = Tier | "NONE";

export const TIER_RANK: Record<Tier, number> = {
  ULTRA_CRITICAL: 3,
  CRITICAL_FAST: 2,
  HIGH_NORMAL: 1,
  INFO: 0,
};

/** Tier that is evaluated even when the budget is already spent. */
export const MANDATORY_TIER: Tier = "ULTRA_CRITICAL";

/** Starting weight for patterns that do not declare one. */
export const DEFAULT_TIER_WEIGHT: Record<Tier, number> = {
  ULTRA_CRITICAL: 1.0,
  CRITICAL_FAST: 0.9,
  HIGH_NORMAL: 0.8,
  INFO: 0.6,
};

/** Minimum weight for a match to count toward the verdict severity. */
export const TIER_ACTIVATION: Record<Tier, number> = {
  ULTRA_CRITICAL: 0.8,
  CRITICAL_FAST: 0.6,
  HIGH_NORMAL: 0.4,
  INFO: 0.2,
};

/**
 * An ULTRA_CRITICAL match whose `weight * ULTRA_CRITICAL_MULTIPLIER` reaches
 * 1.0 ends evaluation immediately.
 */
export const ULTRA_CRITICAL_MULTIPLIER = 1.25;

// ============================================================================
// Matchers
// ============================================================================

export interface MatchSpan {
  /** Matched text */
  text: string;
  /** Offset in the evaluated text */
  index: number;
}

/**
 * Structural text matcher. Compiled once per pattern-set version and shared by
 * every snapshot of that version.
 */
export interface Matcher {
  readonly source: string;
  match(text: string): MatchSpan | null;
}

/** Host-supplied matcher. `true` means a match without a known position. */
export type MatchFunction = (text: string) => MatchSpan | boolean | null;

// ============================================================================
// Pattern Definitions
// ============================================================================

export interface PatternDefinition {
  /** Unique within its tier */
  id: string;

  tier: Tier;

  /** Explanation template; `{id}`, `{tier}` and `{category}` are filled in */
  message: string;

  /** Free-form grouping (secrets, destructive, ...) */
  category?: string;

  /** Regex source or RegExp. Exactly one of `pattern` / `match` is required. */
  pattern?: string | RegExp;

  /** Regex flags for a string `pattern` (default "i"); `g` and `y` are dropped */
  flags?: string;

  match?: MatchFunction;

  /** Initial confidence in [0, 1]; defaults per tier */
  weight?: number;
}

/** `<tier>/<id>` */
export type PatternKey = `${Tier}/${string}`;

export interface Pattern {
  readonly id: string;
  readonly key: PatternKey;
  readonly tier: Tier;
  readonly category: string;
  readonly message: string;
  readonly matcher: Matcher;
  readonly weight: number;
}

// ============================================================================
// Snapshots
// ============================================================================

export interface PatternSnapshot {
  /** Pattern-set version; bumped by every successful load */
  readonly version: number;

  /** Weight revision within the version; bumped by every weight publication */
  readonly revision: number;

  readonly tiers: Readonly<Record<Tier, readonly Pattern[]>>;

  readonly patterns: ReadonlyMap<PatternKey, Pattern>;

  readonly size: number;
}

// ============================================================================
// Load Outcomes
// ============================================================================

export interface LoadedPattern {
  status: "loaded";
  pattern: Pattern;
}

export interface ExcludedPattern {
  status: "excluded";
  /** Definition id, or `#<index>` when the definition has none */
  id: string;
  tier?: Tier;
  reason: string;
}

export type PatternOutcome = LoadedPattern | ExcludedPattern;

export interface LoadReport {
  version: number;
  loaded: number;
  excluded: ExcludedPattern[];
}

/** Compiles a validated definition into a matcher; throws on invalid input. */
export type MatcherCompiler = (
  definition: PatternDefinition,
  version: number,
) => Matcher;
