/**
 * Tiergate error types.
 *
 * Only misuse of the API surfaces as an exception. Pattern evaluation,
 * budget exhaustion and learning never throw into `classify`.
 */

import type { ExcludedPattern } from "./patterns/types.js";

export class TierGateError extends Error {
  constructor(
    message: string,
    public readonly code: string,
  ) {
    super(message);
    this.name = "TierGateError";
  }
}

export class ConfigError extends TierGateError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message, "CONFIG_INVALID");
    this.name = "ConfigError";
  }
}

/**
 * Raised when a pattern set cannot replace the active one: the input is not a
 * collection, or not a single pattern survived validation.
 */
export class PatternLoadError extends TierGateError {
  constructor(
    message: string,
    public readonly excluded: ExcludedPattern[] = [],
  ) {
    super(message, "PATTERN_LOAD_FAILED");
    this.name = "PatternLoadError";
  }
}
