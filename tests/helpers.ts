import type { Verdict, VerdictMatch } from "../src/engine/types.js";

export function makeMatch(overrides: Partial<VerdictMatch> = {}): VerdictMatch {
  return {
    id: "drop-db",
    key: "CRITICAL_FAST/drop-db",
    tier: "CRITICAL_FAST",
    category: "destructive",
    message: "Database drop",
    confidence: 0.9,
    active: true,
    index: 0,
    length: 13,
    ...overrides,
  };
}

export function makeVerdict(overrides: Partial<Verdict> = {}): Verdict {
  return {
    severity: "NONE",
    matches: [],
    elapsedMs: 0.1,
    degraded: false,
    overrunTier: null,
    errors: 0,
    truncated: false,
    earlyStop: false,
    tiersEvaluated: ["ULTRA_CRITICAL", "CRITICAL_FAST", "HIGH_NORMAL", "INFO"],
    tiersSkipped: [],
    evaluated: 4,
    source: "evaluated",
    version: 1,
    fingerprint: "fp",
    ...overrides,
  };
}

/** Manually advanced millisecond clock */
export function manualClock(start = 0): { now: () => number; advance: (ms: number) => void } {
  let current = start;
  return {
    now: () => current,
    advance: (ms) => {
      current += ms;
    },
  };
}
