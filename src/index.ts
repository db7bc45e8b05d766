/**
 * Tiergate: tiered pattern classification for agent output
 *
 * Classifies text against severity-tiered rules within a latency budget:
 *
 * ULTRA_CRITICAL : always evaluated in full; a confident match stops early
 * CRITICAL_FAST  : evaluated while the budget allows
 * HIGH_NORMAL    : evaluated while the budget allows
 * INFO           : evaluated last, first to be skipped
 *
 * Repeat inputs are answered from a version-keyed cache. Pattern weights
 * drift with observed matches and host feedback through a background
 * adjuster that never runs on the classify path.
 *
 * Usage:
 *   const gate = createTierGate();
 *   const { allowed, verdict } = gate.check(agentOutput);
 *   gate.close();
 */

export * from "./errors.js";
export * from "./patterns/index.js";
export * from "./budget/index.js";
export * from "./cache/index.js";
export * from "./events/index.js";
export * from "./config/index.js";
export * from "./learning/index.js";
export * from "./engine/index.js";
export {
  createTierGate,
  type TierGate,
  type GateConfig,
  type GateResult,
  type GateStats,
} from "./gate.js";
