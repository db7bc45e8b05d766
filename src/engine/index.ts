/**
 * Tiergate: Classification Engine
 *
 * @module
 */

export type {
  Verdict,
  VerdictMatch,
  VerdictSource,
  EvaluationOutcome,
  ClassifyOptions,
  FeedbackOutcome,
  EngineOptions,
  EngineStats,
} from "./types.js";

export { ClassificationEngine, createEngine, evaluatePattern } from "./classifier.js";
export { resolveAction, type HostAction, type ActionPolicy } from "./action.js";
export { prepareInput, type PreparedInput, type TruncationStrategy } from "./excerpt.js";
