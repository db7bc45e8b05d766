/**
 * Tiergate: Engine Events: Type Definitions
 */

import type { PatternKey, Tier } from "../patterns/types.js";

// ============================================================================
// Events
// ============================================================================

export interface PatternsLoadedEvent {
  type: "patterns-loaded";
  version: number;
  loaded: number;
  excluded: number;
}

export interface PatternExcludedEvent {
  type: "pattern-excluded";
  version: number;
  id: string;
  tier?: Tier;
  reason: string;
}

export interface PatternErrorEvent {
  type: "pattern-error";
  version: number;
  key: PatternKey;
  error: string;
}

export interface BudgetExhaustedEvent {
  type: "budget-exhausted";
  version: number;
  elapsedMs: number;
  tiersEvaluated: Tier[];
  tiersSkipped: Tier[];
  /** Mandatory tier that ran past its own ceiling, if any */
  overrunTier: Tier | null;
}

export interface SamplesDroppedEvent {
  type: "samples-dropped";
  /** Dropped by this push */
  count: number;
  /** Dropped since the queue was created */
  total: number;
}

export interface WeightsPublishedEvent {
  type: "weights-published";
  version: number;
  revision: number;
  updates: number;
}

export interface AdjusterErrorEvent {
  type: "adjuster-error";
  error: string;
}

export type EngineEvent =
  | PatternsLoadedEvent
  | PatternExcludedEvent
  | PatternErrorEvent
  | BudgetExhaustedEvent
  | SamplesDroppedEvent
  | WeightsPublishedEvent
  | AdjusterErrorEvent;

export type EngineEventType = EngineEvent["type"];

// ============================================================================
// Sinks
// ============================================================================

/** Receives engine events. Hosts forward these to their observability stack. */
export interface EventSink {
  receive(event: EngineEvent): void;
}

export interface EventBus {
  emit(event: EngineEvent): void;
}

export interface EmitterConfig {
  /** Write events to the logger */
  toLog: boolean;

  /** Event types that are neither logged nor forwarded */
  suppress?: EngineEventType[];
}
