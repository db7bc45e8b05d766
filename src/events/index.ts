/**
 * Tiergate: Engine Events
 *
 * Warnings, drops and weight publications leave the engine as typed events.
 * The emitter logs them and hands them to host-registered sinks.
 *
 * @module
 */

export type {
  EngineEvent,
  EngineEventType,
  EventSink,
  EventBus,
  EmitterConfig,
  PatternsLoadedEvent,
  PatternExcludedEvent,
  PatternErrorEvent,
  BudgetExhaustedEvent,
  SamplesDroppedEvent,
  WeightsPublishedEvent,
  AdjusterErrorEvent,
} from "./types.js";

export { EngineEventEmitter, EventLog } from "./emitter.js";
export { logger, type Logger } from "./logger.js";
