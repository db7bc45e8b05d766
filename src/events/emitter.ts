/**
 * Tiergate: Engine Events: Emitter and Event Log
 */

import type { Logger } from "pino";
import { logger as rootLogger } from "./logger.js";
import type {
  EngineEvent,
  EngineEventType,
  EmitterConfig,
  EventBus,
  EventSink,
} from "./types.js";

type LogLevel = "debug" | "info" | "warn" | "error";

const EVENT_LOG_LEVEL: Record<EngineEventType, LogLevel> = {
  "patterns-loaded": "info",
  "pattern-excluded": "warn",
  "pattern-error": "warn",
  "budget-exhausted": "debug",
  "samples-dropped": "debug",
  "weights-published": "debug",
  "adjuster-error": "error",
};

// ============================================================================
// Emitter
// ============================================================================

export class EngineEventEmitter implements EventBus {
  private config: EmitterConfig;
  private sinks = new Set<EventSink>();
  private log: Logger;

  constructor(config?: Partial<EmitterConfig>, logger: Logger = rootLogger) {
    this.config = {
      toLog: config?.toLog ?? true,
      suppress: config?.suppress,
    };
    this.log = logger.child({ component: "events" });
  }

  configure(config: Partial<EmitterConfig>): void {
    Object.assign(this.config, config);
  }

  /**
   * Register a sink. Returns a function that removes it again.
   */
  addSink(sink: EventSink): () => void {
    this.sinks.add(sink);
    return () => {
      this.sinks.delete(sink);
    };
  }

  emit(event: EngineEvent): void {
    if (this.config.suppress?.includes(event.type)) {
      return;
    }

    if (this.config.toLog) {
      const { type, ...fields } = event;
      this.log[EVENT_LOG_LEVEL[type]](fields, type);
    }

    for (const sink of this.sinks) {
      try {
        sink.receive(event);
      } catch (error) {
        this.log.error({ err: error, event: event.type }, "event sink failed");
      }
    }
  }
}

// ============================================================================
// Event Log (bounded in-memory sink)
// ============================================================================

export class EventLog implements EventSink {
  private events: EngineEvent[] = [];
  private counts = new Map<EngineEventType, number>();
  private maxEvents: number;

  constructor(options?: { maxEvents?: number }) {
    this.maxEvents = options?.maxEvents ?? 1000;
  }

  receive(event: EngineEvent): void {
    this.events.push(event);
    this.counts.set(event.type, (this.counts.get(event.type) ?? 0) + 1);

    if (this.events.length > this.maxEvents) {
      this.events.splice(0, this.events.length - this.maxEvents);
    }
  }

  recent(limit?: number): EngineEvent[] {
    return limit === undefined ? [...this.events] : this.events.slice(-limit);
  }

  byType<T extends EngineEventType>(
    type: T,
  ): Extract<EngineEvent, { type: T }>[] {
    return this.events.filter(
      (e): e is Extract<EngineEvent, { type: T }> => e.type === type,
    );
  }

  /** Total events of a type received, including ones no longer retained. */
  count(type: EngineEventType): number {
    return this.counts.get(type) ?? 0;
  }

  clear(): void {
    this.events = [];
    this.counts.clear();
  }
}
