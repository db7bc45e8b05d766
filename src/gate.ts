/**
 * Tiergate Integration
 *
 * Wires the engine, the background adjuster and the event emitter into one
 * object a host can hold for its lifetime.
 *
 * Data flow:
 *   check(text) → engine.classify → resolveAction → GateResult
 *                       ↓ samples
 *               learning queue → adjuster (own schedule) → store.applyWeights
 */

import { configFromEnv, resolveConfig, type EngineConfigInput } from "./config/index.js";
import { EngineEventEmitter } from "./events/emitter.js";
import { logger as rootLogger, type Logger } from "./events/logger.js";
import type { EmitterConfig, EventSink } from "./events/types.js";
import { ClassificationEngine } from "./engine/classifier.js";
import { resolveAction, type HostAction, type ActionPolicy } from "./engine/action.js";
import type {
  ClassifyOptions,
  EngineStats,
  FeedbackOutcome,
  Verdict,
} from "./engine/types.js";
import { WeightAdjuster } from "./learning/adjuster.js";
import type { AdjusterStats } from "./learning/types.js";
import { loadDefaultCatalog } from "./patterns/catalog.js";
import type { PatternDefinition, PatternKey } from "./patterns/types.js";

// ============================================================================
// Types
// ============================================================================

export interface GateConfig {
  /** Engine settings; merged over TIERGATE_* environment overrides */
  engine?: EngineConfigInput;
  /** Initial pattern set (default: the bundled catalog) */
  patterns?: readonly PatternDefinition[];
  /** Run the background weight adjuster (default: true) */
  learning?: boolean;
  /** What a degraded verdict without matches maps to */
  inconclusive?: ActionPolicy["inconclusive"];
  /** Event logging and suppression */
  events?: Partial<EmitterConfig>;
  /** Extra event sinks */
  sinks?: EventSink[];
  logger?: Logger;
}

export interface GateResult {
  /** False only when the action is "block" */
  allowed: boolean;
  action: HostAction;
  /** First active match message, or why the verdict is inconclusive */
  reason?: string;
  verdict: Verdict;
}

export interface GateStats {
  engine: EngineStats;
  adjuster: AdjusterStats;
}

export interface TierGate {
  readonly engine: ClassificationEngine;
  readonly adjuster: WeightAdjuster;
  readonly events: EngineEventEmitter;
  /** Classify and map the verdict to a host action */
  check(text: string, options?: ClassifyOptions): GateResult;
  classify(text: string, options?: ClassifyOptions): Verdict;
  reloadPatterns(definitions: readonly PatternDefinition[]): number;
  feedback(key: PatternKey, outcome: FeedbackOutcome): boolean;
  stats(): GateStats;
  /** Stop background work. The gate still classifies afterwards. */
  close(): void;
}

// ============================================================================
// Implementation
// ============================================================================

function describe(verdict: Verdict, action: HostAction): string | undefined {
  const first = verdict.matches.find((m) => m.active);
  if (first) return first.message;
  if (action !== "pass" && verdict.degraded) {
    return verdict.tiersSkipped.length > 0
      ? `Inconclusive: budget exhausted before ${verdict.tiersSkipped.join(", ")}`
      : "Inconclusive: budget exhausted";
  }
  return undefined;
}

export function createTierGate(config: GateConfig = {}): TierGate {
  const logger = config.logger ?? rootLogger;
  const engineConfig = resolveConfig({ ...configFromEnv(), ...config.engine });

  const events = new EngineEventEmitter(config.events, logger);
  for (const sink of config.sinks ?? []) {
    events.addSink(sink);
  }

  const engine = new ClassificationEngine({
    config: engineConfig,
    patterns: config.patterns ?? loadDefaultCatalog(),
    events,
    logger,
  });

  const adjuster = new WeightAdjuster(engine.store, engine.queue, {
    config: engineConfig.learning,
    events,
    logger,
  });
  if (config.learning ?? true) {
    adjuster.start();
  }

  const policy: ActionPolicy = { inconclusive: config.inconclusive };

  return {
    engine,
    adjuster,
    events,

    check(text, options) {
      const verdict = engine.classify(text, options);
      const action = resolveAction(verdict, policy);
      return {
        allowed: action !== "block",
        action,
        reason: describe(verdict, action),
        verdict,
      };
    },

    classify(text, options) {
      return engine.classify(text, options);
    },

    reloadPatterns(definitions) {
      return engine.reloadPatterns(definitions);
    },

    feedback(key, outcome) {
      return engine.feedback(key, outcome);
    },

    stats() {
      return { engine: engine.stats(), adjuster: adjuster.stats() };
    },

    close() {
      adjuster.stop();
    },
  };
}
