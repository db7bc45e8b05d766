/**
 * Tiergate: Pattern Store
 *
 * Versioned, severity-tiered rule set held as an immutable snapshot.
 *
 * @module
 */

export type {
  Tier,
  Severity,
  Matcher,
  MatchSpan,
  MatchFunction,
  MatcherCompiler,
  PatternDefinition,
  Pattern,
  PatternKey,
  PatternSnapshot,
  PatternOutcome,
  LoadedPattern,
  ExcludedPattern,
  LoadReport,
} from "./types.js";

export {
  TIERS,
  TIER_RANK,
  TIER_ACTIVATION,
  DEFAULT_TIER_WEIGHT,
  MANDATORY_TIER,
  ULTRA_CRITICAL_MULTIPLIER,
} from "./types.js";

export { PatternStore, patternKey } from "./store.js";
export {
  RegexMatcher,
  FunctionMatcher,
  compileMatcher,
  matcherKey,
  renderMessage,
} from "./matcher.js";
export {
  loadDefaultCatalog,
  definitionsFromCatalog,
  parseCatalog,
  DEFAULT_CATALOG_URL,
} from "./catalog.js";
export {
  patternDefinitionSchema,
  catalogSchema,
  type Catalog,
  type CatalogEntry,
} from "./schema.js";
