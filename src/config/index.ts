import { ConfigError } from "../errors.js";
import { formatIssues } from "../patterns/schema.js";
import {
  engineConfigSchema,
  type EngineConfig,
  type EngineConfigInput,
} from "./schema.js";

/**
 * Apply defaults and validate. Throws ConfigError listing every issue.
 */
export function resolveConfig(input: EngineConfigInput = {}): EngineConfig {
  const result = engineConfigSchema.safeParse(input);

  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigError(
      `Invalid engine configuration:\n  ${issues.join("\n  ")}`,
      issues,
    );
  }

  return result.data;
}

function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  // Non-numeric values become NaN and fail validation in resolveConfig
  return Number(value);
}

/**
 * Read overrides from TIERGATE_* environment variables. Unset variables are
 * left out so schema defaults apply.
 */
export function configFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): EngineConfigInput {
  const config: EngineConfigInput = {};

  const overall = parseNumber(env.TIERGATE_OVERALL_BUDGET_MS);
  if (overall !== undefined) config.overallBudgetMs = overall;

  const cacheEntries = parseNumber(env.TIERGATE_MAX_CACHE_ENTRIES);
  if (cacheEntries !== undefined) config.maxCacheEntries = cacheEntries;

  const inputLength = parseNumber(env.TIERGATE_MAX_INPUT_LENGTH);
  if (inputLength !== undefined) config.maxInputLength = inputLength;

  const queueCapacity = parseNumber(env.TIERGATE_QUEUE_CAPACITY);
  if (queueCapacity !== undefined) config.queueCapacity = queueCapacity;

  const truncation = env.TIERGATE_TRUNCATION;
  if (truncation === "head" || truncation === "excerpt") {
    config.truncation = truncation;
  }

  return config;
}

export {
  engineConfigSchema,
  learningConfigSchema,
  type EngineConfig,
  type EngineConfigInput,
  type LearningConfig,
  type TierLearningPolicy,
} from "./schema.js";
