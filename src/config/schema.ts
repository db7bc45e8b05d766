import { z } from "zod";

const budgetMs = (fallback: number) => z.number().positive().default(fallback);

const tierPolicy = (learningRate: number, minChange: number, floor: number) =>
  z
    .object({
      // EMA rate; smaller for tiers where a missed detection costs more
      learningRate: z.number().min(0).max(1).default(learningRate),
      // Pending weight changes below this are held back, not published
      minChange: z.number().min(0).max(1).default(minChange),
      // Learning never pushes a weight below this
      floor: z.number().min(0).max(1).default(floor),
    })
    .default({});

export const learningConfigSchema = z.object({
  // Samples processed per wake-up at most
  batchSize: z.number().int().min(1).default(32),
  // Time one wake-up may spend before deferring the rest
  budgetMs: z.number().positive().default(2),
  // Periodic wake-up interval
  intervalMs: z.number().int().min(1).default(250),
  tiers: z
    .object({
      ULTRA_CRITICAL: tierPolicy(0.001, 0.02, 0.8),
      CRITICAL_FAST: tierPolicy(0.005, 0.01, 0.3),
      HIGH_NORMAL: tierPolicy(0.01, 0.005, 0.1),
      INFO: tierPolicy(0.02, 0.005, 0),
    })
    .default({}),
});

export const engineConfigSchema = z.object({
  // Soft deadline for one classify call
  overallBudgetMs: z.number().positive().default(15),
  perTierBudgetMs: z
    .object({
      ULTRA_CRITICAL: budgetMs(1),
      CRITICAL_FAST: budgetMs(3),
      HIGH_NORMAL: budgetMs(8),
      INFO: budgetMs(3),
    })
    .default({}),

  // Capacity of each input-keyed cache layer
  maxCacheEntries: z.number().int().min(1).default(1000),

  // Evaluation length ceiling; longer inputs are reduced and flagged
  maxInputLength: z.number().int().min(64).default(100_000),
  truncation: z.enum(["head", "excerpt"]).default("excerpt"),

  // Characters of normalized input that go into the fingerprint
  maxFingerprintLength: z.number().int().min(16).default(4096),

  queueCapacity: z.number().int().min(1).default(1024),

  // EMA rate for per-tier cost estimates
  budgetAdaptRate: z.number().gt(0).max(1).default(0.2),

  learning: learningConfigSchema.default({}),
});

export type EngineConfig = z.output<typeof engineConfigSchema>;
export type EngineConfigInput = z.input<typeof engineConfigSchema>;
export type LearningConfig = z.output<typeof learningConfigSchema>;
export type TierLearningPolicy = LearningConfig["tiers"]["ULTRA_CRITICAL"];
