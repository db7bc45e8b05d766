import { describe, it, expect } from "vitest";
import { configFromEnv, engineConfigSchema, resolveConfig } from "../../src/config/index.js";
import { ConfigError } from "../../src/errors.js";

describe("resolveConfig", () => {
  it("applies defaults", () => {
    const config = resolveConfig();

    expect(config.overallBudgetMs).toBe(15);
    expect(config.perTierBudgetMs).toEqual({
      ULTRA_CRITICAL: 1,
      CRITICAL_FAST: 3,
      HIGH_NORMAL: 8,
      INFO: 3,
    });
    expect(config.maxCacheEntries).toBe(1000);
    expect(config.truncation).toBe("excerpt");
    expect(config.queueCapacity).toBe(1024);
    expect(config.learning.batchSize).toBe(32);
    expect(config.learning.tiers.ULTRA_CRITICAL).toEqual({
      learningRate: 0.001,
      minChange: 0.02,
      floor: 0.8,
    });
    expect(config.learning.tiers.INFO.floor).toBe(0);
  });

  it("keeps defaults for tiers that are not overridden", () => {
    const config = resolveConfig({ perTierBudgetMs: { HIGH_NORMAL: 20 } });

    expect(config.perTierBudgetMs.HIGH_NORMAL).toBe(20);
    expect(config.perTierBudgetMs.CRITICAL_FAST).toBe(3);
  });

  it("reports every invalid field", () => {
    try {
      resolveConfig({ overallBudgetMs: -1, maxCacheEntries: 0 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.code).toBe("CONFIG_INVALID");
        expect(error.issues).toEqual([
          "overallBudgetMs: Number must be greater than 0",
          "maxCacheEntries: Number must be greater than or equal to 1",
        ]);
      }
    }
  });

  it("rejects an unknown truncation strategy", () => {
    expect(engineConfigSchema.safeParse({ truncation: "middle" }).success).toBe(false);
  });
});

describe("configFromEnv", () => {
  it("reads TIERGATE_* variables", () => {
    expect(
      configFromEnv({
        TIERGATE_OVERALL_BUDGET_MS: "25",
        TIERGATE_MAX_CACHE_ENTRIES: "50",
        TIERGATE_QUEUE_CAPACITY: "16",
        TIERGATE_TRUNCATION: "head",
      }),
    ).toEqual({
      overallBudgetMs: 25,
      maxCacheEntries: 50,
      queueCapacity: 16,
      truncation: "head",
    });
  });

  it("ignores unset, blank and unknown values", () => {
    expect(
      configFromEnv({ TIERGATE_MAX_INPUT_LENGTH: " ", TIERGATE_TRUNCATION: "middle" }),
    ).toEqual({});
  });

  it("leaves non-numeric values for validation to reject", () => {
    const input = configFromEnv({ TIERGATE_OVERALL_BUDGET_MS: "fast" });
    expect(() => resolveConfig(input)).toThrow(ConfigError);
  });
});
