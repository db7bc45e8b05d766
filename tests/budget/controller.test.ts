/**
 * Tier Budget Controller Tests
 */

import { describe, it, expect, beforeEach } from "vitest";
import { TierBudgetController } from "../../src/budget/controller.js";
import type { TierBudget } from "../../src/budget/types.js";

const budget: TierBudget = {
  overallMs: 10,
  perTierMs: {
    ULTRA_CRITICAL: 1,
    CRITICAL_FAST: 3,
    HIGH_NORMAL: 8,
    INFO: 3,
  },
};

describe("TierBudgetController", () => {
  let now: number;
  let controller: TierBudgetController;

  beforeEach(() => {
    now = 0;
    controller = new TierBudgetController(budget, { clock: () => now });
  });

  it("starts estimates at the tier ceilings", () => {
    expect(controller.estimate("HIGH_NORMAL")).toBe(8);
    expect(controller.ceiling("INFO")).toBe(3);
  });

  it("moves estimates toward measured time", () => {
    controller.record("CRITICAL_FAST", 1);
    // 3 + 0.2 * (1 - 3)
    expect(controller.estimate("CRITICAL_FAST")).toBeCloseTo(2.6);
  });

  it("never raises an estimate above the ceiling", () => {
    controller.record("INFO", 50);
    expect(controller.estimate("INFO")).toBe(3);
  });

  it("ignores invalid measurements", () => {
    controller.record("INFO", Number.NaN);
    controller.record("INFO", -1);
    expect(controller.estimate("INFO")).toBe(3);
  });

  it("reset restores the ceilings", () => {
    controller.record("HIGH_NORMAL", 0);
    controller.reset();
    expect(controller.estimate("HIGH_NORMAL")).toBe(8);
  });

  it("returns a copy of the budget", () => {
    const copy = controller.budget;
    copy.perTierMs.INFO = 100;
    expect(controller.ceiling("INFO")).toBe(3);
  });
});

describe("BudgetRun", () => {
  let now: number;
  let controller: TierBudgetController;

  beforeEach(() => {
    now = 0;
    controller = new TierBudgetController(budget, { clock: () => now });
  });

  it("allows tiers whose estimate fits the remaining time", () => {
    const run = controller.begin();
    expect(run.allow("CRITICAL_FAST")).toBe(true);
    now = 2;
    run.finish("CRITICAL_FAST");
    expect(run.allow("HIGH_NORMAL")).toBe(true);
    expect(run.exhausted).toBe(false);
  });

  it("refuses a tier that no longer fits", () => {
    const run = controller.begin();
    now = 4;
    // 6ms left, HIGH_NORMAL estimate is 8ms
    expect(run.allow("HIGH_NORMAL")).toBe(false);
    expect(run.exhausted).toBe(true);
    expect(run.allow("INFO")).toBe(true);
  });

  it("records the mandatory tier running past its ceiling", () => {
    const run = controller.begin();
    expect(run.allow("ULTRA_CRITICAL")).toBe(true);
    now = 1;
    run.finish("ULTRA_CRITICAL");
    expect(run.overrunTier).toBeNull();

    expect(run.allow("ULTRA_CRITICAL")).toBe(true);
    now = 3;
    run.finish("ULTRA_CRITICAL");
    expect(run.overrunTier).toBe("ULTRA_CRITICAL");
  });

  it("refuses every optional tier once the deadline passed", () => {
    const run = controller.begin();
    now = 10;
    expect(run.allow("INFO")).toBe(false);
  });

  it("always allows the mandatory tier", () => {
    const run = controller.begin(0.5);
    now = 100;
    expect(run.allow("ULTRA_CRITICAL")).toBe(true);
    expect(run.expired()).toBe(false);
  });

  it("cuts a tier once its allowance is spent", () => {
    const run = controller.begin();
    run.allow("CRITICAL_FAST");
    now = 3;
    expect(run.expired()).toBe(false);
    now = 3.5;
    expect(run.expired()).toBe(true);
  });

  it("caps the allowance by what is left overall", () => {
    const run = controller.begin();
    now = 8;
    controller.record("INFO", 0);
    // estimate 2.4 exceeds the 2ms left
    expect(run.allow("INFO")).toBe(false);

    controller.record("INFO", 0);
    // estimate 1.92 fits; the allowance ends at the overall deadline, not at 11
    expect(run.allow("INFO")).toBe(true);
    now = 10.5;
    expect(run.expired()).toBe(true);
  });

  it("records the measured tier time on finish", () => {
    const run = controller.begin();
    run.allow("HIGH_NORMAL");
    now = 3;
    expect(run.finish("HIGH_NORMAL")).toBe(3);
    // 8 + 0.2 * (3 - 8)
    expect(controller.estimate("HIGH_NORMAL")).toBeCloseTo(7);
  });

  it("reports elapsed time and overrun", () => {
    const run = controller.begin();
    now = 7;
    expect(run.elapsed()).toBe(7);
    expect(run.overrun()).toBe(false);
    now = 11;
    expect(run.overrun()).toBe(true);
  });
});
