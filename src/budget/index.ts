/**
 * Tiergate: Tier Budget Controller
 *
 * @module
 */

export type { Clock, TierBudget, BudgetControllerOptions } from "./types.js";
export { TierBudgetController, BudgetRun } from "./controller.js";
