/**
 * Tiergate: Background Weight Adjuster
 *
 * @module
 */

export type {
  LearningSample,
  AdjustmentReport,
  AdjusterStats,
} from "./types.js";

export { BoundedQueue } from "./queue.js";
export { WeightAdjuster, type WeightAdjusterOptions } from "./adjuster.js";
