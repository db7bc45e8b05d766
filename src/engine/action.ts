/**
 * Maps a verdict to what a host should do with the input.
 *
 * An active ULTRA_CRITICAL match blocks even when the verdict is degraded,
 * since that tier is always evaluated in full.
 */

import type { Verdict } from "./types.js";

export type HostAction = "block" | "warn" | "notice" | "pass";

export interface ActionPolicy {
  /** Action for a degraded verdict without active matches (default "warn") */
  inconclusive?: "pass" | "warn";
}

export function resolveAction(verdict: Verdict, policy: ActionPolicy = {}): HostAction {
  switch (verdict.severity) {
    case "ULTRA_CRITICAL":
      return "block";
    case "CRITICAL_FAST":
    case "HIGH_NORMAL":
      return "warn";
    case "INFO":
      return "notice";
    case "NONE":
      return verdict.degraded ? (policy.inconclusive ?? "warn") : "pass";
  }
}
