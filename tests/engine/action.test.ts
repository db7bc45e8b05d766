import { describe, it, expect } from "vitest";
import { resolveAction } from "../../src/engine/action.js";
import { makeMatch, makeVerdict } from "../helpers.js";

describe("resolveAction", () => {
  it("blocks ULTRA_CRITICAL", () => {
    const verdict = makeVerdict({
      severity: "ULTRA_CRITICAL",
      matches: [makeMatch({ tier: "ULTRA_CRITICAL", key: "ULTRA_CRITICAL/aws-key" })],
    });
    expect(resolveAction(verdict)).toBe("block");
  });

  it("blocks ULTRA_CRITICAL even when degraded", () => {
    expect(resolveAction(makeVerdict({ severity: "ULTRA_CRITICAL", degraded: true }))).toBe("block");
  });

  it("warns on CRITICAL_FAST and HIGH_NORMAL", () => {
    expect(resolveAction(makeVerdict({ severity: "CRITICAL_FAST" }))).toBe("warn");
    expect(resolveAction(makeVerdict({ severity: "HIGH_NORMAL" }))).toBe("warn");
  });

  it("gives notice on INFO", () => {
    expect(resolveAction(makeVerdict({ severity: "INFO" }))).toBe("notice");
  });

  it("passes a complete clean verdict", () => {
    expect(resolveAction(makeVerdict())).toBe("pass");
  });

  it("applies the inconclusive policy to a degraded clean verdict", () => {
    const verdict = makeVerdict({ degraded: true });
    expect(resolveAction(verdict)).toBe("warn");
    expect(resolveAction(verdict, { inconclusive: "pass" })).toBe("pass");
  });
});
