import { describe, it, expect } from "vitest";
import { prepareInput } from "../../src/engine/excerpt.js";

describe("prepareInput", () => {
  it("leaves inputs within the limit alone", () => {
    expect(prepareInput("short", 64, "excerpt")).toEqual({ text: "short", truncated: false });
  });

  it("keeps the head with the head strategy", () => {
    const text = "a".repeat(70);
    expect(prepareInput(text, 64, "head")).toEqual({ text: "a".repeat(64), truncated: true });
  });

  it("keeps head and tail with the excerpt strategy", () => {
    const text = `${"h".repeat(150)}${"t".repeat(50)}`;
    const { text: excerpt, truncated } = prepareInput(text, 100, "excerpt");

    expect(truncated).toBe(true);
    expect(excerpt).toBe(`${"h".repeat(50)}\n${"t".repeat(20)}`);
  });

  it("adds windows around risk keywords in the middle", () => {
    const text = `${"a".repeat(500)}sudo${"b".repeat(500)}`;
    const { text: excerpt } = prepareInput(text, 400, "excerpt");

    expect(excerpt).toBe(
      `${"a".repeat(200)}\n${"a".repeat(50)}sudo${"b".repeat(50)}\n${"b".repeat(80)}`,
    );
  });

  it("never exceeds the limit", () => {
    const text = `${"x".repeat(100)}password token secret${"y".repeat(100)}`;
    const { text: excerpt } = prepareInput(text, 64, "excerpt");

    expect(excerpt.length).toBeLessThanOrEqual(64);
  });
});
