import { applyTypos, typoOperationCount } from "../typo";
import { describe, expect, it } from "vitest";
import { INTENSITIES } from "~~/types/benchmark";

const QUESTION = "Why does drinking coffee late in the afternoon make it harder to fall asleep?";

describe("typoOperationCount", () => {
  it("scales with the number of words and never drops below one", () => {
    expect(typoOperationCount("one two three", 25)).toBe(1);
    expect(typoOperationCount("one two three four", 50)).toBe(2);
    expect(typoOperationCount("one two three four", 100)).toBe(4);
    expect(typoOperationCount("one two three four", 0)).toBe(0);
  });
});

describe("applyTypos", () => {
  it("returns the input unchanged at intensity 0", () => {
    expect(applyTypos(QUESTION, 0)).toEqual({ text: QUESTION, operations: [] });
  });

  it("returns empty and blank input unchanged", () => {
    expect(applyTypos("", 50)).toEqual({ text: "", operations: [] });
    expect(applyTypos("   ", 100)).toEqual({ text: "   ", operations: [] });
  });

  it("applies one operation per intensity share of the words", () => {
    const result = applyTypos("Why did the bridge collapse?", 50);

    expect(result.operations).toHaveLength(2);
    expect(result.text).not.toBe("Why did the bridge collapse?");
  });

  it("is deterministic for a seed", () => {
    expect(applyTypos(QUESTION, 75, { seed: 7 })).toEqual(applyTypos(QUESTION, 75, { seed: 7 }));
    expect(applyTypos(QUESTION, 75)).toEqual(applyTypos(QUESTION, 75));
  });

  it("applies a superset of the lower intensity's operations at a higher intensity", () => {
    const results = INTENSITIES.map(intensity => applyTypos(QUESTION, intensity, { seed: 42 }));

    for (let i = 1; i < results.length; i++) {
      const lower = results[i - 1].operations;
      const higher = results[i].operations;
      expect(higher.length).toBeGreaterThanOrEqual(lower.length);
      expect(higher.slice(0, lower.length)).toEqual(lower);
    }
    expect(results.map(result => result.operations.length)).toEqual(
      INTENSITIES.map(intensity => typoOperationCount(QUESTION, intensity)),
    );
  });
});
