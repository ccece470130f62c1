import { createRandom, hashString, pickOne, sampleWithoutReplacement } from "../random";
import { describe, expect, it } from "vitest";

describe("createRandom", () => {
  it("repeats the same sequence for the same seed", () => {
    const a = createRandom(7);
    const b = createRandom(7);
    const first = [a(), a(), a()];

    expect([b(), b(), b()]).toEqual(first);
    for (const value of first) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });
});

describe("hashString", () => {
  it("starts from the FNV offset basis", () => {
    expect(hashString("")).toBe(0x811c9dc5);
    expect(hashString("bridge")).toBe(hashString("bridge"));
    expect(hashString("bridge")).not.toBe(hashString("bridGe"));
  });
});

describe("pickOne", () => {
  it("rejects an empty list", () => {
    expect(() => pickOne([], createRandom(1))).toThrow("Cannot pick from an empty list");
  });
});

describe("sampleWithoutReplacement", () => {
  it("keeps the original order of the picked items", () => {
    const items = ["a", "b", "c", "d", "e"];
    const picked = sampleWithoutReplacement(items, 3, createRandom(3));

    expect(picked).toHaveLength(3);
    expect(new Set(picked).size).toBe(3);
    expect([...picked].sort((x, y) => items.indexOf(x) - items.indexOf(y))).toEqual(picked);
  });

  it("caps the count at the list length", () => {
    expect(sampleWithoutReplacement(["a", "b"], 5, createRandom(3))).toEqual(["a", "b"]);
  });
});
