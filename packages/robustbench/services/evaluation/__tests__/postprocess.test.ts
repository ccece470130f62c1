import { majorityAnswer, pickListItem, splitListItems, truncateWords } from "../postprocess";
import { describe, expect, it } from "vitest";

describe("splitListItems", () => {
  it("splits numbered and bulleted lines", () => {
    expect(splitListItems("1. Paris\n2) Lyon\n- Nice")).toEqual(["Paris", "Lyon", "Nice"]);
  });

  it("splits inline separators", () => {
    expect(splitListItems("Paris, Lyon; Nice")).toEqual(["Paris", "Lyon", "Nice"]);
  });
});

describe("pickListItem", () => {
  it("picks the requested item", () => {
    expect(pickListItem("Metal fatigue, corrosion", 0)).toBe("Metal fatigue");
    expect(pickListItem("Metal fatigue, corrosion", 1)).toBe("corrosion");
  });

  it("falls back to the first item when the list is short", () => {
    expect(pickListItem("Paris", 1)).toBe("Paris");
  });

  it("returns an empty answer for blank text", () => {
    expect(pickListItem("  ", 0)).toBe("");
  });
});

describe("truncateWords", () => {
  it("keeps the first words", () => {
    expect(truncateWords("one two three four", 2)).toBe("one two");
  });

  it("leaves short answers intact", () => {
    expect(truncateWords(" one two ", 5)).toBe("one two");
  });
});

describe("majorityAnswer", () => {
  it("returns the first sample of the majority form", () => {
    expect(majorityAnswer(["Paris.", "Lyon", "paris"])).toBe("Paris.");
  });

  it("requires a strict majority", () => {
    expect(majorityAnswer(["Paris", "Lyon"])).toBeNull();
    expect(majorityAnswer(["Paris", "Lyon", "Nice"])).toBeNull();
  });

  it("ignores blank samples", () => {
    expect(majorityAnswer(["", " ", "Paris"])).toBeNull();
  });
});
