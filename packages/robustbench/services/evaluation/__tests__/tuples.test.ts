import { TupleSelection, TupleSource, buildTuples, compareIds, tupleKey } from "../tuples";
import { describe, expect, it } from "vitest";

const RECORDS: TupleSource[] = [
  {
    record: { id: "10", datasetName: "squad2", question: "Why did the bridge collapse?", answer: "metal fatigue" },
    variants: { typo: "Why did the bridGe colapse?", bias: "Surely the bridge collapsed from wind?" },
  },
  {
    record: { id: "2", datasetName: "squad2", question: "Why did the dam leak?", answer: "cracked concrete" },
    variants: { typo: "Why did the dma leak?" },
  },
  {
    record: { id: "3", datasetName: "eli5", question: "Why do cats purr?", answer: "contentment" },
    variants: { typo: "Why do cats prur?" },
  },
];

const SELECTION: TupleSelection = {
  datasets: ["squad2"],
  perturbations: ["typo"],
  preproc: "none",
  inproc: "cot",
  postproc: "none",
  temperature: 0,
};

describe("buildTuples", () => {
  it("always adds the control with the original question", () => {
    const { tuples } = buildTuples(RECORDS, SELECTION);

    expect(tuples.map(t => `${t.recordId}:${t.perturbationType}:${t.question}`)).toEqual([
      "2:none:Why did the dam leak?",
      "2:typo:Why did the dma leak?",
      "10:none:Why did the bridge collapse?",
      "10:typo:Why did the bridGe colapse?",
    ]);
    expect(tuples[0]).toMatchObject({ datasetName: "squad2", inproc: "cot", referenceAnswer: "cracked concrete" });
  });

  it("reports selected variants missing from the table", () => {
    const { tuples, missing } = buildTuples(RECORDS, { ...SELECTION, perturbations: ["bias", "none"] });

    expect(tuples.map(t => `${t.recordId}:${t.perturbationType}`)).toEqual(["2:none", "10:none", "10:bias"]);
    expect(missing).toEqual([{ recordId: "2", perturbationType: "bias" }]);
  });

  it("limits the records by id order", () => {
    const { tuples } = buildTuples(RECORDS, { ...SELECTION, datasets: ["squad2", "eli5"], questionLimit: 2 });

    expect(new Set(tuples.map(t => t.recordId))).toEqual(new Set(["2", "3"]));
  });
});

describe("tupleKey", () => {
  it("joins the identifying fields", () => {
    const [tuple] = buildTuples(RECORDS, SELECTION).tuples;
    expect(tupleKey(tuple)).toBe("2|none|none|cot|none|0");
  });
});

describe("compareIds", () => {
  it("orders numeric ids by value", () => {
    expect(["10", "2", "1"].sort(compareIds)).toEqual(["1", "2", "10"]);
  });
});
