import { aggregate } from "../aggregator";
import { renderLatexTable } from "../report";
import { describe, expect, it } from "vitest";
import { DatasetName, EvaluationResult, PerturbationType } from "~~/types/benchmark";

type Outcome = "correct" | "wrong" | "failed";

function makeResult(
  id: string,
  datasetName: DatasetName,
  perturbationType: PerturbationType,
  outcome: Outcome,
  answer = "",
) {
  const result: EvaluationResult = {
    tuple: {
      recordId: id,
      perturbationType,
      datasetName,
      preproc: "none",
      inproc: "none",
      postproc: "none",
      temperature: 0,
      question: "Why?",
      referenceAnswer: "because",
    },
    status: outcome === "failed" ? "FAILED" : "SCORED",
    rawResponse: "",
    processedAnswer: answer,
    isCorrect: outcome === "correct",
    latencyMs: 0,
    retriesUsed: 0,
    callsUsed: 1,
    scores: outcome === "failed" ? null : { rougeL: 0, bleu: 0 },
    ...(outcome === "failed" ? { failure: { state: "PREPROCESSED" as const, kind: "Exhausted", message: "down" } } : {}),
  };
  return result;
}

const RESULTS: EvaluationResult[] = [
  makeResult("1", "squad2", "none", "correct"),
  makeResult("2", "squad2", "none", "correct"),
  makeResult("3", "squad2", "none", "correct"),
  makeResult("4", "squad2", "none", "wrong"),
  makeResult("1", "squad2", "typo", "correct"),
  makeResult("2", "squad2", "typo", "wrong"),
  makeResult("3", "squad2", "typo", "failed"),
  makeResult("4", "squad2", "typo", "failed"),
  makeResult("5", "eli5", "typo", "correct"),
  makeResult("5", "eli5", "none", "wrong"),
];

describe("aggregate", () => {
  it("leaves failed tuples out of accuracy", () => {
    const { overall } = aggregate(RESULTS);

    expect(overall).toEqual({ total: 10, scored: 8, correct: 5, failed: 2, accuracy: 5 / 8, failureRate: 0.2 });
  });

  it("orders cells by dataset then perturbation with deltas against the control", () => {
    const { cells } = aggregate(RESULTS);

    expect(cells.map(c => `${c.datasetName}:${c.perturbationType}`)).toEqual([
      "eli5:none",
      "eli5:typo",
      "squad2:none",
      "squad2:typo",
    ]);
    const squadTypo = cells[3];
    expect(squadTypo.accuracy).toBe(0.5);
    expect(squadTypo.failureRate).toBe(0.5);
    expect(squadTypo.deltaVsControl).toBeCloseTo(-0.25);
    expect(cells[1].deltaVsControl).toBe(1);
    expect(cells[2].deltaVsControl).toBe(0);
  });

  it("reports N/A accuracy for a cell where every tuple failed", () => {
    const { cells } = aggregate([
      makeResult("1", "gooaq", "none", "correct"),
      makeResult("1", "gooaq", "bias", "failed"),
    ]);

    expect(cells[1]).toMatchObject({ perturbationType: "bias", accuracy: null, failureRate: 1, deltaVsControl: null });
  });

  it("does not depend on input order", () => {
    const forward = JSON.stringify(aggregate(RESULTS));
    const reversed = JSON.stringify(aggregate([...RESULTS].reverse()));

    expect(reversed).toBe(forward);
  });

  it("measures how close perturbed answers stay to the unperturbed ones", () => {
    const { cells } = aggregate([
      makeResult("1", "squad2", "none", "correct", "The bridge collapsed"),
      makeResult("2", "squad2", "none", "correct", "heavy rain"),
      makeResult("3", "squad2", "none", "correct", "a fire"),
      makeResult("1", "squad2", "typo", "correct", "the bridge collapsed."),
      makeResult("2", "squad2", "typo", "wrong", "dry weather"),
      makeResult("3", "squad2", "typo", "failed"),
      makeResult("4", "squad2", "typo", "correct", "a flood"),
    ]);

    expect(cells.map(c => c.perturbationType)).toEqual(["none", "typo"]);
    expect(cells[0].consistency).toBeNull();
    expect(cells[1].consistency?.pairs).toBe(2);
    expect(cells[1].consistency?.rougeL).toBeCloseTo(0.5);
    expect(cells[1].consistency?.bleu).toBeCloseTo(0.5);
  });

  it("has no consistency for a cell without an unperturbed counterpart", () => {
    const { cells } = aggregate([
      makeResult("1", "gooaq", "none", "failed"),
      makeResult("1", "gooaq", "bias", "correct", "because"),
    ]);

    expect(cells[1]).toMatchObject({ perturbationType: "bias", consistency: null });
  });

  it("summarises datasets and perturbations", () => {
    const report = aggregate(RESULTS);

    expect(report.datasets.map(d => [d.datasetName, d.accuracy])).toEqual([
      ["eli5", 0.5],
      ["squad2", 4 / 6],
    ]);
    expect(report.perturbations.map(p => [p.perturbationType, p.total, p.failed])).toEqual([
      ["none", 5, 0],
      ["typo", 5, 2],
    ]);
  });
});

describe("renderLatexTable", () => {
  it("lays out accuracy per dataset and perturbation", () => {
    const table = renderLatexTable(aggregate(RESULTS));

    expect(table).toBe(
      [
        "\\begin{tabular}{lrrr}",
        "\\hline",
        "Dataset & none & typo & overall \\\\",
        "\\hline",
        "eli5 & 0.0 & 100.0 & 50.0 \\\\",
        "squad2 & 75.0 & 50.0 & 66.7 \\\\",
        "\\hline",
        "overall & 60.0 & 66.7 & 62.5 \\\\",
        "\\hline",
        "\\end{tabular}",
        "",
      ].join("\n"),
    );
  });

  it("prints N/A for cells without a scored tuple", () => {
    const table = renderLatexTable(
      aggregate([makeResult("1", "gooaq", "none", "correct"), makeResult("1", "gooaq", "bias", "failed")]),
    );

    expect(table).toContain("gooaq & 100.0 & N/A & 100.0 \\\\");
    expect(table).toContain("overall & 100.0 & N/A & 100.0 \\\\");
  });
});
