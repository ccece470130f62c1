import { EvaluationRunConfigSchema, EvaluationRunInput } from "../config";
import { openResultLedger, rowToResult } from "../ledger";
import { saveReport } from "../report";
import { runEvaluation } from "../runner";
import * as fs from "fs";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { Responder, createTestClient, httpError, makeTempDir, removeDir } from "~~/test/fakes";

const PERTURBED_CSV = [
  "id,dataset,question,answer,typo",
  "1,squad2,Why did the bridge collapse?,metal fatigue,Why did the bridGe colapse?",
  "2,eli5,Why do cats purr?,contentment,Why do cats prur?",
  "",
].join("\n");

const answerAll: Responder = request =>
  /bridge/i.test(request.prompt) ? "It was metal fatigue." : "They are hungry.";

const refuseNone: Responder = () => {
  throw new Error("no request expected");
};

describe("runEvaluation", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
    fs.writeFileSync(path.join(dir, "perturbed.csv"), PERTURBED_CSV, "utf-8");
  });

  afterEach(() => {
    removeDir(dir);
  });

  const run = (respond: Responder, overrides: Partial<EvaluationRunInput> = {}) => {
    const config = EvaluationRunConfigSchema.parse({
      perturbedPath: path.join(dir, "perturbed.csv"),
      ledgerPath: path.join(dir, "results.csv"),
      modelId: "test-model",
      perturbations: ["typo"],
      ...overrides,
    });
    const { client, transport } = createTestClient(respond);
    const report = runEvaluation(config, { client, log: () => {}, gitCommit: null });
    return { report, transport };
  };

  it("evaluates every tuple and aggregates the results", async () => {
    const report = await run(answerAll).report;

    expect(report.tuples).toEqual({ total: 4, evaluated: 4, reused: 0, missing: 0 });
    expect(report.gitCommit).toBeUndefined();
    expect(report.robustness.overall).toMatchObject({ total: 4, scored: 4, correct: 2, accuracy: 0.5 });
    expect(report.robustness.datasets.map(d => [d.datasetName, d.accuracy])).toEqual([
      ["eli5", 0],
      ["squad2", 1],
    ]);
    expect(report.usage.requests).toBe(4);
    expect(report.failures).toEqual([]);
  });

  it("resumes from the ledger without repeating requests", async () => {
    const first = await run(answerAll).report;

    const second = run(refuseNone);
    const resumed = await second.report;

    expect(second.transport.requests).toHaveLength(0);
    expect(resumed.tuples).toEqual({ total: 4, evaluated: 0, reused: 4, missing: 0 });
    expect(JSON.stringify(resumed.robustness)).toBe(JSON.stringify(first.robustness));
  });

  it("keeps failed tuples until asked to retry them", async () => {
    const flaky: Responder = (request, index) => {
      if (request.prompt.includes("prur")) throw httpError(503);
      return answerAll(request, index);
    };

    const first = await run(flaky).report;
    expect(first.failures).toEqual([
      {
        key: "test-model|2|typo|none|none|none|0|0|3",
        perturbationType: "typo",
        state: "PREPROCESSED",
        kind: "Exhausted",
        message: "Failed after 3 attempts: HTTP 503",
      },
    ]);
    expect(first.robustness.overall).toMatchObject({ total: 4, scored: 3, failed: 1 });

    const kept = await run(refuseNone).report;
    expect(kept.tuples.reused).toBe(4);
    expect(kept.failures).toHaveLength(1);

    const retried = await run(answerAll, { retryFailed: true }).report;
    expect(retried.tuples).toEqual({ total: 4, evaluated: 1, reused: 3, missing: 0 });
    expect(retried.failures).toEqual([]);
  });

  it("does not reuse another model's results", async () => {
    await run(answerAll).report;

    const other = run(() => "No idea.", { modelId: "other-model" });
    const report = await other.report;

    expect(other.transport.requests).toHaveLength(4);
    expect(report.tuples).toEqual({ total: 4, evaluated: 4, reused: 0, missing: 0 });
    expect(report.robustness.overall.accuracy).toBe(0);

    const back = await run(refuseNone).report;
    expect(back.tuples.reused).toBe(4);
    expect(back.robustness.overall.accuracy).toBe(0.5);
    expect(openResultLedger(path.join(dir, "results.csv")).size).toBe(8);
  });

  it("re-evaluates when the self-consistency sample count changes", async () => {
    await run(answerAll).report;

    const resampled = run(answerAll, { selfConsistencySamples: 5 });
    const report = await resampled.report;

    expect(report.tuples.evaluated).toBe(4);
  });

  it("re-scores reused answers against the current threshold", async () => {
    const partial: Responder = request => (/bridge/i.test(request.prompt) ? "metal stress" : "They are hungry.");
    const lenient = await run(partial).report;
    expect(lenient.robustness.datasets.map(d => [d.datasetName, d.accuracy])).toEqual([
      ["eli5", 0],
      ["squad2", 1],
    ]);

    const strict = await run(refuseNone, { correctnessThreshold: 0.6 }).report;
    expect(strict.tuples.reused).toBe(4);
    expect(strict.robustness.datasets.map(d => [d.datasetName, d.accuracy])).toEqual([
      ["eli5", 0],
      ["squad2", 0],
    ]);
  });

  it("writes one ledger row per tuple", async () => {
    await run(answerAll).report;

    const ledger = openResultLedger(path.join(dir, "results.csv"));
    expect(ledger.size).toBe(4);

    const stored = ledger.get("test-model|1|typo|none|none|none|0|0|3");
    expect(stored).toBeDefined();
    if (!stored) return;
    expect(stored.model).toBe("test-model");
    const result = rowToResult(stored);
    expect(result.tuple.question).toBe("Why did the bridGe colapse?");
    expect(result.processedAnswer).toBe("It was metal fatigue.");
    expect(result.isCorrect).toBe(true);
  });

  it("counts selected variants missing from the table", async () => {
    const report = await run(answerAll, { perturbations: ["typo", "bias"] }).report;

    expect(report.tuples.missing).toBe(2);
    expect(report.tuples.total).toBe(4);
  });

  it("saves the report as JSON", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const report = await run(answerAll).report;
    const outputPath = path.join(dir, "report.json");

    await saveReport(report, outputPath);

    expect(JSON.parse(fs.readFileSync(outputPath, "utf-8"))).toEqual(JSON.parse(JSON.stringify(report)));
    vi.restoreAllMocks();
  });
});
