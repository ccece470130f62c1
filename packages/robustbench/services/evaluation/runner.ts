// Evaluation Runner - builds the tuples of a run and evaluates what the ledger lacks
//
// For each tuple, in submission order:
// 1. Reuse its ledger row when one exists for the same model, seed and sample count,
//    re-scoring the stored answer against the current threshold
// 2. Otherwise evaluate it with the harness
// 3. Append the result to the ledger and persist the ledger
// Finally every ledger result of the run's tuples is aggregated.
import { aggregate } from "./aggregator";
import { EvaluationRunConfig } from "./config";
import { EvaluationHarness } from "./harness";
import { LedgerSettings, openResultLedger, resultKey, resultToRow, rowToResult } from "./ledger";
import { scoreAnswer } from "./scoring";
import { buildTuples } from "./tuples";
import { EvaluationRunReport, FailedTuple } from "./types";
import { loadPerturbedRecords } from "~~/services/dataset";
import { RequestClient } from "~~/services/llm";
import { EvaluationResult } from "~~/types/benchmark";

export type EvaluationRunDeps = {
  client: RequestClient;
  log?: (message: string) => void;
  /** Commit recorded on the report; looked up with git when unset */
  gitCommit?: string | null;
};

async function readGitCommit(): Promise<string | undefined> {
  try {
    const { execSync } = await import("child_process");
    return execSync("git rev-parse --short HEAD", { encoding: "utf-8", stdio: ["ignore", "pipe", "ignore"] }).trim();
  } catch {
    // Not in a git repo or git not available
    return undefined;
  }
}

/** Score a stored answer again, so a changed correctness threshold applies to reused rows */
function rescore(result: EvaluationResult, threshold: number): EvaluationResult {
  if (result.status !== "SCORED") return result;
  const { isCorrect, rougeL, bleu } = scoreAnswer(result.processedAnswer, result.tuple.referenceAnswer, threshold);
  const rescored: EvaluationResult = { ...result, isCorrect, scores: { rougeL, bleu } };
  return Object.freeze(rescored);
}

/**
 * Run the evaluation described by `config`.
 */
export async function runEvaluation(config: EvaluationRunConfig, deps: EvaluationRunDeps): Promise<EvaluationRunReport> {
  const log = deps.log ?? (message => console.log(message));

  const records = loadPerturbedRecords(config.perturbedPath);
  const { tuples, missing } = buildTuples(records, config);
  const ledger = openResultLedger(config.ledgerPath);
  const settings: LedgerSettings = {
    modelId: config.modelId,
    seed: config.seed,
    selfConsistencySamples: config.selfConsistencySamples,
  };
  const harness = new EvaluationHarness({
    client: deps.client,
    modelId: config.modelId,
    correctnessThreshold: config.correctnessThreshold,
    selfConsistencySamples: config.selfConsistencySamples,
    seed: config.seed,
  });

  log(`\nRunning evaluation on ${tuples.length} tuples...`);
  log(`  Strategy: preproc=${config.preproc} inproc=${config.inproc} postproc=${config.postproc} T=${config.temperature}`);
  if (missing.length > 0) log(`  ${missing.length} selected variants are missing from the perturbed table`);
  log("");

  const results: EvaluationResult[] = [];
  let evaluated = 0;
  let reused = 0;

  for (let i = 0; i < tuples.length; i++) {
    const tuple = tuples[i];
    const stored = ledger.get(resultKey(tuple, settings));

    if (stored) {
      const previous = rowToResult(stored);
      if (previous.status === "SCORED" || !config.retryFailed) {
        results.push(rescore(previous, config.correctnessThreshold));
        reused++;
        continue;
      }
    }

    log(`[${i + 1}/${tuples.length}] ${tuple.recordId} ${tuple.perturbationType}: ${tuple.question.slice(0, 60)}`);

    const result = await harness.evaluate(tuple);
    results.push(result);
    evaluated++;

    ledger.upsert(resultToRow(result, settings));
    ledger.save();

    if (result.status === "SCORED") {
      log(`  ${result.isCorrect ? "CORRECT" : "WRONG"} (${result.latencyMs}ms, ${result.callsUsed} calls)`);
    } else {
      log(`  FAILED at ${result.failure?.state}: ${result.failure?.kind} ${result.failure?.message}`);
    }
  }

  const failures: FailedTuple[] = results.flatMap(result =>
    result.failure
      ? [{ key: resultKey(result.tuple, settings), perturbationType: result.tuple.perturbationType, ...result.failure }]
      : [],
  );

  return {
    timestamp: new Date().toISOString(),
    gitCommit: deps.gitCommit === undefined ? await readGitCommit() : (deps.gitCommit ?? undefined),
    config,
    tuples: { total: tuples.length, evaluated, reused, missing: missing.length },
    usage: deps.client.usage.snapshot(),
    robustness: aggregate(results),
    failures,
  };
}
