// Aggregator - robustness statistics per dataset x perturbation cell
import { bleu, rougeL, tokenize } from "./scoring";
import {
  AnswerConsistency,
  DATASET_NAMES,
  DatasetName,
  EvaluationResult,
  PERTURBATION_TYPES,
  PerturbationType,
  RobustnessCell,
  RobustnessCounts,
  RobustnessReport,
} from "~~/types/benchmark";

type Counter = { total: number; scored: number; correct: number; failed: number };

function emptyCounter(): Counter {
  return { total: 0, scored: 0, correct: 0, failed: 0 };
}

function addResult(counter: Counter, result: EvaluationResult): void {
  counter.total++;
  if (result.status === "FAILED") {
    counter.failed++;
    return;
  }
  counter.scored++;
  if (result.isCorrect) counter.correct++;
}

/** FAILED tuples count towards the failure rate, never towards accuracy */
function toCounts(counter: Counter): RobustnessCounts {
  return {
    ...counter,
    accuracy: counter.scored > 0 ? counter.correct / counter.scored : null,
    failureRate: counter.total > 0 ? counter.failed / counter.total : null,
  };
}

/** Identifies a tuple apart from its perturbation */
function pairKey(result: EvaluationResult): string {
  const { datasetName, recordId, preproc, inproc, postproc, temperature } = result.tuple;
  return [datasetName, recordId, preproc, inproc, postproc, temperature].join("|");
}

/**
 * Compare each scored answer of a perturbed cell with the scored `none`
 * answer for the same record. Pairs are summed in record order so the
 * result does not depend on input order.
 */
function consistencyOf(
  results: readonly EvaluationResult[],
  controls: Map<string, EvaluationResult>,
): AnswerConsistency | null {
  const pairs = results
    .flatMap(result => {
      const control = controls.get(pairKey(result));
      return result.status === "SCORED" && control ? [{ key: pairKey(result), result, control }] : [];
    })
    .sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
  if (pairs.length === 0) return null;

  let rougeSum = 0;
  let bleuSum = 0;
  for (const { result, control } of pairs) {
    const answer = tokenize(result.processedAnswer);
    const controlAnswer = tokenize(control.processedAnswer);
    rougeSum += rougeL(answer, controlAnswer);
    bleuSum += bleu(answer, controlAnswer);
  }
  return { rougeL: rougeSum / pairs.length, bleu: bleuSum / pairs.length, pairs: pairs.length };
}

/**
 * Aggregate evaluation results into a Robustness Report. Pure: rows are
 * emitted in dataset then perturbation order regardless of input order.
 */
export function aggregate(results: readonly EvaluationResult[]): RobustnessReport {
  const cellCounters = new Map<string, Counter>();
  const cellResults = new Map<string, EvaluationResult[]>();
  const controls = new Map<string, EvaluationResult>();
  const datasetCounters = new Map<DatasetName, Counter>();
  const perturbationCounters = new Map<PerturbationType, Counter>();
  const overall = emptyCounter();

  const counterFor = <K>(map: Map<K, Counter>, key: K): Counter => {
    let counter = map.get(key);
    if (!counter) {
      counter = emptyCounter();
      map.set(key, counter);
    }
    return counter;
  };

  for (const result of results) {
    const { datasetName, perturbationType } = result.tuple;
    const cellKey = `${datasetName}|${perturbationType}`;
    const inCell = cellResults.get(cellKey);
    if (inCell) inCell.push(result);
    else cellResults.set(cellKey, [result]);
    if (perturbationType === "none" && result.status === "SCORED") controls.set(pairKey(result), result);
    addResult(counterFor(cellCounters, cellKey), result);
    addResult(counterFor(datasetCounters, datasetName), result);
    addResult(counterFor(perturbationCounters, perturbationType), result);
    addResult(overall, result);
  }

  const cells: RobustnessCell[] = [];
  for (const datasetName of DATASET_NAMES) {
    const control = cellCounters.get(`${datasetName}|none`);
    const controlAccuracy = control ? toCounts(control).accuracy : null;

    for (const perturbationType of PERTURBATION_TYPES) {
      const counter = cellCounters.get(`${datasetName}|${perturbationType}`);
      if (!counter) continue;

      const counts = toCounts(counter);
      cells.push({
        datasetName,
        perturbationType,
        ...counts,
        deltaVsControl:
          counts.accuracy !== null && controlAccuracy !== null ? counts.accuracy - controlAccuracy : null,
        consistency:
          perturbationType === "none"
            ? null
            : consistencyOf(cellResults.get(`${datasetName}|${perturbationType}`) ?? [], controls),
      });
    }
  }

  return {
    cells,
    datasets: DATASET_NAMES.flatMap(datasetName => {
      const counter = datasetCounters.get(datasetName);
      return counter ? [{ datasetName, ...toCounts(counter) }] : [];
    }),
    perturbations: PERTURBATION_TYPES.flatMap(perturbationType => {
      const counter = perturbationCounters.get(perturbationType);
      return counter ? [{ perturbationType, ...toCounts(counter) }] : [];
    }),
    overall: toCounts(overall),
  };
}
