// Result ledger - one CSV row per evaluated tuple, keyed by the tuple key
import { tupleKey } from "./tuples";
import { z } from "zod";
import { CsvTable, TableRow } from "~~/services/dataset";
import {
  DATASET_NAMES,
  EvaluationResult,
  EvaluationTuple,
  INPROCESSING_STRATEGIES,
  PERTURBATION_TYPES,
  POSTPROCESSING_STRATEGIES,
  PREPROCESSING_STRATEGIES,
} from "~~/types/benchmark";

export const RESULT_COLUMNS = [
  "key",
  "model",
  "seed",
  "samples",
  "id",
  "dataset",
  "perturbation",
  "preproc",
  "inproc",
  "postproc",
  "temperature",
  "question",
  "reference",
  "status",
  "raw_response",
  "processed_answer",
  "is_correct",
  "latency_ms",
  "retries_used",
  "calls_used",
  "rouge_l",
  "bleu",
  "failure_state",
  "failure_kind",
  "failure_message",
] as const;

const numeric = z.coerce.number().finite();

const ResultRowSchema = z.object({
  id: z.string().min(1),
  dataset: z.enum(DATASET_NAMES),
  perturbation: z.enum(PERTURBATION_TYPES),
  preproc: z.enum(PREPROCESSING_STRATEGIES),
  inproc: z.enum(INPROCESSING_STRATEGIES),
  postproc: z.enum(POSTPROCESSING_STRATEGIES),
  temperature: numeric,
  question: z.string(),
  reference: z.string(),
  status: z.enum(["SCORED", "FAILED"]),
  raw_response: z.string(),
  processed_answer: z.string(),
  is_correct: z.enum(["0", "1"]),
  latency_ms: numeric,
  retries_used: numeric,
  calls_used: numeric,
  rouge_l: z.string(),
  bleu: z.string(),
  failure_state: z.enum(["", "PENDING", "PREPROCESSED", "QUERIED", "POSTPROCESSED", "SCORED", "FAILED"]),
  failure_kind: z.string(),
  failure_message: z.string(),
});

/** Run settings that change what a tuple's answer is; a ledger row is only reused under the same ones */
export type LedgerSettings = {
  modelId: string;
  seed: number;
  selfConsistencySamples: number;
};

export function resultKey(tuple: EvaluationTuple, settings: LedgerSettings): string {
  return [settings.modelId, tupleKey(tuple), settings.seed, settings.selfConsistencySamples].join("|");
}

export function openResultLedger(filePath: string): CsvTable {
  return CsvTable.open(filePath, RESULT_COLUMNS, ["key"]);
}

export function resultToRow(result: EvaluationResult, settings: LedgerSettings): TableRow {
  const { tuple } = result;
  return {
    key: resultKey(tuple, settings),
    model: settings.modelId,
    seed: String(settings.seed),
    samples: String(settings.selfConsistencySamples),
    id: tuple.recordId,
    dataset: tuple.datasetName,
    perturbation: tuple.perturbationType,
    preproc: tuple.preproc,
    inproc: tuple.inproc,
    postproc: tuple.postproc,
    temperature: String(tuple.temperature),
    question: tuple.question,
    reference: tuple.referenceAnswer,
    status: result.status,
    raw_response: result.rawResponse,
    processed_answer: result.processedAnswer,
    is_correct: result.isCorrect ? "1" : "0",
    latency_ms: String(result.latencyMs),
    retries_used: String(result.retriesUsed),
    calls_used: String(result.callsUsed),
    rouge_l: result.scores ? String(result.scores.rougeL) : "",
    bleu: result.scores ? String(result.scores.bleu) : "",
    failure_state: result.failure?.state ?? "",
    failure_kind: result.failure?.kind ?? "",
    failure_message: result.failure?.message ?? "",
  };
}

/**
 * Rebuild a result from its ledger row. Throws when the row is malformed.
 */
export function rowToResult(row: TableRow): EvaluationResult {
  const parsed = ResultRowSchema.safeParse(row);
  if (!parsed.success) {
    throw new Error(`Malformed result ledger row "${row.key}": ${parsed.error.message}`);
  }
  const data = parsed.data;

  const result: EvaluationResult = {
    tuple: Object.freeze({
      recordId: data.id,
      perturbationType: data.perturbation,
      datasetName: data.dataset,
      preproc: data.preproc,
      inproc: data.inproc,
      postproc: data.postproc,
      temperature: data.temperature,
      question: data.question,
      referenceAnswer: data.reference,
    }),
    status: data.status,
    rawResponse: data.raw_response,
    processedAnswer: data.processed_answer,
    isCorrect: data.is_correct === "1",
    latencyMs: data.latency_ms,
    retriesUsed: data.retries_used,
    callsUsed: data.calls_used,
    scores: data.rouge_l && data.bleu ? { rougeL: Number(data.rouge_l), bleu: Number(data.bleu) } : null,
    ...(data.failure_state
      ? { failure: { state: data.failure_state, kind: data.failure_kind, message: data.failure_message } }
      : {}),
  };
  return Object.freeze(result);
}
