// Evaluation Pipeline - Main exports

export { EVAL_CONFIG, EvaluationRunConfigSchema } from "./config";
export type { EvaluationRunConfig, EvaluationRunInput } from "./config";
export { aggregate } from "./aggregator";
export { EvaluationHarness } from "./harness";
export type { HarnessOptions } from "./harness";
export { RESULT_COLUMNS, openResultLedger, resultKey, resultToRow, rowToResult } from "./ledger";
export type { LedgerSettings } from "./ledger";
export { majorityAnswer, pickListItem, splitListItems, truncateWords } from "./postprocess";
export { formatPercent, printReport, renderLatexTable, saveLatexTable, saveReport } from "./report";
export { runEvaluation } from "./runner";
export type { EvaluationRunDeps } from "./runner";
export { bleu, normalizeAnswer, rougeL, scoreAnswer, tokenize } from "./scoring";
export type { AnswerScore } from "./scoring";
export { buildTuples, compareIds, tupleKey } from "./tuples";
export type { TupleBuild, TupleSelection, TupleSource } from "./tuples";
export type { EvaluationRunReport, FailedTuple, TupleCounts } from "./types";
