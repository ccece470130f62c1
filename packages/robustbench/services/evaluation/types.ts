// Evaluation run types
import { EvaluationRunConfig } from "./config";
import { UsageSnapshot } from "~~/services/llm";
import { PerturbationType, RobustnessReport, TupleFailure } from "~~/types/benchmark";

export type TupleCounts = {
  /** Tuples built for this run */
  total: number;
  /** Evaluated by this run */
  evaluated: number;
  /** Taken from the result ledger */
  reused: number;
  /** Selected perturbations without a variant in the perturbed table */
  missing: number;
};

export type FailedTuple = TupleFailure & {
  key: string;
  perturbationType: PerturbationType;
};

export type EvaluationRunReport = {
  timestamp: string;
  gitCommit?: string;
  config: EvaluationRunConfig;
  tuples: TupleCounts;
  usage: UsageSnapshot;
  robustness: RobustnessReport;
  failures: FailedTuple[];
};
