// Evaluation Pipeline Configuration
import { z } from "zod";
import {
  DATASET_NAMES,
  INPROCESSING_STRATEGIES,
  PERTURBATION_TYPES,
  POSTPROCESSING_STRATEGIES,
  PREPROCESSING_STRATEGIES,
} from "~~/types/benchmark";

export const EVAL_CONFIG = {
  /** ROUGE-L F1 at or above which an answer counts as correct (0-1) */
  correctnessThreshold: Number(process.env.EVAL_CORRECTNESS_THRESHOLD) || 0.5,

  /** Samples drawn for self-consistency post-processing */
  selfConsistencySamples: Number(process.env.EVAL_SELF_CONSISTENCY_SAMPLES) || 3,

  /** Sampling temperature of the self-consistency samples */
  selfConsistencyTemperature: 1,
} as const;

export const EvaluationRunConfigSchema = z.object({
  perturbedPath: z.string().min(1),
  ledgerPath: z.string().min(1),
  modelId: z.string().min(1),
  datasets: z.array(z.enum(DATASET_NAMES)).min(1).default([...DATASET_NAMES]),
  /** `none` is always evaluated as the control, listed or not */
  perturbations: z.array(z.enum(PERTURBATION_TYPES)).min(1).default([...PERTURBATION_TYPES]),
  preproc: z.enum(PREPROCESSING_STRATEGIES).default("none"),
  inproc: z.enum(INPROCESSING_STRATEGIES).default("none"),
  postproc: z.enum(POSTPROCESSING_STRATEGIES).default("none"),
  temperature: z.number().min(0).max(2).default(0),
  /** Evaluate only the first N records by id */
  questionLimit: z.number().int().positive().optional(),
  /** Re-evaluate tuples whose ledger entry is FAILED */
  retryFailed: z.boolean().default(false),
  /** Seed for k-shot exemplar selection */
  seed: z.number().int().default(0),
  correctnessThreshold: z.number().min(0).max(1).default(EVAL_CONFIG.correctnessThreshold),
  selfConsistencySamples: z.number().int().min(1).default(EVAL_CONFIG.selfConsistencySamples),
});

export type EvaluationRunConfig = z.infer<typeof EvaluationRunConfigSchema>;
/** Config as written by callers, before defaults are applied */
export type EvaluationRunInput = z.input<typeof EvaluationRunConfigSchema>;
