// Benchmark domain types shared by every stage of the pipeline

export const DATASET_NAMES = ["eli5", "gooaq", "msmarco", "naturalquestions", "squad2"] as const;
export type DatasetName = (typeof DATASET_NAMES)[number];

export const PERTURBATION_TYPES = [
  "none",
  "typo",
  "synonym",
  "language",
  "paraphrase",
  "sentence-inj",
  "bias",
] as const;
export type PerturbationType = (typeof PERTURBATION_TYPES)[number];

/** Perturbations that produce a new question text (`none` is the identity control) */
export type GeneratedPerturbationType = Exclude<PerturbationType, "none">;

export const INTENSITIES = [25, 50, 75, 100] as const;
export type Intensity = (typeof INTENSITIES)[number];

export const DEFAULT_INTENSITY: Record<GeneratedPerturbationType, Intensity> = {
  typo: 50,
  synonym: 50,
  language: 25,
  paraphrase: 50,
  "sentence-inj": 50,
  bias: 25,
};

export const FILTER_NAMES = ["causal_chain", "answer", "question"] as const;
export type FilterName = (typeof FILTER_NAMES)[number];

export const PREPROCESSING_STRATEGIES = ["none", "translate", "filter", "correct"] as const;
export type PreprocessingStrategy = (typeof PREPROCESSING_STRATEGIES)[number];

export const INPROCESSING_STRATEGIES = [
  "none",
  "cot",
  "translate",
  "subproblems",
  "few_shot1",
  "few_shot3",
  "few_shot5",
  "few_shot7",
  "few_shot_gooaq",
  "robust",
] as const;
export type InprocessingStrategy = (typeof INPROCESSING_STRATEGIES)[number];

export const POSTPROCESSING_STRATEGIES = ["none", "list1", "list2", "length", "self_consistency"] as const;
export type PostprocessingStrategy = (typeof POSTPROCESSING_STRATEGIES)[number];

export type QARecord = Readonly<{
  id: string;
  datasetName: DatasetName;
  question: string;
  answer: string;
}>;

export type FilterVerdict = {
  recordId: string;
  filterName: FilterName;
  kept: boolean;
  rationale?: string;
};

export type PerturbationVariant = {
  recordId: string;
  perturbationType: PerturbationType;
  intensity: Intensity | null;
  perturbedQuestion: string;
};

/** One unit of evaluation work */
export type EvaluationTuple = Readonly<{
  recordId: string;
  perturbationType: PerturbationType;
  datasetName: DatasetName;
  preproc: PreprocessingStrategy;
  inproc: InprocessingStrategy;
  postproc: PostprocessingStrategy;
  temperature: number;
  /** Perturbed question text (the original text for `none`) */
  question: string;
  referenceAnswer: string;
}>;

export type TupleState = "PENDING" | "PREPROCESSED" | "QUERIED" | "POSTPROCESSED" | "SCORED" | "FAILED";

export type AnswerScores = {
  /** ROUGE-L F1 against the reference answer (0-1) */
  rougeL: number;
  /** Smoothed sentence BLEU against the reference answer (0-1) */
  bleu: number;
};

export type TupleFailure = {
  /** Last state the tuple reached before failing */
  state: TupleState;
  kind: string;
  message: string;
};

export type EvaluationResult = Readonly<{
  tuple: EvaluationTuple;
  status: "SCORED" | "FAILED";
  rawResponse: string;
  processedAnswer: string;
  isCorrect: boolean;
  latencyMs: number;
  retriesUsed: number;
  /** Requests issued for this tuple, including pre-processing and self-consistency samples */
  callsUsed: number;
  scores: AnswerScores | null;
  failure?: TupleFailure;
}>;

export type RobustnessCounts = {
  total: number;
  scored: number;
  correct: number;
  failed: number;
  /** correct / scored, null when nothing was scored */
  accuracy: number | null;
  /** failed / total, null when the cell is empty */
  failureRate: number | null;
};

/** Mean similarity between a perturbed answer and the unperturbed answer to the same record */
export type AnswerConsistency = {
  rougeL: number;
  bleu: number;
  /** Records scored under both the perturbation and `none` */
  pairs: number;
};

export type RobustnessCell = RobustnessCounts & {
  datasetName: DatasetName;
  perturbationType: PerturbationType;
  /** Accuracy minus the same dataset's `none` accuracy */
  deltaVsControl: number | null;
  /** null for `none` and for cells without a scored pair */
  consistency: AnswerConsistency | null;
};

export type RobustnessReport = {
  cells: RobustnessCell[];
  datasets: (RobustnessCounts & { datasetName: DatasetName })[];
  perturbations: (RobustnessCounts & { perturbationType: PerturbationType })[];
  overall: RobustnessCounts;
};
