// Perturbation Generator - Main exports

export { PerturbationRunConfigSchema } from "./config";
export type { PerturbationRunConfig } from "./config";
export { PERTURBATION_FAILURE_COLUMNS, runPerturbationBatch } from "./batch";
export type { PerturbationBatchOptions, PerturbationBatchSummary, PerturbationFailure } from "./batch";
export { PerturbationError, PerturbationGenerator, isPerturbationError, languageFor } from "./generator";
export type { PerturbationGeneratorOptions } from "./generator";
export { TYPO_METHODS, applyTypos, typoOperationCount } from "./typo";
export type { TypoMethod, TypoOptions, TypoResult } from "./typo";
