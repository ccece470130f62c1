// Evaluation tuple construction
import { PerturbedRecord } from "~~/services/dataset";
import {
  DatasetName,
  EvaluationTuple,
  InprocessingStrategy,
  PERTURBATION_TYPES,
  PerturbationType,
  PostprocessingStrategy,
  PreprocessingStrategy,
} from "~~/types/benchmark";

export type TupleSelection = {
  datasets: readonly DatasetName[];
  perturbations: readonly PerturbationType[];
  preproc: PreprocessingStrategy;
  inproc: InprocessingStrategy;
  postproc: PostprocessingStrategy;
  temperature: number;
  /** Keep only the first N records by id */
  questionLimit?: number;
};

/** What tuple construction needs from a perturbed record */
export type TupleSource = Pick<PerturbedRecord, "record" | "variants">;

export type TupleBuild = {
  tuples: EvaluationTuple[];
  /** Selected perturbations with no variant in the perturbed table */
  missing: { recordId: string; perturbationType: PerturbationType }[];
};

export function tupleKey(tuple: EvaluationTuple): string {
  return [tuple.recordId, tuple.perturbationType, tuple.preproc, tuple.inproc, tuple.postproc, tuple.temperature].join(
    "|",
  );
}

export function compareIds(a: string, b: string): number {
  return a.localeCompare(b, "en", { numeric: true });
}

/**
 * Cross product of the selected records and perturbations for one strategy
 * combination. The `none` control is always included and carries the
 * original question verbatim.
 */
export function buildTuples(records: readonly TupleSource[], selection: TupleSelection): TupleBuild {
  const selected = records
    .filter(({ record }) => selection.datasets.includes(record.datasetName))
    .sort((a, b) => compareIds(a.record.id, b.record.id))
    .slice(0, selection.questionLimit);

  const perturbations = PERTURBATION_TYPES.filter(type => type === "none" || selection.perturbations.includes(type));
  const build: TupleBuild = { tuples: [], missing: [] };

  for (const { record, variants } of selected) {
    for (const perturbationType of perturbations) {
      const question = perturbationType === "none" ? record.question : variants[perturbationType];
      if (question === undefined) {
        build.missing.push({ recordId: record.id, perturbationType });
        continue;
      }

      build.tuples.push(
        Object.freeze({
          recordId: record.id,
          perturbationType,
          datasetName: record.datasetName,
          preproc: selection.preproc,
          inproc: selection.inproc,
          postproc: selection.postproc,
          temperature: selection.temperature,
          question,
          referenceAnswer: record.answer,
        }),
      );
    }
  }

  return build;
}
