// Perturbation batch - fills the perturbed table one record at a time
import { PerturbationGenerator, isPerturbationError } from "./generator";
import { CsvTable, intensityColumn, openPerturbedTable, parseIntensity, recordToRow } from "~~/services/dataset";
import { DEFAULT_INTENSITY, GeneratedPerturbationType, Intensity, QARecord } from "~~/types/benchmark";

export const PERTURBATION_FAILURE_COLUMNS = ["id", "perturbation", "intensity", "error"] as const;

export type PerturbationBatchOptions = {
  records: readonly QARecord[];
  types: readonly GeneratedPerturbationType[];
  /** Per-type intensity; the type default applies when absent */
  intensities?: Partial<Record<GeneratedPerturbationType, Intensity>>;
  generator: PerturbationGenerator;
  outputPath: string;
  /** Failure ledger; failures are only logged when unset */
  failurePath?: string;
  log?: (message: string) => void;
};

export type PerturbationFailure = {
  recordId: string;
  perturbationType: GeneratedPerturbationType;
  intensity: Intensity;
  error: string;
};

export type PerturbationBatchSummary = {
  generated: number;
  /** Cells already present in the output table at the requested intensity */
  reused: number;
  failures: PerturbationFailure[];
};

/**
 * Perturb every record with every requested type. Cells already present in
 * the output table at the requested intensity are kept, so re-running after an
 * interruption only generates what is missing; a cell generated at another
 * intensity (or with none recorded) is generated again. The table is saved
 * after every record.
 */
export async function runPerturbationBatch(options: PerturbationBatchOptions): Promise<PerturbationBatchSummary> {
  const log = options.log ?? (message => console.log(message));
  const table = openPerturbedTable(options.outputPath);
  const failureLedger = options.failurePath
    ? CsvTable.open(options.failurePath, PERTURBATION_FAILURE_COLUMNS, ["id", "perturbation"])
    : null;

  const summary: PerturbationBatchSummary = { generated: 0, reused: 0, failures: [] };

  for (let i = 0; i < options.records.length; i++) {
    const record = options.records[i];
    const existing = table.get(record.id);
    table.upsert(recordToRow(record));

    log(`[${i + 1}/${options.records.length}] ${record.id} (${record.datasetName})`);

    for (const type of options.types) {
      const intensity = options.intensities?.[type] ?? DEFAULT_INTENSITY[type];

      const storedIntensity = parseIntensity(existing?.[intensityColumn(type)]);
      if (existing?.[type]?.trim() && storedIntensity === intensity) {
        summary.reused++;
        continue;
      }

      try {
        const perturbed = await options.generator.perturb(record.question, type, intensity);
        table.upsert({ id: record.id, [type]: perturbed, [intensityColumn(type)]: String(intensity) });
        failureLedger?.delete(`${record.id}|${type}`);
        summary.generated++;
        log(`  ${type}@${intensity}: ${perturbed.slice(0, 80)}`);
      } catch (error) {
        if (!isPerturbationError(error)) throw error;

        summary.failures.push({ recordId: record.id, perturbationType: type, intensity, error: error.message });
        failureLedger?.upsert({ id: record.id, perturbation: type, intensity: String(intensity), error: error.message });
        log(`  ${type}@${intensity}: SKIPPED (${error.message})`);
      }
    }

    table.save();
    failureLedger?.save();
  }

  return summary;
}
