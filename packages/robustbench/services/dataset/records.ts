// QA record tables: loading, validation and the perturbed-question table
import { CsvTable, TableRow, readTable, writeTable } from "./table";
import {
  DATASET_NAMES,
  DatasetName,
  GeneratedPerturbationType,
  INTENSITIES,
  Intensity,
  PERTURBATION_TYPES,
  PerturbationVariant,
  QARecord,
} from "~~/types/benchmark";
import { ConfigError } from "~~/utils/errors";

export const RECORD_COLUMNS = ["id", "dataset", "question", "answer"] as const;

/** Generated perturbation columns of the perturbed table, in canonical order */
export const PERTURBATION_COLUMNS = PERTURBATION_TYPES.filter(
  (type): type is GeneratedPerturbationType => type !== "none",
);

/** Column holding the intensity a type's variant was generated at */
export function intensityColumn(type: GeneratedPerturbationType): string {
  return `${type}_intensity`;
}

/** Stored intensity, or null when the cell is blank or not a known level */
export function parseIntensity(value: string | undefined): Intensity | null {
  const trimmed = value?.trim();
  return INTENSITIES.find(level => String(level) === trimmed) ?? null;
}

const QUESTION_ALIASES = ["question", "question_processed"];
const ANSWER_ALIASES = ["answer", "answer_processed"];

export function isDatasetName(value: string): value is DatasetName {
  return DATASET_NAMES.some(name => name === value);
}

function pickColumn(row: TableRow, aliases: string[]): string | undefined {
  for (const alias of aliases) {
    const value = row[alias];
    if (value !== undefined) return value;
  }
  return undefined;
}

/**
 * Convert table rows to QA records. Rows with an unknown dataset, a missing
 * field or a duplicate id are rejected with a ConfigError naming the row.
 */
export function rowsToRecords(rows: TableRow[], source: string = "table"): QARecord[] {
  const seen = new Set<string>();

  return rows.map((row, index) => {
    const where = `${source} row ${index + 2}`;
    const id = (row.id ?? "").trim();
    const dataset = (row.dataset ?? "").trim();
    const question = pickColumn(row, QUESTION_ALIASES);
    const answer = pickColumn(row, ANSWER_ALIASES);

    if (!id) throw new ConfigError(`${where}: missing id`);
    if (seen.has(id)) throw new ConfigError(`${where}: duplicate id "${id}"`);
    if (!isDatasetName(dataset)) {
      throw new ConfigError(`${where}: unknown dataset "${dataset}" (expected one of ${DATASET_NAMES.join(", ")})`);
    }
    if (question === undefined || !question.trim()) throw new ConfigError(`${where}: missing question`);
    if (answer === undefined) throw new ConfigError(`${where}: missing answer`);

    seen.add(id);
    return Object.freeze({ id, datasetName: dataset, question, answer });
  });
}

export function loadRecords(filePath: string): QARecord[] {
  return rowsToRecords(readTable(filePath).rows, filePath);
}

export function recordToRow(record: QARecord): TableRow {
  return { id: record.id, dataset: record.datasetName, question: record.question, answer: record.answer };
}

export function writeRecords(filePath: string, records: readonly QARecord[]): void {
  writeTable(filePath, RECORD_COLUMNS, records.map(recordToRow));
}

/**
 * Table holding one row per record with a column per generated perturbation,
 * each followed by the intensity it was generated at.
 */
export function openPerturbedTable(filePath: string): CsvTable {
  const perturbationColumns = PERTURBATION_COLUMNS.flatMap(type => [type, intensityColumn(type)]);
  return CsvTable.open(filePath, [...RECORD_COLUMNS, ...perturbationColumns], ["id"]);
}

export type PerturbedRecord = {
  record: QARecord;
  /** Perturbed question per type; types without a value are absent */
  variants: Partial<Record<GeneratedPerturbationType, string>>;
  /** The same variants with the intensity each was generated at */
  perturbations: PerturbationVariant[];
};

export function loadPerturbedRecords(filePath: string): PerturbedRecord[] {
  const { rows } = readTable(filePath);
  const records = rowsToRecords(rows, filePath);

  return records.map((record, index) => {
    const row = rows[index];
    const variants: Partial<Record<GeneratedPerturbationType, string>> = {};
    const perturbations: PerturbationVariant[] = [];
    for (const type of PERTURBATION_COLUMNS) {
      const value = row[type];
      if (value === undefined || !value.trim()) continue;
      variants[type] = value;
      perturbations.push({
        recordId: record.id,
        perturbationType: type,
        intensity: parseIntensity(row[intensityColumn(type)]),
        perturbedQuestion: value,
      });
    }
    return { record, variants, perturbations };
  });
}
