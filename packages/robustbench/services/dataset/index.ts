// Dataset tables - Main exports

export { escapeCsvField, parseCsv, toCsv } from "./csv";
export { CsvTable, readTable, writeTable } from "./table";
export type { TableRow } from "./table";
export {
  PERTURBATION_COLUMNS,
  RECORD_COLUMNS,
  intensityColumn,
  isDatasetName,
  loadPerturbedRecords,
  loadRecords,
  openPerturbedTable,
  parseIntensity,
  recordToRow,
  rowsToRecords,
  writeRecords,
} from "./records";
export type { PerturbedRecord } from "./records";
