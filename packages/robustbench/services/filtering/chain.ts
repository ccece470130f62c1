// Filter chain - sequential, short-circuiting filters with a resumable verdict ledger
import { FilterClassifier } from "./classifier";
import { CsvTable, TableRow, writeRecords } from "~~/services/dataset";
import { isRequestError } from "~~/services/llm";
import { FILTER_NAMES, FilterName, FilterVerdict, QARecord } from "~~/types/benchmark";

export const VERDICT_COLUMNS = ["id", "filter", "kept", "rationale"] as const;

export type FilterChainOptions = {
  records: readonly QARecord[];
  /** Applied in this order; a record discarded by one filter never reaches the next */
  filters: readonly FilterName[];
  classifier: FilterClassifier;
  ledgerPath: string;
  /** Filtered table with the surviving records */
  outputPath: string;
  log?: (message: string) => void;
};

export type FilterChainSummary = {
  verdicts: FilterVerdict[];
  kept: QARecord[];
  discarded: number;
  /** Records left unclassified after a client error; a later run retries them */
  skipped: string[];
  /** Verdicts taken from the ledger instead of a request */
  replayed: number;
};

function isFilterName(value: string): value is FilterName {
  return FILTER_NAMES.some(name => name === value);
}

function verdictToRow(verdict: FilterVerdict): TableRow {
  return {
    id: verdict.recordId,
    filter: verdict.filterName,
    kept: verdict.kept ? "1" : "0",
    rationale: verdict.rationale ?? "",
  };
}

function rowToVerdict(row: TableRow): FilterVerdict {
  const filterName = row.filter;
  if (!isFilterName(filterName)) {
    throw new Error(`Verdict ledger has an unknown filter "${filterName}" for record ${row.id}`);
  }
  return {
    recordId: row.id,
    filterName,
    kept: row.kept === "1",
    ...(row.rationale ? { rationale: row.rationale } : {}),
  };
}

/**
 * Run the filters over every record. The ledger is saved after every record,
 * and verdicts found in it are replayed without sending a request.
 * An Invalid request error aborts the chain; other client errors skip the record.
 */
export async function runFilterChain(options: FilterChainOptions): Promise<FilterChainSummary> {
  const log = options.log ?? (message => console.log(message));
  const ledger = CsvTable.open(options.ledgerPath, VERDICT_COLUMNS, ["id", "filter"]);
  const summary: FilterChainSummary = { verdicts: [], kept: [], discarded: 0, skipped: [], replayed: 0 };

  for (let i = 0; i < options.records.length; i++) {
    const record = options.records[i];
    let survived = true;
    let skipped = false;

    log(`[${i + 1}/${options.records.length}] ${record.id}: ${record.question.slice(0, 60)}`);

    for (const filterName of options.filters) {
      const stored = ledger.get(`${record.id}|${filterName}`);
      let verdict: FilterVerdict;

      if (stored) {
        verdict = rowToVerdict(stored);
        summary.replayed++;
      } else {
        try {
          verdict = await options.classifier.classify(record, filterName);
        } catch (error) {
          if (!isRequestError(error) || error.kind === "Invalid") throw error;
          log(`  ${filterName}: SKIPPED (${error.kind}: ${error.message})`);
          skipped = true;
          break;
        }
        ledger.upsert(verdictToRow(verdict));
      }

      summary.verdicts.push(verdict);
      log(`  ${filterName}: ${verdict.kept ? "keep" : "discard"}${stored ? " (ledger)" : ""}`);

      if (!verdict.kept) {
        survived = false;
        break;
      }
    }

    ledger.save();

    if (skipped) {
      summary.skipped.push(record.id);
    } else if (survived) {
      summary.kept.push(record);
      writeRecords(options.outputPath, summary.kept);
    } else {
      summary.discarded++;
    }
  }

  // Also covers a run where nothing survived
  writeRecords(options.outputPath, summary.kept);

  return summary;
}
