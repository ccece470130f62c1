// Keyed CSV tables persisted after every unit of work, so an interrupted
// stage resumes from the rows already on disk.
import { parseCsv, toCsv } from "./csv";
import * as fs from "fs";
import * as path from "path";
import { ConfigError } from "~~/utils/errors";

export type TableRow = Record<string, string>;

/**
 * Read a CSV file with a header line into row objects.
 */
export function readTable(filePath: string): { header: string[]; rows: TableRow[] } {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Table not found: ${filePath}`);
  }

  const [header, ...lines] = parseCsv(fs.readFileSync(filePath, "utf-8"));
  if (!header) {
    throw new ConfigError(`Table is empty: ${filePath}`);
  }

  const columns = header.map(column => column.trim());
  const rows = lines.map((cells, index) => {
    if (cells.length > columns.length) {
      throw new ConfigError(`${filePath} row ${index + 2}: ${cells.length} fields, header has ${columns.length}`);
    }
    const row: TableRow = {};
    columns.forEach((column, i) => {
      row[column] = cells[i] ?? "";
    });
    return row;
  });

  return { header: columns, rows };
}

/**
 * Write rows to a CSV file. The file is replaced atomically, so a crash while
 * saving never leaves a truncated table behind.
 */
export function writeTable(filePath: string, header: readonly string[], rows: readonly TableRow[]): void {
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  const content = toCsv(
    header,
    rows.map(row => header.map(column => row[column] ?? "")),
  );
  const tmpPath = `${filePath}.tmp`;
  fs.writeFileSync(tmpPath, content, "utf-8");
  fs.renameSync(tmpPath, filePath);
}

export class CsvTable {
  private readonly rowsByKey = new Map<string, TableRow>();
  private readonly header: string[];

  private constructor(
    readonly filePath: string,
    columns: readonly string[],
    private readonly keyColumns: readonly string[],
  ) {
    this.header = [...columns];
  }

  /**
   * Open the table at `filePath`, loading its rows when the file exists.
   * Columns found on disk but missing from `columns` are kept.
   */
  static open(filePath: string, columns: readonly string[], keyColumns: readonly string[]): CsvTable {
    const missingKeys = keyColumns.filter(key => !columns.includes(key));
    if (missingKeys.length > 0) {
      throw new ConfigError(`Key columns ${missingKeys.join(", ")} are not table columns`);
    }

    const table = new CsvTable(filePath, columns, keyColumns);
    if (fs.existsSync(filePath)) {
      const existing = readTable(filePath);
      for (const column of existing.header) {
        if (!table.header.includes(column)) table.header.push(column);
      }
      for (const row of existing.rows) {
        table.rowsByKey.set(table.keyOf(row), row);
      }
    }
    return table;
  }

  get columns(): readonly string[] {
    return this.header;
  }

  get size(): number {
    return this.rowsByKey.size;
  }

  keyOf(row: TableRow): string {
    return this.keyColumns.map(column => row[column] ?? "").join("|");
  }

  has(key: string): boolean {
    return this.rowsByKey.has(key);
  }

  get(key: string): TableRow | undefined {
    return this.rowsByKey.get(key);
  }

  rows(): TableRow[] {
    return [...this.rowsByKey.values()];
  }

  /** Insert or merge a row; fields not given keep their stored value */
  upsert(row: TableRow): void {
    for (const column of Object.keys(row)) {
      if (!this.header.includes(column)) this.header.push(column);
    }
    const key = this.keyOf(row);
    this.rowsByKey.set(key, { ...this.rowsByKey.get(key), ...row });
  }

  delete(key: string): boolean {
    return this.rowsByKey.delete(key);
  }

  save(): void {
    writeTable(this.filePath, this.header, this.rows());
  }
}
