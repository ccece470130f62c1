// CSV parsing and serialization (RFC 4180 quoting, fields may span lines)

const QUOTE = '"';

/**
 * Parse CSV content into rows of raw field values.
 * Quoted fields may contain the delimiter, doubled quotes and line breaks.
 */
export function parseCsv(content: string, delimiter: string = ","): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let current = "";
  let inQuotes = false;
  let sawField = false;

  for (let i = 0; i < content.length; i++) {
    const char = content[i];

    if (inQuotes) {
      if (char === QUOTE) {
        if (content[i + 1] === QUOTE) {
          // Escaped quote
          current += QUOTE;
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        current += char;
      }
      continue;
    }

    if (char === QUOTE) {
      inQuotes = true;
      sawField = true;
    } else if (char === delimiter) {
      row.push(current);
      current = "";
      sawField = true;
    } else if (char === "\n" || char === "\r") {
      if (char === "\r" && content[i + 1] === "\n") i++;
      if (sawField || current !== "" || row.length > 0) {
        row.push(current);
        rows.push(row);
      }
      row = [];
      current = "";
      sawField = false;
    } else {
      current += char;
      sawField = true;
    }
  }

  if (inQuotes) {
    throw new Error("Unterminated quoted field at end of CSV content");
  }

  if (sawField || current !== "" || row.length > 0) {
    row.push(current);
    rows.push(row);
  }

  return rows;
}

function needsQuoting(value: string, delimiter: string): boolean {
  return (
    value.includes(delimiter) ||
    value.includes(QUOTE) ||
    value.includes("\n") ||
    value.includes("\r") ||
    value !== value.trim()
  );
}

export function escapeCsvField(value: string, delimiter: string = ","): string {
  return needsQuoting(value, delimiter) ? `${QUOTE}${value.replace(/"/g, '""')}${QUOTE}` : value;
}

/**
 * Serialize a header and rows. Every row is written with the header's width.
 */
export function toCsv(header: readonly string[], rows: readonly (readonly string[])[], delimiter: string = ","): string {
  const lines = [header, ...rows].map(cells =>
    header.map((_, index) => escapeCsvField(cells[index] ?? "", delimiter)).join(delimiter),
  );
  return `${lines.join("\n")}\n`;
}
