/**
 * Minimal CSV reader and writer for the tabular artifacts.
 *
 * Parsing handles quoted fields, escaped quotes and multiline values. Cell
 * values are returned verbatim (no trimming, and line breaks inside quotes kept
 * as written): transcripts are hashed byte for byte. Writing quotes a cell only
 * when it contains a delimiter, a quote or a line break, and always ends rows
 * with "\n" so output is byte-stable across platforms.
 */

export type CsvRecord = Record<string, string>;

export type CsvCell = string | number | boolean | null | undefined;

export interface ParsedCsv {
  /** Header names in file order */
  header: string[];
  /** One record per data row, keyed by header name */
  records: CsvRecord[];
}

export class CsvParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CsvParseError";
  }
}

function splitRows(content: string): string[][] {
  const rows: string[][] = [];
  let currentRow: string[] = [];
  let currentCell = "";
  let inQuotes = false;

  const text = content.replace(/^\uFEFF/, "");

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (inQuotes) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          currentCell += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        currentCell += char;
      }
    } else if (char === '"') {
      inQuotes = true;
    } else if (char === ",") {
      currentRow.push(currentCell);
      currentCell = "";
    } else if (char === "\n" || char === "\r") {
      // CRLF, LF and a lone CR end a row; inside quotes they stay in the cell
      if (char === "\r" && text[i + 1] === "\n") {
        i++;
      }
      currentRow.push(currentCell);
      rows.push(currentRow);
      currentRow = [];
      currentCell = "";
    } else {
      currentCell += char;
    }
  }

  if (inQuotes) {
    throw new CsvParseError("Unterminated quoted field at end of input");
  }

  if (currentRow.length > 0 || currentCell.length > 0) {
    currentRow.push(currentCell);
    rows.push(currentRow);
  }

  return rows;
}

/**
 * Parse CSV text with a header row into records keyed by column name.
 *
 * @throws CsvParseError on unterminated quotes, a missing header, or a data
 *   row with more cells than the header
 */
export function parseCsv(content: string): ParsedCsv {
  const rows = splitRows(content);
  const headerRow = rows[0];
  if (headerRow === undefined) {
    throw new CsvParseError("CSV input is empty (no header row)");
  }

  const header = headerRow.map((h) => h.trim());
  const records: CsvRecord[] = [];

  for (let i = 1; i < rows.length; i++) {
    const row = rows[i];
    if (row === undefined || (row.length === 1 && row[0] === "")) {
      continue;
    }
    if (row.length > header.length) {
      throw new CsvParseError(
        `Row ${i + 1} has ${row.length} cells but the header has ${header.length}`
      );
    }

    const record: CsvRecord = {};
    header.forEach((name, j) => {
      record[name] = row[j] ?? "";
    });
    records.push(record);
  }

  return { header, records };
}

function formatCell(value: CsvCell): string {
  if (value === null || value === undefined) {
    return "";
  }
  const text = typeof value === "string" ? value : String(value);
  if (/[",\n\r]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

/**
 * Serialize rows under a fixed column order. Missing keys become empty cells.
 */
export function stringifyCsv(
  columns: readonly string[],
  rows: ReadonlyArray<Readonly<Record<string, CsvCell>>>
): string {
  const lines = [columns.map(formatCell).join(",")];
  for (const row of rows) {
    lines.push(columns.map((column) => formatCell(row[column])).join(","));
  }
  return lines.join("\n") + "\n";
}
