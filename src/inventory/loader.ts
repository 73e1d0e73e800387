/**
 * Inventory loader.
 *
 * Reads `inventory_files.csv` from an inventory directory and returns typed,
 * validated rows ordered by manifest_row_index. Any problem with the table
 * itself (missing file, missing columns, malformed cells, repeated row
 * indices) is a FatalInputError: the build cannot start from a table it does
 * not fully understand. Problems with individual audio files are not detected
 * here; they surface later as per-sample exclusions.
 */

import { readFile } from "node:fs/promises";
import { isAbsolute, join, resolve } from "node:path";
import { CsvParseError, parseCsv, type CsvRecord, type ParsedCsv } from "../shared/csv.js";
import { FatalInputError, describeError } from "../shared/errors.js";
import type { InventoryRow } from "../types/index.js";
import {
  INVENTORY_FILE_NAME,
  InventoryCsvRowSchema,
  REQUIRED_INVENTORY_COLUMNS,
  type InventoryCsvRow,
} from "./schema.js";

export interface LoadedInventory {
  /** Path of the CSV that was read */
  readonly path: string;
  readonly rows: readonly InventoryRow[];
}

/**
 * Resolve an audio path from the inventory. Relative paths are taken relative
 * to the inventory directory.
 */
export function resolveAudioPath(inventoryDir: string, audioPath: string): string {
  if (audioPath.trim() === "") {
    return "";
  }
  return isAbsolute(audioPath) ? audioPath : resolve(inventoryDir, audioPath);
}

/**
 * Transcript length in characters (code points) and whitespace-separated words.
 */
export function transcriptLength(transcript: string): { chars: number; words: number } {
  return {
    chars: [...transcript].length,
    words: transcript.split(/\s+/).filter((word) => word.length > 0).length,
  };
}

function toInventoryRow(inventoryDir: string, row: InventoryCsvRow): InventoryRow {
  const derived = transcriptLength(row.transcript_raw);
  return {
    manifestRowIndex: row.manifest_row_index,
    fileName: row.file_name,
    audioPath: resolveAudioPath(inventoryDir, row.audio_path_resolved),
    transcriptRaw: row.transcript_raw,
    audioExists: row.audio_exists,
    audioReadOk: row.audio_read_ok,
    durationSec: row.duration_sec,
    transcriptIsBlank: row.transcript_is_blank,
    timestampMs: row.timestamp_ms,
    transcriptLenChars: row.transcript_len_chars ?? derived.chars,
    transcriptLenWords: row.transcript_len_words ?? derived.words,
    source: row.source,
    recordingDevice: row.recording_device,
  };
}

/**
 * Validate parsed CSV records and convert them into inventory rows.
 *
 * @throws FatalInputError on missing columns, invalid cells or repeated
 *   manifest_row_index values
 */
export function parseInventoryRecords(
  inventoryDir: string,
  header: readonly string[],
  records: readonly CsvRecord[],
  csvPath: string
): InventoryRow[] {
  const missing = REQUIRED_INVENTORY_COLUMNS.filter((column) => !header.includes(column));
  if (missing.length > 0) {
    throw new FatalInputError(`Missing required inventory columns: ${missing.join(", ")}`, csvPath);
  }

  const rows: InventoryRow[] = [];
  const seen = new Set<number>();

  records.forEach((record, i) => {
    const result = InventoryCsvRowSchema.safeParse(record);
    // +2: one for the header line, one for 1-based numbering
    const line = i + 2;

    if (!result.success) {
      const details = result.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ");
      throw new FatalInputError(`Invalid inventory row at line ${line}: ${details}`, csvPath);
    }

    const index = result.data.manifest_row_index;
    if (seen.has(index)) {
      throw new FatalInputError(
        `Duplicate manifest_row_index ${index} at line ${line}`,
        csvPath
      );
    }
    seen.add(index);

    rows.push(toInventoryRow(inventoryDir, result.data));
  });

  return rows.sort((a, b) => a.manifestRowIndex - b.manifestRowIndex);
}

/**
 * Load the inventory table from an inventory directory.
 *
 * @throws FatalInputError if the table is missing, unreadable or invalid
 */
export async function loadInventory(inventoryDir: string): Promise<LoadedInventory> {
  const csvPath = join(inventoryDir, INVENTORY_FILE_NAME);

  let content: string;
  try {
    content = await readFile(csvPath, "utf-8");
  } catch (err) {
    throw new FatalInputError(`Cannot read inventory table: ${describeError(err)}`, csvPath);
  }

  let parsed: ParsedCsv;
  try {
    parsed = parseCsv(content);
  } catch (err) {
    if (err instanceof CsvParseError) {
      throw new FatalInputError(`Inventory table is not valid CSV: ${err.message}`, csvPath);
    }
    throw err;
  }

  const rows = parseInventoryRecords(inventoryDir, parsed.header, parsed.records, csvPath);
  return { path: csvPath, rows };
}
