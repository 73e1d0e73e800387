/**
 * Inventory table schema.
 *
 * The upstream inventory step writes `inventory_files.csv`; every cell arrives
 * as text. The schema coerces cells into typed values and rejects rows that
 * cannot be interpreted, so later stages never see a malformed row.
 */

import { z } from "zod";

export const INVENTORY_FILE_NAME = "inventory_files.csv";

export const REQUIRED_INVENTORY_COLUMNS = [
  "manifest_row_index",
  "file_name",
  "audio_path_resolved",
  "transcript_raw",
  "audio_read_ok",
  "duration_sec",
  "transcript_is_blank",
] as const;

const TRUE_VALUES = ["true", "1", "yes"];
const FALSE_VALUES = ["false", "0", "no"];

function parseBoolean(value: string): boolean | undefined {
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.includes(normalized)) {
    return true;
  }
  if (FALSE_VALUES.includes(normalized)) {
    return false;
  }
  return undefined;
}

const csvBoolean = z.string().transform((value, ctx) => {
  const parsed = parseBoolean(value);
  if (parsed === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Expected a boolean (true/false/1/0/yes/no), got "${value}"`,
    });
    return z.NEVER;
  }
  return parsed;
});

const csvOptionalBoolean = z
  .string()
  .optional()
  .transform((value, ctx) => {
    if (value === undefined || value.trim() === "") {
      return null;
    }
    const parsed = parseBoolean(value);
    if (parsed === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Expected a boolean or an empty cell, got "${value}"`,
      });
      return z.NEVER;
    }
    return parsed;
  });

/** Empty cells (and the NaN markers some writers emit) read as null. */
const csvNullableNumber = z.string().transform((value, ctx) => {
  const trimmed = value.trim();
  if (trimmed === "" || trimmed.toLowerCase() === "nan") {
    return null;
  }
  const parsed = Number(trimmed);
  if (Number.isNaN(parsed)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Expected a number or an empty cell, got "${value}"`,
    });
    return z.NEVER;
  }
  return parsed;
});

const csvOptionalNumber = csvNullableNumber
  .optional()
  .transform((value) => (value === undefined ? null : value));

const csvIndex = z
  .string()
  .trim()
  .regex(/^\d+$/, "Expected a non-negative integer")
  .transform((value) => parseInt(value, 10))
  .refine(Number.isSafeInteger, `Expected an integer no larger than ${Number.MAX_SAFE_INTEGER}`);

const csvOptionalText = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === "" ? null : value));

export const InventoryCsvRowSchema = z.object({
  manifest_row_index: csvIndex,
  file_name: z.string().min(1, "file_name must not be empty"),
  audio_path_resolved: z.string(),
  transcript_raw: z.string(),
  audio_read_ok: csvBoolean,
  duration_sec: csvNullableNumber,
  transcript_is_blank: csvBoolean,

  audio_exists: csvOptionalBoolean,
  timestamp_ms: csvOptionalNumber,
  transcript_len_chars: csvOptionalNumber,
  transcript_len_words: csvOptionalNumber,
  source: csvOptionalText,
  recording_device: csvOptionalText,
});

export type InventoryCsvRow = z.infer<typeof InventoryCsvRowSchema>;
