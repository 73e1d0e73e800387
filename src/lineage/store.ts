/**
 * Frozen test set storage.
 *
 * The lineage manager reads prior frozen test sets through the
 * FrozenTestSetStore interface and never touches files itself. The directory
 * store reads the CSV artifacts written by earlier builds; the in-memory store
 * backs tests and callers that keep lineage elsewhere.
 */

import { createHash } from "node:crypto";
import { readFile } from "node:fs/promises";
import { z } from "zod";
import { artifactPaths, versionDirectory } from "../artifacts/paths.js";
import { parseSummary } from "../artifacts/summary.js";
import { SHA256_HEX_PATTERN } from "../hashing/index.js";
import { CsvParseError, parseCsv, stringifyCsv, type ParsedCsv } from "../shared/csv.js";
import { FatalInputError, describeError } from "../shared/errors.js";
import type { DatasetVersion } from "./version.js";

export const FROZEN_TEST_SET_COLUMNS = [
  "file_name",
  "pair_sha256",
  "audio_sha256",
  "transcript_sha256",
] as const;

export interface FrozenTestEntry {
  readonly fileName: string;
  readonly pairSha256: string;
  readonly audioSha256: string;
  readonly transcriptSha256: string;
}

export interface FrozenTestSetStore {
  /**
   * @throws FatalInputError if the set is missing or corrupt
   */
  readFrozenTestSet(version: DatasetVersion): Promise<readonly FrozenTestEntry[]>;
}

const sha256Hex = z.string().regex(SHA256_HEX_PATTERN, "Expected a lowercase SHA-256 hex digest");

const FrozenTestRowSchema = z.object({
  file_name: z.string().min(1),
  pair_sha256: sha256Hex,
  audio_sha256: sha256Hex,
  transcript_sha256: sha256Hex,
});

export function sha256OfText(content: string): string {
  return createHash("sha256").update(content, "utf8").digest("hex");
}

/**
 * Serialize entries in canonical form: fixed columns, ordered by pair_sha256.
 */
export function serializeFrozenTestSet(entries: readonly FrozenTestEntry[]): string {
  const ordered = [...entries].sort((a, b) =>
    a.pairSha256 === b.pairSha256 ? 0 : a.pairSha256 < b.pairSha256 ? -1 : 1
  );
  return stringifyCsv(
    FROZEN_TEST_SET_COLUMNS,
    ordered.map((entry) => ({
      file_name: entry.fileName,
      pair_sha256: entry.pairSha256,
      audio_sha256: entry.audioSha256,
      transcript_sha256: entry.transcriptSha256,
    }))
  );
}

/**
 * Parse and validate a frozen test set CSV.
 *
 * @throws FatalInputError on any structural problem or repeated identity
 */
export function parseFrozenTestSet(content: string, source: string): FrozenTestEntry[] {
  let parsed: ParsedCsv;
  try {
    parsed = parseCsv(content);
  } catch (err) {
    if (err instanceof CsvParseError) {
      throw new FatalInputError(`Frozen test set is not valid CSV: ${err.message}`, source);
    }
    throw err;
  }
  const { header, records } = parsed;

  const missing = FROZEN_TEST_SET_COLUMNS.filter((column) => !header.includes(column));
  if (missing.length > 0) {
    throw new FatalInputError(`Frozen test set is missing columns: ${missing.join(", ")}`, source);
  }

  const seen = new Set<string>();
  return records.map((record, i) => {
    const result = FrozenTestRowSchema.safeParse(record);
    if (!result.success) {
      const details = result.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ");
      throw new FatalInputError(`Corrupt frozen test set row at line ${i + 2}: ${details}`, source);
    }
    if (seen.has(result.data.pair_sha256)) {
      throw new FatalInputError(
        `Frozen test set lists ${result.data.pair_sha256} more than once`,
        source
      );
    }
    seen.add(result.data.pair_sha256);
    return {
      fileName: result.data.file_name,
      pairSha256: result.data.pair_sha256,
      audioSha256: result.data.audio_sha256,
      transcriptSha256: result.data.transcript_sha256,
    };
  });
}

async function readOptionalFile(path: string): Promise<string | null> {
  try {
    return await readFile(path, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return null;
    }
    throw new FatalInputError(`Cannot read ${path}: ${describeError(err)}`, path);
  }
}

/**
 * Reads frozen test sets committed under `<out_dir>/<version>/`.
 *
 * When the version's summary is present it must parse as a compatible summary,
 * and the frozen set's bytes must match the checksum recorded there; a mismatch
 * means the set was edited after commit.
 */
export class DirectoryFrozenTestSetStore implements FrozenTestSetStore {
  constructor(private readonly outDir: string) {}

  async readFrozenTestSet(version: DatasetVersion): Promise<readonly FrozenTestEntry[]> {
    const paths = artifactPaths(versionDirectory(this.outDir, version.id), version.id);

    const content = await readOptionalFile(paths.frozenTestSet);
    if (content === null) {
      throw new FatalInputError(
        `Frozen test set for ${version.id} not found`,
        paths.frozenTestSet
      );
    }

    const summary = await readOptionalFile(paths.summary);
    if (summary !== null) {
      this.verifyChecksum(content, summary, paths.summary, version);
    }

    return parseFrozenTestSet(content, paths.frozenTestSet);
  }

  private verifyChecksum(
    content: string,
    summaryJson: string,
    summaryPath: string,
    version: DatasetVersion
  ): void {
    const summary = parseSummary(summaryJson, summaryPath);
    const actual = sha256OfText(content);
    if (actual !== summary.frozen_test_set_sha256) {
      throw new FatalInputError(
        `Frozen test set for ${version.id} was modified after commit ` +
          `(expected sha256 ${summary.frozen_test_set_sha256}, found ${actual})`,
        summaryPath
      );
    }
  }
}

/**
 * Frozen test sets held in memory, keyed by version id.
 */
export class InMemoryFrozenTestSetStore implements FrozenTestSetStore {
  private readonly sets = new Map<string, readonly FrozenTestEntry[]>();

  constructor(initial: Record<string, readonly FrozenTestEntry[]> = {}) {
    for (const [versionId, entries] of Object.entries(initial)) {
      this.sets.set(versionId, entries);
    }
  }

  async readFrozenTestSet(version: DatasetVersion): Promise<readonly FrozenTestEntry[]> {
    const entries = this.sets.get(version.id);
    if (entries === undefined) {
      throw new FatalInputError(`Frozen test set for ${version.id} not found`);
    }
    return entries;
  }
}
