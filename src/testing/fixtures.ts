/**
 * Test fixtures: sample records at each pipeline stage and on-disk
 * inventories in temporary directories.
 */

import { createHash } from "node:crypto";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { DatasetSummary } from "../artifacts/summary.js";
import { stringifyCsv } from "../shared/csv.js";
import type {
  AssignedSample,
  BinnedSample,
  HashedSample,
  InventoryRow,
  KeptSample,
  Split,
} from "../types/index.js";

export function sha256(text: string): string {
  return createHash("sha256").update(text, "utf8").digest("hex");
}

export interface Identity {
  audioSha256: string;
  transcriptSha256: string;
  pairSha256: string;
}

/**
 * Identity of a sample whose audio bytes are `audio` and transcript `text`.
 */
export function identityOf(audio: string, text: string): Identity {
  const audioSha256 = sha256(audio);
  const transcriptSha256 = sha256(text);
  return { audioSha256, transcriptSha256, pairSha256: sha256(audioSha256 + transcriptSha256) };
}

export interface SampleContent {
  /** Audio bytes (default: "audio-<index>") */
  audio?: string;
  /** Transcript (default: "transcript <index>") */
  text?: string;
}

export function inventoryRow(index: number, overrides: Partial<InventoryRow> = {}): InventoryRow {
  const text = overrides.transcriptRaw ?? `transcript ${index}`;
  return {
    manifestRowIndex: index,
    fileName: `clip_${index}.wav`,
    audioPath: `/data/inventory/audio/clip_${index}.wav`,
    transcriptRaw: text,
    audioExists: true,
    audioReadOk: true,
    durationSec: 2,
    transcriptIsBlank: false,
    timestampMs: null,
    transcriptLenChars: text.length,
    transcriptLenWords: text.split(/\s+/).filter((word) => word.length > 0).length,
    source: null,
    recordingDevice: null,
    ...overrides,
  };
}

export function hashedSample(
  index: number,
  content: SampleContent = {},
  overrides: Partial<HashedSample> = {}
): HashedSample {
  const text = content.text ?? `transcript ${index}`;
  const identity = identityOf(content.audio ?? `audio-${index}`, text);
  return {
    ...inventoryRow(index, { transcriptRaw: text }),
    ...identity,
    hashError: null,
    ...overrides,
  };
}

export function keptSample(
  index: number,
  content: SampleContent = {},
  overrides: Partial<KeptSample> = {}
): KeptSample {
  const hashed = hashedSample(index, content);
  const identity = identityOf(content.audio ?? `audio-${index}`, hashed.transcriptRaw);
  return {
    ...hashed,
    ...identity,
    durationSec: 2,
    duplicateAudioFlag: false,
    ...overrides,
  };
}

export function binnedSample(
  index: number,
  durationBin: string,
  content: SampleContent = {},
  overrides: Partial<BinnedSample> = {}
): BinnedSample {
  return { ...keptSample(index, content), durationBin, ...overrides };
}

export function assignedSample(
  index: number,
  split: Split,
  overrides: Partial<AssignedSample> = {}
): AssignedSample {
  return { ...binnedSample(index, "(1, 3]"), split, pinned: false, ...overrides };
}

export async function makeTempDir(prefix: string): Promise<string> {
  return mkdtemp(join(tmpdir(), `${prefix}-`));
}

export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

export interface InventoryFixtureRow {
  fileName: string;
  /** Audio bytes; null leaves the file absent */
  audio: string | null;
  transcript: string;
  durationSec: number | null;
  timestampMs?: number;
  /** Explicit index (default: position in the list) */
  index?: number;
}

export const INVENTORY_FIXTURE_COLUMNS = [
  "manifest_row_index",
  "file_name",
  "audio_path_resolved",
  "transcript_raw",
  "audio_exists",
  "audio_read_ok",
  "duration_sec",
  "transcript_is_blank",
  "timestamp_ms",
] as const;

/**
 * Write audio files under `<dir>/audio/` and an inventory_files.csv that
 * refers to them by relative path.
 */
export async function writeInventory(dir: string, rows: readonly InventoryFixtureRow[]): Promise<void> {
  await mkdir(join(dir, "audio"), { recursive: true });
  for (const row of rows) {
    if (row.audio !== null) {
      await writeFile(join(dir, "audio", row.fileName), row.audio, "utf-8");
    }
  }
  const csv = stringifyCsv(
    INVENTORY_FIXTURE_COLUMNS,
    rows.map((row, i) => ({
      manifest_row_index: row.index ?? i,
      file_name: row.fileName,
      audio_path_resolved: `audio/${row.fileName}`,
      transcript_raw: row.transcript,
      audio_exists: row.audio !== null,
      audio_read_ok: row.audio !== null,
      duration_sec: row.durationSec,
      transcript_is_blank: row.transcript.trim() === "",
      timestamp_ms: row.timestampMs,
    }))
  );
  await writeFile(join(dir, "inventory_files.csv"), csv, "utf-8");
}

/**
 * `count` distinct, valid inventory rows named clip_<offset+i>.wav.
 */
export function distinctRows(count: number, offset = 0, durationSec = 2): InventoryFixtureRow[] {
  return Array.from({ length: count }, (_, i) => ({
    fileName: `clip_${offset + i}.wav`,
    audio: `audio bytes ${offset + i}`,
    transcript: `utterance number ${offset + i}`,
    durationSec,
    index: offset + i,
  }));
}

function emptySplitSummary(): DatasetSummary["splits"][Split] {
  return { samples: 0, duration_sec: 0, duration_hours: 0, bin_counts: {}, bin_proportions: {} };
}

/**
 * A summary that passes the summary schema, recording the given frozen set
 * checksum. Counts are placeholders; only the shape and checksum matter.
 */
export function committedSummary(versionId: string, frozenTestSetSha256: string): DatasetSummary {
  return {
    summary_format_version: "1.0",
    dataset_version: versionId,
    version_state: "frozen",
    run: { run_id: "test-run", started_at: "2024-01-01T00:00:00.000Z" },
    tool_versions: { engine: "0.0.0", node: "v20.0.0" },
    parameters: {
      seed: 42,
      train_ratio: 0.8,
      val_ratio: 0.1,
      test_ratio: 0.1,
      duration_bin_edges: [],
      duration_bins: ["(0, inf]"],
      allow_small_splits: false,
      skip_temporal_check: false,
      session_gap_ms: 300000,
      min_timestamp_coverage: 0.5,
      balance_threshold_pct: 20,
      minimums: {
        train_samples: 0,
        train_duration_sec: 0,
        val_samples: 0,
        val_duration_sec: 0,
        test_samples: 0,
        test_duration_sec: 0,
      },
      source: "test",
      recording_device: null,
    },
    counts: { inventory_rows: 0, excluded: 0, kept: 0, duplicate_audio_flagged: 0 },
    exclusion_breakdown: {
      audio_unreadable: 0,
      zero_or_null_duration: 0,
      blank_transcript: 0,
      duplicate_audio_transcript: 0,
    },
    splits: { train: emptySplitSummary(), val: emptySplitSummary(), test: emptySplitSummary() },
    leakage: {
      temporal_check_status: "skipped_by_user",
      timestamp_coverage_pct: 0,
      total_clusters: null,
      clusters_crossing_splits: null,
      clusters_crossing_train_test: null,
    },
    validation: {
      passed: true,
      samples_check_passed: true,
      duration_check_passed: true,
      distribution_balance_passed: true,
      overridden: false,
      errors: [],
      warnings: [],
    },
    lineage: { prior_versions: [], inherited_test_identities: 0, new_test_identities: 0 },
    frozen_test_set_samples: 0,
    frozen_test_set_sha256: frozenTestSetSha256,
  };
}
