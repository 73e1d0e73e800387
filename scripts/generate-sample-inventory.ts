#!/usr/bin/env node
/**
 * Writes a synthetic inventory for trying the builder locally: placeholder
 * audio files plus an inventory_files.csv that points at them. A few rows are
 * deliberately broken (exact duplicates, blank transcripts, missing audio,
 * zero durations) so every exclusion rule shows up in the output.
 *
 * Usage:
 *   npx tsx scripts/generate-sample-inventory.ts [--out_dir data/sample] [--count 400]
 */

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { parseArgs } from "node:util";
import { INVENTORY_FILE_NAME } from "../src/inventory/index.js";
import { stringifyCsv } from "../src/shared/csv.js";

const COLUMNS = [
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

const WORDS = ["open", "close", "the", "door", "window", "please", "now", "later", "light", "music"];

// Small deterministic PRNG so repeated runs write the same inventory
function mulberry32(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function pick<T>(items: readonly T[], random: () => number): T {
  const item = items[Math.floor(random() * items.length)];
  if (item === undefined) {
    throw new Error("Cannot pick from an empty list");
  }
  return item;
}

async function generate(outDir: string, count: number): Promise<void> {
  const random = mulberry32(7);
  const audioDir = join(outDir, "audio");
  await mkdir(audioDir, { recursive: true });

  const rows: Record<string, string | number | boolean>[] = [];
  let timestamp = Date.UTC(2024, 0, 1);

  for (let i = 0; i < count; i++) {
    const fileName = `clip_${String(i).padStart(5, "0")}.wav`;
    const words = Array.from({ length: 2 + Math.floor(random() * 5) }, () => pick(WORDS, random));
    let transcript = words.join(" ");
    let audioBytes = `synthetic-audio-${i}-${random().toString(36)}`;
    let duration = Math.round((0.5 + random() * 40) * 100) / 100;
    let audioExists = true;

    // Every 25th row repeats the previous clip exactly
    const previous = rows[rows.length - 1];
    if (i % 25 === 24 && previous !== undefined) {
      transcript = String(previous["transcript_raw"]);
      audioBytes = `synthetic-audio-${i - 1}`;
      duration = Number(previous["duration_sec"]);
    }
    if (i % 25 === 23) {
      audioBytes = `synthetic-audio-${i}`;
    }
    if (i % 97 === 5) transcript = "   ";
    if (i % 89 === 7) duration = 0;
    if (i % 83 === 11) audioExists = false;

    if (audioExists) {
      await writeFile(join(audioDir, fileName), audioBytes, "utf-8");
    }

    // Sessions of a few clips, ten seconds apart, separated by longer pauses
    timestamp += random() < 0.2 ? 5 * 60_000 : 10_000;

    rows.push({
      manifest_row_index: i,
      file_name: fileName,
      audio_path_resolved: `audio/${fileName}`,
      transcript_raw: transcript,
      audio_exists: audioExists,
      audio_read_ok: audioExists,
      duration_sec: duration,
      transcript_is_blank: transcript.trim() === "",
      timestamp_ms: timestamp,
    });
  }

  const csvPath = join(outDir, INVENTORY_FILE_NAME);
  await writeFile(csvPath, stringifyCsv(COLUMNS, rows), "utf-8");
  console.log(`Wrote ${count} inventory rows to ${csvPath}`);
}

const { values } = parseArgs({
  options: {
    out_dir: { type: "string", default: "data/sample" },
    count: { type: "string", default: "400" },
  },
});

const count = parseInt(values.count ?? "400", 10);
if (!Number.isInteger(count) || count < 1) {
  console.error(`--count must be a positive integer, got: ${values.count}`);
  process.exit(1);
}

generate(values.out_dir ?? "data/sample", count).catch((err: unknown) => {
  console.error("Sample inventory generation failed:", err);
  process.exit(1);
});
