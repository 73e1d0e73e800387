/**
 * Artifact rendering and commit tests.
 *
 * Run: node --import tsx --test src/artifacts/writer.test.ts
 *
 * Tests cover:
 *   1. Manifest and exclusion log rendering
 *   2. Frozen test set rendering
 *   3. Atomic commit of a version directory
 *   4. Summary format compatibility
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";
import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";

import { parseCsv } from "../shared/csv.js";
import { assignedSample, makeTempDir, removeDir } from "../testing/fixtures.js";
import {
  EXCLUSION_LOG_COLUMNS,
  MANIFEST_COLUMNS,
  artifactFileNames,
  isDestinationTaken,
  isSummaryFormatCompatible,
  manifestAudioPath,
  parseSummary,
  renderExclusionLog,
  renderFrozenTestSet,
  renderManifest,
  writeVersionArtifacts,
  type RenderedArtifacts,
} from "./index.js";

// ═══════════════════════════════════════════════════════════════════════════
// MANIFEST AND EXCLUSION LOG
// ═══════════════════════════════════════════════════════════════════════════

test("audio paths are written relative to the version directory", () => {
  assert.equal(manifestAudioPath("/data/out/v1", "/data/inv/audio/x.wav"), "../../inv/audio/x.wav");
});

test("renders manifest rows in the fixed column order", () => {
  const sample = assignedSample(0, "test", {
    audioPath: "/data/inv/audio/clip_0.wav",
    transcriptRaw: "hello, world",
    transcriptLenChars: 12,
    transcriptLenWords: 2,
  });
  const csv = renderManifest("v1", "/data/out/v1", [sample], { source: "clinic", recordingDevice: null });
  const [header, row, trailing] = csv.split("\n");

  assert.equal(header, MANIFEST_COLUMNS.join(","));
  assert.equal(
    row,
    [
      "v1",
      "clip_0.wav",
      "clinic",
      "0",
      "../../inv/audio/clip_0.wav",
      "2",
      '"(1, 3]"',
      '"hello, world"',
      "12",
      "2",
      "",
      "",
      sample.audioSha256,
      sample.transcriptSha256,
      sample.pairSha256,
      "test",
      "false",
    ].join(",")
  );
  assert.equal(trailing, "");
});

test("row-level source and device win over the defaults", () => {
  const sample = assignedSample(0, "train", { source: "home", recordingDevice: "tablet" });
  const csv = renderManifest("v1", "/data/out/v1", [sample], { source: "clinic", recordingDevice: "phone" });
  const [record] = parseCsv(csv).records;
  assert.equal(record?.["source"], "home");
  assert.equal(record?.["recording_device"], "tablet");
});

test("orders manifest rows by manifest_row_index", () => {
  const csv = renderManifest(
    "v1",
    "/data/out/v1",
    [assignedSample(7, "train"), assignedSample(2, "val"), assignedSample(4, "test")],
    { source: "clinic", recordingDevice: null }
  );
  const indices = csv
    .trimEnd()
    .split("\n")
    .slice(1)
    .map((line) => line.split(",")[3]);
  assert.deepEqual(indices, ["2", "4", "7"]);
});

test("renders the exclusion log with empty cells for missing digests", () => {
  const csv = renderExclusionLog([
    {
      fileName: "gone.wav",
      manifestRowIndex: 5,
      reason: "audio_unreadable",
      audioSha256: null,
      transcriptSha256: "t5",
    },
    {
      fileName: "blank.wav",
      manifestRowIndex: 1,
      reason: "blank_transcript",
      audioSha256: "a1",
      transcriptSha256: "t1",
    },
  ]);
  assert.equal(
    csv,
    [
      EXCLUSION_LOG_COLUMNS.join(","),
      "blank.wav,1,blank_transcript,a1,t1",
      "gone.wav,5,audio_unreadable,,t5",
      "",
    ].join("\n")
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// FROZEN TEST SET
// ═══════════════════════════════════════════════════════════════════════════

test("the frozen test set holds only test samples, ordered by pair_sha256", () => {
  const samples = [
    assignedSample(0, "test"),
    assignedSample(1, "train"),
    assignedSample(2, "test"),
    assignedSample(3, "val"),
    assignedSample(4, "test"),
  ];
  const lines = renderFrozenTestSet(samples).trimEnd().split("\n");
  const pairs = lines.slice(1).map((line) => line.split(",")[1]);
  const expected = [samples[0], samples[2], samples[4]].map((s) => s?.pairSha256).sort();
  assert.deepEqual(pairs, expected);
});

// ═══════════════════════════════════════════════════════════════════════════
// COMMIT
// ═══════════════════════════════════════════════════════════════════════════

const ARTIFACTS: RenderedArtifacts = {
  manifest: "manifest\n",
  excluded: "excluded\n",
  frozenTestSet: "frozen\n",
  summary: "{}\n",
  report: "# report\n",
};

test("commits every artifact and leaves no staging directory", async () => {
  const outDir = await makeTempDir("writer");
  try {
    const paths = await writeVersionArtifacts(ARTIFACTS, { outDir, versionId: "v1", runId: "run-1" });

    assert.deepEqual(await readdir(outDir), ["v1"]);
    assert.deepEqual(
      (await readdir(join(outDir, "v1"))).sort(),
      Object.values(artifactFileNames("v1")).sort()
    );
    assert.equal(await readFile(paths.frozenTestSet, "utf-8"), "frozen\n");
  } finally {
    await removeDir(outDir);
  }
});

test("never overwrites a committed version", async () => {
  const outDir = await makeTempDir("writer");
  try {
    await writeVersionArtifacts(ARTIFACTS, { outDir, versionId: "v1", runId: "run-1" });
    await assert.rejects(
      writeVersionArtifacts({ ...ARTIFACTS, manifest: "changed\n" }, { outDir, versionId: "v1", runId: "run-2" }),
      {
        name: "FatalInputError",
        message: "Version v1 already exists; committed versions are never overwritten",
      }
    );
    assert.equal(await readFile(join(outDir, "v1", "dataset_v1_manifest.csv"), "utf-8"), "manifest\n");
  } finally {
    await removeDir(outDir);
  }
});

test("two builds committing the same version leave exactly one", async () => {
  const outDir = await makeTempDir("writer");
  try {
    const results = await Promise.allSettled([
      writeVersionArtifacts(ARTIFACTS, { outDir, versionId: "v1", runId: "run-1" }),
      writeVersionArtifacts(ARTIFACTS, { outDir, versionId: "v1", runId: "run-2" }),
    ]);

    const rejected = results.filter((result) => result.status === "rejected");
    assert.equal(rejected.length, 1);
    const [loser] = rejected;
    assert.ok(loser?.status === "rejected");
    assert.equal(
      loser.reason instanceof Error ? loser.reason.message : String(loser.reason),
      "Version v1 already exists; committed versions are never overwritten"
    );
    assert.deepEqual(await readdir(outDir), ["v1"]);
  } finally {
    await removeDir(outDir);
  }
});

test("rename collisions are recognized by error code", () => {
  const withCode = (code: string): Error => Object.assign(new Error(code), { code });
  assert.equal(isDestinationTaken(withCode("ENOTEMPTY")), true);
  assert.equal(isDestinationTaken(withCode("EEXIST")), true);
  assert.equal(isDestinationTaken(withCode("EACCES")), false);
  assert.equal(isDestinationTaken("ENOTEMPTY"), false);
});

// ═══════════════════════════════════════════════════════════════════════════
// SUMMARY FORMAT
// ═══════════════════════════════════════════════════════════════════════════

test("accepts summaries of the same major format version", () => {
  assert.equal(isSummaryFormatCompatible("1.0"), true);
  assert.equal(isSummaryFormatCompatible("1.7"), true);
  assert.equal(isSummaryFormatCompatible("2.0"), false);
});

test("rejects malformed summaries", () => {
  assert.throws(() => parseSummary("{", "summary.json"), /^FatalInputError: Summary is not valid JSON/);
  assert.throws(() => parseSummary("{}", "summary.json"), /^FatalInputError: Invalid summary: /);
});
