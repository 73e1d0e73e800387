/**
 * End-to-end build tests against inventories written to temporary directories.
 *
 * Run: node --import tsx --test src/pipeline/build.test.ts
 *
 * Tests cover:
 *   1. Duplicate exclusion and artifact contents
 *   2. Determinism across output directories
 *   3. Lineage across versions: violations and monotonic growth
 *   4. Minimum checks and the small-split override
 *   5. Fatal errors: configuration, inventory, existing versions
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";
import { mkdir, readdir, readFile } from "node:fs/promises";
import { join } from "node:path";

import { parseSummary, recommend } from "../artifacts/index.js";
import { ConfigError, type BuildConfig } from "../config/index.js";
import { LineageViolation } from "../lineage/index.js";
import { parseCsv } from "../shared/csv.js";
import { ValidationFailure } from "../shared/errors.js";
import {
  distinctRows,
  makeTempDir,
  removeDir,
  sha256,
  writeInventory,
  type InventoryFixtureRow,
} from "../testing/fixtures.js";
import {
  EXIT_FATAL,
  EXIT_SUCCESS,
  EXIT_VALIDATION_FAILED,
  buildDataset,
  type BuildDependencies,
} from "./index.js";

const DEPS: BuildDependencies = {
  runId: "run-test",
  now: () => new Date("2026-01-15T09:30:00.000Z"),
  captureGit: false,
};

const NO_MINIMUMS: Partial<BuildConfig> = {
  minimums: {
    trainSamples: 0,
    trainDurationSec: 0,
    valSamples: 0,
    valDurationSec: 0,
    testSamples: 0,
    testDurationSec: 0,
  },
};

/** Only the train sample minimum is set */
const TRAIN_MINIMUM_100: Partial<BuildConfig> = {
  minimums: {
    trainSamples: 100,
    trainDurationSec: 0,
    valSamples: 0,
    valDurationSec: 0,
    testSamples: 0,
    testDurationSec: 0,
  },
};

async function withWorkspace(run: (root: string) => Promise<void>): Promise<void> {
  const root = await makeTempDir("build");
  try {
    await run(root);
  } finally {
    await removeDir(root);
  }
}

async function inventoryAt(root: string, name: string, rows: readonly InventoryFixtureRow[]): Promise<string> {
  const dir = join(root, name);
  await writeInventory(dir, rows);
  return dir;
}

async function frozenFileNames(outDir: string, versionId: string): Promise<string[]> {
  const content = await readFile(join(outDir, versionId, `test_set_${versionId}_frozen.csv`), "utf-8");
  return parseCsv(content).records.map((record) => record["file_name"] ?? "");
}

async function frozenPairs(outDir: string, versionId: string): Promise<string[]> {
  const content = await readFile(join(outDir, versionId, `test_set_${versionId}_frozen.csv`), "utf-8");
  return parseCsv(content).records.map((record) => record["pair_sha256"] ?? "");
}

// ═══════════════════════════════════════════════════════════════════════════
// EXCLUSION AND ARTIFACTS
// ═══════════════════════════════════════════════════════════════════════════

test("keeps one copy of each exact duplicate", async () => {
  await withWorkspace(async (root) => {
    const unique = distinctRows(5);
    const copies = unique.map((row, i) => ({ ...row, fileName: `copy_${i}.wav`, index: 5 + i }));
    const inventoryDir = await inventoryAt(root, "inventory", [...unique, ...copies]);
    const outDir = join(root, "out");

    const result = await buildDataset(
      { inventoryDir, outDir, datasetVersion: "v1", config: NO_MINIMUMS },
      DEPS
    );

    assert.equal(result.exitStatus, EXIT_SUCCESS);
    assert.equal(result.versionId, "v1");

    const excluded = parseCsv(await readFile(join(outDir, "v1", "dataset_v1_excluded.csv"), "utf-8"));
    assert.equal(excluded.records.length, 5);
    assert.ok(excluded.records.every((record) => record["excluded_reason"] === "duplicate_audio_transcript"));
    assert.deepEqual(
      excluded.records.map((record) => record["file_name"]),
      ["copy_0.wav", "copy_1.wav", "copy_2.wav", "copy_3.wav", "copy_4.wav"]
    );

    const manifest = parseCsv(await readFile(join(outDir, "v1", "dataset_v1_manifest.csv"), "utf-8"));
    assert.deepEqual(
      manifest.records.map((record) => record["file_name"]),
      ["clip_0.wav", "clip_1.wav", "clip_2.wav", "clip_3.wav", "clip_4.wav"]
    );
    assert.equal(manifest.records[0]?.["audio_path_resolved"], "../../inventory/audio/clip_0.wav");
    assert.equal(manifest.records[0]?.["transcript_len_words"], "3");
  });
});

test("records the build in a summary that parses back and checksums the frozen set", async () => {
  await withWorkspace(async (root) => {
    const inventoryDir = await inventoryAt(root, "inventory", distinctRows(30));
    const outDir = join(root, "out");

    const result = await buildDataset(
      { inventoryDir, outDir, datasetVersion: "v1", config: { ...NO_MINIMUMS, source: "clinic" } },
      DEPS
    );
    assert.equal(result.exitStatus, EXIT_SUCCESS);
    assert.ok(result.summary !== null && result.artifacts !== null);

    const summary = parseSummary(await readFile(result.artifacts.summary, "utf-8"), result.artifacts.summary);
    assert.deepEqual(summary, result.summary);
    assert.equal(summary.version_state, "frozen");
    assert.equal(summary.run.run_id, "run-test");
    assert.equal(summary.run.started_at, "2026-01-15T09:30:00.000Z");
    assert.equal(summary.parameters.source, "clinic");
    assert.deepEqual(
      [summary.splits.train.samples, summary.splits.val.samples, summary.splits.test.samples],
      [24, 3, 3]
    );
    assert.equal(summary.frozen_test_set_samples, 3);
    assert.equal(summary.lineage.new_test_identities, 3);
    assert.equal(
      summary.frozen_test_set_sha256,
      sha256(await readFile(result.artifacts.frozenTestSet, "utf-8"))
    );

    const report = await readFile(result.artifacts.report, "utf-8");
    assert.equal(report.split("\n")[0], "# Dataset v1");
    assert.ok(report.includes(`- SHA-256: \`${summary.frozen_test_set_sha256}\``));
  });
});

test("rows whose audio is missing are excluded as unreadable", async () => {
  await withWorkspace(async (root) => {
    const rows = distinctRows(10);
    const withMissing = rows.map((row, i) => (i === 3 ? { ...row, audio: null } : row));
    const inventoryDir = await inventoryAt(root, "inventory", withMissing);

    const result = await buildDataset(
      { inventoryDir, outDir: join(root, "out"), datasetVersion: "v1", config: NO_MINIMUMS },
      DEPS
    );

    assert.equal(result.exitStatus, EXIT_SUCCESS);
    assert.equal(result.summary?.exclusion_breakdown.audio_unreadable, 1);
    assert.equal(result.summary?.counts.kept, 9);
  });
});

test("identical inputs produce byte-identical manifests and frozen sets", async () => {
  await withWorkspace(async (root) => {
    const inventoryDir = await inventoryAt(root, "inventory", distinctRows(40));
    const first = join(root, "first");
    const second = join(root, "second");

    const a = await buildDataset({ inventoryDir, outDir: first, datasetVersion: "v1", config: NO_MINIMUMS }, DEPS);
    const b = await buildDataset(
      { inventoryDir, outDir: second, datasetVersion: "v1", config: NO_MINIMUMS },
      { ...DEPS, runId: "run-other", hashConcurrency: 1 }
    );
    assert.equal(a.exitStatus, EXIT_SUCCESS);
    assert.equal(b.exitStatus, EXIT_SUCCESS);

    for (const name of ["dataset_v1_manifest.csv", "test_set_v1_frozen.csv", "dataset_v1_excluded.csv"]) {
      assert.equal(
        await readFile(join(first, "v1", name), "utf-8"),
        await readFile(join(second, "v1", name), "utf-8"),
        name
      );
    }
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// LINEAGE
// ═══════════════════════════════════════════════════════════════════════════

test("a version that drops frozen test identities is rejected and writes nothing", async () => {
  await withWorkspace(async (root) => {
    const rows = distinctRows(40);
    const outDir = join(root, "out");
    const v1 = await buildDataset(
      { inventoryDir: await inventoryAt(root, "inv1", rows), outDir, datasetVersion: "v1", config: NO_MINIMUMS },
      DEPS
    );
    assert.equal(v1.exitStatus, EXIT_SUCCESS);

    const frozen = new Set(await frozenFileNames(outDir, "v1"));
    assert.equal(frozen.size, 4);
    const remaining = rows.filter((row) => !frozen.has(row.fileName));

    const v2 = await buildDataset(
      { inventoryDir: await inventoryAt(root, "inv2", remaining), outDir, datasetVersion: "v2", config: NO_MINIMUMS },
      DEPS
    );

    assert.equal(v2.exitStatus, EXIT_FATAL);
    assert.ok(v2.error instanceof LineageViolation);
    assert.equal(v2.error.missing.length, 4);
    assert.equal(v2.error.moved.length, 0);
    assert.deepEqual(await readdir(outDir), ["v1"]);
  });
});

test("frozen test identities carry forward into the next version", async () => {
  await withWorkspace(async (root) => {
    const rows = distinctRows(40);
    const outDir = join(root, "out");
    await buildDataset(
      { inventoryDir: await inventoryAt(root, "inv1", rows), outDir, datasetVersion: "v1", config: NO_MINIMUMS },
      DEPS
    );

    const grown = [...rows, ...distinctRows(20, 40)];
    const v2 = await buildDataset(
      { inventoryDir: await inventoryAt(root, "inv2", grown), outDir, datasetVersion: "v2", config: NO_MINIMUMS },
      DEPS
    );

    assert.equal(v2.exitStatus, EXIT_SUCCESS);
    const v1Pairs = await frozenPairs(outDir, "v1");
    const v2Pairs = new Set(await frozenPairs(outDir, "v2"));
    assert.ok(v1Pairs.every((pair) => v2Pairs.has(pair)));
    assert.equal(v2Pairs.size, 6);
    assert.deepEqual(v2.summary?.lineage, {
      prior_versions: ["v1"],
      inherited_test_identities: 4,
      new_test_identities: 2,
    });
  });
});

test("building v2 without a committed v1 fails", async () => {
  await withWorkspace(async (root) => {
    const result = await buildDataset(
      {
        inventoryDir: await inventoryAt(root, "inventory", distinctRows(10)),
        outDir: join(root, "out"),
        datasetVersion: "v2",
        config: NO_MINIMUMS,
      },
      DEPS
    );
    assert.equal(result.exitStatus, EXIT_FATAL);
    assert.equal(result.error?.message, "Frozen test set for v1 not found");
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// MINIMUM CHECKS
// ═══════════════════════════════════════════════════════════════════════════

test("a train split below its minimum fails with exit status 2 and writes nothing", async () => {
  await withWorkspace(async (root) => {
    const inventoryDir = await inventoryAt(root, "inventory", distinctRows(63));
    const outDir = await makeTempDir("build-out");
    try {
      const result = await buildDataset(
        { inventoryDir, outDir, datasetVersion: "v1", config: TRAIN_MINIMUM_100 },
        DEPS
      );

      assert.equal(result.exitStatus, EXIT_VALIDATION_FAILED);
      assert.ok(result.error instanceof ValidationFailure);
      assert.deepEqual(result.error.errors, ["Train split has 50 samples, minimum is 100"]);
      assert.deepEqual(await readdir(outDir), []);
    } finally {
      await removeDir(outDir);
    }
  });
});

test("the override commits the version and records the failed minimum as a warning", async () => {
  await withWorkspace(async (root) => {
    const inventoryDir = await inventoryAt(root, "inventory", distinctRows(63));
    const result = await buildDataset(
      {
        inventoryDir,
        outDir: join(root, "out"),
        datasetVersion: "v1",
        config: { ...TRAIN_MINIMUM_100, allowSmallSplits: true },
      },
      DEPS
    );

    assert.equal(result.exitStatus, EXIT_SUCCESS);
    assert.ok(result.summary !== null);
    assert.equal(result.summary.validation.overridden, true);
    assert.deepEqual(result.summary.validation.errors, []);
    assert.deepEqual(result.summary.validation.warnings, ["Train split has 50 samples, minimum is 100"]);
    assert.equal(recommend(result.summary), "NEEDS REVIEW");
  });
});

test("an inventory with nothing left after exclusion fails even with the override", async () => {
  await withWorkspace(async (root) => {
    const blank = distinctRows(5).map((row) => ({ ...row, transcript: "   " }));
    const result = await buildDataset(
      {
        inventoryDir: await inventoryAt(root, "inventory", blank),
        outDir: join(root, "out"),
        datasetVersion: "v1",
        config: { ...NO_MINIMUMS, allowSmallSplits: true },
      },
      DEPS
    );

    assert.equal(result.exitStatus, EXIT_VALIDATION_FAILED);
    assert.equal(result.error?.message, "No samples remain after exclusion");
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// FATAL ERRORS
// ═══════════════════════════════════════════════════════════════════════════

test("invalid configuration is fatal", async () => {
  await withWorkspace(async (root) => {
    const inventoryDir = await inventoryAt(root, "inventory", distinctRows(5));
    const outDir = join(root, "out");

    const badRatios = await buildDataset(
      { inventoryDir, outDir, datasetVersion: "v1", config: { trainRatio: 0.9 } },
      DEPS
    );
    assert.equal(badRatios.exitStatus, EXIT_FATAL);
    assert.ok(badRatios.error instanceof ConfigError);

    const badVersion = await buildDataset({ inventoryDir, outDir, datasetVersion: "x1" }, DEPS);
    assert.equal(badVersion.exitStatus, EXIT_FATAL);
    assert.equal(badVersion.versionId, null);
    assert.equal(badVersion.error?.name, "InvalidVersionError");
  });
});

test("a missing inventory table is fatal", async () => {
  await withWorkspace(async (root) => {
    const inventoryDir = join(root, "empty");
    await mkdir(inventoryDir);
    const result = await buildDataset({ inventoryDir, outDir: join(root, "out"), datasetVersion: "v1" }, DEPS);
    assert.equal(result.exitStatus, EXIT_FATAL);
    assert.equal(result.error?.name, "FatalInputError");
    assert.equal(result.versionId, "v1");
  });
});

test("rebuilding a committed version is fatal and leaves it untouched", async () => {
  await withWorkspace(async (root) => {
    const inventoryDir = await inventoryAt(root, "inventory", distinctRows(10));
    const outDir = join(root, "out");
    const options = { inventoryDir, outDir, datasetVersion: "v1", config: NO_MINIMUMS };

    const first = await buildDataset(options, DEPS);
    const manifest = await readFile(join(outDir, "v1", "dataset_v1_manifest.csv"), "utf-8");
    const second = await buildDataset(options, { ...DEPS, runId: "run-again" });

    assert.equal(first.exitStatus, EXIT_SUCCESS);
    assert.equal(second.exitStatus, EXIT_FATAL);
    assert.equal(second.error?.message, "Version v1 already exists; committed versions are never overwritten");
    assert.equal(await readFile(join(outDir, "v1", "dataset_v1_manifest.csv"), "utf-8"), manifest);
    assert.deepEqual(await readdir(outDir), ["v1"]);
  });
});
