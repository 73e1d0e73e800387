/**
 * Machine-readable version summary.
 *
 * The summary is the audit record of a build: every parameter that shaped the
 * dataset, every count a reviewer would check, and the checksum of the frozen
 * test set that later versions verify before trusting it. Keys are snake_case
 * to match the CSV artifacts.
 *
 * SUMMARY_FORMAT_VERSION changes on any incompatible change to the shape;
 * loaders accept summaries with the same major version only.
 */

import { z } from "zod";
import type { BuildConfig } from "../config/build/index.js";
import type { ExclusionResult } from "../exclusion/index.js";
import { SHA256_HEX_PATTERN } from "../hashing/index.js";
import type { LeakageReport } from "../leakage/index.js";
import type { VersionState } from "../lineage/index.js";
import { FatalInputError, describeError } from "../shared/errors.js";
import { binProportions, type DurationBin, type SplitStatistics } from "../splitting/index.js";
import type { Split } from "../types/index.js";
import type { SplitValidationResult } from "../validation/index.js";
import type { RunMetadata, ToolVersions } from "./metadata.js";

export const SUMMARY_FORMAT_VERSION = "1.0";

const count = z.number().int().min(0);
const sha256Hex = z.string().regex(SHA256_HEX_PATTERN);

const SplitSummarySchema = z
  .object({
    samples: count,
    duration_sec: z.number().min(0),
    duration_hours: z.number().min(0),
    /** Sample count per duration bin label */
    bin_counts: z.record(z.string(), count),
    /** Share of each bin within the split, 0..1 */
    bin_proportions: z.record(z.string(), z.number().min(0).max(1)),
  })
  .strict();

export const DatasetSummarySchema = z
  .object({
    summary_format_version: z.string().regex(/^\d+\.\d+$/),
    dataset_version: z.string().regex(/^v[1-9]\d*$/),
    version_state: z.enum(["building", "validated", "frozen"]),

    run: z
      .object({
        run_id: z.string().min(1),
        started_at: z.string().datetime(),
        hostname: z.string().optional(),
        git: z
          .object({
            commit_sha: z.string(),
            commit_short: z.string(),
            branch: z.string(),
            is_dirty: z.boolean(),
            commit_date: z.string(),
          })
          .strict()
          .optional(),
      })
      .strict(),

    tool_versions: z.object({ engine: z.string(), node: z.string() }).strict(),

    parameters: z
      .object({
        seed: z.number().int(),
        train_ratio: z.number(),
        val_ratio: z.number(),
        test_ratio: z.number(),
        duration_bin_edges: z.array(z.number()),
        duration_bins: z.array(z.string()),
        allow_small_splits: z.boolean(),
        skip_temporal_check: z.boolean(),
        session_gap_ms: z.number(),
        min_timestamp_coverage: z.number(),
        balance_threshold_pct: z.number(),
        minimums: z
          .object({
            train_samples: count,
            train_duration_sec: z.number(),
            val_samples: count,
            val_duration_sec: z.number(),
            test_samples: count,
            test_duration_sec: z.number(),
          })
          .strict(),
        source: z.string(),
        recording_device: z.string().nullable(),
      })
      .strict(),

    counts: z
      .object({
        inventory_rows: count,
        excluded: count,
        kept: count,
        /** Kept samples whose audio also appears with another transcript */
        duplicate_audio_flagged: count,
      })
      .strict(),

    exclusion_breakdown: z
      .object({
        audio_unreadable: count,
        zero_or_null_duration: count,
        blank_transcript: count,
        duplicate_audio_transcript: count,
      })
      .strict(),

    splits: z
      .object({ train: SplitSummarySchema, val: SplitSummarySchema, test: SplitSummarySchema })
      .strict(),

    leakage: z
      .object({
        temporal_check_status: z.enum([
          "completed",
          "skipped_insufficient_timestamps",
          "skipped_by_user",
        ]),
        timestamp_coverage_pct: z.number().min(0).max(100),
        total_clusters: count.nullable(),
        clusters_crossing_splits: count.nullable(),
        clusters_crossing_train_test: count.nullable(),
      })
      .strict(),

    validation: z
      .object({
        passed: z.boolean(),
        samples_check_passed: z.boolean(),
        duration_check_passed: z.boolean(),
        distribution_balance_passed: z.boolean(),
        overridden: z.boolean(),
        errors: z.array(z.string()),
        warnings: z.array(z.string()),
      })
      .strict(),

    lineage: z
      .object({
        prior_versions: z.array(z.string()),
        /** Test identities carried over from prior frozen sets */
        inherited_test_identities: count,
        /** Test identities first frozen by this version */
        new_test_identities: count,
      })
      .strict(),

    frozen_test_set_samples: count,
    frozen_test_set_sha256: sha256Hex,
  })
  .strict();

export type DatasetSummary = z.infer<typeof DatasetSummarySchema>;

export interface SummaryInput {
  readonly versionId: string;
  readonly state: VersionState;
  readonly run: RunMetadata;
  readonly tools: ToolVersions;
  readonly config: BuildConfig;
  readonly bins: readonly DurationBin[];
  readonly inventoryRows: number;
  readonly exclusion: ExclusionResult;
  readonly duplicateAudioFlagged: number;
  readonly statistics: SplitStatistics;
  readonly leakage: LeakageReport;
  readonly validation: SplitValidationResult;
  readonly lineage: {
    readonly priorVersions: readonly string[];
    readonly inheritedTestIdentities: number;
    readonly newTestIdentities: number;
  };
  readonly frozenTestSetSamples: number;
  readonly frozenTestSetSha256: string;
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function splitSummary(statistics: SplitStatistics, split: Split): DatasetSummary["splits"][Split] {
  const proportions: Record<string, number> = {};
  for (const [label, share] of Object.entries(binProportions(statistics, split))) {
    proportions[label] = round(share, 4);
  }
  return {
    samples: statistics.counts[split],
    duration_sec: round(statistics.durationsSec[split], 3),
    duration_hours: round(statistics.durationsHours[split], 4),
    bin_counts: { ...statistics.binCounts[split] },
    bin_proportions: proportions,
  };
}

export function buildSummary(input: SummaryInput): DatasetSummary {
  const { config, run, leakage, validation } = input;

  return {
    summary_format_version: SUMMARY_FORMAT_VERSION,
    dataset_version: input.versionId,
    version_state: input.state,
    run: {
      run_id: run.runId,
      started_at: run.startedAt,
      ...(run.hostname !== undefined && { hostname: run.hostname }),
      ...(run.git !== undefined && {
        git: {
          commit_sha: run.git.commitSha,
          commit_short: run.git.commitShort,
          branch: run.git.branch,
          is_dirty: run.git.isDirty,
          commit_date: run.git.commitDate,
        },
      }),
    },
    tool_versions: { engine: input.tools.engine, node: input.tools.node },
    parameters: {
      seed: config.seed,
      train_ratio: config.trainRatio,
      val_ratio: config.valRatio,
      test_ratio: config.testRatio,
      duration_bin_edges: [...config.durationBinEdges],
      duration_bins: input.bins.map((bin) => bin.label),
      allow_small_splits: config.allowSmallSplits,
      skip_temporal_check: config.skipTemporalCheck,
      session_gap_ms: config.sessionGapMs,
      min_timestamp_coverage: config.minTimestampCoverage,
      balance_threshold_pct: config.balanceThresholdPct,
      minimums: {
        train_samples: config.minimums.trainSamples,
        train_duration_sec: config.minimums.trainDurationSec,
        val_samples: config.minimums.valSamples,
        val_duration_sec: config.minimums.valDurationSec,
        test_samples: config.minimums.testSamples,
        test_duration_sec: config.minimums.testDurationSec,
      },
      source: config.source,
      recording_device: config.recordingDevice,
    },
    counts: {
      inventory_rows: input.inventoryRows,
      excluded: input.exclusion.excluded.length,
      kept: input.exclusion.kept.length,
      duplicate_audio_flagged: input.duplicateAudioFlagged,
    },
    exclusion_breakdown: { ...input.exclusion.breakdown },
    splits: {
      train: splitSummary(input.statistics, "train"),
      val: splitSummary(input.statistics, "val"),
      test: splitSummary(input.statistics, "test"),
    },
    leakage: {
      temporal_check_status: leakage.status,
      timestamp_coverage_pct: leakage.timestampCoveragePct,
      total_clusters: leakage.totalClusters,
      clusters_crossing_splits: leakage.clustersCrossingSplits,
      clusters_crossing_train_test: leakage.clustersCrossingTrainTest,
    },
    validation: {
      passed: validation.passed,
      samples_check_passed: validation.samplesCheckPassed,
      duration_check_passed: validation.durationCheckPassed,
      distribution_balance_passed: validation.distributionBalancePassed,
      overridden: validation.overridden,
      errors: [...validation.errors],
      warnings: [...validation.warnings],
    },
    lineage: {
      prior_versions: [...input.lineage.priorVersions],
      inherited_test_identities: input.lineage.inheritedTestIdentities,
      new_test_identities: input.lineage.newTestIdentities,
    },
    frozen_test_set_samples: input.frozenTestSetSamples,
    frozen_test_set_sha256: input.frozenTestSetSha256,
  };
}

export function serializeSummary(summary: DatasetSummary): string {
  return JSON.stringify(summary, null, 2) + "\n";
}

/**
 * Accept only summaries with the same major format version.
 */
export function isSummaryFormatCompatible(version: string): boolean {
  const [major] = version.split(".");
  const [currentMajor] = SUMMARY_FORMAT_VERSION.split(".");
  return major === currentMajor;
}

/**
 * Parse and validate a summary document.
 *
 * @throws FatalInputError if the JSON is malformed, fails the schema or has an
 *   incompatible format version
 */
export function parseSummary(json: string, source: string): DatasetSummary {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err) {
    throw new FatalInputError(`Summary is not valid JSON: ${describeError(err)}`, source);
  }

  const result = DatasetSummarySchema.safeParse(parsed);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new FatalInputError(`Invalid summary: ${details}`, source);
  }

  if (!isSummaryFormatCompatible(result.data.summary_format_version)) {
    throw new FatalInputError(
      `Incompatible summary format ${result.data.summary_format_version} ` +
        `(current: ${SUMMARY_FORMAT_VERSION})`,
      source
    );
  }

  return result.data;
}
