/**
 * Human-readable report rendered from the summary.
 *
 * Everything in the report comes from the summary document, so the two can
 * never disagree.
 */

import { SPLITS, type Split } from "../types/index.js";
import type { DatasetSummary } from "./summary.js";

export type Recommendation = "READY FOR TRAINING" | "NEEDS REVIEW";

/**
 * A version is ready when validation passed without override, no balance
 * warning was raised and no session crosses train and test.
 */
export function recommend(summary: DatasetSummary): Recommendation {
  const { validation, leakage } = summary;
  const clean =
    validation.passed &&
    !validation.overridden &&
    validation.warnings.length === 0 &&
    (leakage.clusters_crossing_train_test ?? 0) === 0;
  return clean ? "READY FOR TRAINING" : "NEEDS REVIEW";
}

function pct(part: number, whole: number): string {
  return whole === 0 ? "0.0%" : `${((part / whole) * 100).toFixed(1)}%`;
}

function passFail(passed: boolean): string {
  return passed ? "PASS" : "FAIL";
}

function splitTitle(split: Split): string {
  return split.charAt(0).toUpperCase() + split.slice(1);
}

function cleaningSection(summary: DatasetSummary): string[] {
  const { counts, exclusion_breakdown: breakdown } = summary;
  const lines = [
    "## Data cleaning",
    "",
    `- Inventory rows: ${counts.inventory_rows}`,
    `- Kept: ${counts.kept} (${pct(counts.kept, counts.inventory_rows)})`,
    `- Excluded: ${counts.excluded} (${pct(counts.excluded, counts.inventory_rows)})`,
    "",
    "| Reason | Rows |",
    "| --- | ---: |",
  ];
  for (const [reason, rows] of Object.entries(breakdown)) {
    lines.push(`| ${reason} | ${rows} |`);
  }
  return lines;
}

function splitSection(summary: DatasetSummary): string[] {
  const kept = summary.counts.kept;
  const lines = [
    "## Splits",
    "",
    "| Split | Samples | Share | Duration (h) |",
    "| --- | ---: | ---: | ---: |",
  ];
  for (const split of SPLITS) {
    const entry = summary.splits[split];
    lines.push(
      `| ${splitTitle(split)} | ${entry.samples} | ${pct(entry.samples, kept)} | ${entry.duration_hours.toFixed(2)} |`
    );
  }
  return lines;
}

function distributionSection(summary: DatasetSummary): string[] {
  const lines = [
    "## Duration distribution",
    "",
    "| Bin | Train | Val | Test |",
    "| --- | ---: | ---: | ---: |",
  ];
  for (const label of summary.parameters.duration_bins) {
    const cells = SPLITS.map((split) => {
      const share = summary.splits[split].bin_proportions[label] ?? 0;
      return `${(share * 100).toFixed(1)}%`;
    });
    lines.push(`| ${label} | ${cells.join(" | ")} |`);
  }
  return lines;
}

function qualitySection(summary: DatasetSummary): string[] {
  const { validation, leakage, counts } = summary;
  const lines = [
    "## Quality checks",
    "",
    `- Sample minimums: ${passFail(validation.samples_check_passed)}`,
    `- Duration minimums: ${passFail(validation.duration_check_passed)}`,
    `- Distribution balance: ${passFail(validation.distribution_balance_passed)}`,
    `- Override applied: ${validation.overridden ? "yes" : "no"}`,
    `- Duplicate audio with different transcripts: ${counts.duplicate_audio_flagged}`,
    `- Temporal check: ${leakage.temporal_check_status} (timestamp coverage ${leakage.timestamp_coverage_pct}%)`,
  ];
  if (leakage.temporal_check_status === "completed") {
    lines.push(
      `- Sessions: ${leakage.total_clusters ?? 0}, crossing splits: ${leakage.clusters_crossing_splits ?? 0}, ` +
        `crossing train/test: ${leakage.clusters_crossing_train_test ?? 0}`
    );
  }
  if (validation.errors.length > 0) {
    lines.push("", "### Errors", "");
    lines.push(...validation.errors.map((error) => `- ${error}`));
  }
  if (validation.warnings.length > 0) {
    lines.push("", "### Warnings", "");
    lines.push(...validation.warnings.map((warning) => `- ${warning}`));
  }
  return lines;
}

function testLockSection(summary: DatasetSummary): string[] {
  const { lineage } = summary;
  const priors = lineage.prior_versions.length > 0 ? lineage.prior_versions.join(", ") : "none";
  return [
    "## Frozen test set",
    "",
    `- Samples: ${summary.frozen_test_set_samples}`,
    `- SHA-256: \`${summary.frozen_test_set_sha256}\``,
    `- Prior versions: ${priors}`,
    `- Inherited identities: ${lineage.inherited_test_identities}`,
    `- New identities: ${lineage.new_test_identities}`,
  ];
}

export function renderReport(summary: DatasetSummary): string {
  const header = [
    `# Dataset ${summary.dataset_version}`,
    "",
    `- Run: ${summary.run.run_id} (${summary.run.started_at})`,
    `- State: ${summary.version_state}`,
    `- Seed: ${summary.parameters.seed}`,
    `- Ratios: ${summary.parameters.train_ratio} / ${summary.parameters.val_ratio} / ${summary.parameters.test_ratio}`,
    `- Recommendation: **${recommend(summary)}**`,
  ];

  const sections = [
    header,
    cleaningSection(summary),
    splitSection(summary),
    distributionSection(summary),
    qualitySection(summary),
    testLockSection(summary),
  ];

  return sections.map((lines) => lines.join("\n")).join("\n\n") + "\n";
}
