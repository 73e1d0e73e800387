/**
 * Split adequacy validation.
 *
 * Two families of checks:
 *
 * 1. MINIMUM SIZE: each split needs enough samples and enough audio to give
 *    stable metrics. A failure blocks the build unless `allowSmallSplits` is
 *    set, in which case every failure is downgraded to a warning and the
 *    result is marked as overridden.
 *
 * 2. DISTRIBUTION BALANCE: for every duration bin, the bin's share of val and
 *    of test is compared with its share of train. A relative deviation above
 *    the threshold is reported as a warning; balance findings never block.
 */

import type { SplitMinimums } from "../config/build/index.js";
import { binProportions, type SplitStatistics } from "../splitting/index.js";
import type { Split } from "../types/index.js";

export type CheckMetric = "samples" | "duration_sec";

export interface SplitCheck {
  readonly split: Split;
  readonly metric: CheckMetric;
  readonly actual: number;
  readonly minimum: number;
  readonly passed: boolean;
}

export interface SplitValidationResult {
  /** False only when a minimum check failed without override */
  readonly passed: boolean;
  readonly samplesCheckPassed: boolean;
  readonly durationCheckPassed: boolean;
  readonly distributionBalancePassed: boolean;
  /** Minimum checks failed but were downgraded to warnings */
  readonly overridden: boolean;
  readonly checks: readonly SplitCheck[];
  readonly errors: readonly string[];
  readonly warnings: readonly string[];
}

export interface SplitValidationOptions {
  minimums: SplitMinimums;
  balanceThresholdPct: number;
  allowSmallSplits: boolean;
}

function label(split: Split): string {
  return split.charAt(0).toUpperCase() + split.slice(1);
}

function minutes(seconds: number): string {
  return (seconds / 60).toFixed(1);
}

function pct(proportion: number): string {
  return (proportion * 100).toFixed(1);
}

function minimumsFor(minimums: SplitMinimums, split: Split): { samples: number; durationSec: number } {
  switch (split) {
    case "train":
      return { samples: minimums.trainSamples, durationSec: minimums.trainDurationSec };
    case "val":
      return { samples: minimums.valSamples, durationSec: minimums.valDurationSec };
    case "test":
      return { samples: minimums.testSamples, durationSec: minimums.testDurationSec };
  }
}

const SPLIT_ORDER: readonly Split[] = ["train", "val", "test"];

/**
 * Run the minimum sample and duration checks for every split.
 */
export function checkSplitMinimums(
  statistics: SplitStatistics,
  minimums: SplitMinimums
): { checks: SplitCheck[]; sampleErrors: string[]; durationErrors: string[] } {
  const checks: SplitCheck[] = [];
  const sampleErrors: string[] = [];
  const durationErrors: string[] = [];

  for (const split of SPLIT_ORDER) {
    const required = minimumsFor(minimums, split);
    const count = statistics.counts[split];
    const duration = statistics.durationsSec[split];

    const samplesPassed = count >= required.samples;
    checks.push({ split, metric: "samples", actual: count, minimum: required.samples, passed: samplesPassed });
    if (!samplesPassed) {
      sampleErrors.push(`${label(split)} split has ${count} samples, minimum is ${required.samples}`);
    }

    const durationPassed = duration >= required.durationSec;
    checks.push({
      split,
      metric: "duration_sec",
      actual: duration,
      minimum: required.durationSec,
      passed: durationPassed,
    });
    if (!durationPassed) {
      durationErrors.push(
        `${label(split)} split has ${minutes(duration)} min, minimum is ${minutes(required.durationSec)} min`
      );
    }
  }

  return { checks, sampleErrors, durationErrors };
}

/**
 * Compare each bin's share of val and test against its share of train.
 *
 * Example: train has 30% of its samples in "(1, 3]", val has 40%:
 * |40 − 30| / 30 = 33.3% → flagged at a 20% threshold.
 *
 * @returns Warning messages, empty when balanced
 */
export function checkDistributionBalance(
  statistics: SplitStatistics,
  thresholdPct: number
): string[] {
  if (statistics.counts.train === 0) {
    return ["Train split is empty, cannot check distribution balance"];
  }

  const warnings: string[] = [];
  const trainProps = binProportions(statistics, "train");

  for (const split of ["val", "test"] as const) {
    if (statistics.counts[split] === 0) {
      warnings.push(`${label(split)} split is empty`);
      continue;
    }

    const splitProps = binProportions(statistics, split);

    for (const [bin, trainProp] of Object.entries(trainProps)) {
      if (trainProp <= 0) {
        continue;
      }
      const splitProp = splitProps[bin] ?? 0;
      const diffPct = (Math.abs(splitProp - trainProp) / trainProp) * 100;
      if (diffPct > thresholdPct) {
        warnings.push(
          `Duration bin '${bin}' differs by ${diffPct.toFixed(1)}% between ` +
            `train (${pct(trainProp)}%) and ${split} (${pct(splitProp)}%)`
        );
      }
    }

    for (const [bin, splitProp] of Object.entries(splitProps)) {
      if (splitProp > 0 && (trainProps[bin] ?? 0) === 0) {
        warnings.push(
          `Duration bin '${bin}' exists in ${split} (${pct(splitProp)}%) but not in train (0.0%)`
        );
      }
    }
  }

  return warnings;
}

/**
 * Validate split sizes and balance.
 */
export function validateSplits(
  statistics: SplitStatistics,
  options: SplitValidationOptions
): SplitValidationResult {
  const { checks, sampleErrors, durationErrors } = checkSplitMinimums(statistics, options.minimums);
  const balanceWarnings = checkDistributionBalance(statistics, options.balanceThresholdPct);
  const minimumIssues = [...sampleErrors, ...durationErrors];
  const overridden = options.allowSmallSplits && minimumIssues.length > 0;

  return {
    passed: minimumIssues.length === 0 || options.allowSmallSplits,
    samplesCheckPassed: sampleErrors.length === 0,
    durationCheckPassed: durationErrors.length === 0,
    distributionBalancePassed: balanceWarnings.length === 0,
    overridden,
    checks,
    errors: overridden ? [] : minimumIssues,
    warnings: overridden ? [...minimumIssues, ...balanceWarnings] : balanceWarnings,
  };
}
