/**
 * Stratified split assignment.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * ALGORITHM
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * 1. Group samples by duration bin.
 * 2. Within a bin, sort by pair_sha256. The hash is uniformly distributed and
 *    derived from content, so the order is effectively random yet identical on
 *    every run and platform, whatever order the rows arrived in.
 * 3. Size each split: train gets floor(n * train_ratio), val gets
 *    floor(n * val_ratio), and test takes whatever is left, so test is never
 *    below its quota.
 * 4. Walk the sorted bin: the first n_train samples go to train, the next
 *    n_val to val, the rest to test.
 *
 * PINNED IDENTITIES: samples frozen in a prior version's test set must stay in
 * test. They are placed in test first and count towards the bin's test quota;
 * the free samples then fill train, val and whatever test slots remain. When a
 * bin holds more pinned samples than its test quota, the free samples are
 * shared between train and val in their relative ratio.
 *
 * The assignment is a pure function of (samples, ratios, pinned set); bin
 * boundaries enter through the labels already attached to each sample.
 */

import type { SplitRatios } from "../config/build/index.js";
import type { AssignedSample, BinnedSample, Split } from "../types/index.js";

export type SplitCounts = Record<Split, number>;

// Absorbs floating point error in n * ratio (e.g. 0.7 * 10 = 6.999…)
const QUOTA_EPSILON = 1e-9;

function floorQuota(n: number, ratio: number): number {
  return Math.floor(n * ratio + QUOTA_EPSILON);
}

/**
 * Split `n` samples into whole counts that sum to `n`: train and val are
 * floored, test receives the remainder.
 *
 * Example: 15 samples at 80/10/10 → 12 train, 1 val, 2 test.
 */
export function allocateSplitCounts(n: number, ratios: SplitRatios): SplitCounts {
  const train = Math.min(n, floorQuota(n, ratios.train));
  const val = Math.min(n - train, floorQuota(n, ratios.val));
  return { train, val, test: n - train - val };
}

function compareHashes(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

/**
 * Compute how many free (unpinned) samples of a bin go to each split.
 */
export function allocateFreeCounts(
  binSize: number,
  pinnedCount: number,
  ratios: SplitRatios
): SplitCounts {
  const target = allocateSplitCounts(binSize, ratios);
  const freeCount = binSize - pinnedCount;

  if (pinnedCount <= target.test) {
    return { train: target.train, val: target.val, test: target.test - pinnedCount };
  }

  const trainValTotal = ratios.train + ratios.val;
  if (trainValTotal <= 0) {
    return { train: 0, val: 0, test: freeCount };
  }

  const train = Math.min(freeCount, floorQuota(freeCount, ratios.train / trainValTotal));
  return { train, val: freeCount - train, test: 0 };
}

export interface AssignSplitsOptions {
  /** pair_sha256 values that must land in test */
  pinnedTest?: ReadonlySet<string>;
}

/**
 * Assign every sample to exactly one split.
 *
 * @returns Assigned samples ordered by manifest_row_index
 */
export function assignSplits(
  samples: readonly BinnedSample[],
  ratios: SplitRatios,
  options: AssignSplitsOptions = {}
): AssignedSample[] {
  const pinnedTest = options.pinnedTest ?? new Set<string>();

  const byBin = new Map<string, BinnedSample[]>();
  for (const sample of samples) {
    const members = byBin.get(sample.durationBin) ?? [];
    members.push(sample);
    byBin.set(sample.durationBin, members);
  }

  const assigned: AssignedSample[] = [];

  for (const members of byBin.values()) {
    const sorted = [...members].sort((a, b) => compareHashes(a.pairSha256, b.pairSha256));
    const pinned = sorted.filter((sample) => pinnedTest.has(sample.pairSha256));
    const free = sorted.filter((sample) => !pinnedTest.has(sample.pairSha256));

    for (const sample of pinned) {
      assigned.push({ ...sample, split: "test", pinned: true });
    }

    const counts = allocateFreeCounts(sorted.length, pinned.length, ratios);
    free.forEach((sample, position) => {
      let split: Split = "test";
      if (position < counts.train) {
        split = "train";
      } else if (position < counts.train + counts.val) {
        split = "val";
      }
      assigned.push({ ...sample, split, pinned: false });
    });
  }

  return assigned.sort((a, b) => a.manifestRowIndex - b.manifestRowIndex);
}
