/**
 * Per-split statistics: sample counts, total durations and duration bin
 * distributions. Shared by the validator, the summary and the report.
 */

import type { AssignedSample, Split } from "../types/index.js";
import type { DurationBin } from "./bins.js";

export interface SplitStatistics {
  readonly counts: Record<Split, number>;
  readonly durationsSec: Record<Split, number>;
  readonly durationsHours: Record<Split, number>;
  /** Sample count per bin label, in ascending bin order, for every split */
  readonly binCounts: Record<Split, Record<string, number>>;
}

function perSplit<T>(make: (split: Split) => T): Record<Split, T> {
  return { train: make("train"), val: make("val"), test: make("test") };
}

export function computeSplitStatistics(
  samples: readonly AssignedSample[],
  bins: readonly DurationBin[]
): SplitStatistics {
  const counts = perSplit(() => 0);
  const durationsSec = perSplit(() => 0);
  const binCounts = perSplit(() => {
    const entry: Record<string, number> = {};
    for (const bin of bins) {
      entry[bin.label] = 0;
    }
    return entry;
  });

  for (const sample of samples) {
    counts[sample.split]++;
    durationsSec[sample.split] += sample.durationSec;
    const splitBins = binCounts[sample.split];
    splitBins[sample.durationBin] = (splitBins[sample.durationBin] ?? 0) + 1;
  }

  const durationsHours = perSplit((split) => durationsSec[split] / 3600);

  return { counts, durationsSec, durationsHours, binCounts };
}

/**
 * Share of each bin within one split (0..1). Empty splits yield all zeros.
 */
export function binProportions(
  statistics: SplitStatistics,
  split: Split
): Record<string, number> {
  const total = statistics.counts[split];
  const proportions: Record<string, number> = {};
  for (const [label, count] of Object.entries(statistics.binCounts[split])) {
    proportions[label] = total === 0 ? 0 : count / total;
  }
  return proportions;
}
