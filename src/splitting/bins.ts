/**
 * Duration bins.
 *
 * Interior edges e1 < e2 < … < en define the half-open intervals
 * (0, e1], (e1, e2], …, (en, inf]. A sample's bin depends on its duration only.
 */

import type { BinnedSample, KeptSample } from "../types/index.js";

export interface DurationBin {
  /** Position in ascending duration order */
  readonly index: number;
  readonly label: string;
  /** Exclusive lower bound in seconds */
  readonly lower: number;
  /** Inclusive upper bound in seconds; Infinity for the last bin */
  readonly upper: number;
}

function formatEdge(edge: number): string {
  return edge === Infinity ? "inf" : String(edge);
}

export function formatBinLabel(lower: number, upper: number): string {
  return `(${formatEdge(lower)}, ${formatEdge(upper)}]`;
}

/**
 * Build the bins for a list of interior edges. The caller is expected to pass
 * validated edges (positive, strictly increasing).
 */
export function buildDurationBins(interiorEdges: readonly number[]): DurationBin[] {
  const edges = [0, ...interiorEdges, Infinity];
  const bins: DurationBin[] = [];
  for (let i = 0; i < edges.length - 1; i++) {
    const lower = edges[i] ?? 0;
    const upper = edges[i + 1] ?? Infinity;
    bins.push({ index: i, label: formatBinLabel(lower, upper), lower, upper });
  }
  return bins;
}

/**
 * Find the bin containing a duration, or undefined for durations ≤ 0.
 */
export function findDurationBin(
  bins: readonly DurationBin[],
  durationSec: number
): DurationBin | undefined {
  return bins.find((bin) => durationSec > bin.lower && durationSec <= bin.upper);
}

/**
 * Attach the duration bin label to every sample.
 *
 * @throws RangeError if a duration falls outside every bin
 */
export function assignDurationBins(
  samples: readonly KeptSample[],
  bins: readonly DurationBin[]
): BinnedSample[] {
  return samples.map((sample) => {
    const bin = findDurationBin(bins, sample.durationSec);
    if (bin === undefined) {
      throw new RangeError(
        `Row ${sample.manifestRowIndex} has duration ${sample.durationSec}s outside every bin`
      );
    }
    return { ...sample, durationBin: bin.label };
  });
}
