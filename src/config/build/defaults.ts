/**
 * Default build configuration.
 *
 * 80/10/10 split over five duration bins, minimums of 100 samples and ten
 * minutes for train and 20 samples and two minutes for val and test.
 */

import type { BuildConfig } from "./schema.js";

export const DEFAULT_DURATION_BIN_EDGES: readonly number[] = [1, 3, 10, 30];

export const DEFAULT_BUILD_CONFIG: BuildConfig = {
  trainRatio: 0.8,
  valRatio: 0.1,
  testRatio: 0.1,

  durationBinEdges: [...DEFAULT_DURATION_BIN_EDGES],

  seed: 42,

  minimums: {
    trainSamples: 100,
    trainDurationSec: 10 * 60,
    valSamples: 20,
    valDurationSec: 2 * 60,
    testSamples: 20,
    testDurationSec: 2 * 60,
  },

  balanceThresholdPct: 20,

  // One minute between recordings starts a new session
  sessionGapMs: 60_000,
  minTimestampCoverage: 0.5,

  allowSmallSplits: false,
  skipTemporalCheck: false,

  source: "unspecified",
  recordingDevice: null,
};
