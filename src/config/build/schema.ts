/**
 * Build configuration schema.
 *
 * A build configuration fixes every parameter that influences which rows are
 * kept and where they land. It is validated once before any computation starts
 * and treated as read-only afterwards: two builds with equal configuration and
 * equal inputs must produce byte-identical manifests and frozen test sets.
 */

import { z } from "zod";

/** Tolerance when checking that split ratios sum to 1. */
export const RATIO_SUM_TOLERANCE = 0.001;

const ratio = (description: string) =>
  z.number().min(0).max(1).describe(description);

/**
 * Minimum size thresholds per split.
 */
export const SplitMinimumsSchema = z
  .object({
    trainSamples: z.number().int().min(0).describe("Minimum number of train samples"),
    trainDurationSec: z.number().min(0).describe("Minimum total train duration in seconds"),
    valSamples: z.number().int().min(0).describe("Minimum number of val samples"),
    valDurationSec: z.number().min(0).describe("Minimum total val duration in seconds"),
    testSamples: z.number().int().min(0).describe("Minimum number of test samples"),
    testDurationSec: z.number().min(0).describe("Minimum total test duration in seconds"),
  })
  .strict();

export type SplitMinimums = z.infer<typeof SplitMinimumsSchema>;

export const BuildConfigSchema = z
  .object({
    trainRatio: ratio("Target proportion of samples assigned to train"),
    valRatio: ratio("Target proportion of samples assigned to val"),
    testRatio: ratio("Target proportion of samples assigned to test"),

    /** Interior edges; 0 and +Infinity are implicit */
    durationBinEdges: z
      .array(z.number().finite().positive())
      .min(1)
      .describe("Interior duration bin edges in seconds, strictly increasing"),

    seed: z
      .number()
      .int()
      .describe("Seed recorded for reproducibility; ordering is content-derived"),

    minimums: SplitMinimumsSchema,

    balanceThresholdPct: z
      .number()
      .positive()
      .describe("Maximum relative deviation of a bin's share in val/test from train, in percent"),

    sessionGapMs: z
      .number()
      .int()
      .positive()
      .describe("Gap below which consecutive recordings belong to one session"),

    minTimestampCoverage: ratio(
      "Fraction of kept samples that must carry a timestamp for the temporal audit"
    ),

    allowSmallSplits: z
      .boolean()
      .describe("Downgrade failed minimum checks to warnings"),

    skipTemporalCheck: z.boolean().describe("Skip the temporal leakage audit"),

    source: z.string().min(1).describe("Value written to the manifest source column"),

    recordingDevice: z
      .string()
      .min(1)
      .nullable()
      .describe("Fallback recording_device when the inventory has none"),
  })
  .strict()
  .superRefine((config, ctx) => {
    const total = config.trainRatio + config.valRatio + config.testRatio;
    if (Math.abs(total - 1) > RATIO_SUM_TOLERANCE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["trainRatio"],
        message:
          `Split ratios must sum to 1.0, got ${total} ` +
          `(${config.trainRatio} + ${config.valRatio} + ${config.testRatio})`,
      });
    }

    const edges = config.durationBinEdges;
    for (let i = 1; i < edges.length; i++) {
      const previous = edges[i - 1];
      const current = edges[i];
      if (previous !== undefined && current !== undefined && current <= previous) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["durationBinEdges", i],
          message: `Duration bin edges must be strictly increasing (${previous} >= ${current})`,
        });
      }
    }
  });

export type BuildConfig = z.infer<typeof BuildConfigSchema>;

export interface SplitRatios {
  readonly train: number;
  readonly val: number;
  readonly test: number;
}

/**
 * Ratios rescaled to sum to exactly 1.
 */
export function normalizedRatios(config: Pick<BuildConfig, "trainRatio" | "valRatio" | "testRatio">): SplitRatios {
  const total = config.trainRatio + config.valRatio + config.testRatio;
  return {
    train: config.trainRatio / total,
    val: config.valRatio / total,
    test: config.testRatio / total,
  };
}
