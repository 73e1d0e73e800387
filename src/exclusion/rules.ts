/**
 * Exclusion rules, in precedence order.
 *
 * This list is the single place that decides which rows are unusable and why.
 * Rules are evaluated top to bottom and the first match wins, so every
 * excluded row carries exactly one reason. Reordering the list changes the
 * recorded reasons, never the set of kept rows.
 */

import type { ExclusionReason, HashedSample } from "../types/index.js";

export interface RuleContext {
  /** pair_sha256 values already kept, from rows with a lower manifest_row_index */
  readonly keptPairs: ReadonlySet<string>;
}

export interface ExclusionRule {
  readonly reason: ExclusionReason;
  readonly description: string;
  readonly matches: (sample: HashedSample, context: RuleContext) => boolean;
}

export function isBlankTranscript(sample: Pick<HashedSample, "transcriptIsBlank" | "transcriptRaw">): boolean {
  return sample.transcriptIsBlank || sample.transcriptRaw.trim() === "";
}

export const EXCLUSION_RULES: readonly ExclusionRule[] = [
  {
    reason: "audio_unreadable",
    description: "Audio missing, flagged unreadable by the inventory, or not hashable",
    matches: (sample) =>
      !sample.audioReadOk || sample.audioExists === false || sample.audioSha256 === null,
  },
  {
    reason: "zero_or_null_duration",
    description: "Duration is missing, not finite, or not positive",
    matches: (sample) =>
      sample.durationSec === null || !Number.isFinite(sample.durationSec) || sample.durationSec <= 0,
  },
  {
    reason: "blank_transcript",
    description: "Transcript is empty or whitespace only",
    matches: (sample) => isBlankTranscript(sample),
  },
  {
    reason: "duplicate_audio_transcript",
    description: "Same audio and transcript as a row with a lower manifest_row_index",
    matches: (sample, context) =>
      sample.pairSha256 !== null && context.keptPairs.has(sample.pairSha256),
  },
];

/**
 * Return the first rule that excludes the sample, or undefined if it is kept.
 */
export function firstMatchingRule(
  sample: HashedSample,
  context: RuleContext,
  rules: readonly ExclusionRule[] = EXCLUSION_RULES
): ExclusionRule | undefined {
  return rules.find((rule) => rule.matches(sample, context));
}
