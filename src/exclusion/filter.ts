/**
 * Exclusion filter.
 *
 * Splits hashed rows into kept samples and exclusion records. Rows are visited
 * in ascending manifest_row_index order, so among exact duplicates the row with
 * the lowest index is the one kept, whatever order the input arrived in.
 */

import type {
  ExclusionReason,
  ExclusionRecord,
  HashedSample,
  KeptSample,
} from "../types/index.js";
import { EXCLUSION_RULES, firstMatchingRule, type ExclusionRule } from "./rules.js";

export interface ExclusionResult {
  /** Ordered by manifest_row_index */
  readonly kept: readonly KeptSample[];
  /** Ordered by manifest_row_index */
  readonly excluded: readonly ExclusionRecord[];
  readonly breakdown: Readonly<Record<ExclusionReason, number>>;
}

/**
 * Narrow a sample that passed every rule. Returns null if a field the rules
 * should have guaranteed is still missing.
 */
function toKeptSample(sample: HashedSample): KeptSample | null {
  const { audioSha256, pairSha256, durationSec } = sample;
  if (audioSha256 === null || pairSha256 === null || durationSec === null) {
    return null;
  }
  return { ...sample, audioSha256, pairSha256, durationSec, duplicateAudioFlag: false };
}

export function emptyBreakdown(): Record<ExclusionReason, number> {
  return {
    audio_unreadable: 0,
    zero_or_null_duration: 0,
    blank_transcript: 0,
    duplicate_audio_transcript: 0,
  };
}

/**
 * Apply the exclusion rules to every sample.
 */
export function applyExclusionRules(
  samples: readonly HashedSample[],
  rules: readonly ExclusionRule[] = EXCLUSION_RULES
): ExclusionResult {
  const ordered = [...samples].sort((a, b) => a.manifestRowIndex - b.manifestRowIndex);
  const keptPairs = new Set<string>();
  const kept: KeptSample[] = [];
  const excluded: ExclusionRecord[] = [];
  const breakdown = emptyBreakdown();

  for (const sample of ordered) {
    const rule = firstMatchingRule(sample, { keptPairs }, rules);

    if (rule === undefined) {
      const keptSample = toKeptSample(sample);
      if (keptSample === null) {
        throw new Error(
          `Row ${sample.manifestRowIndex} passed every exclusion rule without a complete identity`
        );
      }
      keptPairs.add(keptSample.pairSha256);
      kept.push(keptSample);
      continue;
    }

    breakdown[rule.reason]++;
    excluded.push({
      fileName: sample.fileName,
      manifestRowIndex: sample.manifestRowIndex,
      reason: rule.reason,
      audioSha256: sample.audioSha256,
      transcriptSha256: sample.transcriptSha256,
    });
  }

  return { kept, excluded, breakdown };
}

/**
 * Flag kept samples whose audio also appears with a different transcript.
 * Flagged samples stay in the dataset and are listed for manual review.
 */
export function flagDuplicateAudio(samples: readonly KeptSample[]): KeptSample[] {
  const transcriptsByAudio = new Map<string, Set<string>>();
  for (const sample of samples) {
    const transcripts = transcriptsByAudio.get(sample.audioSha256) ?? new Set<string>();
    transcripts.add(sample.transcriptSha256);
    transcriptsByAudio.set(sample.audioSha256, transcripts);
  }

  return samples.map((sample) => ({
    ...sample,
    duplicateAudioFlag: (transcriptsByAudio.get(sample.audioSha256)?.size ?? 0) > 1,
  }));
}
