/**
 * Core record types flowing through a dataset build.
 *
 * Each stage widens the record it receives: an inventory row gains its content
 * identity, survives the exclusion rules, gets a duration bin and finally a
 * split. Records are never mutated in place; every stage returns new objects.
 */

export const SPLITS = ["train", "val", "test"] as const;

export type Split = (typeof SPLITS)[number];

export const EXCLUSION_REASONS = [
  "audio_unreadable",
  "zero_or_null_duration",
  "blank_transcript",
  "duplicate_audio_transcript",
] as const;

export type ExclusionReason = (typeof EXCLUSION_REASONS)[number];

/**
 * One row of the inventory table, as produced by the upstream inventory step.
 */
export interface InventoryRow {
  readonly manifestRowIndex: number;
  readonly fileName: string;
  /** Absolute path used to stream the audio bytes */
  readonly audioPath: string;
  readonly transcriptRaw: string;
  /** Null when the inventory does not report existence separately */
  readonly audioExists: boolean | null;
  readonly audioReadOk: boolean;
  readonly durationSec: number | null;
  readonly transcriptIsBlank: boolean;
  readonly timestampMs: number | null;
  /** Taken from the inventory, or derived from transcriptRaw when absent */
  readonly transcriptLenChars: number;
  readonly transcriptLenWords: number;
  readonly source: string | null;
  readonly recordingDevice: string | null;
}

/**
 * Content-addressable identity of an audio/transcript pair.
 * All digests are lowercase 64-character hex strings.
 */
export interface SampleIdentity {
  /** Null when the audio bytes could not be read */
  readonly audioSha256: string | null;
  readonly transcriptSha256: string;
  /** Null whenever audioSha256 is null */
  readonly pairSha256: string | null;
  /** Why the audio could not be hashed, if it could not */
  readonly hashError: string | null;
}

export interface HashedSample extends InventoryRow, SampleIdentity {}

/**
 * A sample that passed every exclusion rule.
 */
export interface KeptSample extends HashedSample {
  readonly audioSha256: string;
  readonly pairSha256: string;
  readonly durationSec: number;
  /** Same audio appears elsewhere with a different transcript */
  readonly duplicateAudioFlag: boolean;
}

export interface BinnedSample extends KeptSample {
  /** Label of the half-open duration interval, e.g. "(3, 10]" */
  readonly durationBin: string;
}

export interface AssignedSample extends BinnedSample {
  readonly split: Split;
  /** Held in test by a prior version's frozen test set */
  readonly pinned: boolean;
}

export interface ExclusionRecord {
  readonly fileName: string;
  readonly manifestRowIndex: number;
  readonly reason: ExclusionReason;
  readonly audioSha256: string | null;
  readonly transcriptSha256: string | null;
}
