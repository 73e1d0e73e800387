/**
 * Content-addressable identities for audio/transcript pairs.
 *
 *   audio_sha256      = SHA-256(audio file bytes)
 *   transcript_sha256 = SHA-256(UTF-8 transcript bytes)
 *   pair_sha256       = SHA-256(audio_sha256 hex ++ transcript_sha256 hex)
 *
 * Identities depend on content only: renaming or moving a file never changes
 * them, and re-hashing unchanged bytes reproduces them exactly.
 */

import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";
import { mapWithConcurrency } from "../shared/concurrency.js";
import { PerSampleError, describeError } from "../shared/errors.js";
import type { HashedSample, InventoryRow, SampleIdentity } from "../types/index.js";

/** Streaming chunk size for audio reads */
export const AUDIO_READ_CHUNK_BYTES = 64 * 1024;

export const SHA256_HEX_PATTERN = /^[0-9a-f]{64}$/;

/**
 * The audio bytes for a sample could not be obtained.
 */
export class HashInputUnreadable extends PerSampleError {
  public readonly audioPath: string;

  constructor(message: string, audioPath: string, manifestRowIndex?: number) {
    super(message, manifestRowIndex);
    this.name = "HashInputUnreadable";
    this.audioPath = audioPath;
  }
}

export interface HashAudioOptions {
  /** Abort the read after this many milliseconds */
  timeoutMs?: number;
  manifestRowIndex?: number;
}

export const DEFAULT_AUDIO_READ_TIMEOUT_MS = 30_000;

/**
 * Stream an audio file through SHA-256 without buffering the whole file.
 *
 * @throws HashInputUnreadable if the file is missing, unreadable, or the read
 *   does not finish within the timeout
 */
export async function hashAudioFile(
  audioPath: string,
  options: HashAudioOptions = {}
): Promise<string> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_AUDIO_READ_TIMEOUT_MS;

  if (audioPath === "") {
    throw new HashInputUnreadable("No audio path recorded", audioPath, options.manifestRowIndex);
  }

  const hash = createHash("sha256");
  const signal = AbortSignal.timeout(timeoutMs);

  try {
    await new Promise<void>((resolve, reject) => {
      const stream = createReadStream(audioPath, {
        highWaterMark: AUDIO_READ_CHUNK_BYTES,
        signal,
      });
      stream.on("data", (chunk: Buffer | string) => {
        hash.update(chunk);
      });
      stream.on("error", reject);
      stream.on("end", () => resolve());
    });
  } catch (err) {
    const reason = signal.aborted
      ? `Timed out after ${timeoutMs} ms reading audio`
      : `Cannot read audio: ${describeError(err)}`;
    throw new HashInputUnreadable(reason, audioPath, options.manifestRowIndex);
  }

  return hash.digest("hex");
}

/**
 * SHA-256 of the transcript's UTF-8 bytes. Empty transcripts hash normally.
 */
export function hashTranscript(transcript: string): string {
  return createHash("sha256").update(transcript, "utf8").digest("hex");
}

/**
 * Combine two component digests into the pair identity.
 * Order matters: audio first, transcript second.
 */
export function hashPair(audioSha256: string, transcriptSha256: string): string {
  return createHash("sha256").update(audioSha256 + transcriptSha256, "utf8").digest("hex");
}

/**
 * Compute the identity of one inventory row. Unreadable audio does not throw:
 * it yields null audio and pair digests plus the failure message, and the
 * exclusion filter turns that into an `audio_unreadable` record.
 */
export async function computeSampleIdentity(
  row: InventoryRow,
  options: HashAudioOptions = {}
): Promise<SampleIdentity> {
  const transcriptSha256 = hashTranscript(row.transcriptRaw);

  try {
    const audioSha256 = await hashAudioFile(row.audioPath, {
      ...options,
      manifestRowIndex: row.manifestRowIndex,
    });
    return {
      audioSha256,
      transcriptSha256,
      pairSha256: hashPair(audioSha256, transcriptSha256),
      hashError: null,
    };
  } catch (err) {
    if (!(err instanceof HashInputUnreadable)) {
      throw err;
    }
    return {
      audioSha256: null,
      transcriptSha256,
      pairSha256: null,
      hashError: err.message,
    };
  }
}

export interface ComputeIdentitiesOptions {
  /** Maximum files hashed at once */
  concurrency?: number;
  timeoutMs?: number;
  /** Called after each row completes, in completion order */
  onProgress?: (completed: number, total: number) => void;
}

/**
 * Hash every row with bounded concurrency. The result follows the input order;
 * completion order has no influence on it.
 */
export async function computeIdentities(
  rows: readonly InventoryRow[],
  options: ComputeIdentitiesOptions = {}
): Promise<HashedSample[]> {
  const concurrency = options.concurrency ?? 8;
  let completed = 0;

  return mapWithConcurrency(rows, concurrency, async (row) => {
    const identity = await computeSampleIdentity(row, { timeoutMs: options.timeoutMs });
    completed++;
    options.onProgress?.(completed, rows.length);
    return { ...row, ...identity };
  });
}
