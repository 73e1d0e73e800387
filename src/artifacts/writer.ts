/**
 * Artifact writer.
 *
 * Every artifact of a version is rendered in memory first, written into a
 * hidden staging directory beside the final one and then moved into place
 * with a single rename. A failed build leaves no version directory behind,
 * and a committed version directory is never overwritten.
 */

import { mkdir, rename, rm, stat, writeFile } from "node:fs/promises";
import { relative, resolve, sep } from "node:path";
import { serializeFrozenTestSet, type FrozenTestEntry } from "../lineage/index.js";
import { stringifyCsv } from "../shared/csv.js";
import { FatalInputError } from "../shared/errors.js";
import type { AssignedSample, ExclusionRecord } from "../types/index.js";
import {
  artifactPaths,
  stagingDirectory,
  versionDirectory,
  type ArtifactPaths,
} from "./paths.js";

export const MANIFEST_COLUMNS = [
  "dataset_version",
  "file_name",
  "source",
  "manifest_row_index",
  "audio_path_resolved",
  "duration_sec",
  "duration_bin",
  "transcript_raw",
  "transcript_len_chars",
  "transcript_len_words",
  "timestamp_ms",
  "recording_device",
  "audio_sha256",
  "transcript_sha256",
  "pair_sha256",
  "split",
  "duplicate_audio_flag",
] as const;

export const EXCLUSION_LOG_COLUMNS = [
  "file_name",
  "manifest_row_index",
  "excluded_reason",
  "audio_sha256",
  "transcript_sha256",
] as const;

export interface ManifestDefaults {
  /** Used when a row carries no source of its own */
  readonly source: string;
  /** Used when a row carries no recording device of its own */
  readonly recordingDevice: string | null;
}

export interface RenderedArtifacts {
  readonly manifest: string;
  readonly excluded: string;
  readonly frozenTestSet: string;
  readonly summary: string;
  readonly report: string;
}

/**
 * Path of an audio file relative to the version directory, always with "/"
 * separators.
 */
export function manifestAudioPath(versionDir: string, audioPath: string): string {
  return relative(resolve(versionDir), audioPath).split(sep).join("/");
}

/**
 * Render the manifest CSV, rows ordered by manifest_row_index.
 */
export function renderManifest(
  versionId: string,
  versionDir: string,
  samples: readonly AssignedSample[],
  defaults: ManifestDefaults
): string {
  const ordered = [...samples].sort((a, b) => a.manifestRowIndex - b.manifestRowIndex);
  return stringifyCsv(
    MANIFEST_COLUMNS,
    ordered.map((sample) => ({
      dataset_version: versionId,
      file_name: sample.fileName,
      source: sample.source ?? defaults.source,
      manifest_row_index: sample.manifestRowIndex,
      audio_path_resolved: manifestAudioPath(versionDir, sample.audioPath),
      duration_sec: sample.durationSec,
      duration_bin: sample.durationBin,
      transcript_raw: sample.transcriptRaw,
      transcript_len_chars: sample.transcriptLenChars,
      transcript_len_words: sample.transcriptLenWords,
      timestamp_ms: sample.timestampMs,
      recording_device: sample.recordingDevice ?? defaults.recordingDevice,
      audio_sha256: sample.audioSha256,
      transcript_sha256: sample.transcriptSha256,
      pair_sha256: sample.pairSha256,
      split: sample.split,
      duplicate_audio_flag: sample.duplicateAudioFlag,
    }))
  );
}

export function renderExclusionLog(records: readonly ExclusionRecord[]): string {
  const ordered = [...records].sort((a, b) => a.manifestRowIndex - b.manifestRowIndex);
  return stringifyCsv(
    EXCLUSION_LOG_COLUMNS,
    ordered.map((record) => ({
      file_name: record.fileName,
      manifest_row_index: record.manifestRowIndex,
      excluded_reason: record.reason,
      audio_sha256: record.audioSha256,
      transcript_sha256: record.transcriptSha256,
    }))
  );
}

/**
 * The test split as frozen test set entries.
 */
export function frozenTestEntries(samples: readonly AssignedSample[]): FrozenTestEntry[] {
  return samples
    .filter((sample) => sample.split === "test")
    .map((sample) => ({
      fileName: sample.fileName,
      pairSha256: sample.pairSha256,
      audioSha256: sample.audioSha256,
      transcriptSha256: sample.transcriptSha256,
    }));
}

export function renderFrozenTestSet(samples: readonly AssignedSample[]): string {
  return serializeFrozenTestSet(frozenTestEntries(samples));
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return false;
    }
    throw err;
  }
}

/**
 * Whether a rename failed because its destination directory already exists.
 */
export function isDestinationTaken(err: unknown): boolean {
  return err instanceof Error && "code" in err && (err.code === "EEXIST" || err.code === "ENOTEMPTY");
}

function versionExistsError(versionId: string, finalDir: string): FatalInputError {
  return new FatalInputError(
    `Version ${versionId} already exists; committed versions are never overwritten`,
    finalDir
  );
}

export interface WriteArtifactsOptions {
  readonly outDir: string;
  readonly versionId: string;
  readonly runId: string;
}

/**
 * Commit a version's artifacts to `<out_dir>/<version>/`.
 *
 * @returns Paths of the committed files
 * @throws FatalInputError if the version directory already exists, including
 *   when a concurrent build commits it first
 */
export async function writeVersionArtifacts(
  artifacts: RenderedArtifacts,
  options: WriteArtifactsOptions
): Promise<ArtifactPaths> {
  const { outDir, versionId, runId } = options;
  const finalDir = versionDirectory(outDir, versionId);

  if (await pathExists(finalDir)) {
    throw versionExistsError(versionId, finalDir);
  }

  const stagingDir = stagingDirectory(outDir, versionId, runId);
  await mkdir(stagingDir, { recursive: true });

  try {
    const staged = artifactPaths(stagingDir, versionId);
    await writeFile(staged.manifest, artifacts.manifest, "utf-8");
    await writeFile(staged.excluded, artifacts.excluded, "utf-8");
    await writeFile(staged.frozenTestSet, artifacts.frozenTestSet, "utf-8");
    await writeFile(staged.summary, artifacts.summary, "utf-8");
    await writeFile(staged.report, artifacts.report, "utf-8");
    await rename(stagingDir, finalDir);
  } catch (err) {
    await rm(stagingDir, { recursive: true, force: true });
    // Another build committed the same version after the existence check
    if (isDestinationTaken(err)) {
      throw versionExistsError(versionId, finalDir);
    }
    throw err;
  }

  return artifactPaths(finalDir, versionId);
}
