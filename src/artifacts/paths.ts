/**
 * Artifact file layout.
 *
 *   <out_dir>/<version>/dataset_<version>_manifest.csv
 *   <out_dir>/<version>/dataset_<version>_excluded.csv
 *   <out_dir>/<version>/test_set_<version>_frozen.csv
 *   <out_dir>/<version>/dataset_<version>_summary.json
 *   <out_dir>/<version>/dataset_<version>_report.md
 */

import { join } from "node:path";

export interface ArtifactFileNames {
  readonly manifest: string;
  readonly excluded: string;
  readonly frozenTestSet: string;
  readonly summary: string;
  readonly report: string;
}

export type ArtifactPaths = ArtifactFileNames;

export function artifactFileNames(versionId: string): ArtifactFileNames {
  return {
    manifest: `dataset_${versionId}_manifest.csv`,
    excluded: `dataset_${versionId}_excluded.csv`,
    frozenTestSet: `test_set_${versionId}_frozen.csv`,
    summary: `dataset_${versionId}_summary.json`,
    report: `dataset_${versionId}_report.md`,
  };
}

export function versionDirectory(outDir: string, versionId: string): string {
  return join(outDir, versionId);
}

/**
 * Absolute (or out_dir-relative) paths of every artifact in a directory.
 */
export function artifactPaths(directory: string, versionId: string): ArtifactPaths {
  const names = artifactFileNames(versionId);
  return {
    manifest: join(directory, names.manifest),
    excluded: join(directory, names.excluded),
    frozenTestSet: join(directory, names.frozenTestSet),
    summary: join(directory, names.summary),
    report: join(directory, names.report),
  };
}

/**
 * Staging directory for a build in progress. Hidden, unique per run, and a
 * sibling of the final directory so the commit is a same-filesystem rename.
 */
export function stagingDirectory(outDir: string, versionId: string, runId: string): string {
  return join(outDir, `.${versionId}.staging-${runId}`);
}
