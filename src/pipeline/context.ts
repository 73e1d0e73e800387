/**
 * Per-build context, fixed before the first stage runs.
 */

import { resolve } from "node:path";
import { versionDirectory } from "../artifacts/paths.js";
import { parseDatasetVersion, priorVersions, type DatasetVersion } from "../lineage/index.js";

export interface VersionContext {
  readonly version: DatasetVersion;
  /** Ids of every earlier version, oldest first */
  readonly priorVersions: readonly string[];
  readonly runId: string;
  readonly inventoryDir: string;
  readonly outDir: string;
  /** Final directory of this version's artifacts */
  readonly versionDir: string;
}

export interface VersionContextInput {
  inventoryDir: string;
  outDir: string;
  datasetVersion: string;
  runId: string;
}

/**
 * @throws InvalidVersionError if the version id is malformed
 */
export function createVersionContext(input: VersionContextInput): VersionContext {
  const version = parseDatasetVersion(input.datasetVersion);
  const outDir = resolve(input.outDir);
  return Object.freeze({
    version: Object.freeze({ ...version }),
    priorVersions: Object.freeze(priorVersions(version).map((prior) => prior.id)),
    runId: input.runId,
    inventoryDir: resolve(input.inventoryDir),
    outDir,
    versionDir: versionDirectory(outDir, version.id),
  });
}
