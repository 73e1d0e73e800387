/**
 * Version artifacts: manifest, exclusion log, frozen test set, summary and
 * report.
 */

export {
  artifactFileNames,
  artifactPaths,
  stagingDirectory,
  versionDirectory,
  type ArtifactFileNames,
  type ArtifactPaths,
} from "./paths.js";
export {
  captureGitState,
  createRunMetadata,
  toolVersions,
  ENGINE_VERSION,
  type GitState,
  type RunMetadata,
  type RunMetadataOptions,
  type ToolVersions,
} from "./metadata.js";
export {
  buildSummary,
  serializeSummary,
  parseSummary,
  isSummaryFormatCompatible,
  DatasetSummarySchema,
  SUMMARY_FORMAT_VERSION,
  type DatasetSummary,
  type SummaryInput,
} from "./summary.js";
export { renderReport, recommend, type Recommendation } from "./report.js";
export {
  MANIFEST_COLUMNS,
  EXCLUSION_LOG_COLUMNS,
  manifestAudioPath,
  renderManifest,
  renderExclusionLog,
  renderFrozenTestSet,
  frozenTestEntries,
  writeVersionArtifacts,
  isDestinationTaken,
  type ManifestDefaults,
  type RenderedArtifacts,
  type WriteArtifactsOptions,
} from "./writer.js";
