/**
 * Dataset versions and frozen test set lineage.
 */

export { parseDatasetVersion, priorVersions, InvalidVersionError, type DatasetVersion } from "./version.js";
export {
  VersionLifecycle,
  VALID_VERSION_TRANSITIONS,
  canTransition,
  InvalidVersionTransition,
  type VersionState,
} from "./state.js";
export { LineageViolation, type LineageIssue } from "./errors.js";
export {
  DirectoryFrozenTestSetStore,
  InMemoryFrozenTestSetStore,
  FROZEN_TEST_SET_COLUMNS,
  parseFrozenTestSet,
  serializeFrozenTestSet,
  sha256OfText,
  type FrozenTestEntry,
  type FrozenTestSetStore,
} from "./store.js";
export {
  VersionLineageManager,
  type LineageCheck,
  type PriorTestIdentities,
  type PriorTestIdentity,
} from "./manager.js";
