/**
 * Shared type definitions.
 */

export {
  SPLITS,
  EXCLUSION_REASONS,
  type Split,
  type ExclusionReason,
  type InventoryRow,
  type SampleIdentity,
  type HashedSample,
  type KeptSample,
  type BinnedSample,
  type AssignedSample,
  type ExclusionRecord,
} from "./dataset.js";
