/**
 * Duration binning and stratified train/val/test assignment.
 */

export {
  buildDurationBins,
  findDurationBin,
  assignDurationBins,
  formatBinLabel,
  type DurationBin,
} from "./bins.js";

export {
  allocateSplitCounts,
  allocateFreeCounts,
  assignSplits,
  type SplitCounts,
  type AssignSplitsOptions,
} from "./assigner.js";

export { computeSplitStatistics, binProportions, type SplitStatistics } from "./stats.js";
