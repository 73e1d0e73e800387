/**
 * Split size and balance validation.
 */

export {
  validateSplits,
  checkSplitMinimums,
  checkDistributionBalance,
  type SplitCheck,
  type CheckMetric,
  type SplitValidationResult,
  type SplitValidationOptions,
} from "./validator.js";
