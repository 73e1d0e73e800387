/**
 * Build configuration module.
 *
 * Usage:
 *   import { loadBuildConfig, DEFAULT_BUILD_CONFIG } from "./config/build/index.js";
 *
 *   const config = loadBuildConfig({ ...DEFAULT_BUILD_CONFIG, allowSmallSplits: true });
 */

export type { BuildConfig, SplitMinimums, SplitRatios } from "./schema.js";

export {
  BuildConfigSchema,
  SplitMinimumsSchema,
  RATIO_SUM_TOLERANCE,
  normalizedRatios,
} from "./schema.js";

export {
  loadBuildConfig,
  validateBuildConfig,
  deepFreeze,
  BuildConfigError,
  type ConfigValidationIssue,
} from "./loader.js";

export { DEFAULT_BUILD_CONFIG, DEFAULT_DURATION_BIN_EDGES } from "./defaults.js";
