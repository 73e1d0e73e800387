/**
 * Dataset build orchestration.
 */

export { createVersionContext, type VersionContext, type VersionContextInput } from "./context.js";
export {
  buildDataset,
  exitStatusFor,
  EXIT_SUCCESS,
  EXIT_FATAL,
  EXIT_VALIDATION_FAILED,
  type BuildDependencies,
  type BuildError,
  type BuildOptions,
  type BuildResult,
  type ExitStatus,
} from "./build.js";
