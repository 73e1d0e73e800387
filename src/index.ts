/**
 * Dataset versioning engine.
 *
 * Usage:
 *   import { buildDataset } from "speech-dataset-versioning";
 *
 *   const result = await buildDataset({
 *     inventoryDir: "data/inventory",
 *     outDir: "data/datasets",
 *     datasetVersion: "v2",
 *   });
 *   if (result.exitStatus !== 0) console.error(result.error?.format());
 */

export * from "./types/index.js";
export * from "./config/index.js";
export * from "./logging/index.js";
export { FatalInputError, PerSampleError, ValidationFailure, describeError } from "./shared/errors.js";
export * from "./inventory/index.js";
export * from "./hashing/index.js";
export * from "./exclusion/index.js";
export * from "./splitting/index.js";
export * from "./leakage/index.js";
export * from "./validation/index.js";
export * from "./lineage/index.js";
export * from "./artifacts/index.js";
export * from "./pipeline/index.js";
