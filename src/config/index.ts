/**
 * Process-level configuration for the dataset builder.
 *
 * Build parameters (ratios, bins, thresholds) live in ./build; this module
 * only covers the runtime knobs read from the environment.
 */

import { isLogLevel, type LogLevel } from "../logging/index.js";
import {
  ConfigError,
  optionalEnv,
  optionalEnvBool,
  optionalEnvPositiveInt,
  type EnvSource,
} from "./env.js";

export { ConfigError, type EnvSource } from "./env.js";

export * from "./build/index.js";

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Minimum log level */
  readonly logLevel: LogLevel;
  /** Directory for the append-only build log */
  readonly logDir: string;
  /** Whether log lines are also written to logDir */
  readonly logToFile: boolean;
  /** Maximum number of audio files hashed at once */
  readonly hashConcurrency: number;
  /** Per-file read timeout while hashing audio */
  readonly hashReadTimeoutMs: number;
}

export const DEFAULT_HASH_CONCURRENCY = 8;
export const DEFAULT_HASH_READ_TIMEOUT_MS = 30_000;

/**
 * Resolve and validate configuration from the environment.
 * Fails fast with ConfigError on any invalid value.
 */
export function loadAppConfig(env: EnvSource = process.env): AppConfig {
  const nodeEnv = optionalEnv("NODE_ENV", "development", env);
  if (!["development", "production", "test"].includes(nodeEnv)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${nodeEnv}. Must be development, production, or test.`
    );
  }

  const logLevel = optionalEnv("LOG_LEVEL", "info", env);
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${logLevel}. Must be debug, info, warn, or error.`
    );
  }

  return Object.freeze({
    env: nodeEnv,
    logLevel,
    logDir: optionalEnv("LOG_DIR", "output/logs", env),
    logToFile: optionalEnvBool("LOG_TO_FILE", true, env),
    hashConcurrency: optionalEnvPositiveInt("HASH_CONCURRENCY", DEFAULT_HASH_CONCURRENCY, env),
    hashReadTimeoutMs: optionalEnvPositiveInt(
      "HASH_READ_TIMEOUT_MS",
      DEFAULT_HASH_READ_TIMEOUT_MS,
      env
    ),
  });
}
