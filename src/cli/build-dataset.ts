#!/usr/bin/env node
/**
 * CLI command to build one dataset version.
 *
 * Usage:
 *   npx tsx src/cli/build-dataset.ts --inventory_dir <dir> --out_dir <dir> --dataset_version v1 [options]
 *   npm run build-dataset -- [options]
 *
 * Exit codes:
 *   0 - Version committed
 *   1 - Configuration error, fatal input error or lineage violation
 *   2 - Split validation failed (see --allow_small_splits)
 */

import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { parseArgs } from "node:util";

import { recommend } from "../artifacts/index.js";
import {
  ConfigError,
  loadAppConfig,
  type AppConfig,
  type BuildConfig,
  type EnvSource,
} from "../config/index.js";
import { createLogger, initRunId, type LogLevel } from "../logging/index.js";
import {
  buildDataset,
  EXIT_FATAL,
  EXIT_SUCCESS,
  type BuildOptions,
  type BuildResult,
  type ExitStatus,
} from "../pipeline/index.js";

// ============================================================
// CLI Parsing
// ============================================================

const USAGE = `
Usage: build-dataset --inventory_dir <dir> --out_dir <dir> --dataset_version <vN> [options]

Required:
  --inventory_dir <dir>          Directory containing inventory_files.csv
  --out_dir <dir>                Directory receiving <version>/ artifact folders
  --dataset_version <vN>         Version to build (v1, v2, …)

Split options:
  --seed <n>                     Seed recorded in the summary (default: 42)
  --train_ratio <r>              Train proportion (default: 0.8)
  --val_ratio <r>                Val proportion (default: 0.1)
  --test_ratio <r>               Test proportion (default: 0.1)
  --duration_bins <edges>        Interior bin edges in seconds (default: 1,3,10,30)
  --allow_small_splits           Downgrade failed minimum checks to warnings
  --balance_threshold_pct <p>    Maximum bin share deviation in percent (default: 20)

Audit options:
  --skip_temporal_check          Skip the temporal leakage audit
  --session_gap_ms <ms>          Gap that starts a new recording session (default: 60000)

Manifest options:
  --source <name>                Source written for rows without one (default: unspecified)
  --recording_device <name>      Recording device written for rows without one

Runtime:
  --hash_concurrency <n>         Audio files hashed at once (default: HASH_CONCURRENCY or 8)
  -v, --verbose                  Log at debug level
  -q, --quiet                    Log errors only
  -h, --help                     Show this help message
`;

const CLI_OPTIONS = {
  inventory_dir: { type: "string" },
  out_dir: { type: "string" },
  dataset_version: { type: "string" },
  seed: { type: "string" },
  train_ratio: { type: "string" },
  val_ratio: { type: "string" },
  test_ratio: { type: "string" },
  duration_bins: { type: "string" },
  allow_small_splits: { type: "boolean", default: false },
  skip_temporal_check: { type: "boolean", default: false },
  balance_threshold_pct: { type: "string" },
  session_gap_ms: { type: "string" },
  source: { type: "string" },
  recording_device: { type: "string" },
  hash_concurrency: { type: "string" },
  verbose: { type: "boolean", short: "v", default: false },
  quiet: { type: "boolean", short: "q", default: false },
  help: { type: "boolean", short: "h", default: false },
} as const;

export interface CliArgs {
  inventory_dir?: string;
  out_dir?: string;
  dataset_version?: string;
  seed?: string;
  train_ratio?: string;
  val_ratio?: string;
  test_ratio?: string;
  duration_bins?: string;
  allow_small_splits?: boolean;
  skip_temporal_check?: boolean;
  balance_threshold_pct?: string;
  session_gap_ms?: string;
  source?: string;
  recording_device?: string;
  hash_concurrency?: string;
  verbose?: boolean;
  quiet?: boolean;
  help?: boolean;
}

/**
 * @throws ConfigError on unknown options or missing option values
 */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  try {
    return parseArgs({ args: [...argv], options: CLI_OPTIONS, strict: true }).values;
  } catch (err) {
    if (err instanceof TypeError) {
      throw new ConfigError(err.message);
    }
    throw err;
  }
}

function parseNumber(flag: string, value: string): number {
  const parsed = Number(value.trim());
  if (value.trim() === "" || Number.isNaN(parsed)) {
    throw new ConfigError(`--${flag} must be a number, got: ${value}`);
  }
  return parsed;
}

function parseInteger(flag: string, value: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new ConfigError(`--${flag} must be an integer, got: ${value}`);
  }
  return parseInt(value, 10);
}

/**
 * Parse "1,3,10,30" into interior bin edges. Ordering is checked by the build
 * config schema.
 */
export function parseDurationBins(value: string): number[] {
  const parts = value.split(",").map((part) => part.trim());
  if (parts.some((part) => part === "")) {
    throw new ConfigError(`--duration_bins must be a comma-separated list of numbers, got: ${value}`);
  }
  return parts.map((part) => parseNumber("duration_bins", part));
}

function requireOption(args: CliArgs, name: "inventory_dir" | "out_dir" | "dataset_version"): string {
  const value = args[name];
  if (value === undefined || value.trim() === "") {
    throw new ConfigError(`Missing required option --${name}`);
  }
  return value;
}

/**
 * Convert parsed flags into build options. Flags left unset fall back to
 * DEFAULT_BUILD_CONFIG inside the build.
 *
 * @throws ConfigError on a missing required option or an unparsable value
 */
export function toBuildOptions(args: CliArgs): BuildOptions {
  const config: Partial<BuildConfig> = {
    allowSmallSplits: args.allow_small_splits ?? false,
    skipTemporalCheck: args.skip_temporal_check ?? false,
  };

  if (args.seed !== undefined) config.seed = parseInteger("seed", args.seed);
  if (args.train_ratio !== undefined) config.trainRatio = parseNumber("train_ratio", args.train_ratio);
  if (args.val_ratio !== undefined) config.valRatio = parseNumber("val_ratio", args.val_ratio);
  if (args.test_ratio !== undefined) config.testRatio = parseNumber("test_ratio", args.test_ratio);
  if (args.duration_bins !== undefined) config.durationBinEdges = parseDurationBins(args.duration_bins);
  if (args.balance_threshold_pct !== undefined) {
    config.balanceThresholdPct = parseNumber("balance_threshold_pct", args.balance_threshold_pct);
  }
  if (args.session_gap_ms !== undefined) {
    config.sessionGapMs = parseInteger("session_gap_ms", args.session_gap_ms);
  }
  if (args.source !== undefined) config.source = args.source;
  if (args.recording_device !== undefined) config.recordingDevice = args.recording_device;

  return {
    inventoryDir: requireOption(args, "inventory_dir"),
    outDir: requireOption(args, "out_dir"),
    datasetVersion: requireOption(args, "dataset_version"),
    config,
  };
}

/**
 * --verbose and --quiet override LOG_LEVEL; both together are rejected.
 */
export function resolveLogLevel(args: CliArgs, appConfig: AppConfig): LogLevel {
  if (args.verbose && args.quiet) {
    throw new ConfigError("--verbose and --quiet cannot be combined");
  }
  if (args.verbose) {
    return "debug";
  }
  if (args.quiet) {
    return "error";
  }
  return appConfig.logLevel;
}

export function resolveHashConcurrency(args: CliArgs, appConfig: AppConfig): number {
  if (args.hash_concurrency === undefined) {
    return appConfig.hashConcurrency;
  }
  const value = parseInteger("hash_concurrency", args.hash_concurrency);
  if (value < 1) {
    throw new ConfigError(`--hash_concurrency must be at least 1, got: ${value}`);
  }
  return value;
}

// ============================================================
// Output Formatting
// ============================================================

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
};

const useColors = Boolean(process.stdout.isTTY) && !process.env.NO_COLOR;

function c(color: keyof typeof COLORS, text: string): string {
  return useColors ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

function printResult(result: BuildResult): void {
  console.log("");
  if (result.error !== null) {
    console.error(c("red", `✗ Build of ${result.versionId ?? "dataset"} failed (exit ${result.exitStatus})`));
    console.error(result.error.format());
    return;
  }

  const { summary, artifacts } = result;
  if (summary === null || artifacts === null) {
    return;
  }

  console.log(c("green", `✓ Dataset ${summary.dataset_version} committed`));
  console.log("");
  console.log(`  ${c("dim", "•")} Kept ${summary.counts.kept} of ${summary.counts.inventory_rows} rows`);
  console.log(
    `  ${c("dim", "•")} Train ${summary.splits.train.samples}, ` +
      `val ${summary.splits.val.samples}, test ${summary.splits.test.samples}`
  );
  console.log(`  ${c("dim", "•")} Frozen test set: ${summary.frozen_test_set_samples} samples`);
  for (const warning of summary.validation.warnings) {
    console.log(`  ${c("yellow", "!")} ${warning}`);
  }
  console.log("");
  console.log(`  Manifest: ${artifacts.manifest}`);
  console.log(`  Report:   ${artifacts.report}`);

  const recommendation = recommend(summary);
  console.log("");
  console.log(
    c("bold", recommendation === "READY FOR TRAINING" ? c("green", recommendation) : c("yellow", recommendation))
  );
}

// ============================================================
// Main
// ============================================================

/**
 * Run the command and return its exit status.
 */
export async function run(argv: readonly string[], env: EnvSource = process.env): Promise<ExitStatus> {
  let args: CliArgs;
  let options: BuildOptions;
  let appConfig: AppConfig;
  let level: LogLevel;
  let hashConcurrency: number;

  try {
    args = parseCliArgs(argv);
    if (args.help) {
      console.log(USAGE);
      return EXIT_SUCCESS;
    }
    appConfig = loadAppConfig(env);
    options = toBuildOptions(args);
    level = resolveLogLevel(args, appConfig);
    hashConcurrency = resolveHashConcurrency(args, appConfig);
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(c("red", err.format()));
      console.error("Run with --help for usage.");
      return EXIT_FATAL;
    }
    throw err;
  }

  const runId = initRunId();
  const logger = createLogger({
    level,
    logDir: appConfig.logDir,
    file: appConfig.logToFile,
  });

  const result = await buildDataset(options, {
    logger,
    runId,
    hashConcurrency,
    hashReadTimeoutMs: appConfig.hashReadTimeoutMs,
  });
  printResult(result);
  return result.exitStatus;
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (entry === undefined) {
    return false;
  }
  try {
    return realpathSync(entry) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  run(process.argv.slice(2)).then(
    (status) => {
      process.exitCode = status;
    },
    (err: unknown) => {
      console.error("Unexpected error:", err);
      process.exitCode = EXIT_FATAL;
    }
  );
}
