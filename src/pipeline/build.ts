/**
 * Dataset build pipeline.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * STAGES
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   config → prior frozen sets → inventory → identity hashing → exclusion
 *     → duration bins → split assignment → temporal audit → validation
 *     → lineage check → artifacts
 *
 * Every stage before "artifacts" works in memory. Nothing is written unless
 * all of them succeed, so a failed build leaves the output directory exactly
 * as it found it.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * EXIT STATUSES
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   0  artifacts committed
 *   1  configuration error, fatal input error or lineage violation
 *   2  split validation failed without override (or nothing survived
 *      exclusion, which no override can accept)
 */

import {
  buildSummary,
  createRunMetadata,
  renderExclusionLog,
  renderFrozenTestSet,
  renderManifest,
  renderReport,
  serializeSummary,
  toolVersions,
  writeVersionArtifacts,
  type ArtifactPaths,
  type DatasetSummary,
} from "../artifacts/index.js";
import {
  ConfigError,
  DEFAULT_BUILD_CONFIG,
  DEFAULT_HASH_CONCURRENCY,
  DEFAULT_HASH_READ_TIMEOUT_MS,
  loadBuildConfig,
  normalizedRatios,
  type BuildConfig,
} from "../config/index.js";
import { applyExclusionRules, flagDuplicateAudio } from "../exclusion/index.js";
import { computeIdentities } from "../hashing/index.js";
import { loadInventory } from "../inventory/index.js";
import { auditTemporalLeakage } from "../leakage/index.js";
import {
  DirectoryFrozenTestSetStore,
  LineageViolation,
  VersionLifecycle,
  VersionLineageManager,
  sha256OfText,
  type FrozenTestSetStore,
} from "../lineage/index.js";
import { createSilentLogger, generateRunId, type Logger } from "../logging/index.js";
import { FatalInputError, ValidationFailure } from "../shared/errors.js";
import {
  assignDurationBins,
  assignSplits,
  buildDurationBins,
  computeSplitStatistics,
} from "../splitting/index.js";
import type { Split } from "../types/index.js";
import { validateSplits } from "../validation/index.js";
import { createVersionContext, type VersionContext } from "./context.js";

export const EXIT_SUCCESS = 0;
export const EXIT_FATAL = 1;
export const EXIT_VALIDATION_FAILED = 2;

export type ExitStatus = typeof EXIT_SUCCESS | typeof EXIT_FATAL | typeof EXIT_VALIDATION_FAILED;

export interface BuildOptions {
  inventoryDir: string;
  outDir: string;
  /** "v1", "v2", … */
  datasetVersion: string;
  /** Overrides merged over DEFAULT_BUILD_CONFIG before validation */
  config?: Partial<BuildConfig>;
}

export interface BuildDependencies {
  logger?: Logger;
  /** Defaults to a fresh run id */
  runId?: string;
  /** Defaults to the artifact directories under outDir */
  frozenTestSets?: FrozenTestSetStore;
  hashConcurrency?: number;
  hashReadTimeoutMs?: number;
  /** Build start time recorded in the summary */
  now?: () => Date;
  /** Record git state in the summary (default: true) */
  captureGit?: boolean;
}

export type BuildError = ConfigError | FatalInputError | LineageViolation | ValidationFailure;

export interface BuildResult {
  readonly exitStatus: ExitStatus;
  readonly versionId: string | null;
  /** Set only when artifacts were committed */
  readonly artifacts: ArtifactPaths | null;
  readonly summary: DatasetSummary | null;
  readonly error: BuildError | null;
}

interface CommittedBuild {
  readonly context: VersionContext;
  readonly artifacts: ArtifactPaths;
  readonly summary: DatasetSummary;
}

function isBuildError(err: unknown): err is BuildError {
  return (
    err instanceof ConfigError ||
    err instanceof FatalInputError ||
    err instanceof LineageViolation ||
    err instanceof ValidationFailure
  );
}

export function exitStatusFor(error: BuildError): ExitStatus {
  return error instanceof ValidationFailure ? EXIT_VALIDATION_FAILED : EXIT_FATAL;
}

async function runBuild(
  options: BuildOptions,
  deps: BuildDependencies,
  logger: Logger,
  onContext: (context: VersionContext) => void
): Promise<CommittedBuild> {
  const now = deps.now ?? (() => new Date());
  const startedAt = now();

  const config = loadBuildConfig({ ...DEFAULT_BUILD_CONFIG, ...options.config });
  const context = createVersionContext({
    inventoryDir: options.inventoryDir,
    outDir: options.outDir,
    datasetVersion: options.datasetVersion,
    runId: deps.runId ?? generateRunId(startedAt),
  });
  onContext(context);

  const log = logger.child({ version: context.version.id });
  const lifecycle = new VersionLifecycle(context.version.id);
  log.info("Starting dataset build", {
    inventoryDir: context.inventoryDir,
    outDir: context.outDir,
    seed: config.seed,
  });

  // Prior frozen sets are read first: a corrupt lineage aborts before any hashing
  const lineage = new VersionLineageManager(
    deps.frozenTestSets ?? new DirectoryFrozenTestSetStore(context.outDir),
    log
  );
  const prior = await lineage.loadPriorTestIdentities(context.version);

  const inventory = await loadInventory(context.inventoryDir);
  log.info("Loaded inventory", { path: inventory.path, rows: inventory.rows.length });

  const hashLog = log.child({ component: "hashing" });
  const hashed = await computeIdentities(inventory.rows, {
    concurrency: deps.hashConcurrency ?? DEFAULT_HASH_CONCURRENCY,
    timeoutMs: deps.hashReadTimeoutMs ?? DEFAULT_HASH_READ_TIMEOUT_MS,
    onProgress: (completed, total) => {
      if (completed === total || completed % 1000 === 0) {
        hashLog.debug("Hashing progress", { completed, total });
      }
    },
  });
  for (const sample of hashed) {
    if (sample.hashError !== null) {
      hashLog.warn("Audio could not be hashed", {
        manifestRowIndex: sample.manifestRowIndex,
        fileName: sample.fileName,
        error: sample.hashError,
      });
    }
  }

  const exclusion = applyExclusionRules(hashed);
  const kept = flagDuplicateAudio(exclusion.kept);
  const duplicateAudioFlagged = kept.filter((sample) => sample.duplicateAudioFlag).length;
  log.child({ component: "exclusion" }).info("Applied exclusion rules", {
    kept: kept.length,
    excluded: exclusion.excluded.length,
    breakdown: exclusion.breakdown,
    duplicateAudioFlagged,
  });

  if (kept.length === 0) {
    throw new ValidationFailure("No samples remain after exclusion", [
      `All ${inventory.rows.length} inventory row(s) were excluded`,
    ]);
  }

  const bins = buildDurationBins(config.durationBinEdges);
  const assigned = assignSplits(assignDurationBins(kept, bins), normalizedRatios(config), {
    pinnedTest: new Set(prior.identities.keys()),
  });
  const statistics = computeSplitStatistics(assigned, bins);
  log.child({ component: "splitting" }).info("Assigned splits", {
    counts: statistics.counts,
    pinned: assigned.filter((sample) => sample.pinned).length,
  });

  const leakageLog = log.child({ component: "leakage" });
  const leakage = auditTemporalLeakage(assigned, {
    sessionGapMs: config.sessionGapMs,
    minTimestampCoverage: config.minTimestampCoverage,
    skip: config.skipTemporalCheck,
  });
  if ((leakage.clustersCrossingSplits ?? 0) > 0) {
    leakageLog.warn("Recording sessions span more than one split", {
      clustersCrossingSplits: leakage.clustersCrossingSplits,
      clustersCrossingTrainTest: leakage.clustersCrossingTrainTest,
    });
  } else {
    leakageLog.info("Temporal audit finished", {
      status: leakage.status,
      timestampCoveragePct: leakage.timestampCoveragePct,
    });
  }

  const validation = validateSplits(statistics, {
    minimums: config.minimums,
    balanceThresholdPct: config.balanceThresholdPct,
    allowSmallSplits: config.allowSmallSplits,
  });
  const validationLog = log.child({ component: "validation" });
  for (const warning of validation.warnings) {
    validationLog.warn(warning);
  }
  if (!validation.passed) {
    throw new ValidationFailure(
      `Split validation failed with ${validation.errors.length} error(s)`,
      validation.errors
    );
  }
  lifecycle.advance("validated");

  const placements = new Map<string, Split>(
    assigned.map((sample) => [sample.pairSha256, sample.split])
  );
  const candidateTest = new Set(
    assigned.filter((sample) => sample.split === "test").map((sample) => sample.pairSha256)
  );
  const check = lineage.validate(context.version.id, prior, candidateTest, placements);
  if (!check.ok) {
    throw check.error;
  }

  const frozenTestSet = renderFrozenTestSet(assigned);
  const frozenTestSetSha256 = sha256OfText(frozenTestSet);
  const inherited = [...candidateTest].filter((pair) => prior.identities.has(pair)).length;

  lifecycle.advance("frozen");

  const summary = buildSummary({
    versionId: context.version.id,
    state: lifecycle.state,
    run: createRunMetadata({
      runId: context.runId,
      startedAt,
      captureGit: deps.captureGit,
    }),
    tools: toolVersions(),
    config,
    bins,
    inventoryRows: inventory.rows.length,
    exclusion,
    duplicateAudioFlagged,
    statistics,
    leakage,
    validation,
    lineage: {
      priorVersions: prior.versions,
      inheritedTestIdentities: inherited,
      newTestIdentities: candidateTest.size - inherited,
    },
    frozenTestSetSamples: candidateTest.size,
    frozenTestSetSha256,
  });

  const artifacts = await writeVersionArtifacts(
    {
      manifest: renderManifest(context.version.id, context.versionDir, assigned, {
        source: config.source,
        recordingDevice: config.recordingDevice,
      }),
      excluded: renderExclusionLog(exclusion.excluded),
      frozenTestSet,
      summary: serializeSummary(summary),
      report: renderReport(summary),
    },
    { outDir: context.outDir, versionId: context.version.id, runId: context.runId }
  );

  log.info("Committed dataset version", {
    versionDir: context.versionDir,
    kept: assigned.length,
    frozenTestSetSamples: candidateTest.size,
  });

  return { context, artifacts, summary };
}

/**
 * Build one dataset version.
 *
 * Build errors (configuration, fatal input, lineage, validation) are returned
 * in the result with their exit status; anything else is a defect and is
 * rethrown.
 */
export async function buildDataset(
  options: BuildOptions,
  deps: BuildDependencies = {}
): Promise<BuildResult> {
  const logger = (deps.logger ?? createSilentLogger()).child({ component: "pipeline" });
  let versionId: string | null = null;

  try {
    const committed = await runBuild(options, deps, logger, (context) => {
      versionId = context.version.id;
    });
    return {
      exitStatus: EXIT_SUCCESS,
      versionId: committed.context.version.id,
      artifacts: committed.artifacts,
      summary: committed.summary,
      error: null,
    };
  } catch (err) {
    if (!isBuildError(err)) {
      throw err;
    }
    const exitStatus = exitStatusFor(err);
    logger.error(`Build failed: ${err.message}`, { error: err.name, exitStatus });
    return { exitStatus, versionId, artifacts: null, summary: null, error: err };
  }
}
