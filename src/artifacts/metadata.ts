/**
 * Run metadata capture.
 *
 * Records where and from which code revision a dataset version was built, so a
 * manifest can be traced back to the run that produced it.
 */

import { execSync } from "node:child_process";
import { hostname } from "node:os";

/** Version of this engine, recorded in every summary */
export const ENGINE_VERSION = "1.0.0";

export interface GitState {
  readonly commitSha: string;
  readonly commitShort: string;
  readonly branch: string;
  readonly isDirty: boolean;
  readonly commitDate: string;
}

export interface RunMetadata {
  readonly runId: string;
  readonly startedAt: string;
  readonly hostname?: string;
  readonly git?: GitState;
}

export interface ToolVersions {
  readonly engine: string;
  readonly node: string;
}

function git(args: string, cwd: string | undefined): string {
  return execSync(`git ${args}`, { stdio: "pipe", cwd }).toString().trim();
}

/**
 * Capture the current git state, or undefined outside a repository or when git
 * is unavailable.
 */
export function captureGitState(cwd?: string): GitState | undefined {
  try {
    git("rev-parse --git-dir", cwd);
    const commitSha = git("rev-parse HEAD", cwd);
    return {
      commitSha,
      commitShort: commitSha.substring(0, 7),
      branch: git("rev-parse --abbrev-ref HEAD", cwd),
      isDirty: git("status --porcelain", cwd).length > 0,
      commitDate: git("log -1 --format=%cI", cwd),
    };
  } catch {
    return undefined;
  }
}

export interface RunMetadataOptions {
  runId: string;
  /** Defaults to now */
  startedAt?: Date;
  /** Whether to capture git state (default: true) */
  captureGit?: boolean;
  /** Whether to capture the hostname (default: true) */
  captureHostname?: boolean;
}

/**
 * Create run metadata for the current process.
 */
export function createRunMetadata(options: RunMetadataOptions): RunMetadata {
  const startedAt = (options.startedAt ?? new Date()).toISOString();
  const host = options.captureHostname === false ? undefined : hostname();
  const gitState = options.captureGit === false ? undefined : captureGitState();

  return {
    runId: options.runId,
    startedAt,
    ...(host !== undefined && { hostname: host }),
    ...(gitState !== undefined && { git: gitState }),
  };
}

export function toolVersions(): ToolVersions {
  return { engine: ENGINE_VERSION, node: process.versions.node };
}
