/**
 * Temporal leakage audit.
 *
 * Recordings made within a minute of each other usually come from the same
 * session: same speaker state, same room, often near-identical prompts. When
 * one session is spread across train and test, test scores overstate what the
 * model learned. This audit groups timestamped samples into sessions and
 * counts sessions whose members landed in more than one split.
 *
 * The audit is advisory. It never changes an assignment; its report feeds the
 * summary and the human-readable report only. When too few samples carry a
 * timestamp it reports `skipped_insufficient_timestamps` with null counts
 * rather than a zero that would read as "no leakage".
 */

import type { AssignedSample, Split } from "../types/index.js";

export type TemporalCheckStatus =
  | "completed"
  | "skipped_insufficient_timestamps"
  | "skipped_by_user";

export interface SessionCluster {
  readonly sessionId: number;
  readonly firstTimestampMs: number;
  readonly lastTimestampMs: number;
  readonly sampleCount: number;
  /** Distinct splits among the members, in train/val/test order */
  readonly splits: readonly Split[];
}

export interface LeakageReport {
  readonly status: TemporalCheckStatus;
  /** Percentage of samples with a timestamp, rounded to two decimals */
  readonly timestampCoveragePct: number;
  readonly totalClusters: number | null;
  /** Sessions whose members span more than one split */
  readonly clustersCrossingSplits: number | null;
  /** Sessions with members in both train and test */
  readonly clustersCrossingTrainTest: number | null;
  readonly crossingClusters: readonly SessionCluster[];
}

export interface LeakageAuditOptions {
  /** A gap of at least this many milliseconds starts a new session */
  sessionGapMs: number;
  /** Fraction of samples (0..1) that must carry a timestamp */
  minTimestampCoverage: number;
  skip?: boolean;
}

const SPLIT_ORDER: readonly Split[] = ["train", "val", "test"];

interface TimestampedSample {
  readonly timestampMs: number;
  readonly manifestRowIndex: number;
  readonly split: Split;
}

/**
 * Group timestamped samples into sessions. Samples are ordered by timestamp
 * (ties by manifest_row_index) and a new session starts whenever the gap to
 * the previous sample reaches `sessionGapMs`.
 */
export function detectSessions(
  samples: readonly TimestampedSample[],
  sessionGapMs: number
): SessionCluster[] {
  const ordered = [...samples].sort(
    (a, b) => a.timestampMs - b.timestampMs || a.manifestRowIndex - b.manifestRowIndex
  );

  const sessions: TimestampedSample[][] = [];
  let current: TimestampedSample[] = [];
  let previous: number | null = null;

  for (const sample of ordered) {
    if (previous !== null && sample.timestampMs - previous >= sessionGapMs) {
      sessions.push(current);
      current = [];
    }
    current.push(sample);
    previous = sample.timestampMs;
  }
  if (current.length > 0) {
    sessions.push(current);
  }

  return sessions.map((members, i) => {
    const present = new Set(members.map((member) => member.split));
    return {
      sessionId: i + 1,
      firstTimestampMs: members[0]?.timestampMs ?? 0,
      lastTimestampMs: members[members.length - 1]?.timestampMs ?? 0,
      sampleCount: members.length,
      splits: SPLIT_ORDER.filter((split) => present.has(split)),
    };
  });
}

function skipped(status: TemporalCheckStatus, coveragePct: number): LeakageReport {
  return {
    status,
    timestampCoveragePct: coveragePct,
    totalClusters: null,
    clustersCrossingSplits: null,
    clustersCrossingTrainTest: null,
    crossingClusters: [],
  };
}

/**
 * Audit the assigned samples for sessions that cross split boundaries.
 */
export function auditTemporalLeakage(
  samples: readonly AssignedSample[],
  options: LeakageAuditOptions
): LeakageReport {
  const timestamped: TimestampedSample[] = [];
  for (const sample of samples) {
    if (sample.timestampMs !== null && Number.isFinite(sample.timestampMs)) {
      timestamped.push({
        timestampMs: sample.timestampMs,
        manifestRowIndex: sample.manifestRowIndex,
        split: sample.split,
      });
    }
  }

  const coverage = samples.length === 0 ? 0 : timestamped.length / samples.length;
  const coveragePct = Math.round(coverage * 10_000) / 100;

  if (options.skip) {
    return skipped("skipped_by_user", coveragePct);
  }

  if (timestamped.length === 0 || coverage < options.minTimestampCoverage) {
    return skipped("skipped_insufficient_timestamps", coveragePct);
  }

  const sessions = detectSessions(timestamped, options.sessionGapMs);
  const crossing = sessions.filter((session) => session.splits.length > 1);

  return {
    status: "completed",
    timestampCoveragePct: coveragePct,
    totalClusters: sessions.length,
    clustersCrossingSplits: crossing.length,
    clustersCrossingTrainTest: crossing.filter(
      (session) => session.splits.includes("train") && session.splits.includes("test")
    ).length,
    crossingClusters: crossing,
  };
}
