/**
 * Version lineage.
 *
 * For version k > 1, every identity frozen into the test split of v1..v(k-1)
 * must be in version k's test split. The manager reads prior frozen sets
 * through a FrozenTestSetStore, so it works the same against committed
 * artifact directories and in-memory fixtures.
 */

import { createSilentLogger, type Logger } from "../logging/index.js";
import { FatalInputError } from "../shared/errors.js";
import type { Split } from "../types/index.js";
import { LineageViolation, type LineageIssue } from "./errors.js";
import type { FrozenTestEntry, FrozenTestSetStore } from "./store.js";
import { priorVersions, type DatasetVersion } from "./version.js";

export interface PriorTestIdentity {
  /** Earliest version whose frozen test set contains the identity */
  readonly frozenIn: string;
  readonly fileName: string;
  readonly audioSha256: string;
  readonly transcriptSha256: string;
}

export interface PriorTestIdentities {
  /** Prior version ids, oldest first */
  readonly versions: readonly string[];
  /** pair_sha256 → where it was first frozen */
  readonly identities: ReadonlyMap<string, PriorTestIdentity>;
}

export type LineageCheck =
  | { readonly ok: true }
  | { readonly ok: false; readonly error: LineageViolation };

export class VersionLineageManager {
  private readonly logger: Logger;

  constructor(
    private readonly store: FrozenTestSetStore,
    logger?: Logger
  ) {
    this.logger = (logger ?? createSilentLogger()).child({ component: "lineage" });
  }

  /**
   * Load the frozen test identities of every version before `version`.
   *
   * Each frozen set must contain its predecessor's; a set that lost an identity
   * means the committed lineage was tampered with.
   *
   * @throws FatalInputError if any prior set is missing, corrupt or shrinks
   */
  async loadPriorTestIdentities(version: DatasetVersion): Promise<PriorTestIdentities> {
    const versions = priorVersions(version);
    const identities = new Map<string, PriorTestIdentity>();
    let previous: { id: string; pairs: Set<string> } | null = null;

    for (const prior of versions) {
      const entries: readonly FrozenTestEntry[] = await this.store.readFrozenTestSet(prior);
      const pairs = new Set(entries.map((entry) => entry.pairSha256));

      if (previous !== null) {
        const dropped = [...previous.pairs].filter((pair) => !pairs.has(pair));
        if (dropped.length > 0) {
          throw new FatalInputError(
            `Frozen test set of ${prior.id} is missing ${dropped.length} identity(ies) ` +
              `frozen in ${previous.id} (first: ${dropped[0]})`
          );
        }
      }

      for (const entry of entries) {
        if (!identities.has(entry.pairSha256)) {
          identities.set(entry.pairSha256, {
            frozenIn: prior.id,
            fileName: entry.fileName,
            audioSha256: entry.audioSha256,
            transcriptSha256: entry.transcriptSha256,
          });
        }
      }

      this.logger.debug("Loaded prior frozen test set", {
        version: prior.id,
        identities: entries.length,
      });
      previous = { id: prior.id, pairs };
    }

    if (versions.length > 0) {
      this.logger.info("Loaded prior test identities", {
        versions: versions.map((v) => v.id),
        identities: identities.size,
      });
    }

    return { versions: versions.map((v) => v.id), identities };
  }

  /**
   * Check a candidate build against the prior identities.
   *
   * @param candidateTest pair_sha256 values in the candidate's test split
   * @param placements split of every pair_sha256 in the candidate build
   */
  validate(
    versionId: string,
    prior: PriorTestIdentities,
    candidateTest: ReadonlySet<string>,
    placements: ReadonlyMap<string, Split>
  ): LineageCheck {
    const missing: LineageIssue[] = [];
    const moved: LineageIssue[] = [];

    for (const [pairSha256, identity] of prior.identities) {
      if (candidateTest.has(pairSha256)) {
        continue;
      }
      const issue: LineageIssue = {
        pairSha256,
        frozenIn: identity.frozenIn,
        fileName: identity.fileName,
        foundIn: placements.get(pairSha256) ?? null,
      };
      if (issue.foundIn === null) {
        missing.push(issue);
      } else {
        moved.push(issue);
      }
    }

    if (missing.length === 0 && moved.length === 0) {
      return { ok: true };
    }

    const error = new LineageViolation(versionId, missing, moved);
    this.logger.error(error.message, { missing: missing.length, moved: moved.length });
    return { ok: false, error };
  }
}
