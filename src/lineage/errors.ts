/**
 * Lineage violations.
 */

import type { Split } from "../types/index.js";

export interface LineageIssue {
  readonly pairSha256: string;
  /** Version whose frozen test set first contained the identity */
  readonly frozenIn: string;
  readonly fileName: string;
  /** Where the identity landed in the candidate build; null when absent */
  readonly foundIn: Split | null;
}

/**
 * A build would drop a frozen test identity or move it out of test.
 */
export class LineageViolation extends Error {
  public readonly versionId: string;
  public readonly missing: readonly LineageIssue[];
  public readonly moved: readonly LineageIssue[];

  constructor(versionId: string, missing: readonly LineageIssue[], moved: readonly LineageIssue[]) {
    super(
      `Lineage violation in ${versionId}: ${missing.length} frozen test identity(ies) missing, ` +
        `${moved.length} moved out of test`
    );
    this.name = "LineageViolation";
    this.versionId = versionId;
    this.missing = missing;
    this.moved = moved;
  }

  format(): string {
    const lines = [this.message + ":"];
    for (const issue of this.missing) {
      lines.push(
        `  - missing: ${issue.pairSha256} (${issue.fileName}, frozen in ${issue.frozenIn})`
      );
    }
    for (const issue of this.moved) {
      lines.push(
        `  - moved to ${issue.foundIn ?? "?"}: ${issue.pairSha256} (${issue.fileName}, frozen in ${issue.frozenIn})`
      );
    }
    return lines.join("\n");
  }
}
