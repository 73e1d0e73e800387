/**
 * Error taxonomy shared across pipeline stages.
 *
 * ConfigError lives with the configuration loaders and LineageViolation with
 * the lineage manager; the classes here are the ones several stages raise.
 */

/**
 * Inventory or prior-version artifacts are missing, unreadable or corrupt.
 * Aborts the build before anything is written.
 */
export class FatalInputError extends Error {
  public readonly path: string | undefined;

  constructor(message: string, path?: string) {
    super(message);
    this.name = "FatalInputError";
    this.path = path;
  }

  format(): string {
    return this.path === undefined
      ? `Fatal input error: ${this.message}`
      : `Fatal input error: ${this.message} (${this.path})`;
  }
}

/**
 * A failure confined to one inventory row. Never aborts the batch; the row is
 * excluded and the failure recorded.
 */
export class PerSampleError extends Error {
  public readonly manifestRowIndex: number | undefined;

  constructor(message: string, manifestRowIndex?: number) {
    super(message);
    this.name = "PerSampleError";
    this.manifestRowIndex = manifestRowIndex;
  }
}

/**
 * Split adequacy checks failed and no override was given.
 */
export class ValidationFailure extends Error {
  public readonly errors: readonly string[];

  constructor(message: string, errors: readonly string[]) {
    super(message);
    this.name = "ValidationFailure";
    this.errors = errors;
  }

  format(): string {
    const lines = ["Split validation failed:"];
    for (const error of this.errors) {
      lines.push(`  - ${error}`);
    }
    lines.push("Use --allow_small_splits to override minimum thresholds");
    return lines.join("\n");
  }
}

/**
 * Render any thrown value as a single message line.
 */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
