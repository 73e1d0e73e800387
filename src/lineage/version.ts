/**
 * Dataset version identifiers: "v1", "v2", …
 */

import { ConfigError } from "../config/env.js";

export interface DatasetVersion {
  /** Canonical identifier, e.g. "v3" */
  readonly id: string;
  /** 1-based ordinal */
  readonly number: number;
}

export class InvalidVersionError extends ConfigError {
  constructor(value: string) {
    super(`Invalid dataset version "${value}": expected v<N> with N ≥ 1 (e.g. v1, v2)`);
    this.name = "InvalidVersionError";
  }
}

/**
 * Parse "v3", "V3" or "3" into a dataset version.
 *
 * @throws InvalidVersionError
 */
export function parseDatasetVersion(value: string): DatasetVersion {
  const match = /^[vV]?(\d+)$/.exec(value.trim());
  const digits = match?.[1];
  if (digits === undefined) {
    throw new InvalidVersionError(value);
  }
  const number = parseInt(digits, 10);
  if (number < 1) {
    throw new InvalidVersionError(value);
  }
  return { id: `v${number}`, number };
}

/**
 * All versions before the given one, oldest first.
 */
export function priorVersions(version: DatasetVersion): DatasetVersion[] {
  return Array.from({ length: version.number - 1 }, (_, i) => ({ id: `v${i + 1}`, number: i + 1 }));
}
