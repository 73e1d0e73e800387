/**
 * Version lifecycle.
 *
 * - building  → validated (splits computed and validation passed or overridden)
 * - validated → frozen    (lineage checked, artifacts committed)
 *
 * A frozen version is terminal: its artifacts are read-only inputs to every
 * later version.
 */

export type VersionState = "building" | "validated" | "frozen";

export const VALID_VERSION_TRANSITIONS: Readonly<
  Record<VersionState, ReadonlyArray<VersionState>>
> = {
  building: ["validated"],
  validated: ["frozen"],
  frozen: [],
};

/**
 * Returns true if transitioning from `from` to `to` is a valid state change.
 */
export function canTransition(from: VersionState, to: VersionState): boolean {
  return VALID_VERSION_TRANSITIONS[from].includes(to);
}

export class InvalidVersionTransition extends Error {
  constructor(
    public readonly from: VersionState,
    public readonly to: VersionState
  ) {
    super(`Invalid version state transition: ${from} → ${to}`);
    this.name = "InvalidVersionTransition";
  }
}

/**
 * Tracks one version build through its states.
 */
export class VersionLifecycle {
  private current: VersionState = "building";
  private readonly visited: VersionState[] = ["building"];

  constructor(public readonly versionId: string) {}

  get state(): VersionState {
    return this.current;
  }

  get history(): readonly VersionState[] {
    return [...this.visited];
  }

  /**
   * @throws InvalidVersionTransition
   */
  advance(to: VersionState): void {
    if (!canTransition(this.current, to)) {
      throw new InvalidVersionTransition(this.current, to);
    }
    this.current = to;
    this.visited.push(to);
  }
}
