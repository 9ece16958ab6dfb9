// =============================================================================
// Operation outcomes
// =============================================================================

/**
 * Result of applying one operation against one target. The gateway always
 * returns one of these; it never throws.
 */
export type OperationOutcome =
  | { kind: "added"; simulated?: boolean }
  | { kind: "already_present" }
  | { kind: "skipped"; reason: string }
  | { kind: "failed"; reason: string };

export type OutcomeKind = OperationOutcome["kind"];

export const added = (): OperationOutcome => ({ kind: "added" });
export const simulated = (): OperationOutcome => ({ kind: "added", simulated: true });
export const alreadyPresent = (): OperationOutcome => ({ kind: "already_present" });
export const skipped = (reason: string): OperationOutcome => ({ kind: "skipped", reason });
export const failed = (reason: string): OperationOutcome => ({ kind: "failed", reason });

/** `added` and `already_present` both count as pipeline success. */
export function isSuccessfulOutcome(outcome: OperationOutcome): boolean {
  return outcome.kind === "added" || outcome.kind === "already_present";
}

export function describeOutcome(outcome: OperationOutcome): string {
  switch (outcome.kind) {
    case "added":
      return outcome.simulated ? "would add" : "added";
    case "already_present":
      return "already present";
    case "skipped":
      return `skipped (${outcome.reason})`;
    case "failed":
      return `failed (${outcome.reason})`;
  }
}
