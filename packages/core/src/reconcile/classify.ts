import { added, alreadyPresent, failed, type OperationOutcome } from "./outcome";

/** What the command/API seam hands back for one call. */
export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export const DEFAULT_IDEMPOTENCY_MARKERS: readonly string[] = ["already exists", "already"];

/**
 * Classify the response of a mutating call.
 *
 * Output mentioning one of the markers (case-insensitive substring) means the
 * item is already there, whatever the exit code. That is a success: repeated
 * runs against an unchanged profile converge to zero `added` outcomes.
 * Otherwise exit 0 is `added` and any other exit is `failed`.
 */
export function classifyMutation(
  result: CommandResult,
  markers: readonly string[] = DEFAULT_IDEMPOTENCY_MARKERS,
): OperationOutcome {
  const output = `${result.stdout}\n${result.stderr}`.toLowerCase();

  if (markers.some((m) => m.length > 0 && output.includes(m.toLowerCase()))) {
    return alreadyPresent();
  }

  if (result.exitCode === 0) {
    return added();
  }

  const reason = result.stderr.trim() || result.stdout.trim() || `exit code ${result.exitCode}`;
  return failed(reason);
}
