import type { OperationOutcome } from "./outcome";

export type ItemStage = "blocklists" | "whitelist" | "regexPatterns";

export type PipelineStage =
  | "load"
  | "verify_connectivity"
  | ItemStage
  | "rebuild_index"
  | "report";

/** Stage order is fixed; the rebuild is always last before the report. */
export const PIPELINE_STAGES: readonly PipelineStage[] = [
  "load",
  "verify_connectivity",
  "blocklists",
  "whitelist",
  "regexPatterns",
  "rebuild_index",
  "report",
] as const;

export interface StageCounts {
  attempted: number;
  added: number;
  alreadyPresent: number;
  skipped: number;
  failed: number;
}

export interface ReportItem {
  stage: ItemStage;
  /** Blocklist URL, whitelist domain or regex pattern. */
  subject: string;
  label: string;
  outcome: OperationOutcome;
}

export interface RebuildResult {
  /** False in dry-run and when a fatal abort happened earlier. */
  executed: boolean;
  outcome?: OperationOutcome;
}

export interface ReconciliationReport {
  profile: string;
  target: string;
  dryRun: boolean;
  overallSuccess: boolean;
  /** Set when a fatal stage stopped or tainted the run. */
  abortReason?: string;
  warnings: string[];
  stages: Record<ItemStage, StageCounts>;
  rebuild: RebuildResult;
  items: ReportItem[];
  startedAt: string;
  durationMs: number;
}

export function emptyStageCounts(): StageCounts {
  return { attempted: 0, added: 0, alreadyPresent: 0, skipped: 0, failed: 0 };
}

/**
 * Fold one outcome into a stage's counts. Skipped items were never
 * attempted and are not failures.
 */
export function tallyOutcome(counts: StageCounts, outcome: OperationOutcome): StageCounts {
  switch (outcome.kind) {
    case "skipped":
      return { ...counts, skipped: counts.skipped + 1 };
    case "added":
      return { ...counts, attempted: counts.attempted + 1, added: counts.added + 1 };
    case "already_present":
      return {
        ...counts,
        attempted: counts.attempted + 1,
        alreadyPresent: counts.alreadyPresent + 1,
      };
    case "failed":
      return { ...counts, attempted: counts.attempted + 1, failed: counts.failed + 1 };
  }
}

export function totalCounts(report: Pick<ReconciliationReport, "stages">): StageCounts {
  return Object.values(report.stages).reduce(
    (acc, c) => ({
      attempted: acc.attempted + c.attempted,
      added: acc.added + c.added,
      alreadyPresent: acc.alreadyPresent + c.alreadyPresent,
      skipped: acc.skipped + c.skipped,
      failed: acc.failed + c.failed,
    }),
    emptyStageCounts(),
  );
}
