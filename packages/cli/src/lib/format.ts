import chalk from "chalk";
import {
  describeOutcome,
  PIPELINE_STAGES,
  totalCounts,
  type AggregateHealth,
  type HealthStatus,
  type ItemStage,
  type OperationOutcome,
  type ReconciliationReport,
} from "@dnsha/core";

const STAGE_TITLES: Record<ItemStage, string> = {
  blocklists: "Blocklists",
  whitelist: "Whitelist",
  regexPatterns: "Regex patterns",
};

const ITEM_STAGES = PIPELINE_STAGES.filter(
  (stage): stage is ItemStage => stage in STAGE_TITLES,
);

/** Exit codes of `dnsha status`, matching the container health check. */
export const STATUS_EXIT_CODES: Record<HealthStatus, number> = {
  healthy: 0,
  degraded: 1,
  unhealthy: 2,
};

function outcomeMark(outcome: OperationOutcome): string {
  switch (outcome.kind) {
    case "added":
      return outcome.simulated ? chalk.cyan("~") : chalk.green("+");
    case "already_present":
      return chalk.gray("=");
    case "skipped":
      return chalk.gray("-");
    case "failed":
      return chalk.red("✗");
  }
}

export function formatReport(report: ReconciliationReport, verbose = false): string[] {
  const lines: string[] = [];
  const mode = report.dryRun ? chalk.yellow("DRY-RUN") : chalk.magenta("LIVE");
  lines.push(chalk.bold(`Profile ${chalk.cyan(report.profile)} → ${report.target} (${mode})`));

  for (const warning of report.warnings) {
    lines.push(chalk.yellow(`  ⚠ ${warning}`));
  }

  for (const stage of ITEM_STAGES) {
    const c = report.stages[stage];
    lines.push(
      `  ${STAGE_TITLES[stage].padEnd(15)} ${c.attempted} attempted, ${c.added} added, ` +
        `${c.alreadyPresent} already present, ${c.skipped} skipped, ${c.failed} failed`,
    );
  }

  const shown = verbose || report.dryRun
    ? report.items
    : report.items.filter((item) => item.outcome.kind === "failed");
  for (const item of shown) {
    lines.push(`    ${outcomeMark(item.outcome)} ${item.label}: ${item.subject} ${chalk.gray(describeOutcome(item.outcome))}`);
  }

  if (report.rebuild.executed && report.rebuild.outcome) {
    lines.push(`  Index rebuild   ${describeOutcome(report.rebuild.outcome)}`);
  }

  const totals = totalCounts(report);
  if (report.overallSuccess) {
    lines.push(
      chalk.green(
        report.dryRun
          ? `✓ Dry-run complete: ${totals.attempted} change(s) would be applied`
          : `✓ Applied in ${report.durationMs}ms (${totals.failed} item failure(s))`,
      ),
    );
  } else {
    lines.push(chalk.red(`✗ ${report.abortReason ?? "Reconciliation failed"}`));
  }
  return lines;
}

const STATUS_COLORS: Record<HealthStatus, (text: string) => string> = {
  healthy: chalk.green,
  degraded: chalk.yellow,
  unhealthy: chalk.red,
};

export function formatHealth(health: AggregateHealth): string[] {
  const lines = [chalk.bold(`Status: ${STATUS_COLORS[health.status](health.status.toUpperCase())}`)];

  for (const result of Object.values(health.checks)) {
    const mark = result.status === "pass" ? chalk.green("✓") : chalk.red("✗");
    const { host, port, answer, error, latencyMs } = result.detail;
    const where = host !== undefined ? ` ${host}:${port}` : "";
    const info = result.status === "pass" ? `${answer ?? ""} (${latencyMs ?? "?"}ms)` : `${error ?? "failed"}`;
    lines.push(`  ${mark} ${result.checkName.padEnd(20)}${where} ${chalk.gray(info)}`);
  }

  lines.push(chalk.gray(`Checked at ${health.timestamp}`));
  return lines;
}
