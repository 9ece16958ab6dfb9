import chalk from "chalk";
import ora from "ora";
import type { DnsHaApiClient } from "../lib/api-client";
import { formatReport } from "../lib/format";
import { reportError } from "./shared";

interface ApplyOptions {
  dryRun?: boolean;
  verbose?: boolean;
}

/**
 * `dnsha apply <profile>`: reconcile a profile against the primary instance.
 * Exit code 0 on overall success, 1 otherwise.
 */
export async function apply(
  profileId: string,
  options: ApplyOptions,
  client: DnsHaApiClient,
): Promise<number> {
  const dryRun = options.dryRun ?? false;
  const spinner = ora(
    dryRun ? `Planning ${profileId} (dry-run)...` : `Applying ${profileId}...`,
  ).start();

  try {
    const report = await client.reconcile(profileId, dryRun);
    if (report.overallSuccess) {
      spinner.succeed(dryRun ? "Dry-run complete" : "Profile applied");
    } else {
      spinner.fail("Reconciliation failed");
    }
    console.log();
    for (const line of formatReport(report, options.verbose)) {
      console.log(line);
    }
    if (dryRun) {
      console.log(chalk.gray("\nNo changes were made. Run without --dry-run to apply."));
    }
    return report.overallSuccess ? 0 : 1;
  } catch (error) {
    spinner.fail(`Could not apply ${profileId}`);
    reportError(error);
    return 1;
  }
}
