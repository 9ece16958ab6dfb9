import ora from "ora";
import type { DnsHaApiClient } from "../lib/api-client";
import { formatHealth, STATUS_EXIT_CODES } from "../lib/format";
import { reportError } from "./shared";

/**
 * `dnsha status`: exit 0 healthy, 1 degraded, 2 unhealthy or unreachable.
 */
export async function status(client: DnsHaApiClient): Promise<number> {
  const spinner = ora("Probing DNS instances...").start();

  try {
    const health = await client.health();
    spinner.stop();
    for (const line of formatHealth(health)) {
      console.log(line);
    }
    return STATUS_EXIT_CODES[health.status];
  } catch (error) {
    spinner.fail("Health check failed");
    reportError(error);
    return STATUS_EXIT_CODES.unhealthy;
  }
}
