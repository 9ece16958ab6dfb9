import chalk from "chalk";
import type { DnsHaApiClient } from "../lib/api-client";
import { reportError } from "./shared";

export async function ready(client: DnsHaApiClient): Promise<number> {
  try {
    const verdict = await client.ready();
    console.log(verdict.ready ? chalk.green("✓ Ready") : chalk.red("✗ Not ready"));
    return verdict.ready ? 0 : 1;
  } catch (error) {
    reportError(error);
    return 1;
  }
}
