import chalk from "chalk";
import type { DnsHaApiClient } from "../lib/api-client";
import { reportError } from "./shared";

export async function profiles(client: DnsHaApiClient): Promise<number> {
  try {
    const ids = await client.listProfiles();
    if (ids.length === 0) {
      console.log(chalk.yellow("No profiles found. Check PROFILES_DIR on the API host."));
      return 0;
    }
    console.log(chalk.blue.bold("Available profiles\n"));
    for (const id of ids) {
      console.log(`  ${chalk.cyan(id)}`);
    }
    return 0;
  } catch (error) {
    reportError(error);
    return 1;
  }
}
