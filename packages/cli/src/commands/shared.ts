import chalk from "chalk";
import { ApiError } from "../lib/api-client";

export interface GlobalOptions {
  apiUrl?: string;
}

export function reportError(error: unknown): void {
  if (error instanceof ApiError) {
    console.error(chalk.red(`  ${error.message}`));
    if (error.body?.available && error.body.available.length > 0) {
      console.error(chalk.gray(`  Available profiles: ${error.body.available.join(", ")}`));
    }
    for (const issue of error.body?.issues ?? []) {
      console.error(chalk.gray(`  - ${issue}`));
    }
    return;
  }
  console.error(chalk.red(`  ${error instanceof Error ? error.message : String(error)}`));
}
