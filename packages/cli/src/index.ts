#!/usr/bin/env node

import { Command } from "commander";
import chalk from "chalk";
import { DNSHA_VERSION } from "@dnsha/core";
import { DnsHaApiClient, resolveApiUrl } from "./lib/api-client";
import { apply } from "./commands/apply";
import { profiles } from "./commands/profiles";
import { status } from "./commands/status";
import { ready } from "./commands/ready";
import type { GlobalOptions } from "./commands/shared";

const program = new Command();

program
  .name("dnsha")
  .description("Operator CLI for the redundant DNS filtering control plane")
  .version(DNSHA_VERSION)
  .option("--api-url <url>", "Control-plane API base URL (default: $DNSHA_API_URL or http://localhost:8888)");

function client(): DnsHaApiClient {
  return new DnsHaApiClient(resolveApiUrl(program.opts<GlobalOptions>().apiUrl));
}

function exitWith(code: number): void {
  process.exitCode = code;
}

// Reconciliation
program
  .command("apply")
  .alias("reconcile")
  .description("Apply a security profile to the primary instance")
  .argument("<profile>", "Profile id, e.g. standard, family, paranoid")
  .option("-n, --dry-run", "Show what would change without touching the instance")
  .option("-v, --verbose", "List every item, not only failures")
  .action(async (profileId: string, options: { dryRun?: boolean; verbose?: boolean }) => {
    exitWith(await apply(profileId, options, client()));
  });

program
  .command("profiles")
  .description("List available profiles")
  .action(async () => {
    exitWith(await profiles(client()));
  });

// Health
program
  .command("status")
  .description("Show aggregated health (exit 0 healthy, 1 degraded, 2 unhealthy)")
  .action(async () => {
    exitWith(await status(client()));
  });

program
  .command("ready")
  .description("Check readiness (exit 0 when every required role has a passing instance)")
  .action(async () => {
    exitWith(await ready(client()));
  });

program.exitOverride();

program.parseAsync().catch((error: unknown) => {
  const code = error instanceof Object && "code" in error ? error.code : undefined;
  if (code !== "commander.help" && code !== "commander.version" && code !== "commander.helpDisplayed") {
    console.error(chalk.red("Error:"), error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  }
});
