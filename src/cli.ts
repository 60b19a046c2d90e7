#!/usr/bin/env node
import "dotenv/config";
import { Command } from "commander";
import chalk from "chalk";
import inquirer from "inquirer";
import { applyCliOverrides, resolveMode, type CliOptions } from "./lib/cliOptions.js";
import { loadConfig } from "./lib/config.js";
import { createConsoleOutput } from "./lib/console.js";
import { DashboardClient } from "./lib/dashboardClient.js";
import { ConfigError, errorMessage } from "./lib/errors.js";
import { logger } from "./lib/logger.js";
import { createRateLimiter } from "./lib/rateLimiter.js";
import { runSync, summarize } from "./sync.js";

async function confirmOverwrite(): Promise<boolean> {
  const { overwrite } = await inquirer.prompt<{ overwrite: boolean }>([
    {
      type: "confirm",
      name: "overwrite",
      message: "Overwrite each network's existing L3 rules?",
      default: false,
    },
  ]);
  return overwrite;
}

async function main(options: CliOptions) {
  const mode = resolveMode(options);
  const config = applyCliOverrides(loadConfig(), options);
  const out = createConsoleOutput();

  const client = new DashboardClient({
    apiKey: config.apiKey,
    baseUrl: config.apiBase,
    appName: config.appName,
    retries: config.maxRetries,
    schedule: createRateLimiter({ windowMs: 1000, maxPerWindow: config.rateLimitPerSecond }),
  });

  const report = await runSync({ client, config, mode, confirmOverwrite, out, log: logger });

  out.line(chalk.bold("\nSummary"));
  for (const line of summarize(report)) out.line(`  ${line}`);
  if (report.status === "aborted") process.exitCode = 1;
}

const program = new Command();

program
  .name("policy-object-sync")
  .description("Create policy objects, policy object groups and L3 outbound firewall rules from CSV")
  .option("--objects <file>", "Policy objects CSV (default: POLICY_OBJECTS_CSV or policy_objects.csv)")
  .option("--rules <file>", "L3 outbound rules CSV (default: L3_RULES_CSV or l3_outbound_rules.csv)")
  .option("-n, --network <name...>", "Only apply rules to these networks (default: NETWORK_NAMES)")
  .option("--overwrite", "Replace each network's existing L3 rules without asking")
  .option("--merge", "Merge with each network's existing L3 rules without asking")
  .option("-y, --yes", "Do not prompt; merge with existing rules unless --overwrite is given")
  .action(async (options: CliOptions) => {
    try {
      await main(options);
    } catch (err) {
      if (err instanceof ConfigError) {
        console.error(chalk.red(err.message));
      } else {
        logger.error({ err: errorMessage(err) }, "Sync failed");
        console.error(chalk.red("Error:"), errorMessage(err));
      }
      process.exitCode = 1;
    }
  });

await program.parseAsync();
