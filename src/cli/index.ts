#!/usr/bin/env node

/**
 * acct-sync CLI
 * Reconciles UNIX users and groups with Slurm accounting associations
 */

import { Command } from "commander";
import chalk from "chalk";
import { planCommand } from "./commands/plan.js";
import { explainCommand } from "./commands/explain.js";
import { configCommand } from "./commands/config.js";
import { addCommonOptions } from "./commands/options.js";
import { wrapError } from "../core/errors.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("cli");

const program = new Command();

program
  .name("acct-sync")
  .description("Print the sacctmgr commands that bring Slurm user associations in line with UNIX accounts and policy")
  .version("0.1.0")
  .configureOutput({
    writeErr: (str) => process.stderr.write(chalk.red(str)),
  });

// =============================================================================
// Commands
// =============================================================================

addCommonOptions(
  program
    .command("plan", { isDefault: true })
    .description("Print diagnostics and reconciliation commands")
    .option("--json", "Print the plan as JSON")
    .option("--no-delete", "Report orphaned scheduler users instead of deleting them")
    .option("-q, --quiet", "Omit ### diagnostic lines")
).action(planCommand);

addCommonOptions(
  program
    .command("explain")
    .description("Show how one user's limits are resolved and what would change")
    .argument("<user>", "user name")
).action(explainCommand);

addCommonOptions(
  program
    .command("config")
    .description("Show the effective configuration")
    .option("--json", "Print as JSON")
).action(configCommand);

// =============================================================================
// Global Error Handling
// =============================================================================

function handleError(error: unknown): void {
  const failure = wrapError(error);
  logger.error({ err: failure }, "CLI error occurred");
  console.error(chalk.red(`\nError [${failure.code}]: ${failure.message}`));
  if (process.env.DEBUG || process.env.NODE_ENV === "development") {
    console.error(chalk.dim(failure.stack));
  }
  process.exit(1);
}

process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, "Unhandled promise rejection");
  handleError(reason);
});

process.on("uncaughtException", (error) => {
  logger.error({ err: error }, "Uncaught exception");
  handleError(error);
});

// =============================================================================
// Parse and Execute
// =============================================================================

program.parseAsync(process.argv).catch(handleError);
