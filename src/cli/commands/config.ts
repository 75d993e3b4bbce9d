/**
 * config command - Show the effective configuration
 */

import chalk from "chalk";
import * as fs from "node:fs";
import type { AcctSyncConfig } from "../../core/config/index.js";
import { createLogger } from "../../utils/index.js";
import { resolveConfig, type CommonOptions } from "./options.js";

const logger = createLogger("config");

export interface ConfigOptions extends CommonOptions {
  json?: boolean;
}

export async function configCommand(options: ConfigOptions): Promise<void> {
  const config = resolveConfig(options);
  logger.debug({ options }, "Config command");

  if (options.json) {
    console.log(JSON.stringify(config, null, 2));
    return;
  }

  showCurrentConfig(config);
}

function showDefault(value: string): string {
  return value === "" ? chalk.dim("(not set)") : chalk.cyan(value);
}

/**
 * Show current configuration
 */
function showCurrentConfig(config: AcctSyncConfig): void {
  const policyExists = fs.existsSync(config.policyFile);

  console.log();
  console.log(chalk.cyan.bold("acct-sync Configuration"));
  console.log(chalk.dim("─".repeat(50)));

  console.log();
  console.log(chalk.white.bold("Eligibility"));
  console.log(`  Min UID:          ${config.minUid}`);
  console.log(`  No-login shells:  ${config.nologinShells.join(", ")}`);

  console.log();
  console.log(chalk.white.bold("Commands"));
  console.log(`  sacctmgr:         ${config.sacctmgrPath}`);
  console.log(`  getent:           ${config.getentPath}`);

  console.log();
  console.log(chalk.white.bold("Policy"));
  console.log(
    `  File:             ${config.policyFile} ${policyExists ? chalk.green("(found)") : chalk.yellow("(missing)")}`
  );
  console.log(`  fairshare:        ${showDefault(config.defaults.fairshare)}`);
  console.log(`  GrpTRES:          ${showDefault(config.defaults.GrpTRES)}`);
  console.log(`  GrpTRESRunMins:   ${showDefault(config.defaults.GrpTRESRunMins)}`);
  console.log();
}
