/**
 * Options shared by every command
 */

import type { Command } from "commander";
import { loadConfig, type AcctSyncConfig } from "../../core/config/index.js";

export interface CommonOptions {
  config?: string;
  minUid?: string;
  policy?: string;
  sacctmgr?: string;
  getent?: string;
}

export function addCommonOptions(command: Command): Command {
  return command
    .option("-c, --config <file>", "JSON configuration file (default: $ACCT_SYNC_CONFIG)")
    .option("--min-uid <uid>", "lowest UID treated as a cluster user (default: $MINUID or 1002)")
    .option("-p, --policy <file>", "policy file of scope:attribute:value lines (default: $POLICY_FILE)")
    .option("--sacctmgr <path>", "sacctmgr executable (default: $SACCTMGR or sacctmgr)")
    .option("--getent <path>", "getent executable (default: $GETENT or getent)");
}

export function resolveConfig(options: CommonOptions): AcctSyncConfig {
  return loadConfig({
    configFile: options.config,
    overrides: {
      minUid: options.minUid,
      policyFile: options.policy,
      sacctmgrPath: options.sacctmgr,
      getentPath: options.getent,
    },
  });
}
