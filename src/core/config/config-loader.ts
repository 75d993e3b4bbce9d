/**
 * Configuration loader
 *
 * Layers, lowest precedence first: built-in defaults, JSON config file,
 * environment variables, command-line overrides. The merged object is
 * validated once with AcctSyncConfigSchema.
 */

import * as fs from "node:fs";
import { ConfigurationError, ErrorCode } from "../errors.js";
import {
  AcctSyncConfigSchema,
  formatZodError,
  safeValidate,
  type AcctSyncConfig,
} from "../../utils/validation.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("config");

export const CONFIG_FILE_ENV = "ACCT_SYNC_CONFIG";

/**
 * Environment variable for each top-level key
 */
const ENV_KEYS = {
  minUid: "MINUID",
  sacctmgrPath: "SACCTMGR",
  getentPath: "GETENT",
  policyFile: "POLICY_FILE",
} as const;

const ENV_DEFAULT_KEYS = {
  fairshare: "FAIRSHARE",
  GrpTRES: "GRPTRES",
  GrpTRESRunMins: "GRPTRESRUNMINS",
} as const;

/**
 * Values given on the command line
 */
export interface ConfigOverrides {
  minUid?: string | number;
  sacctmgrPath?: string;
  getentPath?: string;
  policyFile?: string;
}

export interface LoadConfigOptions {
  /** JSON config file; falls back to $ACCT_SYNC_CONFIG */
  configFile?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
}

type RawLayer = Record<string, unknown>;

function isRecord(value: unknown): value is RawLayer {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function definedEntries(layer: Record<string, unknown>): RawLayer {
  return Object.fromEntries(Object.entries(layer).filter(([, value]) => value !== undefined));
}

function readConfigFile(filePath: string): RawLayer {
  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new ConfigurationError(`Cannot read config file ${filePath}`, ErrorCode.CONFIG_FILE_UNREADABLE, {
      filePath,
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`Config file ${filePath} is not valid JSON`, ErrorCode.CONFIG_FILE_UNREADABLE, {
      filePath,
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  if (!isRecord(parsed)) {
    throw new ConfigurationError(`Config file ${filePath} must contain a JSON object`, ErrorCode.CONFIG_INVALID, {
      filePath,
    });
  }
  return parsed;
}

function envLayer(env: NodeJS.ProcessEnv): { top: RawLayer; defaults: RawLayer } {
  const top: RawLayer = {};
  for (const [key, name] of Object.entries(ENV_KEYS)) {
    const value = env[name];
    if (value !== undefined && value !== "") top[key] = value;
  }
  // Defaults may legitimately be set to "" to disable them
  const defaults: RawLayer = {};
  for (const [key, name] of Object.entries(ENV_DEFAULT_KEYS)) {
    const value = env[name];
    if (value !== undefined) defaults[key] = value;
  }
  return { top, defaults };
}

/**
 * Merge all layers and validate.
 *
 * @throws ConfigurationError when the file is unreadable or a value is invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): AcctSyncConfig {
  const env = options.env ?? process.env;
  const configFile = options.configFile ?? env[CONFIG_FILE_ENV];

  const fileLayer = configFile ? readConfigFile(configFile) : {};
  const fromEnv = envLayer(env);
  const fileDefaults = fileLayer.defaults;

  const merged: RawLayer = {
    ...fileLayer,
    ...fromEnv.top,
    ...definedEntries({ ...options.overrides }),
    defaults:
      fileDefaults === undefined || isRecord(fileDefaults)
        ? { ...fileDefaults, ...fromEnv.defaults }
        : fileDefaults,
  };

  const result = safeValidate(AcctSyncConfigSchema, merged);
  if (!result.success) {
    const issues = formatZodError(result.error);
    throw new ConfigurationError(`Invalid configuration: ${issues.join("; ")}`, ErrorCode.CONFIG_INVALID, {
      issues,
      configFile,
    });
  }

  logger.debug({ config: result.data, configFile }, "Configuration loaded");
  return result.data;
}
