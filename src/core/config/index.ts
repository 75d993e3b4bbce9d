/**
 * Configuration Module
 */

export * from "./config-loader.js";
export {
  AcctSyncConfigSchema,
  DefaultLimitsSchema,
  type AcctSyncConfig,
  type DefaultLimits,
} from "../../utils/validation.js";
