/**
 * Runtime Validation Schemas
 *
 * Zod schemas for validating configuration at runtime.
 *
 * @module
 */

import { z } from "zod";

// =============================================================================
// Configuration Schema
// =============================================================================

/**
 * Site-wide default limits. An empty string means "no default".
 */
export const DefaultLimitsSchema = z
  .object({
    /** Numeric share, or `parent` to inherit from the account */
    fairshare: z.string().default("2"),
    GrpTRES: z.string().default(""),
    GrpTRESRunMins: z.string().default(""),
  })
  .strict();

export type DefaultLimits = z.infer<typeof DefaultLimitsSchema>;

export const AcctSyncConfigSchema = z
  .object({
    /** Lowest UID considered a cluster user */
    minUid: z.coerce.number().int().nonnegative().default(1002),

    /** Path to sacctmgr, used for queries and in emitted commands */
    sacctmgrPath: z.string().min(1).default("sacctmgr"),

    /** Path to getent, used to enumerate passwd and group */
    getentPath: z.string().min(1).default("getent"),

    /** Layered scope:attribute:value policy file */
    policyFile: z.string().min(1).default("/etc/slurm/acct-sync.conf"),

    /** Login shells that mark an account as not a cluster user */
    nologinShells: z.array(z.string().min(1)).default(["/sbin/nologin"]),

    defaults: DefaultLimitsSchema.default({}),
  })
  .strict();

export type AcctSyncConfig = z.infer<typeof AcctSyncConfigSchema>;

// =============================================================================
// Validation Helpers
// =============================================================================

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: z.ZodError };

/**
 * Safely validate data against a schema (returns result object)
 */
export function safeValidate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): ValidationResult<T> {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error };
}

/**
 * Format Zod errors into readable messages
 */
export function formatZodError(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
