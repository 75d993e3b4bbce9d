/**
 * plan command - Print the sacctmgr commands that reconcile the scheduler
 *
 * Output is plain text on stdout: `###` diagnostic lines followed by one
 * command per line, so it can be filtered and piped to a shell:
 *
 *   acct-sync plan | grep -v '^###' | sh
 */

import { formatDiagnostic } from "../../core/diagnostics/index.js";
import {
  createAccountReconciler,
  type ReconciliationPlan,
} from "../../core/reconciliation/index.js";
import type { ResolvedProfile } from "../../core/resolver/index.js";
import { createLogger } from "../../utils/index.js";
import { resolveConfig, type CommonOptions } from "./options.js";

const logger = createLogger("plan");

export interface PlanOptions extends CommonOptions {
  json?: boolean;
  /** commander sets this to false for --no-delete */
  delete?: boolean;
  quiet?: boolean;
}

/**
 * Text rendering: diagnostics first, in the order raised, then commands
 */
export function formatPlan(plan: ReconciliationPlan, options: { quiet?: boolean } = {}): string[] {
  const lines = options.quiet ? [] : plan.diagnostics.map(formatDiagnostic);
  return [...lines, ...plan.commands];
}

function serializeProfile(profile: ResolvedProfile): Record<string, unknown> {
  return {
    username: profile.username,
    account: profile.account,
    currentAccount: profile.currentAccount,
    defaultAccount: profile.defaultAccount,
    desired: Object.fromEntries(profile.desired),
  };
}

/**
 * JSON-safe view of a plan (Maps become objects)
 */
export function serializePlan(plan: ReconciliationPlan): Record<string, unknown> {
  return {
    summary: plan.summary,
    diagnostics: plan.diagnostics,
    actions: plan.actions,
    commands: plan.commands,
    profiles: plan.profiles.map(serializeProfile),
    skipped: plan.skipped,
    durationMs: plan.durationMs,
  };
}

export async function planCommand(options: PlanOptions): Promise<void> {
  const config = resolveConfig(options);
  logger.debug({ options }, "Plan command");

  const reconciler = createAccountReconciler(config, { allowDelete: options.delete !== false });
  const plan = await reconciler.plan();

  if (options.json) {
    console.log(JSON.stringify(serializePlan(plan), null, 2));
    return;
  }

  for (const line of formatPlan(plan, { quiet: options.quiet })) {
    console.log(line);
  }
}
