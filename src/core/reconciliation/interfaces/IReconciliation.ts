/**
 * Reconciliation Interfaces
 *
 * Desired state (resolved policy) against actual state (scheduler
 * associations), and the actions that close the gap.
 */

import type { Attribute } from "../../attributes/index.js";
import type { Diagnostic } from "../../diagnostics/index.js";
import type { IneligibilityKind } from "../../identity/index.js";
import type { ResolvedProfile } from "../../resolver/index.js";
import type { CurrentAttributes } from "../../scheduler/index.js";
import type { SeedDefaults } from "../../policy/index.js";

// =============================================================================
// Actions
// =============================================================================

export interface AttributeChange {
  attribute: Attribute;
  /** Current scheduler value; absent when unset or the user is new */
  from?: string;
  to: string;
}

export interface CreateUserAction {
  kind: "create";
  username: string;
  defaultAccount?: string;
  changes: AttributeChange[];
}

export interface ModifyUserAction {
  kind: "modify";
  username: string;
  defaultAccount?: string;
  changes: AttributeChange[];
}

export interface NoOpAction {
  kind: "noop";
  username: string;
}

export interface DeleteUserAction {
  kind: "delete";
  username: string;
  /** Accounts the user is associated with, for the operator's benefit */
  accounts: string[];
}

export type ReconciliationAction = CreateUserAction | ModifyUserAction | NoOpAction | DeleteUserAction;

export type ActionableAction = Exclude<ReconciliationAction, NoOpAction>;

export function isActionable(action: ReconciliationAction): action is ActionableAction {
  return action.kind !== "noop";
}

// =============================================================================
// Diff Engine
// =============================================================================

export interface IDiffEngine {
  /**
   * Compare one resolved profile with the user's current association
   */
  diffUser(profile: ResolvedProfile, current: CurrentAttributes | undefined): ReconciliationAction;

  /**
   * Scheduler users not in `retained` (eligible or skipped OS users)
   */
  findOrphans(retained: ReadonlySet<string>): DeleteUserAction[];
}

// =============================================================================
// Plan
// =============================================================================

export interface SkippedUser {
  username: string;
  reason: Extract<IneligibilityKind, "unknown-group" | "missing-home">;
}

export interface ReconciliationSummary {
  eligible: number;
  skipped: number;
  create: number;
  modify: number;
  noop: number;
  delete: number;
  /** Orphans reported but not deleted because deletion was disabled */
  retainedOrphans: number;
}

export interface ReconciliationPlan {
  actions: ReconciliationAction[];
  /** One command line per actionable action, in action order */
  commands: string[];
  diagnostics: Diagnostic[];
  profiles: ResolvedProfile[];
  skipped: SkippedUser[];
  summary: ReconciliationSummary;
  durationMs: number;
}

/**
 * Everything known about one user, for the explain command
 */
export interface UserExplanation {
  username: string;
  eligibility: "eligible" | IneligibilityKind | "not-in-directory";
  profile?: ResolvedProfile;
  current?: CurrentAttributes;
  currentAccount?: string;
  action?: ReconciliationAction;
  command?: string;
}

// =============================================================================
// Reconciler
// =============================================================================

export interface IAccountReconciler {
  /**
   * Snapshot all sources and compute the full plan.
   * @throws SourceUnavailableError when identity or scheduler state is unavailable
   */
  plan(): Promise<ReconciliationPlan>;

  /**
   * Compute the plan and describe a single user's part in it
   */
  explain(username: string): Promise<UserExplanation>;
}

// =============================================================================
// Configuration
// =============================================================================

export interface ReconcilerConfig {
  minUid: number;
  nologinShells: readonly string[];
  policyFile: string;
  /** Path to sacctmgr used in emitted commands */
  sacctmgrPath: string;
  /** Seeds for the policy's default layer */
  defaults: SeedDefaults;
  allowDelete: boolean;
}

export const DEFAULT_RECONCILER_CONFIG: ReconcilerConfig = {
  minUid: 1002,
  nologinShells: ["/sbin/nologin"],
  policyFile: "/etc/slurm/acct-sync.conf",
  sacctmgrPath: "sacctmgr",
  defaults: { fairshare: "2" },
  allowDelete: true,
};
