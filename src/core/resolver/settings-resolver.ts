/**
 * Settings Resolver
 *
 * Builds the desired attribute set for each eligible user from the policy
 * layers. Most specific wins: user setting, then group setting, then the
 * site default. Attributes no layer mentions are left out: the tool has no
 * opinion on them and never touches them.
 */

import type { Attribute } from "../attributes/index.js";
import type { DiagnosticSink } from "../diagnostics/index.js";
import type { EligibleUser } from "../identity/index.js";
import type { PolicyLayer, PolicySnapshot } from "../policy/index.js";
import type { SchedulerSnapshot } from "../scheduler/index.js";

export type SettingSource = "user" | "group" | "default";

export interface ResolvedSetting {
  value: string;
  source: SettingSource;
}

export type DesiredAttributes = ReadonlyMap<Attribute, ResolvedSetting>;

export interface ResolvedProfile {
  username: string;
  /** Account the user belongs under: the lower-cased UNIX group name */
  account: string;
  /** Account of the user's current association, if any */
  currentAccount?: string;
  /** Set when the scheduler's default account must change to `account` */
  defaultAccount?: string;
  desired: DesiredAttributes;
}

/**
 * Fill `target` from `layer` for attributes not yet present
 */
function fillFrom(target: Map<Attribute, ResolvedSetting>, layer: PolicyLayer | undefined, source: SettingSource): void {
  if (!layer) return;
  for (const [attribute, value] of layer) {
    if (!target.has(attribute)) {
      target.set(attribute, { value, source });
    }
  }
}

/**
 * Merge the three policy layers for one user and group
 */
export function mergeLayers(policy: PolicySnapshot, username: string, groupname: string): DesiredAttributes {
  const desired = new Map<Attribute, ResolvedSetting>();
  fillFrom(desired, policy.users.get(username), "user");
  fillFrom(desired, policy.groups.get(groupname), "group");
  fillFrom(desired, policy.defaults, "default");
  return desired;
}

/**
 * Resolves profiles for one run. Account-level notices are raised once per
 * account rather than once per member.
 */
export class SettingsResolver {
  private readonly reportedAccounts = new Set<string>();

  constructor(
    private readonly policy: PolicySnapshot,
    private readonly scheduler: SchedulerSnapshot,
    private readonly diagnostics: DiagnosticSink
  ) {}

  resolve(user: EligibleUser): ResolvedProfile {
    const username = user.identity.username;
    const account = user.groupname;
    const association = this.scheduler.users.get(username);
    const currentAccount = association?.current.account;

    this.checkAccount(account);

    let defaultAccount: string | undefined;
    if (currentAccount !== account) {
      defaultAccount = account;
      if (currentAccount !== undefined) {
        this.diagnostics.notice(
          `user ${username} is in account ${currentAccount} but UNIX group ${account}; setting defaultaccount=${account}`,
          username
        );
      }
    }

    return {
      username,
      account,
      currentAccount,
      defaultAccount,
      desired: mergeLayers(this.policy, username, account),
    };
  }

  private checkAccount(account: string): void {
    if (this.reportedAccounts.has(account)) return;
    this.reportedAccounts.add(account);

    if (!this.scheduler.accounts.has(account)) {
      this.diagnostics.warning(`account ${account} does not exist in the scheduler; create it before adding its users`, account);
    }
    const groupLayer = this.policy.groups.get(account);
    if (!groupLayer || groupLayer.size === 0) {
      this.diagnostics.notice(`no policy settings for group ${account}; using defaults`, account);
    }
  }
}
