/**
 * Reconciliation Diff Engine
 *
 * Produces the minimal change set per user. Only attributes present in the
 * resolved profile are compared; everything else is left as the scheduler
 * has it.
 */

import { compareAttributes, valuesEqual } from "../../attributes/index.js";
import type { ResolvedProfile } from "../../resolver/index.js";
import type { CurrentAttributes, SchedulerSnapshot } from "../../scheduler/index.js";
import type {
  AttributeChange,
  DeleteUserAction,
  IDiffEngine,
  ReconciliationAction,
} from "../interfaces/IReconciliation.js";

function byName(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export class DiffEngine implements IDiffEngine {
  constructor(private readonly scheduler: SchedulerSnapshot) {}

  diffUser(profile: ResolvedProfile, current: CurrentAttributes | undefined): ReconciliationAction {
    const { username, defaultAccount } = profile;
    const desired = [...profile.desired].sort(([a], [b]) => compareAttributes(a, b));

    if (current === undefined) {
      return {
        kind: "create",
        username,
        defaultAccount,
        changes: desired.map(([attribute, setting]) => ({ attribute, to: setting.value })),
      };
    }

    const changes: AttributeChange[] = [];
    for (const [attribute, setting] of desired) {
      const from = current.get(attribute);
      if (from === undefined || from === "" || !valuesEqual(attribute, from, setting.value)) {
        changes.push({ attribute, from: from || undefined, to: setting.value });
      }
    }

    if (changes.length === 0 && defaultAccount === undefined) {
      return { kind: "noop", username };
    }
    return { kind: "modify", username, defaultAccount, changes };
  }

  findOrphans(retained: ReadonlySet<string>): DeleteUserAction[] {
    const orphans: DeleteUserAction[] = [];
    for (const [username, associations] of this.scheduler.users) {
      if (retained.has(username)) continue;
      orphans.push({
        kind: "delete",
        username,
        accounts: [...new Set(associations.all.map((record) => record.account))],
      });
    }
    return orphans.sort((a, b) => byName(a.username, b.username));
  }

  /**
   * Diff every profile (in username order) and append orphans
   */
  diffAll(profiles: readonly ResolvedProfile[], retained: ReadonlySet<string>): ReconciliationAction[] {
    const actions = [...profiles]
      .sort((a, b) => byName(a.username, b.username))
      .map((profile) => this.diffUser(profile, this.scheduler.users.get(profile.username)?.current.attributes));
    return [...actions, ...this.findOrphans(retained)];
  }
}
