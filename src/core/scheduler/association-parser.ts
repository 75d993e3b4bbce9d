/**
 * Parser for `sacctmgr -P list associations`
 *
 * Rows are pipe-delimited and positional. The first row is a header.
 */

import { normalizeValue, type Attribute } from "../attributes/index.js";
import type { IdentitySnapshot } from "../identity/index.js";
import type {
  AssociationRecord,
  SchedulerSnapshot,
  UserAssociations,
} from "./interfaces/ISchedulerStateSource.js";

/**
 * Listing columns in output order. Passed to sacctmgr as `format=` so the
 * positions hold whatever the site's defaults are.
 */
export const ASSOCIATION_COLUMNS = [
  "Cluster",
  "Account",
  "User",
  "Partition",
  "Fairshare",
  "GrpJobs",
  "GrpTRES",
  "GrpSubmit",
  "GrpWall",
  "GrpTRESMins",
  "MaxJobs",
  "MaxTRES",
  "MaxTRESPerNode",
  "MaxSubmit",
  "MaxWall",
  "MaxTRESMins",
  "QOS",
  "DefQOS",
  "GrpTRESRunMins",
] as const;

/**
 * Column index of each managed attribute
 */
const ATTRIBUTE_COLUMNS: ReadonlyArray<[Attribute, number]> = [
  ["fairshare", 4],
  ["GrpTRES", 6],
  ["GrpTRESMins", 9],
  ["MaxTRES", 11],
  ["MaxTRESPerNode", 12],
  ["MaxTRESMins", 15],
  ["QOS", 16],
  ["DefQOS", 17],
  ["GrpTRESRunMins", 18],
];

export const ROOT_ACCOUNT = "root";

export interface ParsedListing {
  records: AssociationRecord[];
  rejectedLines: number[];
}

/**
 * Parse the listing. The first non-blank line is the header and is skipped
 * by position; its content is never inspected. Rows of the root account are
 * dropped here; every other row is returned, group-level and user-level alike.
 */
export function parseAssociationListing(text: string): ParsedListing {
  const records: AssociationRecord[] = [];
  const rejectedLines: number[] = [];
  let headerSkipped = false;

  text.split("\n").forEach((rawLine, index) => {
    const line = rawLine.replace(/\r$/, "");
    if (!line.trim()) return;
    if (!headerSkipped) {
      headerSkipped = true;
      return;
    }

    const fields = line.split("|").map((field) => field.trim());
    if (fields.length < ASSOCIATION_COLUMNS.length) {
      rejectedLines.push(index + 1);
      return;
    }

    const [cluster = "", rawAccount = "", user = "", partition = ""] = fields;
    const account = rawAccount.toLowerCase();
    if (!account) {
      rejectedLines.push(index + 1);
      return;
    }
    if (account === ROOT_ACCOUNT) return;

    const attributes = new Map<Attribute, string>();
    for (const [attribute, column] of ATTRIBUTE_COLUMNS) {
      const value = fields[column];
      if (value) attributes.set(attribute, normalizeValue(attribute, value));
    }

    records.push({
      cluster,
      account,
      user: user || undefined,
      partition: partition || undefined,
      attributes,
    });
  });

  return { records, rejectedLines };
}

/**
 * Index associations for the resolver and diff engine.
 *
 * Group-level records of accounts with no OS group are stale and dropped.
 * When a user holds several associations, the one under the user's OS group
 * is current; otherwise the first one listed.
 */
export function buildSchedulerSnapshot(
  records: readonly AssociationRecord[],
  identity: IdentitySnapshot
): SchedulerSnapshot {
  const accounts = new Map<string, AssociationRecord>();
  const byUser = new Map<string, AssociationRecord[]>();

  for (const record of records) {
    if (record.account === ROOT_ACCOUNT) continue;
    if (record.user === undefined) {
      if (identity.groupNames.has(record.account) && !accounts.has(record.account)) {
        accounts.set(record.account, record);
      }
      continue;
    }
    const list = byUser.get(record.user) ?? [];
    list.push(record);
    byUser.set(record.user, list);
  }

  const primaryGroup = new Map<string, string>();
  for (const user of identity.users) {
    const groupname = identity.groupByGid.get(user.gid);
    if (groupname !== undefined && !primaryGroup.has(user.username)) {
      primaryGroup.set(user.username, groupname);
    }
  }

  const users = new Map<string, UserAssociations>();
  for (const [user, all] of byUser) {
    const [first] = all;
    if (!first) continue;
    const expected = primaryGroup.get(user);
    const current = all.find((record) => record.account === expected) ?? first;
    users.set(user, { user, current, all });
  }

  return { accounts, users };
}
