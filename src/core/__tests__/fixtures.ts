/**
 * Shared test fixtures: a small cluster's group, passwd and association data
 */

import { ATTRIBUTES, type Attribute } from "../attributes/index.js";
import type { IIdentitySource } from "../identity/index.js";
import { parseGroupDatabase, parsePasswdDatabase } from "../identity/index.js";
import type { ISchedulerStateSource } from "../scheduler/index.js";
import { ASSOCIATION_COLUMNS, parseAssociationListing } from "../scheduler/index.js";

export const GROUP_TEXT = [
  "root:x:0:",
  "users:x:100:",
  "labA:x:2001:alice,carol",
  "labb:x:2002:dave",
].join("\n");

export const PASSWD_TEXT = [
  "root:x:0:0:root:/root:/bin/bash",
  "daemon:x:2:2:daemon:/sbin:/sbin/nologin",
  "alice:x:1100:2001:Alice Example:/home/alice:/bin/bash",
  "carol:x:1101:2001:Carol Example:/home/carol:/bin/bash",
  "dave:x:1102:2002:Dave Example:/home/dave:/bin/zsh",
  "erin:x:1103:2001:Erin Example:/home/erin:/sbin/nologin",
  "frank:x:1104:2999:Frank Example:/home/frank:/bin/bash",
  "gina:x:1105:2002:Gina Example:/home/gina:/bin/bash",
  "svc:x:900:2001:Service:/home/svc:/bin/bash",
].join("\n");

/** Home directories that exist; /home/gina does not */
export const EXISTING_HOMES = new Set([
  "/root",
  "/home/alice",
  "/home/carol",
  "/home/dave",
  "/home/erin",
  "/home/frank",
  "/home/svc",
]);

export const pathExists = (path: string): boolean => EXISTING_HOMES.has(path);

const COLUMN: Record<Attribute, number> = {
  fairshare: 4,
  GrpTRES: 6,
  GrpTRESMins: 9,
  MaxTRES: 11,
  MaxTRESPerNode: 12,
  MaxTRESMins: 15,
  QOS: 16,
  DefQOS: 17,
  GrpTRESRunMins: 18,
};

export interface RowSpec extends Partial<Record<Attribute, string>> {
  account: string;
  user?: string;
  cluster?: string;
  partition?: string;
}

/**
 * One `sacctmgr -P` row with every column in place
 */
export function associationRow(row: RowSpec): string {
  const cells: string[] = new Array<string>(ASSOCIATION_COLUMNS.length).fill("");
  cells[0] = row.cluster ?? "hpc";
  cells[1] = row.account;
  cells[2] = row.user ?? "";
  cells[3] = row.partition ?? "";
  for (const attribute of ATTRIBUTES) {
    const value = row[attribute];
    if (value !== undefined) cells[COLUMN[attribute]] = value;
  }
  return cells.join("|");
}

export const HEADER_ROW = ASSOCIATION_COLUMNS.join("|");

export function associationListing(rows: readonly RowSpec[]): string {
  return [HEADER_ROW, ...rows.map(associationRow)].join("\n") + "\n";
}

export const BASE_ROWS: RowSpec[] = [
  { account: "root", fairshare: "1", QOS: "normal" },
  { account: "root", user: "root", fairshare: "1", QOS: "normal" },
  { account: "laba", fairshare: "1", QOS: "normal" },
  { account: "labb", fairshare: "1", QOS: "normal" },
  { account: "oldlab", fairshare: "1" },
];

export const USER_ROWS: RowSpec[] = [
  { account: "laba", user: "alice", fairshare: "2", GrpTRES: "cpu=1500", QOS: "normal" },
  { account: "laba", user: "dave", fairshare: "2" },
  { account: "laba", user: "bob", fairshare: "2" },
  { account: "laba", user: "svc", fairshare: "2" },
  { account: "labb", user: "gina", fairshare: "2" },
  { account: "laba", user: "frank", fairshare: "2" },
];

export const POLICY_TEXT = [
  "# site policy",
  "DEFAULT:fairshare:2",
  "DEFAULT:GrpTRES:CPU=1500",
  "labA:qos:normal",
  "carol:MaxTRES:cpu=64",
  "nobody:fairshare:5",
].join("\n");

export function fixtureIdentitySource(groupText = GROUP_TEXT, passwdText = PASSWD_TEXT): IIdentitySource {
  return {
    readGroups: async () => parseGroupDatabase(groupText).records,
    readUsers: async () => parsePasswdDatabase(passwdText).records,
  };
}

export function fixtureSchedulerSource(rows: readonly RowSpec[] = [...BASE_ROWS, ...USER_ROWS]): ISchedulerStateSource {
  return {
    listAssociations: async () => parseAssociationListing(associationListing(rows)).records,
  };
}
