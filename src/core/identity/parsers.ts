/**
 * Parsers for the colon-delimited group(5) and passwd(5) formats
 */

import type { Group, Identity, IdentitySnapshot } from "./interfaces/IIdentitySource.js";

export interface ParsedDatabase<T> {
  records: T[];
  /** 1-based line numbers that did not parse */
  rejectedLines: number[];
}

function parseId(field: string | undefined): number | undefined {
  if (field === undefined || !/^\d+$/.test(field)) return undefined;
  return Number.parseInt(field, 10);
}

function splitLines(text: string): string[] {
  return text.split("\n").map((line) => line.replace(/\r$/, ""));
}

/**
 * `name:password:gid:members`
 */
export function parseGroupDatabase(text: string): ParsedDatabase<Group> {
  const records: Group[] = [];
  const rejectedLines: number[] = [];

  splitLines(text).forEach((line, index) => {
    if (!line.trim()) return;
    const fields = line.split(":");
    const [name, , gidField] = fields;
    const gid = parseId(gidField);
    if (fields.length !== 4 || !name || gid === undefined) {
      rejectedLines.push(index + 1);
      return;
    }
    records.push({ groupname: name.toLowerCase(), gid });
  });

  return { records, rejectedLines };
}

/**
 * `name:password:uid:gid:fullname:homedir:shell`
 */
export function parsePasswdDatabase(text: string): ParsedDatabase<Identity> {
  const records: Identity[] = [];
  const rejectedLines: number[] = [];

  splitLines(text).forEach((line, index) => {
    if (!line.trim()) return;
    const fields = line.split(":");
    const [username, , uidField, gidField, fullname = "", homedir = "", shell = ""] = fields;
    const uid = parseId(uidField);
    const gid = parseId(gidField);
    if (fields.length !== 7 || !username || uid === undefined || gid === undefined) {
      rejectedLines.push(index + 1);
      return;
    }
    records.push({ username, uid, gid, fullname, homedir, shell });
  });

  return { records, rejectedLines };
}

/**
 * Index groups and users for lookup. When two groups share a gid the first
 * one listed wins, as getgrgid(3) would.
 */
export function buildIdentitySnapshot(groups: readonly Group[], users: readonly Identity[]): IdentitySnapshot {
  const groupByGid = new Map<number, string>();
  for (const group of groups) {
    if (!groupByGid.has(group.gid)) groupByGid.set(group.gid, group.groupname);
  }

  return {
    groups: [...groups],
    users: [...users],
    groupByGid,
    groupNames: new Set(groups.map((group) => group.groupname)),
    usernames: new Set(users.map((user) => user.username)),
  };
}
