/**
 * Cluster-user eligibility
 *
 * Decides which passwd entries are managed in the scheduler. Entries below
 * the UID floor or with a no-login shell are simply not cluster users; a
 * cluster user whose group or home directory cannot be found is skipped for
 * this run and left untouched in the scheduler.
 */

import * as fs from "node:fs";
import type { Identity, IdentitySnapshot } from "./interfaces/IIdentitySource.js";
import { err, ok, type Result } from "../../types/result.js";

export type PathExists = (path: string) => boolean;

export interface EligibilityOptions {
  minUid: number;
  nologinShells: readonly string[];
  pathExists?: PathExists;
}

export interface EligibleUser {
  identity: Identity;
  /** Lower-cased name of the primary group, i.e. the expected account */
  groupname: string;
}

export type Ineligibility =
  | { kind: "system-account"; identity: Identity }
  | { kind: "nologin"; identity: Identity }
  | { kind: "unknown-group"; identity: Identity }
  | { kind: "missing-home"; identity: Identity; groupname: string };

export type IneligibilityKind = Ineligibility["kind"];

export function evaluateIdentity(
  identity: Identity,
  snapshot: IdentitySnapshot,
  options: EligibilityOptions
): Result<EligibleUser, Ineligibility> {
  const pathExists = options.pathExists ?? fs.existsSync;

  if (identity.uid < options.minUid) {
    return err({ kind: "system-account", identity });
  }
  if (options.nologinShells.includes(identity.shell)) {
    return err({ kind: "nologin", identity });
  }

  const groupname = snapshot.groupByGid.get(identity.gid);
  if (groupname === undefined) {
    return err({ kind: "unknown-group", identity });
  }
  if (!identity.homedir || !pathExists(identity.homedir)) {
    return err({ kind: "missing-home", identity, groupname });
  }

  return ok({ identity, groupname });
}
