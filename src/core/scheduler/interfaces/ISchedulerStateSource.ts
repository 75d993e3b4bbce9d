/**
 * Scheduler State Source Interface
 *
 * Read-only access to the accounting store's association records.
 */

import type { Attribute } from "../../attributes/index.js";

/**
 * Limits currently recorded in the scheduler for one association.
 * Only set (non-empty) attributes are present.
 */
export type CurrentAttributes = ReadonlyMap<Attribute, string>;

export interface AssociationRecord {
  cluster: string;
  account: string;
  /** Absent for the account's own (group-level) association */
  user?: string;
  partition?: string;
  attributes: CurrentAttributes;
}

export interface ISchedulerStateSource {
  /**
   * Every association row, root included.
   * @throws SourceUnavailableError when the accounting store cannot be queried
   */
  listAssociations(): Promise<AssociationRecord[]>;
}

/**
 * A user's associations, with the one treated as current picked out
 */
export interface UserAssociations {
  user: string;
  current: AssociationRecord;
  all: readonly AssociationRecord[];
}

/**
 * Immutable view of the accounting store for one run
 */
export interface SchedulerSnapshot {
  /** Group-level associations of accounts that map to an OS group */
  readonly accounts: ReadonlyMap<string, AssociationRecord>;
  /** User-level associations keyed by user name */
  readonly users: ReadonlyMap<string, UserAssociations>;
}
