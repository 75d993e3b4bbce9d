/**
 * Identity Source Interface
 *
 * Enumerates UNIX groups and users from the system directory (files, LDAP,
 * SSSD: whatever the name service switch is configured for).
 */

// =============================================================================
// Records
// =============================================================================

export interface Group {
  /** Lower-cased; doubles as the scheduler account name */
  groupname: string;
  gid: number;
}

export interface Identity {
  username: string;
  uid: number;
  gid: number;
  fullname: string;
  homedir: string;
  shell: string;
}

// =============================================================================
// Source
// =============================================================================

export interface IIdentitySource {
  /**
   * All groups known to the directory.
   * @throws SourceUnavailableError when the directory cannot be enumerated
   */
  readGroups(): Promise<Group[]>;

  /**
   * All users known to the directory, unfiltered.
   * @throws SourceUnavailableError when the directory cannot be enumerated
   */
  readUsers(): Promise<Identity[]>;
}

// =============================================================================
// Snapshot
// =============================================================================

/**
 * Immutable view of the directory for one run
 */
export interface IdentitySnapshot {
  readonly groups: readonly Group[];
  readonly users: readonly Identity[];
  /** gid -> group name */
  readonly groupByGid: ReadonlyMap<number, string>;
  readonly groupNames: ReadonlySet<string>;
  readonly usernames: ReadonlySet<string>;
}
