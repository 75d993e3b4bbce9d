import { describe, it, expect } from "vitest";
import { mergeLayers, SettingsResolver } from "../settings-resolver.js";
import { DiagnosticCollector } from "../../diagnostics/index.js";
import {
  buildIdentitySnapshot,
  parseGroupDatabase,
  parsePasswdDatabase,
  type EligibleUser,
} from "../../identity/index.js";
import { parsePolicy, type PolicySnapshot } from "../../policy/index.js";
import { buildSchedulerSnapshot, parseAssociationListing } from "../../scheduler/index.js";
import {
  BASE_ROWS,
  GROUP_TEXT,
  PASSWD_TEXT,
  USER_ROWS,
  associationListing,
} from "../../__tests__/fixtures.js";

const identity = buildIdentitySnapshot(
  parseGroupDatabase(GROUP_TEXT).records,
  parsePasswdDatabase(PASSWD_TEXT).records
);
const scheduler = buildSchedulerSnapshot(
  parseAssociationListing(associationListing([...BASE_ROWS, ...USER_ROWS])).records,
  identity
);
const context = { groupNames: identity.groupNames, knownUsers: new Set(["alice", "carol", "dave"]) };

function policyOf(text: string): PolicySnapshot {
  return parsePolicy(text, context, new DiagnosticCollector());
}

function eligible(username: string, groupname: string): EligibleUser {
  const found = identity.users.find((user) => user.username === username);
  if (!found) throw new Error(`fixture user ${username} missing`);
  return { identity: found, groupname };
}

describe("mergeLayers", () => {
  const layered = policyOf(
    ["DEFAULT:fairshare:1", "DEFAULT:QOS:normal", "laba:fairshare:2", "alice:fairshare:3"].join("\n")
  );

  it("takes a user setting over group and default", () => {
    expect(mergeLayers(layered, "alice", "laba").get("fairshare")).toEqual({ value: "3", source: "user" });
  });

  it("falls back to the group when the user setting is removed", () => {
    expect(mergeLayers(layered, "carol", "laba").get("fairshare")).toEqual({ value: "2", source: "group" });
  });

  it("falls back to the default when the group setting is removed too", () => {
    expect(mergeLayers(layered, "dave", "labb").get("fairshare")).toEqual({ value: "1", source: "default" });
  });

  it("covers every default attribute", () => {
    const desired = mergeLayers(layered, "alice", "laba");
    expect([...desired.keys()].sort()).toEqual(["QOS", "fairshare"]);
    expect(desired.get("QOS")).toEqual({ value: "NORMAL", source: "default" });
  });

  it("leaves out attributes no layer mentions", () => {
    expect(mergeLayers(policyOf(""), "alice", "laba").size).toBe(0);
  });
});

describe("SettingsResolver", () => {
  const policy = policyOf(["DEFAULT:fairshare:2", "laba:QOS:normal"].join("\n"));

  it("keeps the default account of a user already under their group", () => {
    const diagnostics = new DiagnosticCollector();
    const profile = new SettingsResolver(policy, scheduler, diagnostics).resolve(eligible("alice", "laba"));

    expect(profile.account).toBe("laba");
    expect(profile.currentAccount).toBe("laba");
    expect(profile.defaultAccount).toBeUndefined();
    expect(diagnostics.diagnostics).toEqual([]);
  });

  it("sets the default account of a new user", () => {
    const diagnostics = new DiagnosticCollector();
    const profile = new SettingsResolver(policy, scheduler, diagnostics).resolve(eligible("carol", "laba"));

    expect(profile.currentAccount).toBeUndefined();
    expect(profile.defaultAccount).toBe("laba");
    expect(diagnostics.diagnostics).toEqual([]);
  });

  it("moves a user whose UNIX group changed", () => {
    const diagnostics = new DiagnosticCollector();
    const profile = new SettingsResolver(policy, scheduler, diagnostics).resolve(eligible("dave", "labb"));

    expect(profile.defaultAccount).toBe("labb");
    expect(diagnostics.diagnostics.map((entry) => entry.message)).toEqual([
      "no policy settings for group labb; using defaults",
      "user dave is in account laba but UNIX group labb; setting defaultaccount=labb",
    ]);
  });

  it("reports account-level problems once per account", () => {
    const diagnostics = new DiagnosticCollector();
    const resolver = new SettingsResolver(policy, scheduler, diagnostics);
    resolver.resolve(eligible("alice", "physics"));
    resolver.resolve(eligible("carol", "physics"));

    expect(diagnostics.diagnostics).toEqual([
      {
        severity: "warning",
        message: "account physics does not exist in the scheduler; create it before adding its users",
        subject: "physics",
      },
      { severity: "notice", message: "no policy settings for group physics; using defaults", subject: "physics" },
      {
        severity: "notice",
        message: "user alice is in account laba but UNIX group physics; setting defaultaccount=physics",
        subject: "alice",
      },
    ]);
  });
});
