import { describe, it, expect, beforeAll, afterAll } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { emptyPolicy, parsePolicy, readPolicyFile, type PolicyContext } from "../policy-reader.js";
import { DiagnosticCollector } from "../../diagnostics/index.js";
import { AcctSyncError, ErrorCode } from "../../errors.js";
import { POLICY_TEXT } from "../../__tests__/fixtures.js";

const context: PolicyContext = {
  groupNames: new Set(["laba", "labb"]),
  knownUsers: new Set(["alice", "carol", "dave"]),
};

describe("parsePolicy", () => {
  it("sorts lines into default, group and user layers", () => {
    const diagnostics = new DiagnosticCollector();
    const policy = parsePolicy(POLICY_TEXT, context, diagnostics);

    expect(Object.fromEntries(policy.defaults)).toEqual({ fairshare: "2", GrpTRES: "cpu=1500" });
    expect([...policy.groups.keys()]).toEqual(["laba"]);
    expect(Object.fromEntries(policy.groups.get("laba") ?? [])).toEqual({ QOS: "NORMAL" });
    expect(Object.fromEntries(policy.users.get("carol") ?? [])).toEqual({ MaxTRES: "cpu=64" });
    expect(Object.fromEntries(policy.users.get("nobody") ?? [])).toEqual({ fairshare: "5" });
  });

  it("notes scopes that match no group or user", () => {
    const diagnostics = new DiagnosticCollector();
    parsePolicy(POLICY_TEXT, context, diagnostics);

    expect(diagnostics.diagnostics).toEqual([
      {
        severity: "notice",
        message: 'policy scope "nobody" matches no known group or user; kept as a user setting',
        subject: "nobody",
      },
    ]);
  });

  it("skips comments and lines without three fields", () => {
    const text = ["#DEFAULT:fairshare:9", "laba:QOS", "laba:GrpTRES:cpu=1:gpu=2", "", "  :fairshare:3"].join("\n");
    const diagnostics = new DiagnosticCollector();
    const policy = parsePolicy(text, context, diagnostics);

    expect(policy.defaults.size).toBe(0);
    expect(policy.groups.size).toBe(0);
    expect(policy.users.size).toBe(0);
    expect(diagnostics.diagnostics).toEqual([]);
  });

  it("treats a trailing # as a comment for the whole line", () => {
    const diagnostics = new DiagnosticCollector();
    const policy = parsePolicy(
      "DEFAULT:fairshare:2 # site default\nlaba:QOS:normal#long\nDEFAULT:GrpTRES:cpu=10\n",
      context,
      diagnostics
    );

    expect(policy.defaults.has("fairshare")).toBe(false);
    expect(policy.groups.size).toBe(0);
    expect(Object.fromEntries(policy.defaults)).toEqual({ GrpTRES: "cpu=10" });
    expect(diagnostics.diagnostics).toEqual([]);
  });

  it("warns about unknown attributes and empty values", () => {
    const diagnostics = new DiagnosticCollector();
    const policy = parsePolicy("laba:MaxJobs:10\nlaba:QOS:  \n", context, diagnostics);

    expect(policy.groups.size).toBe(0);
    expect(diagnostics.diagnostics.map((entry) => entry.message)).toEqual([
      'policy line 1: unknown attribute "MaxJobs" ignored',
      "policy line 2: empty value for laba:QOS ignored",
    ]);
    expect(diagnostics.count("warning")).toBe(2);
  });

  it("matches group scopes case-insensitively and user scopes exactly", () => {
    const diagnostics = new DiagnosticCollector();
    const policy = parsePolicy("LABB:fairshare:4\nAlice:fairshare:6\n", context, diagnostics);

    expect(policy.groups.get("labb")?.get("fairshare")).toBe("4");
    expect(policy.users.has("Alice")).toBe(true);
    expect(policy.users.has("alice")).toBe(false);
    expect(diagnostics.count("notice")).toBe(1);
  });

  it("lets later lines win", () => {
    const policy = parsePolicy(
      "DEFAULT:QOS:normal\nDEFAULT:qos:long\n",
      context,
      new DiagnosticCollector()
    );
    expect(policy.defaults.get("QOS")).toBe("LONG");
  });

  it("seeds the default layer and lets the file override the seed", () => {
    const seed = { fairshare: "1", GrpTRES: "", GrpTRESRunMins: "CPU=6000" };
    const policy = parsePolicy("DEFAULT:fairshare:3\n", context, new DiagnosticCollector(), seed);

    expect(Object.fromEntries(policy.defaults)).toEqual({ fairshare: "3", GrpTRESRunMins: "cpu=6000" });
  });
});

describe("emptyPolicy", () => {
  it("holds only the non-empty seeded defaults", () => {
    const policy = emptyPolicy({ fairshare: "2", GrpTRES: "" });
    expect(Object.fromEntries(policy.defaults)).toEqual({ fairshare: "2" });
    expect(policy.groups.size).toBe(0);
    expect(policy.users.size).toBe(0);
  });
});

describe("readPolicyFile", () => {
  let tmpDir: string;

  beforeAll(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "acct-sync-policy-"));
  });

  afterAll(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("reads and parses the file", async () => {
    const file = path.join(tmpDir, "policy.conf");
    fs.writeFileSync(file, POLICY_TEXT);

    const policy = await readPolicyFile(file, context, new DiagnosticCollector());
    expect(policy.groups.get("laba")?.get("QOS")).toBe("NORMAL");
  });

  it("falls back to the seeded defaults with a warning when the file is missing", async () => {
    const file = path.join(tmpDir, "absent.conf");
    const diagnostics = new DiagnosticCollector();

    const policy = await readPolicyFile(file, context, diagnostics, { fairshare: "2" });

    expect(Object.fromEntries(policy.defaults)).toEqual({ fairshare: "2" });
    expect(diagnostics.diagnostics).toEqual([
      {
        severity: "warning",
        message: `policy file ${file} not found; using default settings only`,
        subject: undefined,
      },
    ]);
  });

  it("fails on any other read error", async () => {
    const failure = readPolicyFile(tmpDir, context, new DiagnosticCollector());

    await expect(failure).rejects.toBeInstanceOf(AcctSyncError);
    await expect(failure).rejects.toMatchObject({
      code: ErrorCode.POLICY_FILE_UNREADABLE,
      message: `Cannot read policy file ${tmpDir}`,
    });
  });
});
