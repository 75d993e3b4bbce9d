/**
 * Account Reconciler
 *
 * One batch run: snapshot the directory, the accounting store and the
 * policy file, resolve each eligible user's profile, diff it against the
 * scheduler and render the corrective commands. A failure to read either
 * snapshot aborts the run before anything is rendered.
 */

import { DiagnosticCollector } from "../../diagnostics/index.js";
import {
  buildIdentitySnapshot,
  evaluateIdentity,
  GetentIdentitySource,
  type EligibilityOptions,
  type EligibleUser,
  type IdentitySnapshot,
  type IIdentitySource,
  type Ineligibility,
  type PathExists,
} from "../../identity/index.js";
import { readPolicyFile } from "../../policy/index.js";
import { SettingsResolver } from "../../resolver/index.js";
import {
  buildSchedulerSnapshot,
  SacctmgrStateSource,
  type ISchedulerStateSource,
  type SchedulerSnapshot,
} from "../../scheduler/index.js";
import { renderCommand, renderCommands } from "../../emitter/index.js";
import { DiffEngine } from "./DiffEngine.js";
import type {
  IAccountReconciler,
  ReconcilerConfig,
  ReconciliationAction,
  ReconciliationPlan,
  ReconciliationSummary,
  SkippedUser,
  UserExplanation,
} from "../interfaces/IReconciliation.js";
import type { AcctSyncConfig } from "../../config/index.js";
import { partition } from "../../../types/result.js";
import { createChildLogger, createLogger, type Logger } from "../../../utils/logger.js";

const baseLogger = createLogger("reconciler");

export interface ReconcilerDependencies {
  identity: IIdentitySource;
  scheduler: ISchedulerStateSource;
  /** Home directory check; defaults to fs.existsSync */
  pathExists?: PathExists;
}

interface RunState {
  plan: ReconciliationPlan;
  identity: IdentitySnapshot;
  scheduler: SchedulerSnapshot;
}

export class AccountReconciler implements IAccountReconciler {
  private readonly identitySource: IIdentitySource;
  private readonly schedulerSource: ISchedulerStateSource;
  private readonly pathExists?: PathExists;
  private runCount = 0;

  constructor(
    dependencies: ReconcilerDependencies,
    private readonly config: ReconcilerConfig
  ) {
    this.identitySource = dependencies.identity;
    this.schedulerSource = dependencies.scheduler;
    this.pathExists = dependencies.pathExists;
  }

  async plan(): Promise<ReconciliationPlan> {
    const { plan } = await this.run();
    return plan;
  }

  async explain(username: string): Promise<UserExplanation> {
    const { plan, identity, scheduler } = await this.run();
    const association = scheduler.users.get(username);
    const action = plan.actions.find((candidate) => candidate.username === username);

    const explanation: UserExplanation = {
      username,
      eligibility: "not-in-directory",
      current: association?.current.attributes,
      currentAccount: association?.current.account,
      profile: plan.profiles.find((profile) => profile.username === username),
      action,
      command: action ? renderCommand(action, this.config.sacctmgrPath) : undefined,
    };

    const entry = identity.users.find((user) => user.username === username);
    if (entry) {
      const result = evaluateIdentity(entry, identity, this.eligibilityOptions());
      explanation.eligibility = result.ok ? "eligible" : result.error.kind;
    }
    return explanation;
  }

  private eligibilityOptions(): EligibilityOptions {
    return {
      minUid: this.config.minUid,
      nologinShells: this.config.nologinShells,
      pathExists: this.pathExists,
    };
  }

  private async run(): Promise<RunState> {
    const startedAt = Date.now();
    const logger: Logger = createChildLogger(baseLogger, { run: ++this.runCount });
    const diagnostics = new DiagnosticCollector(logger);

    const groups = await this.identitySource.readGroups();
    const users = await this.identitySource.readUsers();
    const identity = buildIdentitySnapshot(groups, users);

    const records = await this.schedulerSource.listAssociations();
    const scheduler = buildSchedulerSnapshot(records, identity);
    logger.info(
      { groups: groups.length, users: users.length, associations: records.length },
      "Snapshots loaded"
    );

    const policy = await readPolicyFile(
      this.config.policyFile,
      {
        groupNames: identity.groupNames,
        knownUsers: new Set([...identity.usernames, ...scheduler.users.keys()]),
      },
      diagnostics,
      this.config.defaults
    );

    // First passwd entry wins for duplicated names
    const seen = new Set<string>();
    const entries = identity.users.filter((user) => {
      if (seen.has(user.username)) return false;
      seen.add(user.username);
      return true;
    });

    const { oks: eligible, errs: ineligible } = partition(
      entries.map((user) => evaluateIdentity(user, identity, this.eligibilityOptions()))
    );

    const skipped: SkippedUser[] = [];
    for (const reason of ineligible) {
      const skip = this.reportIneligible(reason, diagnostics);
      if (skip) skipped.push(skip);
    }

    const resolver = new SettingsResolver(policy, scheduler, diagnostics);
    const profiles = eligible.map((user: EligibleUser) => resolver.resolve(user));

    const retained = new Set([
      ...eligible.map((user) => user.identity.username),
      ...skipped.map((skip) => skip.username),
    ]);
    const engine = new DiffEngine(scheduler);
    let actions: ReconciliationAction[] = engine.diffAll(profiles, retained);

    let retainedOrphans = 0;
    if (!this.config.allowDelete) {
      actions = actions.filter((action) => {
        if (action.kind !== "delete") return true;
        retainedOrphans++;
        diagnostics.notice(
          `user ${action.username} has no eligible UNIX account; deletion disabled, not removing`,
          action.username
        );
        return false;
      });
    }

    const commands = renderCommands(actions, this.config.sacctmgrPath);
    const summary = summarize(actions, eligible.length, skipped.length, retainedOrphans);
    const durationMs = Date.now() - startedAt;
    logger.info({ ...summary, commands: commands.length, durationMs }, "Reconciliation planned");

    return {
      plan: {
        actions,
        commands,
        diagnostics: [...diagnostics.diagnostics],
        profiles,
        skipped,
        summary,
        durationMs,
      },
      identity,
      scheduler,
    };
  }

  private reportIneligible(reason: Ineligibility, diagnostics: DiagnosticCollector): SkippedUser | undefined {
    const { username, gid, homedir } = reason.identity;
    switch (reason.kind) {
      case "unknown-group":
        diagnostics.error(`user ${username} has GID ${gid} with no matching group; skipped`, username);
        return { username, reason: reason.kind };
      case "missing-home":
        diagnostics.notice(`home directory ${homedir || "(none)"} of user ${username} does not exist; skipped`, username);
        return { username, reason: reason.kind };
      case "system-account":
      case "nologin":
        return undefined;
    }
  }
}

function summarize(
  actions: readonly ReconciliationAction[],
  eligible: number,
  skipped: number,
  retainedOrphans: number
): ReconciliationSummary {
  const summary: ReconciliationSummary = {
    eligible,
    skipped,
    create: 0,
    modify: 0,
    noop: 0,
    delete: 0,
    retainedOrphans,
  };
  for (const action of actions) {
    summary[action.kind]++;
  }
  return summary;
}

export interface CreateReconcilerOptions {
  allowDelete?: boolean;
  pathExists?: PathExists;
}

/**
 * Wire the getent and sacctmgr sources from a loaded configuration
 */
export function createAccountReconciler(
  config: AcctSyncConfig,
  options: CreateReconcilerOptions = {}
): AccountReconciler {
  return new AccountReconciler(
    {
      identity: new GetentIdentitySource(config.getentPath),
      scheduler: new SacctmgrStateSource(config.sacctmgrPath),
      pathExists: options.pathExists,
    },
    {
      minUid: config.minUid,
      nologinShells: config.nologinShells,
      policyFile: config.policyFile,
      sacctmgrPath: config.sacctmgrPath,
      defaults: config.defaults,
      allowDelete: options.allowDelete ?? true,
    }
  );
}
