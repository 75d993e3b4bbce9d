/**
 * explain command - Show how one user's limits are resolved
 */

import chalk from "chalk";
import { ATTRIBUTES } from "../../core/attributes/index.js";
import {
  createAccountReconciler,
  type UserExplanation,
} from "../../core/reconciliation/index.js";
import { createLogger } from "../../utils/index.js";
import { resolveConfig, type CommonOptions } from "./options.js";

const logger = createLogger("explain");

const ELIGIBILITY_TEXT: Record<UserExplanation["eligibility"], string> = {
  eligible: "eligible",
  "system-account": "UID below the minimum; not a cluster user",
  nologin: "no-login shell; not a cluster user",
  "unknown-group": "primary GID has no group; skipped",
  "missing-home": "home directory missing; skipped",
  "not-in-directory": "not found in passwd",
};

/**
 * Plain lines describing the explanation. Colour is added by the caller.
 */
export function describeExplanation(explanation: UserExplanation): string[] {
  const lines: string[] = [];
  const { profile, current } = explanation;

  lines.push(`User:        ${explanation.username}`);
  lines.push(`Status:      ${ELIGIBILITY_TEXT[explanation.eligibility]}`);
  if (profile) {
    lines.push(`Account:     ${profile.account}`);
  }
  lines.push(`Current:     ${explanation.currentAccount ?? "(no association)"}`);

  if (profile || current) {
    lines.push("");
    lines.push(`${"Attribute".padEnd(16)}${"Current".padEnd(22)}${"Desired".padEnd(22)}Source`);
    for (const attribute of ATTRIBUTES) {
      const desired = profile?.desired.get(attribute);
      const now = current?.get(attribute);
      if (desired === undefined && now === undefined) continue;
      lines.push(
        `${attribute.padEnd(16)}${(now ?? "-").padEnd(22)}${(desired?.value ?? "-").padEnd(22)}${desired?.source ?? "unmanaged"}`
      );
    }
  }

  lines.push("");
  lines.push(`Action:      ${explanation.action?.kind ?? "none"}`);
  if (explanation.command) {
    lines.push(`Command:     ${explanation.command}`);
  }
  return lines;
}

export async function explainCommand(username: string, options: CommonOptions): Promise<void> {
  const config = resolveConfig(options);
  logger.debug({ username, options }, "Explain command");

  const reconciler = createAccountReconciler(config);
  const explanation = await reconciler.explain(username);

  console.log();
  for (const line of describeExplanation(explanation)) {
    if (line.startsWith("Attribute")) {
      console.log(chalk.white.bold(line));
    } else if (line.startsWith("Command:")) {
      console.log(chalk.cyan(line));
    } else {
      console.log(line);
    }
  }
  console.log();
}
