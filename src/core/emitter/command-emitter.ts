/**
 * Command Emitter
 *
 * Renders reconciliation actions as `sacctmgr -i` command lines. Nothing is
 * executed here; the lines are meant to be reviewed or piped to a shell.
 */

import type {
  AttributeChange,
  ReconciliationAction,
} from "../reconciliation/interfaces/IReconciliation.js";

export const IMMEDIATE_FLAG = "-i";

function assignments(defaultAccount: string | undefined, changes: readonly AttributeChange[]): string[] {
  const parts = defaultAccount !== undefined ? [`defaultaccount=${defaultAccount}`] : [];
  for (const change of changes) {
    parts.push(`${change.attribute}=${change.to}`);
  }
  return parts;
}

/**
 * Render one action. Returns undefined for actions that need no command.
 */
export function renderCommand(action: ReconciliationAction, sacctmgrPath: string = "sacctmgr"): string | undefined {
  const prefix = `${sacctmgrPath} ${IMMEDIATE_FLAG}`;

  switch (action.kind) {
    case "create":
      return [prefix, "create user", `name=${action.username}`, ...assignments(action.defaultAccount, action.changes)].join(" ");

    case "modify": {
      const parts = assignments(action.defaultAccount, action.changes);
      if (parts.length === 0) return undefined;
      return [prefix, "modify user where", `name=${action.username}`, "set", ...parts].join(" ");
    }

    case "delete":
      return `${prefix} delete user ${action.username}`;

    case "noop":
      return undefined;
  }
}

/**
 * Render all actions, preserving order and dropping those with no command
 */
export function renderCommands(actions: readonly ReconciliationAction[], sacctmgrPath?: string): string[] {
  const commands: string[] = [];
  for (const action of actions) {
    const command = renderCommand(action, sacctmgrPath);
    if (command !== undefined) commands.push(command);
  }
  return commands;
}
