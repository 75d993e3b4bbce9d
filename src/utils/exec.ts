/**
 * External command execution
 *
 * Thin wrapper around child_process.execFile. Arguments are passed as an
 * array, never through a shell.
 */

import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { CommandError } from "../core/errors.js";
import { createLogger } from "./logger.js";

const execFileAsync = promisify(execFile);
const logger = createLogger("exec");

const MAX_BUFFER = 64 * 1024 * 1024;

export interface CommandOutput {
  stdout: string;
  stderr: string;
}

/**
 * Runs a command and resolves with its output. Injected into the snapshot
 * sources so tests can replace it with canned output.
 */
export type CommandRunner = (command: string, args: readonly string[]) => Promise<CommandOutput>;

function describeFailure(error: unknown): { exitCode?: number; stderr: string; message: string } {
  if (typeof error !== "object" || error === null) {
    return { stderr: "", message: String(error) };
  }
  return {
    exitCode: "code" in error && typeof error.code === "number" ? error.code : undefined,
    stderr: "stderr" in error && typeof error.stderr === "string" ? error.stderr.trim() : "",
    message: error instanceof Error ? error.message : String(error),
  };
}

/**
 * Default CommandRunner. Rejects with a CommandError on spawn failure
 * (ENOENT, EACCES) or non-zero exit.
 */
export const runCommand: CommandRunner = async (command, args) => {
  const commandLine = [command, ...args].join(" ");
  logger.debug({ command: commandLine }, "Executing");
  try {
    const { stdout, stderr } = await execFileAsync(command, [...args], {
      maxBuffer: MAX_BUFFER,
      encoding: "utf8",
    });
    return { stdout, stderr };
  } catch (error) {
    const { exitCode, stderr, message } = describeFailure(error);
    logger.debug({ command: commandLine, exitCode, stderr }, "Command failed");
    throw new CommandError(`${commandLine} failed: ${stderr || message}`, {
      command: commandLine,
      exitCode,
      stderr,
    });
  }
};
