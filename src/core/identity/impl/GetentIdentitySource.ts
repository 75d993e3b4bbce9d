/**
 * getent-backed Identity Source
 *
 * Reads the group and passwd databases through `getent`, so users and
 * groups from LDAP/SSSD are seen exactly as the login nodes see them.
 */

import type { Group, Identity, IIdentitySource } from "../interfaces/IIdentitySource.js";
import { parseGroupDatabase, parsePasswdDatabase, type ParsedDatabase } from "../parsers.js";
import { CommandError, ErrorCode, SourceUnavailableError } from "../../errors.js";
import { runCommand, type CommandRunner } from "../../../utils/exec.js";
import { createLogger } from "../../../utils/logger.js";

const logger = createLogger("identity-source");

type Database = "group" | "passwd";

export class GetentIdentitySource implements IIdentitySource {
  constructor(
    private readonly getentPath: string = "getent",
    private readonly run: CommandRunner = runCommand
  ) {}

  async readGroups(): Promise<Group[]> {
    return this.read("group", parseGroupDatabase);
  }

  async readUsers(): Promise<Identity[]> {
    return this.read("passwd", parsePasswdDatabase);
  }

  private async read<T>(database: Database, parse: (text: string) => ParsedDatabase<T>): Promise<T[]> {
    const command = `${this.getentPath} ${database}`;
    let stdout: string;
    try {
      ({ stdout } = await this.run(this.getentPath, [database]));
    } catch (error) {
      const cause = error instanceof Error ? error.message : String(error);
      throw new SourceUnavailableError(`Cannot enumerate the ${database} database: ${cause}`, "identity", undefined, {
        command,
        exitCode: error instanceof CommandError ? error.exitCode : undefined,
        stderr: error instanceof CommandError ? error.stderr : cause,
      });
    }

    const { records, rejectedLines } = parse(stdout);
    if (rejectedLines.length > 0) {
      logger.debug({ database, rejectedLines }, "Skipped malformed entries");
    }
    if (records.length === 0) {
      throw new SourceUnavailableError(
        `The ${database} database returned no parsable entries`,
        "identity",
        ErrorCode.IDENTITY_SOURCE_UNPARSABLE,
        { command }
      );
    }

    logger.debug({ database, count: records.length }, "Enumerated directory");
    return records;
  }
}
