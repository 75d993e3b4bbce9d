/**
 * sacctmgr-backed Scheduler State Source
 */

import type { AssociationRecord, ISchedulerStateSource } from "../interfaces/ISchedulerStateSource.js";
import { ASSOCIATION_COLUMNS, parseAssociationListing } from "../association-parser.js";
import { CommandError, ErrorCode, SourceUnavailableError } from "../../errors.js";
import { runCommand, type CommandRunner } from "../../../utils/exec.js";
import { createLogger } from "../../../utils/logger.js";

const logger = createLogger("scheduler-source");

export const LIST_ASSOCIATIONS_ARGS: readonly string[] = [
  "-P",
  "list",
  "associations",
  `format=${ASSOCIATION_COLUMNS.join(",")}`,
];

export class SacctmgrStateSource implements ISchedulerStateSource {
  constructor(
    private readonly sacctmgrPath: string = "sacctmgr",
    private readonly run: CommandRunner = runCommand
  ) {}

  async listAssociations(): Promise<AssociationRecord[]> {
    const command = [this.sacctmgrPath, ...LIST_ASSOCIATIONS_ARGS].join(" ");

    let stdout: string;
    try {
      ({ stdout } = await this.run(this.sacctmgrPath, LIST_ASSOCIATIONS_ARGS));
    } catch (error) {
      const cause = error instanceof Error ? error.message : String(error);
      throw new SourceUnavailableError(`Cannot list scheduler associations: ${cause}`, "scheduler", undefined, {
        command,
        exitCode: error instanceof CommandError ? error.exitCode : undefined,
        stderr: error instanceof CommandError ? error.stderr : cause,
      });
    }

    const { records, rejectedLines } = parseAssociationListing(stdout);
    if (rejectedLines.length > 0) {
      // A truncated or reformatted listing cannot be diffed safely
      throw new SourceUnavailableError(
        `Unexpected association listing format on line(s) ${rejectedLines.join(", ")}`,
        "scheduler",
        ErrorCode.SCHEDULER_SOURCE_UNPARSABLE,
        { command }
      );
    }

    logger.debug({ count: records.length }, "Listed associations");
    return records;
  }
}
