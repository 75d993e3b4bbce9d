/**
 * Error Classes for slurm-acct-sync
 * Structured error handling with error codes
 */

/**
 * Error codes for categorizing errors
 */
export enum ErrorCode {
  // Configuration errors (1xxx)
  CONFIG_INVALID = "E1000",
  CONFIG_FILE_UNREADABLE = "E1001",

  // Source errors (2xxx)
  IDENTITY_SOURCE_UNAVAILABLE = "E2000",
  IDENTITY_SOURCE_UNPARSABLE = "E2001",
  SCHEDULER_SOURCE_UNAVAILABLE = "E2002",
  SCHEDULER_SOURCE_UNPARSABLE = "E2003",

  // Policy errors (3xxx)
  POLICY_FILE_UNREADABLE = "E3000",

  // General errors (9xxx)
  UNKNOWN_ERROR = "E9000",
  COMMAND_FAILED = "E9002",
}

/**
 * Base error class for all slurm-acct-sync errors
 */
export class AcctSyncError extends Error {
  public readonly code: ErrorCode;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "AcctSyncError";
    this.code = code;
    this.timestamp = new Date();
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.name}: ${this.message}`;
  }
}

/**
 * Invalid or unreadable runtime configuration
 */
export class ConfigurationError extends AcctSyncError {
  public readonly issues: string[];

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.CONFIG_INVALID,
    context?: Record<string, unknown> & { issues?: string[] }
  ) {
    super(message, code, context);
    this.name = "ConfigurationError";
    this.issues = context?.issues ?? [];
  }
}

export type SnapshotSource = "identity" | "scheduler";

/**
 * An external snapshot (directory service or accounting store) could not be
 * read. Always fatal: a partial snapshot would produce a dangerous diff.
 */
export class SourceUnavailableError extends AcctSyncError {
  public readonly source: SnapshotSource;
  public readonly command?: string;
  public readonly exitCode?: number;
  public readonly stderr?: string;

  constructor(
    message: string,
    source: SnapshotSource,
    code: ErrorCode = source === "identity"
      ? ErrorCode.IDENTITY_SOURCE_UNAVAILABLE
      : ErrorCode.SCHEDULER_SOURCE_UNAVAILABLE,
    context?: Record<string, unknown> & { command?: string; exitCode?: number; stderr?: string }
  ) {
    super(message, code, context);
    this.name = "SourceUnavailableError";
    this.source = source;
    this.command = context?.command;
    this.exitCode = context?.exitCode;
    this.stderr = context?.stderr;
  }

  toString(): string {
    const cmd = this.command ? ` (${this.command})` : "";
    return `[${this.code}] ${this.name}: ${this.message}${cmd}`;
  }
}

/**
 * An external command exited abnormally
 */
export class CommandError extends AcctSyncError {
  public readonly command: string;
  public readonly exitCode?: number;
  public readonly stderr: string;

  constructor(
    message: string,
    context: Record<string, unknown> & { command: string; exitCode?: number; stderr?: string }
  ) {
    super(message, ErrorCode.COMMAND_FAILED, context);
    this.name = "CommandError";
    this.command = context.command;
    this.exitCode = context.exitCode;
    this.stderr = context.stderr ?? "";
  }
}

/**
 * Check if an error is an AcctSyncError
 */
export function isAcctSyncError(error: unknown): error is AcctSyncError {
  return error instanceof AcctSyncError;
}

/**
 * Wrap an unknown error in an AcctSyncError
 */
export function wrapError(
  error: unknown,
  defaultMessage: string = "An unexpected error occurred",
  code: ErrorCode = ErrorCode.UNKNOWN_ERROR
): AcctSyncError {
  if (isAcctSyncError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new AcctSyncError(error.message || defaultMessage, code, {
      originalError: error.name,
      originalStack: error.stack,
    });
  }

  return new AcctSyncError(typeof error === "string" ? error : defaultMessage, code);
}
