/**
 * Logger Module
 * Structured logging using pino. Everything goes to stderr: stdout carries
 * the diagnostics and sacctmgr commands that operators pipe to a shell.
 */

import pino, { type Logger as PinoLogger } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerOptions {
  level?: LogLevel;
  /** Pretty-print with pino-pretty. Defaults to true on an interactive stderr. */
  pretty?: boolean;
}

const VALID_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

const STDERR_FD = 2;

function isDevelopment(): boolean {
  return process.env.NODE_ENV !== "production";
}

function isLogLevel(value: string): value is LogLevel {
  return VALID_LEVELS.some((level) => level === value);
}

/**
 * Get log level from environment or default.
 * Non-interactive runs (cron) only log warnings unless asked otherwise.
 */
export function getLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  if (!process.stderr.isTTY) return "warn";
  return isDevelopment() ? "debug" : "info";
}

/**
 * Create a logger instance for a specific component
 *
 * @param component - The component name (e.g., "policy", "scheduler", "cli")
 *
 * @example
 * ```typescript
 * const logger = createLogger("scheduler");
 * logger.debug({ rows: 42 }, "Parsed association listing");
 * logger.error({ err }, "sacctmgr failed");
 * ```
 */
export function createLogger(component: string, options: LoggerOptions = {}): PinoLogger {
  const { level = getLogLevel(), pretty = Boolean(process.stderr.isTTY) && isDevelopment() } = options;

  const baseOptions: pino.LoggerOptions = {
    name: component,
    level,
  };

  if (pretty && level !== "silent") {
    return pino({
      ...baseOptions,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:HH:MM:ss",
          ignore: "pid,hostname",
          destination: STDERR_FD,
        },
      },
    });
  }

  return pino(baseOptions, pino.destination(STDERR_FD));
}

/**
 * Create a child logger with additional context
 */
export function createChildLogger(parent: PinoLogger, bindings: Record<string, unknown>): PinoLogger {
  return parent.child(bindings);
}

export type Logger = PinoLogger;
