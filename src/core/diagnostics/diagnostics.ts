/**
 * Diagnostics
 *
 * Operator-facing messages printed on stdout alongside the commands. Every
 * line starts with `###` so a consumer can filter them out before piping the
 * rest to a shell.
 *
 * @module
 */

import type { Logger } from "../../utils/logger.js";

export type DiagnosticSeverity = "notice" | "warning" | "error";

export interface Diagnostic {
  severity: DiagnosticSeverity;
  message: string;
  /** User, group or policy scope the message is about */
  subject?: string;
}

export const DIAGNOSTIC_PREFIX = "###";

const LABELS: Record<DiagnosticSeverity, string> = {
  notice: "NOTICE",
  warning: "WARNING",
  error: "ERROR",
};

export function formatDiagnostic(diagnostic: Diagnostic): string {
  return `${DIAGNOSTIC_PREFIX} ${LABELS[diagnostic.severity]}: ${diagnostic.message}`;
}

export function isDiagnosticLine(line: string): boolean {
  return line.startsWith(DIAGNOSTIC_PREFIX);
}

export interface DiagnosticSink {
  notice(message: string, subject?: string): void;
  warning(message: string, subject?: string): void;
  error(message: string, subject?: string): void;
}

/**
 * Collects diagnostics in the order they were raised.
 */
export class DiagnosticCollector implements DiagnosticSink {
  private readonly entries: Diagnostic[] = [];

  constructor(private readonly logger?: Logger) {}

  notice(message: string, subject?: string): void {
    this.add({ severity: "notice", message, subject });
  }

  warning(message: string, subject?: string): void {
    this.add({ severity: "warning", message, subject });
  }

  error(message: string, subject?: string): void {
    this.add({ severity: "error", message, subject });
  }

  get diagnostics(): readonly Diagnostic[] {
    return this.entries;
  }

  count(severity: DiagnosticSeverity): number {
    return this.entries.filter((entry) => entry.severity === severity).length;
  }

  private add(diagnostic: Diagnostic): void {
    this.entries.push(diagnostic);
    this.logger?.debug({ ...diagnostic }, "diagnostic");
  }
}
