/**
 * Typed errors for the classifier
 *
 * Oracle failures never surface here: the oracle client folds them into an
 * OracleResult. These cover the conditions that stop a run.
 */

import type { RunReport } from "./model";

export class ConfigError extends Error {
  readonly name = "ConfigError";
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}:\n  - ${issues.join("\n  - ")}` : message);
    this.issues = issues;
  }
}

export type ClassificationRunErrorCode =
  | "UPSTREAM_UNAVAILABLE"
  | "NO_WORK_UNITS"
  | "PERSISTENCE_FAILED";

export class ClassificationRunError extends Error {
  readonly name = "ClassificationRunError";
  readonly code: ClassificationRunErrorCode;
  readonly context: Record<string, unknown>;
  /** Progress committed before the failure, when units were already processed */
  readonly report?: RunReport;

  constructor(
    code: ClassificationRunErrorCode,
    message: string,
    options: { context?: Record<string, unknown>; report?: RunReport; cause?: unknown } = {}
  ) {
    super(`${code}: ${message}`, { cause: options.cause });
    this.code = code;
    this.context = options.context ?? {};
    this.report = options.report;
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      report: this.report,
    };
  }
}
