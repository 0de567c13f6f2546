/**
 * Conversion Tracker
 * Unified tracking for stats and issues
 */

import { ZodError } from "zod";

// ============================================================================
// Types
// ============================================================================

// Type-safe reasons for each issue type
export type ResourceIssueReason =
  | "invalid-json"
  | "schema-validation"
  | "read-error";
export type CommandIssueReason = "non-zero-exit" | "killed";
export type CleanupIssueReason = "remove-failed";

// Discriminated union - each type has its own subset of reasons
export interface ResourceIssue {
  type: "resource";
  path: string;
  reason: ResourceIssueReason;
  details?: string;
}

export interface CommandIssue {
  type: "command";
  path: string; // executable name
  reason: CommandIssueReason;
  details?: string;
}

export interface CleanupIssue {
  type: "cleanup";
  path: string;
  reason: CleanupIssueReason;
  details?: string;
}

export type Issue = ResourceIssue | CommandIssue | CleanupIssue;
export type IssueType = Issue["type"];

export type StepName = "html" | "ebook";

export interface CommandRecord {
  step: StepName;
  command: string;
  args: string[];
  exitCode: number | null; // null when the process was killed by a signal
  dryRun: boolean;
}

export interface ProcessingStats {
  commands: CommandRecord[];
  removedFiles: string[];
  outputFile?: string;

  // All issues
  issues: Issue[];

  // Timing
  duration: number;
}

// ============================================================================
// Error Mapping (private)
// ============================================================================

interface IssueInfo<T> {
  reason: T;
  details: string;
}

function mapResourceError(error: unknown): IssueInfo<ResourceIssueReason> {
  if (error instanceof ZodError) {
    return {
      reason: "schema-validation",
      details: error.issues
        .map((e) => (e.path.length ? `${e.path.join(".")}: ${e.message}` : e.message))
        .join("; "),
    };
  }
  if (error instanceof SyntaxError) {
    return {
      reason: "invalid-json",
      details: error.message,
    };
  }
  if (error instanceof Error) {
    return {
      reason: "read-error",
      details: error.message,
    };
  }
  return {
    reason: "read-error",
    details: String(error),
  };
}

// ============================================================================
// Tracker - Main tracker class
// ============================================================================

export class Tracker {
  private commands: CommandRecord[] = [];
  private removedFiles: string[] = [];
  private outputFile?: string;
  private issues: Issue[] = [];
  private startTime = new Date();

  // ============================================================================
  // Steps
  // ============================================================================

  /**
   * Record a converter run. A non-zero exit does not stop the pipeline,
   * it only shows up as an issue in the summary.
   */
  trackCommand(record: CommandRecord): void {
    this.commands.push(record);
    if (record.dryRun || record.exitCode === 0) return;

    this.issues.push({
      type: "command",
      path: record.command,
      reason: record.exitCode === null ? "killed" : "non-zero-exit",
      details:
        record.exitCode === null
          ? `${record.step} step was terminated by a signal`
          : `${record.step} step exited with code ${record.exitCode}`,
    });
  }

  trackRemoved(path: string): void {
    this.removedFiles.push(path);
  }

  setOutputFile(path: string): void {
    this.outputFile = path;
  }

  // ============================================================================
  // Issue tracking
  // ============================================================================

  /**
   * Track an issue from an error, auto-detecting the reason based on error type
   */
  trackError(path: string, error: unknown, type: "resource" | "cleanup"): void {
    switch (type) {
      case "resource": {
        const { reason, details } = mapResourceError(error);
        this.issues.push({ type: "resource", path, reason, details });
        break;
      }
      case "cleanup": {
        const details = error instanceof Error ? error.message : String(error);
        this.issues.push({
          type: "cleanup",
          path,
          reason: "remove-failed",
          details,
        });
        break;
      }
    }
  }

  // ============================================================================
  // Issue getters
  // ============================================================================

  getIssues(): Issue[];
  getIssues<T extends IssueType>(type: T): Extract<Issue, { type: T }>[];
  getIssues(type?: IssueType): Issue[] {
    if (!type) return this.issues;
    return this.issues.filter((i) => i.type === type);
  }

  // ============================================================================
  // Results
  // ============================================================================

  /**
   * Get final processing statistics
   */
  getStats(): ProcessingStats {
    const endTime = new Date();
    const duration = endTime.getTime() - this.startTime.getTime();

    return {
      commands: this.commands,
      removedFiles: this.removedFiles,
      outputFile: this.outputFile,
      issues: this.issues,
      duration,
    };
  }
}
