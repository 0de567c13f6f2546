/**
 * Stats Module
 * Displays the conversion summary: converter runs, cleanup and issues
 */

import chalk from "chalk";
import type {
  Tracker,
  ProcessingStats,
  ConversionContext,
  CommandRecord,
} from "../types";

// ============================================================================
// Formatting Helpers
// ============================================================================

/**
 * Format duration in a human-readable way
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(2)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = Math.floor(seconds % 60);
  return `${minutes}m ${remainingSeconds}s`;
}

/**
 * Format a stat row with icon, label and value
 */
function statRow(
  icon: string,
  label: string,
  value: string | number,
  color: (s: string) => string = chalk.white,
): string {
  return `   ${icon} ${chalk.dim(label.padEnd(18))} ${color(String(value))}`;
}

/**
 * Section header with modern styling
 */
function sectionHeader(title: string): string {
  return `\n  ${chalk.bold.white(title)}`;
}

function describeExit(record: CommandRecord): string {
  if (record.dryRun) return "not run";
  if (record.exitCode === null) return "killed";
  return `exit ${record.exitCode}`;
}

// ============================================================================
// Main Stats Display
// ============================================================================

/**
 * Display processing statistics to console
 */
export async function stats(ctx: ConversionContext): Promise<void> {
  const { tracker, options } = ctx;

  const stats = tracker.getStats();
  const hasWarnings = stats.issues.length > 0;

  // Blank line for separation
  console.log("");

  const statusIcon = hasWarnings ? chalk.yellow("◆") : chalk.green("✔");
  const title = options.dryRun ? "Dry Run Complete" : "Conversion Complete";

  console.log(
    `  ${statusIcon} ${chalk.bold(title)} ${chalk.dim("·")} ${chalk.dim(formatDuration(stats.duration))}`,
  );

  displayStepsSection(stats);
  displayCleanupSection(stats, options.verbose);
  displayIssuesSection(tracker, options.verbose);

  console.log("");
}

// ============================================================================
// Section Displays
// ============================================================================

function displayStepsSection(stats: ProcessingStats): void {
  console.log(sectionHeader("Steps"));

  for (const record of stats.commands) {
    const ok = record.dryRun || record.exitCode === 0;
    console.log(
      statRow(
        ok ? chalk.green("◉") : chalk.yellow("◉"),
        record.step === "html" ? "TeX → HTML" : "HTML → ebook",
        `${record.command} (${describeExit(record)})`,
        ok ? chalk.green : chalk.yellow,
      ),
    );
  }

  if (stats.outputFile) {
    console.log(statRow(chalk.cyan("◉"), "Output", stats.outputFile, chalk.cyan));
  }
}

function displayCleanupSection(stats: ProcessingStats, verbose: boolean): void {
  if (stats.removedFiles.length === 0) {
    return;
  }

  console.log(sectionHeader("Cleanup"));
  console.log(
    statRow(chalk.green("◉"), "Removed", stats.removedFiles.length, chalk.green),
  );

  if (verbose) {
    for (const file of stats.removedFiles) {
      console.log(`      ${chalk.dim("·")} ${file}`);
    }
  }
}

function displayIssuesSection(tracker: Tracker, verbose: boolean): void {
  const commandIssues = tracker.getIssues("command");
  const cleanupIssues = tracker.getIssues("cleanup");
  const resourceIssues = tracker.getIssues("resource");

  const hasIssues =
    commandIssues.length > 0 ||
    cleanupIssues.length > 0 ||
    resourceIssues.length > 0;

  if (!hasIssues) {
    return;
  }

  console.log(sectionHeader(chalk.yellow("Warnings")));

  // Converter runs are never fatal, but always listed
  for (const issue of commandIssues) {
    console.log(statRow(chalk.yellow("✖"), issue.path, issue.details ?? issue.reason, chalk.yellow));
  }

  if (cleanupIssues.length > 0) {
    console.log(
      statRow(
        chalk.yellow("✖"),
        "Not removed",
        cleanupIssues.length,
        chalk.yellow,
      ),
    );
    if (verbose) {
      for (const issue of cleanupIssues) {
        console.log(`      ${chalk.dim("·")} ${issue.path}`);
        if (issue.details) {
          console.log(`        ${chalk.dim(issue.details)}`);
        }
      }
    }
  }

  if (resourceIssues.length > 0) {
    console.log(
      statRow(
        chalk.yellow("✖"),
        "Config ignored",
        resourceIssues.length,
        chalk.yellow,
      ),
    );
    for (const issue of resourceIssues) {
      console.log(`      ${chalk.dim("·")} ${issue.path}`);
      if (verbose && issue.details) {
        console.log(`        ${chalk.dim(issue.details)}`);
      }
    }
  }
}
