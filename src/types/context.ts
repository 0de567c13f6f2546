/**
 * Conversion context - flows through the entire pipeline
 * Each module reads what it needs and writes its results back
 */

import type { ConversionConfig, Engine } from "./config";
import type { TexMetadata } from "./metadata";
import type { Tracker } from "../utils/conversion-tracker";
import type { Logger } from "../utils/logger";
import type { CommandRunner } from "../utils/run-command";

// Re-export types from conversion-tracker
export type {
  Issue,
  IssueType,
  ResourceIssue,
  CommandIssue,
  CleanupIssue,
  ResourceIssueReason,
  CommandIssueReason,
  CleanupIssueReason,
  CommandRecord,
  StepName,
  ProcessingStats,
} from "../utils/conversion-tracker";

/**
 * Parsed command-line switches, passed explicitly instead of global state
 */
export interface ConversionOptions {
  engine: Engine;
  keepIntermediate: boolean;
  keepHtml: boolean;
  force: boolean;
  dryRun: boolean;
  verbose: boolean;
}

/**
 * Where the document lives and what the converters write next to it
 */
export interface DocumentPaths {
  source: string; // Absolute path to the .tex file
  directory: string; // Directory the converters run in
  basename: string; // File name without the .tex extension
}

export interface ConfigError {
  path: string;
  error: unknown;
}

export interface ConversionContext {
  // Input - provided at initialization
  config: ConversionConfig;
  options: ConversionOptions;
  input: string;

  // Unified tracking for stats, errors, and converter runs
  tracker: Tracker;
  logger: Logger;
  runner: CommandRunner;
  env?: NodeJS.ProcessEnv; // PATH used for dependency lookup

  document?: DocumentPaths; // Filled by prepare
  metadata?: TexMetadata; // Filled by ebook
  ebookFlags?: string[]; // Filled by ebook
}
