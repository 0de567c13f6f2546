/**
 * Utility exports
 */

// Text utilities
export { unescape } from "./unescape";

// Filesystem utilities
export { fileExists } from "./file-exists";
export { findExecutable } from "./find-executable";

// Process utilities
export { runCommand, formatCommand } from "./run-command";
export type { CommandRunner, RunOptions } from "./run-command";

// Config utilities
export {
  loadConfig,
  getUserConfigPath,
  loadDefaultConfig,
  mergeConfig,
} from "./load-config";

// Errors
export {
  ConversionError,
  ResourceError,
  MissingDependencyError,
} from "./errors";

// Classes
export { Logger } from "./logger";
export type { LogLevel } from "./logger";
export { Tracker } from "./conversion-tracker";
