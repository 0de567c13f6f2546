/**
 * Central type exports
 */

// Configuration
export type {
  ConversionConfig,
  PartialConversionConfig,
  Engine,
  ToolsConfig,
  EnginesConfig,
  HtmlConfig,
  ChaptersConfig,
  EbookConfig,
  CleanupConfig,
  LoggingConfig,
} from "./config";
export {
  ENGINES,
  EngineSchema,
  ConversionConfigSchema,
  PartialConversionConfigSchema,
} from "./config";

// Metadata
export type { TexMetadata, MetadataField } from "./metadata";

// Context
export type {
  ConversionContext,
  ConversionOptions,
  DocumentPaths,
  ConfigError,
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
} from "./context";

// Tracker
export { Tracker } from "../utils/conversion-tracker";
