/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Engine names accepted on the command line
export const ENGINES = ["latex", "xelatex", "lualatex"] as const;
export const EngineSchema = z.enum(ENGINES);

// Zod schemas
export const ToolsConfigSchema = z.object({
  html: z.string().min(1), // TeX -> HTML converter (tex4ht driver)
  ebook: z.string().min(1), // HTML -> ebook converter
});

export const EnginesConfigSchema = z.object({
  latex: z.string().min(1),
  xelatex: z.string().min(1),
  lualatex: z.string().min(1),
});

export const HtmlConfigSchema = z.object({
  // Second and third positional arguments handed to the tex4ht driver
  options: z.string(),
  tex4htOptions: z.string(),
});

export const ChaptersConfigSchema = z.object({
  article: z.string().min(1),
  book: z.string().min(1),
});

export const EbookConfigSchema = z.object({
  format: z.string().regex(/^[a-z0-9]+$/),
  outputProfile: z.string().min(1),
  chapters: ChaptersConfigSchema,
});

export const CleanupConfigSchema = z.object({
  intermediateExtensions: z.array(z.string().regex(/^[A-Za-z0-9]+$/)),
  htmlExtensions: z.array(z.string().regex(/^[A-Za-z0-9]+$/)),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
});

export const ConversionConfigSchema = z.object({
  engine: EngineSchema,
  tools: ToolsConfigSchema,
  engines: EnginesConfigSchema,
  html: HtmlConfigSchema,
  ebook: EbookConfigSchema,
  cleanup: CleanupConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialConversionConfigSchema = ConversionConfigSchema.partial()
  .extend({
    tools: ToolsConfigSchema.partial().optional(),
    engines: EnginesConfigSchema.partial().optional(),
    html: HtmlConfigSchema.partial().optional(),
    ebook: EbookConfigSchema.partial()
      .extend({ chapters: ChaptersConfigSchema.partial().optional() })
      .optional(),
    cleanup: CleanupConfigSchema.partial().optional(),
    logging: LoggingConfigSchema.partial().optional(),
  })
  .strict();

// Infer TypeScript types from Zod schemas
export type Engine = z.infer<typeof EngineSchema>;
export type ToolsConfig = z.infer<typeof ToolsConfigSchema>;
export type EnginesConfig = z.infer<typeof EnginesConfigSchema>;
export type HtmlConfig = z.infer<typeof HtmlConfigSchema>;
export type ChaptersConfig = z.infer<typeof ChaptersConfigSchema>;
export type EbookConfig = z.infer<typeof EbookConfigSchema>;
export type CleanupConfig = z.infer<typeof CleanupConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type ConversionConfig = z.infer<typeof ConversionConfigSchema>;
export type PartialConversionConfig = z.infer<
  typeof PartialConversionConfigSchema
>;
