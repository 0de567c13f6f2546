/**
 * Option Assembly
 * Maps document metadata onto ebook converter flags
 */

import type { ConversionConfig, TexMetadata } from "../types";

/**
 * Chapter-boundary selector for the recognized document classes.
 * Any other class gets no chapter flag.
 */
export function chapterSelector(
  documentClass: string | undefined,
  config: ConversionConfig,
): string | undefined {
  switch (documentClass) {
    case "article":
      return config.ebook.chapters.article;
    case "book":
      return config.ebook.chapters.book;
    default:
      return undefined;
  }
}

/**
 * Build the flag list in fixed order:
 * profile, no-inline-toc, chapter, language, authors, cover, publisher, isbn
 */
export function buildEbookFlags(
  metadata: TexMetadata,
  config: ConversionConfig,
): string[] {
  const flags = [
    `--output-profile=${config.ebook.outputProfile}`,
    "--no-inline-toc",
  ];

  const chapter = chapterSelector(metadata.documentClass, config);
  if (chapter) flags.push(`--chapter=${chapter}`);

  const language = metadata.languages?.[0];
  if (language) flags.push(`--language=${language}`);

  if (metadata.author) flags.push(`--authors=${metadata.author}`);
  if (metadata.cover) flags.push(`--cover=${metadata.cover}`);
  if (metadata.publisher) flags.push(`--publisher=${metadata.publisher}`);
  if (metadata.isbn) flags.push(`--isbn=${metadata.isbn}`);

  return flags;
}
