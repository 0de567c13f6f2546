/**
 * Prepare Module
 * Resolves the input document and the directory the converters work in
 */

import path from "node:path";
import { access } from "fs/promises";
import { constants } from "node:fs";
import { ConversionError, ResourceError } from "../utils/errors";
import type { ConversionContext, DocumentPaths } from "../types";

/**
 * Writes to context:
 * - document: absolute source path, working directory and base name
 */
export async function prepare(ctx: ConversionContext): Promise<void> {
  const source = path.resolve(ctx.input);

  try {
    await access(source, constants.R_OK);
  } catch (error) {
    throw ResourceError.fromFsError(source, error);
  }

  // tex4ht cannot cope with blanks in file names
  if (/\s/.test(source)) {
    if (!ctx.options.force) {
      throw new ConversionError(
        `Input path contains whitespace, which the HTML converter does not support: ${source}\n` +
          "Rename the file or pass --force to convert anyway.",
      );
    }
    ctx.logger.warn(`Input path contains whitespace: ${source}`);
  }

  ctx.document = {
    source,
    directory: path.dirname(source),
    basename: path.basename(source, path.extname(source)),
  };

  ctx.logger.debug(`Working directory: ${ctx.document.directory}`);
}

/**
 * Read back the document paths written by prepare
 */
export function requireDocument(ctx: ConversionContext): DocumentPaths {
  if (!ctx.document) {
    throw new ConversionError("Document paths are not resolved; run prepare first");
  }
  return ctx.document;
}
