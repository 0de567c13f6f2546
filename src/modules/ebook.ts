/**
 * Ebook Module
 * Reads the document metadata and runs the HTML -> ebook converter
 */

import path from "node:path";
import { MetadataReader } from "../metadata/reader";
import { formatCommand } from "../utils/run-command";
import { buildEbookFlags } from "./options";
import { requireDocument } from "./prepare";
import type { ConversionContext } from "../types";

/**
 * Writes to context:
 * - metadata: fields read from the TeX source
 * - ebookFlags: flags handed to the converter after input and output
 */
export async function ebook(ctx: ConversionContext): Promise<void> {
  const { config, options, tracker, logger } = ctx;
  const document = requireDocument(ctx);

  const reader = await MetadataReader.load(document.source);
  ctx.metadata = reader.read();
  ctx.ebookFlags = buildEbookFlags(ctx.metadata, config);

  const input = `${document.basename}.html`;
  const output = `${document.basename}.${config.ebook.format}`;
  const command = config.tools.ebook;
  const args = [input, output, ...ctx.ebookFlags];

  if (options.dryRun) {
    console.log(formatCommand(command, args));
    tracker.trackCommand({ step: "ebook", command, args, exitCode: null, dryRun: true });
    return;
  }

  logger.debug(`Running ${formatCommand(command, args)}`);
  const exitCode = await ctx.runner(command, args, { cwd: document.directory });
  tracker.trackCommand({ step: "ebook", command, args, exitCode, dryRun: false });
  tracker.setOutputFile(path.join(document.directory, output));
}
