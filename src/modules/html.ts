/**
 * HTML Module
 * Runs the TeX -> HTML converter next to the source document
 */

import path from "node:path";
import { formatCommand } from "../utils/run-command";
import { requireDocument } from "./prepare";
import type { ConversionContext } from "../types";

/**
 * Arguments for the tex4ht driver:
 * `<engine command> <file.tex> <html options> <tex4ht options>`
 */
export function buildHtmlArgs(ctx: ConversionContext): string[] {
  const { config, options } = ctx;
  const document = requireDocument(ctx);

  return [
    config.engines[options.engine],
    path.basename(document.source),
    config.html.options,
    config.html.tex4htOptions,
  ];
}

export async function html(ctx: ConversionContext): Promise<void> {
  const { config, options, tracker, logger } = ctx;
  const document = requireDocument(ctx);
  const command = config.tools.html;
  const args = buildHtmlArgs(ctx);

  if (options.dryRun) {
    console.log(formatCommand(command, args));
    tracker.trackCommand({ step: "html", command, args, exitCode: null, dryRun: true });
    return;
  }

  logger.debug(`Running ${formatCommand(command, args)}`);
  const exitCode = await ctx.runner(command, args, { cwd: document.directory });
  tracker.trackCommand({ step: "html", command, args, exitCode, dryRun: false });
}
