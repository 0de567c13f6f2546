/**
 * Cleanup Module
 * Removes converter by-products that sit next to the source document
 */

import path from "node:path";
import { rm } from "fs/promises";
import glob from "fast-glob";
import { fileExists } from "../utils";
import { requireDocument } from "./prepare";
import type { ConversionContext } from "../types";

/**
 * Intermediate TeX/tex4ht files: `<base>.<ext>` for each configured extension
 */
export function intermediateFiles(ctx: ConversionContext): string[] {
  const { directory, basename } = requireDocument(ctx);
  return ctx.config.cleanup.intermediateExtensions.map((ext) =>
    path.join(directory, `${basename}.${ext}`),
  );
}

/**
 * Generated HTML: `<base>.html`, `<base>.css` and every split page
 * tex4ht wrote as `<base>*.html`
 */
export async function htmlFiles(ctx: ConversionContext): Promise<string[]> {
  const { directory, basename } = requireDocument(ctx);
  const files = new Set(
    ctx.config.cleanup.htmlExtensions.map((ext) =>
      path.join(directory, `${basename}.${ext}`),
    ),
  );

  const pages = await glob(`${glob.escapePath(basename)}*.html`, {
    cwd: directory,
    absolute: true,
    onlyFiles: true,
    deep: 1,
  });
  for (const page of pages) {
    files.add(path.normalize(page));
  }

  return [...files].sort();
}

async function removeFiles(
  ctx: ConversionContext,
  files: string[],
): Promise<void> {
  for (const file of files) {
    if (!(await fileExists(file))) continue;

    try {
      await rm(file);
      ctx.tracker.trackRemoved(file);
      ctx.logger.debug(`Removed ${file}`);
    } catch (error) {
      ctx.tracker.trackError(file, error, "cleanup");
    }
  }
}

export async function cleanIntermediate(ctx: ConversionContext): Promise<void> {
  if (ctx.options.keepIntermediate || ctx.options.dryRun) return;
  await removeFiles(ctx, intermediateFiles(ctx));
}

export async function cleanHtml(ctx: ConversionContext): Promise<void> {
  if (ctx.options.keepHtml || ctx.options.dryRun) return;
  await removeFiles(ctx, await htmlFiles(ctx));
}
