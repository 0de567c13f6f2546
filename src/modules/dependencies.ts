/**
 * Dependencies Module
 * Verifies both external converters can be found before anything runs
 */

import { findExecutable } from "../utils/find-executable";
import { MissingDependencyError } from "../utils/errors";
import type { ConversionContext } from "../types";

export async function dependencies(ctx: ConversionContext): Promise<void> {
  const { tools } = ctx.config;
  const missing: string[] = [];

  for (const tool of [tools.html, tools.ebook]) {
    const resolved = await findExecutable(tool, ctx.env);
    if (resolved) {
      ctx.logger.debug(`Found ${tool} at ${resolved}`);
    } else {
      missing.push(tool);
    }
  }

  if (missing.length > 0) {
    throw new MissingDependencyError(missing);
  }
}
