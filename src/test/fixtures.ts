/**
 * Shared test helpers
 */

import { vi } from "vitest";
import { chmod, mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import path from "node:path";
import { loadDefaultConfig } from "../utils/load-config";
import { Logger } from "../utils/logger";
import { Tracker } from "../utils/conversion-tracker";
import type { CommandRunner } from "../utils/run-command";
import type {
  ConversionConfig,
  ConversionContext,
  ConversionOptions,
} from "../types";

export const defaultOptions: ConversionOptions = {
  engine: "latex",
  keepIntermediate: false,
  keepHtml: false,
  force: false,
  dryRun: false,
  verbose: false,
};

export async function createContext(
  input: string,
  overrides: Partial<ConversionOptions> = {},
  config?: ConversionConfig,
): Promise<ConversionContext> {
  const runner = vi.fn<CommandRunner>().mockResolvedValue(0);
  return {
    config: config ?? (await loadDefaultConfig()),
    options: { ...defaultOptions, ...overrides },
    input,
    tracker: new Tracker(),
    logger: new Logger("error"),
    runner,
  };
}

export async function withTempDir<T>(
  fn: (dir: string) => Promise<T>,
): Promise<T> {
  const dir = await mkdtemp(path.join(tmpdir(), "tex2kindle-"));
  try {
    return await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

/**
 * Write a stub executable that PATH lookup will find on this platform
 * (`name.CMD` on Windows, `name` with the execute bit elsewhere)
 */
export async function installTool(dir: string, name: string): Promise<string> {
  const file = path.join(dir, process.platform === "win32" ? `${name}.CMD` : name);
  await writeFile(file, process.platform === "win32" ? "@exit /b 0\r\n" : "#!/bin/sh\n", "utf-8");
  await chmod(file, 0o755);
  return file;
}
