/**
 * Configuration Loader
 * Loads and merges configuration from defaults and user config
 */

import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { existsSync } from "fs";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import type {
  ConversionConfig,
  PartialConversionConfig,
  ConfigError,
} from "../types";
import {
  ConversionConfigSchema,
  PartialConversionConfigSchema,
} from "../types";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Get OS-specific paths using env-paths (follows XDG spec on Linux)
const paths = envPaths("tex2kindle", { suffix: "" });

/**
 * Get the OS-specific config directory
 * - Linux: $XDG_CONFIG_HOME/tex2kindle or ~/.config/tex2kindle
 * - macOS: ~/Library/Preferences/tex2kindle
 * - Windows: %APPDATA%\tex2kindle
 */
function getConfigDirectory(): string {
  return paths.config;
}

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<ConversionConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  const parsed: unknown = JSON.parse(content);
  return ConversionConfigSchema.parse(parsed);
}

/**
 * Load a partial config file with Zod validation
 * Throws error if config is invalid
 */
async function loadPartialConfig(
  configPath: string,
): Promise<PartialConversionConfig> {
  const content = await readFile(configPath, "utf-8");
  const parsed: unknown = JSON.parse(content);
  return PartialConversionConfigSchema.parse(parsed);
}

/**
 * Deep merge two objects
 */
export function mergeConfig(
  base: ConversionConfig,
  override: PartialConversionConfig,
): ConversionConfig {
  return {
    engine: override.engine ?? base.engine,
    tools: { ...base.tools, ...override.tools },
    engines: { ...base.engines, ...override.engines },
    html: { ...base.html, ...override.html },
    ebook: {
      ...base.ebook,
      ...override.ebook,
      chapters: { ...base.ebook.chapters, ...override.ebook?.chapters },
    },
    cleanup: { ...base.cleanup, ...override.cleanup },
    logging: { ...base.logging, ...override.logging },
  };
}

interface LoadConfigResult {
  config: ConversionConfig;
  errors: ConfigError[];
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
 * A config file that fails to load or validate is skipped and reported
 */
export async function loadConfig(
  custom?: string,
  userConfigPath: string = getUserConfigPath(),
): Promise<LoadConfigResult> {
  let config = await loadDefaultConfig();
  const errors: ConfigError[] = [];

  if (existsSync(userConfigPath)) {
    try {
      config = mergeConfig(config, await loadPartialConfig(userConfigPath));
    } catch (error) {
      errors.push({ path: userConfigPath, error });
    }
  }

  if (custom) {
    try {
      config = mergeConfig(config, await loadPartialConfig(custom));
    } catch (error) {
      errors.push({ path: custom, error });
    }
  }

  return { config, errors };
}

/**
 * Get the path where user config should be stored
 */
export function getUserConfigPath(): string {
  return join(getConfigDirectory(), "config.json");
}
