/**
 * Command definitions for the TeX to Kindle converter
 */

import { Command, Option } from "commander";
import { convertCommand } from "./commands/convert";
import { configCommand } from "./commands/config";
import { infoCommand } from "./commands/info";
import { ENGINES } from "../types";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("tex2kindle")
    .description("Convert TeX/LaTeX documents to Kindle ebooks")
    .version("0.1.0")
    // Options after a subcommand name belong to that subcommand
    .enablePositionalOptions();

  // Main conversion command (default action)
  program
    .argument("<input>", "TeX document to convert")
    .addOption(
      new Option("-e, --engine <engine>", "TeX engine used by the HTML converter").choices(ENGINES),
    )
    .option("-k, --keep-temp", "Keep intermediate TeX and tex4ht files")
    .option("--keep-html", "Keep generated HTML files")
    .option("-f, --force", "Convert even if the input path contains whitespace")
    .option("-c, --config <path>", "Path to custom config file")
    .option("--dry-run", "Print converter commands without running them")
    .option("-v, --verbose", "Verbose output")
    .action(convertCommand);

  // Info command - show metadata and resulting ebook flags
  program
    .command("info <input>")
    .description("Show metadata read from a TeX file and the resulting ebook flags")
    .option("-c, --config <path>", "Path to custom config file")
    .action(infoCommand);

  // Config command - show config location
  program
    .command("config")
    .description("Show configuration file location")
    .action(configCommand);

  return program;
}
