/**
 * Info command - Show the metadata read from a TeX file and the
 * flags the ebook converter would receive
 */

import chalk from "chalk";
import { z } from "zod";
import { MetadataReader } from "../../metadata/reader";
import { buildEbookFlags } from "../../modules/options";
import { loadConfig, ConversionError, Logger, Tracker } from "../../utils";
import type { MetadataField, TexMetadata } from "../../types";

const InfoOptionsSchema = z.object({
  config: z.string().optional(),
});

type Options = z.infer<typeof InfoOptionsSchema>;

const LABELS: [MetadataField, string][] = [
  ["documentClass", "Document class"],
  ["languages", "Languages"],
  ["author", "Author"],
  ["cover", "Cover"],
  ["date", "Date"],
  ["publisher", "Publisher"],
  ["isbn", "ISBN"],
];

export function formatMetadata(metadata: TexMetadata): string[] {
  return LABELS.map(([field, label]) => {
    const value = metadata[field];
    const text = Array.isArray(value) ? value.join(", ") : value;
    return `  ${label.padEnd(16)} ${text ? text : chalk.dim("-")}`;
  });
}

export async function infoCommand(input: string, opts: Options): Promise<void> {
  try {
    const options = InfoOptionsSchema.parse(opts);
    const { config, errors } = await loadConfig(options.config);
    const logger = new Logger(config.logging.level);

    // A config file that failed to load is skipped, but never silently
    const tracker = new Tracker();
    for (const err of errors) {
      tracker.trackError(err.path, err.error, "resource");
    }
    for (const issue of tracker.getIssues("resource")) {
      logger.warn(`Config ignored: ${issue.path} (${issue.reason}: ${issue.details})`);
    }

    const metadata = (await MetadataReader.load(input)).read();

    console.log(chalk.bold("Metadata"));
    for (const line of formatMetadata(metadata)) {
      console.log(line);
    }

    console.log(chalk.bold("\nEbook flags"));
    for (const flag of buildEbookFlags(metadata, config)) {
      console.log(`  ${flag}`);
    }
  } catch (error) {
    if (error instanceof ConversionError) {
      console.error(chalk.red(error.message));
    } else {
      console.error(error);
    }
    process.exit(1);
  }
}
