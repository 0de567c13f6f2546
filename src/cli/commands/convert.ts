/**
 * Convert command - Loads config and runs conversion pipeline
 */

import ora, { type Ora } from "ora";
import chalk from "chalk";
import { z } from "zod";
import {
  loadConfig,
  runCommand,
  ConversionError,
  Logger,
  Tracker,
} from "../../utils";
import * as modules from "../../modules";
import { EngineSchema } from "../../types";
import type { ConversionContext, ConversionOptions } from "../../types";
import type { CommandRunner } from "../../utils";

const ConvertOptionsSchema = z.object({
  engine: EngineSchema.optional(),
  keepTemp: z.boolean().optional(),
  keepHtml: z.boolean().optional(),
  force: z.boolean().optional(),
  config: z.string().optional(),
  dryRun: z.boolean().optional(),
  verbose: z.boolean().optional(),
});

type Options = z.infer<typeof ConvertOptionsSchema>;

/**
 * Validate CLI options, load configuration (default → user → custom)
 * and build the context the pipeline runs on
 */
export async function createConversionContext(
  input: string,
  opts: Options,
  runner: CommandRunner = runCommand,
): Promise<ConversionContext> {
  const cli = ConvertOptionsSchema.parse(opts);
  const { config, errors } = await loadConfig(cli.config);

  const options: ConversionOptions = {
    engine: cli.engine ?? config.engine,
    keepIntermediate: cli.keepTemp ?? false,
    keepHtml: cli.keepHtml ?? false,
    force: cli.force ?? false,
    dryRun: cli.dryRun ?? false,
    verbose: cli.verbose ?? false,
  };

  const tracker = new Tracker();

  // Add any config loading errors to tracker
  for (const err of errors) {
    tracker.trackError(err.path, err.error, "resource");
  }

  return {
    config,
    options,
    input,
    tracker,
    logger: new Logger(options.verbose ? "debug" : config.logging.level),
    runner,
  };
}

/**
 * Run every step in order; converter exit codes never stop the run
 */
export async function runPipeline(
  ctx: ConversionContext,
  spinner?: Ora,
): Promise<void> {
  await modules.prepare(ctx);
  await modules.dependencies(ctx);

  // Converters write straight to the terminal, so the spinner only
  // marks the boundaries between steps
  spinner?.start("Generating HTML...").stopAndPersist({ symbol: chalk.cyan("›") });
  await modules.html(ctx);

  await modules.cleanIntermediate(ctx);

  spinner?.start("Converting to ebook...").stopAndPersist({ symbol: chalk.cyan("›") });
  await modules.ebook(ctx);

  spinner?.start("Removing generated HTML...");
  await modules.cleanHtml(ctx);
  spinner?.stop();

  await modules.stats(ctx);
}

export async function convertCommand(input: string, opts: Options): Promise<void> {
  const spinner = ora({ text: "Initializing...", indent: 2 });

  try {
    const ctx = await createConversionContext(input, opts);
    await runPipeline(ctx, spinner);
  } catch (error) {
    spinner.fail("Conversion failed");
    if (error instanceof ConversionError || error instanceof z.ZodError) {
      console.error(chalk.red(error.message));
    } else {
      console.error(error);
    }
    process.exit(1);
  }
}
