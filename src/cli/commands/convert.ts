/**
 * Convert command - Loads config and runs the optimization pipeline
 */

import ora from "ora";
import { z } from "zod";
import { loadConfig, Logger, Tracker } from "../../utils";
import { QualitySchema, TARGET_FORMATS } from "../../types";
import type { OptimizerConfig } from "../../types";
import { Optimizer } from "../../optimizer";
import type { Phase } from "../../optimizer";
import * as modules from "../../modules";

export const ConvertOptionsSchema = z.object({
  quality: z.coerce.number().pipe(QualitySchema).optional(),
  format: z.enum(TARGET_FORMATS).optional(),
  dryRun: z.boolean().optional(),
  backup: z.boolean().optional(),
  verbose: z.boolean().optional(),
  deleteOriginals: z.boolean().optional(),
  path: z.string().optional(),
  config: z.string().optional(),
});

type Options = z.input<typeof ConvertOptionsSchema>;

const PHASE_TEXT: Record<Phase, string> = {
  scan: "Scanning files...",
  map: "Converting images...",
  rewrite: "Updating references...",
  clean: "Deleting originals...",
};

/**
 * Apply CLI overrides on top of the loaded config
 */
export function applyCliOptions(
  config: OptimizerConfig,
  options: z.infer<typeof ConvertOptionsSchema>,
): OptimizerConfig {
  return {
    ...config,
    input: options.path ?? config.input,
    images: {
      ...config.images,
      quality: options.quality ?? config.images.quality,
      format: options.format ?? config.images.format,
    },
  };
}

export async function convertCommand(opts: Options): Promise<void> {
  const spinner = ora({
    text: "Initializing...",
    indent: 2,
    isEnabled: !opts.verbose,
  }).start();

  try {
    // Validate CLI options (quality range is checked here, before any work)
    const options = ConvertOptionsSchema.parse(opts);

    // Load configuration (default → user → custom)
    const { config, errors } = await loadConfig(options.config);

    const tracker = new Tracker();

    // Add any config loading errors to tracker
    for (const err of errors) {
      tracker.trackResourceError(err.path, err.error);
    }

    const optimizer = new Optimizer(applyCliOptions(config, options), {
      dryRun: options.dryRun,
      backup: options.backup,
      deleteOriginals: options.deleteOriginals,
      verbose: options.verbose,
      tracker,
      // Warnings are listed in the summary; print them live only when verbose
      logger: new Logger(options.verbose ? "debug" : "error"),
      onPhase: (phase) => {
        spinner.text = PHASE_TEXT[phase];
      },
    });

    await optimizer.run();

    // Clear and stop spinner before displaying stats
    spinner.clear();
    spinner.stop();

    modules.stats(optimizer.context);
  } catch (error) {
    spinner.fail("Optimization failed");
    if (error instanceof z.ZodError) {
      console.error(z.prettifyError(error));
    } else {
      console.error(error instanceof Error ? error.message : error);
    }
    process.exit(1);
  }
}
