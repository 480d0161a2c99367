/**
 * Cleaner Module
 * Deletes original images whose converted counterpart is on disk
 */

import { unlink } from "fs/promises";
import path from "node:path";
import { fileExists } from "../utils";
import type { OptimizerContext } from "../types";

/**
 * Remove originals after a real run when deletion was requested
 *
 * Each pair is handled on its own: a missing converted file keeps its
 * original, and a failed unlink does not stop the remaining pairs.
 */
export async function clean(ctx: OptimizerContext): Promise<void> {
  if (!ctx.converted) {
    throw new Error("Mapper must run before cleaner");
  }

  const { options, tracker, logger, converted, root } = ctx;

  if (!options.deleteOriginals || options.dryRun) {
    return;
  }

  const display = (file: string) => (root ? path.relative(root, file) : file);

  for (const { original, converted: target } of converted) {
    if (!(await fileExists(target))) {
      tracker.trackDeleteError(
        display(original),
        `${path.basename(target)} not found, original kept`,
        "target-missing",
      );
      continue;
    }

    try {
      await unlink(original);
      tracker.incrementDeleted();
      logger.debug(`Deleted: ${display(original)}`);
    } catch (error) {
      tracker.trackDeleteError(display(original), error, "delete-failed");
      logger.warn(`Failed to delete ${display(original)}`);
    }
  }
}
