/**
 * Mapper Module
 * Transcodes every discovered image and builds the old -> new filename mapping
 *
 * In dry-run mode nothing is transcoded: each image is projected to its
 * destination path and counted as converted so the plan can be reported.
 */

import path from "node:path";
import chalk from "chalk";
import { MAX_EFFORT } from "../transcoder";
import type { TranscodeOptions } from "../transcoder";
import { formatBytes, replaceExtension, sizeReduction } from "../utils";
import type {
  ConvertedPair,
  ImageFile,
  OptimizerContext,
  ReferenceMapping,
  TranscodeResult,
} from "../types";

/**
 * Run the mapper module
 *
 * Reads from context:
 * - images (from scanner)
 *
 * Writes to context:
 * - mapping: Basename mapping consumed by the rewriter
 * - converted: (original, converted) path pairs, used for deletion
 * - failed: Images that could not be transcoded
 */
export async function map(ctx: OptimizerContext): Promise<void> {
  if (!ctx.images) {
    throw new Error("Scanner must run before mapper");
  }

  // ============================================================================
  // Shared State (closure variables)
  // ============================================================================

  const { config, options, tracker, logger, transcoder, images } = ctx;

  const transcodeOptions: TranscodeOptions = {
    format: config.images.format,
    quality: config.images.quality,
    effort: MAX_EFFORT[config.images.format],
    backup: options.backup,
    backupSuffix: config.images.backupSuffix,
  };

  const mapping: ReferenceMapping = new Map();
  const converted: ConvertedPair[] = [];
  const failed: ImageFile[] = [];

  // destination path -> relative path of the image that claimed it
  const claimedDestinations = new Map<string, string>();
  // basename -> relative path of the first image seen with it
  const seenNames = new Map<string, string>();

  // ============================================================================
  // Helper Functions
  // ============================================================================

  async function transcodeOrProject(image: ImageFile): Promise<TranscodeResult> {
    if (options.dryRun) {
      return {
        ok: true,
        source: image,
        destination: replaceExtension(image.path, config.images.format),
        size: 0,
      };
    }
    return transcoder.transcode(image, transcodeOptions);
  }

  function claimDestination(image: ImageFile): boolean {
    const destination = replaceExtension(image.path, config.images.format);
    const owner = claimedDestinations.get(destination);

    if (owner !== undefined) {
      tracker.trackImageError(
        image.relativePath,
        `${path.basename(destination)} is already produced from ${owner}`,
        "destination-conflict",
      );
      return false;
    }

    claimedDestinations.set(destination, image.relativePath);
    return true;
  }

  function recordName(image: ImageFile, destination: string): void {
    const oldName = path.basename(image.path);
    const first = seenNames.get(oldName);

    if (first === undefined) {
      seenNames.set(oldName, image.relativePath);
    } else {
      tracker.trackAmbiguousName(
        image.relativePath,
        `References to ${oldName} cannot be told apart from ${first}`,
      );
    }

    mapping.set(oldName, path.basename(destination));
  }

  function reportFailure(result: Extract<TranscodeResult, { ok: false }>): void {
    const reason = result.stage === "backup" ? "backup-failed" : "transcode-failed";
    tracker.trackImageError(result.source.relativePath, result.error, reason);
    logger.warn(`Failed to convert ${result.source.relativePath}`);
  }

  // ============================================================================
  // Main Loop
  // ============================================================================

  for (const image of images) {
    logger.debug(`Processing: ${image.relativePath}`);
    tracker.addOriginalBytes(image.size);

    if (!claimDestination(image)) {
      tracker.incrementImagesFailed();
      failed.push(image);
      continue;
    }

    const result = await transcodeOrProject(image);

    if (!result.ok) {
      reportFailure(result);
      tracker.incrementImagesFailed();
      failed.push(image);
      continue;
    }

    tracker.incrementConverted(result.size);
    converted.push({ original: image.path, converted: result.destination });
    recordName(image, result.destination);

    if (!options.dryRun) {
      const savings = sizeReduction(image.size, result.size);
      logger.debug(
        `  ${formatBytes(image.size)} -> ${formatBytes(result.size)} ${chalk.green(`(${savings.toFixed(1)}% smaller)`)}`,
      );
    }
  }

  ctx.mapping = mapping;
  ctx.converted = converted;
  ctx.failed = failed;
}
