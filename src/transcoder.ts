/**
 * Image Transcoder
 * Wraps the image codec: backup, decode, re-encode to the target format
 */

import { copyFile } from "fs/promises";
import { constants } from "node:fs";
import sharp from "sharp";
import { fileExists } from "./utils/file-exists";
import { replaceExtension } from "./utils/string";
import type { ImageFile, TargetFormat, TranscodeResult } from "./types";

/**
 * Highest compression effort each encoder accepts
 */
export const MAX_EFFORT: Record<TargetFormat, number> = {
  webp: 6,
  avif: 9,
};

export interface TranscodeOptions {
  format: TargetFormat;
  quality: number;
  effort: number;
  backup: boolean;
  backupSuffix: string;
}

/**
 * Codec capability used by the mapper.
 * Implementations must never throw: failures come back as `ok: false`.
 */
export interface Transcoder {
  transcode(image: ImageFile, options: TranscodeOptions): Promise<TranscodeResult>;
}

/**
 * Copy the original next to itself unless a backup already exists.
 * COPYFILE_EXCL keeps an existing backup from being overwritten.
 */
export async function createBackup(
  imagePath: string,
  suffix: string,
): Promise<boolean> {
  const backupPath = `${imagePath}${suffix}`;
  if (await fileExists(backupPath)) {
    return false;
  }

  await copyFile(imagePath, backupPath, constants.COPYFILE_EXCL);
  return true;
}

export class SharpTranscoder implements Transcoder {
  async transcode(
    image: ImageFile,
    options: TranscodeOptions,
  ): Promise<TranscodeResult> {
    const destination = replaceExtension(image.path, options.format);

    if (options.backup) {
      try {
        await createBackup(image.path, options.backupSuffix);
      } catch (error) {
        return { ok: false, source: image, destination, stage: "backup", error };
      }
    }

    try {
      const input = sharp(image.path);
      const { hasAlpha } = await input.metadata();

      // Keep transparency (RGBA) when present, otherwise flatten to RGB
      const pipeline = hasAlpha ? input.ensureAlpha() : input.removeAlpha();

      const encoded =
        options.format === "avif"
          ? pipeline.avif({ quality: options.quality, effort: options.effort })
          : pipeline.webp({ quality: options.quality, effort: options.effort });

      const { size } = await encoded.toFile(destination);

      return { ok: true, source: image, destination, size };
    } catch (error) {
      return {
        ok: false,
        source: image,
        destination,
        stage: "transcode",
        error,
      };
    }
  }
}
