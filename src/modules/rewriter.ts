/**
 * Rewriter Module
 * Points references in code files at the converted images
 *
 * This module runs AFTER the mapper has finished: any file may reference
 * any image, so the complete mapping must exist before the first rewrite.
 */

import { readFile, writeFile } from "fs/promises";
import { decodeText, rewriteReferences } from "../utils";
import type { CodeFile, OptimizerContext, ReferenceMapping } from "../types";

export interface RewriteFileOptions {
  mapping: ReferenceMapping;
  encodings: string[];
  dryRun: boolean;
}

export type RewriteFileResult =
  | { status: "rewritten"; replacements: number; written: boolean }
  | { status: "undecodable" }
  | { status: "read-failed"; error: unknown }
  | { status: "write-failed"; replacements: number; error: unknown };

/**
 * Rewrite a single file in place. Output is always UTF-8.
 * Never throws: failures are returned as a status.
 */
export async function rewriteFile(
  file: CodeFile,
  { mapping, encodings, dryRun }: RewriteFileOptions,
): Promise<RewriteFileResult> {
  let buffer: Buffer;
  try {
    buffer = await readFile(file.path);
  } catch (error) {
    return { status: "read-failed", error };
  }

  const original = decodeText(buffer, encodings);
  if (original === null) {
    return { status: "undecodable" };
  }

  const { content, replacements } = rewriteReferences(original, mapping);
  const changed = content !== original;

  if (!changed || dryRun) {
    return { status: "rewritten", replacements, written: false };
  }

  try {
    await writeFile(file.path, content, "utf-8");
  } catch (error) {
    return { status: "write-failed", replacements, error };
  }

  return { status: "rewritten", replacements, written: true };
}

/**
 * Rewrites references across every scanned code file
 */
export async function rewrite(ctx: OptimizerContext): Promise<void> {
  if (!ctx.codeFiles || !ctx.mapping) {
    throw new Error("Scanner and mapper must run before rewriter");
  }

  const { config, options, tracker, logger, codeFiles, mapping } = ctx;

  if (mapping.size === 0) {
    logger.debug("No converted images, skipping reference rewrite");
    return;
  }

  if (codeFiles.length === 0) {
    logger.debug("No code files found to update.");
    return;
  }

  const rewriteOptions: RewriteFileOptions = {
    mapping,
    encodings: config.references.encodings,
    dryRun: options.dryRun,
  };

  for (const file of codeFiles) {
    const result = await rewriteFile(file, rewriteOptions);

    switch (result.status) {
      case "read-failed":
        tracker.trackFileError(file.relativePath, result.error, "read");
        logger.warn(`Failed to read ${file.relativePath}`);
        break;
      case "write-failed":
        tracker.trackFileError(file.relativePath, result.error, "write");
        logger.warn(`Failed to write ${file.relativePath}`);
        break;
      case "undecodable":
        tracker.trackUndecodable(file.relativePath, config.references.encodings);
        logger.warn(`Skipped ${file.relativePath}: unsupported text encoding`);
        break;
      case "rewritten":
        tracker.trackReplacements(result.replacements);
        if (result.replacements > 0) {
          logger.debug(
            `Updated ${file.relativePath}: ${result.replacements} replacement(s)`,
          );
        }
        break;
    }
  }
}
