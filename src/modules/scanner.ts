/**
 * Scanner Module
 * Walks the input tree and classifies files into images and code files
 */

import glob from "fast-glob";
import path from "node:path";
import { stat } from "fs/promises";
import { toPosix } from "../utils";
import type {
  CodeFile,
  ImageFile,
  OptimizerConfig,
  OptimizerContext,
} from "../types";

/**
 * Extension and exclusion sets the scanner classifies against
 */
export interface ScanRules {
  imageExtensions: ReadonlySet<string>;
  codeExtensions: ReadonlySet<string>;
  exclude: ReadonlySet<string>;
}

export interface ScanResult {
  images: ImageFile[];
  codeFiles: CodeFile[];
}

export function scanRulesFromConfig(config: OptimizerConfig): ScanRules {
  return {
    imageExtensions: new Set(config.images.extensions),
    codeExtensions: new Set(config.references.extensions),
    exclude: new Set(config.scan.exclude),
  };
}

/**
 * True when any segment of a root-relative path is an excluded name
 */
export function isExcluded(
  relativePath: string,
  exclude: ReadonlySet<string>,
): boolean {
  return relativePath.split(/[\\/]/).some((segment) => exclude.has(segment));
}

/**
 * Resolve the scan root, failing if it is missing or not a directory
 */
export async function resolveRoot(input: string): Promise<string> {
  const root = path.resolve(input);

  const info = await stat(root).catch(() => null);
  if (!info) {
    throw new Error(`Directory does not exist: ${root}`);
  }
  if (!info.isDirectory()) {
    throw new Error(`Not a directory: ${root}`);
  }

  return root;
}

/**
 * Find every image and code file below root
 * Results are ordered by relative path so repeated scans agree
 *
 * Directories that cannot be read are skipped. Symlinked files count when
 * their target is a regular file; symlinked directories are not entered.
 */
export async function scanTree(
  root: string,
  rules: ScanRules,
): Promise<ScanResult> {
  const entries = await glob("**/*", {
    cwd: root,
    onlyFiles: false,
    markDirectories: true,
    dot: true,
    followSymbolicLinks: false,
    suppressErrors: true,
    // Prune excluded directories early; isExcluded below is authoritative
    ignore: [...rules.exclude].map((name) => `**/${glob.escapePath(name)}/**`),
  });

  const images: ImageFile[] = [];
  const codeFiles: CodeFile[] = [];

  for (const entry of [...entries].sort()) {
    if (entry.endsWith("/")) continue;

    const relativePath = toPosix(entry);
    if (isExcluded(relativePath, rules.exclude)) continue;

    const extension = path.extname(relativePath).toLowerCase();
    const isImage = rules.imageExtensions.has(extension);
    if (!isImage && !rules.codeExtensions.has(extension)) continue;

    const absolutePath = path.join(root, entry);

    // stat follows links; dangling links and sockets drop out here
    const info = await stat(absolutePath).catch(() => null);
    if (!info?.isFile()) continue;

    if (isImage) {
      images.push({ path: absolutePath, relativePath, extension, size: info.size });
    } else {
      codeFiles.push({ path: absolutePath, relativePath, extension });
    }
  }

  return { images, codeFiles };
}

/**
 * Scans the configured input directory and populates context
 *
 * Writes to context:
 * - root: Absolute scan root
 * - images: Image files to transcode
 * - codeFiles: Text files that may reference images
 */
export async function scan(ctx: OptimizerContext): Promise<void> {
  const { config, tracker, logger } = ctx;

  const root = await resolveRoot(config.input);
  const { images, codeFiles } = await scanTree(root, scanRulesFromConfig(config));

  tracker.setImagesFound(images.length);
  tracker.setCodeFilesScanned(codeFiles.length);
  logger.debug(
    `Found ${images.length} image(s) and ${codeFiles.length} code file(s) in ${root}`,
  );

  ctx.root = root;
  ctx.images = images;
  ctx.codeFiles = codeFiles;
}
