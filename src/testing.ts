/**
 * Test helpers: throwaway directory trees, a fake transcoder and contexts
 */

import { mkdir, mkdtemp, rm, writeFile } from "fs/promises";
import glob from "fast-glob";
import { tmpdir } from "node:os";
import path from "node:path";
import { OptimizerConfigSchema } from "./types";
import type {
  ImageFile,
  OptimizerConfig,
  OptimizerContext,
  RunOptions,
  TranscodeResult,
} from "./types";
import type { Transcoder, TranscodeOptions } from "./transcoder";
import { Logger, Tracker, replaceExtension } from "./utils";

export async function makeTempDir(): Promise<string> {
  return mkdtemp(path.join(tmpdir(), "webpify-"));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/**
 * Write files (relative path -> content) below root
 */
export async function writeTree(
  root: string,
  files: Record<string, string | Buffer>,
): Promise<void> {
  for (const [relativePath, content] of Object.entries(files)) {
    const target = path.join(root, relativePath);
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, content);
  }
}

/**
 * Every file below root as a sorted list of forward-slash relative paths
 */
export async function listTree(root: string): Promise<string[]> {
  const entries = await glob("**/*", { cwd: root, dot: true, onlyFiles: true });
  return entries.sort();
}

/**
 * Writes "<format>:<basename>" at the destination instead of encoding
 * Images whose basename is listed in `failing` report a transcode failure
 */
export class FakeTranscoder implements Transcoder {
  readonly calls: Array<{ image: ImageFile; options: TranscodeOptions }> = [];

  constructor(private readonly failing: ReadonlySet<string> = new Set()) {}

  async transcode(
    image: ImageFile,
    options: TranscodeOptions,
  ): Promise<TranscodeResult> {
    this.calls.push({ image, options });
    const destination = replaceExtension(image.path, options.format);

    if (this.failing.has(path.basename(image.path))) {
      return {
        ok: false,
        source: image,
        destination,
        stage: "transcode",
        error: new Error("unsupported image"),
      };
    }

    const body = `${options.format}:${path.basename(image.path)}`;
    await writeFile(destination, body);
    return { ok: true, source: image, destination, size: Buffer.byteLength(body) };
  }
}

export const TEST_CONFIG: OptimizerConfig = OptimizerConfigSchema.parse({
  input: ".",
  images: {
    extensions: [".jpg", ".jpeg", ".png"],
    format: "webp",
    quality: 85,
    backupSuffix: ".backup",
  },
  references: {
    extensions: [".html", ".css", ".md", ".js"],
    encodings: ["utf-8", "latin1"],
  },
  scan: {
    exclude: [".git", "node_modules", "dist", "build"],
  },
});

export function createContext(
  root: string,
  overrides: {
    options?: Partial<RunOptions>;
    transcoder?: Transcoder;
    config?: Partial<OptimizerConfig>;
  } = {},
): OptimizerContext {
  return {
    config: { ...TEST_CONFIG, input: root, ...overrides.config },
    options: {
      dryRun: false,
      backup: false,
      deleteOriginals: false,
      ...overrides.options,
    },
    tracker: new Tracker(),
    logger: new Logger("silent"),
    transcoder: overrides.transcoder ?? new FakeTranscoder(),
  };
}
