/**
 * Consolidated type definitions and Zod schemas
 */

import { z } from "zod";
import { Tracker } from "./utils/tracker";
import { Logger } from "./utils/logger";
import type { Transcoder } from "./transcoder";

// Re-export classes
export { Tracker, Logger };

// ============================================================================
// Configuration Types & Schemas
// ============================================================================

export const TARGET_FORMATS = ["webp", "avif"] as const;

export type TargetFormat = (typeof TARGET_FORMATS)[number];

export const QualitySchema = z.number().int().min(1).max(100);

const ExtensionSchema = z
  .string()
  .regex(/^\.[^./\\]+$/, "Extension must look like '.ext'")
  .transform((ext) => ext.toLowerCase());

export const ImagesConfigSchema = z.object({
  extensions: z.array(ExtensionSchema),
  format: z.enum(TARGET_FORMATS),
  quality: QualitySchema,
  backupSuffix: z.string().min(1),
});

export const ReferencesConfigSchema = z.object({
  extensions: z.array(ExtensionSchema),
  encodings: z.array(z.string()).min(1),
});

export const ScanConfigSchema = z.object({
  exclude: z.array(z.string()),
});

export const OptimizerConfigSchema = z
  .object({
    input: z.string(),
    images: ImagesConfigSchema,
    references: ReferencesConfigSchema,
    scan: ScanConfigSchema,
  })
  .refine(
    (config) => !config.images.extensions.includes(`.${config.images.format}`),
    {
      message: "Target format cannot also be a source image extension",
      path: ["images", "format"],
    },
  );

export const PartialOptimizerConfigSchema = z.object({
  input: z.string().optional(),
  images: ImagesConfigSchema.partial().optional(),
  references: ReferencesConfigSchema.partial().optional(),
  scan: ScanConfigSchema.partial().optional(),
});

export type ImagesConfig = z.infer<typeof ImagesConfigSchema>;
export type ReferencesConfig = z.infer<typeof ReferencesConfigSchema>;
export type ScanConfig = z.infer<typeof ScanConfigSchema>;
export type OptimizerConfig = z.infer<typeof OptimizerConfigSchema>;
export type PartialOptimizerConfig = z.infer<
  typeof PartialOptimizerConfigSchema
>;

// ============================================================================
// File Types
// ============================================================================

export interface ImageFile {
  path: string; // Absolute path
  relativePath: string; // Relative to scan root, forward slashes
  extension: string; // Lowercased, with leading dot
  size: number; // Bytes at scan time
}

export interface CodeFile {
  path: string;
  relativePath: string;
  extension: string;
}

/**
 * Outcome of transcoding a single image.
 * Destination is reported even on failure so callers can log it.
 */
export type TranscodeResult =
  | {
      ok: true;
      source: ImageFile;
      destination: string;
      size: number;
    }
  | {
      ok: false;
      source: ImageFile;
      destination: string;
      stage: "backup" | "transcode";
      error: unknown;
    };

/**
 * Old filename -> new filename (basenames only)
 * Example: { "photo.jpg" => "photo.webp" }
 */
export type ReferenceMapping = Map<string, string>;

export interface ConvertedPair {
  original: string; // Absolute path of the source image
  converted: string; // Absolute path of the produced (or projected) image
}

export interface RunOptions {
  dryRun: boolean;
  backup: boolean;
  deleteOriginals: boolean;
}

// ============================================================================
// Context Types
// ============================================================================

export interface OptimizerContext {
  config: OptimizerConfig;
  options: RunOptions;
  tracker: Tracker;
  logger: Logger;
  transcoder: Transcoder;
  verbose?: boolean;

  // Scanner fills these
  root?: string;
  images?: ImageFile[];
  codeFiles?: CodeFile[];

  // Mapper fills these
  mapping?: ReferenceMapping;
  converted?: ConvertedPair[];
  failed?: ImageFile[];
}

// ============================================================================
// Tracker Types
// ============================================================================

export type ImageIssueReason =
  | "transcode-failed"
  | "backup-failed"
  | "destination-conflict";
export type FileIssueReason = "read-error" | "decode-error" | "write-error";
export type DeleteIssueReason = "delete-failed" | "target-missing";
export type ResourceIssueReason =
  | "invalid-json"
  | "schema-validation"
  | "read-error";
export type NameIssueReason = "ambiguous-basename";

export interface ImageIssue {
  type: "image";
  path: string;
  reason: ImageIssueReason;
  details?: string;
}

export interface FileIssue {
  type: "file";
  path: string;
  reason: FileIssueReason;
  details?: string;
}

export interface DeleteIssue {
  type: "delete";
  path: string;
  reason: DeleteIssueReason;
  details?: string;
}

export interface ResourceIssue {
  type: "resource";
  path: string;
  reason: ResourceIssueReason;
  details?: string;
}

export interface NameIssue {
  type: "name";
  path: string;
  reason: NameIssueReason;
  details?: string;
}

export type Issue =
  | ImageIssue
  | FileIssue
  | DeleteIssue
  | ResourceIssue
  | NameIssue;
export type IssueType = Issue["type"];

export interface RunStatistics {
  imagesFound: number;
  imagesConverted: number;
  imagesFailed: number;
  originalBytes: number;
  newBytes: number;
  codeFilesScanned: number;
  filesUpdated: number;
  replacements: number;
  originalsDeleted: number;
  dryRun: boolean;
  issues: Issue[];
  duration: number;
}

// ============================================================================
// Utility Types
// ============================================================================

export interface ConfigError {
  path: string;
  error: unknown;
}
