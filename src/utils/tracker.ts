/**
 * Run Tracker
 * Unified tracking for stats and issues
 */

import { ZodError } from "zod";
import type {
  Issue,
  IssueType,
  ImageIssueReason,
  FileIssueReason,
  DeleteIssueReason,
  ResourceIssueReason,
  RunStatistics,
} from "../types";

// ============================================================================
// Error Mapping (private)
// ============================================================================

interface IssueInfo<T> {
  reason: T;
  details: string;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function mapResourceError(error: unknown): IssueInfo<ResourceIssueReason> {
  if (error instanceof ZodError) {
    return {
      reason: "schema-validation",
      details: error.issues
        .map((e) => `${e.path.join(".") || "(root)"}: ${e.message}`)
        .join("; "),
    };
  }
  if (error instanceof SyntaxError) {
    return {
      reason: "invalid-json",
      details: error.message,
    };
  }
  return {
    reason: "read-error",
    details: describe(error),
  };
}

function mapFileError(
  error: unknown,
  context: "read" | "write",
): IssueInfo<FileIssueReason> {
  return {
    reason: context === "write" ? "write-error" : "read-error",
    details: describe(error),
  };
}

// ============================================================================
// Tracker Class
// ============================================================================

export class Tracker {
  private imagesFound = 0;
  private imagesConverted = 0;
  private imagesFailed = 0;
  private originalBytes = 0;
  private newBytes = 0;
  private codeFilesScanned = 0;
  private filesUpdated = 0;
  private replacements = 0;
  private originalsDeleted = 0;
  private dryRun = false;
  private issues: Issue[] = [];
  private startTime = new Date();

  // ============================================================================
  // Stat counters
  // ============================================================================

  setDryRun(dryRun: boolean): void {
    this.dryRun = dryRun;
  }

  setImagesFound(count: number): void {
    this.imagesFound = count;
  }

  setCodeFilesScanned(count: number): void {
    this.codeFilesScanned = count;
  }

  addOriginalBytes(bytes: number): void {
    this.originalBytes += bytes;
  }

  incrementConverted(newBytes = 0): void {
    this.imagesConverted++;
    this.newBytes += newBytes;
  }

  incrementImagesFailed(): void {
    this.imagesFailed++;
  }

  trackReplacements(count: number): void {
    if (count <= 0) return;
    this.filesUpdated++;
    this.replacements += count;
  }

  incrementDeleted(): void {
    this.originalsDeleted++;
  }

  // ============================================================================
  // Issue tracking
  // ============================================================================

  trackImageError(path: string, error: unknown, reason: ImageIssueReason): void {
    this.issues.push({ type: "image", path, reason, details: describe(error) });
  }

  trackFileError(path: string, error: unknown, context: "read" | "write"): void {
    const { reason, details } = mapFileError(error, context);
    this.issues.push({ type: "file", path, reason, details });
  }

  trackUndecodable(path: string, encodings: string[]): void {
    this.issues.push({
      type: "file",
      path,
      reason: "decode-error",
      details: `Could not decode as any of: ${encodings.join(", ")}`,
    });
  }

  trackDeleteError(path: string, error: unknown, reason: DeleteIssueReason): void {
    this.issues.push({ type: "delete", path, reason, details: describe(error) });
  }

  trackResourceError(path: string, error: unknown): void {
    const { reason, details } = mapResourceError(error);
    this.issues.push({ type: "resource", path, reason, details });
  }

  trackAmbiguousName(path: string, details: string): void {
    this.issues.push({
      type: "name",
      path,
      reason: "ambiguous-basename",
      details,
    });
  }

  // ============================================================================
  // Issue getters
  // ============================================================================

  getIssues(type?: IssueType): Issue[] {
    if (!type) return this.issues;
    return this.issues.filter((i) => i.type === type);
  }

  // ============================================================================
  // Results
  // ============================================================================

  getStats(): RunStatistics {
    const endTime = new Date();
    const duration = endTime.getTime() - this.startTime.getTime();

    return {
      imagesFound: this.imagesFound,
      imagesConverted: this.imagesConverted,
      imagesFailed: this.imagesFailed,
      originalBytes: this.originalBytes,
      newBytes: this.newBytes,
      codeFilesScanned: this.codeFilesScanned,
      filesUpdated: this.filesUpdated,
      replacements: this.replacements,
      originalsDeleted: this.originalsDeleted,
      dryRun: this.dryRun,
      issues: this.issues,
      duration,
    };
  }
}

/**
 * Percentage saved between original and new byte totals (0 when nothing to compare)
 */
export function sizeReduction(originalBytes: number, newBytes: number): number {
  if (originalBytes <= 0) return 0;
  return ((originalBytes - newBytes) / originalBytes) * 100;
}
