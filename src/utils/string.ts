/**
 * String Utilities
 * Shared path and formatting helper functions
 */

import path from "node:path";

/**
 * Swap a file's extension, keeping its directory and stem
 *
 * @example
 * replaceExtension("/site/img/photo.jpg", "webp") // "/site/img/photo.webp"
 * replaceExtension("logo.v2.PNG", ".webp") // "logo.v2.webp"
 */
export function replaceExtension(filePath: string, extension: string): string {
  const ext = extension.startsWith(".") ? extension : `.${extension}`;
  const parsed = path.parse(filePath);
  return path.join(parsed.dir, `${parsed.name}${ext}`);
}

/**
 * Normalize a relative path to forward slashes
 */
export function toPosix(filePath: string): string {
  return filePath.split(path.sep).join("/");
}

/**
 * Escape a literal string for use inside a RegExp
 */
export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Convert a byte count to a short human-readable string
 *
 * @example
 * formatBytes(512) // "512.0 B"
 * formatBytes(1536) // "1.5 KB"
 */
export function formatBytes(bytes: number): string {
  const units = ["B", "KB", "MB", "GB"];
  let size = bytes;
  for (const unit of units) {
    if (Math.abs(size) < 1024) {
      return `${size.toFixed(1)} ${unit}`;
    }
    size /= 1024;
  }
  return `${size.toFixed(1)} TB`;
}
