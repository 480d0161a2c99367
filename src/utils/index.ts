/**
 * Utility exports
 */

// Path/string utilities
export { replaceExtension, toPosix, escapeRegExp, formatBytes } from "./string";
export { decodeText } from "./decode-text";

// Reference rewriting
export {
  REFERENCE_RULES,
  applyRule,
  rewriteReferences,
} from "./reference-rules";
export type { ReferenceRule, RewriteResult } from "./reference-rules";

// Filesystem utilities
export { fileExists } from "./file-exists";

// Config utilities
export {
  loadConfig,
  getUserConfigPath,
  loadDefaultConfig,
} from "./load-config";

// Classes
export { Tracker, sizeReduction } from "./tracker";
export { Logger } from "./logger";
export type { LogLevel } from "./logger";
