/**
 * Library entry point
 */

export { Optimizer } from "./optimizer";
export type { OptimizerOptions, Phase } from "./optimizer";
export { SharpTranscoder, createBackup, MAX_EFFORT } from "./transcoder";
export type { Transcoder, TranscodeOptions } from "./transcoder";
export { scanTree, isExcluded, resolveRoot } from "./modules/scanner";
export type { ScanRules, ScanResult } from "./modules/scanner";
export { rewriteFile } from "./modules/rewriter";
export {
  loadConfig,
  loadDefaultConfig,
  rewriteReferences,
  REFERENCE_RULES,
} from "./utils";
export * from "./types";
