/**
 * Optimizer - Pipeline orchestrator
 * Coordinates the optimization pipeline with zero business logic
 */

import { OptimizerConfigSchema } from "./types";
import type {
  OptimizerConfig,
  OptimizerContext,
  RunOptions,
  RunStatistics,
} from "./types";
import type { Transcoder } from "./transcoder";
import { SharpTranscoder } from "./transcoder";
import { Logger, Tracker } from "./utils";
import * as modules from "./modules";

export type Phase = "scan" | "map" | "rewrite" | "clean";

export interface OptimizerOptions extends Partial<RunOptions> {
  tracker?: Tracker;
  logger?: Logger;
  transcoder?: Transcoder;
  verbose?: boolean;
  /** Called before each pipeline phase starts */
  onPhase?: (phase: Phase) => void;
}

export class Optimizer {
  readonly context: OptimizerContext;
  private readonly onPhase?: (phase: Phase) => void;

  constructor(config: OptimizerConfig, options: OptimizerOptions = {}) {
    const runOptions: RunOptions = {
      dryRun: options.dryRun ?? false,
      backup: options.backup ?? false,
      deleteOriginals: options.deleteOriginals ?? false,
    };

    const tracker = options.tracker ?? new Tracker();
    tracker.setDryRun(runOptions.dryRun);

    this.context = {
      // Rejects out-of-range quality before any work starts
      config: OptimizerConfigSchema.parse(config),
      options: runOptions,
      tracker,
      logger: options.logger ?? new Logger(options.verbose ? "debug" : "info"),
      transcoder: options.transcoder ?? new SharpTranscoder(),
      verbose: options.verbose,
    };
    this.onPhase = options.onPhase;
  }

  /**
   * Run the pipeline
   * Pure orchestration - just calls modules in sequence
   */
  async run(): Promise<RunStatistics> {
    const ctx = this.context;

    this.onPhase?.("scan");
    await modules.scan(ctx);

    if (!ctx.images?.length) {
      ctx.logger.debug("No images found to convert.");
      return ctx.tracker.getStats();
    }

    this.onPhase?.("map");
    await modules.map(ctx);

    // Mapping is complete here; every rewrite sees every converted name
    this.onPhase?.("rewrite");
    await modules.rewrite(ctx);

    this.onPhase?.("clean");
    await modules.clean(ctx);

    return ctx.tracker.getStats();
  }
}
