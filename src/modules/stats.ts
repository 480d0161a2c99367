/**
 * Stats Module
 * Displays run statistics and issues with modern formatting
 */

import chalk from "chalk";
import { formatBytes, sizeReduction } from "../utils";
import type {
  Issue,
  IssueType,
  OptimizerContext,
  RunStatistics,
} from "../types";

// ============================================================================
// Formatting Helpers
// ============================================================================

/**
 * Duration as "850ms", "4.2s" or "3m 07s"
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;

  const totalSeconds = ms / 1000;
  if (totalSeconds < 60) return `${totalSeconds.toFixed(1)}s`;

  const whole = Math.round(totalSeconds);
  const minutes = Math.floor(whole / 60);
  const seconds = whole % 60;
  return `${minutes}m ${String(seconds).padStart(2, "0")}s`;
}

/**
 * Horizontal bar filled to `ratio` (clamped to 0..1) with its percentage
 */
function ratioBar(ratio: number, fill: (s: string) => string, width = 24): string {
  const clamped = Math.min(1, Math.max(0, ratio));
  const filled = Math.round(width * clamped);

  return `${fill("█".repeat(filled))}${chalk.dim("░".repeat(width - filled))} ${chalk.dim(`${Math.round(clamped * 100)}%`)}`;
}

type Tone = "ok" | "bad" | "warn" | "info" | "muted";

const TONES: Record<Tone, { icon: string; paint: (s: string) => string }> = {
  ok: { icon: chalk.green("●"), paint: chalk.green },
  bad: { icon: chalk.red("●"), paint: chalk.red },
  warn: { icon: chalk.yellow("●"), paint: chalk.yellow },
  info: { icon: chalk.cyan("●"), paint: chalk.cyan },
  muted: { icon: chalk.dim("○"), paint: (s) => s },
};

function row(label: string, value: string | number, tone: Tone = "muted"): string {
  const { icon, paint } = TONES[tone];
  return `   ${icon} ${chalk.dim(label.padEnd(16))} ${paint(String(value))}`;
}

function heading(title: string): void {
  console.log(`\n  ${chalk.bold(title)}`);
}

const ISSUE_LABELS: Record<IssueType, string> = {
  image: "Images failed",
  file: "Files failed",
  delete: "Deletions failed",
  resource: "Config errors",
  name: "Ambiguous names",
};

// ============================================================================
// Main Stats Display
// ============================================================================

/**
 * Display run statistics to console
 */
export function stats(ctx: OptimizerContext): void {
  const { tracker, verbose } = ctx;
  const stats = tracker.getStats();

  const hasErrors = stats.issues.some((issue) => issue.type !== "name");
  const hasWarnings = stats.issues.length > 0;

  console.log("");

  const statusIcon = hasErrors
    ? chalk.red("✖")
    : hasWarnings
      ? chalk.yellow("◆")
      : chalk.green("✔");
  const title = stats.dryRun ? "Dry Run Complete" : "Optimization Complete";

  console.log(
    `  ${statusIcon} ${chalk.bold(title)} ${chalk.dim("·")} ${chalk.dim(formatDuration(stats.duration))}`,
  );

  displayImagesSection(stats);
  displayReferencesSection(stats);
  displayOriginalsSection(ctx, stats);
  displayIssuesSection(stats.issues, verbose);

  if (stats.dryRun) {
    console.log(
      `\n  ${chalk.yellow("This was a dry run. No changes were made.")}`,
    );
    console.log(`  ${chalk.dim("Run without --dry-run to apply changes.")}`);
  }

  console.log("");
}

// ============================================================================
// Section Displays
// ============================================================================

function displayImagesSection(stats: RunStatistics): void {
  heading("Images");

  if (stats.imagesFound === 0) {
    console.log(`   ${chalk.dim("No images found.")}`);
    return;
  }

  console.log(
    `   ${ratioBar(stats.imagesConverted / stats.imagesFound, chalk.green)}`,
  );
  console.log(
    row(stats.dryRun ? "Would convert" : "Converted", stats.imagesConverted, "ok"),
  );
  if (stats.imagesFailed > 0) {
    console.log(row("Failed", stats.imagesFailed, "bad"));
  }

  // Dry runs encode nothing, so there is no output size to compare
  if (stats.dryRun) {
    console.log(row("Original size", formatBytes(stats.originalBytes), "info"));
    return;
  }
  if (stats.imagesConverted === 0) return;

  const savings = sizeReduction(stats.originalBytes, stats.newBytes);
  console.log(
    row(
      "Size",
      `${formatBytes(stats.originalBytes)} → ${formatBytes(stats.newBytes)}`,
      "info",
    ),
  );
  console.log(`   ${ratioBar(savings / 100, chalk.cyan)} ${chalk.dim("saved")}`);
}

function displayReferencesSection(stats: RunStatistics): void {
  if (stats.imagesConverted === 0) return;

  heading("References");

  if (stats.codeFilesScanned === 0) {
    console.log(`   ${chalk.dim("No code files found.")}`);
    return;
  }

  console.log(row("Files scanned", stats.codeFilesScanned));
  console.log(
    row(stats.dryRun ? "Would update" : "Files updated", stats.filesUpdated, "ok"),
  );
  console.log(row("Replacements", stats.replacements, "ok"));
}

function displayOriginalsSection(
  ctx: OptimizerContext,
  stats: RunStatistics,
): void {
  if (!ctx.options.deleteOriginals || stats.dryRun) return;

  heading("Originals");
  console.log(row("Deleted", stats.originalsDeleted, "ok"));
}

function displayIssuesSection(issues: Issue[], verbose?: boolean): void {
  if (issues.length === 0) return;

  heading(chalk.red("Issues"));

  const byType = new Map<IssueType, Issue[]>();
  for (const issue of issues) {
    const group = byType.get(issue.type) ?? [];
    group.push(issue);
    byType.set(issue.type, group);
  }

  for (const [type, group] of byType) {
    console.log(row(ISSUE_LABELS[type], group.length, type === "name" ? "warn" : "bad"));

    const shown = verbose ? group : group.slice(0, 5);
    for (const issue of shown) {
      console.log(`      ${chalk.dim("·")} ${issue.path}`);
      if (verbose && issue.details) {
        console.log(`        ${chalk.dim(issue.details)}`);
      }
    }
    if (shown.length < group.length) {
      console.log(`      ${chalk.dim(`+${group.length - shown.length} more`)}`);
    }
  }
}
