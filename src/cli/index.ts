#!/usr/bin/env node

/**
 * CLI entry point for the image optimizer
 * Handles command-line argument parsing and user interaction
 */

import { Command } from "commander";
import { convertCommand } from "./commands/convert";
import { configCommand } from "./commands/config";

const program = new Command();

program
  .name("webpify")
  .description(
    "Convert JPG/PNG images to WebP and update references in code files",
  )
  .version("0.1.0");

// Main optimization command (default action)
program
  .option("-q, --quality <number>", "Output quality (1-100, default: 85)")
  .option("-f, --format <format>", "Target format: webp or avif")
  .option("-d, --dry-run", "Preview changes without applying them")
  .option("-b, --backup", "Create backup of original images")
  .option("-v, --verbose", "Show detailed output")
  .option("--delete-originals", "Delete original images after conversion")
  .option("--path <dir>", "Directory to scan (default: current directory)")
  .option("-c, --config <path>", "Path to custom config file")
  .action(convertCommand);

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

program.parse();
