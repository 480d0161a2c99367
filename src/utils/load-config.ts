import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { existsSync } from "fs";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import type {
  OptimizerConfig,
  PartialOptimizerConfig,
  ConfigError,
} from "../types";
import {
  OptimizerConfigSchema,
  PartialOptimizerConfigSchema,
} from "../types";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const paths = envPaths("webpify", { suffix: "" });

function getConfigDirectory(): string {
  return paths.config;
}

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<OptimizerConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  const parsed: unknown = JSON.parse(content);
  return OptimizerConfigSchema.parse(parsed);
}

async function loadPartialConfig(
  configPath: string,
): Promise<PartialOptimizerConfig> {
  const content = await readFile(configPath, "utf-8");
  const parsed: unknown = JSON.parse(content);
  return PartialOptimizerConfigSchema.parse(parsed);
}

async function loadUserConfig(): Promise<PartialOptimizerConfig | null> {
  const userConfigPath = getUserConfigPath();

  if (!existsSync(userConfigPath)) {
    return null;
  }

  return loadPartialConfig(userConfigPath);
}

/**
 * Merge a partial layer over a full config. Arrays are replaced, not joined.
 */
export function mergeConfig(
  base: OptimizerConfig,
  override: PartialOptimizerConfig,
): OptimizerConfig {
  return {
    input: override.input ?? base.input,
    images: { ...base.images, ...override.images },
    references: { ...base.references, ...override.references },
    scan: { ...base.scan, ...override.scan },
  };
}

export interface LoadConfigResult {
  config: OptimizerConfig;
  errors: ConfigError[];
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
 * A layer that fails to load or leaves the merged config invalid is skipped
 * and reported in `errors`
 */
export async function loadConfig(custom?: string): Promise<LoadConfigResult> {
  let config = await loadDefaultConfig();
  const errors: ConfigError[] = [];

  try {
    const userConfig = await loadUserConfig();
    if (userConfig) {
      config = OptimizerConfigSchema.parse(mergeConfig(config, userConfig));
    }
  } catch (error) {
    errors.push({ path: getUserConfigPath(), error });
  }

  if (custom) {
    try {
      const customConfig = await loadPartialConfig(custom);
      config = OptimizerConfigSchema.parse(mergeConfig(config, customConfig));
    } catch (error) {
      errors.push({ path: custom, error });
    }
  }

  return { config, errors };
}

/**
 * Get the path where user config should be stored
 */
export function getUserConfigPath(): string {
  return join(getConfigDirectory(), "config.json");
}
