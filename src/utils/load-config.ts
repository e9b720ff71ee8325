/**
 * Configuration Loader
 * Loads and merges configuration from defaults and user config
 */

import { readFile } from "fs/promises";
import { join } from "path";
import { existsSync } from "fs";
import envPaths from "env-paths";
import defaultConfig from "../config/default.json";
import type { ConfigError, GmConfig, PartialGmConfig } from "../types";
import { GmConfigSchema, PartialGmConfigSchema } from "../types";

// Get OS-specific paths using env-paths (XDG base directories on Linux)
const paths = envPaths("gmwrap", { suffix: "" });

// Overrides the default binary when set
export const BINARY_ENV_VAR = "GMWRAP_BINARY";

/**
 * Get the OS-specific config directory
 * - Linux: $XDG_CONFIG_HOME/gmwrap or ~/.config/gmwrap
 * - macOS: ~/Library/Preferences/gmwrap
 * - Windows: %APPDATA%\gmwrap
 */
function getConfigDirectory(): string {
  return paths.config;
}

/**
 * Load default configuration with Zod validation
 */
export function loadDefaultConfig(
  env: NodeJS.ProcessEnv = process.env,
): GmConfig {
  const config = GmConfigSchema.parse(defaultConfig);
  const binary = env[BINARY_ENV_VAR];
  return binary ? { ...config, binary } : config;
}

/**
 * Load a partial configuration file with Zod validation
 * Throws error if config is invalid
 */
async function loadConfigFile(configPath: string): Promise<PartialGmConfig> {
  const content = await readFile(configPath, "utf-8");
  return PartialGmConfigSchema.parse(JSON.parse(content));
}

/**
 * Deep merge two configs
 */
export function mergeConfig(
  base: GmConfig,
  override: PartialGmConfig,
): GmConfig {
  return {
    ...base,
    ...override,
    templates: { ...base.templates, ...override.templates },
    logging: { ...base.logging, ...override.logging },
  };
}

interface LoadConfigResult {
  config: GmConfig;
  errors: ConfigError[];
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
 * A config file that fails to load or validate is reported and skipped
 */
export async function loadConfig(custom?: string): Promise<LoadConfigResult> {
  let config = loadDefaultConfig();
  const errors: ConfigError[] = [];

  const userConfigPath = getUserConfigPath();
  if (existsSync(userConfigPath)) {
    try {
      config = mergeConfig(config, await loadConfigFile(userConfigPath));
    } catch (error) {
      errors.push({ path: userConfigPath, error: toError(error) });
    }
  }

  if (custom) {
    try {
      config = mergeConfig(config, await loadConfigFile(custom));
    } catch (error) {
      errors.push({ path: custom, error: toError(error) });
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
