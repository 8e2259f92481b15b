/**
 * Configuration loader for ticketplan
 *
 * Supports hierarchical configuration with priority:
 * 1. Explicit --config path
 * 2. Project config (<cwd>/.ticketplan/config.json)
 * 3. Global config (~/.ticketplan/config.json)
 * 4. Built-in defaults
 */

import fs from "node:fs/promises";
import JSON5 from "json5";
import { PlannerConfigSchema, type PlannerConfig } from "./schema.js";
import { ConfigError, isNotFoundError, type ConfigIssue } from "../utils/errors.js";
import { CONFIG_PATHS, projectConfigPath } from "./paths.js";
import type { z } from "zod";

type RawConfig = Record<string, unknown>;

export interface LoadConfigOptions {
  /** Explicit config file; highest priority */
  configPath?: string;
  cwd?: string;
  /** Override the global config location (tests) */
  globalConfigPath?: string;
}

/**
 * Load configuration from files with hierarchical fallback
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<PlannerConfig> {
  let merged: RawConfig = {};

  // Global config first (lowest priority, lenient)
  const globalConfig = await loadConfigFile(options.globalConfigPath ?? CONFIG_PATHS.config, {
    strict: false,
  });
  if (globalConfig) {
    merged = mergeConfigSections(merged, globalConfig);
  }

  const projectConfig = await loadConfigFile(projectConfigPath(options.cwd));
  if (projectConfig) {
    merged = mergeConfigSections(merged, projectConfig);
  }

  if (options.configPath) {
    const explicitConfig = await loadConfigFile(options.configPath, { required: true });
    if (explicitConfig) {
      merged = mergeConfigSections(merged, explicitConfig);
    }
  }

  const result = PlannerConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError("Invalid configuration", {
      issues: toIssues(result.error),
      configPath: options.configPath,
    });
  }
  return result.data;
}

/**
 * Load a single config file, returning null if not found.
 *
 * The raw object is returned without defaults applied so that merging only
 * sees values actually present in the file.
 */
async function loadConfigFile(
  configPath: string,
  options: { strict?: boolean; required?: boolean } = {},
): Promise<RawConfig | null> {
  const { strict = true, required = false } = options;
  let content: string;
  try {
    content = await fs.readFile(configPath, "utf-8");
  } catch (error) {
    if (isNotFoundError(error) && !required) {
      return null;
    }
    throw new ConfigError(`Failed to read configuration: ${configPath}`, {
      configPath,
      cause: error instanceof Error ? error : undefined,
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON5.parse(content);
  } catch (error) {
    if (!strict) return null;
    throw new ConfigError("Configuration is not valid JSON5", {
      configPath,
      cause: error instanceof Error ? error : undefined,
    });
  }

  if (!isRecord(parsed)) {
    if (!strict) return null;
    throw new ConfigError("Invalid configuration: expected an object", { configPath });
  }

  const result = PlannerConfigSchema.safeParse(parsed);
  if (!result.success) {
    if (!strict) return null;
    throw new ConfigError("Invalid configuration", {
      issues: toIssues(result.error),
      configPath,
    });
  }

  return parsed;
}

/**
 * Merge configuration objects one section deep
 */
export function mergeConfigSections(base: RawConfig, override: RawConfig): RawConfig {
  const result: RawConfig = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const current = result[key];
    result[key] = isRecord(current) && isRecord(value) ? { ...current, ...value } : value;
  }
  return result;
}

/**
 * Create default configuration
 */
export function createDefaultConfig(): PlannerConfig {
  return PlannerConfigSchema.parse({});
}

function isRecord(value: unknown): value is RawConfig {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toIssues(error: z.ZodError): ConfigIssue[] {
  return error.issues.map((i) => ({
    path: i.path.join("."),
    message: i.message,
  }));
}
