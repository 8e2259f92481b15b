/**
 * Centralized configuration paths
 *
 * User-level ticketplan files live in ~/.ticketplan/
 */

import { homedir } from "node:os";
import { join } from "node:path";

/**
 * Base directory for user-level configuration
 */
export const PLANNER_HOME = join(homedir(), ".ticketplan");

/**
 * Name of the per-project configuration directory
 */
export const PROJECT_CONFIG_DIR = ".ticketplan";

/**
 * Configuration paths
 */
export const CONFIG_PATHS = {
  /** Base directory: ~/.ticketplan/ */
  home: PLANNER_HOME,

  /** Global config file: ~/.ticketplan/config.json */
  config: join(PLANNER_HOME, "config.json"),

  /** Environment variables: ~/.ticketplan/.env (API keys) */
  env: join(PLANNER_HOME, ".env"),
} as const;

/**
 * Project config path for a working directory
 */
export function projectConfigPath(cwd: string = process.cwd()): string {
  return join(cwd, PROJECT_CONFIG_DIR, "config.json");
}
