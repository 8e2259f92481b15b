/**
 * Environment configuration for ticketplan
 * Loads credentials from:
 * 1. ~/.ticketplan/.env (global, API keys live here)
 * 2. Environment variables (highest priority, override everything)
 *
 * API keys are user-level credentials and are never read from project config
 * files that could be committed.
 */

import * as fs from "node:fs";
import { CONFIG_PATHS } from "./paths.js";
import type { ModelConfig } from "./schema.js";

export type ProviderType = ModelConfig["provider"];

export const DEEPSEEK_BASE_URL = "https://api.deepseek.com";

/**
 * Load KEY=VALUE lines from a .env file without overriding variables that are
 * already set. Returns the keys that were applied.
 */
export function loadEnvFile(
  envPath: string = CONFIG_PATHS.env,
  target: NodeJS.ProcessEnv = process.env,
): string[] {
  let content: string;
  try {
    content = fs.readFileSync(envPath, "utf-8");
  } catch {
    // No global .env
    return [];
  }

  const applied: string[] = [];
  for (const line of content.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    const eqIndex = trimmed.indexOf("=");
    if (eqIndex <= 0) continue;

    const key = trimmed.substring(0, eqIndex).trim();
    const value = stripQuotes(trimmed.substring(eqIndex + 1).trim());
    if (!target[key]) {
      target[key] = value;
      applied.push(key);
    }
  }
  return applied;
}

function stripQuotes(value: string): string {
  if (value.length >= 2 && (value.startsWith('"') || value.startsWith("'"))) {
    const quote = value[0];
    if (value.endsWith(quote ?? "")) {
      return value.slice(1, -1);
    }
  }
  return value;
}

/**
 * Get API key for a provider
 */
export function getApiKey(
  provider: ProviderType,
  source: NodeJS.ProcessEnv = process.env,
): string | undefined {
  switch (provider) {
    case "deepseek":
      return source["DEEPSEEK_API_KEY"] ?? source["OPENAI_API_KEY"];
    case "openai":
      return source["OPENAI_API_KEY"];
  }
}

/**
 * Get base URL for a provider (for custom endpoints)
 */
export function getBaseUrl(
  provider: ProviderType,
  source: NodeJS.ProcessEnv = process.env,
): string | undefined {
  switch (provider) {
    case "deepseek":
      return source["DEEPSEEK_BASE_URL"] ?? DEEPSEEK_BASE_URL;
    case "openai":
      return source["OPENAI_BASE_URL"];
  }
}

/**
 * Resolve a token for a server auth block; an explicit token wins over tokenEnv
 */
export function resolveToken(
  auth: { token?: string; tokenEnv?: string },
  source: NodeJS.ProcessEnv = process.env,
): string | undefined {
  if (auth.token) return auth.token;
  if (auth.tokenEnv) return source[auth.tokenEnv];
  return undefined;
}
