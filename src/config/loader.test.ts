/**
 * Tests for configuration loader
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import path from "node:path";
import { loadConfig, mergeConfigSections, createDefaultConfig } from "./loader.js";
import { ConfigError } from "../utils/errors.js";

vi.mock("node:fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs/promises")>();
  return {
    ...actual,
    default: {
      readFile: vi.fn(),
    },
    readFile: vi.fn(),
  };
});

const GLOBAL = "/home/tester/.ticketplan/config.json";
const CWD = "/work/project";
const PROJECT = path.join(CWD, ".ticketplan", "config.json");

async function withFiles(files: Record<string, string>): Promise<void> {
  const fs = await import("node:fs/promises");
  vi.mocked(fs.default.readFile).mockImplementation(async (file) => {
    const content = typeof file === "string" ? files[file] : undefined;
    if (content === undefined) {
      throw Object.assign(new Error(`ENOENT: ${String(file)}`), { code: "ENOENT" });
    }
    return content;
  });
}

describe("loadConfig", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("should return defaults when no config file exists", async () => {
    await withFiles({});

    const config = await loadConfig({ cwd: CWD, globalConfigPath: GLOBAL });

    expect(config).toEqual(createDefaultConfig());
  });

  it("should let the project config override the global config per field", async () => {
    await withFiles({
      [GLOBAL]: JSON.stringify({ model: { provider: "openai", model: "gpt-4o-mini" } }),
      [PROJECT]: "{ model: { model: 'gpt-4o' }, generation: { maxRetries: 1 } }",
    });

    const config = await loadConfig({ cwd: CWD, globalConfigPath: GLOBAL });

    expect(config.model.provider).toBe("openai");
    expect(config.model.model).toBe("gpt-4o");
    expect(config.generation.maxRetries).toBe(1);
    expect(config.generation.repairExcerptLength).toBe(4000);
  });

  it("should apply an explicit config file last", async () => {
    await withFiles({
      [PROJECT]: JSON.stringify({ output: { dir: "./plans" } }),
      "/etc/plan.json5": "{ output: { dir: '/srv/plans' } }",
    });

    const config = await loadConfig({
      cwd: CWD,
      globalConfigPath: GLOBAL,
      configPath: "/etc/plan.json5",
    });

    expect(config.output.dir).toBe("/srv/plans");
  });

  it("should fail when the explicit config file is missing", async () => {
    await withFiles({});

    await expect(
      loadConfig({ cwd: CWD, globalConfigPath: GLOBAL, configPath: "/missing.json" }),
    ).rejects.toBeInstanceOf(ConfigError);
  });

  it("should report schema issues of the project config", async () => {
    await withFiles({
      [PROJECT]: JSON.stringify({ generation: { maxRetries: "two" } }),
    });

    const error = await loadConfig({ cwd: CWD, globalConfigPath: GLOBAL }).catch(
      (e: unknown) => e,
    );

    expect(error).toBeInstanceOf(ConfigError);
    if (error instanceof ConfigError) {
      expect(error.issues).toEqual([
        { path: "generation.maxRetries", message: "Expected number, received string" },
      ]);
    }
  });

  it("should reject a project config that is not JSON5", async () => {
    await withFiles({ [PROJECT]: "{ not json" });

    await expect(loadConfig({ cwd: CWD, globalConfigPath: GLOBAL })).rejects.toThrow(
      "Configuration is not valid JSON5",
    );
  });

  it("should ignore an invalid global config", async () => {
    await withFiles({
      [GLOBAL]: JSON.stringify({ logging: { level: "loud" } }),
    });

    const config = await loadConfig({ cwd: CWD, globalConfigPath: GLOBAL });

    expect(config.logging.level).toBe("info");
  });

  it("should reject a config that is not an object", async () => {
    await withFiles({ [PROJECT]: "[1, 2]" });

    await expect(loadConfig({ cwd: CWD, globalConfigPath: GLOBAL })).rejects.toThrow(
      "Invalid configuration: expected an object",
    );
  });
});

describe("mergeConfigSections", () => {
  it("should merge sections one level deep and replace other values", () => {
    const merged = mergeConfigSections(
      { model: { provider: "openai", model: "a" }, transport: { retryOn: [429] } },
      { model: { model: "b" }, transport: { retryOn: [503] } },
    );

    expect(merged).toEqual({
      model: { provider: "openai", model: "b" },
      transport: { retryOn: [503] },
    });
  });
});
