/**
 * Tests for environment configuration
 */

import { describe, it, expect, afterEach } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { getApiKey, getBaseUrl, loadEnvFile, resolveToken, DEEPSEEK_BASE_URL } from "./env.js";

describe("getApiKey", () => {
  it("should prefer DEEPSEEK_API_KEY for deepseek", () => {
    const source = { DEEPSEEK_API_KEY: "test-deepseek", OPENAI_API_KEY: "test-openai" };
    expect(getApiKey("deepseek", source)).toBe("test-deepseek");
  });

  it("should fall back to OPENAI_API_KEY for deepseek", () => {
    expect(getApiKey("deepseek", { OPENAI_API_KEY: "test-openai" })).toBe("test-openai");
  });

  it("should only read OPENAI_API_KEY for openai", () => {
    expect(getApiKey("openai", { DEEPSEEK_API_KEY: "test-deepseek" })).toBeUndefined();
  });
});

describe("getBaseUrl", () => {
  it("should default deepseek to the public endpoint", () => {
    expect(getBaseUrl("deepseek", {})).toBe(DEEPSEEK_BASE_URL);
  });

  it("should honor DEEPSEEK_BASE_URL", () => {
    expect(getBaseUrl("deepseek", { DEEPSEEK_BASE_URL: "http://localhost:8080" })).toBe(
      "http://localhost:8080",
    );
  });

  it("should leave openai on the SDK default", () => {
    expect(getBaseUrl("openai", {})).toBeUndefined();
  });
});

describe("loadEnvFile", () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it("should apply unset keys and keep existing ones", () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "ticketplan-env-"));
    const envPath = path.join(dir, ".env");
    fs.writeFileSync(
      envPath,
      ["# keys", "DEEPSEEK_API_KEY=test-secret", 'OPENAI_API_KEY="test-quoted"', "BROKEN", ""].join(
        "\n",
      ),
    );
    const target: NodeJS.ProcessEnv = { DEEPSEEK_API_KEY: "already-set" };

    const applied = loadEnvFile(envPath, target);

    expect(applied).toEqual(["OPENAI_API_KEY"]);
    expect(target["DEEPSEEK_API_KEY"]).toBe("already-set");
    expect(target["OPENAI_API_KEY"]).toBe("test-quoted");
  });

  it("should return nothing when the file is missing", () => {
    expect(loadEnvFile("/nonexistent/.env", {})).toEqual([]);
  });
});

describe("resolveToken", () => {
  it("should prefer an inline token", () => {
    expect(resolveToken({ token: "test-token", tokenEnv: "DOCS_TOKEN" }, {})).toBe("test-token");
  });

  it("should read tokenEnv from the environment", () => {
    expect(resolveToken({ tokenEnv: "DOCS_TOKEN" }, { DOCS_TOKEN: "test-env-token" })).toBe(
      "test-env-token",
    );
  });

  it("should return undefined when neither is set", () => {
    expect(resolveToken({}, {})).toBeUndefined();
  });
});
