/**
 * Tests for configuration schema
 */

import { describe, it, expect } from "vitest";
import {
  PlannerConfigSchema,
  ModelConfigSchema,
  ServerConfigSchema,
  TransportConfigSchema,
  validateConfig,
} from "./schema.js";

describe("PlannerConfigSchema", () => {
  it("should fill every section with defaults from an empty object", () => {
    const config = PlannerConfigSchema.parse({});

    expect(config.model).toEqual({
      provider: "deepseek",
      model: "deepseek-chat",
      temperature: 0.2,
      maxTokens: 8192,
      timeout: 120000,
    });
    expect(config.rerank).toEqual({ temperature: 0.1, maxTokens: 256, excerptLength: 500 });
    expect(config.retrieval).toEqual({
      maxKeywords: 5,
      mandatorySearchLimit: 3,
      discoverySearchLimit: 20,
      templates: true,
    });
    expect(config.generation).toEqual({
      maxRetries: 2,
      repairExcerptLength: 4000,
      minConfidence: 0.7,
    });
    expect(config.servers).toEqual({});
    expect(config.output).toEqual({ dir: "./output", saveSnapshot: true });
    expect(config.tracker).toEqual({
      updateTicket: false,
      dryRun: false,
      reviewStatus: "Human Plan Review",
      backlogStatus: "Backlog",
    });
    expect(config.logging).toEqual({ level: "info", logToFile: true });
  });

  it("should keep given values and default the rest of a section", () => {
    const config = PlannerConfigSchema.parse({ generation: { maxRetries: 1 } });

    expect(config.generation.maxRetries).toBe(1);
    expect(config.generation.minConfidence).toBe(0.7);
  });

  it("should reject an unknown provider", () => {
    const result = ModelConfigSchema.safeParse({ provider: "other" });
    expect(result.success).toBe(false);
  });

  it("should reject an empty status name", () => {
    const result = PlannerConfigSchema.safeParse({ tracker: { backlogStatus: "" } });
    expect(result.success).toBe(false);
  });

  it("should reject a confidence threshold above 1", () => {
    const result = PlannerConfigSchema.safeParse({ generation: { minConfidence: 1.5 } });
    expect(result.success).toBe(false);
  });
});

describe("TransportConfigSchema", () => {
  it("should default backoff to rate-limit and unavailable statuses", () => {
    const transport = TransportConfigSchema.parse({});

    expect(transport.retryOn).toEqual([429, 503]);
    expect(transport.requestsPerSecond).toBe(10);
    expect(transport.burstSize).toBe(20);
    expect(transport.maxRetries).toBe(3);
  });

  it("should reject a non-positive rate", () => {
    expect(TransportConfigSchema.safeParse({ requestsPerSecond: 0 }).success).toBe(false);
  });
});

describe("ServerConfigSchema", () => {
  it("should accept a stdio server", () => {
    const result = ServerConfigSchema.safeParse({
      transport: "stdio",
      command: "ticket-server",
      args: ["--stdio"],
    });
    expect(result.success).toBe(true);
  });

  it("should accept an http server with bearer auth", () => {
    const result = ServerConfigSchema.safeParse({
      transport: "http",
      url: "http://localhost:9000/rpc",
      auth: { type: "bearer", tokenEnv: "DOCS_TOKEN" },
    });
    expect(result.success).toBe(true);
  });

  it("should require a transport", () => {
    expect(ServerConfigSchema.safeParse({ url: "http://localhost" }).success).toBe(false);
  });
});

describe("validateConfig", () => {
  it("should return data on success", () => {
    const result = validateConfig({ output: { dir: "/tmp/plans" } });

    expect(result.success).toBe(true);
    expect(result.data?.output.dir).toBe("/tmp/plans");
  });

  it("should return the zod error on failure", () => {
    const result = validateConfig({ logging: { level: "loud" } });

    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.path).toEqual(["logging", "level"]);
  });
});
