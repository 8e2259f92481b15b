/**
 * Configuration schema for ticketplan
 */

import { z } from "zod";

/**
 * Generative model configuration schema
 */
export const ModelConfigSchema = z.object({
  provider: z.enum(["openai", "deepseek"]).default("deepseek"),
  apiKey: z.string().optional(),
  baseUrl: z.string().url().optional(),
  model: z.string().min(1).default("deepseek-chat"),
  temperature: z.number().min(0).max(2).default(0.2),
  maxTokens: z.number().int().min(1).max(200000).default(8192),
  timeout: z.number().min(1000).default(120000),
});

export type ModelConfig = z.infer<typeof ModelConfigSchema>;

/**
 * Document rerank call configuration
 */
export const RerankConfigSchema = z.object({
  /** Falls back to model.model */
  model: z.string().optional(),
  temperature: z.number().min(0).max(2).default(0.1),
  maxTokens: z.number().int().min(1).default(256),
  excerptLength: z.number().int().min(50).default(500),
});

export type RerankConfig = z.infer<typeof RerankConfigSchema>;

/**
 * Document retrieval configuration
 */
export const RetrievalConfigSchema = z.object({
  maxKeywords: z.number().int().min(1).max(20).default(5),
  mandatorySearchLimit: z.number().int().min(1).default(3),
  discoverySearchLimit: z.number().int().min(1).max(100).default(20),
  defaultSpace: z.string().optional(),
  /** Look for "<role> Template" pages and require DOCS steps to follow them */
  templates: z.boolean().default(true),
  /** Shared space holding templates for every project */
  templatesSpace: z.string().optional(),
});

export type RetrievalConfig = z.infer<typeof RetrievalConfigSchema>;

/**
 * Plan generation configuration
 */
export const GenerationConfigSchema = z.object({
  maxRetries: z.number().int().min(0).max(10).default(2),
  repairExcerptLength: z.number().int().min(200).default(4000),
  minConfidence: z.number().min(0).max(1).default(0.7),
});

export type GenerationConfig = z.infer<typeof GenerationConfigSchema>;

/**
 * Transport-level rate limiting and backoff
 */
export const TransportConfigSchema = z.object({
  requestsPerSecond: z.number().positive().default(10),
  burstSize: z.number().int().min(1).default(20),
  maxRetries: z.number().int().min(0).max(10).default(3),
  baseDelayMs: z.number().int().min(0).default(1000),
  retryOn: z.array(z.number().int()).default([429, 503]),
  connectTimeout: z.number().int().min(100).default(10000),
  requestTimeout: z.number().int().min(100).default(60000),
});

export type TransportConfig = z.infer<typeof TransportConfigSchema>;

/**
 * Tool server connection (ticket tracker or document store)
 */
export const ServerConfigSchema = z.object({
  transport: z.enum(["stdio", "http"]),
  command: z.string().optional(),
  args: z.array(z.string()).optional(),
  env: z.record(z.string(), z.string()).optional(),
  cwd: z.string().optional(),
  url: z.string().optional(),
  headers: z.record(z.string(), z.string()).optional(),
  auth: z
    .object({
      type: z.enum(["bearer", "apikey"]),
      token: z.string().optional(),
      tokenEnv: z.string().optional(),
      headerName: z.string().optional(),
    })
    .optional(),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

export const ServersConfigSchema = z.object({
  tickets: ServerConfigSchema.optional(),
  documents: ServerConfigSchema.optional(),
});

export type ServersConfig = z.infer<typeof ServersConfigSchema>;

export const OutputConfigSchema = z.object({
  dir: z.string().default("./output"),
  saveSnapshot: z.boolean().default(true),
});

export type OutputConfig = z.infer<typeof OutputConfigSchema>;

/**
 * What happens to the ticket after a run
 */
export const TrackerConfigSchema = z.object({
  /** Comment on the ticket and move it once the run ends */
  updateTicket: z.boolean().default(false),
  /** Only log the comment and transition */
  dryRun: z.boolean().default(false),
  reviewStatus: z.string().min(1).default("Human Plan Review"),
  backlogStatus: z.string().min(1).default("Backlog"),
});

export type TrackerConfig = z.infer<typeof TrackerConfigSchema>;

export const LoggingConfigSchema = z.object({
  level: z.enum(["silly", "trace", "debug", "info", "warn", "error", "fatal"]).default("info"),
  logToFile: z.boolean().default(true),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

/**
 * Complete configuration schema
 */
export const PlannerConfigSchema = z.object({
  model: ModelConfigSchema.default({}),
  rerank: RerankConfigSchema.default({}),
  retrieval: RetrievalConfigSchema.default({}),
  generation: GenerationConfigSchema.default({}),
  transport: TransportConfigSchema.default({}),
  servers: ServersConfigSchema.default({}),
  output: OutputConfigSchema.default({}),
  tracker: TrackerConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type PlannerConfig = z.infer<typeof PlannerConfigSchema>;

/**
 * Input shape of a config file: every section and field optional
 */
export type PlannerConfigInput = z.input<typeof PlannerConfigSchema>;

/**
 * Validate configuration object
 */
export function validateConfig(config: unknown): {
  success: boolean;
  data?: PlannerConfig;
  error?: z.ZodError;
} {
  const result = PlannerConfigSchema.safeParse(config);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error };
}
