/**
 * ticketplan: turn a tracker ticket into a validated, documentation-aware work plan
 *
 * Ticket intake, documentation retrieval, repository signals and context
 * aggregation feed a model call whose output is validated, repaired when
 * needed, decomposed into scored steps and written to disk.
 *
 * @packageDocumentation
 */

// Version
export { VERSION } from "./version.js";

// Pipeline
export { runPipeline } from "./pipeline/run.js";
export type {
  PipelineOptions,
  PipelineResult,
  PipelineServices,
  PipelineStage,
} from "./pipeline/types.js";

// Configuration
export { loadConfig, createDefaultConfig } from "./config/loader.js";
export type { LoadConfigOptions } from "./config/loader.js";
export type { PlannerConfig } from "./config/schema.js";
export { loadEnvFile } from "./config/env.js";

// Knowledge, repository and context
export * from "./knowledge/index.js";
export * from "./repository/index.js";
export * from "./context/index.js";

// Generation and outputs
export * from "./generation/index.js";
export * from "./output/index.js";

// Ticket follow-up
export * from "./tracker/index.js";

// Model and tool-server clients
export * from "./providers/index.js";
export { createServerClient, MCPToolClient, TransportError } from "./mcp/index.js";
export type { DocumentTransport } from "./mcp/index.js";

// Utilities
export {
  PlannerError,
  ConfigError,
  ProviderError,
  ValidationError,
  LocationNotFoundError,
  formatError,
  createLogger,
  getLogger,
  setLogger,
} from "./utils/index.js";
