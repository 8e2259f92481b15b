/**
 * Pipeline types
 */

import type { Logger, ILogObj } from "tslog";
import type { PlannerConfig } from "../config/schema.js";
import type { DocumentTransport } from "../mcp/types.js";
import type { ModelClient } from "../providers/types.js";
import type { KeywordExtractor } from "../knowledge/keywords.js";
import type { AggregatedContext } from "../context/types.js";
import type { GenerationMetrics } from "../generation/metrics.js";
import type { PlanReport, WrittenOutputs } from "../output/writer.js";

export type PipelineStage =
  | "ticket"
  | "knowledge"
  | "repository"
  | "snapshot"
  | "generation"
  | "outputs";

/**
 * Upstream clients, created on first use so a refinement pass never
 * connects to the ticket or document servers
 */
export interface PipelineServices {
  tickets: () => DocumentTransport;
  documents: () => DocumentTransport;
  model: () => ModelClient;
}

export interface PipelineOptions {
  /** Ticket key or a URL containing one */
  ticket: string;
  config: PlannerConfig;
  /** Overrides config.output.dir */
  outputDir?: string;
  repoPath?: string;
  skipGeneration?: boolean;
  /** Reuse the saved context snapshot instead of retrieving again */
  refine?: boolean;
  keywordExtractor?: KeywordExtractor;
  now?: () => Date;
  onStage?: (stage: PipelineStage) => void;
  logger?: Logger<ILogObj>;
}

export interface PipelineResult {
  ticketKey: string;
  context: AggregatedContext;
  renderedContext: string;
  /** null when generation was skipped */
  plan: PlanReport | null;
  metrics: GenerationMetrics;
  outputs: WrittenOutputs;
  /** Every non-fatal problem of the run, retrieval and generation alike */
  warnings: string[];
}
