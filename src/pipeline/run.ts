/**
 * Ticket to work plan, end to end
 *
 * Stages run one after another: ticket intake, knowledge retrieval,
 * repository signals, aggregation, generation with repair, then outputs.
 * A refinement pass starts from the saved snapshot instead of the first
 * three stages.
 */

import type { Logger, ILogObj } from "tslog";
import type { AggregatedContext } from "../context/types.js";
import type { RepositoryContext } from "../repository/types.js";
import type { PipelineOptions, PipelineResult, PipelineServices } from "./types.js";
import { parseTicketKey } from "../knowledge/parsers.js";
import { fetchTicket } from "../knowledge/ticket.js";
import { retrieveKnowledge } from "../knowledge/retrieve.js";
import { inspectRepository } from "../repository/inspect.js";
import { buildContext, renderContext } from "../context/aggregator.js";
import { loadSnapshot, snapshotPath } from "../context/store.js";
import { GenerationMetrics } from "../generation/metrics.js";
import { runGeneration } from "../generation/retry-controller.js";
import { decompose } from "../generation/decomposition.js";
import { scoreItems, summarizeConfidence } from "../generation/confidence.js";
import { writeOutputs, type PlanReport } from "../output/writer.js";
import { ValidationError } from "../utils/errors.js";
import { createChildLogger, getLogger, logEvent, logTiming } from "../utils/logger.js";

async function retrieveContext(
  ticketKey: string,
  services: PipelineServices,
  options: PipelineOptions,
  metrics: GenerationMetrics,
  generatedAt: string,
  logger: Logger<ILogObj>,
): Promise<AggregatedContext> {
  const { config } = options;

  options.onStage?.("ticket");
  const intake = await logTiming(logger, "ticket", () =>
    fetchTicket(services.tickets(), ticketKey, createChildLogger(logger, "ticket")),
  );

  options.onStage?.("knowledge");
  const knowledge = await logTiming(logger, "knowledge", () =>
    retrieveKnowledge(services.documents(), intake.ticket, {
      model: services.model(),
      defaultModel: config.rerank.model ?? config.model.model,
      retrieval: config.retrieval,
      rerank: config.rerank,
      keywordExtractor: options.keywordExtractor,
      metrics,
      logger,
    }),
  );

  let repository: RepositoryContext | null = null;
  if (options.repoPath) {
    options.onStage?.("repository");
    const repoPath = options.repoPath;
    repository = await logTiming(logger, "repository", () =>
      inspectRepository(repoPath, { logger: createChildLogger(logger, "repository") }),
    );
  }

  return buildContext({
    ticket: intake.ticket,
    knowledge,
    repository,
    errors: intake.errors,
    generatedAt,
  });
}

async function refineContext(
  ticketKey: string,
  outputDir: string,
  options: PipelineOptions,
  generatedAt: string,
  logger: Logger<ILogObj>,
): Promise<AggregatedContext> {
  options.onStage?.("snapshot");
  const snapshot = await loadSnapshot(outputDir, ticketKey, logger);
  if (!snapshot) {
    throw new ValidationError(
      `No usable context snapshot for ${ticketKey} at ${snapshotPath(outputDir, ticketKey)}; run without --refine first`,
      { field: "refine" },
    );
  }

  let repository = snapshot.repository;
  if (options.repoPath) {
    options.onStage?.("repository");
    repository = await inspectRepository(options.repoPath, {
      logger: createChildLogger(logger, "repository"),
    });
  }

  // buildContext merges the knowledge and repository errors again
  const merged = new Set([...snapshot.knowledge.errors, ...(snapshot.repository?.errors ?? [])]);

  logger.info(`Reusing context snapshot from ${snapshot.generatedAt || "an earlier run"}`);
  return buildContext({
    ticket: snapshot.ticket,
    knowledge: snapshot.knowledge,
    repository,
    errors: snapshot.errors.filter((e) => !merged.has(e)),
    generatedAt,
  });
}

/**
 * Run the pipeline for one ticket. Fatal problems reject (an unparsable
 * ticket key, an unreadable ticket, an unresolvable documentation
 * location, a failed first model call); everything else ends up in
 * `warnings` and in the written context.
 */
export async function runPipeline(
  services: PipelineServices,
  options: PipelineOptions,
): Promise<PipelineResult> {
  const logger = options.logger ?? getLogger();
  const { config } = options;
  const ticketKey = parseTicketKey(options.ticket);
  const outputDir = options.outputDir ?? config.output.dir;
  const generatedAt = (options.now ?? (() => new Date()))().toISOString();
  const metrics = new GenerationMetrics(ticketKey);

  logEvent(logger, "pipeline_started", { ticketKey, refine: options.refine ?? false });

  const context = options.refine
    ? await refineContext(ticketKey, outputDir, options, generatedAt, logger)
    : await retrieveContext(ticketKey, services, options, metrics, generatedAt, logger);
  const renderedContext = renderContext(context);

  let plan: PlanReport | null = null;
  if (!options.skipGeneration) {
    options.onStage?.("generation");
    const generation = await logTiming(logger, "generation", () =>
      runGeneration(services.model(), renderedContext, {
        model: config.model.model,
        temperature: config.model.temperature,
        maxTokens: config.model.maxTokens,
        maxRetries: config.generation.maxRetries,
        repairExcerptLength: config.generation.repairExcerptLength,
        metrics,
        logger: createChildLogger(logger, "generation"),
      }),
    );

    const decomposition = decompose(generation.sections);
    const items = scoreItems(decomposition.items, context);
    plan = {
      generation,
      decomposition: { ...decomposition, items },
      confidence: summarizeConfidence(items, config.generation.minConfidence),
    };
  }

  options.onStage?.("outputs");
  const outputs = await writeOutputs(
    outputDir,
    {
      context,
      renderedContext,
      plan,
      metrics,
      model: {
        name: config.model.model,
        temperature: config.model.temperature,
        maxTokens: config.model.maxTokens,
      },
    },
    { saveSnapshot: config.output.saveSnapshot && !options.refine, logger },
  );

  const warnings = [...context.errors, ...(plan?.generation.warnings ?? [])];
  logEvent(logger, "pipeline_finished", {
    ticketKey,
    files: outputs.files.length,
    warnings: warnings.length,
  });

  return { ticketKey, context, renderedContext, plan, metrics, outputs, warnings };
}
