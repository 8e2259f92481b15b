/**
 * Knowledge retrieval: resolve, fetch mandatory documents, discover.
 */

import type { Logger, ILogObj } from "tslog";
import type { DocumentTransport } from "../mcp/types.js";
import type { ModelClient } from "../providers/types.js";
import type { RerankConfig, RetrievalConfig } from "../config/schema.js";
import type { GenerationMetrics } from "../generation/metrics.js";
import type { KnowledgeContext, TicketContext } from "./types.js";
import type { KeywordExtractor } from "./keywords.js";
import { deriveSpace } from "./parsers.js";
import { resolveLocation } from "./resolver.js";
import { fetchMandatoryDocuments } from "./mandatory.js";
import { discoverDocuments } from "./discovery.js";
import { retrieveTemplates } from "./templates.js";
import { createChildLogger, getLogger } from "../utils/logger.js";

export interface RetrieveOptions {
  model: ModelClient;
  defaultModel: string;
  retrieval: RetrievalConfig;
  rerank: RerankConfig;
  keywordExtractor?: KeywordExtractor;
  metrics?: GenerationMetrics;
  logger?: Logger<ILogObj>;
}

/**
 * Gather the documentation and page templates for a ticket. Throws
 * LocationNotFoundError when a supplied locator or folder cannot be
 * resolved; every other problem is reported in `errors`.
 */
export async function retrieveKnowledge(
  transport: DocumentTransport,
  ticket: TicketContext,
  options: RetrieveOptions,
): Promise<KnowledgeContext> {
  const logger = options.logger ?? getLogger();

  const location = await resolveLocation(
    transport,
    {
      locator: ticket.projectLink,
      folderName: ticket.projectFolder,
      space: deriveSpace(ticket, options.retrieval.defaultSpace),
    },
    createChildLogger(logger, "resolver"),
  );

  const mandatory = await fetchMandatoryDocuments(transport, location, {
    searchLimit: options.retrieval.mandatorySearchLimit,
    logger: createChildLogger(logger, "mandatory"),
  });

  const discovery = await discoverDocuments(
    transport,
    {
      summary: ticket.summary,
      description: ticket.description,
      containerId: location.containerId,
      maturity: mandatory.maturity,
      excludeIds: new Set(mandatory.documents.map((d) => d.id)),
    },
    {
      model: options.model,
      defaultModel: options.defaultModel,
      rerank: options.rerank,
      searchLimit: options.retrieval.discoverySearchLimit,
      maxKeywords: options.retrieval.maxKeywords,
      keywordExtractor: options.keywordExtractor,
      metrics: options.metrics,
      logger: createChildLogger(logger, "discovery"),
    },
  );

  const templates = options.retrieval.templates
    ? await retrieveTemplates(transport, location.space, {
        hubSpace: options.retrieval.templatesSpace,
        logger: createChildLogger(logger, "templates"),
      })
    : [];

  return {
    space: location.space,
    containerId: location.containerId,
    maturity: mandatory.maturity,
    mandatory: mandatory.documents,
    discovered: discovery.documents,
    missing: mandatory.missing,
    selectionLog: discovery.selectionLog,
    templates,
    errors: [...mandatory.errors, ...discovery.errors],
  };
}
