/**
 * Discovery filter: broad search, then a model rerank.
 *
 * Discovery never fails the run. Search, rerank and fetch problems degrade
 * to fewer documents and are reported in `errors`.
 */

import { z } from "zod";
import type { Logger, ILogObj } from "tslog";
import type { DocumentTransport } from "../mcp/types.js";
import type { ModelClient } from "../providers/types.js";
import type { RerankConfig } from "../config/schema.js";
import type {
  DocumentationMaturity,
  RetrievedDocument,
  SearchCandidate,
  SelectionLog,
} from "./types.js";
import type { KeywordExtractor } from "./keywords.js";
import { PatternKeywordExtractor } from "./keywords.js";
import { parsePageContent, parseSearchResults } from "./parsers.js";
import { TOOLS, discoveryQuery } from "./queries.js";
import { RERANK_SYSTEM_PROMPT, buildRerankPrompt } from "./prompts.js";
import type { GenerationMetrics } from "../generation/metrics.js";
import { errorMessage } from "../utils/errors.js";
import { getLogger } from "../utils/logger.js";

export interface DiscoveryInput {
  summary: string;
  description: string;
  containerId: string | null;
  maturity: DocumentationMaturity;
  /** Ids already retrieved as mandatory documents */
  excludeIds: ReadonlySet<string>;
}

export interface DiscoveryOptions {
  model: ModelClient;
  /** Model used when `rerank.model` is not set */
  defaultModel: string;
  rerank: RerankConfig;
  searchLimit: number;
  maxKeywords: number;
  keywordExtractor?: KeywordExtractor;
  metrics?: GenerationMetrics;
  logger?: Logger<ILogObj>;
}

export interface DiscoveryResult {
  documents: RetrievedDocument[];
  selectionLog: SelectionLog | null;
  errors: string[];
}

const SelectionSchema = z.object({
  selected_ids: z.array(z.union([z.string(), z.number()]).transform(String)),
});

/**
 * Remove a markdown code fence around a reply, if any
 */
export function stripCodeFence(text: string): string {
  const fenced = /```(?:json)?[ \t]*\n?([\s\S]*?)```/i.exec(text);
  return (fenced?.[1] ?? text).trim();
}

/**
 * Parse a rerank reply into the selected ids
 */
export function parseSelection(raw: string): { ids: string[] } | { error: string } {
  let data: unknown;
  try {
    data = JSON.parse(stripCodeFence(raw));
  } catch (error) {
    return { error: `Invalid JSON: ${errorMessage(error)}` };
  }

  const parsed = SelectionSchema.safeParse(data);
  if (!parsed.success) {
    return { error: "Reply has no selected_ids array" };
  }
  return { ids: [...new Set(parsed.data.selected_ids)] };
}

export async function discoverDocuments(
  transport: DocumentTransport,
  input: DiscoveryInput,
  options: DiscoveryOptions,
): Promise<DiscoveryResult> {
  const logger = options.logger ?? getLogger();
  const { containerId, maturity } = input;

  if (containerId === null || maturity === "NEW_PROJECT" || maturity === "BRAND_NEW") {
    logger.info({ event: "discovery_skipped", maturity });
    return { documents: [], selectionLog: null, errors: [] };
  }

  const extractor = options.keywordExtractor ?? new PatternKeywordExtractor();
  const keywords = extractor.extract(
    `${input.summary}\n${input.description}`,
    options.maxKeywords,
  );
  if (keywords.length === 0) {
    logger.info({ event: "discovery_skipped", reason: "no keywords" });
    return { documents: [], selectionLog: null, errors: [] };
  }

  let candidates: SearchCandidate[];
  try {
    const reply = await transport.invoke(TOOLS.searchPages, {
      cql: discoveryQuery(containerId, keywords),
      limit: options.searchLimit,
    });
    candidates = parseSearchResults(reply).filter((c) => !input.excludeIds.has(c.id));
  } catch (error) {
    logger.warn(`Discovery search failed: ${errorMessage(error)}`);
    return {
      documents: [],
      selectionLog: null,
      errors: [`Discovery search failed: ${errorMessage(error)}`],
    };
  }

  logger.info({ event: "discovery_candidates", keywords, candidates: candidates.length });
  if (candidates.length === 0) {
    return { documents: [], selectionLog: null, errors: [] };
  }

  const selectionLog = await rerank(input, candidates, options, logger);
  const errors: string[] = [];
  if (selectionLog.error) {
    errors.push(`Document rerank failed: ${selectionLog.error}`);
  }

  const documents: RetrievedDocument[] = [];
  for (const id of selectionLog.selectedIds) {
    const candidate = candidates.find((c) => c.id === id);
    if (!candidate) continue;
    try {
      const page = await transport.invoke(TOOLS.getPage, { page_id: id });
      documents.push({
        id,
        title: candidate.title,
        url: candidate.url,
        content: parsePageContent(page),
      });
    } catch (error) {
      logger.warn(`Failed to fetch page ${id}: ${errorMessage(error)}`);
      errors.push(`Failed to fetch page ${id}: ${errorMessage(error)}`);
    }
  }

  logger.info({ event: "discovery_complete", documents: documents.map((d) => d.id) });
  return { documents, selectionLog, errors };
}

async function rerank(
  input: DiscoveryInput,
  candidates: SearchCandidate[],
  options: DiscoveryOptions,
  logger: Logger<ILogObj>,
): Promise<SelectionLog> {
  const model = options.rerank.model ?? options.defaultModel;
  const userPrompt = buildRerankPrompt(
    input.summary,
    input.description,
    candidates,
    options.rerank.excerptLength,
  );

  const log: SelectionLog = {
    systemPrompt: RERANK_SYSTEM_PROMPT,
    userPrompt,
    candidates,
    rawResponse: "",
    selectedIds: [],
    ignoredIds: [],
    model,
    tokensIn: 0,
    tokensOut: 0,
  };

  const start = performance.now();
  try {
    const completion = await options.model.complete({
      system: RERANK_SYSTEM_PROMPT,
      user: userPrompt,
      temperature: options.rerank.temperature,
      maxTokens: options.rerank.maxTokens,
      model,
    });
    log.rawResponse = completion.text;
    log.tokensIn = completion.tokensIn;
    log.tokensOut = completion.tokensOut;
    options.metrics?.record({
      attempt: 1,
      purpose: "rerank",
      model: completion.model,
      tokensIn: completion.tokensIn,
      tokensOut: completion.tokensOut,
      durationMs: Math.round(performance.now() - start),
      validation: null,
    });
  } catch (error) {
    log.error = `Model call failed: ${errorMessage(error)}`;
    logger.warn(`Rerank call failed: ${errorMessage(error)}`);
    options.metrics?.record({
      attempt: 1,
      purpose: "rerank",
      model,
      tokensIn: 0,
      tokensOut: 0,
      durationMs: Math.round(performance.now() - start),
      validation: null,
      error: errorMessage(error),
    });
    return log;
  }

  const selection = parseSelection(log.rawResponse);
  if ("error" in selection) {
    log.error = selection.error;
    logger.warn(`Rerank reply could not be parsed: ${selection.error}`);
    return log;
  }

  const offered = new Set(candidates.map((c) => c.id));
  log.selectedIds = selection.ids.filter((id) => offered.has(id));
  log.ignoredIds = selection.ids.filter((id) => !offered.has(id));
  if (log.ignoredIds.length > 0) {
    logger.warn(`Rerank returned ids that were not offered: ${log.ignoredIds.join(", ")}`);
  }

  logger.info({ event: "rerank_selected", selected: log.selectedIds });
  return log;
}

/**
 * Render a selection log as markdown
 */
export function formatSelectionLog(log: SelectionLog): string {
  const selected = new Set(log.selectedIds);

  const table = ["| ID | Title | Excerpt |", "|---|---|---|"];
  for (const c of log.candidates) {
    const excerpt = c.excerpt.slice(0, 100).replace(/\n/g, " ").replace(/\|/g, "\\|");
    table.push(`| ${c.id} | ${c.title} | ${excerpt} |`);
  }

  const outcome = log.candidates.map(
    (c) => `- [${selected.has(c.id) ? "SELECTED" : "rejected"}] \`${c.id}\` - ${c.title}`,
  );

  const lines = [
    "## System Prompt",
    "",
    "```",
    log.systemPrompt,
    "```",
    "",
    "## User Prompt",
    "",
    log.userPrompt,
    "",
    `## Candidates (${log.candidates.length} pages)`,
    "",
    ...table,
    "",
    "## Raw Response",
    "",
    "```json",
    log.rawResponse,
    "```",
    "",
    "## Selection Result",
    "",
    ...(outcome.length > 0 ? outcome : ["_No candidates to evaluate_"]),
  ];

  if (log.ignoredIds.length > 0) {
    lines.push("", `Ignored ids (not offered): ${log.ignoredIds.join(", ")}`);
  }
  if (log.error) {
    lines.push("", `**Error:** ${log.error}`);
  }

  lines.push(
    "",
    "## Metadata",
    "",
    `- Model: ${log.model}`,
    `- Tokens In: ${log.tokensIn}`,
    `- Tokens Out: ${log.tokensOut}`,
  );

  return lines.join("\n");
}
