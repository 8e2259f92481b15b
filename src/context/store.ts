/**
 * On-disk context snapshot
 *
 * Saved after retrieval so a later refinement pass can reuse the context
 * without resolving and fetching again.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { Logger, ILogObj } from "tslog";
import type { AggregatedContext } from "./types.js";
import { writeJsonFile } from "../utils/files.js";
import { errorMessage, isNotFoundError } from "../utils/errors.js";
import { getLogger } from "../utils/logger.js";

export const SNAPSHOT_VERSION = 1;

const TicketSchema = z.object({
  key: z.string().default(""),
  summary: z.string().default(""),
  description: z.string().default(""),
  type: z.string().default(""),
  status: z.string().default(""),
  projectKey: z.string().default(""),
  projectName: z.string().default(""),
  assignee: z.string().nullable().default(null),
  labels: z.array(z.string()).default([]),
  parent: z.string().nullable().default(null),
  subtasks: z.array(z.string()).default([]),
  created: z.string().nullable().default(null),
  updated: z.string().nullable().default(null),
  comments: z
    .array(
      z.object({
        author: z.string().default("Unknown"),
        created: z.string().default(""),
        body: z.string().default(""),
      }),
    )
    .default([]),
  projectFolder: z.string().default(""),
  projectLink: z.string().default(""),
});

const DocumentSchema = z.object({
  id: z.string(),
  title: z.string().default(""),
  url: z.string().default(""),
  content: z.string().default(""),
});

const SelectionLogSchema = z.object({
  systemPrompt: z.string().default(""),
  userPrompt: z.string().default(""),
  candidates: z
    .array(
      z.object({
        id: z.string(),
        title: z.string().default(""),
        url: z.string().default(""),
        excerpt: z.string().default(""),
      }),
    )
    .default([]),
  rawResponse: z.string().default(""),
  selectedIds: z.array(z.string()).default([]),
  ignoredIds: z.array(z.string()).default([]),
  model: z.string().default(""),
  tokensIn: z.number().default(0),
  tokensOut: z.number().default(0),
  error: z.string().optional(),
});

const KnowledgeSchema = z.object({
  space: z.string().default(""),
  containerId: z.string().nullable().default(null),
  maturity: z
    .enum(["EXISTING", "INCOMPLETE", "NEW_PROJECT", "BRAND_NEW", "NOT_FOUND"])
    .default("BRAND_NEW"),
  mandatory: z.array(DocumentSchema).default([]),
  discovered: z.array(DocumentSchema).default([]),
  missing: z.array(z.enum(["Project Passport", "Logical Architecture"])).default([]),
  selectionLog: SelectionLogSchema.nullable().default(null),
  templates: z
    .array(
      DocumentSchema.extend({ role: z.enum(["Project Passport", "Logical Architecture"]) }),
    )
    .default([]),
  errors: z.array(z.string()).default([]),
});

const RepositorySchema = z.object({
  status: z.enum(["EXISTS", "NOT_FOUND", "NEW_PROJECT"]).default("NEW_PROJECT"),
  path: z.string().nullable().default(null),
  branch: z.string().nullable().default(null),
  tree: z.string().default(""),
  files: z.array(z.string()).default([]),
  fileCount: z.number().int().default(0),
  keyDirectories: z.array(z.string()).default([]),
  recentCommits: z.array(z.string()).default([]),
  errors: z.array(z.string()).default([]),
});

export const SnapshotSchema = z.object({
  version: z.number().int().default(0),
  ticketKey: z.string().default(""),
  generatedAt: z.string().default(""),
  ticket: TicketSchema.default({}),
  knowledge: KnowledgeSchema.default({}),
  repository: RepositorySchema.nullable().default(null),
  errors: z.array(z.string()).default([]),
});

/**
 * `<outputDir>/<KEY>/<KEY>_context_store.json`
 */
export function snapshotPath(outputDir: string, ticketKey: string): string {
  return path.join(outputDir, ticketKey, `${ticketKey}_context_store.json`);
}

/**
 * Write the context snapshot and return its path
 */
export async function saveSnapshot(
  context: AggregatedContext,
  outputDir: string,
  logger: Logger<ILogObj> = getLogger(),
): Promise<string> {
  const filePath = snapshotPath(outputDir, context.ticketKey);
  await writeJsonFile(filePath, { version: SNAPSHOT_VERSION, ...context });
  logger.debug(`Context snapshot saved: ${filePath}`);
  return filePath;
}

/**
 * Parse snapshot JSON. Missing fields take defaults and a version mismatch
 * is only a warning; anything unparsable gives null. A missing ticket key is
 * taken from the ticket, then from `expectedKey`.
 */
export function parseSnapshot(
  raw: string,
  logger: Logger<ILogObj> = getLogger(),
  expectedKey?: string,
): AggregatedContext | null {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    logger.error(`Context snapshot is not valid JSON: ${errorMessage(error)}`);
    return null;
  }

  const result = SnapshotSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "root"}: ${i.message}`);
    logger.error(`Context snapshot is invalid: ${issues.join("; ")}`);
    return null;
  }

  const { version, ...snapshot } = result.data;
  if (version !== SNAPSHOT_VERSION) {
    logger.warn(`Context store version mismatch: ${version} != ${SNAPSHOT_VERSION}`);
  }

  const ticketKey = snapshot.ticketKey || snapshot.ticket.key || expectedKey;
  if (!ticketKey) {
    logger.error("Context snapshot has no ticket key");
    return null;
  }
  if (expectedKey && ticketKey !== expectedKey) {
    logger.warn(`Context snapshot belongs to ${ticketKey}, expected ${expectedKey}`);
  }

  return {
    ...snapshot,
    ticketKey,
    ticket: { ...snapshot.ticket, key: snapshot.ticket.key || ticketKey },
  };
}

/**
 * Load a saved snapshot for a ticket, or null when there is none usable
 */
export async function loadSnapshot(
  outputDir: string,
  ticketKey: string,
  logger: Logger<ILogObj> = getLogger(),
): Promise<AggregatedContext | null> {
  const filePath = snapshotPath(outputDir, ticketKey);
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    if (isNotFoundError(error)) {
      logger.warn(`No context snapshot at ${filePath}`);
    } else {
      logger.error(`Cannot read context snapshot ${filePath}: ${errorMessage(error)}`);
    }
    return null;
  }
  return parseSnapshot(raw, logger, ticketKey);
}
