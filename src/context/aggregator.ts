/**
 * Context aggregation
 *
 * Pure functions: the same inputs always render the same document, which is
 * both the live prompt context and the saved preview.
 */

import type { AggregatedContext } from "./types.js";
import {
  effectiveMaturity,
  type DocumentTemplate,
  type DocumentationMaturity,
  type KnowledgeContext,
  type RetrievedDocument,
  type TicketContext,
} from "../knowledge/types.js";
import type { RepositoryContext } from "../repository/types.js";
import { formatRepositoryContext } from "../repository/inspect.js";

export interface ContextInput {
  ticket: TicketContext;
  knowledge: KnowledgeContext;
  repository?: RepositoryContext | null;
  /** Warnings gathered before retrieval (ticket intake) */
  errors?: readonly string[];
  generatedAt: string;
}

/**
 * Merge the stage outputs into one context. Errors keep stage order:
 * intake, then retrieval, then repository.
 */
export function buildContext(input: ContextInput): AggregatedContext {
  const repository = input.repository ?? null;
  return Object.freeze({
    ticketKey: input.ticket.key,
    generatedAt: input.generatedAt,
    ticket: input.ticket,
    knowledge: input.knowledge,
    repository,
    errors: [...(input.errors ?? []), ...input.knowledge.errors, ...(repository?.errors ?? [])],
  });
}

const BANNERS: Partial<Record<DocumentationMaturity, { heading: string; notice: string }>> = {
  BRAND_NEW: {
    heading: "### BRAND NEW PROJECT",
    notice: "**IMPORTANT:** This is a greenfield project with no existing documentation.",
  },
  NEW_PROJECT: {
    heading: "### NEW PROJECT - DOCUMENTATION MISSING",
    notice:
      "**IMPORTANT:** The project folder exists but mandatory documentation pages are missing.",
  },
  INCOMPLETE: {
    heading: "### INCOMPLETE PROJECT DOCUMENTATION",
    notice: "**IMPORTANT:** Some mandatory documentation pages exist but are empty or incomplete.",
  },
};

const PAGE_OUTLINES = [
  "1. **Project Passport** page with sections:",
  "   - Identity & Ownership",
  "   - Technology Stack",
  "   - Repositories",
  "   - Environments",
  "2. **Logical Architecture** page with sections:",
  "   - Component Diagram",
  "   - Data Flow",
  "   - Contracts & Interfaces",
  "   - Constraints",
];

/**
 * Instructional banner for a project whose documentation is missing or
 * incomplete; empty for EXISTING.
 */
export function renderMaturityBanner(knowledge: KnowledgeContext): string[] {
  const banner = BANNERS[effectiveMaturity(knowledge.maturity, knowledge.missing)];
  if (!banner) return [];

  const lines = [banner.heading, "", banner.notice, ""];
  if (knowledge.missing.length > 0) {
    lines.push("**Documentation gaps:**");
    for (const role of knowledge.missing) lines.push(`- ${role}`);
    lines.push("");
  }
  lines.push(
    "Your work plan MUST include steps to create or fill these pages, before implementation steps.",
    ...PAGE_OUTLINES,
    "",
    "Use `[DOCS]` layer for documentation creation/update steps.",
    "",
  );
  return lines;
}

function renderDocuments(heading: string, documents: readonly RetrievedDocument[]): string[] {
  if (documents.length === 0) return [];
  const lines = [heading, ""];
  for (const doc of documents) {
    lines.push(`#### ${doc.title}`, `URL: ${doc.url}`, "", doc.content, "");
  }
  return lines;
}

/**
 * Structure every DOCS step must follow; empty without templates
 */
export function renderTemplateCompliance(templates: readonly DocumentTemplate[]): string[] {
  if (templates.length === 0) return [];

  const lines = [
    "### TEMPLATE COMPLIANCE (MANDATORY)",
    "",
    "The templates below define the exact structure of these documentation pages. " +
      "Steps that create or update them (`DOCS` layer) MUST keep the template's headings, " +
      "sections and their order. Do not invent other sections.",
    "",
  ];
  for (const template of templates) {
    lines.push(
      `#### Template: ${template.role}`,
      `*Source: ${template.title}*`,
      "",
      "```",
      template.content,
      "```",
      "",
    );
  }
  return lines;
}

function renderTicket(ticket: TicketContext): string[] {
  const lines = [
    "## Ticket",
    "",
    `**Key:** ${ticket.key}`,
    `**Title:** ${ticket.summary}`,
    `**Type:** ${ticket.type}`,
    `**Status:** ${ticket.status}`,
    `**Project:** ${ticket.projectName} (${ticket.projectKey})`,
    `**Labels:** ${ticket.labels.join(", ") || "None"}`,
    `**Assignee:** ${ticket.assignee ?? "Unassigned"}`,
  ];
  if (ticket.parent) lines.push(`**Parent:** ${ticket.parent}`);
  if (ticket.subtasks.length > 0) lines.push(`**Subtasks:** ${ticket.subtasks.join(", ")}`);

  lines.push("", "### Description", "", ticket.description || "[No description provided]", "");

  if (ticket.comments.length > 0) {
    lines.push("### Comments", "");
    for (const comment of ticket.comments) {
      lines.push(`**${comment.author}** (${comment.created}):`);
      lines.push(...comment.body.split("\n").map((line) => `> ${line}`));
      lines.push("");
    }
  }
  return lines;
}

function renderKnowledge(knowledge: KnowledgeContext): string[] {
  return [
    "## Project Knowledge Base",
    "",
    `**Space:** ${knowledge.space}`,
    `**Status:** ${effectiveMaturity(knowledge.maturity, knowledge.missing)}`,
    "",
    ...renderMaturityBanner(knowledge),
    ...renderDocuments("### Core Documentation (Mandatory)", knowledge.mandatory),
    ...renderDocuments("### Supporting Documentation (Selected)", knowledge.discovered),
    ...renderTemplateCompliance(knowledge.templates),
  ];
}

/**
 * Render the context as markdown: header, ticket, knowledge base,
 * repository, warnings.
 */
export function renderContext(context: AggregatedContext): string {
  const lines = [`# Task Context: ${context.ticketKey}`, `Generated: ${context.generatedAt}`, ""];

  lines.push("---", "", ...renderTicket(context.ticket));
  lines.push("---", "", ...renderKnowledge(context.knowledge));

  if (context.repository) {
    lines.push("---", "", "## Codebase Context", "", formatRepositoryContext(context.repository), "");
  }

  if (context.errors.length > 0) {
    lines.push("---", "", "## Warnings", "");
    for (const error of context.errors) lines.push(`- ${error}`);
    lines.push("");
  }

  return `${lines.join("\n").trimEnd()}\n`;
}
