/**
 * Parsers for upstream tool replies.
 *
 * The ticket and document servers answer with formatted markdown. Every
 * assumption about that format lives here; the rest of the code works with
 * the typed values these functions return.
 */

import type { SearchCandidate, TicketComment, TicketContext } from "./types.js";
import { ValidationError } from "../utils/errors.js";

const TICKET_KEY = /^[A-Z][A-Z0-9]*-\d+$/;
const TICKET_KEY_IN_TEXT = /([A-Z][A-Z0-9]*-\d+)/;

const CONTAINER_ID_PATTERNS: RegExp[] = [/\/folder\/(\d+)/, /\/pages\/(\d+)/, /[?&]pageId=(\d+)/];

const SEARCH_ENTRY = /\*\*(.+?)\*\*\s*\([^)]*\)\s*-\s*\[View\]\(([^)]+)\)/;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function isNone(value: string): boolean {
  return value === "" || value.toLowerCase() === "none";
}

/**
 * Parse a ticket key from a bare key or any URL containing one
 *
 * @example parseTicketKey("https://tracker.example.com/browse/proj-12") // "PROJ-12"
 */
export function parseTicketKey(input: string): string {
  const upper = input.trim().toUpperCase();
  if (TICKET_KEY.test(upper)) {
    return upper;
  }

  const match = TICKET_KEY_IN_TEXT.exec(upper);
  if (match?.[1]) {
    return match[1];
  }

  throw new ValidationError(`Could not parse a ticket key from: ${input}`, { field: "ticket" });
}

/**
 * Read a `**Label:** value` line
 */
function boldField(text: string, label: string): string {
  const match = new RegExp(`\\*\\*${escapeRegExp(label)}:\\*\\*[ \\t]*([^\\n]*)`, "i").exec(text);
  return match?.[1]?.trim() ?? "";
}

/**
 * Read a `- Label: value` metadata line
 */
function metadataField(text: string, label: string): string {
  const match = new RegExp(`-\\s*${escapeRegExp(label)}:[ \\t]*([^\\n]*)`, "i").exec(text);
  return match?.[1]?.trim() ?? "";
}

function commaList(value: string): string[] {
  if (isNone(value)) return [];
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Parse a `jira_get_issue` reply. Comments are fetched separately.
 */
export function parseTicketMarkdown(key: string, text: string): TicketContext {
  const summaryMatch = new RegExp(`^#\\s*${escapeRegExp(key)}:\\s*(.+)$`, "m").exec(text);

  const projectMatch = /\*\*Project:\*\*\s*(.+?)\s*\(([A-Z0-9]+)\)/.exec(text);

  const descriptionMatch = /## Description[ \t]*\n([\s\S]*?)(?=\n## Metadata|$)/.exec(text);
  let description = descriptionMatch?.[1]?.trim() ?? "";
  if (description === "[No description]") description = "";

  const assignee = boldField(text, "Assignee");
  const parent = metadataField(text, "Parent");
  const created = metadataField(text, "Created");
  const updated = metadataField(text, "Updated");
  const projectFolder = boldField(text, "Project Folder");
  const projectLink = boldField(text, "Project Link");

  return {
    key,
    summary: summaryMatch?.[1]?.trim() ?? "",
    description,
    type: boldField(text, "Type"),
    status: boldField(text, "Status"),
    projectKey: projectMatch?.[2] ?? key.split("-")[0] ?? key,
    projectName: projectMatch?.[1]?.trim() ?? "",
    assignee: assignee === "" || assignee.toLowerCase() === "unassigned" ? null : assignee,
    labels: commaList(boldField(text, "Labels")),
    parent: isNone(parent) ? null : parent,
    subtasks: commaList(metadataField(text, "Subtasks")),
    created: created || null,
    updated: updated || null,
    comments: [],
    projectFolder: isNone(projectFolder) ? "" : projectFolder,
    projectLink: isNone(projectLink) ? "" : projectLink,
  };
}

/**
 * Parse a `jira_get_comments` reply:
 *
 * ```
 * Comments for KEY:
 *
 * ### Author Name - 2024-01-15T10:30:00.000+0000
 *
 * Body
 * ```
 */
export function parseComments(text: string): TicketComment[] {
  if (!text.includes("Comments for")) {
    return [];
  }

  const comments: TicketComment[] = [];
  for (const block of text.split(/\n### /).slice(1)) {
    const [header = "", ...rest] = block.trim().split("\n");
    const match = /^(.+?)\s*-\s*(\d{4}-\d{2}-\d{2}.*?)$/.exec(header);
    if (!match?.[1] || !match[2]) continue;

    comments.push({
      author: match[1].trim(),
      created: match[2].trim(),
      body: rest.join("\n").trim(),
    });
  }
  return comments;
}

/**
 * Extract a container (folder or page) id from a documentation URL
 */
export function extractContainerId(locator: string): string | null {
  for (const pattern of CONTAINER_ID_PATTERNS) {
    const match = pattern.exec(locator);
    if (match?.[1]) return match[1];
  }
  return null;
}

/**
 * Extract the space key from a `/spaces/<KEY>/` URL
 */
export function extractSpaceKey(locator: string): string | null {
  const match = /\/spaces\/([^/?#]+)/.exec(locator);
  return match?.[1] ?? null;
}

function pageIdFromUrl(url: string): string {
  const id = extractContainerId(url);
  if (id) return id;
  const segments = url.replace(/\/+$/, "").split("/");
  return segments[segments.length - 1] ?? "";
}

/**
 * Parse a `confluence_search_pages` reply:
 *
 * ```
 * Found 2 pages:
 *
 * - **Title** (SPACE) - [View](https://wiki.example.com/spaces/SPACE/pages/501/Title)
 *   Version: 3, Labels: api
 * ```
 *
 * An `Excerpt:` line under an entry is used when the server sends one;
 * otherwise the excerpt names the title.
 */
export function parseSearchResults(text: string): SearchCandidate[] {
  const candidates: SearchCandidate[] = [];
  let current: SearchCandidate | null = null;

  for (const line of text.split("\n")) {
    const entry = SEARCH_ENTRY.exec(line);
    if (entry?.[1] && entry[2]) {
      const title = entry[1].trim();
      const url = entry[2].trim();
      current = { id: pageIdFromUrl(url), title, url, excerpt: `Document titled: ${title}` };
      candidates.push(current);
      continue;
    }

    const excerpt = /^\s*Excerpt:\s*(.*)$/.exec(line);
    if (current && excerpt?.[1]) {
      current.excerpt = excerpt[1].trim();
    }
  }

  return candidates;
}

/**
 * Extract the body of a `confluence_get_page` reply: everything after the
 * `## Content` heading, trailing whitespace removed and runs of blank lines
 * collapsed.
 */
export function parsePageContent(text: string): string {
  const match = /## Content[^\n]*\n([\s\S]*)/.exec(text);
  const body = match?.[1] ?? text;

  return body
    .split("\n")
    .map((line) => line.trimEnd())
    .join("\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

/**
 * Pick the documentation space for a ticket
 */
export function deriveSpace(ticket: TicketContext, defaultSpace?: string): string {
  if (defaultSpace) return defaultSpace;

  const label = ticket.labels.find((l) => /^[a-z][a-z0-9]*$/.test(l.toLowerCase()));
  if (label) return label.toUpperCase();

  return ticket.projectKey;
}
