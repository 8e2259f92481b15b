/**
 * Knowledge retrieval types for ticketplan
 */

/**
 * How complete a project's documentation is. Drives every later branch.
 */
export type DocumentationMaturity =
  | "EXISTING"
  | "INCOMPLETE"
  | "NEW_PROJECT"
  | "BRAND_NEW"
  | "NOT_FOUND";

/**
 * A comment on a ticket
 */
export interface TicketComment {
  author: string;
  created: string;
  body: string;
}

/**
 * Ticket fields parsed once per run
 */
export interface TicketContext {
  key: string;
  summary: string;
  description: string;
  type: string;
  status: string;
  projectKey: string;
  projectName: string;
  assignee: string | null;
  labels: string[];
  parent: string | null;
  subtasks: string[];
  created: string | null;
  updated: string | null;
  comments: TicketComment[];
  /** Human-readable documentation folder name, "" when absent */
  projectFolder: string;
  /** Direct documentation locator (URL), "" when absent */
  projectLink: string;
}

/**
 * Where the project's documentation lives
 */
export interface ResolvedLocation {
  containerId: string | null;
  maturity: DocumentationMaturity;
  space: string;
}

/**
 * A document retrieved with its full text
 */
export interface RetrievedDocument {
  id: string;
  title: string;
  url: string;
  content: string;
}

/**
 * One search hit offered to the rerank call
 */
export interface SearchCandidate {
  id: string;
  title: string;
  url: string;
  excerpt: string;
}

/**
 * Audit record of one rerank call. Kept even when the call fails.
 */
export interface SelectionLog {
  systemPrompt: string;
  userPrompt: string;
  candidates: SearchCandidate[];
  rawResponse: string;
  /** Ids accepted: selected by the model and present among the candidates */
  selectedIds: string[];
  /** Ids the model returned that were never offered */
  ignoredIds: string[];
  model: string;
  tokensIn: number;
  tokensOut: number;
  error?: string;
}

/**
 * The two documents a mature project is expected to have
 */
export type DocumentRole = "Project Passport" | "Logical Architecture";

export const DOCUMENT_ROLES: readonly DocumentRole[] = ["Project Passport", "Logical Architecture"];

/**
 * A page whose structure new documentation pages of its role must follow
 */
export interface DocumentTemplate extends RetrievedDocument {
  role: DocumentRole;
}

/**
 * Everything retrieved from the document store for one ticket
 */
export interface KnowledgeContext {
  space: string;
  containerId: string | null;
  maturity: DocumentationMaturity;
  mandatory: RetrievedDocument[];
  discovered: RetrievedDocument[];
  missing: DocumentRole[];
  selectionLog: SelectionLog | null;
  templates: DocumentTemplate[];
  errors: string[];
}

/**
 * Maturity as presented downstream: a partially documented project on the
 * EXISTING track is reported as INCOMPLETE.
 */
export function effectiveMaturity(
  maturity: DocumentationMaturity,
  missing: readonly DocumentRole[],
): DocumentationMaturity {
  return maturity === "EXISTING" && missing.length > 0 ? "INCOMPLETE" : maturity;
}
