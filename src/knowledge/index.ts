/**
 * Knowledge resolution and retrieval
 */

export type {
  DocumentationMaturity,
  DocumentRole,
  DocumentTemplate,
  KnowledgeContext,
  ResolvedLocation,
  RetrievedDocument,
  SearchCandidate,
  SelectionLog,
  TicketComment,
  TicketContext,
} from "./types.js";
export { DOCUMENT_ROLES, effectiveMaturity } from "./types.js";

export {
  parseTicketKey,
  parseTicketMarkdown,
  parseComments,
  parseSearchResults,
  parsePageContent,
  extractContainerId,
  extractSpaceKey,
  deriveSpace,
} from "./parsers.js";
export { fetchTicket } from "./ticket.js";
export type { TicketFetchResult } from "./ticket.js";
export { resolveLocation } from "./resolver.js";
export type { LocationRequest } from "./resolver.js";
export { fetchMandatoryDocuments, MANDATORY_KEYWORDS } from "./mandatory.js";
export type { MandatoryFetchResult } from "./mandatory.js";
export { PatternKeywordExtractor } from "./keywords.js";
export type { KeywordExtractor } from "./keywords.js";
export {
  discoverDocuments,
  formatSelectionLog,
  parseSelection,
  stripCodeFence,
} from "./discovery.js";
export type { DiscoveryResult } from "./discovery.js";
export { retrieveTemplates } from "./templates.js";
export type { TemplateOptions } from "./templates.js";
export { retrieveKnowledge } from "./retrieve.js";
export type { RetrieveOptions } from "./retrieve.js";
