/**
 * Aggregated context types
 */

import type { KnowledgeContext, TicketContext } from "../knowledge/types.js";
import type { RepositoryContext } from "../repository/types.js";

/**
 * The final merge of everything gathered for one ticket. Built once per run
 * and never mutated afterwards.
 */
export interface AggregatedContext {
  ticketKey: string;
  /** ISO timestamp supplied by the caller */
  generatedAt: string;
  ticket: TicketContext;
  knowledge: KnowledgeContext;
  repository: RepositoryContext | null;
  /** Every non-fatal problem met on the way, in the order it happened */
  errors: string[];
}
