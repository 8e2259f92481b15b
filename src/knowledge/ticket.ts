/**
 * Ticket intake
 */

import type { Logger, ILogObj } from "tslog";
import type { DocumentTransport } from "../mcp/types.js";
import type { TicketContext } from "./types.js";
import { parseComments, parseTicketMarkdown } from "./parsers.js";
import { TOOLS } from "./queries.js";
import { errorMessage } from "../utils/errors.js";
import { getLogger } from "../utils/logger.js";

export interface TicketFetchResult {
  ticket: TicketContext;
  /** Non-fatal problems, e.g. comments that could not be read */
  errors: string[];
}

/**
 * Fetch and parse a ticket. A failure to read the ticket itself propagates;
 * comments are best-effort.
 */
export async function fetchTicket(
  transport: DocumentTransport,
  key: string,
  logger: Logger<ILogObj> = getLogger(),
): Promise<TicketFetchResult> {
  const issue = await transport.invoke(TOOLS.getIssue, { issue_key: key });
  const ticket = parseTicketMarkdown(key, issue);
  const errors: string[] = [];

  try {
    const comments = await transport.invoke(TOOLS.getComments, { issue_key: key });
    ticket.comments = parseComments(comments);
  } catch (error) {
    logger.warn(`Could not read comments for ${key}: ${errorMessage(error)}`);
    errors.push(`Comments unavailable for ${key}: ${errorMessage(error)}`);
  }

  logger.info({ event: "ticket_fetched", key, comments: ticket.comments.length });
  return { ticket, errors };
}
