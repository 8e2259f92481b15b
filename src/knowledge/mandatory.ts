/**
 * Mandatory document fetcher
 */

import type { Logger, ILogObj } from "tslog";
import type { DocumentTransport } from "../mcp/types.js";
import type {
  DocumentRole,
  DocumentationMaturity,
  ResolvedLocation,
  RetrievedDocument,
} from "./types.js";
import { DOCUMENT_ROLES } from "./types.js";
import { parsePageContent, parseSearchResults } from "./parsers.js";
import { TOOLS, ancestorTitleQuery } from "./queries.js";
import { errorMessage } from "../utils/errors.js";
import { getLogger } from "../utils/logger.js";

/**
 * Title keywords tried in order for each role
 */
export const MANDATORY_KEYWORDS: Record<DocumentRole, readonly string[]> = {
  "Project Passport": ["Project Passport", "Passport", "Паспорт проекта"],
  "Logical Architecture": ["Logical Architecture", "System Architecture", "Архитектура"],
};

export interface MandatoryFetchResult {
  documents: RetrievedDocument[];
  missing: DocumentRole[];
  maturity: DocumentationMaturity;
  errors: string[];
}

type RoleOutcome =
  | { kind: "found"; document: RetrievedDocument }
  | { kind: "empty"; title: string }
  | { kind: "absent" };

export interface MandatoryFetchOptions {
  searchLimit?: number;
  logger?: Logger<ILogObj>;
}

/**
 * Search the resolved container for the passport and architecture pages.
 *
 * A failed search or fetch for one keyword is recorded and the next keyword
 * is tried. A page found with no content counts as missing.
 */
export async function fetchMandatoryDocuments(
  transport: DocumentTransport,
  location: ResolvedLocation,
  options: MandatoryFetchOptions = {},
): Promise<MandatoryFetchResult> {
  const logger = options.logger ?? getLogger();
  const searchLimit = options.searchLimit ?? 3;
  const containerId = location.containerId;

  if (containerId === null) {
    return {
      documents: [],
      missing: [...DOCUMENT_ROLES],
      maturity: location.maturity,
      errors: [],
    };
  }

  const errors: string[] = [];
  const outcomes = new Map<DocumentRole, RoleOutcome>();

  for (const role of DOCUMENT_ROLES) {
    outcomes.set(
      role,
      await fetchRole(transport, containerId, role, { searchLimit, logger, errors }),
    );
  }

  const documents: RetrievedDocument[] = [];
  const missing: DocumentRole[] = [];
  for (const role of DOCUMENT_ROLES) {
    const outcome = outcomes.get(role);
    if (outcome?.kind === "found") {
      documents.push(outcome.document);
    } else {
      missing.push(role);
    }
  }

  const nothingExists = DOCUMENT_ROLES.every((role) => outcomes.get(role)?.kind === "absent");
  const maturity: DocumentationMaturity = nothingExists ? "NEW_PROJECT" : location.maturity;

  logger.info({
    event: "mandatory_fetched",
    found: documents.map((d) => d.title),
    missing,
    maturity,
  });

  return { documents, missing, maturity, errors };
}

async function fetchRole(
  transport: DocumentTransport,
  containerId: string,
  role: DocumentRole,
  ctx: { searchLimit: number; logger: Logger<ILogObj>; errors: string[] },
): Promise<RoleOutcome> {
  for (const keyword of MANDATORY_KEYWORDS[role]) {
    try {
      const results = parseSearchResults(
        await transport.invoke(TOOLS.searchPages, {
          cql: ancestorTitleQuery(containerId, keyword),
          limit: ctx.searchLimit,
        }),
      );
      const page = results[0];
      if (!page) continue;

      const content = parsePageContent(await transport.invoke(TOOLS.getPage, { page_id: page.id }));
      if (!content) {
        ctx.logger.warn(`${role} page '${page.title}' has no content`);
        return { kind: "empty", title: page.title };
      }

      ctx.logger.debug(`Found ${role}: '${page.title}' via '${keyword}'`);
      return { kind: "found", document: { id: page.id, title: page.title, url: page.url, content } };
    } catch (error) {
      ctx.logger.warn(`${role} search for '${keyword}' failed: ${errorMessage(error)}`);
      ctx.errors.push(`${role} search for '${keyword}' failed: ${errorMessage(error)}`);
    }
  }
  return { kind: "absent" };
}
