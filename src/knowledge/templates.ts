/**
 * Documentation templates
 *
 * A space may hold one "<role> Template" page per mandatory document. When
 * found, the plan is told to follow its structure for DOCS steps. A shared
 * templates space is searched after the project's own.
 */

import type { Logger, ILogObj } from "tslog";
import type { DocumentTransport } from "../mcp/types.js";
import type { DocumentTemplate, DocumentRole } from "./types.js";
import { DOCUMENT_ROLES } from "./types.js";
import { parsePageContent, parseSearchResults } from "./parsers.js";
import { TOOLS, templateQuery } from "./queries.js";
import { errorMessage } from "../utils/errors.js";
import { getLogger } from "../utils/logger.js";

export interface TemplateOptions {
  /** Shared space searched when the project space has no template */
  hubSpace?: string;
  logger?: Logger<ILogObj>;
}

/**
 * Fetch the template of each mandatory role. Failures are logged and the
 * role is skipped; they never reach the run's warnings.
 */
export async function retrieveTemplates(
  transport: DocumentTransport,
  space: string,
  options: TemplateOptions = {},
): Promise<DocumentTemplate[]> {
  const logger = options.logger ?? getLogger();
  const spaces = [...new Set([space, options.hubSpace ?? ""].filter(Boolean))];
  if (spaces.length === 0) return [];

  const templates: DocumentTemplate[] = [];
  for (const role of DOCUMENT_ROLES) {
    const template = await findTemplate(transport, spaces, role, logger);
    if (template) templates.push(template);
  }

  if (templates.length > 0) {
    logger.info({ event: "templates_fetched", templates: templates.map((t) => t.title) });
  } else {
    logger.info("No documentation templates found, using the default page layout");
  }
  return templates;
}

async function findTemplate(
  transport: DocumentTransport,
  spaces: readonly string[],
  role: DocumentRole,
  logger: Logger<ILogObj>,
): Promise<DocumentTemplate | null> {
  for (const space of spaces) {
    try {
      const page = parseSearchResults(
        await transport.invoke(TOOLS.searchPages, { cql: templateQuery(space, role), limit: 1 }),
      )[0];
      if (!page) continue;

      const content = parsePageContent(await transport.invoke(TOOLS.getPage, { page_id: page.id }));
      if (!content) {
        logger.debug(`Template '${page.title}' in ${space} is empty`);
        continue;
      }
      return { role, id: page.id, title: page.title, url: page.url, content };
    } catch (error) {
      logger.warn(`${role} template lookup in ${space} failed: ${errorMessage(error)}`);
    }
  }
  return null;
}
