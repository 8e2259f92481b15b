/**
 * Location resolution: find the documentation container for a ticket.
 *
 * Priority:
 *  1. a direct locator with a recognizable container id (no search call)
 *  2. a folder name, searched by exact then fuzzy title
 *  3. nothing supplied: BRAND_NEW
 */

import type { Logger, ILogObj } from "tslog";
import type { DocumentTransport } from "../mcp/types.js";
import type { ResolvedLocation, SearchCandidate } from "./types.js";
import { extractContainerId, extractSpaceKey, parseSearchResults } from "./parsers.js";
import { TOOLS, exactTitleQuery, fuzzyTitleQuery } from "./queries.js";
import { LocationNotFoundError, errorMessage } from "../utils/errors.js";
import { getLogger } from "../utils/logger.js";

export interface LocationRequest {
  /** Direct URL to the folder or a page in it, "" when absent */
  locator: string;
  /** Folder title, "" when absent */
  folderName: string;
  /** Space searched when the locator carries none */
  space: string;
}

const EXACT_LIMIT = 1;
const FUZZY_LIMIT = 10;

export async function resolveLocation(
  transport: DocumentTransport,
  request: LocationRequest,
  logger: Logger<ILogObj> = getLogger(),
): Promise<ResolvedLocation> {
  const { locator, folderName, space } = request;

  if (locator) {
    const containerId = extractContainerId(locator);
    if (containerId) {
      const resolvedSpace = extractSpaceKey(locator) ?? space;
      logger.info({ event: "location_resolved", via: "locator", containerId, space: resolvedSpace });
      return { containerId, maturity: "EXISTING", space: resolvedSpace };
    }
    logger.warn(`No container id in locator '${locator}'`);
  }

  if (!folderName) {
    if (locator) {
      throw new LocationNotFoundError(`Could not resolve documentation location from '${locator}'`, {
        locator,
        folderName,
        space,
      });
    }
    logger.info({ event: "location_resolved", via: "none", maturity: "BRAND_NEW" });
    return { containerId: null, maturity: "BRAND_NEW", space };
  }

  let match: SearchCandidate | undefined;
  try {
    match = await findFolder(transport, space, folderName);
  } catch (error) {
    throw new LocationNotFoundError(
      `Failed to resolve location: space=${space}, folder=${folderName}: ${errorMessage(error)}`,
      { locator, folderName, space, cause: error instanceof Error ? error : undefined },
    );
  }

  if (!match) {
    throw new LocationNotFoundError(`Folder '${folderName}' not found in space '${space}'`, {
      locator,
      folderName,
      space,
    });
  }

  logger.info({ event: "location_resolved", via: "folder", containerId: match.id, space });
  return { containerId: match.id, maturity: "EXISTING", space };
}

async function findFolder(
  transport: DocumentTransport,
  space: string,
  folderName: string,
): Promise<SearchCandidate | undefined> {
  const exact = parseSearchResults(
    await transport.invoke(TOOLS.searchPages, {
      cql: exactTitleQuery(space, folderName),
      limit: EXACT_LIMIT,
    }),
  );
  if (exact.length > 0) {
    return exact[0];
  }

  const fuzzy = parseSearchResults(
    await transport.invoke(TOOLS.searchPages, {
      cql: fuzzyTitleQuery(space, folderName),
      limit: FUZZY_LIMIT,
    }),
  );
  const wanted = folderName.toLowerCase();
  return fuzzy.find((c) => c.title.toLowerCase() === wanted) ?? fuzzy[0];
}
