/**
 * In-process document transport for tests
 */

import type { DocumentTransport } from "../../src/mcp/types.js";
import { TransportError } from "../../src/mcp/errors.js";

export type ToolArgs = Record<string, unknown>;

export type ScriptedReply = string | Error | ((args: ToolArgs) => string);

interface Route {
  operation: string;
  matches: (args: ToolArgs) => boolean;
  reply: ScriptedReply;
}

/**
 * Scripted transport. Routes are matched in registration order; an
 * unmatched call fails with a TransportError.
 */
export class FakeTransport implements DocumentTransport {
  private readonly routes: Route[] = [];
  readonly calls: Array<{ operation: string; args: ToolArgs }> = [];

  on(operation: string, reply: ScriptedReply, matches: (args: ToolArgs) => boolean = () => true): this {
    this.routes.push({ operation, matches, reply });
    return this;
  }

  /**
   * Reply to `confluence_search_pages` calls whose query contains `fragment`
   */
  onSearch(fragment: string, reply: ScriptedReply): this {
    return this.on("confluence_search_pages", reply, cqlContains(fragment));
  }

  onPage(pageId: string, reply: ScriptedReply): this {
    return this.on("confluence_get_page", reply, (args) => args["page_id"] === pageId);
  }

  async invoke(operation: string, args: ToolArgs): Promise<string> {
    this.calls.push({ operation, args });

    const route = this.routes.find((r) => r.operation === operation && r.matches(args));
    if (!route) {
      throw new TransportError(`No scripted reply for ${operation} ${JSON.stringify(args)}`);
    }
    if (route.reply instanceof Error) {
      throw route.reply;
    }
    return typeof route.reply === "function" ? route.reply(args) : route.reply;
  }

  callsTo(operation: string): ToolArgs[] {
    return this.calls.filter((c) => c.operation === operation).map((c) => c.args);
  }

  /** Queries sent to `confluence_search_pages`, in order */
  get queries(): string[] {
    return this.callsTo("confluence_search_pages").map((args) => String(args["cql"]));
  }
}

export function cqlContains(fragment: string): (args: ToolArgs) => boolean {
  return (args) => typeof args["cql"] === "string" && args["cql"].includes(fragment);
}
