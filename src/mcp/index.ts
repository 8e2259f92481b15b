/**
 * MCP (Model Context Protocol) Module
 *
 * Tool-server clients for the ticket tracker and the document store.
 *
 * @example
 * ```typescript
 * import { createServerClient } from './mcp/index.js';
 *
 * const documents = createServerClient('documents', config.servers.documents, config.transport);
 * const text = await documents.invoke('confluence_get_page', { page_id: '501' });
 * await documents.close();
 * ```
 */

// Types
export type {
  DocumentTransport,
  MCPTransport,
  StdioTransportConfig,
  MCPCallToolResult,
  JSONRPCRequest,
  JSONRPCResponse,
  JSONRPCError,
} from "./types.js";

export { MCPErrorCode } from "./types.js";

// Errors
export {
  MCPError,
  TransportError,
  MCPConnectionError,
  MCPTimeoutError,
  MCPProtocolError,
} from "./errors.js";

// Transport implementations
export { StdioTransport } from "./transport/stdio.js";
export { HTTPTransport } from "./transport/http.js";
export type { HTTPTransportConfig } from "./transport/http.js";

// Client
export { MCPToolClient, backoffDelay } from "./client.js";
export type { MCPToolClientOptions } from "./client.js";
export { TokenBucketRateLimiter } from "./rate-limiter.js";
export type { RateLimiter, TokenBucketOptions } from "./rate-limiter.js";
export { createServerClient, createTransport } from "./connect.js";
