/**
 * MCP (Model Context Protocol) Types
 *
 * The ticket tracker and the document store are reached as MCP tool servers
 * over JSON-RPC 2.0.
 */

import { z } from "zod";

/**
 * JSON-RPC 2.0 Request
 */
export interface JSONRPCRequest {
  jsonrpc: "2.0";
  id: string | number;
  method: string;
  params?: Record<string, unknown>;
}

/**
 * JSON-RPC 2.0 Response
 */
export interface JSONRPCResponse {
  jsonrpc: "2.0";
  id: string | number;
  result?: unknown;
  error?: JSONRPCError;
}

/**
 * JSON-RPC 2.0 Error
 */
export interface JSONRPCError {
  code: number;
  message: string;
  data?: unknown;
}

/**
 * Runtime shape of an incoming JSON-RPC response
 */
export const JSONRPCResponseSchema = z.object({
  jsonrpc: z.literal("2.0"),
  id: z.union([z.string(), z.number()]),
  result: z.unknown().optional(),
  error: z
    .object({
      code: z.number(),
      message: z.string(),
      data: z.unknown().optional(),
    })
    .optional(),
});

/**
 * Runtime shape of a tools/call result
 */
export const MCPCallToolResultSchema = z.object({
  content: z.array(
    z
      .object({
        type: z.string(),
        text: z.string().optional(),
      })
      .passthrough(),
  ),
  isError: z.boolean().optional(),
});

/**
 * Validate a decoded message as a JSON-RPC response; null for anything else
 * (server notifications, garbage)
 */
export function parseJSONRPCResponse(value: unknown): JSONRPCResponse | null {
  const result = JSONRPCResponseSchema.safeParse(value);
  return result.success ? result.data : null;
}

/**
 * MCP Server information
 */
export interface MCPServerInfo {
  name: string;
  version: string;
}

/**
 * MCP initialize params
 */
export interface MCPInitializeParams {
  protocolVersion: string;
  capabilities: Record<string, unknown>;
  clientInfo: MCPServerInfo;
  [key: string]: unknown;
}

/**
 * MCP Call Tool params
 */
export interface MCPCallToolParams {
  name: string;
  arguments?: Record<string, unknown>;
  [key: string]: unknown;
}

/**
 * One content item of a tool result
 */
export interface MCPContentItem {
  type: string;
  text?: string;
}

/**
 * MCP Call Tool result
 */
export interface MCPCallToolResult {
  content: MCPContentItem[];
  isError?: boolean;
}

/**
 * Transport interface for MCP communication
 */
export interface MCPTransport {
  /** Connect to the transport */
  connect(): Promise<void>;

  /** Disconnect from the transport */
  disconnect(): Promise<void>;

  /** Send a message through the transport */
  send(message: JSONRPCRequest): Promise<void>;

  /** Set callback for received messages */
  onMessage(callback: (message: JSONRPCResponse) => void): void;

  /** Set callback for errors */
  onError(callback: (error: Error) => void): void;

  /** Set callback for connection close */
  onClose(callback: () => void): void;

  /** Check if transport is connected */
  isConnected(): boolean;
}

/**
 * Named-operation boundary used by the pipeline: run one operation against a
 * ticket or document server and return its text reply.
 */
export interface DocumentTransport {
  invoke(operation: string, args: Record<string, unknown>): Promise<string>;
}

/**
 * Stdio transport configuration
 */
export interface StdioTransportConfig {
  /** Command to execute */
  command: string;
  /** Arguments for the command */
  args?: string[];
  /** Environment variables */
  env?: Record<string, string>;
  /** Working directory */
  cwd?: string;
  /** Time allowed for the process to spawn */
  connectTimeout?: number;
}

/**
 * MCP Error codes
 */
export enum MCPErrorCode {
  // JSON-RPC standard errors
  PARSE_ERROR = -32700,
  INVALID_REQUEST = -32600,
  METHOD_NOT_FOUND = -32601,
  INVALID_PARAMS = -32602,
  INTERNAL_ERROR = -32603,

  // Client-side errors
  INITIALIZATION_ERROR = -32000,
  TRANSPORT_ERROR = -32001,
  TIMEOUT_ERROR = -32002,
  CONNECTION_ERROR = -32003,
  PROTOCOL_ERROR = -32004,
}
