/**
 * MCP (Model Context Protocol) Errors
 */

import { PlannerError } from "../utils/errors.js";
import { MCPErrorCode } from "./types.js";

/**
 * Base MCP Error class
 */
export class MCPError extends PlannerError {
  /** JSON-RPC error code, either from the server or one of MCPErrorCode */
  readonly rpcCode: number;

  constructor(
    rpcCode: number,
    message: string,
    options: { context?: Record<string, unknown>; cause?: Error } = {},
  ) {
    super(message, {
      code: "TRANSPORT_ERROR",
      context: { rpcCode, ...options.context },
      recoverable: false,
      cause: options.cause,
    });
    this.name = "MCPError";
    this.rpcCode = rpcCode;
  }
}

/**
 * A named operation failed: transport failure or malformed reply.
 * `statusCode` carries an HTTP-equivalent status when one is known.
 */
export class TransportError extends MCPError {
  readonly statusCode?: number;

  constructor(
    message: string,
    options: { statusCode?: number; rpcCode?: number; cause?: Error } = {},
  ) {
    super(options.rpcCode ?? MCPErrorCode.TRANSPORT_ERROR, message, {
      context: { statusCode: options.statusCode },
      cause: options.cause,
    });
    this.name = "TransportError";
    this.statusCode = options.statusCode;
  }
}

/**
 * Connection error - occurs when connection fails
 */
export class MCPConnectionError extends TransportError {
  constructor(message: string, options: { cause?: Error } = {}) {
    super(message, { rpcCode: MCPErrorCode.CONNECTION_ERROR, cause: options.cause });
    this.name = "MCPConnectionError";
  }
}

/**
 * Timeout error - occurs when request times out
 */
export class MCPTimeoutError extends TransportError {
  constructor(message: string = "Request timed out") {
    super(message, { rpcCode: MCPErrorCode.TIMEOUT_ERROR });
    this.name = "MCPTimeoutError";
  }
}

/**
 * Malformed JSON-RPC reply, or a tool result flagged as an error
 */
export class MCPProtocolError extends TransportError {
  constructor(message: string, options: { rpcCode?: number; statusCode?: number } = {}) {
    super(message, {
      rpcCode: options.rpcCode ?? MCPErrorCode.PROTOCOL_ERROR,
      statusCode: options.statusCode,
    });
    this.name = "MCPProtocolError";
  }
}
