/**
 * MCP HTTP Transport Implementation
 *
 * POSTs each JSON-RPC message to the server URL and hands the JSON reply to
 * the client. Backoff lives in the client; non-2xx replies surface here as
 * TransportError with the HTTP status.
 */

import {
  parseJSONRPCResponse,
  type MCPTransport,
  type JSONRPCRequest,
  type JSONRPCResponse,
} from "../types.js";
import { MCPConnectionError, MCPProtocolError, MCPTimeoutError, TransportError } from "../errors.js";
import { resolveToken } from "../../config/env.js";

/**
 * HTTP transport configuration
 */
export interface HTTPTransportConfig {
  /** Server URL */
  url: string;
  /** Authentication configuration */
  auth?: {
    type: "bearer" | "apikey";
    /** Token value (or loaded from tokenEnv) */
    token?: string;
    /** Environment variable containing token */
    tokenEnv?: string;
    /** API key header name (for apikey auth) */
    headerName?: string;
  };
  /** Custom headers */
  headers?: Record<string, string>;
  /** Timeout for the connection check */
  connectTimeout?: number;
  /** Timeout per POST */
  requestTimeout?: number;
}

/**
 * HTTP transport for MCP communication
 */
export class HTTPTransport implements MCPTransport {
  private messageCallback: ((message: JSONRPCResponse) => void) | null = null;
  private errorCallback: ((error: Error) => void) | null = null;
  private closeCallback: (() => void) | null = null;
  private connected = false;
  private pendingRequests = new Map<string | number, AbortController>();

  constructor(private readonly config: HTTPTransportConfig) {}

  /**
   * Build request headers
   */
  buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      Accept: "application/json",
      ...this.config.headers,
    };

    const auth = this.config.auth;
    const token = auth ? resolveToken(auth) : undefined;
    if (token && auth) {
      switch (auth.type) {
        case "bearer":
          headers["Authorization"] = `Bearer ${token}`;
          break;
        case "apikey":
          headers[auth.headerName || "X-API-Key"] = token;
          break;
      }
    }

    return headers;
  }

  /**
   * Connect to the HTTP transport
   */
  async connect(): Promise<void> {
    if (this.connected) {
      throw new MCPConnectionError("Transport already connected");
    }

    try {
      new URL(this.config.url);
    } catch {
      throw new MCPConnectionError(`Invalid URL: ${this.config.url}`);
    }

    // Probe the endpoint; POST-only endpoints answer GET with 404/405
    try {
      const response = await fetch(this.config.url, {
        method: "GET",
        headers: this.buildHeaders(),
        signal: AbortSignal.timeout(this.config.connectTimeout ?? 10000),
      });

      if (!response.ok && response.status !== 404 && response.status !== 405) {
        throw new TransportError(`HTTP ${response.status}: ${response.statusText}`, {
          statusCode: response.status,
        });
      }

      this.connected = true;
    } catch (error) {
      const connError =
        error instanceof TransportError
          ? error
          : new MCPConnectionError(
              `Failed to connect: ${error instanceof Error ? error.message : "Unknown error"}`,
              { cause: error instanceof Error ? error : undefined },
            );
      this.errorCallback?.(connError);
      throw connError;
    }
  }

  /**
   * Send a message through the transport
   */
  async send(message: JSONRPCRequest): Promise<void> {
    if (!this.connected) {
      throw new TransportError("Transport not connected");
    }

    const abortController = new AbortController();
    this.pendingRequests.set(message.id, abortController);
    const timeout = this.config.requestTimeout ?? 60000;
    const timeoutId = setTimeout(() => abortController.abort(), timeout);

    try {
      let response: Response;
      try {
        response = await fetch(this.config.url, {
          method: "POST",
          headers: this.buildHeaders(),
          body: JSON.stringify(message),
          signal: abortController.signal,
        });
      } catch (error) {
        if (abortController.signal.aborted) {
          throw new MCPTimeoutError(`HTTP request timed out after ${timeout}ms`);
        }
        throw new MCPConnectionError(
          `HTTP request failed: ${error instanceof Error ? error.message : String(error)}`,
          { cause: error instanceof Error ? error : undefined },
        );
      }

      if (!response.ok) {
        throw new TransportError(`HTTP error ${response.status}: ${response.statusText}`, {
          statusCode: response.status,
        });
      }

      const body = await response.text();
      // Notifications may be acknowledged with an empty body
      if (!body.trim()) return;

      let decoded: unknown;
      try {
        decoded = JSON.parse(body);
      } catch {
        throw new MCPProtocolError(`Invalid JSON reply: ${body.slice(0, 200)}`);
      }

      const reply = parseJSONRPCResponse(decoded);
      if (!reply) {
        throw new MCPProtocolError("Reply is not a JSON-RPC response");
      }
      this.messageCallback?.(reply);
    } finally {
      clearTimeout(timeoutId);
      this.pendingRequests.delete(message.id);
    }
  }

  /**
   * Disconnect from the transport
   */
  async disconnect(): Promise<void> {
    for (const [, controller] of this.pendingRequests) {
      controller.abort();
    }
    this.pendingRequests.clear();

    this.connected = false;
    this.closeCallback?.();
  }

  /**
   * Set callback for received messages
   */
  onMessage(callback: (message: JSONRPCResponse) => void): void {
    this.messageCallback = callback;
  }

  /**
   * Set callback for errors
   */
  onError(callback: (error: Error) => void): void {
    this.errorCallback = callback;
  }

  /**
   * Set callback for connection close
   */
  onClose(callback: () => void): void {
    this.closeCallback = callback;
  }

  /**
   * Check if transport is connected
   */
  isConnected(): boolean {
    return this.connected;
  }
}
