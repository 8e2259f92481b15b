/**
 * MCP Tool Client
 *
 * Runs named operations (tools/call) against one MCP server and returns the
 * text of the reply.
 */

import type { Logger, ILogObj } from "tslog";
import {
  MCPCallToolResultSchema,
  type DocumentTransport,
  type MCPTransport,
  type MCPInitializeParams,
  type JSONRPCRequest,
  type JSONRPCResponse,
} from "./types.js";
import { MCPConnectionError, MCPProtocolError, MCPTimeoutError, TransportError } from "./errors.js";
import type { RateLimiter } from "./rate-limiter.js";
import { sleep as defaultSleep } from "../utils/async.js";
import { createChildLogger, getLogger } from "../utils/logger.js";
import { VERSION } from "../version.js";

/**
 * Default request timeout in milliseconds
 */
const DEFAULT_REQUEST_TIMEOUT = 60000;

const PROTOCOL_VERSION = "2024-11-05";

export interface MCPToolClientOptions {
  /** Injected per-upstream limiter; every invoke acquires one token first */
  rateLimiter: RateLimiter;
  /** Label used in logs */
  serverName?: string;
  requestTimeout?: number;
  /** Backoff retries for statuses in `retryOn` */
  maxRetries?: number;
  baseDelayMs?: number;
  retryOn?: number[];
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger<ILogObj>;
}

interface PendingRequest {
  resolve: (value: unknown) => void;
  reject: (error: Error) => void;
  timeout: ReturnType<typeof setTimeout>;
}

/**
 * Delay before retry number `attempt` (0-based)
 */
export function backoffDelay(attempt: number, baseDelayMs: number): number {
  return baseDelayMs * 2 ** attempt;
}

/**
 * MCP client exposing the DocumentTransport boundary
 */
export class MCPToolClient implements DocumentTransport {
  private requestId = 0;
  private pendingRequests = new Map<string | number, PendingRequest>();
  private initializing: Promise<void> | null = null;
  private initialized = false;

  private readonly serverName: string;
  private readonly requestTimeout: number;
  private readonly maxRetries: number;
  private readonly baseDelayMs: number;
  private readonly retryOn: ReadonlySet<number>;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger<ILogObj>;

  constructor(
    private readonly transport: MCPTransport,
    private readonly options: MCPToolClientOptions,
  ) {
    this.serverName = options.serverName ?? "mcp";
    this.requestTimeout = options.requestTimeout ?? DEFAULT_REQUEST_TIMEOUT;
    this.maxRetries = options.maxRetries ?? 3;
    this.baseDelayMs = options.baseDelayMs ?? 1000;
    this.retryOn = new Set(options.retryOn ?? [429, 503]);
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? createChildLogger(getLogger(), "transport");
    this.setupTransportHandlers();
  }

  /**
   * Setup transport message handlers
   */
  private setupTransportHandlers(): void {
    this.transport.onMessage((message) => {
      this.handleMessage(message);
    });

    this.transport.onError((error) => {
      this.rejectAllPending(error);
    });

    this.transport.onClose(() => {
      this.initialized = false;
      this.rejectAllPending(new MCPConnectionError("Connection closed"));
    });
  }

  /**
   * Handle incoming messages from transport
   */
  private handleMessage(message: JSONRPCResponse): void {
    const pending = this.pendingRequests.get(message.id);
    if (!pending) return;

    clearTimeout(pending.timeout);
    this.pendingRequests.delete(message.id);

    if (message.error) {
      pending.reject(
        new MCPProtocolError(message.error.message, {
          rpcCode: message.error.code,
          statusCode: statusFromErrorData(message.error.data),
        }),
      );
    } else {
      pending.resolve(message.result);
    }
  }

  /**
   * Reject all pending requests
   */
  private rejectAllPending(error: Error): void {
    for (const [, pending] of this.pendingRequests) {
      clearTimeout(pending.timeout);
      pending.reject(error);
    }
    this.pendingRequests.clear();
  }

  /**
   * Send a request and wait for its result
   */
  private async sendRequest(method: string, params?: Record<string, unknown>): Promise<unknown> {
    if (!this.transport.isConnected()) {
      throw new MCPConnectionError("Transport not connected");
    }

    const id = ++this.requestId;
    const request: JSONRPCRequest = {
      jsonrpc: "2.0",
      id,
      method,
      params,
    };

    return new Promise<unknown>((resolve, reject) => {
      const timeout = setTimeout(() => {
        this.pendingRequests.delete(id);
        reject(new MCPTimeoutError(`Request '${method}' timed out after ${this.requestTimeout}ms`));
      }, this.requestTimeout);

      this.pendingRequests.set(id, { resolve, reject, timeout });

      this.transport.send(request).catch((error: unknown) => {
        clearTimeout(timeout);
        this.pendingRequests.delete(id);
        reject(
          error instanceof Error ? error : new TransportError(`Send failed: ${String(error)}`),
        );
      });
    });
  }

  /**
   * Connect and run the initialize handshake once
   */
  async initialize(): Promise<void> {
    if (this.initialized) return;
    this.initializing ??= this.runInitialize().finally(() => {
      this.initializing = null;
    });
    return this.initializing;
  }

  private async runInitialize(): Promise<void> {
    if (!this.transport.isConnected()) {
      await this.transport.connect();
    }

    const params: MCPInitializeParams = {
      protocolVersion: PROTOCOL_VERSION,
      capabilities: {},
      clientInfo: { name: "ticketplan", version: VERSION },
    };
    await this.sendRequest("initialize", params);

    await this.transport.send({
      jsonrpc: "2.0",
      id: ++this.requestId,
      method: "notifications/initialized",
    });

    this.initialized = true;
    this.logger.debug({ server: this.serverName, event: "initialized" });
  }

  /**
   * Run a named operation and return the joined text content of its result
   */
  async invoke(operation: string, args: Record<string, unknown>): Promise<string> {
    await this.initialize();

    for (let attempt = 0; ; attempt++) {
      try {
        await this.options.rateLimiter.acquire();
        const result = await this.sendRequest("tools/call", { name: operation, arguments: args });
        return extractText(operation, result);
      } catch (error) {
        if (!this.shouldRetry(error, attempt)) throw error;

        const delay = backoffDelay(attempt, this.baseDelayMs);
        this.logger.warn(
          `${this.serverName}: '${operation}' failed with status ${statusOf(error)}, ` +
            `retrying in ${delay}ms (attempt ${attempt + 1}/${this.maxRetries})`,
        );
        await this.sleep(delay);
      }
    }
  }

  private shouldRetry(error: unknown, attempt: number): boolean {
    const status = statusOf(error);
    return status !== undefined && this.retryOn.has(status) && attempt < this.maxRetries;
  }

  /**
   * Close the client connection
   */
  async close(): Promise<void> {
    this.initialized = false;
    await this.transport.disconnect();
  }

  /**
   * Check if client is connected
   */
  isConnected(): boolean {
    return this.transport.isConnected() && this.initialized;
  }
}

function statusOf(error: unknown): number | undefined {
  return error instanceof TransportError ? error.statusCode : undefined;
}

function statusFromErrorData(data: unknown): number | undefined {
  if (typeof data === "object" && data !== null && "status" in data) {
    return typeof data.status === "number" ? data.status : undefined;
  }
  return undefined;
}

/**
 * Join the text items of a tool result; error results and results without
 * text become protocol errors
 */
export function extractText(operation: string, result: unknown): string {
  const parsed = MCPCallToolResultSchema.safeParse(result);
  if (!parsed.success) {
    throw new MCPProtocolError(`Malformed result for '${operation}'`);
  }

  const texts = parsed.data.content
    .filter((item) => item.type === "text")
    .map((item) => item.text)
    .filter((text): text is string => text !== undefined);

  if (parsed.data.isError) {
    throw new MCPProtocolError(`Tool '${operation}' failed: ${texts.join("\n") || "no details"}`);
  }
  if (texts.length === 0) {
    throw new MCPProtocolError(`Tool '${operation}' returned no text content`);
  }
  return texts.join("\n");
}
