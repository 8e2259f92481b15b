/**
 * MCP Stdio Transport Implementation
 *
 * Spawns a tool server and exchanges line-delimited JSON-RPC over its stdio.
 */

import { spawn, type ChildProcess } from "node:child_process";
import { StringDecoder } from "node:string_decoder";
import type { Logger, ILogObj } from "tslog";
import {
  parseJSONRPCResponse,
  type MCPTransport,
  type JSONRPCRequest,
  type JSONRPCResponse,
  type StdioTransportConfig,
} from "../types.js";
import { MCPConnectionError, MCPProtocolError, TransportError } from "../errors.js";
import { createChildLogger, getLogger } from "../../utils/logger.js";

const DEFAULT_CONNECT_TIMEOUT = 10000;
const STDERR_TAIL_LINES = 20;

/**
 * Stdio transport for MCP communication
 */
export class StdioTransport implements MCPTransport {
  private process: ChildProcess | null = null;
  private messageCallback: ((message: JSONRPCResponse) => void) | null = null;
  private errorCallback: ((error: Error) => void) | null = null;
  private closeCallback: (() => void) | null = null;
  private buffer = "";
  private stderrTail: string[] = [];
  // Chunks can end inside a multibyte character
  private stdoutDecoder = new StringDecoder("utf8");
  private stderrDecoder = new StringDecoder("utf8");
  private connected = false;
  private readonly logger: Logger<ILogObj>;

  constructor(
    private readonly config: StdioTransportConfig,
    logger?: Logger<ILogObj>,
  ) {
    this.logger = logger ?? createChildLogger(getLogger(), "stdio");
  }

  /**
   * Connect to the stdio transport by spawning the process
   */
  async connect(): Promise<void> {
    if (this.connected) {
      throw new MCPConnectionError("Transport already connected");
    }
    this.stdoutDecoder = new StringDecoder("utf8");
    this.stderrDecoder = new StringDecoder("utf8");

    return new Promise((resolve, reject) => {
      const { command, args = [], env, cwd } = this.config;
      const connectTimeout = this.config.connectTimeout ?? DEFAULT_CONNECT_TIMEOUT;

      const timer = setTimeout(() => {
        this.process?.kill("SIGTERM");
        reject(new MCPConnectionError(`Timed out spawning '${command}' after ${connectTimeout}ms`));
      }, connectTimeout);

      this.process = spawn(command, args, {
        stdio: ["pipe", "pipe", "pipe"],
        env: { ...process.env, ...env },
        cwd,
      });

      this.process.on("error", (error) => {
        clearTimeout(timer);
        reject(new MCPConnectionError(`Failed to spawn process: ${error.message}`, { cause: error }));
      });

      this.process.on("spawn", () => {
        clearTimeout(timer);
        this.connected = true;
        this.setupHandlers();
        resolve();
      });

      this.process.stderr?.on("data", (data: Buffer) => {
        // Servers log to stderr; not an error
        const text = this.stderrDecoder.write(data).trimEnd();
        if (!text) return;
        this.logger.debug(`[${command} stderr]: ${text}`);
        this.rememberStderr(text);
      });
    });
  }

  /**
   * Setup data handlers for the process
   */
  private setupHandlers(): void {
    if (!this.process?.stdout) return;

    this.process.stdout.on("data", (data: Buffer) => {
      this.handleData(this.stdoutDecoder.write(data));
    });

    this.process.on("exit", (code) => {
      this.connected = false;
      if (code !== 0 && code !== null) {
        const last = this.stderrTail.at(-1);
        const detail = last ? `: ${last}` : "";
        this.errorCallback?.(new TransportError(`Process exited with code ${code}${detail}`));
      }
      this.closeCallback?.();
    });
  }

  /**
   * Last stderr lines of the server, newest last
   */
  recentStderr(): readonly string[] {
    return this.stderrTail;
  }

  private rememberStderr(text: string): void {
    const lines = text.split("\n").filter((l) => l.trim().length > 0);
    this.stderrTail = [...this.stderrTail, ...lines].slice(-STDERR_TAIL_LINES);
  }

  /**
   * Handle incoming stdout text; JSON-RPC messages are line-delimited
   */
  handleData(chunk: string): void {
    this.buffer += chunk;

    const lines = this.buffer.split("\n");
    this.buffer = lines.pop() ?? "";

    for (const line of lines) {
      const trimmed = line.trim();
      if (!trimmed) continue;

      let decoded: unknown;
      try {
        decoded = JSON.parse(trimmed);
      } catch {
        this.errorCallback?.(new MCPProtocolError(`Invalid JSON: ${trimmed}`));
        continue;
      }

      const message = parseJSONRPCResponse(decoded);
      if (message) {
        this.messageCallback?.(message);
      } else {
        this.logger.debug(`Ignoring non-response message: ${trimmed}`);
      }
    }
  }

  /**
   * Send a message through the transport
   */
  async send(message: JSONRPCRequest): Promise<void> {
    const stdin = this.process?.stdin;
    if (!this.connected || !stdin) {
      throw new TransportError("Transport not connected");
    }

    const line = JSON.stringify(message) + "\n";

    return new Promise((resolve, reject) => {
      const canWrite = stdin.write(line, (error) => {
        if (error) {
          reject(new TransportError(`Write error: ${error.message}`, { cause: error }));
        } else if (canWrite) {
          resolve();
        }
      });

      if (!canWrite) {
        stdin.once("drain", () => resolve());
      }
    });
  }

  /**
   * Disconnect from the transport
   */
  async disconnect(): Promise<void> {
    const child = this.process;
    if (!child) return;

    return new Promise((resolve) => {
      if (child.exitCode !== null || !this.connected) {
        this.process = null;
        this.connected = false;
        resolve();
        return;
      }

      const timeout = setTimeout(() => {
        child.kill("SIGTERM");
      }, 5000);

      child.once("close", () => {
        clearTimeout(timeout);
        this.connected = false;
        this.process = null;
        resolve();
      });

      child.stdin?.end();
    });
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
