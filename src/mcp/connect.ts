/**
 * Build a tool client for a configured server
 */

import type { Logger, ILogObj } from "tslog";
import type { ServerConfig, TransportConfig } from "../config/schema.js";
import { ConfigError } from "../utils/errors.js";
import { MCPToolClient } from "./client.js";
import { TokenBucketRateLimiter } from "./rate-limiter.js";
import { StdioTransport } from "./transport/stdio.js";
import { HTTPTransport } from "./transport/http.js";
import type { MCPTransport } from "./types.js";

/**
 * Create the wire transport described by a server entry
 */
export function createTransport(
  name: string,
  server: ServerConfig,
  transport: TransportConfig,
  logger?: Logger<ILogObj>,
): MCPTransport {
  switch (server.transport) {
    case "stdio":
      if (!server.command) {
        throw new ConfigError(`Server '${name}' uses stdio but has no command`, {
          issues: [{ path: `servers.${name}.command`, message: "Required for stdio transport" }],
        });
      }
      return new StdioTransport(
        {
          command: server.command,
          args: server.args,
          env: server.env,
          cwd: server.cwd,
          connectTimeout: transport.connectTimeout,
        },
        logger,
      );
    case "http":
      if (!server.url) {
        throw new ConfigError(`Server '${name}' uses http but has no url`, {
          issues: [{ path: `servers.${name}.url`, message: "Required for http transport" }],
        });
      }
      return new HTTPTransport({
        url: server.url,
        headers: server.headers,
        auth: server.auth,
        connectTimeout: transport.connectTimeout,
        requestTimeout: transport.requestTimeout,
      });
  }
}

/**
 * Create a client with its own rate limiter for one upstream server
 */
export function createServerClient(
  name: string,
  server: ServerConfig | undefined,
  transport: TransportConfig,
  logger?: Logger<ILogObj>,
): MCPToolClient {
  if (!server) {
    throw new ConfigError(`No '${name}' server configured`, {
      issues: [{ path: `servers.${name}`, message: "Required" }],
    });
  }

  return new MCPToolClient(createTransport(name, server, transport, logger), {
    rateLimiter: new TokenBucketRateLimiter({
      requestsPerSecond: transport.requestsPerSecond,
      burstSize: transport.burstSize,
    }),
    serverName: name,
    requestTimeout: transport.requestTimeout,
    maxRetries: transport.maxRetries,
    baseDelayMs: transport.baseDelayMs,
    retryOn: transport.retryOn,
    logger,
  });
}
