/**
 * HTTP Server for Sokosumi MCP
 *
 * Implements the Streamable HTTP transport in stateless mode: every POST gets
 * its own MCP Server and transport, and the caller's API key is read from
 * that request alone. Nothing about a caller outlives its request.
 */

import { Server as NodeHttpServer } from "http";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import express, { Express, NextFunction, Request, Response } from "express";
import { ApiClientFactory } from "../api/api-client.js";
import { ENVIRONMENTS } from "../api/environments.js";
import { PerCallCredentialResolver } from "../auth/credentials.js";
import { isPlainObject } from "../utils/validation.js";
import { createMcpServer } from "./handlers.js";

const DEBUG = process.env.DEBUG === '1';

const SENSITIVE_HEADERS = ["authorization", "cookie", "x-api-key"];

const REDACTED = "[REDACTED]";

export interface HttpAppOptions {
  version: string;
  clientFactory?: ApiClientFactory;
}

/**
 * Copy of the request headers that is safe to log.
 */
export function redactHeaders(headers: Request["headers"]): Record<string, string | string[] | undefined> {
  const safeHeaders: Record<string, string | string[] | undefined> = { ...headers };
  for (const header of SENSITIVE_HEADERS) {
    if (safeHeaders[header]) {
      safeHeaders[header] = REDACTED;
    }
  }
  return safeHeaders;
}

function redactMessage(message: unknown): unknown {
  if (!isPlainObject(message) || !isPlainObject(message.params)) {
    return message;
  }
  const params: Record<string, unknown> = { ...message.params };
  // _meta.authorization carries the caller's key when no header does
  const meta = params._meta;
  if (isPlainObject(meta) && meta.authorization !== undefined) {
    params._meta = { ...meta, authorization: REDACTED };
  }
  const args = params.arguments;
  if (isPlainObject(args) && args.api_key !== undefined) {
    params.arguments = { ...args, api_key: REDACTED };
  }
  return { ...message, params };
}

/**
 * Copy of a JSON-RPC request body (single message or batch) that is safe to log.
 */
export function redactBody(body: unknown): unknown {
  return Array.isArray(body) ? body.map(redactMessage) : redactMessage(body);
}

function jsonRpcError(res: Response, status: number, code: number, message: string): void {
  res.status(status).json({
    jsonrpc: "2.0",
    error: { code, message },
    id: null,
  });
}

/**
 * Build the Express app serving /mcp and /health.
 */
export function createHttpApp(options: HttpAppOptions): Express {
  const { version, clientFactory } = options;
  const app = express();

  // Trust X-Forwarded-Proto from reverse proxies (cloudflared, ngrok, etc.)
  // WARNING: Only safe if direct access to this server is blocked at the network level
  app.set("trust proxy", process.env.TRUST_PROXY !== "false");

  app.use(express.json());

  // CORS middleware - required for browser-based clients like MCP Inspector
  app.use((req: Request, res: Response, next: NextFunction) => {
    res.setHeader("Access-Control-Allow-Origin", "*");
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, DELETE, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type, Accept, Authorization, mcp-session-id, mcp-protocol-version");
    res.setHeader("Access-Control-Expose-Headers", "mcp-session-id");

    if (req.method === "OPTIONS") {
      res.status(204).end();
      return;
    }
    next();
  });

  app.get("/health", (_req: Request, res: Response) => {
    res.json({ status: "ok", version, transport: "streamable-http", mode: "stateless" });
  });

  if (DEBUG) {
    app.use("/mcp", (req: Request, _res: Response, next: NextFunction) => {
      console.error(`[MCP] ${req.method} ${req.url}`);
      console.error(`[MCP] Headers: ${JSON.stringify(redactHeaders(req.headers))}`);
      if (req.body && Object.keys(req.body).length > 0) {
        console.error(`[MCP] Body: ${JSON.stringify(redactBody(req.body))}`);
      }
      next();
    });
  }

  // One resolver for the whole process: it holds no state, only the lookup order
  const credentials = new PerCallCredentialResolver();

  app.post("/mcp", async (req: Request, res: Response) => {
    const server = createMcpServer(
      { mode: { tenancy: "multi-tenant" }, credentials, clientFactory },
      version
    );
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
    });

    res.on("close", () => {
      transport.close().catch((err) => console.error("[MCP] Error closing transport:", err));
      server.close().catch((err) => console.error("[MCP] Error closing server:", err));
    });

    try {
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      console.error("Error handling MCP POST request:", error);
      if (!res.headersSent) {
        // Sanitize error messages in production to avoid exposing internal details
        const errorMessage = DEBUG
          ? (error instanceof Error ? error.message : "Internal server error")
          : "Internal server error";
        jsonRpcError(res, 500, -32603, errorMessage);
      }
    }
  });

  // Stateless mode has no sessions to stream to or terminate
  app.get("/mcp", (_req: Request, res: Response) => {
    jsonRpcError(res, 405, -32000, "Method not allowed. This server is stateless; use POST.");
  });

  app.delete("/mcp", (_req: Request, res: Response) => {
    jsonRpcError(res, 405, -32000, "Method not allowed. This server is stateless; there are no sessions.");
  });

  return app;
}

/**
 * Start the MCP server in HTTP mode (multi-tenant).
 */
export async function startHttpServer(
  version: string,
  httpPort: number,
  httpHost: string
): Promise<NodeHttpServer> {
  const app = createHttpApp({ version });

  const httpServer = app.listen(httpPort, httpHost, () => {
    console.error(`Sokosumi MCP Server running on HTTP`);
    console.error(`  URL: http://${httpHost}:${httpPort}/mcp`);
    console.error(`  Transport: Streamable HTTP (stateless, multi-tenant)`);
    console.error(`  Environments: ${Object.entries(ENVIRONMENTS).map(([id, url]) => `${id}=${url}`).join(", ")}`);
    console.error(`  Authentication: "Authorization: Bearer YOUR_API_KEY"`);
    console.error(`  Health check: http://${httpHost}:${httpPort}/health`);
  });

  // Graceful shutdown: stop accepting connections and let in-flight
  // requests finish. Important for Docker/K8s deployments (SIGTERM).
  let isShuttingDown = false;
  function gracefulShutdown(signal: string) {
    if (isShuttingDown) return;
    isShuttingDown = true;

    console.error(`\n[MCP] ${signal} received, shutting down gracefully...`);

    // Force exit after 10 seconds if in-flight requests hang
    const forceExitTimer = setTimeout(() => {
      console.error("[MCP] Graceful shutdown timed out after 10s, forcing exit");
      process.exit(1);
    }, 10_000);
    forceExitTimer.unref();

    httpServer.close(() => {
      console.error("[MCP] HTTP server closed. Shutdown complete.");
      process.exit(0);
    });
  }

  process.on("SIGTERM", () => gracefulShutdown("SIGTERM"));
  process.on("SIGINT", () => gracefulShutdown("SIGINT"));

  return httpServer;
}
