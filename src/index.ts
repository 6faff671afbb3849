#!/usr/bin/env node

/**
 * Sokosumi MCP Server
 *
 * A Model Context Protocol (MCP) server that lets AI assistants work with the
 * Sokosumi agent marketplace: look up the account, browse agents, read their
 * input schemas, and create and list jobs.
 *
 * Supports two transport modes (see config.ts for all environment variables):
 *
 * 1. STDIO MODE (default) - single-tenant
 *    One environment (SOKOSUMI_ENVIRONMENT) and one API key (SOKOSUMI_API_KEY
 *    or the configure tool). Tool names carry no prefix.
 *
 * 2. HTTP MODE (TRANSPORT_MODE=http) - multi-tenant, stateless
 *    Each request brings its own key as `Authorization: Bearer <key>`.
 *    Tools are prefixed with the environment: preprod_list_jobs, mainnet_list_jobs, ...
 */

import { createRequire } from "module";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { resolveEnvironment } from "./api/environments.js";
import { CredentialCell, ProcessCredentialResolver } from "./auth/credentials.js";
import { StdioConfig, loadConfig } from "./config.js";
import { createMcpServer } from "./server/handlers.js";
import { startHttpServer } from "./server/http-server.js";

// Import version from package.json
const require = createRequire(import.meta.url);
const packageJson: { version?: unknown } = require("../package.json");
const version = typeof packageJson.version === "string" ? packageJson.version : "0.0.0";

/**
 * Start the MCP server in stdio mode (single-tenant)
 */
async function startStdioServer(config: StdioConfig) {
  const credentialCell = new CredentialCell(config.apiKey);
  const server = createMcpServer(
    {
      mode: { tenancy: "single-tenant", environment: config.environment },
      credentials: new ProcessCredentialResolver(credentialCell),
      credentialCell,
    },
    version
  );

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("Sokosumi MCP Server running on stdio");
  console.error(`Environment: ${config.environment} (${resolveEnvironment(config.environment)})`);
  console.error(
    credentialCell.isConfigured()
      ? "Authentication: API Key (SOKOSUMI_API_KEY)"
      : "Authentication: not configured yet. Set SOKOSUMI_API_KEY or call the configure tool."
  );
}

async function main() {
  // An unknown environment or transport must stop the process before it serves anything
  const config = loadConfig();

  if (config.debug) {
    console.error(`[DEBUG] TRANSPORT_MODE = ${config.transport}`);
  }

  if (config.transport === "http") {
    await startHttpServer(version, config.port, config.host);
  } else {
    await startStdioServer(config);
  }
}

main().catch((error) => {
  console.error("Fatal error starting server:", error instanceof Error ? error.message : error);
  process.exit(1);
});
