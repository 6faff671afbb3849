/**
 * MCP Server Factory and Tool Handlers
 *
 * Contains the tool dispatcher (name -> environment + operation), error
 * formatting, and the createMcpServer factory that wires both to the SDK.
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  CallToolResult,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { ApiClientFactory, defaultApiClientFactory } from "../api/api-client.js";
import { ENVIRONMENTS, ENVIRONMENT_IDS, isEnvironmentId, resolveEnvironment } from "../api/environments.js";
import { executeOperation, prepareOperation } from "../api/operations.js";
import {
  InvalidRequestError,
  JsonValue,
  MissingCredentialError,
  UnknownEnvironmentError,
  UpstreamError,
  UpstreamTimeoutError,
} from "../api/types.js";
import { CallContext, CredentialCell, CredentialResolver } from "../auth/credentials.js";
import { ToolArguments, validateNonEmptyString } from "../utils/validation.js";
import { DispatchEntry, DispatchMode, buildDispatchTable, splitPrefixedToolName } from "./dispatch.js";
import { buildTools } from "./tools.js";

const DEBUG = process.env.DEBUG === '1';

export interface ToolDispatcherOptions {
  mode: DispatchMode;
  credentials: CredentialResolver;
  /** Required in single-tenant mode, where the configure tool writes to it */
  credentialCell?: CredentialCell;
  clientFactory?: ApiClientFactory;
}

export type ToolDispatcher = (
  name: string,
  args: ToolArguments | undefined,
  context: CallContext
) => Promise<CallToolResult>;

// ==========================================
// Response Helpers
// ==========================================

function jsonResult(value: JsonValue): CallToolResult {
  return {
    content: [
      {
        type: "text",
        text: JSON.stringify(value, null, 2),
      },
    ],
  };
}

/**
 * Render an error as tool output. The category prefix tells the caller
 * whether to fix its input, its credentials, or look at the upstream answer.
 */
export function formatToolError(error: unknown): CallToolResult {
  let errorPrefix = "Error";
  let errorMessage: string;

  if (error instanceof InvalidRequestError) {
    errorPrefix = "Invalid Request";
    errorMessage = error.message;
  } else if (error instanceof MissingCredentialError) {
    errorPrefix = "Authentication Error";
    errorMessage = error.message;
  } else if (error instanceof UnknownEnvironmentError) {
    errorPrefix = "Unknown Environment";
    errorMessage = error.message;
  } else if (error instanceof UpstreamTimeoutError) {
    errorPrefix = "Upstream Timeout";
    errorMessage = error.message;
  } else if (error instanceof UpstreamError) {
    errorPrefix = error.statusCode !== undefined ? `Upstream Error (${error.statusCode})` : "Upstream Error";
    errorMessage = error.message;
    if (error.body !== undefined) {
      errorMessage += `\n${JSON.stringify(error.body, null, 2)}`;
    }
  } else if (error instanceof Error) {
    errorMessage = error.message;
  } else {
    errorMessage = "An unknown error occurred";
  }

  return {
    content: [
      {
        type: "text",
        text: `${errorPrefix}: ${errorMessage}`,
      },
    ],
    isError: true,
  };
}

// ==========================================
// Dispatcher
// ==========================================

function lookupEntry(table: Map<string, DispatchEntry>, name: string): DispatchEntry {
  const entry = table.get(name);
  if (entry) {
    return entry;
  }
  const prefixed = splitPrefixedToolName(name);
  if (prefixed && !isEnvironmentId(prefixed.environment)) {
    throw new UnknownEnvironmentError(prefixed.environment, ENVIRONMENT_IDS);
  }
  throw new Error(`Unknown tool: ${name}`);
}

/**
 * Create the function that answers tools/call. Each call resolves its own
 * environment and credential and owns its own API client; the only state
 * shared between calls is the single-tenant credential cell.
 */
export function createToolDispatcher(options: ToolDispatcherOptions): ToolDispatcher {
  const { mode, credentials, credentialCell } = options;
  const clientFactory = options.clientFactory ?? defaultApiClientFactory;
  const table = buildDispatchTable(mode);

  if (mode.tenancy === "single-tenant" && !credentialCell) {
    throw new Error("Single-tenant mode requires a credential cell");
  }

  async function handle(entry: DispatchEntry, args: ToolArguments, context: CallContext): Promise<JsonValue> {
    switch (entry.kind) {
      case "operation": {
        const baseUrl = resolveEnvironment(entry.environment);
        const prepared = prepareOperation(entry.operation, args);
        const apiKey = credentials.resolve(context);
        if (DEBUG) {
          console.error(`[DEBUG] ${entry.environment}/${entry.operation} -> ${baseUrl}`);
        }
        return executeOperation(prepared, baseUrl, apiKey, clientFactory);
      }

      case "server-info":
        return {
          environments: { ...ENVIRONMENTS },
          authentication: "API key required via Authorization header (Bearer token)",
          mode: "stateless",
        };

      case "configuration": {
        if (mode.tenancy !== "single-tenant") {
          throw new Error("get_configuration is only available in single-tenant mode");
        }
        return {
          mode: mode.tenancy,
          environment: mode.environment,
          baseUrl: resolveEnvironment(mode.environment),
          environments: { ...ENVIRONMENTS },
          credentialConfigured: credentials.isConfigured(),
        };
      }

      case "configure": {
        if (mode.tenancy !== "single-tenant" || !credentialCell) {
          throw new Error("configure is only available in single-tenant mode");
        }
        const apiKey = validateNonEmptyString(args, "api_key");
        credentialCell.set(apiKey);
        console.error(`[MCP] API key reconfigured for ${mode.environment}`);
        return {
          configured: true,
          environment: mode.environment,
          baseUrl: resolveEnvironment(mode.environment),
        };
      }
    }
  }

  return async (name, args, context) => {
    if (DEBUG) {
      console.error(`[DEBUG] Tool called: ${name}`);
      // configure carries the API key itself
      if (name !== "configure") {
        console.error(`[DEBUG] Args: ${JSON.stringify(args)}`);
      }
    }

    try {
      const entry = lookupEntry(table, name);
      const result = await handle(entry, args ?? {}, context);
      return jsonResult(result);
    } catch (error) {
      if (DEBUG) {
        console.error(`[DEBUG] Tool ${name} failed:`, error);
      }
      return formatToolError(error);
    }
  };
}

// ==========================================
// Server Factory
// ==========================================

const INSTRUCTIONS = {
  "multi-tenant":
    "Access to the Sokosumi API. Tools are prefixed with 'preprod_' or 'mainnet_'. " +
    "API key required via Authorization header (format: 'Bearer YOUR_API_KEY').",
  "single-tenant":
    "Access to the Sokosumi API for one environment. " +
    "Set the API key with SOKOSUMI_API_KEY or the configure tool.",
};

/**
 * Create a new MCP Server instance with all handlers registered.
 * In HTTP mode every request gets its own Server instance.
 *
 * @param options - Dispatch mode, credential resolver, and client factory
 * @param version - The server version string from package.json
 */
export function createMcpServer(options: ToolDispatcherOptions, version: string): Server {
  const server = new Server(
    {
      name: "sokosumi-mcp-server",
      version,
    },
    {
      capabilities: {
        tools: {},
      },
      instructions: INSTRUCTIONS[options.mode.tenancy],
    }
  );

  const tools = buildTools(options.mode);
  const callTool = createToolDispatcher(options);

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools,
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    const { name, arguments: args, _meta } = request.params;
    return callTool(name, args, {
      headers: extra.requestInfo?.headers,
      meta: _meta,
    });
  });

  return server;
}
