/**
 * Server configuration, read from environment variables.
 *
 * 1. STDIO MODE (default) - single-tenant, for local MCP clients
 *      SOKOSUMI_ENVIRONMENT - "preprod" or "mainnet" (default: mainnet)
 *      SOKOSUMI_API_KEY     - API key (optional; the configure tool can set it later)
 *
 * 2. HTTP MODE - multi-tenant, stateless Streamable HTTP
 *      TRANSPORT_MODE - Set to 'http' to enable HTTP mode
 *      PORT           - HTTP server port (default: 8000)
 *      HOST           - HTTP server host (default: 0.0.0.0)
 *    Each request authenticates with `Authorization: Bearer <api key>` and
 *    picks its environment through the tool prefix (preprod_, mainnet_).
 *
 * DEBUG=1 enables debug logging in both modes.
 */

import { EnvironmentId, ENVIRONMENT_IDS, isEnvironmentId } from "./api/environments.js";
import { ConfigurationError, UnknownEnvironmentError } from "./api/types.js";

export const DEFAULT_ENVIRONMENT: EnvironmentId = "mainnet";
export const DEFAULT_HTTP_PORT = 8000;
export const DEFAULT_HTTP_HOST = "0.0.0.0";

export type TransportMode = "stdio" | "http";

export const TRANSPORT_MODES: readonly TransportMode[] = ["stdio", "http"];

export function isTransportMode(value: string): value is TransportMode {
  return TRANSPORT_MODES.some((mode) => mode === value);
}

export interface StdioConfig {
  transport: "stdio";
  environment: EnvironmentId;
  apiKey: string | null;
  debug: boolean;
}

export interface HttpConfig {
  transport: "http";
  port: number;
  host: string;
  debug: boolean;
}

export type ServerConfig = StdioConfig | HttpConfig;

type Env = Record<string, string | undefined>;

function parsePort(value: string | undefined): number {
  if (!value) {
    return DEFAULT_HTTP_PORT;
  }
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigurationError(`Invalid PORT '${value}': expected an integer between 0 and 65535`);
  }
  return port;
}

/**
 * @throws ConfigurationError for an unknown transport mode or bad port
 * @throws UnknownEnvironmentError when SOKOSUMI_ENVIRONMENT is not a known environment
 */
export function loadConfig(env: Env = process.env): ServerConfig {
  const transport = env.TRANSPORT_MODE || "stdio";
  const debug = env.DEBUG === "1";

  if (!isTransportMode(transport)) {
    throw new ConfigurationError(`Invalid TRANSPORT_MODE '${transport}': expected 'stdio' or 'http'`);
  }

  if (transport === "http") {
    return {
      transport,
      port: parsePort(env.PORT),
      host: env.HOST || DEFAULT_HTTP_HOST,
      debug,
    };
  }

  const environment = env.SOKOSUMI_ENVIRONMENT || DEFAULT_ENVIRONMENT;
  if (!isEnvironmentId(environment)) {
    throw new UnknownEnvironmentError(environment, ENVIRONMENT_IDS);
  }

  return {
    transport,
    environment,
    apiKey: env.SOKOSUMI_API_KEY || null,
    debug,
  };
}
