/**
 * Sokosumi API Type Definitions
 * Request shapes for the job-management API and the error classes raised
 * while building, sending, or decoding a request.
 */

// ==========================================
// Custom Error Classes
// ==========================================

/**
 * A tool argument is missing or has the wrong shape.
 * Raised before any network activity.
 */
export class InvalidRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidRequestError";
  }
}

/**
 * No usable API key could be determined for the call.
 */
export class MissingCredentialError extends Error {
  constructor(message: string = "No API key available for this request") {
    super(message);
    this.name = "MissingCredentialError";
  }
}

/**
 * The environment identifier is not one of the registered environments.
 */
export class UnknownEnvironmentError extends Error {
  /** The identifier that failed to resolve */
  public readonly environment: string;

  constructor(environment: string, known: readonly string[]) {
    super(`Unknown environment '${environment}'. Expected one of: ${known.join(", ")}`);
    this.name = "UnknownEnvironmentError";
    this.environment = environment;
  }
}

/**
 * Invalid process configuration detected at startup.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * The Sokosumi API answered with a non-success status, or could not be
 * reached at all. Transport failures carry no status code.
 */
export class UpstreamError extends Error {
  /** HTTP status code, absent for transport failures */
  public readonly statusCode?: number;
  /** HTTP status text (e.g. "Not Found") */
  public readonly statusText?: string;
  /** Decoded error body: JSON when it parses, raw text otherwise */
  public readonly body?: JsonValue;
  /** The API endpoint that was called, e.g. "GET /api/v1/jobs" */
  public readonly endpoint: string;

  constructor(message: string, endpoint: string, details: UpstreamErrorDetails = {}) {
    super(message);
    this.name = "UpstreamError";
    this.endpoint = endpoint;
    this.statusCode = details.statusCode;
    this.statusText = details.statusText;
    this.body = details.body;
  }

  /** True for 401 Unauthorized */
  get isUnauthorized(): boolean {
    return this.statusCode === 401;
  }

  /** True for 5xx server errors */
  get isServerError(): boolean {
    return this.statusCode !== undefined && this.statusCode >= 500 && this.statusCode < 600;
  }
}

/**
 * The request did not complete within the client's timeout.
 */
export class UpstreamTimeoutError extends UpstreamError {
  public readonly timeoutMs: number;

  constructor(endpoint: string, timeoutMs: number) {
    super(`Request timeout after ${timeoutMs}ms: ${endpoint}`, endpoint);
    this.name = "UpstreamTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export interface UpstreamErrorDetails {
  statusCode?: number;
  statusText?: string;
  body?: JsonValue;
}

// ==========================================
// JSON Passthrough
// ==========================================

/**
 * Any decoded JSON document. Upstream payloads are agent-defined, so results
 * are relayed as-is rather than mapped onto models.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

// ==========================================
// Operation Requests
// ==========================================

/**
 * Filters for GET /api/v1/jobs. Unset filters are not sent.
 */
export interface ListJobsRequest {
  /** Job status, e.g. "completed" or "payment_pending" */
  status?: string;
  agentId?: string;
}

export interface CreateAgentJobRequest {
  agentId: string;
  /** Input matching the agent's input schema */
  inputData: JsonObject;
  /** Upper bound on credits the job may consume */
  maxAcceptedCredits: number;
}

/**
 * Deployment modes of the server
 * - single-tenant: one environment, one process-wide API key (stdio mode)
 * - multi-tenant: every call brings its own Bearer token and picks its
 *   environment by tool-name prefix (HTTP mode)
 */
export type TenancyMode = "single-tenant" | "multi-tenant";
