/**
 * Sokosumi API Client
 * Handles all HTTP communication with the Sokosumi job-management API.
 *
 * A client is bound to one base URL and one API key and is meant to live for a
 * single tool call: open it, issue the request, close it.
 */

import {
  CreateAgentJobRequest,
  JsonValue,
  ListJobsRequest,
  UpstreamError,
  UpstreamTimeoutError,
} from "./types.js";

/** Per-request timeout applied to every call */
export const DEFAULT_REQUEST_TIMEOUT_MS = 30000;

/** Cap on raw (non-JSON) error text kept on an UpstreamError */
const MAX_ERROR_TEXT_LENGTH = 500;

type HttpMethod = "GET" | "POST";

interface RequestOptions {
  query?: URLSearchParams;
  body?: JsonValue;
}

type ParsedJson = { ok: true; value: JsonValue } | { ok: false };

function tryParseJson(text: string): ParsedJson {
  try {
    const value: JsonValue = JSON.parse(text);
    return { ok: true, value };
  } catch {
    return { ok: false };
  }
}

function truncate(text: string): string {
  return text.length > MAX_ERROR_TEXT_LENGTH ? text.substring(0, MAX_ERROR_TEXT_LENGTH) + "..." : text;
}

function describeFailure(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  // fetch() reports DNS and connection errors as "fetch failed" with the real reason in `cause`
  if (error.cause instanceof Error) {
    return `${error.message} (${error.cause.message})`;
  }
  return error.message;
}

export class SokosumiApiClient {
  private baseUrl: string;
  private apiKey: string;
  private requestTimeoutMs: number;
  private inFlight = new Set<AbortController>();
  private closed = false;

  /**
   * Create a new Sokosumi API client
   * @param baseUrl - Environment base URL (e.g., https://preprod.sokosumi.com)
   * @param apiKey - Sent as the x-api-key header on every request
   * @param requestTimeoutMs - Request timeout in milliseconds (default: 30000)
   */
  constructor(baseUrl: string, apiKey: string, requestTimeoutMs: number = DEFAULT_REQUEST_TIMEOUT_MS) {
    this.baseUrl = baseUrl.replace(/\/$/, "");
    this.apiKey = apiKey;
    this.requestTimeoutMs = requestTimeoutMs;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Abort anything still in flight and refuse further requests.
   */
  close(): void {
    this.closed = true;
    for (const controller of this.inFlight) {
      controller.abort();
    }
    this.inFlight.clear();
  }

  // ==========================================
  // Error Parsing
  // ==========================================

  /**
   * Pick a human-readable message out of an error body. The API answers
   * with either `{ "error": "..." }` or `{ "message": "..." }`.
   */
  private parseErrorMessage(body: JsonValue | undefined): string | undefined {
    if (typeof body === "string") {
      return body || undefined;
    }
    if (body !== null && typeof body === "object" && !Array.isArray(body)) {
      for (const key of ["message", "error"]) {
        const value = body[key];
        if (typeof value === "string" && value) {
          return value;
        }
      }
    }
    return undefined;
  }

  /**
   * Build an UpstreamError from an HTTP error response, keeping the decoded
   * body so callers see exactly what the API said.
   */
  private async buildErrorFromResponse(response: Response, endpoint: string): Promise<UpstreamError> {
    let body: JsonValue | undefined;

    try {
      const errorText = await response.text();
      if (errorText) {
        const parsed = tryParseJson(errorText);
        body = parsed.ok ? parsed.value : truncate(errorText);
      }
    } catch (readError) {
      if (process.env.DEBUG === "1") {
        console.error(`[DEBUG] Could not read error body for ${endpoint}:`, readError);
      }
    }

    const message = this.parseErrorMessage(body) ?? `API Error ${response.status}: ${response.statusText}`;
    return new UpstreamError(message, endpoint, {
      statusCode: response.status,
      statusText: response.statusText,
      body,
    });
  }

  // ==========================================
  // Core HTTP Method
  // ==========================================

  /**
   * Issue exactly one request and decode the JSON response.
   *
   * @returns The decoded body, or null for an empty body
   * @throws UpstreamError on non-2xx status, undecodable body, or network failure
   * @throws UpstreamTimeoutError when no response arrives within the timeout
   */
  private async request(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<JsonValue> {
    const queryString = options.query?.toString();
    const pathWithQuery = queryString ? `${path}?${queryString}` : path;
    const endpoint = `${method} ${pathWithQuery}`;

    if (this.closed) {
      throw new UpstreamError(`Client already closed: ${endpoint}`, endpoint);
    }

    const headers: Record<string, string> = {
      "x-api-key": this.apiKey,
      Accept: "application/json",
    };
    if (options.body !== undefined) {
      headers["Content-Type"] = "application/json";
    }

    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.requestTimeoutMs);
    this.inFlight.add(controller);

    try {
      const response = await fetch(`${this.baseUrl}${pathWithQuery}`, {
        method,
        headers,
        body: options.body !== undefined ? JSON.stringify(options.body) : undefined,
        signal: controller.signal,
      });

      if (!response.ok) {
        throw await this.buildErrorFromResponse(response, endpoint);
      }

      const text = await response.text();
      if (!text) {
        return null;
      }
      const parsed = tryParseJson(text);
      if (!parsed.ok) {
        throw new UpstreamError(`Response is not valid JSON: ${endpoint}`, endpoint, {
          statusCode: response.status,
          statusText: response.statusText,
          body: truncate(text),
        });
      }
      return parsed.value;
    } catch (error) {
      if (error instanceof UpstreamError) {
        throw error;
      }
      if (timedOut) {
        throw new UpstreamTimeoutError(endpoint, this.requestTimeoutMs);
      }
      if (this.closed) {
        throw new UpstreamError(`Request aborted, client closed: ${endpoint}`, endpoint);
      }
      throw new UpstreamError(`Request failed: ${endpoint}: ${describeFailure(error)}`, endpoint);
    } finally {
      clearTimeout(timeoutId);
      this.inFlight.delete(controller);
    }
  }

  // ==========================================
  // User Operations
  // ==========================================

  /**
   * Get the account that owns the API key
   */
  async getUserInfo(): Promise<JsonValue> {
    return this.request("GET", "/api/v1/users/me");
  }

  // ==========================================
  // Agent Operations
  // ==========================================

  /**
   * List all agents available to the account
   */
  async listAgents(): Promise<JsonValue> {
    return this.request("GET", "/api/v1/agents");
  }

  /**
   * Get the jobs of one agent
   */
  async getAgentJobs(agentId: string): Promise<JsonValue> {
    return this.request("GET", `/api/v1/agents/${encodeURIComponent(agentId)}/jobs`);
  }

  /**
   * Get the JSON schema an agent expects as job input
   */
  async getAgentInputSchema(agentId: string): Promise<JsonValue> {
    return this.request("GET", `/api/v1/agents/${encodeURIComponent(agentId)}/input-schema`);
  }

  // ==========================================
  // Job Operations
  // ==========================================

  /**
   * List jobs, optionally filtered by status and agent.
   * Filters that are unset or empty are left off the query string.
   */
  async listJobs(filters: ListJobsRequest = {}): Promise<JsonValue> {
    const query = new URLSearchParams();
    if (filters.status) {
      query.append("status", filters.status);
    }
    if (filters.agentId) {
      query.append("agentId", filters.agentId);
    }
    return this.request("GET", "/api/v1/jobs", { query });
  }

  /**
   * Create a job for an agent. Never retried: a repeat would start a second job.
   */
  async createAgentJob(request: CreateAgentJobRequest): Promise<JsonValue> {
    return this.request("POST", `/api/v1/agents/${encodeURIComponent(request.agentId)}/jobs`, {
      body: {
        inputData: request.inputData,
        maxAcceptedCredits: request.maxAcceptedCredits,
      },
    });
  }
}

// ==========================================
// Scoped Clients
// ==========================================

/**
 * Produces a fresh client per tool call. Swapped out in tests.
 */
export interface ApiClientFactory {
  open(baseUrl: string, apiKey: string): SokosumiApiClient;
}

export const defaultApiClientFactory: ApiClientFactory = {
  open: (baseUrl, apiKey) => new SokosumiApiClient(baseUrl, apiKey),
};

/**
 * Open a client, run `fn` with it, and close it on every exit path.
 */
export async function withApiClient<T>(
  factory: ApiClientFactory,
  baseUrl: string,
  apiKey: string,
  fn: (client: SokosumiApiClient) => Promise<T>
): Promise<T> {
  const client = factory.open(baseUrl, apiKey);
  try {
    return await fn(client);
  } finally {
    client.close();
  }
}
