import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { SokosumiApiClient, withApiClient } from "./api/api-client.js";
import { UpstreamError, UpstreamTimeoutError } from "./api/types.js";

function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { "content-type": "application/json" },
    ...init,
  });
}

/** A fetch that never answers, but rejects like fetch does once aborted */
function hangingFetch(_input: string | URL | Request, init?: RequestInit): Promise<Response> {
  return new Promise<Response>((_resolve, reject) => {
    init?.signal?.addEventListener("abort", () => {
      const abortError = new Error("This operation was aborted");
      abortError.name = "AbortError";
      reject(abortError);
    });
  });
}

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error("Expected promise to reject");
}

async function captureUpstreamError(promise: Promise<unknown>): Promise<UpstreamError> {
  const error = await captureError(promise);
  if (!(error instanceof UpstreamError)) {
    throw new Error(`Expected UpstreamError, got ${String(error)}`);
  }
  return error;
}

describe("SokosumiApiClient", () => {
  let client: SokosumiApiClient;
  const mockBaseUrl = "https://api.example.com";
  const mockApiKey = "test-key";

  beforeEach(() => {
    client = new SokosumiApiClient(mockBaseUrl, mockApiKey);
    vi.stubGlobal("fetch", vi.fn());
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe("request headers", () => {
    it("should send the API key as x-api-key", async () => {
      vi.mocked(fetch).mockResolvedValueOnce(jsonResponse({ id: "u1" }));

      await client.getUserInfo();

      expect(fetch).toHaveBeenCalledWith(
        "https://api.example.com/api/v1/users/me",
        expect.objectContaining({
          method: "GET",
          headers: expect.objectContaining({
            "x-api-key": "test-key",
            Accept: "application/json",
          }),
        })
      );
    });

    it("should not send a body or Content-Type on GET requests", async () => {
      vi.mocked(fetch).mockResolvedValueOnce(jsonResponse([]));

      await client.listAgents();

      const [, init] = vi.mocked(fetch).mock.calls[0];
      expect(init?.body).toBeUndefined();
      expect(init?.headers).toEqual({ "x-api-key": "test-key", Accept: "application/json" });
    });

    it("should remove trailing slash from baseUrl", async () => {
      const clientWithSlash = new SokosumiApiClient("https://api.example.com/", mockApiKey);
      vi.mocked(fetch).mockResolvedValueOnce(jsonResponse([]));

      await clientWithSlash.listAgents();

      expect(fetch).toHaveBeenCalledWith("https://api.example.com/api/v1/agents", expect.any(Object));
    });
  });

  describe("agent endpoints", () => {
    it("should fetch agent jobs by agent ID", async () => {
      vi.mocked(fetch).mockResolvedValueOnce(jsonResponse([{ id: "j1" }]));

      const result = await client.getAgentJobs("a1");

      expect(fetch).toHaveBeenCalledWith("https://api.example.com/api/v1/agents/a1/jobs", expect.any(Object));
      expect(result).toEqual([{ id: "j1" }]);
    });

    it("should fetch the input schema of an agent", async () => {
      const schema = { input_data: [{ id: "topic", type: "string" }] };
      vi.mocked(fetch).mockResolvedValueOnce(jsonResponse(schema));

      const result = await client.getAgentInputSchema("a1");

      expect(fetch).toHaveBeenCalledWith(
        "https://api.example.com/api/v1/agents/a1/input-schema",
        expect.any(Object)
      );
      expect(result).toEqual(schema);
    });

    it("should URI-encode agent IDs in the path", async () => {
      vi.mocked(fetch).mockResolvedValueOnce(jsonResponse([]));

      await client.getAgentJobs("a/b c");

      expect(fetch).toHaveBeenCalledWith(
        "https://api.example.com/api/v1/agents/a%2Fb%20c/jobs",
        expect.any(Object)
      );
    });
  });

  describe("listJobs", () => {
    it("should send no query parameters without filters", async () => {
      vi.mocked(fetch).mockResolvedValueOnce(jsonResponse([]));

      await client.listJobs();

      expect(fetch).toHaveBeenCalledWith("https://api.example.com/api/v1/jobs", expect.any(Object));
    });

    it("should send only the status filter when only status is set", async () => {
      vi.mocked(fetch).mockResolvedValueOnce(jsonResponse([]));

      await client.listJobs({ status: "completed" });

      expect(fetch).toHaveBeenCalledWith("https://api.example.com/api/v1/jobs?status=completed", expect.any(Object));
    });

    it("should send both filters, mapping agent ID to agentId", async () => {
      vi.mocked(fetch).mockResolvedValueOnce(jsonResponse([]));

      await client.listJobs({ status: "completed", agentId: "a1" });

      expect(fetch).toHaveBeenCalledWith(
        "https://api.example.com/api/v1/jobs?status=completed&agentId=a1",
        expect.any(Object)
      );
    });

    it("should leave out empty filters", async () => {
      vi.mocked(fetch).mockResolvedValueOnce(jsonResponse([]));

      await client.listJobs({ status: "", agentId: "a1" });

      expect(fetch).toHaveBeenCalledWith("https://api.example.com/api/v1/jobs?agentId=a1", expect.any(Object));
    });
  });

  describe("createAgentJob", () => {
    it("should POST inputData and maxAcceptedCredits as JSON", async () => {
      vi.mocked(fetch).mockResolvedValueOnce(jsonResponse({ id: "j1", status: "payment_pending" }));

      const result = await client.createAgentJob({
        agentId: "a1",
        inputData: { x: 1 },
        maxAcceptedCredits: 5.0,
      });

      const [url, init] = vi.mocked(fetch).mock.calls[0];
      expect(url).toBe("https://api.example.com/api/v1/agents/a1/jobs");
      expect(init?.method).toBe("POST");
      expect(init?.body).toBe('{"inputData":{"x":1},"maxAcceptedCredits":5}');
      expect(init?.headers).toEqual(expect.objectContaining({ "Content-Type": "application/json" }));
      expect(result).toEqual({ id: "j1", status: "payment_pending" });
    });

    it("should issue exactly one request even when the API fails", async () => {
      vi.mocked(fetch).mockResolvedValueOnce(jsonResponse({ error: "unavailable" }, { status: 503 }));

      await expect(
        client.createAgentJob({ agentId: "a1", inputData: {}, maxAcceptedCredits: 1 })
      ).rejects.toThrow(UpstreamError);
      expect(fetch).toHaveBeenCalledTimes(1);
    });
  });

  describe("response decoding", () => {
    it("should return the decoded body unchanged", async () => {
      vi.mocked(fetch).mockResolvedValueOnce(jsonResponse([{ id: "j1" }]));

      await expect(client.listJobs()).resolves.toEqual([{ id: "j1" }]);
    });

    it("should return null for an empty body", async () => {
      vi.mocked(fetch).mockResolvedValueOnce(new Response(null, { status: 204 }));

      await expect(client.listAgents()).resolves.toBeNull();
    });

    it("should reject a success response that is not JSON", async () => {
      vi.mocked(fetch).mockResolvedValueOnce(new Response("<html>ok</html>", { status: 200 }));

      const error = await captureError(client.listAgents());

      expect(error).toBeInstanceOf(UpstreamError);
      expect(error).toMatchObject({
        message: "Response is not valid JSON: GET /api/v1/agents",
        statusCode: 200,
        body: "<html>ok</html>",
      });
    });
  });

  describe("error handling", () => {
    it("should carry status and decoded body of an error response", async () => {
      vi.mocked(fetch).mockResolvedValueOnce(
        jsonResponse({ error: "not found" }, { status: 404, statusText: "Not Found" })
      );

      const error = await captureError(client.getAgentJobs("a1"));

      expect(error).toBeInstanceOf(UpstreamError);
      expect(error).not.toBeInstanceOf(UpstreamTimeoutError);
      expect(error).toMatchObject({
        message: "not found",
        statusCode: 404,
        statusText: "Not Found",
        body: { error: "not found" },
        endpoint: "GET /api/v1/agents/a1/jobs",
      });
    });

    it("should prefer the message field of an error body", async () => {
      vi.mocked(fetch).mockResolvedValueOnce(
        jsonResponse({ message: "Invalid API key" }, { status: 401, statusText: "Unauthorized" })
      );

      const error = await captureUpstreamError(client.getUserInfo());

      expect(error).toMatchObject({ message: "Invalid API key", statusCode: 401 });
      expect(error.isUnauthorized).toBe(true);
    });

    it("should keep raw text when the error body is not JSON", async () => {
      vi.mocked(fetch).mockResolvedValueOnce(
        new Response("upstream unavailable", { status: 502, statusText: "Bad Gateway" })
      );

      const error = await captureUpstreamError(client.listAgents());

      expect(error).toMatchObject({
        message: "upstream unavailable",
        statusCode: 502,
        body: "upstream unavailable",
      });
      expect(error.isServerError).toBe(true);
    });

    it("should truncate long non-JSON error bodies to 500 characters", async () => {
      vi.mocked(fetch).mockResolvedValueOnce(new Response("x".repeat(600), { status: 500 }));

      const error = await captureError(client.listAgents());

      expect(error).toBeInstanceOf(UpstreamError);
      expect(error).toMatchObject({ body: "x".repeat(500) + "..." });
    });

    it("should fall back to the status line when the error body is empty", async () => {
      vi.mocked(fetch).mockResolvedValueOnce(
        new Response(null, { status: 500, statusText: "Internal Server Error" })
      );

      const error = await captureError(client.listAgents());

      expect(error).toMatchObject({
        message: "API Error 500: Internal Server Error",
        statusCode: 500,
        body: undefined,
      });
    });

    it("should not retry failed requests", async () => {
      vi.mocked(fetch).mockResolvedValue(jsonResponse({ error: "busy" }, { status: 503 }));

      await expect(client.listAgents()).rejects.toThrow("busy");
      expect(fetch).toHaveBeenCalledTimes(1);
    });

    it("should report network failures as UpstreamError without a status", async () => {
      vi.mocked(fetch).mockRejectedValueOnce(
        new TypeError("fetch failed", { cause: new Error("getaddrinfo ENOTFOUND api.example.com") })
      );

      const error = await captureError(client.listAgents());

      expect(error).toBeInstanceOf(UpstreamError);
      expect(error).toMatchObject({
        message: "Request failed: GET /api/v1/agents: fetch failed (getaddrinfo ENOTFOUND api.example.com)",
        statusCode: undefined,
      });
    });
  });

  describe("timeout", () => {
    it("should use a 30 second timeout by default", async () => {
      vi.useFakeTimers();
      try {
        vi.mocked(fetch).mockImplementation(hangingFetch);

        let settled = false;
        const pending = captureError(client.listAgents()).finally(() => {
          settled = true;
        });
        await vi.advanceTimersByTimeAsync(29_999);
        expect(settled).toBe(false);
        await vi.advanceTimersByTimeAsync(1);

        const error = await pending;
        expect(error).toBeInstanceOf(UpstreamTimeoutError);
        expect(error).toMatchObject({ message: "Request timeout after 30000ms: GET /api/v1/agents" });
      } finally {
        vi.useRealTimers();
      }
    });

    it("should fail with UpstreamTimeoutError, a kind of UpstreamError", async () => {
      const fastClient = new SokosumiApiClient(mockBaseUrl, mockApiKey, 10);
      vi.mocked(fetch).mockImplementation(hangingFetch);

      const error = await captureError(fastClient.getUserInfo());

      expect(error).toBeInstanceOf(UpstreamTimeoutError);
      expect(error).toBeInstanceOf(UpstreamError);
      expect(error).toMatchObject({ timeoutMs: 10, statusCode: undefined });
    });
  });

  describe("close", () => {
    it("should abort requests still in flight", async () => {
      vi.mocked(fetch).mockImplementation(hangingFetch);

      const pending = captureError(client.listAgents());
      client.close();

      const error = await pending;
      expect(error).toBeInstanceOf(UpstreamError);
      expect(error).toMatchObject({ message: "Request aborted, client closed: GET /api/v1/agents" });
    });

    it("should refuse requests after close without calling fetch", async () => {
      client.close();

      await expect(client.getUserInfo()).rejects.toThrow("Client already closed: GET /api/v1/users/me");
      expect(fetch).not.toHaveBeenCalled();
    });
  });
});

describe("withApiClient", () => {
  beforeEach(() => {
    vi.stubGlobal("fetch", vi.fn());
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("should open a client with the given base URL and key and close it after success", async () => {
    const client = new SokosumiApiClient("https://api.example.com", "test-key");
    const factory = { open: vi.fn(() => client) };
    vi.mocked(fetch).mockResolvedValueOnce(jsonResponse({ id: "u1" }));

    const result = await withApiClient(factory, "https://api.example.com", "test-key", (c) => c.getUserInfo());

    expect(result).toEqual({ id: "u1" });
    expect(factory.open).toHaveBeenCalledWith("https://api.example.com", "test-key");
    expect(client.isClosed).toBe(true);
  });

  it("should close the client when the request fails", async () => {
    const client = new SokosumiApiClient("https://api.example.com", "test-key");
    const factory = { open: () => client };
    vi.mocked(fetch).mockResolvedValueOnce(jsonResponse({ error: "nope" }, { status: 400 }));

    await expect(
      withApiClient(factory, "https://api.example.com", "test-key", (c) => c.listAgents())
    ).rejects.toThrow("nope");
    expect(client.isClosed).toBe(true);
  });

  it("should open a new client for every call", async () => {
    const opened: SokosumiApiClient[] = [];
    const factory = {
      open: (baseUrl: string, apiKey: string) => {
        const client = new SokosumiApiClient(baseUrl, apiKey);
        opened.push(client);
        return client;
      },
    };
    vi.mocked(fetch).mockImplementation(async () => jsonResponse([]));

    await withApiClient(factory, "https://api.example.com", "k1", (c) => c.listAgents());
    await withApiClient(factory, "https://api.example.com", "k2", (c) => c.listAgents());

    expect(opened).toHaveLength(2);
    expect(opened[0]).not.toBe(opened[1]);
    expect(opened.every((c) => c.isClosed)).toBe(true);
  });
});
