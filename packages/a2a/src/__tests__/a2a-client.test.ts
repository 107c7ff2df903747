import { ReadableStream } from "node:stream/web";
import {
  A2aAgentCardNotFoundError,
  A2aCancelledError,
  A2aDecodeError,
  A2aHttpStatusError,
  A2aIdMismatchError,
  A2aProtocolError,
  A2aTransportError,
} from "@relaykit/errors";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { A2AClient, createA2aClient } from "../a2a-client.js";
import type { A2aClientConfig, StreamResponse } from "../types.js";
import {
  createMockLogger,
  createStreamEvent,
  createTaskRequest,
  hangingFetch,
  jsonResponse,
  mockRpcError,
  mockRpcResult,
  openSseResponse,
  parseRequestBody,
  sseResponse,
  textResponse,
} from "./helpers.js";

const AGENT = "https://agent.example.com/a2a";

const COMPLETED = {
  id: "task-123",
  status: "completed",
  message: { role: "agent", parts: [{ type: "text", text: "done" }] },
};

function createClient(config?: A2aClientConfig, hook?: (url: string) => Record<string, string>) {
  return new A2AClient(config, { logger: createMockLogger(), authHeaders: hook });
}

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error("expected promise to reject");
}

async function collect(
  stream: AsyncIterable<StreamResponse>,
): Promise<{ events: StreamResponse[]; error: unknown }> {
  const events: StreamResponse[] = [];
  try {
    for await (const event of stream) {
      events.push(event);
    }
  } catch (error) {
    return { events, error };
  }
  return { events, error: undefined };
}

function sseLine(event: Record<string, unknown>): string {
  return `data: ${JSON.stringify(event)}\n\n`;
}

describe("A2AClient", () => {
  let originalFetch: typeof globalThis.fetch;

  beforeEach(() => {
    originalFetch = globalThis.fetch;
  });

  afterEach(() => {
    globalThis.fetch = originalFetch;
  });

  // =========================================================================
  // sendTask
  // =========================================================================

  describe("sendTask", () => {
    it("posts a tasks/send JSON-RPC request and returns the task response", async () => {
      const fetchMock = mockRpcResult(COMPLETED);
      globalThis.fetch = fetchMock;

      const client = createClient();
      const response = await client.sendTask(AGENT, createTaskRequest());

      expect(response).toEqual(COMPLETED);
      expect(fetchMock).toHaveBeenCalledTimes(1);

      const [url, init] = fetchMock.mock.calls[0] ?? [];
      expect(url).toBe(AGENT);
      expect(init?.method).toBe("POST");
      expect(init?.headers).toEqual({
        Accept: "application/json",
        "Content-Type": "application/json",
      });

      const body = parseRequestBody(init);
      expect(body.jsonrpc).toBe("2.0");
      expect(body.method).toBe("tasks/send");
      expect(body.params).toEqual({
        id: "task-123",
        message: { role: "user", parts: [{ type: "text", text: "hello" }] },
      });
      expect(typeof body.id).toBe("string");
    });

    it("uses a fresh correlation id for every call", async () => {
      const fetchMock = mockRpcResult(COMPLETED);
      globalThis.fetch = fetchMock;

      const client = createClient();
      await client.sendTask(AGENT, createTaskRequest());
      await client.sendTask(AGENT, createTaskRequest());

      const first = parseRequestBody(fetchMock.mock.calls[0]?.[1]).id;
      const second = parseRequestBody(fetchMock.mock.calls[1]?.[1]).id;
      expect(first).not.toBe(second);
    });

    it("resolves a base URL plus agent id", async () => {
      const fetchMock = mockRpcResult(COMPLETED);
      globalThis.fetch = fetchMock;

      await createClient().sendTask(
        { baseUrl: "https://hub.example.com/agents/", agentId: "echo" },
        createTaskRequest(),
      );

      expect(fetchMock.mock.calls[0]?.[0]).toBe("https://hub.example.com/agents/echo");
    });

    it("maps a JSON-RPC error to A2aProtocolError", async () => {
      globalThis.fetch = mockRpcError(-32601, "Method not found", { method: "tasks/send" });

      const error = await captureError(createClient().sendTask(AGENT, createTaskRequest()));

      expect(error).toBeInstanceOf(A2aProtocolError);
      expect(error).toMatchObject({
        rpcCode: -32601,
        rpcMessage: "Method not found",
        method: "tasks/send",
        url: AGENT,
        data: { method: "tasks/send" },
      });
      if (error instanceof A2aProtocolError) {
        expect(error.message).toBe(
          `JSON-RPC error from "${AGENT}" (tasks/send): Method not found (code: -32601)`,
        );
      }
    });

    it("rejects a response for a different task", async () => {
      globalThis.fetch = mockRpcResult({ ...COMPLETED, id: "task-999" });

      const error = await captureError(createClient().sendTask(AGENT, createTaskRequest()));

      expect(error).toBeInstanceOf(A2aIdMismatchError);
      expect(error).toMatchObject({ kind: "task", expected: "task-123", actual: "task-999" });
    });

    it("rejects an envelope echoing a different correlation id", async () => {
      globalThis.fetch = vi
        .fn()
        .mockResolvedValue(jsonResponse({ jsonrpc: "2.0", id: "someone-else", result: COMPLETED }));

      const error = await captureError(createClient().sendTask(AGENT, createTaskRequest()));

      expect(error).toBeInstanceOf(A2aIdMismatchError);
      expect(error).toMatchObject({ kind: "correlation", actual: "someone-else" });
    });

    it("accepts an envelope with a null id", async () => {
      globalThis.fetch = vi
        .fn()
        .mockResolvedValue(jsonResponse({ jsonrpc: "2.0", id: null, result: COMPLETED }));

      const response = await createClient().sendTask(AGENT, createTaskRequest());
      expect(response.status).toBe("completed");
    });

    it("raises A2aHttpStatusError on a non-2xx status even with a JSON-RPC body", async () => {
      globalThis.fetch = vi
        .fn()
        .mockResolvedValue(
          jsonResponse({ jsonrpc: "2.0", id: null, error: { code: -32603, message: "x" } }, 500),
        );

      const error = await captureError(createClient().sendTask(AGENT, createTaskRequest()));

      expect(error).toBeInstanceOf(A2aHttpStatusError);
      expect(error).toMatchObject({ status: 500 });
    });

    it("raises A2aDecodeError for a non-JSON body", async () => {
      globalThis.fetch = vi.fn().mockResolvedValue(textResponse("<html>gateway</html>"));

      const error = await captureError(createClient().sendTask(AGENT, createTaskRequest()));

      expect(error).toBeInstanceOf(A2aDecodeError);
      if (error instanceof A2aDecodeError) {
        expect(error.message).toBe(
          `Malformed response from "${AGENT}": response body is not valid JSON`,
        );
      }
    });

    it("raises A2aDecodeError when the envelope has both result and error", async () => {
      globalThis.fetch = vi.fn(async (_url: string | URL | Request, init?: RequestInit) => {
        const { id } = parseRequestBody(init);
        return jsonResponse({
          jsonrpc: "2.0",
          id,
          result: COMPLETED,
          error: { code: 1, message: "also" },
        });
      });

      const error = await captureError(createClient().sendTask(AGENT, createTaskRequest()));

      expect(error).toBeInstanceOf(A2aDecodeError);
    });

    it("raises A2aDecodeError when the envelope lacks the 2.0 version tag", async () => {
      for (const version of [{ jsonrpc: "1.0" }, {}]) {
        globalThis.fetch = vi.fn(async (_url: string | URL | Request, init?: RequestInit) => {
          const { id } = parseRequestBody(init);
          return jsonResponse({ ...version, id, result: COMPLETED });
        });

        const error = await captureError(createClient().sendTask(AGENT, createTaskRequest()));

        expect(error).toBeInstanceOf(A2aDecodeError);
        if (error instanceof A2aDecodeError) {
          expect(error.issues[0]?.field).toBe("jsonrpc");
        }
      }
    });

    it("raises A2aDecodeError when the envelope has neither result nor error", async () => {
      globalThis.fetch = mockRpcResult(null);

      const error = await captureError(createClient().sendTask(AGENT, createTaskRequest()));

      expect(error).toBeInstanceOf(A2aDecodeError);
      if (error instanceof A2aDecodeError) {
        expect(error.message).toBe(
          `Malformed response from "${AGENT}": JSON-RPC envelope carries neither result nor error`,
        );
      }
    });

    it("raises A2aDecodeError for a result of the wrong shape", async () => {
      globalThis.fetch = mockRpcResult({ id: "task-123" });

      const error = await captureError(createClient().sendTask(AGENT, createTaskRequest()));

      expect(error).toBeInstanceOf(A2aDecodeError);
      if (error instanceof A2aDecodeError) {
        expect(error.issues[0]?.field).toBe("status");
      }
    });

    it("wraps network failures in A2aTransportError", async () => {
      globalThis.fetch = vi
        .fn()
        .mockRejectedValue(new TypeError("fetch failed", { cause: new Error("connect ECONNREFUSED") }));

      const error = await captureError(createClient().sendTask(AGENT, createTaskRequest()));

      expect(error).toBeInstanceOf(A2aTransportError);
      expect(error).toMatchObject({ timedOut: false, url: AGENT });
      if (error instanceof A2aTransportError) {
        expect(error.message).toBe(
          `A2A request to "${AGENT}" failed: fetch failed: connect ECONNREFUSED`,
        );
      }
    });

    it("times out with A2aTransportError flagged timedOut", async () => {
      globalThis.fetch = hangingFetch();

      const error = await captureError(
        createClient().sendTask(AGENT, createTaskRequest(), { timeoutMs: 50 }),
      );

      expect(error).toBeInstanceOf(A2aTransportError);
      expect(error).toMatchObject({ timedOut: true });
      if (error instanceof A2aTransportError) {
        expect(error.message).toBe(`A2A request to "${AGENT}" failed: Request timed out after 50ms`);
      }
    });

    it("raises A2aCancelledError when the caller aborts", async () => {
      globalThis.fetch = hangingFetch();
      const controller = new AbortController();

      const pending = captureError(
        createClient().sendTask(AGENT, createTaskRequest(), { signal: controller.signal }),
      );
      controller.abort();
      const error = await pending;

      expect(error).toBeInstanceOf(A2aCancelledError);
      expect(error).toMatchObject({ operation: "tasks/send" });
    });

    it("rejects an unusable agent address without fetching", async () => {
      const fetchMock = vi.fn();
      globalThis.fetch = fetchMock;

      const error = await captureError(createClient().sendTask("not a url", createTaskRequest()));

      expect(error).toBeInstanceOf(A2aTransportError);
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });

  // =========================================================================
  // Headers
  // =========================================================================

  describe("headers", () => {
    it("layers config headers, auth, hook and per-call headers in that order", async () => {
      const fetchMock = mockRpcResult(COMPLETED);
      globalThis.fetch = fetchMock;
      const hook = vi.fn((_url: string) => ({ "X-Trace": "hook" }));

      const client = createClient(
        {
          headers: { "X-Trace": "config", Authorization: "Basic config", "X-Tenant": "acme" },
          auth: { type: "bearer", token: "test-token" },
        },
        hook,
      );
      await client.sendTask(AGENT, createTaskRequest(), { headers: { "X-Tenant": "call" } });

      expect(hook).toHaveBeenCalledWith(AGENT);
      expect(fetchMock.mock.calls[0]?.[1]?.headers).toEqual({
        Accept: "application/json",
        "Content-Type": "application/json",
        Authorization: "Bearer test-token",
        "X-Trace": "hook",
        "X-Tenant": "call",
      });
    });

    it("sends an API key under the default header", async () => {
      const fetchMock = mockRpcResult(COMPLETED);
      globalThis.fetch = fetchMock;

      await createClient({ auth: { type: "apiKey", apiKey: "test-secret" } }).sendTask(
        AGENT,
        createTaskRequest(),
      );

      expect(fetchMock.mock.calls[0]?.[1]?.headers).toMatchObject({ "X-API-Key": "test-secret" });
    });

    it("sends an API key under a custom header", async () => {
      const fetchMock = mockRpcResult(COMPLETED);
      globalThis.fetch = fetchMock;

      await createClient({
        auth: { type: "apiKey", apiKey: "test-secret", headerName: "X-Agent-Key" },
      }).sendTask(AGENT, createTaskRequest());

      const headers = fetchMock.mock.calls[0]?.[1]?.headers;
      expect(headers).toMatchObject({ "X-Agent-Key": "test-secret" });
      expect(headers).not.toHaveProperty("X-API-Key");
    });
  });

  // =========================================================================
  // getTaskStatus / cancelTask / sendMessage
  // =========================================================================

  describe("getTaskStatus", () => {
    it("normalizes timestamps to epoch milliseconds", async () => {
      const fetchMock = mockRpcResult({
        id: "task-123",
        status: "running",
        progress: 0.5,
        startedAt: "2024-01-01T00:00:00Z",
        completedAt: 1_704_067_260_000,
      });
      globalThis.fetch = fetchMock;

      const status = await createClient().getTaskStatus(AGENT, "task-123");

      expect(status).toEqual({
        id: "task-123",
        status: "running",
        progress: 0.5,
        startedAt: 1_704_067_200_000,
        completedAt: 1_704_067_260_000,
      });
      const body = parseRequestBody(fetchMock.mock.calls[0]?.[1]);
      expect(body.method).toBe("tasks/status");
      expect(body.params).toEqual({ id: "task-123" });
    });

    it("rejects progress outside [0, 1]", async () => {
      globalThis.fetch = mockRpcResult({ id: "task-123", status: "running", progress: 1.5 });

      const error = await captureError(createClient().getTaskStatus(AGENT, "task-123"));
      expect(error).toBeInstanceOf(A2aDecodeError);
    });

    it("rejects an unparseable timestamp", async () => {
      globalThis.fetch = mockRpcResult({ id: "task-123", status: "running", startedAt: "soon" });

      const error = await captureError(createClient().getTaskStatus(AGENT, "task-123"));
      expect(error).toBeInstanceOf(A2aDecodeError);
    });

    it("checks the task id", async () => {
      globalThis.fetch = mockRpcResult({ id: "task-456", status: "running" });

      const error = await captureError(createClient().getTaskStatus(AGENT, "task-123"));
      expect(error).toBeInstanceOf(A2aIdMismatchError);
    });
  });

  describe("cancelTask", () => {
    it("succeeds without a result payload", async () => {
      const fetchMock = mockRpcResult(null);
      globalThis.fetch = fetchMock;

      await expect(createClient().cancelTask(AGENT, "task-123")).resolves.toBeUndefined();

      const body = parseRequestBody(fetchMock.mock.calls[0]?.[1]);
      expect(body.method).toBe("tasks/cancel");
      expect(body.params).toEqual({ id: "task-123" });
    });

    it("ignores any result payload", async () => {
      globalThis.fetch = mockRpcResult({ anything: true });
      await expect(createClient().cancelTask(AGENT, "task-123")).resolves.toBeUndefined();
    });

    it("surfaces a JSON-RPC error", async () => {
      globalThis.fetch = mockRpcError(-32001, "Task not found");

      const error = await captureError(createClient().cancelTask(AGENT, "task-123"));
      expect(error).toMatchObject({ rpcCode: -32001, method: "tasks/cancel" });
    });
  });

  describe("sendMessage", () => {
    it("posts message/send and accepts any task id in the response", async () => {
      const fetchMock = mockRpcResult({ ...COMPLETED, id: "srv-42" });
      globalThis.fetch = fetchMock;

      const message = { role: "user", parts: [{ type: "text" as const, text: "hi" }] };
      const response = await createClient().sendMessage(AGENT, message);

      expect(response.id).toBe("srv-42");
      const body = parseRequestBody(fetchMock.mock.calls[0]?.[1]);
      expect(body.method).toBe("message/send");
      expect(body.params).toEqual({ message });
    });
  });

  // =========================================================================
  // ping
  // =========================================================================

  describe("ping", () => {
    it("resolves when the well-known card path answers 2xx", async () => {
      const fetchMock = vi.fn().mockResolvedValue(textResponse("{}"));
      globalThis.fetch = fetchMock;

      await expect(createClient().ping("https://agent.example.com")).resolves.toBeUndefined();

      const [url, init] = fetchMock.mock.calls[0] ?? [];
      expect(url).toBe("https://agent.example.com/.well-known/agent.json");
      expect(init).toMatchObject({ method: "GET" });
    });

    it("sends no Content-Type on the bodiless GET", async () => {
      const fetchMock = vi.fn().mockResolvedValue(textResponse("{}"));
      globalThis.fetch = fetchMock;

      await createClient({ auth: { type: "bearer", token: "test-token" } }).ping(
        "https://agent.example.com",
      );

      const [, init] = fetchMock.mock.calls[0] ?? [];
      expect(init?.headers).toEqual({
        Accept: "application/json",
        Authorization: "Bearer test-token",
      });
    });

    it("maps 404 to A2aAgentCardNotFoundError", async () => {
      globalThis.fetch = vi.fn().mockResolvedValue(textResponse("", 404));

      const error = await captureError(createClient().ping("https://agent.example.com"));
      expect(error).toBeInstanceOf(A2aAgentCardNotFoundError);
    });

    it("maps 5xx to A2aHttpStatusError", async () => {
      globalThis.fetch = vi.fn().mockResolvedValue(textResponse("restarting", 503));

      const error = await captureError(createClient().ping("https://agent.example.com"));
      expect(error).toMatchObject({ status: 503, body: "restarting" });
    });
  });

  // =========================================================================
  // Streaming
  // =========================================================================

  describe("streamTask", () => {
    it("yields events in the order received, across chunk boundaries", async () => {
      const fetchMock = vi.fn().mockResolvedValue(
        sseResponse([
          sseLine(createStreamEvent(0)),
          `event: progress\n${sseLine(createStreamEvent(1))}da`,
          `ta: ${JSON.stringify(createStreamEvent(2, { done: true }))}\n\n`,
        ]),
      );
      globalThis.fetch = fetchMock;

      const { events, error } = await collect(
        createClient().streamTask(AGENT, createTaskRequest()),
      );

      expect(error).toBeUndefined();
      expect(events).toEqual([
        { id: "task-123", timestamp: 1_700_000_000_000, type: "progress", data: { step: 0 } },
        { id: "task-123", timestamp: 1_700_000_000_001, type: "progress", data: { step: 1 } },
        {
          id: "task-123",
          timestamp: 1_700_000_000_002,
          type: "progress",
          data: { step: 2 },
          done: true,
        },
      ]);

      const init = fetchMock.mock.calls[0]?.[1];
      expect(init).toMatchObject({ method: "POST", headers: { Accept: "text/event-stream" } });
      expect(parseRequestBody(init).method).toBe("tasks/sendSubscribe");
    });

    it("fails with a single A2aHttpStatusError on a non-200 status", async () => {
      globalThis.fetch = vi.fn().mockResolvedValue(textResponse("unavailable", 503));

      const { events, error } = await collect(
        createClient().streamTask(AGENT, createTaskRequest()),
      );

      expect(events).toEqual([]);
      expect(error).toBeInstanceOf(A2aHttpStatusError);
      expect(error).toMatchObject({ status: 503, body: "unavailable" });
    });

    it("delivers events before a malformed one, then fails with A2aDecodeError", async () => {
      globalThis.fetch = vi
        .fn()
        .mockResolvedValue(
          sseResponse([sseLine(createStreamEvent(0)), "data: {oops\n\n", sseLine(createStreamEvent(1))]),
        );

      const { events, error } = await collect(
        createClient().streamTask(AGENT, createTaskRequest()),
      );

      expect(events).toHaveLength(1);
      expect(error).toBeInstanceOf(A2aDecodeError);
    });

    it("ends with exactly one A2aCancelledError when the caller aborts", async () => {
      globalThis.fetch = vi.fn(async (_url: string | URL | Request, init?: RequestInit) =>
        openSseResponse([sseLine(createStreamEvent(0))], init?.signal),
      );
      const controller = new AbortController();

      const stream = createClient().streamTask(AGENT, createTaskRequest(), {
        signal: controller.signal,
      });
      const events: StreamResponse[] = [];
      let error: unknown;
      try {
        for await (const event of stream) {
          events.push(event);
          controller.abort();
        }
      } catch (caught) {
        error = caught;
      }

      expect(events).toHaveLength(1);
      expect(error).toBeInstanceOf(A2aCancelledError);
      expect(error).toMatchObject({ operation: "tasks/sendSubscribe" });
      expect(await stream.next()).toEqual({ done: true, value: undefined });
    });

    it("cancels the response body when the consumer stops early", async () => {
      const encoder = new TextEncoder();
      const cancel = vi.fn();
      let index = 0;
      const body = new ReadableStream<Uint8Array>({
        pull(controller) {
          controller.enqueue(encoder.encode(sseLine(createStreamEvent(index++))));
        },
        cancel,
      });
      globalThis.fetch = vi.fn().mockResolvedValue(new Response(body, { status: 200 }));

      const received: number[] = [];
      for await (const event of createClient().streamTask(AGENT, createTaskRequest())) {
        received.push(event.timestamp);
        if (received.length === 2) break;
      }

      expect(received).toEqual([1_700_000_000_000, 1_700_000_000_001]);
      expect(cancel).toHaveBeenCalledTimes(1);
    });

    it("fails with a timed-out A2aTransportError when the stream deadline passes", async () => {
      globalThis.fetch = vi.fn(async (_url: string | URL | Request, init?: RequestInit) =>
        openSseResponse([], init?.signal),
      );

      const { error } = await collect(
        createClient().streamTask(AGENT, createTaskRequest(), { timeoutMs: 50 }),
      );

      expect(error).toBeInstanceOf(A2aTransportError);
      expect(error).toMatchObject({ timedOut: true });
    });

    it("wraps a failed connection in A2aTransportError", async () => {
      globalThis.fetch = vi.fn().mockRejectedValue(new TypeError("fetch failed"));

      const { error } = await collect(createClient().streamTask(AGENT, createTaskRequest()));

      expect(error).toBeInstanceOf(A2aTransportError);
      expect(error).toMatchObject({ timedOut: false });
    });
  });

  describe("streamMessage", () => {
    it("posts message/stream", async () => {
      const fetchMock = vi.fn().mockResolvedValue(sseResponse([sseLine(createStreamEvent(0))]));
      globalThis.fetch = fetchMock;

      const message = { role: "user", parts: [{ type: "text" as const, text: "hi" }] };
      const { events } = await collect(createClient().streamMessage(AGENT, message));

      expect(events).toHaveLength(1);
      const body = parseRequestBody(fetchMock.mock.calls[0]?.[1]);
      expect(body.method).toBe("message/stream");
      expect(body.params).toEqual({ message });
    });
  });
});

describe("createA2aClient", () => {
  it("validates the config", () => {
    expect(() => createA2aClient({ timeoutMs: 10 })).toThrow();
    expect(createA2aClient({ timeoutMs: 5_000 })).toBeInstanceOf(A2AClient);
  });
});
