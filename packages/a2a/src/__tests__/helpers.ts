/**
 * Test helpers for @relaykit/a2a
 */

import { ReadableStream } from "node:stream/web";
import { vi } from "vitest";
import type { Logger } from "../logger.js";
import type { AgentCard, Endpoint, StreamResponse, TaskRequest } from "../types.js";

// ---------------------------------------------------------------------------
// Agent Cards
// ---------------------------------------------------------------------------

export function createMockEndpoint(overrides?: Partial<Endpoint>): Endpoint {
  return {
    type: "a2a",
    url: "https://agent.example.com/a2a",
    methods: ["tasks/send", "tasks/sendSubscribe", "tasks/status", "tasks/cancel"],
    ...overrides,
  };
}

export function createMockAgentCard(overrides?: Partial<AgentCard>): AgentCard {
  return {
    name: "Test Agent",
    description: "A test A2A agent",
    url: "https://agent.example.com",
    version: "1.0.0",
    capabilities: { streaming: true, pushNotifications: false },
    skills: [{ id: "search", name: "Search", description: "Search the web", tags: ["web"] }],
    endpoints: [createMockEndpoint()],
    ...overrides,
  };
}

/** Agent Card JSON as served over HTTP */
export function createRawAgentCard(overrides?: Record<string, unknown>): Record<string, unknown> {
  return {
    name: "Test Agent",
    description: "A test A2A agent",
    url: "https://agent.example.com",
    version: "1.0.0",
    capabilities: { streaming: true, pushNotifications: false },
    skills: [{ id: "search", name: "Search" }],
    endpoints: [
      {
        type: "a2a",
        url: "https://agent.example.com/a2a",
        methods: ["tasks/send", "tasks/sendSubscribe"],
      },
    ],
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// Tasks
// ---------------------------------------------------------------------------

export function createTaskRequest(id = "task-123", text = "hello"): TaskRequest {
  return {
    id,
    message: { role: "user", parts: [{ type: "text", text }] },
  };
}

export function createStreamEvent(
  index: number,
  overrides?: Partial<StreamResponse>,
): Record<string, unknown> {
  return {
    id: "task-123",
    timestamp: 1_700_000_000_000 + index,
    type: "progress",
    data: { step: index },
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// JSON-RPC
// ---------------------------------------------------------------------------

/** Read the JSON-RPC request body the client posted */
export function parseRequestBody(init: RequestInit | undefined): {
  jsonrpc: string;
  method: string;
  params: Record<string, unknown>;
  id: string;
} {
  if (typeof init?.body !== "string") {
    throw new Error("expected a string request body");
  }
  return JSON.parse(init.body);
}

/**
 * fetch mock that answers every JSON-RPC call with `result`, echoing the
 * request's correlation id.
 */
export function mockRpcResult(result: unknown) {
  return vi.fn(async (_url: string | URL | Request, init?: RequestInit) => {
    const { id } = parseRequestBody(init);
    return jsonResponse({ jsonrpc: "2.0", id, result });
  });
}

export function mockRpcError(code: number, message: string, data?: unknown) {
  return vi.fn(async (_url: string | URL | Request, init?: RequestInit) => {
    const { id } = parseRequestBody(init);
    return jsonResponse({ jsonrpc: "2.0", id, error: { code, message, data } });
  });
}

// ---------------------------------------------------------------------------
// Responses
// ---------------------------------------------------------------------------

/** Error shaped like the one fetch rejects with on abort */
export function createAbortError(): Error {
  const error = new Error("The operation was aborted.");
  error.name = "AbortError";
  return error;
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

export function textResponse(body: string, status = 200): Response {
  return new Response(body, { status });
}

/** SSE response whose body emits `chunks` in order and then closes */
export function sseResponse(chunks: readonly string[], status = 200): Response {
  const encoder = new TextEncoder();
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) {
        controller.enqueue(encoder.encode(chunk));
      }
      controller.close();
    },
  });
  return new Response(body, {
    status,
    headers: { "content-type": "text/event-stream" },
  });
}

/**
 * SSE response that emits `chunks` and then stays open until `signal`
 * aborts, at which point the body errors with an AbortError.
 */
export function openSseResponse(
  chunks: readonly string[],
  signal: AbortSignal | null | undefined,
): Response {
  const encoder = new TextEncoder();
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) {
        controller.enqueue(encoder.encode(chunk));
      }
      signal?.addEventListener("abort", () => controller.error(createAbortError()), {
        once: true,
      });
    },
  });
  return new Response(body, { status: 200, headers: { "content-type": "text/event-stream" } });
}

/** fetch mock that never settles until its signal aborts */
export function hangingFetch() {
  return vi.fn(
    (_url: string | URL | Request, init?: RequestInit) =>
      new Promise<Response>((_resolve, reject) => {
        const onAbort = () => reject(createAbortError());
        if (init?.signal?.aborted) {
          onAbort();
          return;
        }
        init?.signal?.addEventListener("abort", onAbort, { once: true });
      }),
  );
}

// ---------------------------------------------------------------------------
// Logger
// ---------------------------------------------------------------------------

export function createMockLogger(): Logger & {
  readonly debug: ReturnType<typeof vi.fn>;
  readonly info: ReturnType<typeof vi.fn>;
  readonly warn: ReturnType<typeof vi.fn>;
  readonly error: ReturnType<typeof vi.fn>;
} {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}
