/**
 * A2AClient: JSON-RPC 2.0 over HTTP, with SSE streaming.
 *
 * Provides: sendTask, streamTask, getTaskStatus, cancelTask, sendMessage,
 *           streamMessage, ping
 * Handles: correlation ids, header injection, per-call and per-stream
 *          timeouts, error mapping to the A2A taxonomy.
 *
 * No call is retried here; task calls are not assumed to be idempotent.
 */

import {
  A2aDecodeError,
  A2aHttpStatusError,
  A2aIdMismatchError,
  A2aProtocolError,
  A2aTransportError,
} from "@relaykit/errors";
import type { z } from "zod";
import { buildAuthHeaders } from "./auth.js";
import { buildDiscoveryUrl, cardResponseError } from "./discovery.js";
import {
  classifyRequestError,
  createDeadline,
  readErrorBody,
  type RequestContext,
  withDeadline,
} from "./http.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import { decodeEventStream } from "./streaming.js";
import type {
  A2aAuthConfig,
  A2aClientConfig,
  A2aMethod,
  AgentAddress,
  AuthHeadersHook,
  CallOptions,
  JsonRpcRequest,
  Message,
  StreamResponse,
  TaskRequest,
  TaskResponse,
  TaskStatus,
} from "./types.js";
import { A2A_METHODS, DEFAULT_CALL_TIMEOUT_MS, DEFAULT_STREAM_TIMEOUT_MS } from "./types.js";
import {
  A2aClientConfigSchema,
  JsonRpcResponseSchema,
  resolveAgentEndpoint,
  TaskResponseSchema,
  TaskStatusSchema,
  toValidationIssues,
} from "./validation.js";

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

const JSON_POST_HEADERS = {
  Accept: "application/json",
  "Content-Type": "application/json",
} as const;

function createRpcRequest<P>(method: A2aMethod, params: P, id: string): JsonRpcRequest<P> {
  return { jsonrpc: "2.0", method, params, id };
}

/**
 * Decode a JSON-RPC response body and return its `result`.
 *
 * Enforces: exactly one of result/error, a matching correlation id (when
 * the agent echoes one), and a result when `resultRequired` is set.
 */
function decodeEnvelope(
  url: string,
  method: A2aMethod,
  text: string,
  correlationId: string,
  resultRequired: boolean,
): unknown {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new A2aDecodeError(url, "response body is not valid JSON", { cause: error });
  }

  const parsed = JsonRpcResponseSchema.safeParse(raw);
  if (!parsed.success) {
    throw new A2aDecodeError(url, "malformed JSON-RPC envelope", {
      issues: toValidationIssues(parsed.error),
    });
  }

  const envelope = parsed.data;
  const hasResult = envelope.result !== undefined && envelope.result !== null;

  if (envelope.error && hasResult) {
    throw new A2aDecodeError(url, "JSON-RPC envelope carries both result and error");
  }

  if (envelope.id !== undefined && envelope.id !== null && String(envelope.id) !== correlationId) {
    throw new A2aIdMismatchError("correlation", correlationId, String(envelope.id));
  }

  if (envelope.error) {
    const { code, message, data } = envelope.error;
    throw new A2aProtocolError(url, method, code, message, data);
  }

  if (!hasResult && resultRequired) {
    throw new A2aDecodeError(url, "JSON-RPC envelope carries neither result nor error");
  }

  return envelope.result;
}

function decodePayload<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  url: string,
  what: string,
): z.output<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new A2aDecodeError(url, `result is not a valid ${what}`, {
      issues: toValidationIssues(parsed.error),
    });
  }
  return parsed.data;
}

// ---------------------------------------------------------------------------
// A2AClient
// ---------------------------------------------------------------------------

export interface A2aClientOptions {
  /** Called before every request; returned headers are applied verbatim */
  readonly authHeaders?: AuthHeadersHook | undefined;
  readonly logger?: Logger | undefined;
}

export class A2AClient {
  private readonly timeoutMs: number;
  private readonly streamTimeoutMs: number;
  private readonly headers: Readonly<Record<string, string>>;
  private readonly auth: A2aAuthConfig | undefined;
  private readonly authHeaders: AuthHeadersHook | undefined;
  private readonly logger: Logger;

  constructor(config?: A2aClientConfig, options?: A2aClientOptions) {
    this.timeoutMs = config?.timeoutMs ?? DEFAULT_CALL_TIMEOUT_MS;
    this.streamTimeoutMs = config?.streamTimeoutMs ?? DEFAULT_STREAM_TIMEOUT_MS;
    this.headers = config?.headers ?? {};
    this.auth = config?.auth;
    this.authHeaders = options?.authHeaders;
    this.logger = options?.logger ?? createConsoleLogger("a2a:client");
  }

  // -------------------------------------------------------------------------
  // Tasks
  // -------------------------------------------------------------------------

  /**
   * Send a task and wait for the agent's response.
   * The response must echo `request.id`.
   */
  async sendTask(
    address: AgentAddress,
    request: TaskRequest,
    options?: CallOptions,
  ): Promise<TaskResponse> {
    const { url, result } = await this.call(
      address,
      A2A_METHODS.tasksSend,
      { id: request.id, message: request.message },
      options,
      true,
    );
    const response = decodePayload(TaskResponseSchema, result, url, "TaskResponse");
    if (response.id !== request.id) {
      throw new A2aIdMismatchError("task", request.id, response.id);
    }
    return response;
  }

  /**
   * Send a task and subscribe to its updates over SSE.
   *
   * Events are yielded in the order received. The iterator completes when
   * the agent closes the connection, or throws exactly one error: an
   * A2aHttpStatusError for a non-200 status, an A2aDecodeError for a
   * malformed event, an A2aCancelledError when `options.signal` aborts, or
   * an A2aTransportError. Breaking out of the loop closes the connection.
   */
  streamTask(
    address: AgentAddress,
    request: TaskRequest,
    options?: CallOptions,
  ): AsyncGenerator<StreamResponse, void, undefined> {
    return this.stream(
      address,
      A2A_METHODS.tasksSendSubscribe,
      { id: request.id, message: request.message },
      options,
    );
  }

  async getTaskStatus(
    address: AgentAddress,
    taskId: string,
    options?: CallOptions,
  ): Promise<TaskStatus> {
    const { url, result } = await this.call(
      address,
      A2A_METHODS.tasksStatus,
      { id: taskId },
      options,
      true,
    );
    const status = decodePayload(TaskStatusSchema, result, url, "TaskStatus");
    if (status.id !== taskId) {
      throw new A2aIdMismatchError("task", taskId, status.id);
    }
    return status;
  }

  /**
   * Cancel a task. Succeeds whenever the agent answers without a JSON-RPC
   * error; any result payload is ignored.
   */
  async cancelTask(address: AgentAddress, taskId: string, options?: CallOptions): Promise<void> {
    await this.call(address, A2A_METHODS.tasksCancel, { id: taskId }, options, false);
  }

  // -------------------------------------------------------------------------
  // Messages
  // -------------------------------------------------------------------------

  async sendMessage(
    address: AgentAddress,
    message: Message,
    options?: CallOptions,
  ): Promise<TaskResponse> {
    const { url, result } = await this.call(
      address,
      A2A_METHODS.messageSend,
      { message },
      options,
      true,
    );
    return decodePayload(TaskResponseSchema, result, url, "TaskResponse");
  }

  /** Streaming counterpart of sendMessage; same rules as streamTask */
  streamMessage(
    address: AgentAddress,
    message: Message,
    options?: CallOptions,
  ): AsyncGenerator<StreamResponse, void, undefined> {
    return this.stream(address, A2A_METHODS.messageStream, { message }, options);
  }

  // -------------------------------------------------------------------------
  // Liveness
  // -------------------------------------------------------------------------

  /**
   * Check that the agent answers on its well-known AgentCard path.
   * Resolves on 2xx; the card itself is not decoded.
   */
  async ping(address: AgentAddress, options?: CallOptions): Promise<void> {
    const url = buildDiscoveryUrl(this.resolve(address));
    const headers = await this.buildHeaders(url, options, { Accept: "application/json" });

    await withDeadline(
      {
        url,
        operation: "ping",
        timeoutMs: options?.timeoutMs ?? this.timeoutMs,
        signal: options?.signal,
      },
      async (signal) => {
        const response = await fetch(url, { method: "GET", headers, signal });
        if (!response.ok) {
          throw await cardResponseError(url, response);
        }
        await response.body?.cancel();
      },
    );
  }

  // -------------------------------------------------------------------------
  // Private helpers
  // -------------------------------------------------------------------------

  private resolve(address: AgentAddress): string {
    const url = resolveAgentEndpoint(address);
    if (url === "") {
      const raw = typeof address === "string" ? address : address.baseUrl;
      throw new A2aTransportError(raw, "Invalid or empty agent URL");
    }
    return url;
  }

  /** Request-specific headers first, so configured and per-call ones win */
  private async buildHeaders(
    url: string,
    options: CallOptions | undefined,
    base: Readonly<Record<string, string>>,
  ): Promise<Record<string, string>> {
    const hooked = this.authHeaders !== undefined ? await this.authHeaders(url) : {};
    return {
      ...base,
      ...this.headers,
      ...buildAuthHeaders(this.auth),
      ...hooked,
      ...options?.headers,
    };
  }

  private async call(
    address: AgentAddress,
    method: A2aMethod,
    params: unknown,
    options: CallOptions | undefined,
    resultRequired: boolean,
  ): Promise<{ readonly url: string; readonly result: unknown }> {
    const url = this.resolve(address);
    const id = crypto.randomUUID();
    const headers = await this.buildHeaders(url, options, JSON_POST_HEADERS);
    const body = JSON.stringify(createRpcRequest(method, params, id));

    this.logger.debug(`${method} -> ${url} (id ${id})`);

    const text = await withDeadline(
      {
        url,
        operation: method,
        timeoutMs: options?.timeoutMs ?? this.timeoutMs,
        signal: options?.signal,
      },
      async (signal) => {
        const response = await fetch(url, { method: "POST", headers, body, signal });
        if (!response.ok) {
          throw new A2aHttpStatusError(url, response.status, await readErrorBody(response));
        }
        return await response.text();
      },
    );

    return { url, result: decodeEnvelope(url, method, text, id, resultRequired) };
  }

  private async *stream(
    address: AgentAddress,
    method: A2aMethod,
    params: unknown,
    options: CallOptions | undefined,
  ): AsyncGenerator<StreamResponse, void, undefined> {
    const url = this.resolve(address);
    const id = crypto.randomUUID();
    const headers = await this.buildHeaders(url, options, {
      ...JSON_POST_HEADERS,
      Accept: "text/event-stream",
    });
    const body = JSON.stringify(createRpcRequest(method, params, id));
    const context: RequestContext = {
      url,
      operation: method,
      timeoutMs: options?.timeoutMs ?? this.streamTimeoutMs,
      signal: options?.signal,
    };
    const deadline = createDeadline(context.timeoutMs, context.signal);

    this.logger.debug(`${method} -> ${url} (id ${id}, streaming)`);

    let delivered = 0;
    try {
      const response = await fetch(url, { method: "POST", headers, body, signal: deadline.signal });
      if (response.status !== 200) {
        throw new A2aHttpStatusError(url, response.status, await readErrorBody(response));
      }
      if (response.body === null) return;

      for await (const event of decodeEventStream(response.body, url)) {
        delivered++;
        yield event;
      }
      this.logger.debug(`${method} stream from ${url} closed after ${delivered} events`);
    } catch (error) {
      throw classifyRequestError(error, context, deadline);
    } finally {
      deadline.dispose();
    }
  }
}

/**
 * Validate a client config and build the client.
 */
export function createA2aClient(config?: A2aClientConfig, options?: A2aClientOptions): A2AClient {
  return new A2AClient(A2aClientConfigSchema.parse(config ?? {}), options);
}
