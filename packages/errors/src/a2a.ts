/**
 * A2A errors: discovery and protocol client
 *
 * Abstract base: A2aError
 * Concrete:
 *   - A2aTransportError          (A2A_TRANSPORT_FAILED)
 *   - A2aHttpStatusError         (A2A_HTTP_STATUS)
 *   - A2aAgentCardNotFoundError  (A2A_AGENT_CARD_NOT_FOUND)
 *   - A2aAccessDeniedError       (A2A_ACCESS_DENIED)
 *   - A2aDiscoveryFailedError    (A2A_DISCOVERY_FAILED)
 *   - A2aDecodeError             (A2A_DECODE_FAILED)
 *   - A2aProtocolError           (A2A_PROTOCOL_ERROR)
 *   - A2aIdMismatchError         (A2A_ID_MISMATCH)
 *   - A2aAgentCardInvalidError   (A2A_AGENT_CARD_INVALID)
 *   - A2aCancelledError          (A2A_CANCELLED)
 */

import { RelayError } from "./base.js";
import type { ValidationIssue } from "./types.js";

// ---------------------------------------------------------------------------
// Abstract Base
// ---------------------------------------------------------------------------

export abstract class A2aError extends RelayError {}

// ---------------------------------------------------------------------------
// Transport / HTTP
// ---------------------------------------------------------------------------

export class A2aTransportError extends A2aError {
  readonly _tag = "ExternalError" as const;
  readonly code = "A2A_TRANSPORT_FAILED" as const;
  readonly url: string;
  readonly timedOut: boolean;

  constructor(
    url: string,
    message: string,
    options?: { readonly timedOut?: boolean; readonly cause?: unknown },
  ) {
    super(
      `A2A request to "${url}" failed: ${message}`,
      undefined,
      undefined,
      options?.cause !== undefined ? { cause: options.cause } : undefined,
    );
    this.url = url;
    this.timedOut = options?.timedOut ?? false;
  }
}

export class A2aHttpStatusError extends A2aError {
  readonly _tag = "ExternalError" as const;
  readonly code = "A2A_HTTP_STATUS" as const;
  readonly url: string;
  readonly status: number;
  readonly body: string;

  constructor(url: string, status: number, body = "") {
    super(`A2A request to "${url}" returned HTTP ${status}${body ? `: ${body}` : ""}`);
    this.url = url;
    this.status = status;
    this.body = body;
  }
}

export class A2aAgentCardNotFoundError extends A2aError {
  readonly _tag = "NotFoundError" as const;
  readonly code = "A2A_AGENT_CARD_NOT_FOUND" as const;
  readonly url: string;
  readonly status = 404;

  constructor(url: string) {
    super(`Agent card not found (404) at "${url}"`);
    this.url = url;
  }
}

export class A2aAccessDeniedError extends A2aError {
  readonly _tag = "PermissionError" as const;
  readonly code = "A2A_ACCESS_DENIED" as const;
  readonly url: string;
  readonly status: number;

  constructor(url: string, status: number) {
    super(`Access denied (${status}) to "${url}"`);
    this.url = url;
    this.status = status;
  }
}

// ---------------------------------------------------------------------------
// Discovery
// ---------------------------------------------------------------------------

export class A2aDiscoveryFailedError extends A2aError {
  readonly _tag = "ExternalError" as const;
  readonly code = "A2A_DISCOVERY_FAILED" as const;
  readonly url: string;
  readonly attempts: number;

  constructor(url: string, attempts: number, cause: Error) {
    super(
      `A2A discovery of "${url}" failed after ${attempts} attempts: ${cause.message}`,
      undefined,
      undefined,
      { cause },
    );
    this.url = url;
    this.attempts = attempts;
  }
}

export class A2aAgentCardInvalidError extends A2aError {
  readonly _tag = "ValidationError" as const;
  readonly code = "A2A_AGENT_CARD_INVALID" as const;
  /** Path of the first offending field, e.g. `endpoints[1].url` */
  readonly field: string;
  /** Index of the offending endpoint, when the first issue is inside `endpoints` */
  readonly endpointIndex: number | undefined;
  readonly issues: readonly ValidationIssue[];

  constructor(issues: readonly [ValidationIssue, ...ValidationIssue[]]) {
    const [first] = issues;
    super(`AgentCard validation failed: ${first.field}: ${first.message}`);
    this.field = first.field;
    const match = /^endpoints\[(\d+)\]/.exec(first.field);
    this.endpointIndex = match?.[1] !== undefined ? Number(match[1]) : undefined;
    this.issues = issues;
  }
}

// ---------------------------------------------------------------------------
// Payload / protocol
// ---------------------------------------------------------------------------

export class A2aDecodeError extends A2aError {
  readonly _tag = "ExternalError" as const;
  readonly code = "A2A_DECODE_FAILED" as const;
  readonly url: string;
  readonly issues: readonly ValidationIssue[];

  constructor(
    url: string,
    message: string,
    options?: { readonly issues?: readonly ValidationIssue[]; readonly cause?: unknown },
  ) {
    super(
      `Malformed response from "${url}": ${message}`,
      undefined,
      undefined,
      options?.cause !== undefined ? { cause: options.cause } : undefined,
    );
    this.url = url;
    this.issues = options?.issues ?? [];
  }
}

export class A2aProtocolError extends A2aError {
  readonly _tag = "ExternalError" as const;
  readonly code = "A2A_PROTOCOL_ERROR" as const;
  readonly url: string;
  readonly method: string;
  /** JSON-RPC error code reported by the agent */
  readonly rpcCode: number;
  /** JSON-RPC error message reported by the agent */
  readonly rpcMessage: string;
  readonly data: unknown;

  constructor(url: string, method: string, rpcCode: number, rpcMessage: string, data?: unknown) {
    super(`JSON-RPC error from "${url}" (${method}): ${rpcMessage} (code: ${rpcCode})`);
    this.url = url;
    this.method = method;
    this.rpcCode = rpcCode;
    this.rpcMessage = rpcMessage;
    this.data = data;
  }
}

export class A2aIdMismatchError extends A2aError {
  readonly _tag = "ExternalError" as const;
  readonly code = "A2A_ID_MISMATCH" as const;
  /** Which id disagreed: the JSON-RPC correlation id or the task id */
  readonly kind: "correlation" | "task";
  readonly expected: string;
  readonly actual: string;

  constructor(kind: "correlation" | "task", expected: string, actual: string) {
    super(`Response ${kind} id mismatch: expected "${expected}", got "${actual}"`);
    this.kind = kind;
    this.expected = expected;
    this.actual = actual;
  }
}

// ---------------------------------------------------------------------------
// Cancellation
// ---------------------------------------------------------------------------

export class A2aCancelledError extends A2aError {
  readonly _tag = "TimeoutError" as const;
  readonly code = "A2A_CANCELLED" as const;
  readonly operation: string;

  constructor(operation: string, cause?: unknown) {
    super(
      `A2A ${operation} was cancelled`,
      undefined,
      undefined,
      cause !== undefined ? { cause } : undefined,
    );
    this.operation = operation;
  }
}
