/**
 * Fetch plumbing shared by discovery and the protocol client: one deadline
 * per request, linked to the caller's AbortSignal, and a single place that
 * turns fetch failures into A2A errors.
 */

import {
  A2aCancelledError,
  A2aTransportError,
  getErrorMessage,
  isRelayError,
} from "@relaykit/errors";

/** Cap on how much of an error body is copied into an error message */
const MAX_ERROR_BODY_LENGTH = 512;

export interface Deadline {
  /** Aborts on timeout or when the caller's signal aborts */
  readonly signal: AbortSignal;
  readonly timedOut: boolean;
  dispose(): void;
}

export interface RequestContext {
  readonly url: string;
  /** Operation name used in cancellation errors */
  readonly operation: string;
  readonly timeoutMs: number;
  readonly signal?: AbortSignal | undefined;
}

/**
 * Create an abort controller that fires after `timeoutMs` or when `external`
 * aborts, whichever comes first. Call `dispose()` once the request is done.
 */
export function createDeadline(timeoutMs: number, external?: AbortSignal): Deadline {
  const controller = new AbortController();
  let timedOut = false;

  const timeout = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);

  const onExternalAbort = () => controller.abort();
  if (external?.aborted) {
    controller.abort();
  } else {
    external?.addEventListener("abort", onExternalAbort, { once: true });
  }

  return {
    signal: controller.signal,
    get timedOut() {
      return timedOut;
    },
    dispose() {
      clearTimeout(timeout);
      external?.removeEventListener("abort", onExternalAbort);
    },
  };
}

/**
 * Map a failure raised while a request was in flight. Errors already in the
 * A2A taxonomy pass through; caller aborts become A2aCancelledError; the
 * rest are transport failures.
 */
export function classifyRequestError(
  error: unknown,
  context: RequestContext,
  deadline: Deadline,
): Error {
  if (isRelayError(error)) return error;

  if (context.signal?.aborted) {
    return new A2aCancelledError(context.operation, context.signal.reason);
  }

  if (deadline.timedOut) {
    return new A2aTransportError(context.url, `Request timed out after ${context.timeoutMs}ms`, {
      timedOut: true,
      cause: error,
    });
  }

  return new A2aTransportError(context.url, describeFetchError(error), { cause: error });
}

/**
 * Run `request` under a fresh deadline. The whole callback, body reads
 * included, counts against the timeout.
 */
export async function withDeadline<T>(
  context: RequestContext,
  request: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const deadline = createDeadline(context.timeoutMs, context.signal);
  try {
    return await request(deadline.signal);
  } catch (error) {
    throw classifyRequestError(error, context, deadline);
  } finally {
    deadline.dispose();
  }
}

/**
 * Read a non-success response body for use in an error message.
 * A body that cannot be read yields "".
 */
export async function readErrorBody(response: Response): Promise<string> {
  const text = await response.text().catch(() => "");
  return text.length > MAX_ERROR_BODY_LENGTH ? `${text.slice(0, MAX_ERROR_BODY_LENGTH)}…` : text;
}

/** Check that a string is an absolute http(s) URL */
export function isHttpUrl(value: string): boolean {
  if (!URL.canParse(value)) return false;
  const { protocol } = new URL(value);
  return protocol === "http:" || protocol === "https:";
}

const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * Canonical form of an agent base address, shared by discovery, the
 * protocol client and registry records.
 *
 * A missing scheme defaults to http and trailing slashes are dropped.
 * Returns "" for blank input, input that does not parse, or a scheme
 * other than http(s).
 */
export function normalizeBaseUrl(base: string): string {
  const trimmed = base.trim();
  if (trimmed === "") return "";

  const withScheme = SCHEME_PATTERN.test(trimmed) ? trimmed : `http://${trimmed}`;
  return isHttpUrl(withScheme) ? withScheme.replace(/\/+$/, "") : "";
}

// undici reports "fetch failed" and keeps the useful part in `cause`
function describeFetchError(error: unknown): string {
  const message = getErrorMessage(error);
  if (error instanceof Error && error.cause instanceof Error) {
    return `${message}: ${error.cause.message}`;
  }
  return message;
}
