/**
 * Server-Sent Events decoding for A2A streaming calls.
 *
 * Only `data:` lines carry payload; each payload is one StreamResponse JSON
 * object. Other SSE fields (`event:`, `id:`, comments) are ignored.
 */

import type { ReadableStream } from "node:stream/web";
import { A2aDecodeError, getErrorMessage } from "@relaykit/errors";
import type { StreamResponse } from "./types.js";
import { StreamResponseSchema, toValidationIssues } from "./validation.js";

const DATA_PREFIX = "data:";

/**
 * Split a byte stream into lines. Handles chunks that end mid-line and
 * CRLF line endings. Cancels the stream if the consumer stops early.
 */
export async function* readLines(
  body: ReadableStream<Uint8Array>,
): AsyncGenerator<string, void, undefined> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = "";
  let settled = false;

  try {
    for (;;) {
      const chunk = await reader.read().catch((error: unknown) => {
        settled = true;
        throw error;
      });
      if (chunk.done) {
        settled = true;
        break;
      }

      buffer += decoder.decode(chunk.value, { stream: true });
      const lines = buffer.split("\n");
      buffer = lines.pop() ?? "";
      for (const line of lines) {
        yield stripCarriageReturn(line);
      }
    }

    buffer += decoder.decode();
    if (buffer.length > 0) {
      yield stripCarriageReturn(buffer);
    }
  } finally {
    if (!settled) {
      await reader.cancel();
    }
    reader.releaseLock();
  }
}

function stripCarriageReturn(line: string): string {
  return line.endsWith("\r") ? line.slice(0, -1) : line;
}

/**
 * Extract the payload of a `data:` line. Returns undefined for other lines
 * and for empty payloads.
 */
export function extractDataPayload(line: string): string | undefined {
  if (!line.startsWith(DATA_PREFIX)) return undefined;
  const payload = line.slice(DATA_PREFIX.length).trim();
  return payload === "" ? undefined : payload;
}

/**
 * Decode one event payload.
 *
 * @throws {A2aDecodeError} on malformed JSON or a payload that is not a
 * StreamResponse
 */
export function parseStreamEvent(payload: string, source: string): StreamResponse {
  let raw: unknown;
  try {
    raw = JSON.parse(payload);
  } catch (error) {
    throw new A2aDecodeError(source, `malformed stream event: ${getErrorMessage(error)}`, {
      cause: error,
    });
  }

  const parsed = StreamResponseSchema.safeParse(raw);
  if (!parsed.success) {
    throw new A2aDecodeError(source, "stream event is not a StreamResponse", {
      issues: toValidationIssues(parsed.error),
    });
  }
  return parsed.data;
}

/**
 * Decode an SSE body into StreamResponse events, in network order. The
 * first malformed event ends the stream with an A2aDecodeError.
 */
export async function* decodeEventStream(
  body: ReadableStream<Uint8Array>,
  source: string,
): AsyncGenerator<StreamResponse, void, undefined> {
  for await (const line of readLines(body)) {
    const payload = extractDataPayload(line);
    if (payload === undefined) continue;
    yield parseStreamEvent(payload, source);
  }
}
