/**
 * Zod schemas for A2A configuration and wire payloads.
 */

import type { ValidationIssue } from "@relaykit/errors";
import { z } from "zod";
import { normalizeBaseUrl } from "./http.js";
import type { AgentAddress, AgentCapabilities, Part, StreamResponse } from "./types.js";

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export const A2aAuthConfigSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("bearer"),
    token: z.string().min(1),
  }),
  z.object({
    type: z.literal("apiKey"),
    apiKey: z.string().min(1),
    headerName: z.string().min(1).optional(),
  }),
]);

export const DiscovererConfigSchema = z.object({
  timeoutMs: z.number().int().min(1_000).max(120_000).optional(),
  maxRetries: z.number().int().min(0).max(10).optional(),
  retryDelayMs: z.number().int().min(0).max(60_000).optional(),
  userAgent: z.string().min(1).optional(),
  cacheTtlMs: z.number().int().min(0).max(3_600_000).optional(),
  cacheMaxEntries: z.number().int().min(1).max(10_000).optional(),
});

export const A2aClientConfigSchema = z.object({
  timeoutMs: z.number().int().min(1_000).max(600_000).optional(),
  streamTimeoutMs: z.number().int().min(1_000).max(3_600_000).optional(),
  headers: z.record(z.string()).optional(),
  auth: A2aAuthConfigSchema.optional(),
});

// ---------------------------------------------------------------------------
// Agent Card (shape only; semantic rules live in validateAgentCard)
// ---------------------------------------------------------------------------

/**
 * Capabilities arrive either as `{ streaming: true, ... }` or, from older
 * agents, as a list of names. Non-boolean values are dropped.
 */
const CapabilitiesSchema = z
  .union([
    z.record(z.unknown()).transform(
      (flags): AgentCapabilities =>
        Object.fromEntries(
          Object.entries(flags).filter(
            (entry): entry is [string, boolean] => typeof entry[1] === "boolean",
          ),
        ),
    ),
    z
      .array(z.unknown())
      .transform(
        (names): AgentCapabilities =>
          Object.fromEntries(
            names.filter((name): name is string => typeof name === "string").map((n) => [n, true]),
          ),
      ),
  ])
  .nullish()
  .transform((capabilities): AgentCapabilities => capabilities ?? {});

const EndpointWireSchema = z.object({
  type: z.string().default(""),
  url: z.string().default(""),
  methods: z
    .array(z.string())
    .nullish()
    .transform((methods) => methods ?? []),
  headers: z.record(z.string()).optional(),
  description: z.string().optional(),
});

const AgentSkillWireSchema = z.object({
  id: z.string().default(""),
  name: z.string(),
  description: z.string().optional(),
  tags: z.array(z.string()).optional(),
});

export const AgentCardWireSchema = z.object({
  name: z.string().default(""),
  description: z.string().optional(),
  url: z.string().optional(),
  version: z.string().default(""),
  capabilities: CapabilitiesSchema,
  authentication: z
    .object({
      type: z.string(),
      config: z.record(z.unknown()).optional(),
    })
    .optional(),
  defaultInputModes: z.array(z.string()).optional(),
  defaultOutputModes: z.array(z.string()).optional(),
  skills: z.array(AgentSkillWireSchema).optional(),
  endpoints: z
    .array(EndpointWireSchema)
    .nullish()
    .transform((endpoints) => endpoints ?? []),
  metadata: z.unknown().optional(),
});

// ---------------------------------------------------------------------------
// JSON-RPC envelope
// ---------------------------------------------------------------------------

export const JsonRpcErrorSchema = z.object({
  code: z.number().int(),
  message: z.string(),
  data: z.unknown().optional(),
});

export const JsonRpcResponseSchema = z.object({
  jsonrpc: z.literal("2.0"),
  result: z.unknown().optional(),
  error: JsonRpcErrorSchema.nullish(),
  id: z.union([z.string(), z.number(), z.null()]).optional(),
});

// ---------------------------------------------------------------------------
// Task payloads
// ---------------------------------------------------------------------------

/** RFC 3339 string or epoch ms, normalized to epoch ms */
const TimestampSchema = z.union([z.number(), z.string()]).transform((value, ctx) => {
  if (typeof value === "number") return value;
  const ms = Date.parse(value);
  if (Number.isNaN(ms)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid timestamp "${value}"` });
    return z.NEVER;
  }
  return ms;
});

const FileContentSchema = z.object({
  name: z.string(),
  mimeType: z.string().optional(),
  size: z.number().int().nonnegative().optional(),
  url: z.string().optional(),
  content: z.string().optional(),
});

export const PartSchema = z
  .discriminatedUnion("type", [
    z.object({ type: z.literal("text"), text: z.string() }),
    z.object({ type: z.literal("file"), file: FileContentSchema }),
    z.object({ type: z.literal("data"), data: z.unknown() }),
  ])
  .transform((part): Part => {
    switch (part.type) {
      case "text":
        return { type: "text", text: part.text };
      case "file":
        return { type: "file", file: part.file };
      case "data":
        return { type: "data", data: part.data };
    }
  });

export const MessageSchema = z.object({
  role: z.string(),
  parts: z.array(PartSchema),
});

export const TaskResponseSchema = z.object({
  id: z.string(),
  message: MessageSchema.optional(),
  status: z.string(),
  error: z.string().optional(),
});

export const TaskStatusSchema = z.object({
  id: z.string(),
  status: z.string(),
  progress: z.number().min(0).max(1).optional(),
  startedAt: TimestampSchema.optional(),
  completedAt: TimestampSchema.optional(),
  error: z.string().optional(),
});

export const StreamResponseSchema = z
  .object({
    id: z.string(),
    timestamp: TimestampSchema,
    type: z.string(),
    data: z.unknown(),
    done: z.boolean().optional(),
  })
  .transform(
    (event): StreamResponse => ({
      id: event.id,
      timestamp: event.timestamp,
      type: event.type,
      data: event.data,
      ...(event.done !== undefined ? { done: event.done } : {}),
    }),
  );

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Render a zod path as `endpoints[1].methods[0]` */
export function formatIssuePath(path: readonly (string | number)[]): string {
  return path.reduce<string>((acc, segment) => {
    if (typeof segment === "number") return `${acc}[${segment}]`;
    return acc === "" ? segment : `${acc}.${segment}`;
  }, "");
}

export function toValidationIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    field: formatIssuePath(issue.path),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Resolve an address to the endpoint URL a JSON-RPC call is posted to.
 * Returns "" when the base URL is unusable.
 */
export function resolveAgentEndpoint(address: AgentAddress): string {
  if (typeof address === "string") {
    return normalizeBaseUrl(address);
  }

  const base = normalizeBaseUrl(address.baseUrl);
  const agentId = address.agentId?.trim().replace(/^\/+/, "") ?? "";
  if (base === "" || agentId === "") {
    return base;
  }
  return `${base}/${agentId}`;
}
