/**
 * Core types for the A2A protocol client.
 *
 * Wire-level shapes (AgentCard, JSON-RPC envelope, task envelopes) plus the
 * registry's Agent record, which embeds a validated card.
 */

// ---------------------------------------------------------------------------
// Protocol methods
// ---------------------------------------------------------------------------

/** The six standard A2A JSON-RPC methods */
export const A2A_METHODS = {
  tasksSend: "tasks/send",
  tasksSendSubscribe: "tasks/sendSubscribe",
  tasksStatus: "tasks/status",
  tasksCancel: "tasks/cancel",
  messageSend: "message/send",
  messageStream: "message/stream",
} as const;

export type A2aMethod = (typeof A2A_METHODS)[keyof typeof A2A_METHODS];

const A2A_METHOD_SET: ReadonlySet<string> = new Set(Object.values(A2A_METHODS));

export function isA2aMethod(method: string): method is A2aMethod {
  return A2A_METHOD_SET.has(method);
}

// ---------------------------------------------------------------------------
// Agent Card
// ---------------------------------------------------------------------------

export const ENDPOINT_TYPES = ["a2a", "streaming", "webhook"] as const;

export type EndpointType = (typeof ENDPOINT_TYPES)[number];

/**
 * One endpoint advertised by an agent. `type` is kept as the raw string so
 * that validation can name an unsupported value instead of failing decode.
 */
export interface Endpoint {
  readonly type: string;
  readonly url: string;
  readonly methods: readonly string[];
  readonly headers?: Readonly<Record<string, string>> | undefined;
  readonly description?: string | undefined;
}

/** Well-known capability flag names. Cards may carry others. */
export type KnownCapability = "streaming" | "pushNotifications" | "stateTransitionHistory";

/** Capability name to flag. Unknown or absent names read as false. */
export type AgentCapabilities = Readonly<Record<string, boolean>>;

export interface AgentAuthentication {
  readonly type: string;
  readonly config?: Readonly<Record<string, unknown>> | undefined;
}

export interface AgentSkill {
  readonly id: string;
  readonly name: string;
  readonly description?: string | undefined;
  readonly tags?: readonly string[] | undefined;
}

export interface AgentCard {
  readonly name: string;
  readonly description?: string | undefined;
  readonly url?: string | undefined;
  readonly version: string;
  readonly capabilities: AgentCapabilities;
  readonly authentication?: AgentAuthentication | undefined;
  readonly defaultInputModes?: readonly string[] | undefined;
  readonly defaultOutputModes?: readonly string[] | undefined;
  readonly skills?: readonly AgentSkill[] | undefined;
  readonly endpoints: readonly Endpoint[];
  readonly metadata?: unknown;
}

// ---------------------------------------------------------------------------
// Agent (registry record)
// ---------------------------------------------------------------------------

export type AgentStatus = "discovering" | "online" | "offline" | "error";

export interface Agent {
  readonly id: string;
  readonly name: string;
  readonly url: string;
  readonly card: AgentCard;
  readonly status: AgentStatus;
  /** Epoch ms, fixed at creation */
  readonly discoveredAt: number;
  /** Epoch ms, refreshed on every status update */
  readonly lastSeen: number;
}

// ---------------------------------------------------------------------------
// Messages and tasks
// ---------------------------------------------------------------------------

export interface FileContent {
  readonly name: string;
  readonly mimeType?: string | undefined;
  readonly size?: number | undefined;
  readonly url?: string | undefined;
  /** Base64-encoded bytes */
  readonly content?: string | undefined;
}

export type Part =
  | { readonly type: "text"; readonly text: string }
  | { readonly type: "file"; readonly file: FileContent }
  | { readonly type: "data"; readonly data: unknown };

export interface Message {
  readonly role: string;
  readonly parts: readonly Part[];
}

export interface TaskRequest {
  readonly id: string;
  readonly message: Message;
}

export interface TaskResponse {
  readonly id: string;
  readonly message?: Message | undefined;
  readonly status: string;
  readonly error?: string | undefined;
}

export interface TaskStatus {
  readonly id: string;
  readonly status: string;
  /** Fraction in [0, 1] */
  readonly progress?: number | undefined;
  /** Epoch ms */
  readonly startedAt?: number | undefined;
  /** Epoch ms */
  readonly completedAt?: number | undefined;
  readonly error?: string | undefined;
}

export interface StreamResponse {
  readonly id: string;
  /** Epoch ms */
  readonly timestamp: number;
  readonly type: string;
  readonly data: unknown;
  /** Set on the terminal event of a stream */
  readonly done?: boolean | undefined;
}

// ---------------------------------------------------------------------------
// JSON-RPC envelope
// ---------------------------------------------------------------------------

export interface JsonRpcRequest<P = unknown> {
  readonly jsonrpc: "2.0";
  readonly method: A2aMethod;
  readonly params: P;
  readonly id: string;
}

export interface JsonRpcErrorObject {
  readonly code: number;
  readonly message: string;
  readonly data?: unknown;
}

// ---------------------------------------------------------------------------
// Addressing and call options
// ---------------------------------------------------------------------------

/**
 * Where to send a protocol call: either a full endpoint URL, or a base URL
 * plus a logical agent id appended as one more path segment.
 */
export type AgentAddress =
  | string
  | {
      readonly baseUrl: string;
      readonly agentId?: string | undefined;
    };

export interface CallOptions {
  readonly signal?: AbortSignal | undefined;
  /** Extra headers applied after the client's own */
  readonly headers?: Readonly<Record<string, string>> | undefined;
  /** Overrides the client's per-call timeout */
  readonly timeoutMs?: number | undefined;
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

/**
 * Precomputed credentials applied as request headers.
 */
export type A2aAuthConfig =
  | { readonly type: "bearer"; readonly token: string }
  | { readonly type: "apiKey"; readonly apiKey: string; readonly headerName?: string | undefined };

/** Hook returning extra headers for each outgoing request */
export type AuthHeadersHook = (
  url: string,
) => Readonly<Record<string, string>> | Promise<Readonly<Record<string, string>>>;

export interface DiscovererConfig {
  /** Per-attempt timeout in milliseconds (default: 30_000) */
  readonly timeoutMs?: number | undefined;
  /** Retries after the first attempt (default: 3) */
  readonly maxRetries?: number | undefined;
  /** Delay between attempts in milliseconds (default: 2_000) */
  readonly retryDelayMs?: number | undefined;
  /** User-Agent header sent with discovery requests */
  readonly userAgent?: string | undefined;
  /** Agent Card cache TTL in milliseconds; 0 disables the cache (default: 0) */
  readonly cacheTtlMs?: number | undefined;
  /** Maximum Agent Card cache entries (default: 100) */
  readonly cacheMaxEntries?: number | undefined;
}

export interface A2aClientConfig {
  /** Per-call timeout in milliseconds (default: 30_000) */
  readonly timeoutMs?: number | undefined;
  /** Upper bound on a whole stream in milliseconds (default: 300_000) */
  readonly streamTimeoutMs?: number | undefined;
  /** Headers sent with every request */
  readonly headers?: Readonly<Record<string, string>> | undefined;
  readonly auth?: A2aAuthConfig | undefined;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Well-known Agent Card path */
export const AGENT_CARD_PATH = "/.well-known/agent.json";

export const DEFAULT_DISCOVERY_TIMEOUT_MS = 30_000;

export const DEFAULT_MAX_RETRIES = 3;

export const DEFAULT_RETRY_DELAY_MS = 2_000;

export const DEFAULT_USER_AGENT = "relaykit-a2a/0.1";

export const DEFAULT_CALL_TIMEOUT_MS = 30_000;

export const DEFAULT_STREAM_TIMEOUT_MS = 300_000;

export const DEFAULT_CACHE_MAX_ENTRIES = 100;
