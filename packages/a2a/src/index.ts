/**
 * @relaykit/a2a: A2A Protocol Client
 *
 * Discover remote A2A agents through their AgentCard and call them over
 * JSON-RPC, with SSE streaming.
 *
 * Public API surface.
 */

// Client
export { A2AClient, type A2aClientOptions, createA2aClient } from "./a2a-client.js";
// Discovery
export {
  AgentCardDiscoverer,
  buildDiscoveryUrl,
  createDiscoverer,
  decodeAgentCard,
  type DiscovererOptions,
  parseAgentCard,
  validateAgentCard,
} from "./discovery.js";
// URLs
export { isHttpUrl, normalizeBaseUrl } from "./http.js";
// Streaming
export { decodeEventStream, extractDataPayload, parseStreamEvent, readLines } from "./streaming.js";
// Auth
export { buildAuthHeaders, DEFAULT_API_KEY_HEADER } from "./auth.js";
// Logging
export { type ConsoleLoggerOptions, createConsoleLogger, type Logger, silentLogger } from "./logger.js";
// Utils
export { deepFreeze, isDeepFrozen } from "./utils/deep-freeze.js";
// Types
export type {
  A2aAuthConfig,
  A2aClientConfig,
  A2aMethod,
  Agent,
  AgentAddress,
  AgentAuthentication,
  AgentCapabilities,
  AgentCard,
  AgentSkill,
  AgentStatus,
  AuthHeadersHook,
  CallOptions,
  DiscovererConfig,
  Endpoint,
  EndpointType,
  FileContent,
  JsonRpcErrorObject,
  JsonRpcRequest,
  KnownCapability,
  Message,
  Part,
  StreamResponse,
  TaskRequest,
  TaskResponse,
  TaskStatus,
} from "./types.js";
export {
  A2A_METHODS,
  AGENT_CARD_PATH,
  DEFAULT_CACHE_MAX_ENTRIES,
  DEFAULT_CALL_TIMEOUT_MS,
  DEFAULT_DISCOVERY_TIMEOUT_MS,
  DEFAULT_MAX_RETRIES,
  DEFAULT_RETRY_DELAY_MS,
  DEFAULT_STREAM_TIMEOUT_MS,
  DEFAULT_USER_AGENT,
  ENDPOINT_TYPES,
  isA2aMethod,
} from "./types.js";
// Validation schemas
export {
  A2aAuthConfigSchema,
  A2aClientConfigSchema,
  AgentCardWireSchema,
  DiscovererConfigSchema,
  JsonRpcResponseSchema,
  resolveAgentEndpoint,
  StreamResponseSchema,
  TaskResponseSchema,
  TaskStatusSchema,
} from "./validation.js";
