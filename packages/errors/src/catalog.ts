/**
 * Error Catalog - Single Source of Truth
 *
 * Every error code raised by the relaykit packages is declared here. Each
 * entry maps the code to an HTTP status, a gRPC canonical code and one of
 * the behavioral base types, so callers can branch on category instead of
 * on individual classes.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 * Domains: a2a, registry
 */

/**
 * The behavioral base error types that all error codes map to.
 */
export type BaseErrorType =
  | "ValidationError"
  | "NotFoundError"
  | "PermissionError"
  | "ConflictError"
  | "RateLimitError"
  | "TimeoutError"
  | "ExternalError"
  | "InternalError";

export const ERROR_CATALOG = {
  // ============================================================================
  // A2A ERRORS - Discovery and protocol client
  // ============================================================================
  A2A_TRANSPORT_FAILED: {
    domain: "a2a",
    httpStatus: 502,
    grpcCode: "UNAVAILABLE" as const,
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "A2A transport failure",
    description: "The remote agent could not be reached or the request timed out",
  },
  A2A_HTTP_STATUS: {
    domain: "a2a",
    httpStatus: 502,
    grpcCode: "UNKNOWN" as const,
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "Unexpected HTTP status",
    description: "The remote agent answered with a non-success HTTP status",
  },
  A2A_AGENT_CARD_NOT_FOUND: {
    domain: "a2a",
    httpStatus: 404,
    grpcCode: "NOT_FOUND" as const,
    baseType: "NotFoundError" as const,
    isExpected: true,
    title: "Agent card not found",
    description: "No agent card is published at the well-known discovery path",
  },
  A2A_ACCESS_DENIED: {
    domain: "a2a",
    httpStatus: 403,
    grpcCode: "PERMISSION_DENIED" as const,
    baseType: "PermissionError" as const,
    isExpected: true,
    title: "Access denied",
    description: "The remote agent refused the request (HTTP 401 or 403)",
  },
  A2A_DISCOVERY_FAILED: {
    domain: "a2a",
    httpStatus: 503,
    grpcCode: "UNAVAILABLE" as const,
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "Agent discovery failed",
    description: "The agent card could not be fetched after all retry attempts",
  },
  A2A_DECODE_FAILED: {
    domain: "a2a",
    httpStatus: 502,
    grpcCode: "DATA_LOSS" as const,
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "Malformed response",
    description: "A response body or payload could not be decoded",
  },
  A2A_PROTOCOL_ERROR: {
    domain: "a2a",
    httpStatus: 502,
    grpcCode: "ABORTED" as const,
    baseType: "ExternalError" as const,
    isExpected: true,
    title: "Agent reported an error",
    description: "The remote agent answered with a JSON-RPC error object",
  },
  A2A_ID_MISMATCH: {
    domain: "a2a",
    httpStatus: 502,
    grpcCode: "FAILED_PRECONDITION" as const,
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "Response id mismatch",
    description: "A response carried an id different from the one requested",
  },
  A2A_AGENT_CARD_INVALID: {
    domain: "a2a",
    httpStatus: 422,
    grpcCode: "INVALID_ARGUMENT" as const,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Invalid agent card",
    description: "The agent card failed schema or semantic validation",
  },
  A2A_CANCELLED: {
    domain: "a2a",
    httpStatus: 499,
    grpcCode: "CANCELLED" as const,
    baseType: "TimeoutError" as const,
    isExpected: true,
    title: "Operation cancelled",
    description: "The caller aborted the operation",
  },

  // ============================================================================
  // REGISTRY ERRORS - In-memory agent registry
  // ============================================================================
  REGISTRY_AGENT_NOT_FOUND: {
    domain: "registry",
    httpStatus: 404,
    grpcCode: "NOT_FOUND" as const,
    baseType: "NotFoundError" as const,
    isExpected: true,
    title: "Agent not registered",
    description: "No agent with the given id is present in the registry",
  },
  REGISTRY_AGENT_INVALID: {
    domain: "registry",
    httpStatus: 400,
    grpcCode: "INVALID_ARGUMENT" as const,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Invalid agent record",
    description: "The agent record cannot be registered",
  },
  REGISTRY_FULL: {
    domain: "registry",
    httpStatus: 429,
    grpcCode: "RESOURCE_EXHAUSTED" as const,
    baseType: "RateLimitError" as const,
    isExpected: true,
    title: "Registry full",
    description: "The registry reached its configured maximum number of agents",
  },
} as const;

// ============================================================================
// TYPE EXPORTS
// ============================================================================

/**
 * Union type of all error codes
 */
export type ErrorCode = keyof typeof ERROR_CATALOG;

/**
 * Type representing a single error catalog entry
 */
export type ErrorCatalogEntry = (typeof ERROR_CATALOG)[ErrorCode];

/**
 * Union type of all domain names
 */
export type ErrorDomain = ErrorCatalogEntry["domain"];

/**
 * gRPC canonical status codes used in the catalog
 */
export type GrpcStatusCode = ErrorCatalogEntry["grpcCode"];

/**
 * HTTP status codes used in the catalog
 */
export type HttpStatusCode = ErrorCatalogEntry["httpStatus"];

/**
 * Extract all ErrorCodes that belong to a specific BaseErrorType
 */
export type CodesForBase<B extends BaseErrorType> = {
  [K in ErrorCode]: (typeof ERROR_CATALOG)[K]["baseType"] extends B ? K : never;
}[ErrorCode];
