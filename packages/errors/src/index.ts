/**
 * @relaykit/errors
 *
 * Shared error taxonomy for the relaykit A2A client packages.
 *
 * Each error carries a `.code` from the catalog that discriminates the
 * specific condition. Use `error.code === "XXX"` or `hasCode()` for
 * fine-grained matching, `instanceof` for class matching, or `_tag` for
 * the behavioral category.
 */

// ============================================================================
// CORE EXPORTS
// ============================================================================

export { type ErrorJSON, isError, isRelayError, RelayError } from "./base.js";

export {
  type BaseErrorType,
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
  type GrpcStatusCode,
  type HttpStatusCode,
} from "./catalog.js";

export {
  getAllErrorCodes,
  getCatalogEntry,
  getErrorCodesByDomain,
  getErrorMessage,
  isClientError,
  isServerError,
  isValidErrorCode,
  validateCatalog,
} from "./utils.js";

export type {
  ExternalCodes,
  NotFoundCodes,
  PermissionCodes,
  RateLimitCodes,
  TimeoutCodes,
  ValidationCodes,
  ValidationIssue,
} from "./types.js";

// ============================================================================
// TYPE GUARDS
// ============================================================================

export {
  hasBaseType,
  hasCode,
  isA2aError,
  isExpectedError,
  isRegistryError,
  isRetryableDiscoveryError,
} from "./guards.js";

// ============================================================================
// A2A ERRORS
// ============================================================================

export {
  A2aAccessDeniedError,
  A2aAgentCardInvalidError,
  A2aAgentCardNotFoundError,
  A2aCancelledError,
  A2aDecodeError,
  A2aDiscoveryFailedError,
  A2aError,
  A2aHttpStatusError,
  A2aIdMismatchError,
  A2aProtocolError,
  A2aTransportError,
} from "./a2a.js";

// ============================================================================
// REGISTRY ERRORS
// ============================================================================

export {
  RegistryAgentInvalidError,
  RegistryAgentNotFoundError,
  RegistryError,
  RegistryFullError,
} from "./registry.js";
