/**
 * Type guards for category- and code-level discrimination.
 */

import { A2aError, A2aHttpStatusError, A2aTransportError } from "./a2a.js";
import { RelayError } from "./base.js";
import type { BaseErrorType, ErrorCode } from "./catalog.js";
import { RegistryError } from "./registry.js";

/** Check if an error belongs to the A2A domain */
export function isA2aError(error: unknown): error is A2aError {
  return error instanceof A2aError;
}

/** Check if an error belongs to the registry domain */
export function isRegistryError(error: unknown): error is RegistryError {
  return error instanceof RegistryError;
}

/**
 * Check if a RelayError has a specific error code.
 * Narrows the type to include the specific code literal.
 */
export function hasCode<C extends ErrorCode>(
  error: RelayError,
  code: C,
): error is RelayError & { readonly code: C } {
  return error.code === code;
}

/** Check if a RelayError maps to the given behavioral base type */
export function hasBaseType(error: RelayError, baseType: BaseErrorType): boolean {
  return error._tag === baseType;
}

/**
 * Check if an error represents an expected condition (4xx-class).
 * Returns false for non-RelayError values.
 */
export function isExpectedError(error: unknown): boolean {
  return error instanceof RelayError ? error.isExpected : false;
}

/**
 * Transient failures worth another discovery attempt: transport errors and
 * 5xx responses. Everything else is surfaced immediately.
 */
export function isRetryableDiscoveryError(
  error: unknown,
): error is A2aTransportError | A2aHttpStatusError {
  if (error instanceof A2aTransportError) return true;
  return error instanceof A2aHttpStatusError && error.status >= 500 && error.status < 600;
}
