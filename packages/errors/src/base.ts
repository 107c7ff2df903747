import {
  type BaseErrorType,
  ERROR_CATALOG,
  type ErrorCode,
  type ErrorDomain,
  type GrpcStatusCode,
  type HttpStatusCode,
} from "./catalog.js";

/**
 * Wire-safe representation of a RelayError.
 */
export interface ErrorJSON {
  readonly _tag: BaseErrorType;
  readonly name: string;
  readonly code: ErrorCode;
  readonly message: string;
  readonly httpStatus: HttpStatusCode;
  readonly grpcCode: GrpcStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly timestamp: string;
  readonly metadata?: Record<string, string> | undefined;
  readonly traceId?: string | undefined;
}

/**
 * Root of the relaykit error hierarchy.
 *
 * Subclasses only declare `_tag` and `code`; HTTP status, gRPC code, domain
 * and `isExpected` are read from the catalog entry for that code.
 */
export abstract class RelayError extends Error {
  abstract readonly _tag: BaseErrorType;
  abstract readonly code: ErrorCode;

  readonly metadata: Record<string, string> | undefined;
  readonly traceId: string | undefined;
  readonly timestamp: Date;

  constructor(
    message: string,
    metadata?: Record<string, string>,
    traceId?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
    this.metadata = metadata;
    this.traceId = traceId;
    this.timestamp = new Date();
  }

  get httpStatus(): HttpStatusCode {
    return ERROR_CATALOG[this.code].httpStatus;
  }

  get grpcCode(): GrpcStatusCode {
    return ERROR_CATALOG[this.code].grpcCode;
  }

  get domain(): ErrorDomain {
    return ERROR_CATALOG[this.code].domain;
  }

  get isExpected(): boolean {
    return ERROR_CATALOG[this.code].isExpected;
  }

  toJSON(): ErrorJSON {
    return {
      _tag: this._tag,
      name: this.name,
      code: this.code,
      message: this.message,
      httpStatus: this.httpStatus,
      grpcCode: this.grpcCode,
      domain: this.domain,
      isExpected: this.isExpected,
      timestamp: this.timestamp.toISOString(),
      ...(this.metadata ? { metadata: this.metadata } : {}),
      ...(this.traceId ? { traceId: this.traceId } : {}),
    };
  }
}

/** Check if a value is a RelayError */
export function isRelayError(error: unknown): error is RelayError {
  return error instanceof RelayError;
}

/** Check if a value is any Error */
export function isError(error: unknown): error is Error {
  return error instanceof Error;
}
