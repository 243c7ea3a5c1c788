import { ERROR_CATALOG, type ErrorDomain, type GrpcStatusCode, type HttpStatusCode } from "../catalog.js";
import { ShellgateError } from "../base.js";

/**
 * Errors caused by bugs or unexpected runtime state. HTTP 500.
 */
export class InternalError extends ShellgateError {
  readonly _tag = "InternalError" as const;
  readonly code = "INTERNAL_ERROR" as const;
  readonly httpStatus: HttpStatusCode;
  readonly grpcCode: GrpcStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;

  constructor(
    message: string,
    metadata?: Record<string, string>,
    options?: { cause?: Error },
  ) {
    super(message, metadata, options);
    const entry = ERROR_CATALOG.INTERNAL_ERROR;
    this.httpStatus = entry.httpStatus;
    this.grpcCode = entry.grpcCode;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
  }
}
