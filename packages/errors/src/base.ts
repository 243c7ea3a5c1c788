import type {
  BaseErrorType,
  ErrorCode,
  ErrorDomain,
  GrpcStatusCode,
  HttpStatusCode,
} from "./catalog.js";

/**
 * Wire-safe JSON shape produced by {@link ShellgateError.toJSON}.
 */
export interface ErrorJSON {
  _tag: BaseErrorType;
  name: string;
  code: ErrorCode;
  message: string;
  domain: ErrorDomain;
  httpStatus: HttpStatusCode;
  grpcCode: GrpcStatusCode;
  isExpected: boolean;
  timestamp: string;
  metadata?: Record<string, string> | undefined;
  stack?: string | undefined;
}

/**
 * Root of the Shellgate error hierarchy.
 *
 * Subclasses pin `_tag` (the behavioral base type) and `code` (the catalog
 * entry); the remaining wire fields are copied from the catalog so that every
 * error can be serialized without knowing its concrete class.
 */
export abstract class ShellgateError extends Error {
  abstract readonly _tag: BaseErrorType;
  abstract readonly code: ErrorCode;
  abstract readonly httpStatus: HttpStatusCode;
  abstract readonly grpcCode: GrpcStatusCode;
  abstract readonly domain: ErrorDomain;
  abstract readonly isExpected: boolean;

  readonly timestamp: Date;
  readonly metadata: Record<string, string> | undefined;

  constructor(
    message: string,
    metadata?: Record<string, string>,
    options?: { cause?: Error },
  ) {
    super(message, options);
    this.name = new.target.name;
    this.timestamp = new Date();
    this.metadata = metadata;
  }

  toJSON(): ErrorJSON {
    return {
      _tag: this._tag,
      name: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      httpStatus: this.httpStatus,
      grpcCode: this.grpcCode,
      isExpected: this.isExpected,
      timestamp: this.timestamp.toISOString(),
      metadata: this.metadata,
      stack: this.stack,
    };
  }

  override toString(): string {
    let str = `${this.name} [${this.code}]: ${this.message}`;
    if (this.metadata && Object.keys(this.metadata).length > 0) {
      str += ` ${JSON.stringify(this.metadata)}`;
    }
    return str;
  }
}
