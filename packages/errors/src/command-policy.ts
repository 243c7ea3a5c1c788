import { ShellgateError } from "./base.js";
import { ERROR_CATALOG, type ErrorDomain, type GrpcStatusCode, type HttpStatusCode } from "./catalog.js";
import type { ValidationIssue } from "./types.js";

// ---------------------------------------------------------------------------
// Base class for all command-policy errors
// ---------------------------------------------------------------------------

/**
 * Abstract base class for command-policy errors.
 *
 * Enables generic catch: `if (e instanceof CommandPolicyError)`
 * while specific subclasses allow precise handling.
 */
export abstract class CommandPolicyError extends ShellgateError {}

// ---------------------------------------------------------------------------
// Malformed input: parser could not split the command
// ---------------------------------------------------------------------------

/**
 * Thrown when a command string cannot be tokenized into segments
 * (unterminated quote, empty segment, empty or oversized input).
 */
export class CommandMalformedInputError extends CommandPolicyError {
  readonly _tag = "ValidationError" as const;
  readonly code = "COMMAND_MALFORMED_INPUT" as const;
  readonly httpStatus: HttpStatusCode;
  readonly grpcCode: GrpcStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly command: string;
  readonly detail: string;

  constructor(command: string, detail: string) {
    super(`malformed input: ${detail}`);
    const entry = ERROR_CATALOG.COMMAND_MALFORMED_INPUT;
    this.httpStatus = entry.httpStatus;
    this.grpcCode = entry.grpcCode;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.command = command;
    this.detail = detail;
  }
}

// ---------------------------------------------------------------------------
// Dangerous pattern: configured regex matched
// ---------------------------------------------------------------------------

export class CommandDangerousPatternError extends CommandPolicyError {
  readonly _tag = "PermissionError" as const;
  readonly code = "COMMAND_DANGEROUS_PATTERN" as const;
  readonly httpStatus: HttpStatusCode;
  readonly grpcCode: GrpcStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly command: string;
  readonly pattern: string;
  /** Segment whose text matched, or null when the match spans segments */
  readonly segmentIndex: number | null;

  constructor(command: string, pattern: string, segmentIndex: number | null) {
    super(`dangerous pattern: ${pattern}`);
    const entry = ERROR_CATALOG.COMMAND_DANGEROUS_PATTERN;
    this.httpStatus = entry.httpStatus;
    this.grpcCode = entry.grpcCode;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.command = command;
    this.pattern = pattern;
    this.segmentIndex = segmentIndex;
  }
}

// ---------------------------------------------------------------------------
// Not permitted: blocked or unrecognized base command
// ---------------------------------------------------------------------------

export class CommandNotPermittedError extends CommandPolicyError {
  readonly _tag = "PermissionError" as const;
  readonly code = "COMMAND_NOT_PERMITTED" as const;
  readonly httpStatus: HttpStatusCode;
  readonly grpcCode: GrpcStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly command: string;
  readonly baseCommand: string;
  readonly category: "blocked" | "unrecognized";
  readonly segmentIndex: number;

  constructor(
    command: string,
    baseCommand: string,
    category: "blocked" | "unrecognized",
    segmentIndex: number,
  ) {
    super(`command not permitted: ${baseCommand}`);
    const entry = ERROR_CATALOG.COMMAND_NOT_PERMITTED;
    this.httpStatus = entry.httpStatus;
    this.grpcCode = entry.grpcCode;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.command = command;
    this.baseCommand = baseCommand;
    this.category = category;
    this.segmentIndex = segmentIndex;
  }
}

// ---------------------------------------------------------------------------
// Approval required: write/system categories not yet approved
// ---------------------------------------------------------------------------

export class CommandApprovalRequiredError extends CommandPolicyError {
  readonly _tag = "PermissionError" as const;
  readonly code = "COMMAND_APPROVAL_REQUIRED" as const;
  readonly httpStatus: HttpStatusCode;
  readonly grpcCode: GrpcStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly command: string;
  readonly categories: readonly ("write" | "system")[];
  readonly sessionId: string;

  constructor(command: string, categories: readonly ("write" | "system")[], sessionId: string) {
    super(`approval required for ${categories.join(", ")} commands in session ${sessionId}`, {
      sessionId,
    });
    const entry = ERROR_CATALOG.COMMAND_APPROVAL_REQUIRED;
    this.httpStatus = entry.httpStatus;
    this.grpcCode = entry.grpcCode;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.command = command;
    this.categories = categories;
    this.sessionId = sessionId;
  }
}

// ---------------------------------------------------------------------------
// Configuration invalid: layer or runtime update failed validation
// ---------------------------------------------------------------------------

/**
 * Thrown when a configuration layer or runtime patch is invalid
 * (schema violation, bad regex, unreadable file).
 */
export class CommandPolicyConfigurationError extends CommandPolicyError {
  readonly _tag = "ValidationError" as const;
  readonly code = "COMMAND_POLICY_CONFIGURATION_INVALID" as const;
  readonly httpStatus: HttpStatusCode;
  readonly grpcCode: GrpcStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly issues: readonly ValidationIssue[];

  constructor(message: string, issues?: readonly ValidationIssue[], options?: { cause?: Error }) {
    super(`Invalid command policy configuration: ${message}`, undefined, options);
    const entry = ERROR_CATALOG.COMMAND_POLICY_CONFIGURATION_INVALID;
    this.httpStatus = entry.httpStatus;
    this.grpcCode = entry.grpcCode;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.issues = issues ?? [];
  }
}

// ---------------------------------------------------------------------------
// Execution failed: the process could not be started
// ---------------------------------------------------------------------------

export class CommandExecutionError extends CommandPolicyError {
  readonly _tag = "ExternalError" as const;
  readonly code = "COMMAND_EXECUTION_FAILED" as const;
  readonly httpStatus: HttpStatusCode;
  readonly grpcCode: GrpcStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly command: string;
  readonly reason: string;

  constructor(command: string, reason: string, options?: { cause?: Error }) {
    super(`Command execution failed: ${reason}`, undefined, options);
    const entry = ERROR_CATALOG.COMMAND_EXECUTION_FAILED;
    this.httpStatus = entry.httpStatus;
    this.grpcCode = entry.grpcCode;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.command = command;
    this.reason = reason;
  }
}

// ---------------------------------------------------------------------------
// Session errors
// ---------------------------------------------------------------------------

export abstract class SessionError extends ShellgateError {}

/**
 * Thrown when `require_session_id` is enabled and a request has no session id.
 */
export class SessionRequiredError extends SessionError {
  readonly _tag = "ValidationError" as const;
  readonly code = "SESSION_ID_REQUIRED" as const;
  readonly httpStatus: HttpStatusCode;
  readonly grpcCode: GrpcStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;

  constructor() {
    super("session id required");
    const entry = ERROR_CATALOG.SESSION_ID_REQUIRED;
    this.httpStatus = entry.httpStatus;
    this.grpcCode = entry.grpcCode;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
  }
}

/**
 * Thrown when a session approval names a category other than write or system.
 */
export class SessionApprovalInvalidError extends SessionError {
  readonly _tag = "ValidationError" as const;
  readonly code = "SESSION_APPROVAL_INVALID" as const;
  readonly httpStatus: HttpStatusCode;
  readonly grpcCode: GrpcStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly category: string;

  constructor(category: string) {
    super(`Cannot approve category "${category}": only write and system are approvable`);
    const entry = ERROR_CATALOG.SESSION_APPROVAL_INVALID;
    this.httpStatus = entry.httpStatus;
    this.grpcCode = entry.grpcCode;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.category = category;
  }
}
