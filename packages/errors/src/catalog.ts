/**
 * Error Catalog - Single Source of Truth
 *
 * Every error code used across Shellgate maps to an HTTP status, a gRPC
 * canonical code, and one of the behavioral base types below.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 */

/**
 * The behavioral base error types that all error codes map to.
 */
export type BaseErrorType = "ValidationError" | "PermissionError" | "ExternalError" | "InternalError";

export const ERROR_CATALOG = {
  // ============================================================================
  // INTERNAL ERRORS - System failures and unknown errors
  // ============================================================================
  INTERNAL_ERROR: {
    domain: "internal",
    httpStatus: 500,
    grpcCode: "INTERNAL" as const,
    baseType: "InternalError" as const,
    isExpected: false,
    title: "Internal server error",
    description: "An unexpected error occurred",
  },

  // ============================================================================
  // COMMAND POLICY ERRORS - Command validation and approval pipeline
  // ============================================================================
  COMMAND_MALFORMED_INPUT: {
    domain: "command-policy",
    httpStatus: 400,
    grpcCode: "INVALID_ARGUMENT" as const,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Malformed command input",
    description:
      "The command string has an unterminated quote, an empty segment, or an unparseable separator sequence",
  },
  COMMAND_DANGEROUS_PATTERN: {
    domain: "command-policy",
    httpStatus: 403,
    grpcCode: "PERMISSION_DENIED" as const,
    baseType: "PermissionError" as const,
    isExpected: true,
    title: "Dangerous pattern detected",
    description: "The command matches a configured dangerous pattern",
  },
  COMMAND_NOT_PERMITTED: {
    domain: "command-policy",
    httpStatus: 403,
    grpcCode: "PERMISSION_DENIED" as const,
    baseType: "PermissionError" as const,
    isExpected: true,
    title: "Command not permitted",
    description: "The base command is blocked or not recognized",
  },
  COMMAND_APPROVAL_REQUIRED: {
    domain: "command-policy",
    httpStatus: 403,
    grpcCode: "FAILED_PRECONDITION" as const,
    baseType: "PermissionError" as const,
    isExpected: true,
    title: "Approval required",
    description: "The command needs session approval for one or more categories",
  },
  COMMAND_POLICY_CONFIGURATION_INVALID: {
    domain: "command-policy",
    httpStatus: 400,
    grpcCode: "INVALID_ARGUMENT" as const,
    baseType: "ValidationError" as const,
    isExpected: false,
    title: "Invalid command policy configuration",
    description: "A configuration layer or runtime update failed validation",
  },
  COMMAND_EXECUTION_FAILED: {
    domain: "command-policy",
    httpStatus: 500,
    grpcCode: "INTERNAL" as const,
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "Command execution failed",
    description: "The approved command could not be started or timed out",
  },

  // ============================================================================
  // SESSION ERRORS - Approval sessions
  // ============================================================================
  SESSION_ID_REQUIRED: {
    domain: "session",
    httpStatus: 400,
    grpcCode: "INVALID_ARGUMENT" as const,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Session ID required",
    description: "The configuration requires an explicit session identifier",
  },
  SESSION_APPROVAL_INVALID: {
    domain: "session",
    httpStatus: 400,
    grpcCode: "INVALID_ARGUMENT" as const,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Invalid approval category",
    description: "Only write and system categories can be approved for a session",
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
