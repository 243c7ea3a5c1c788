/**
 * @shellgate/errors
 *
 * Shared error taxonomy for Shellgate.
 *
 * Each error carries a `.code` from the catalog that discriminates
 * the specific error condition. Use `error.code === "XXX"` for
 * fine-grained matching, or `instanceof` for category matching.
 */

export { type ErrorJSON, ShellgateError } from "./base.js";

export {
  type BaseErrorType,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
  type GrpcStatusCode,
  type HttpStatusCode,
} from "./catalog.js";

export { getErrorMessage, wrapError } from "./utils.js";

export { InternalError } from "./bases/internal-error.js";

export type { ValidationIssue } from "./types.js";

// ============================================================================
// COMMAND POLICY
// ============================================================================

export {
  CommandApprovalRequiredError,
  CommandDangerousPatternError,
  CommandExecutionError,
  CommandMalformedInputError,
  CommandNotPermittedError,
  CommandPolicyConfigurationError,
  CommandPolicyError,
  SessionApprovalInvalidError,
  SessionError,
  SessionRequiredError,
} from "./command-policy.js";
