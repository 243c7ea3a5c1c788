/**
 * @shellgate/mcp-server
 *
 * MCP tools for policy-gated shell execution, the shell executor, and the
 * startup wiring used by the `shellgate-mcp` command.
 */

export { type ShellgateApp, type StartOptions, startShellgate } from "./app.js";
export { type CliArgs, HELP_TEXT, parseArgs } from "./args.js";
export {
  ShellCommandExecutor,
  type ShellCommandExecutorOptions,
  TRUNCATION_MARKER,
} from "./executor.js";
export { buildCommandHelp, type CommandExample, type CommandHelp } from "./help.js";
export {
  createShellgateServer,
  effectiveCategory,
  READ_ONLY_TOOL_ERROR,
  type ShellgateServerDeps,
} from "./server.js";
export type {
  ApprovalNeededResult,
  CommandExecutor,
  CommandOutputResult,
  ExecuteOptions,
  ExecuteToolResult,
  ExecutionResult,
  FailureResult,
  RejectionResult,
  SpawnedProcess,
  SpawnFn,
} from "./types.js";
