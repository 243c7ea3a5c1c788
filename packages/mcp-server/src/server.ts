/**
 * MCP tool surface over the command policy.
 *
 * Every tool answers with one JSON text item. `output.format` picks the
 * rendering: "text" is indented for people reading transcripts, "json" is
 * compact for programs.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import {
  type ApprovedVerdict,
  type Category,
  ConfigLayerSchema,
  type ConfigStore,
  type Logger,
  noopLogger,
  type PolicyEngine,
  type RejectedVerdict,
  type RequiresApprovalVerdict,
  verdictToError,
} from "@shellgate/command-policy";
import { CommandPolicyConfigurationError, wrapError } from "@shellgate/errors";
import { z } from "zod";
import { buildCommandHelp } from "./help.js";
import type {
  ApprovalNeededResult,
  CommandExecutor,
  CommandOutputResult,
  ExecuteToolResult,
  FailureResult,
  RejectionResult,
} from "./types.js";

export const READ_ONLY_TOOL_ERROR =
  "This tool only supports read commands. Use execute_command for other command types.";

export interface ShellgateServerDeps {
  readonly store: ConfigStore;
  readonly engine: PolicyEngine;
  readonly executor: CommandExecutor;
  readonly logger?: Logger | undefined;
}

const sessionIdShape = z
  .string()
  .optional()
  .describe("Session that approvals are scoped to; omitted ids share one session");

/** Most privileged category among the segments. */
const CATEGORY_RANK: Readonly<Record<Category, number>> = {
  read: 0,
  write: 1,
  system: 2,
  unrecognized: 3,
  blocked: 4,
};

export function effectiveCategory(categories: readonly Category[]): Category {
  return categories.reduce<Category>(
    (highest, category) => (CATEGORY_RANK[category] > CATEGORY_RANK[highest] ? category : highest),
    "read",
  );
}

export function createShellgateServer(deps: ShellgateServerDeps): McpServer {
  const { store, engine, executor } = deps;
  const logger = deps.logger ?? noopLogger;
  const { name, version, description } = store.snapshot.config.server;

  const server = new McpServer({ name, version }, { instructions: description });

  const render = (body: object, isError = false): CallToolResult => {
    const compact = store.snapshot.config.output.format === "json";
    return {
      content: [{ type: "text", text: JSON.stringify(body, null, compact ? undefined : 2) }],
      ...(isError ? { isError: true } : {}),
    };
  };

  const renderError = (error: unknown): CallToolResult => {
    const wrapped = wrapError(error);
    if (!wrapped.isExpected) {
      logger.error(wrapped.toString());
    }
    const body: FailureResult = {
      success: false,
      error: wrapped.message,
      error_code: wrapped.code,
    };
    return render(
      wrapped instanceof CommandPolicyConfigurationError
        ? { ...body, issues: wrapped.issues }
        : body,
      true,
    );
  };

  const run = async (
    verdict: ApprovedVerdict,
    signal: AbortSignal,
  ): Promise<CommandOutputResult | FailureResult> => {
    const commandType = effectiveCategory(verdict.categories);
    try {
      const result = await executor.execute(verdict.plan, { signal });
      return {
        success: result.background || (!result.timedOut && result.exitCode === 0),
        output: result.stdout,
        error: result.stderr,
        exit_code: result.exitCode,
        command_type: commandType,
        background: result.background,
        truncated: result.truncated,
        timed_out: result.timedOut,
        duration_ms: result.durationMs,
        ...(result.pid !== undefined ? { pid: result.pid } : {}),
      };
    } catch (error: unknown) {
      const wrapped = wrapError(error);
      return { success: false, output: "", error: wrapped.message, error_code: wrapped.code };
    }
  };

  // -------------------------------------------------------------------------
  // Execution
  // -------------------------------------------------------------------------

  server.tool(
    "execute_command",
    "Execute a shell command. Read commands run immediately; write and system commands need session approval.",
    {
      command: z.string().describe("The command to execute"),
      session_id: sessionIdShape,
    },
    async ({ command, session_id }, extra) => {
      const verdict = engine.decide({ command, sessionId: session_id });
      const body: ExecuteToolResult =
        verdict.kind === "rejected"
          ? rejectionResult(verdict)
          : verdict.kind === "requires-approval"
            ? approvalNeededResult(verdict)
            : await run(verdict, extra.signal);
      return render(body);
    },
  );

  server.tool(
    "execute_read_command",
    "Execute a read-only command (ls, cat, grep, ...). Anything else is refused.",
    {
      command: z.string().describe("The read-only command to execute"),
      session_id: sessionIdShape,
    },
    async ({ command, session_id }, extra) => {
      const verdict = engine.decide({ command, sessionId: session_id });
      if (verdict.kind === "rejected") {
        return render(rejectionResult(verdict));
      }
      if (
        verdict.kind === "requires-approval" ||
        verdict.categories.some((category) => category !== "read")
      ) {
        const body: FailureResult = { success: false, output: "", error: READ_ONLY_TOOL_ERROR };
        return render(body);
      }
      return render(await run(verdict, extra.signal));
    },
  );

  // -------------------------------------------------------------------------
  // Approvals
  // -------------------------------------------------------------------------

  server.tool(
    "approve_command_type",
    "Approve a command category (write or system) for the rest of a session.",
    {
      command_type: z.string().describe("write or system"),
      session_id: sessionIdShape,
    },
    async ({ command_type, session_id }) => {
      try {
        const session = engine.approve(session_id, command_type);
        return render({
          success: true,
          message: `Command type '${command_type}' approved for session ${session.id}`,
          session_id: session.id,
          approved_command_types: session.approvedCategories,
        });
      } catch (error: unknown) {
        return renderError(error);
      }
    },
  );

  server.tool(
    "approve_command",
    "Approve one exact command string for the rest of a session.",
    {
      command: z.string().min(1).describe("The exact command to approve"),
      session_id: sessionIdShape,
    },
    async ({ command, session_id }) => {
      try {
        const session = engine.approveCommand(session_id, command);
        return render({
          success: true,
          message: `Command '${command}' approved for session ${session.id}`,
          session_id: session.id,
        });
      } catch (error: unknown) {
        return renderError(error);
      }
    },
  );

  // -------------------------------------------------------------------------
  // Introspection
  // -------------------------------------------------------------------------

  server.tool("list_available_commands", "List the configured commands by category.", async () => {
    const { commands } = store.snapshot.config;
    return render({
      read_commands: commands.read_commands,
      write_commands: commands.write_commands,
      system_commands: commands.system_commands,
      blocked_commands: commands.blocked_commands,
    });
  });

  server.tool(
    "get_command_help",
    "Describe supported commands, chaining, restrictions and the approval model.",
    async () => render(buildCommandHelp(store.snapshot)),
  );

  // -------------------------------------------------------------------------
  // Configuration
  // -------------------------------------------------------------------------

  server.tool("get_configuration", "Show the active configuration.", async () => {
    const snapshot = store.snapshot;
    return render({
      version: snapshot.version,
      config: snapshot.config,
      ...(store.persistPath !== undefined ? { persist_path: store.persistPath } : {}),
    });
  });

  server.tool(
    "update_configuration",
    "Merge a partial configuration into the active one. Lists are merged by union; other values are replaced.",
    {
      patch: ConfigLayerSchema.describe("Partial configuration: server, security, commands, output"),
      persist: z.boolean().optional().describe("Also write the merged configuration to the config file"),
    },
    async ({ patch, persist }) => {
      try {
        const snapshot = await store.update(patch, { persist });
        return render({ success: true, version: snapshot.version, config: snapshot.config });
      } catch (error: unknown) {
        return renderError(error);
      }
    },
  );

  return server;
}

// ---------------------------------------------------------------------------
// Verdict rendering
// ---------------------------------------------------------------------------

function rejectionResult(verdict: RejectedVerdict): RejectionResult {
  return {
    success: false,
    output: "",
    error: verdict.reason,
    code: verdict.code,
    error_code: verdictToError(verdict)?.code ?? "INTERNAL_ERROR",
    segment_index: verdict.segmentIndex,
  };
}

function approvalNeededResult(verdict: RequiresApprovalVerdict): ApprovalNeededResult {
  const error = verdictToError(verdict);
  return {
    success: false,
    output: "",
    requires_approval: true,
    command_types: verdict.categories,
    session_id: verdict.sessionId,
    error: `${error?.message ?? "approval required"}. Use approve_command_type with session_id '${verdict.sessionId}'.`,
    error_code: error?.code ?? "COMMAND_APPROVAL_REQUIRED",
  };
}
