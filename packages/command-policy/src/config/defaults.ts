import {
  DEFAULT_BLOCKED_COMMANDS,
  DEFAULT_DANGEROUS_PATTERNS,
  DEFAULT_READ_COMMANDS,
  DEFAULT_SYSTEM_COMMANDS,
  DEFAULT_WRITE_COMMANDS,
} from "../constants.js";
import type { ShellgateConfig } from "./schema.js";

/** Returns a fresh, mutable copy of the built-in configuration. */
export function createDefaultConfig(): ShellgateConfig {
  return {
    server: {
      name: "shellgate",
      version: "0.1.0",
      description: "Policy-gated shell command execution over MCP",
      log_level: "INFO",
    },
    security: {
      session_timeout: 3600,
      max_output_size: 102_400,
      command_timeout: 30,
      allow_user_confirmation: true,
      require_session_id: false,
      allow_command_separators: true,
      allow_unrecognized_commands: false,
      separators: { pipe: true, sequence: true, background: true },
    },
    commands: {
      read_commands: [...DEFAULT_READ_COMMANDS],
      write_commands: [...DEFAULT_WRITE_COMMANDS],
      system_commands: [...DEFAULT_SYSTEM_COMMANDS],
      blocked_commands: [...DEFAULT_BLOCKED_COMMANDS],
      dangerous_patterns: [...DEFAULT_DANGEROUS_PATTERNS],
    },
    output: {
      max_size: 102_400,
      format: "text",
    },
  };
}
