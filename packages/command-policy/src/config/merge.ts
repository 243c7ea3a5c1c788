/**
 * Layer merge: scalars are replaced by the higher layer when it sets them,
 * lists are merged by union (first occurrence keeps its position).
 *
 * Returns new objects; inputs are never mutated.
 */

import { createDefaultConfig } from "./defaults.js";
import type { ConfigLayer, ShellgateConfig } from "./schema.js";

function union(base: readonly string[], extra: readonly string[] | undefined): string[] {
  if (extra === undefined) return [...base];
  const seen = new Set(base);
  const merged = [...base];
  for (const value of extra) {
    if (!seen.has(value)) {
      seen.add(value);
      merged.push(value);
    }
  }
  return merged;
}

export function applyLayer(base: ShellgateConfig, layer: ConfigLayer): ShellgateConfig {
  const server = layer.server;
  const security = layer.security;
  const separators = security?.separators;
  const commands = layer.commands;
  const output = layer.output;

  return {
    server: {
      name: server?.name ?? base.server.name,
      version: server?.version ?? base.server.version,
      description: server?.description ?? base.server.description,
      log_level: server?.log_level ?? base.server.log_level,
    },
    security: {
      session_timeout: security?.session_timeout ?? base.security.session_timeout,
      max_output_size: security?.max_output_size ?? base.security.max_output_size,
      command_timeout: security?.command_timeout ?? base.security.command_timeout,
      allow_user_confirmation:
        security?.allow_user_confirmation ?? base.security.allow_user_confirmation,
      require_session_id: security?.require_session_id ?? base.security.require_session_id,
      allow_command_separators:
        security?.allow_command_separators ?? base.security.allow_command_separators,
      allow_unrecognized_commands:
        security?.allow_unrecognized_commands ?? base.security.allow_unrecognized_commands,
      separators: {
        pipe: separators?.pipe ?? base.security.separators.pipe,
        sequence: separators?.sequence ?? base.security.separators.sequence,
        background: separators?.background ?? base.security.separators.background,
      },
    },
    commands: {
      read_commands: union(base.commands.read_commands, commands?.read_commands),
      write_commands: union(base.commands.write_commands, commands?.write_commands),
      system_commands: union(base.commands.system_commands, commands?.system_commands),
      blocked_commands: union(base.commands.blocked_commands, commands?.blocked_commands),
      dangerous_patterns: union(base.commands.dangerous_patterns, commands?.dangerous_patterns),
    },
    output: {
      max_size: output?.max_size ?? base.output.max_size,
      format: output?.format ?? base.output.format,
    },
  };
}

/** Folds layers (lowest precedence first) over the built-in defaults. */
export function mergeLayers(layers: readonly ConfigLayer[]): ShellgateConfig {
  return layers.reduce(applyLayer, createDefaultConfig());
}
