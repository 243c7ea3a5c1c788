import type { ConfigSnapshot, SeparatorKind } from "@shellgate/command-policy";

export interface CommandExample {
  readonly command: string;
  readonly description: string;
}

export interface CommandHelp {
  readonly capabilities: {
    readonly supported_commands: {
      readonly read: readonly string[];
      readonly write: readonly string[];
      readonly system: readonly string[];
    };
    readonly blocked_commands: readonly string[];
    readonly command_chaining: Readonly<Record<SeparatorKind, string>>;
    readonly unrecognized_commands: string;
    readonly command_restrictions: string;
  };
  readonly examples: readonly CommandExample[];
  readonly recommended_approach: Readonly<Record<string, string>>;
  readonly permissions: {
    readonly read_commands: string;
    readonly write_commands: string;
    readonly system_commands: string;
  };
}

const SEPARATOR_SYMBOLS: Readonly<Record<SeparatorKind, string>> = {
  pipe: "|",
  sequence: ";",
  background: "&",
};

const EXAMPLES: readonly CommandExample[] = [
  { command: "ls -la ~/Downloads", description: "List files with details" },
  { command: "du -h ~/Downloads/* | grep G", description: "Find large files" },
  { command: 'find ~/Documents -type f -name "*.pdf"', description: "Find files by name" },
  { command: "head -n 20 notes.txt", description: "View the first lines of a file" },
  { command: "mkdir build; touch build/.keep", description: "Write commands need approval" },
];

const RECOMMENDED_APPROACH: Readonly<Record<string, string>> = {
  finding_large_files: "Use 'du -h <directory>/* | grep G' to find large files",
  file_searching: "Use 'find <directory> -type f -name \"pattern\"' for file searches",
  text_searching: "Use 'grep \"pattern\" <file>' to search in files",
  file_viewing: "Use 'cat', 'head', or 'tail' for viewing files",
};

/** Help text reflecting the live configuration. */
export function buildCommandHelp(snapshot: ConfigSnapshot): CommandHelp {
  const { security, commands } = snapshot.config;
  const needsApproval = security.allow_user_confirmation
    ? "Require approval once per session (approve_command_type or approve_command)"
    : "Run without approval";

  const chaining = (kind: SeparatorKind): string =>
    snapshot.separators.has(kind)
      ? `Supported (${SEPARATOR_SYMBOLS[kind]})`
      : `Disabled (${SEPARATOR_SYMBOLS[kind]} is rejected)`;

  return {
    capabilities: {
      supported_commands: {
        read: commands.read_commands,
        write: commands.write_commands,
        system: commands.system_commands,
      },
      blocked_commands: commands.blocked_commands,
      command_chaining: {
        pipe: chaining("pipe"),
        sequence: chaining("sequence"),
        background: chaining("background"),
      },
      unrecognized_commands: security.allow_unrecognized_commands
        ? "Allowed, with the same approval as system commands"
        : "Rejected",
      command_restrictions: `Commands matching any of ${snapshot.patterns.length} dangerous patterns (command substitution, redirection to devices, recursive deletes of / and similar) are rejected`,
    },
    examples: EXAMPLES,
    recommended_approach: RECOMMENDED_APPROACH,
    permissions: {
      read_commands: "Run without approval",
      write_commands: needsApproval,
      system_commands: needsApproval,
    },
  };
}
