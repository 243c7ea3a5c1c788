// ---------------------------------------------------------------------------
// Argument parsing (minimal, no external CLI lib)
// ---------------------------------------------------------------------------

export interface CliArgs {
  readonly configPath?: string;
  readonly envFilePath?: string;
  readonly help: boolean;
}

/**
 * Parses `process.argv`-shaped arguments (the first two entries are skipped).
 *
 * @throws {Error} on unknown options or a missing option value
 */
export function parseArgs(argv: readonly string[]): CliArgs {
  let configPath: string | undefined;
  let envFilePath: string | undefined;
  let help = false;

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];

    switch (arg) {
      case "--config":
        if (!next) throw new Error("--config requires a path");
        configPath = next;
        i++;
        break;
      case "--env-file":
        if (!next) throw new Error("--env-file requires a path");
        envFilePath = next;
        i++;
        break;
      case "--help":
      case "-h":
        help = true;
        break;
      default:
        throw new Error(`unknown option: ${arg}`);
    }
  }

  return {
    help,
    ...(configPath ? { configPath } : {}),
    ...(envFilePath ? { envFilePath } : {}),
  };
}

export const HELP_TEXT = `
shellgate-mcp: MCP server that runs shell commands behind a command policy

Usage: shellgate-mcp [options]

Options:
  --config <path>     JSON or YAML configuration file (also the target of persisted updates)
  --env-file <path>   dotenv file with SHELLGATE_* settings (default: ./.env if present)
  --help              Show this help message

Environment:
  SHELLGATE_CONFIG    Configuration file read before --config
  SHELLGATE_*         Overrides, e.g. SHELLGATE_LOG_LEVEL=DEBUG, SHELLGATE_READ_COMMANDS=jq,awk
`;
