/**
 * Configuration layer sources: JSON/YAML files, dotenv files, and
 * `SHELLGATE_*` environment variables.
 */

import { readFile, writeFile } from "node:fs/promises";
import { extname, resolve } from "node:path";
import { CommandPolicyConfigurationError, type ValidationIssue } from "@shellgate/errors";
import { parse as parseDotenv } from "dotenv";
import { parse as parseYaml, stringify as stringifyYaml, YAMLParseError } from "yaml";
import { ConfigLayerSchema, type ConfigLayer, type ShellgateConfig } from "./schema.js";

// ---------------------------------------------------------------------------
// Environment variables
// ---------------------------------------------------------------------------

export const ENV_CONFIG_PATH = "SHELLGATE_CONFIG";

type EnvRecord = Readonly<Record<string, string | undefined>>;

const TRUE_VALUES = new Set(["true", "1", "yes"]);

function parseBoolean(value: string): boolean {
  return TRUE_VALUES.has(value.toLowerCase());
}

function parseList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Builds a layer from `SHELLGATE_*` variables. Unset and blank variables
 * are skipped; dangerous patterns have no variable since regexes contain commas.
 */
export function envLayer(env: EnvRecord, source = "environment"): ConfigLayer {
  const read = (name: string): string | undefined => {
    const value = env[`SHELLGATE_${name}`]?.trim();
    return value === undefined || value.length === 0 ? undefined : value;
  };

  const server: Record<string, unknown> = {};
  const security: Record<string, unknown> = {};
  const commands: Record<string, unknown> = {};
  const output: Record<string, unknown> = {};

  const logLevel = read("LOG_LEVEL");
  if (logLevel !== undefined) server.log_level = logLevel.toUpperCase();

  const numbers = [
    ["SESSION_TIMEOUT", "session_timeout"],
    ["MAX_OUTPUT_SIZE", "max_output_size"],
    ["COMMAND_TIMEOUT", "command_timeout"],
  ] as const;
  for (const [name, key] of numbers) {
    const value = read(name);
    if (value !== undefined) security[key] = Number(value);
  }

  const booleans = [
    ["ALLOW_USER_CONFIRMATION", "allow_user_confirmation"],
    ["REQUIRE_SESSION_ID", "require_session_id"],
    ["ALLOW_COMMAND_SEPARATORS", "allow_command_separators"],
    ["ALLOW_UNRECOGNIZED_COMMANDS", "allow_unrecognized_commands"],
  ] as const;
  for (const [name, key] of booleans) {
    const value = read(name);
    if (value !== undefined) security[key] = parseBoolean(value);
  }

  const lists = [
    ["READ_COMMANDS", "read_commands"],
    ["WRITE_COMMANDS", "write_commands"],
    ["SYSTEM_COMMANDS", "system_commands"],
    ["BLOCKED_COMMANDS", "blocked_commands"],
  ] as const;
  for (const [name, key] of lists) {
    const value = read(name);
    if (value !== undefined) commands[key] = parseList(value);
  }

  const format = read("OUTPUT_FORMAT");
  if (format !== undefined) output.format = format.toLowerCase();
  const outputMax = read("OUTPUT_MAX_SIZE");
  if (outputMax !== undefined) output.max_size = Number(outputMax);

  const raw: Record<string, unknown> = {};
  if (Object.keys(server).length > 0) raw.server = server;
  if (Object.keys(security).length > 0) raw.security = security;
  if (Object.keys(commands).length > 0) raw.commands = commands;
  if (Object.keys(output).length > 0) raw.output = output;

  return parseConfigLayer(raw, source);
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

/**
 * Validates one layer.
 *
 * @throws {CommandPolicyConfigurationError} listing every schema issue
 */
export function parseConfigLayer(input: unknown, source: string): ConfigLayer {
  const result = ConfigLayerSchema.safeParse(input);
  if (!result.success) {
    const issues: ValidationIssue[] = result.error.issues.map((issue) => ({
      field: issue.path.join("."),
      message: issue.message,
      code: issue.code,
    }));
    const summary = issues
      .map((issue) => (issue.field ? `${issue.field}: ${issue.message}` : issue.message))
      .join("; ");
    throw new CommandPolicyConfigurationError(`${source}: ${summary}`, issues, {
      cause: result.error,
    });
  }
  return result.data;
}

// ---------------------------------------------------------------------------
// Files
// ---------------------------------------------------------------------------

export function isYamlPath(filePath: string): boolean {
  const ext = extname(filePath).toLowerCase();
  return ext === ".yaml" || ext === ".yml";
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

async function readOptionalFile(absolutePath: string): Promise<string | undefined> {
  try {
    return await readFile(absolutePath, { encoding: "utf-8" });
  } catch (error: unknown) {
    if (isNodeError(error) && error.code === "ENOENT") {
      return undefined;
    }
    throw error;
  }
}

/**
 * Reads a JSON or YAML (by extension) configuration file as one layer.
 *
 * @throws {CommandPolicyConfigurationError} when the file is missing, unparseable or invalid
 */
export async function loadConfigFile(filePath: string): Promise<ConfigLayer> {
  const absolutePath = resolve(filePath);
  const content = await readOptionalFile(absolutePath);
  if (content === undefined) {
    throw new CommandPolicyConfigurationError(`config file not found: ${absolutePath}`);
  }
  return parseConfigLayer(parseConfigText(content, absolutePath), absolutePath);
}

function parseConfigText(content: string, absolutePath: string): unknown {
  if (isYamlPath(absolutePath)) {
    try {
      return parseYaml(content) ?? {};
    } catch (error: unknown) {
      if (error instanceof YAMLParseError) {
        throw new CommandPolicyConfigurationError(`${absolutePath}: ${error.message}`, [], {
          cause: error,
        });
      }
      throw error;
    }
  }
  try {
    const parsed: unknown = JSON.parse(content);
    return parsed;
  } catch (error: unknown) {
    if (error instanceof SyntaxError) {
      throw new CommandPolicyConfigurationError(`${absolutePath}: ${error.message}`, [], {
        cause: error,
      });
    }
    throw error;
  }
}

/**
 * Reads a dotenv file and maps its `SHELLGATE_*` entries to a layer.
 * A missing file yields an empty layer unless `required` is set.
 */
export async function loadDotenvFile(
  filePath: string,
  options?: { readonly required?: boolean },
): Promise<ConfigLayer> {
  const absolutePath = resolve(filePath);
  const content = await readOptionalFile(absolutePath);
  if (content === undefined) {
    if (options?.required === true) {
      throw new CommandPolicyConfigurationError(`env file not found: ${absolutePath}`);
    }
    return {};
  }
  return envLayer(parseDotenv(content), absolutePath);
}

/** Writes the full configuration as YAML or JSON, chosen by extension. */
export async function writeConfigFile(filePath: string, config: ShellgateConfig): Promise<void> {
  const absolutePath = resolve(filePath);
  const content = isYamlPath(absolutePath)
    ? stringifyYaml(config)
    : `${JSON.stringify(config, null, 2)}\n`;
  await writeFile(absolutePath, content, { encoding: "utf-8" });
}
