/**
 * Zod schemas for the merged configuration and for a single layer.
 *
 * Every layer (file, dotenv, process env, runtime update) is validated
 * against {@link ConfigLayerSchema}; the merge result against
 * {@link ShellgateConfigSchema}. Unknown keys are rejected at every level.
 */

import { z } from "zod";

export const LogLevelSchema = z.enum(["DEBUG", "INFO", "WARNING", "ERROR"]);

export const OutputFormatSchema = z.enum(["text", "json"]);

const CommandNameSchema = z
  .string()
  .min(1, "command name must not be empty")
  .regex(/^\S+$/, "command name must not contain whitespace");

const PositiveIntSchema = z.number().int().positive();

export const ServerConfigSchema = z
  .object({
    name: z.string().min(1),
    version: z.string().min(1),
    description: z.string(),
    log_level: LogLevelSchema,
  })
  .strict();

export const SeparatorsConfigSchema = z
  .object({
    pipe: z.boolean(),
    sequence: z.boolean(),
    background: z.boolean(),
  })
  .strict();

export const SecurityConfigSchema = z
  .object({
    /** Seconds of inactivity before a session expires */
    session_timeout: PositiveIntSchema,
    /** Bytes per output stream */
    max_output_size: PositiveIntSchema,
    /** Seconds */
    command_timeout: PositiveIntSchema,
    allow_user_confirmation: z.boolean(),
    require_session_id: z.boolean(),
    allow_command_separators: z.boolean(),
    allow_unrecognized_commands: z.boolean(),
    separators: SeparatorsConfigSchema,
  })
  .strict();

export const CommandsConfigSchema = z
  .object({
    read_commands: z.array(CommandNameSchema),
    write_commands: z.array(CommandNameSchema),
    system_commands: z.array(CommandNameSchema),
    blocked_commands: z.array(CommandNameSchema),
    dangerous_patterns: z.array(z.string().min(1)),
  })
  .strict();

export const OutputConfigSchema = z
  .object({
    max_size: PositiveIntSchema,
    format: OutputFormatSchema,
  })
  .strict();

export const ShellgateConfigSchema = z
  .object({
    server: ServerConfigSchema,
    security: SecurityConfigSchema,
    commands: CommandsConfigSchema,
    output: OutputConfigSchema,
  })
  .strict();

/** One configuration layer: every group and key optional. */
export const ConfigLayerSchema = z
  .object({
    server: ServerConfigSchema.partial().optional(),
    security: SecurityConfigSchema.extend({ separators: SeparatorsConfigSchema.partial() })
      .partial()
      .optional(),
    commands: CommandsConfigSchema.partial().optional(),
    output: OutputConfigSchema.partial().optional(),
  })
  .strict();

export type ShellgateConfig = z.infer<typeof ShellgateConfigSchema>;
export type ConfigLayer = z.infer<typeof ConfigLayerSchema>;
export type CommandsConfig = z.infer<typeof CommandsConfigSchema>;
export type OutputFormat = z.infer<typeof OutputFormatSchema>;
