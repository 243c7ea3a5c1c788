/**
 * @shellgate/command-policy
 *
 * Decides whether a shell command string may run: approved, requires
 * session approval for write/system commands, or rejected.
 */

export { buildClassificationMap, type ClassificationTable, classifySegment } from "./classifier.js";
export { createDefaultConfig } from "./config/defaults.js";
export {
  ENV_CONFIG_PATH,
  envLayer,
  isYamlPath,
  loadConfigFile,
  loadDotenvFile,
  parseConfigLayer,
  writeConfigFile,
} from "./config/layers.js";
export { applyLayer, mergeLayers } from "./config/merge.js";
export {
  type CommandsConfig,
  type ConfigLayer,
  ConfigLayerSchema,
  LogLevelSchema,
  type OutputFormat,
  type ShellgateConfig,
  ShellgateConfigSchema,
} from "./config/schema.js";
export {
  buildSnapshot,
  type ConfigSnapshot,
  type ConfigSources,
  ConfigStore,
  type ConfigStoreOptions,
  type ConfigUpdatedHandler,
  loadConfigLayers,
  type UpdateOptions,
} from "./config/store.js";
export {
  ANONYMOUS_SESSION_ID,
  DEFAULT_BLOCKED_COMMANDS,
  DEFAULT_DANGEROUS_PATTERNS,
  DEFAULT_READ_COMMANDS,
  DEFAULT_SYSTEM_COMMANDS,
  DEFAULT_WRITE_COMMANDS,
  MAX_COMMAND_LENGTH,
  PACKAGE_NAME,
} from "./constants.js";
export {
  PolicyEngine,
  type PolicyEngineDeps,
  resolveSessionId,
  type SnapshotSource,
  verdictToError,
} from "./engine.js";
export {
  type ConsoleLoggerOptions,
  createConsoleLogger,
  type Logger,
  type LogLevel,
  noopLogger,
} from "./logger.js";
export { parseCommandLine } from "./parser.js";
export {
  type CompiledPattern,
  compilePatterns,
  matchDangerousPattern,
  type PatternMatch,
} from "./patterns.js";
export {
  isApprovableCategory,
  type SessionEvent,
  type SessionEventHandler,
  SessionManager,
  type SessionManagerConfig,
} from "./sessions/index.js";
export type {
  ApprovableCategory,
  ApprovedVerdict,
  Category,
  ClassificationConflict,
  ClassificationMap,
  CommandNotPermittedRejection,
  CommandSegment,
  DangerousPatternRejection,
  ExecutionPlan,
  ListedCategory,
  MalformedInputRejection,
  RawCommand,
  RejectedVerdict,
  RejectionCode,
  RequiresApprovalVerdict,
  Separator,
  SeparatorKind,
  Session,
  SessionRequiredRejection,
  Verdict,
} from "./types.js";
