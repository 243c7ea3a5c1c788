/**
 * Versioned configuration store.
 *
 * Holds one immutable {@link ConfigSnapshot} behind a single reference.
 * Updates build and validate the next snapshot synchronously and swap the
 * reference, so a reader that captured a snapshot never sees a partial
 * update. Invalid updates leave the current snapshot in place.
 */

import { resolve } from "node:path";
import { CommandPolicyConfigurationError, getErrorMessage } from "@shellgate/errors";
import { buildClassificationMap } from "../classifier.js";
import { DISABLED_SEPARATOR_PATTERNS } from "../constants.js";
import type { Logger } from "../logger.js";
import { noopLogger } from "../logger.js";
import { type CompiledPattern, compilePatterns } from "../patterns.js";
import type { ClassificationConflict, ClassificationMap, SeparatorKind } from "../types.js";
import { deepFreeze } from "../utils/deep-freeze.js";
import {
  ENV_CONFIG_PATH,
  envLayer,
  loadConfigFile,
  loadDotenvFile,
  parseConfigLayer,
  writeConfigFile,
} from "./layers.js";
import { mergeLayers } from "./merge.js";
import { type ConfigLayer, type ShellgateConfig, ShellgateConfigSchema } from "./schema.js";

// ---------------------------------------------------------------------------
// Snapshot
// ---------------------------------------------------------------------------

export interface ConfigSnapshot {
  readonly version: number;
  readonly config: ShellgateConfig;
  readonly classification: ClassificationMap;
  readonly conflicts: readonly ClassificationConflict[];
  /** Configured patterns, then one per disabled separator */
  readonly patterns: readonly CompiledPattern[];
  readonly separators: ReadonlySet<SeparatorKind>;
}

const SEPARATOR_KINDS: readonly SeparatorKind[] = ["pipe", "sequence", "background"];

/**
 * Validates a merged configuration and derives its lookup tables.
 *
 * @throws {CommandPolicyConfigurationError} on schema violations or invalid regexes
 */
export function buildSnapshot(config: ShellgateConfig, version: number): ConfigSnapshot {
  const parsed = ShellgateConfigSchema.safeParse(config);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      field: issue.path.join("."),
      message: issue.message,
      code: issue.code,
    }));
    throw new CommandPolicyConfigurationError(
      issues.map((issue) => `${issue.field}: ${issue.message}`).join("; "),
      issues,
    );
  }
  const valid = parsed.data;

  const enabled = new Set<SeparatorKind>(
    valid.security.allow_command_separators
      ? SEPARATOR_KINDS.filter((kind) => valid.security.separators[kind])
      : [],
  );
  const derived = SEPARATOR_KINDS.filter((kind) => !enabled.has(kind)).map(
    (kind) => DISABLED_SEPARATOR_PATTERNS[kind],
  );

  const patterns = [
    ...compilePatterns(valid.commands.dangerous_patterns),
    ...compilePatterns(derived, "security.separators"),
  ];
  const { map, conflicts } = buildClassificationMap(valid.commands);

  return {
    version,
    config: deepFreeze(valid),
    classification: map,
    conflicts: deepFreeze(conflicts),
    patterns: Object.freeze(patterns),
    separators: enabled,
  };
}

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

export type ConfigUpdatedHandler = (snapshot: ConfigSnapshot, previous: ConfigSnapshot) => void;

export interface ConfigStoreOptions {
  readonly logger?: Logger | undefined;
  /** File written by `update(patch, { persist: true })` */
  readonly persistPath?: string | undefined;
  /** Re-reads the base layers on `reload()`; without it the constructor layers are reused */
  readonly loadLayers?: (() => Promise<readonly ConfigLayer[]>) | undefined;
}

export interface ConfigSources {
  /** `--config` file */
  readonly configPath?: string | undefined;
  /** `--env-file`; when absent `.env` in `cwd` is read if it exists */
  readonly envFilePath?: string | undefined;
  /** Defaults to `process.env` */
  readonly env?: Readonly<Record<string, string | undefined>> | undefined;
  readonly cwd?: string | undefined;
}

export interface UpdateOptions {
  readonly persist?: boolean | undefined;
}

/**
 * Reads every base layer, lowest precedence first:
 * `SHELLGATE_CONFIG` file, `--config` file, dotenv file, process env.
 */
export async function loadConfigLayers(sources: ConfigSources): Promise<readonly ConfigLayer[]> {
  const env = sources.env ?? process.env;
  const layers: ConfigLayer[] = [];

  const envPath = env[ENV_CONFIG_PATH]?.trim();
  if (envPath) {
    layers.push(await loadConfigFile(envPath));
  }
  if (sources.configPath !== undefined) {
    layers.push(await loadConfigFile(sources.configPath));
  }
  layers.push(
    sources.envFilePath !== undefined
      ? await loadDotenvFile(sources.envFilePath, { required: true })
      : await loadDotenvFile(resolve(sources.cwd ?? process.cwd(), ".env")),
  );
  layers.push(envLayer(env));

  return layers;
}

export class ConfigStore {
  private current: ConfigSnapshot;
  private baseLayers: readonly ConfigLayer[];
  private runtimeLayers: readonly ConfigLayer[] = [];
  private onUpdatedHandlers: readonly ConfigUpdatedHandler[] = [];
  private readonly logger: Logger;
  private readonly options: ConfigStoreOptions;

  /**
   * @throws {CommandPolicyConfigurationError} when the merged layers are invalid
   */
  constructor(layers: readonly ConfigLayer[] = [], options: ConfigStoreOptions = {}) {
    this.options = options;
    this.logger = options.logger ?? noopLogger;
    this.baseLayers = layers;
    this.current = buildSnapshot(mergeLayers(layers), 1);
    this.reportConflicts(this.current);
  }

  /**
   * Loads every configuration source. The `--config` file, or else the
   * `SHELLGATE_CONFIG` file, becomes the persist target.
   */
  static async load(sources: ConfigSources = {}, logger?: Logger): Promise<ConfigStore> {
    const env = sources.env ?? process.env;
    const layers = await loadConfigLayers(sources);
    const envPath = env[ENV_CONFIG_PATH]?.trim();
    return new ConfigStore(layers, {
      logger,
      persistPath: sources.configPath ?? (envPath ? envPath : undefined),
      loadLayers: () => loadConfigLayers(sources),
    });
  }

  get snapshot(): ConfigSnapshot {
    return this.current;
  }

  get persistPath(): string | undefined {
    return this.options.persistPath;
  }

  /**
   * Merge a runtime patch on top of every other layer.
   *
   * The new snapshot is live before persistence starts; a persist failure
   * rejects the returned promise but does not roll the snapshot back.
   *
   * @throws {CommandPolicyConfigurationError} when the patch is invalid, or
   *   persistence is requested without a configuration file
   */
  async update(patch: unknown, options?: UpdateOptions): Promise<ConfigSnapshot> {
    const layer = parseConfigLayer(patch, "runtime update");
    const persist = options?.persist === true;
    const persistPath = this.options.persistPath;
    if (persist && persistPath === undefined) {
      throw new CommandPolicyConfigurationError(
        "cannot persist: no configuration file was given (--config or SHELLGATE_CONFIG)",
      );
    }

    const runtimeLayers = [...this.runtimeLayers, layer];
    const next = buildSnapshot(
      mergeLayers([...this.baseLayers, ...runtimeLayers]),
      this.current.version + 1,
    );
    this.runtimeLayers = runtimeLayers;
    this.swap(next);

    if (persist && persistPath !== undefined) {
      await writeConfigFile(persistPath, next.config);
      this.logger.info(`configuration persisted to ${persistPath}`);
    }
    return next;
  }

  /**
   * Re-read the base layers and discard every runtime update.
   */
  async reload(): Promise<ConfigSnapshot> {
    const layers = this.options.loadLayers ? await this.options.loadLayers() : this.baseLayers;
    const next = buildSnapshot(mergeLayers(layers), this.current.version + 1);
    this.baseLayers = layers;
    this.runtimeLayers = [];
    this.swap(next);
    return next;
  }

  /**
   * Register a handler for snapshot swaps. Returns a disposer.
   */
  onUpdated(handler: ConfigUpdatedHandler): () => void {
    this.onUpdatedHandlers = [...this.onUpdatedHandlers, handler];
    return () => {
      this.onUpdatedHandlers = this.onUpdatedHandlers.filter((h) => h !== handler);
    };
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private swap(next: ConfigSnapshot): void {
    const previous = this.current;
    this.current = next;
    this.logger.debug(`configuration updated to version ${next.version}`);
    this.reportConflicts(next);
    for (const handler of this.onUpdatedHandlers) {
      try {
        handler(next, previous);
      } catch (error: unknown) {
        this.logger.error(`configuration update handler failed: ${getErrorMessage(error)}`);
      }
    }
  }

  private reportConflicts(snapshot: ConfigSnapshot): void {
    for (const conflict of snapshot.conflicts) {
      this.logger.warn(
        `command "${conflict.command}" is listed as ${conflict.listedIn.join(" and ")}; treating it as ${conflict.resolved}`,
      );
    }
  }
}
