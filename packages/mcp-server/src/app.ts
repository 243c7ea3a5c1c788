import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import {
  type ConfigSources,
  ConfigStore,
  createConsoleLogger,
  type Logger,
  PolicyEngine,
  SessionManager,
} from "@shellgate/command-policy";
import { ShellCommandExecutor } from "./executor.js";
import { createShellgateServer } from "./server.js";
import type { CommandExecutor } from "./types.js";

export interface StartOptions extends ConfigSources {
  readonly transport: Transport;
  readonly logger?: Logger | undefined;
  /** Defaults to a {@link ShellCommandExecutor} over the store */
  readonly executor?: CommandExecutor | undefined;
}

export interface ShellgateApp {
  readonly server: McpServer;
  readonly store: ConfigStore;
  readonly sessions: SessionManager;
  readonly logger: Logger;
  close(): Promise<void>;
}

/**
 * Loads configuration, wires the policy engine and executor into an MCP
 * server, and connects it to the transport.
 *
 * Expired sessions are swept every `security.session_timeout` seconds; the
 * sweep interval and the log level follow configuration updates.
 */
export async function startShellgate(options: StartOptions): Promise<ShellgateApp> {
  const logger = options.logger ?? createConsoleLogger();
  const store = await ConfigStore.load(options, logger);
  logger.setLevel(store.snapshot.config.server.log_level);

  const sessions = new SessionManager({
    ttlMs: () => store.snapshot.config.security.session_timeout * 1000,
  });
  sessions.onEvent((event, session) => {
    logger.debug(`session ${session.id} ${event}`);
  });

  const engine = new PolicyEngine({ config: store, sessions, logger });
  const executor = options.executor ?? new ShellCommandExecutor({ config: store, logger });
  const server = createShellgateServer({ store, engine, executor, logger });

  let sweepTimer: ReturnType<typeof setInterval> | undefined;
  const scheduleSweep = (seconds: number): void => {
    if (sweepTimer !== undefined) clearInterval(sweepTimer);
    sweepTimer = setInterval(() => {
      const expired = sessions.sweep();
      if (expired.length > 0) {
        logger.info(`expired ${expired.length} session(s)`);
      }
    }, seconds * 1000);
    sweepTimer.unref();
  };
  scheduleSweep(store.snapshot.config.security.session_timeout);

  const unsubscribe = store.onUpdated((snapshot, previous) => {
    logger.setLevel(snapshot.config.server.log_level);
    if (snapshot.config.security.session_timeout !== previous.config.security.session_timeout) {
      scheduleSweep(snapshot.config.security.session_timeout);
    }
  });

  await server.connect(options.transport);
  const { name, version } = store.snapshot.config.server;
  logger.info(`${name} ${version} ready (configuration version ${store.snapshot.version})`);

  return {
    server,
    store,
    sessions,
    logger,
    async close() {
      if (sweepTimer !== undefined) clearInterval(sweepTimer);
      unsubscribe();
      sessions.dispose();
      await server.close();
    },
  };
}
