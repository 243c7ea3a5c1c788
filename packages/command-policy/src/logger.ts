/**
 * Level-filtered logger writing `[shellgate] LEVEL message` lines.
 *
 * Every level goes to stderr: stdout carries the MCP stdio channel.
 */

export type LogLevel = "DEBUG" | "INFO" | "WARNING" | "ERROR";

const LEVEL_ORDER: Readonly<Record<LogLevel, number>> = {
  DEBUG: 10,
  INFO: 20,
  WARNING: 30,
  ERROR: 40,
};

export interface Logger {
  readonly level: LogLevel;
  setLevel(level: LogLevel): void;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface ConsoleLoggerOptions {
  readonly level?: LogLevel;
  readonly prefix?: string;
  /** Line sink; defaults to `console.error` */
  readonly write?: (line: string) => void;
}

export function createConsoleLogger(options?: ConsoleLoggerOptions): Logger {
  let level: LogLevel = options?.level ?? "INFO";
  const prefix = options?.prefix ?? "shellgate";
  const write = options?.write ?? ((line: string) => console.error(line));

  const log = (at: LogLevel, message: string): void => {
    if (LEVEL_ORDER[at] < LEVEL_ORDER[level]) return;
    write(`[${prefix}] ${at} ${message}`);
  };

  return {
    get level() {
      return level;
    },
    setLevel(next) {
      level = next;
    },
    debug: (message) => log("DEBUG", message),
    info: (message) => log("INFO", message),
    warn: (message) => log("WARNING", message),
    error: (message) => log("ERROR", message),
  };
}

/** Logger that drops everything. */
export const noopLogger: Logger = createConsoleLogger({ level: "ERROR", write: () => {} });
