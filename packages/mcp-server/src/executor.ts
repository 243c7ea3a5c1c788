import { spawn } from "node:child_process";
import type { ExecutionPlan, Logger, SnapshotSource } from "@shellgate/command-policy";
import { noopLogger } from "@shellgate/command-policy";
import { CommandExecutionError, getErrorMessage } from "@shellgate/errors";
import type {
  CommandExecutor,
  ExecuteOptions,
  ExecutionResult,
  SpawnedProcess,
  SpawnFn,
} from "./types.js";

export const TRUNCATION_MARKER = "\n... [output truncated due to size]";

const SIGKILL_GRACE_MS = 5_000;

export interface ShellCommandExecutorOptions {
  /** Live configuration; limits are read on every call */
  readonly config: SnapshotSource;
  readonly logger?: Logger | undefined;
  readonly spawn?: SpawnFn | undefined;
  readonly createTimeoutSignal?: ((ms: number) => AbortSignal) | undefined;
  readonly killGraceMs?: number | undefined;
}

const defaultSpawn: SpawnFn = (command, options) => spawn(command, options);

/**
 * Runs approved plans through the system shell.
 *
 * Foreground commands are bounded by `security.command_timeout` and the
 * per-stream byte cap `min(security.max_output_size, output.max_size)`.
 * Background plans are detached and resolve as soon as the process spawns.
 */
export class ShellCommandExecutor implements CommandExecutor {
  private readonly config: SnapshotSource;
  private readonly logger: Logger;
  private readonly spawnFn: SpawnFn;
  private readonly createTimeoutSignal: (ms: number) => AbortSignal;
  private readonly killGraceMs: number;

  constructor(options: ShellCommandExecutorOptions) {
    this.config = options.config;
    this.logger = options.logger ?? noopLogger;
    this.spawnFn = options.spawn ?? defaultSpawn;
    this.createTimeoutSignal = options.createTimeoutSignal ?? ((ms) => AbortSignal.timeout(ms));
    this.killGraceMs = options.killGraceMs ?? SIGKILL_GRACE_MS;
  }

  execute(plan: ExecutionPlan, options?: ExecuteOptions): Promise<ExecutionResult> {
    this.logger.info(`executing "${plan.command}" in session ${plan.sessionId}`);
    return plan.background ? this.spawnDetached(plan) : this.spawnForeground(plan, options);
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private spawnDetached(plan: ExecutionPlan): Promise<ExecutionResult> {
    const start = performance.now();

    return new Promise<ExecutionResult>((resolve, reject) => {
      const child = this.startProcess(plan.command, reject, {
        shell: true,
        detached: true,
        stdio: "ignore",
      });
      if (child === undefined) return;

      child.on("error", (error) => {
        reject(this.failure(plan.command, error));
      });

      child.on("spawn", () => {
        child.unref();
        this.logger.debug(`background process ${child.pid ?? "?"} started`);
        resolve({
          exitCode: null,
          stdout: "",
          stderr: "",
          truncated: false,
          timedOut: false,
          durationMs: Math.round(performance.now() - start),
          background: true,
          pid: child.pid,
          signal: null,
        });
      });
    });
  }

  private spawnForeground(plan: ExecutionPlan, options?: ExecuteOptions): Promise<ExecutionResult> {
    const start = performance.now();
    const { security, output } = this.config.snapshot.config;
    const maxPerStream = Math.min(security.max_output_size, output.max_size);
    const timeoutMs = security.command_timeout * 1000;

    // Compose abort signals: timeout + caller signal
    const timeoutSignal = this.createTimeoutSignal(timeoutMs);
    const combinedSignal = options?.signal
      ? AbortSignal.any([timeoutSignal, options.signal])
      : timeoutSignal;

    return new Promise<ExecutionResult>((resolve, reject) => {
      const child = this.startProcess(plan.command, reject, {
        shell: true,
        stdio: ["ignore", "pipe", "pipe"],
      });
      if (child === undefined) return;

      const stdout = new StreamCapture(maxPerStream);
      const stderr = new StreamCapture(maxPerStream);
      child.stdout?.on("data", (chunk: Buffer) => stdout.push(chunk));
      child.stderr?.on("data", (chunk: Buffer) => stderr.push(chunk));

      let timedOut = false;
      let killed = false;
      let closed = false;
      let killTimer: ReturnType<typeof setTimeout> | undefined;

      const onAbort = () => {
        if (killed) return;
        killed = true;
        timedOut = timeoutSignal.aborted;
        this.logger.warn(
          timedOut
            ? `"${plan.command}" timed out after ${security.command_timeout}s`
            : `"${plan.command}" cancelled`,
        );

        child.kill("SIGTERM");

        killTimer = setTimeout(() => {
          if (!closed) {
            child.kill("SIGKILL");
          }
        }, this.killGraceMs);
        killTimer.unref();
      };

      combinedSignal.addEventListener("abort", onAbort, { once: true });

      child.on("error", (error) => {
        combinedSignal.removeEventListener("abort", onAbort);
        reject(this.failure(plan.command, error));
      });

      child.on("close", (exitCode, signal) => {
        closed = true;
        combinedSignal.removeEventListener("abort", onAbort);
        if (killTimer !== undefined) clearTimeout(killTimer);

        const result: ExecutionResult = {
          exitCode,
          stdout: stdout.text(),
          stderr: stderr.text(),
          truncated: stdout.truncated || stderr.truncated,
          timedOut,
          durationMs: Math.round(performance.now() - start),
          background: false,
          pid: child.pid,
          signal,
        };
        this.logger.debug(
          `"${plan.command}" exited with ${exitCode ?? signal ?? "unknown"} in ${result.durationMs}ms`,
        );
        resolve(result);
      });
    });
  }

  private startProcess(
    command: string,
    reject: (error: Error) => void,
    options: Parameters<SpawnFn>[1],
  ): SpawnedProcess | undefined {
    try {
      return this.spawnFn(command, options);
    } catch (error: unknown) {
      reject(this.failure(command, error));
      return undefined;
    }
  }

  private failure(command: string, error: unknown): CommandExecutionError {
    const reason = getErrorMessage(error);
    this.logger.error(`failed to run "${command}": ${reason}`);
    return new CommandExecutionError(
      command,
      reason,
      error instanceof Error ? { cause: error } : undefined,
    );
  }
}

/** Collects a stream's bytes up to a cap. */
class StreamCapture {
  private readonly chunks: Buffer[] = [];
  private bytes = 0;
  private overflow = false;

  constructor(private readonly maxBytes: number) {}

  get truncated(): boolean {
    return this.overflow;
  }

  push(chunk: Buffer): void {
    const remaining = this.maxBytes - this.bytes;
    if (chunk.length > remaining) {
      this.overflow = true;
    }
    if (remaining <= 0) return;
    const kept = chunk.length > remaining ? chunk.subarray(0, remaining) : chunk;
    this.chunks.push(kept);
    this.bytes += kept.length;
  }

  text(): string {
    const text = Buffer.concat(this.chunks).toString("utf-8");
    return this.overflow ? `${text}${TRUNCATION_MARKER}` : text;
  }
}
