import type { SpawnOptions } from "node:child_process";
import type { Readable } from "node:stream";
import type { ExecutionPlan } from "@shellgate/command-policy";

// ---------------------------------------------------------------------------
// Executor
// ---------------------------------------------------------------------------

export interface ExecutionResult {
  /** Null when the process was killed by a signal or runs in the background */
  readonly exitCode: number | null;
  readonly stdout: string;
  readonly stderr: string;
  /** True when either stream hit the byte cap */
  readonly truncated: boolean;
  readonly timedOut: boolean;
  readonly durationMs: number;
  readonly background: boolean;
  readonly pid?: number | undefined;
  readonly signal: NodeJS.Signals | null;
}

export interface ExecuteOptions {
  /** Caller cancellation, combined with the command timeout */
  readonly signal?: AbortSignal | undefined;
}

/**
 * Runs an approved plan. Implementations must only be handed plans taken
 * from an approved verdict.
 */
export interface CommandExecutor {
  execute(plan: ExecutionPlan, options?: ExecuteOptions): Promise<ExecutionResult>;
}

/** The parts of a child process the executor relies on. */
export interface SpawnedProcess {
  readonly pid?: number | undefined;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals): boolean;
  unref(): void;
  on(event: "error", listener: (error: Error) => void): unknown;
  on(
    event: "close",
    listener: (code: number | null, signal: NodeJS.Signals | null) => void,
  ): unknown;
  on(event: "spawn", listener: () => void): unknown;
}

export type SpawnFn = (command: string, options: SpawnOptions) => SpawnedProcess;

// ---------------------------------------------------------------------------
// Tool results (wire shape, snake_case)
// ---------------------------------------------------------------------------

export interface CommandOutputResult {
  readonly success: boolean;
  readonly output: string;
  readonly error: string;
  readonly exit_code: number | null;
  readonly command_type: string;
  readonly background: boolean;
  readonly truncated: boolean;
  readonly timed_out: boolean;
  readonly duration_ms: number;
  readonly pid?: number;
}

export interface ApprovalNeededResult {
  readonly success: false;
  readonly output: "";
  readonly requires_approval: true;
  readonly command_types: readonly string[];
  readonly session_id: string;
  readonly error: string;
  readonly error_code: string;
}

export interface RejectionResult {
  readonly success: false;
  readonly output: "";
  readonly error: string;
  readonly code: string;
  readonly error_code: string;
  readonly segment_index: number | null;
}

export interface FailureResult {
  readonly success: false;
  readonly output?: "";
  readonly error: string;
  readonly error_code?: string;
}

export type ExecuteToolResult =
  | CommandOutputResult
  | ApprovalNeededResult
  | RejectionResult
  | FailureResult;
