/**
 * In-process stand-ins for child processes and the executor.
 */

import type { SpawnOptions } from "node:child_process";
import { EventEmitter } from "node:events";
import { PassThrough } from "node:stream";
import type { ExecutionPlan } from "@shellgate/command-policy";
import type {
  CommandExecutor,
  ExecuteOptions,
  ExecutionResult,
  SpawnedProcess,
  SpawnFn,
} from "../../types.js";

export class FakeProcess extends EventEmitter implements SpawnedProcess {
  readonly pid: number;
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly signals: NodeJS.Signals[] = [];
  unrefCalls = 0;

  constructor(pid: number) {
    super();
    this.pid = pid;
  }

  kill(signal: NodeJS.Signals = "SIGTERM"): boolean {
    this.signals.push(signal);
    return true;
  }

  unref(): void {
    this.unrefCalls++;
  }

  /** Emits synchronously so the executor sees the bytes before `close`. */
  writeStdout(text: string): void {
    this.stdout.emit("data", Buffer.from(text, "utf-8"));
  }

  writeStderr(text: string): void {
    this.stderr.emit("data", Buffer.from(text, "utf-8"));
  }

  exit(code: number | null, signal: NodeJS.Signals | null = null): void {
    this.emit("close", code, signal);
  }
}

export interface SpawnCall {
  readonly command: string;
  readonly options: SpawnOptions;
  readonly process: FakeProcess;
}

export function createFakeSpawn(): { spawn: SpawnFn; calls: SpawnCall[]; last(): FakeProcess } {
  const calls: SpawnCall[] = [];
  let nextPid = 4200;
  return {
    calls,
    spawn: (command, options) => {
      const child = new FakeProcess(nextPid++);
      calls.push({ command, options, process: child });
      return child;
    },
    last() {
      const call = calls.at(-1);
      if (call === undefined) throw new Error("spawn was not called");
      return call.process;
    },
  };
}

export class FakeExecutor implements CommandExecutor {
  readonly plans: ExecutionPlan[] = [];
  result: Partial<ExecutionResult> = {};
  failure: Error | undefined;

  async execute(plan: ExecutionPlan, _options?: ExecuteOptions): Promise<ExecutionResult> {
    this.plans.push(plan);
    if (this.failure !== undefined) throw this.failure;
    return {
      exitCode: 0,
      stdout: `ran: ${plan.command}`,
      stderr: "",
      truncated: false,
      timedOut: false,
      durationMs: 5,
      background: plan.background,
      signal: null,
      ...this.result,
    };
  }
}
