import { ConfigStore, createConsoleLogger, type ExecutionPlan } from "@shellgate/command-policy";
import { CommandExecutionError } from "@shellgate/errors";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ShellCommandExecutor, TRUNCATION_MARKER } from "../../executor.js";
import { createFakeSpawn } from "../helpers/fakes.js";

function plan(command: string, background = false): ExecutionPlan {
  return { command, segments: [], background, sessionId: "s1" };
}

describe("ShellCommandExecutor", () => {
  let fake: ReturnType<typeof createFakeSpawn>;
  let timeout: AbortController;
  let timeoutRequests: number[];
  let lines: string[];
  let executor: ShellCommandExecutor;

  const build = (store: ConfigStore) =>
    new ShellCommandExecutor({
      config: store,
      logger: createConsoleLogger({ level: "DEBUG", write: (line) => lines.push(line) }),
      spawn: fake.spawn,
      createTimeoutSignal: (ms) => {
        timeoutRequests.push(ms);
        return timeout.signal;
      },
      killGraceMs: 1_000,
    });

  beforeEach(() => {
    fake = createFakeSpawn();
    timeout = new AbortController();
    timeoutRequests = [];
    lines = [];
    executor = build(
      new ConfigStore([
        { security: { max_output_size: 8, command_timeout: 2 }, output: { max_size: 100 } },
      ]),
    );
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  // -----------------------------------------------------------------------
  // Foreground
  // -----------------------------------------------------------------------

  describe("foreground commands", () => {
    it("should run through the shell with piped output", async () => {
      const pending = executor.execute(plan("ls -la"));
      const child = fake.last();
      child.writeStdout("total 0\n");
      child.exit(0);

      const result = await pending;
      expect(fake.calls[0]?.command).toBe("ls -la");
      expect(fake.calls[0]?.options).toEqual({ shell: true, stdio: ["ignore", "pipe", "pipe"] });
      expect(result).toMatchObject({
        exitCode: 0,
        stdout: "total 0\n",
        stderr: "",
        truncated: false,
        timedOut: false,
        background: false,
        pid: 4200,
        signal: null,
      });
      expect(result.durationMs).toBeGreaterThanOrEqual(0);
    });

    it("should request the configured timeout in milliseconds", async () => {
      const pending = executor.execute(plan("ls"));
      fake.last().exit(0);
      await pending;

      expect(timeoutRequests).toEqual([2_000]);
    });

    it("should report a non-zero exit code and stderr", async () => {
      const pending = executor.execute(plan("ls missing"));
      const child = fake.last();
      child.writeStderr("no such");
      child.exit(2);

      const result = await pending;
      expect(result.exitCode).toBe(2);
      expect(result.stderr).toBe("no such");
    });
  });

  // -----------------------------------------------------------------------
  // Output caps
  // -----------------------------------------------------------------------

  describe("output caps", () => {
    it("should truncate a stream at the byte cap and append the marker", async () => {
      const pending = executor.execute(plan("cat big.log"));
      const child = fake.last();
      child.writeStdout("abcdef");
      child.writeStdout("ghijkl");
      child.writeStderr("warn");
      child.exit(0);

      const result = await pending;
      expect(result.stdout).toBe(`abcdefgh${TRUNCATION_MARKER}`);
      expect(result.stderr).toBe("warn");
      expect(result.truncated).toBe(true);
    });

    it("should not mark output that exactly fills the cap", async () => {
      const pending = executor.execute(plan("cat small.log"));
      const child = fake.last();
      child.writeStdout("12345678");
      child.exit(0);

      const result = await pending;
      expect(result.stdout).toBe("12345678");
      expect(result.truncated).toBe(false);
    });

    it("should use the smaller of the two configured limits", async () => {
      executor = build(
        new ConfigStore([{ security: { max_output_size: 100 }, output: { max_size: 4 } }]),
      );
      const pending = executor.execute(plan("cat big.log"));
      const child = fake.last();
      child.writeStdout("abcdef");
      child.exit(0);

      expect((await pending).stdout).toBe(`abcd${TRUNCATION_MARKER}`);
    });
  });

  // -----------------------------------------------------------------------
  // Timeout and cancellation
  // -----------------------------------------------------------------------

  describe("timeout", () => {
    it("should send SIGTERM, then SIGKILL after the grace period", async () => {
      vi.useFakeTimers();
      const pending = executor.execute(plan("sleep 10"));
      const child = fake.last();

      timeout.abort();
      expect(child.signals).toEqual(["SIGTERM"]);

      vi.advanceTimersByTime(1_000);
      expect(child.signals).toEqual(["SIGTERM", "SIGKILL"]);

      child.exit(null, "SIGKILL");
      const result = await pending;
      expect(result).toMatchObject({ exitCode: null, timedOut: true, signal: "SIGKILL" });
      expect(lines).toContain('[shellgate] WARNING "sleep 10" timed out after 2s');
    });

    it("should not SIGKILL a process that exits within the grace period", async () => {
      vi.useFakeTimers();
      const pending = executor.execute(plan("sleep 10"));
      const child = fake.last();

      timeout.abort();
      child.exit(null, "SIGTERM");
      vi.advanceTimersByTime(1_000);

      await pending;
      expect(child.signals).toEqual(["SIGTERM"]);
    });

    it("should stop on caller cancellation without reporting a timeout", async () => {
      const caller = new AbortController();
      const pending = executor.execute(plan("sleep 10"), { signal: caller.signal });
      const child = fake.last();

      caller.abort();
      child.exit(null, "SIGTERM");

      const result = await pending;
      expect(child.signals).toEqual(["SIGTERM"]);
      expect(result.timedOut).toBe(false);
      expect(result.signal).toBe("SIGTERM");
    });
  });

  // -----------------------------------------------------------------------
  // Failures
  // -----------------------------------------------------------------------

  describe("failures", () => {
    it("should reject with CommandExecutionError when the process fails to start", async () => {
      const pending = executor.execute(plan("ls"));
      fake.last().emit("error", new Error("spawn /bin/sh ENOENT"));

      const error = await pending.catch((e: unknown) => e);
      expect(error).toBeInstanceOf(CommandExecutionError);
      expect(error).toMatchObject({
        code: "COMMAND_EXECUTION_FAILED",
        command: "ls",
        reason: "spawn /bin/sh ENOENT",
        message: "Command execution failed: spawn /bin/sh ENOENT",
      });
    });

    it("should reject when spawn throws", async () => {
      const store = new ConfigStore();
      executor = new ShellCommandExecutor({
        config: store,
        spawn: () => {
          throw new Error("EAGAIN");
        },
      });

      await expect(executor.execute(plan("ls"))).rejects.toThrow(
        "Command execution failed: EAGAIN",
      );
    });
  });

  // -----------------------------------------------------------------------
  // Background
  // -----------------------------------------------------------------------

  describe("background commands", () => {
    it("should detach, unref and resolve once spawned", async () => {
      const pending = executor.execute(plan("tail -f app.log &", true));
      const child = fake.last();
      child.emit("spawn");

      const result = await pending;
      expect(fake.calls[0]?.options).toEqual({ shell: true, detached: true, stdio: "ignore" });
      expect(child.unrefCalls).toBe(1);
      expect(result).toMatchObject({
        exitCode: null,
        stdout: "",
        stderr: "",
        background: true,
        timedOut: false,
        pid: 4200,
      });
      expect(timeoutRequests).toEqual([]);
    });
  });
});
