import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { CommandPolicyConfigurationError } from "@shellgate/errors";
import { parse as parseYaml } from "yaml";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { type ConfigSnapshot, ConfigStore } from "../../config/store.js";
import { createConsoleLogger } from "../../logger.js";

describe("ConfigStore", () => {
  describe("snapshot", () => {
    it("should start at version 1 with all separators enabled", () => {
      const store = new ConfigStore();

      expect(store.snapshot.version).toBe(1);
      expect([...store.snapshot.separators]).toEqual(["pipe", "sequence", "background"]);
      expect(store.snapshot.patterns).toHaveLength(14);
    });

    it("should freeze the configuration", () => {
      const { config } = new ConfigStore().snapshot;
      expect(Object.isFrozen(config)).toBe(true);
      expect(Object.isFrozen(config.commands.read_commands)).toBe(true);
    });

    it("should append a pattern for each disabled separator", () => {
      const store = new ConfigStore([{ security: { separators: { pipe: false } } }]);

      expect([...store.snapshot.separators]).toEqual(["sequence", "background"]);
      expect(store.snapshot.patterns.at(-1)?.source).toBe("\\|");
    });

    it("should disable every separator when separators are not allowed", () => {
      const store = new ConfigStore([{ security: { allow_command_separators: false } }]);

      expect(store.snapshot.separators.size).toBe(0);
      expect(store.snapshot.patterns.slice(-3).map((p) => p.source)).toEqual(["\\|", ";", "&"]);
    });

    it("should log list conflicts as warnings", () => {
      const lines: string[] = [];
      const logger = createConsoleLogger({ write: (line) => lines.push(line) });
      const store = new ConfigStore([{ commands: { write_commands: ["cat"] } }], { logger });

      expect(store.snapshot.classification.get("cat")).toBe("write");
      expect(lines).toEqual([
        '[shellgate] WARNING command "cat" is listed as read and write; treating it as write',
      ]);
    });
  });

  describe("update", () => {
    it("should swap in a new version and notify handlers", async () => {
      const store = new ConfigStore();
      const seen: [number, number][] = [];
      store.onUpdated((next, previous) => seen.push([next.version, previous.version]));

      const next = await store.update({ security: { session_timeout: 10 } });

      expect(next.version).toBe(2);
      expect(store.snapshot).toBe(next);
      expect(store.snapshot.config.security.session_timeout).toBe(10);
      expect(seen).toEqual([[2, 1]]);
    });

    it("should leave the snapshot unchanged on an invalid regex", async () => {
      const store = new ConfigStore();
      const before = store.snapshot;

      await expect(store.update({ commands: { dangerous_patterns: ["("] } })).rejects.toThrow(
        CommandPolicyConfigurationError,
      );
      expect(store.snapshot).toBe(before);
      expect(store.snapshot.version).toBe(1);
    });

    it("should reject an invalid patch", async () => {
      const store = new ConfigStore();
      await expect(store.update({ security: { command_timeout: -1 } })).rejects.toThrow(
        CommandPolicyConfigurationError,
      );
      expect(store.snapshot.version).toBe(1);
    });

    it("should refuse to persist without a file before swapping", async () => {
      const store = new ConfigStore();
      await expect(
        store.update({ output: { format: "json" } }, { persist: true }),
      ).rejects.toThrow("cannot persist");
      expect(store.snapshot.config.output.format).toBe("text");
    });

    it("should stop notifying after dispose", async () => {
      const store = new ConfigStore();
      const versions: number[] = [];
      const dispose = store.onUpdated((next) => versions.push(next.version));

      await store.update({ output: { format: "json" } });
      dispose();
      await store.update({ output: { format: "text" } });

      expect(versions).toEqual([2]);
    });
  });

  describe("files", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), "shellgate-store-"));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it("should persist the merged configuration", async () => {
      const file = join(dir, "shellgate.yaml");
      const store = new ConfigStore([], { persistPath: file });

      await store.update({ output: { format: "json" } }, { persist: true });
      const written: unknown = parseYaml(await readFile(file, "utf-8"));

      expect(written).toMatchObject({ output: { format: "json", max_size: 102_400 } });
    });

    it("should apply layers in precedence order", async () => {
      const envPathFile = join(dir, "base.json");
      const flagFile = join(dir, "flag.yaml");
      await writeFile(envPathFile, JSON.stringify({ security: { session_timeout: 100, command_timeout: 7 } }));
      await writeFile(flagFile, "security:\n  session_timeout: 200\n");
      await writeFile(join(dir, ".env"), "SHELLGATE_SESSION_TIMEOUT=300\nSHELLGATE_MAX_OUTPUT_SIZE=2048\n");

      const load = (env: Record<string, string>): Promise<ConfigStore> =>
        ConfigStore.load({ configPath: flagFile, cwd: dir, env: { SHELLGATE_CONFIG: envPathFile, ...env } });

      const fromFiles = await load({});
      expect(fromFiles.snapshot.config.security).toMatchObject({
        session_timeout: 300,
        command_timeout: 7,
        max_output_size: 2048,
      });
      expect(fromFiles.persistPath).toBe(flagFile);

      const fromEnv = await load({ SHELLGATE_SESSION_TIMEOUT: "400" });
      expect(fromEnv.snapshot.config.security.session_timeout).toBe(400);
    });

    it("should discard runtime updates on reload and re-read files", async () => {
      const file = join(dir, "shellgate.json");
      await writeFile(file, JSON.stringify({ security: { session_timeout: 50 } }));
      const store = await ConfigStore.load({ configPath: file, cwd: dir, env: {} });

      await store.update({ security: { session_timeout: 60 } });
      await writeFile(file, JSON.stringify({ security: { session_timeout: 70 } }));
      const reloaded: ConfigSnapshot = await store.reload();

      expect(reloaded.version).toBe(3);
      expect(reloaded.config.security.session_timeout).toBe(70);
    });
  });
});
