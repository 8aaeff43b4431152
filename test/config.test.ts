import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigurationError } from "@core/errors";
import {
  assertTelegramConfigured,
  buildRuntimeConfig,
  defaultRuntimeDir,
  fromEnv,
  readRuntimeConfig,
  resetRuntimeConfigCache,
} from "@infra/config/config";

const managedEnv = ["TELEGRAM_BOT_TOKEN", "RELAY_RUNTIME_DIR", "RELAY_RETENTION_WINDOW_DAYS"] as const;

describe("config", () => {
  let tempDir = "";
  let originalEnv: Partial<Record<(typeof managedEnv)[number], string>> = {};

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "backlog-relay-config-"));
    originalEnv = {};
    for (const key of managedEnv) {
      originalEnv[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(async () => {
    resetRuntimeConfigCache();
    for (const key of managedEnv) {
      const value = originalEnv[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
    await rm(tempDir, { recursive: true, force: true });
  });

  it("fills every tunable with its default", () => {
    const cfg = buildRuntimeConfig({});

    expect(cfg.paths.runtimeDir).toBe(defaultRuntimeDir());
    expect(cfg.paths.runtimeDir).toContain(join(".config", "backlog-relay"));
    expect(cfg.paths.dbPath).toBe(join(defaultRuntimeDir(), "backlog-relay.db"));
    expect(cfg.drainOnStartup).toBe(true);
    expect(cfg.telegram).toEqual({ token: "", probeTimeoutMs: 10_000 });
    expect(cfg.telegram.allowedUpdates).toBeUndefined();
    expect(cfg.queue).toEqual({ batchSize: 100, interMessageDelayMs: 100, handlerTimeoutMs: 60_000 });
    expect(cfg.connectivity.checkIntervalMs).toBe(300_000);
    expect(cfg.retention).toEqual({ windowDays: 7, sweepIntervalMs: 86_400_000 });
  });

  it("places the database inside a custom runtime dir", () => {
    const cfg = buildRuntimeConfig({ runtimeDir: tempDir });

    expect(cfg.paths.dbPath).toBe(join(tempDir, "backlog-relay.db"));
  });

  it("replaces list values instead of concatenating them", () => {
    const cfg = buildRuntimeConfig({ telegram: { allowedUpdates: ["edited_message"] } });

    expect(cfg.telegram.allowedUpdates).toEqual(["edited_message"]);
  });

  it("rejects invalid tunables", () => {
    expect(() => buildRuntimeConfig({ queue: { batchSize: 0 } })).toThrow(ConfigurationError);
    expect(() => buildRuntimeConfig({ queue: { batchSize: 101 } })).toThrow("queue.batchSize");
    expect(() => buildRuntimeConfig({ queue: { interMessageDelayMs: -1 } })).toThrow("queue.interMessageDelayMs");
    expect(() => buildRuntimeConfig({ queue: { handlerTimeoutSeconds: 0 } })).toThrow("queue.handlerTimeoutSeconds");
  });

  it("rejects durations that overflow a timer", () => {
    expect(() => buildRuntimeConfig({ queue: { handlerTimeoutSeconds: 3_000_000 } })).toThrow(
      "queue.handlerTimeoutSeconds: Number must be less than or equal to 2147483",
    );
    expect(() => buildRuntimeConfig({ connectivity: { checkIntervalMinutes: 40_000 } })).toThrow(
      "connectivity.checkIntervalMinutes: Number must be less than or equal to 35791",
    );
    expect(() => buildRuntimeConfig({ retention: { sweepIntervalHours: 1000 } })).toThrow(
      "retention.sweepIntervalHours: Number must be less than or equal to 596",
    );
    expect(() => buildRuntimeConfig({ telegram: { probeTimeoutSeconds: 3_000_000 } })).toThrow(ConfigurationError);
    expect(buildRuntimeConfig({ retention: { sweepIntervalHours: 596 } }).retention.sweepIntervalMs).toBe(2_145_600_000);
  });

  it("maps environment variables", () => {
    const input = fromEnv({
      TELEGRAM_BOT_TOKEN: " test-token ",
      RELAY_BATCH_SIZE: "50",
      RELAY_DRAIN_ON_STARTUP: "false",
      RELAY_ALLOWED_UPDATES: "message, callback_query, bogus",
      RELAY_CONNECTIVITY_CHECK_INTERVAL_MINUTES: "2",
    });
    const cfg = buildRuntimeConfig(input);

    expect(cfg.telegram.token).toBe("test-token");
    expect(cfg.telegram.allowedUpdates).toEqual(["message", "callback_query"]);
    expect(buildRuntimeConfig(fromEnv({ RELAY_ALLOWED_UPDATES: "bogus" })).telegram.allowedUpdates).toBeUndefined();
    expect(cfg.queue.batchSize).toBe(50);
    expect(cfg.drainOnStartup).toBe(false);
    expect(cfg.connectivity.checkIntervalMs).toBe(120_000);
  });

  it("layers the environment over the config file", async () => {
    await writeFile(
      join(tempDir, "backlog-relay.config.json"),
      JSON.stringify({ queue: { batchSize: 25 }, retention: { windowDays: 3 } }),
      "utf8",
    );
    process.env.RELAY_RUNTIME_DIR = tempDir;
    process.env.RELAY_RETENTION_WINDOW_DAYS = "14";

    const cfg = await readRuntimeConfig({ cwd: tempDir, loadEnvFiles: false, fresh: true });

    expect(cfg.paths.dbPath).toBe(join(tempDir, "backlog-relay.db"));
    expect(cfg.queue.batchSize).toBe(25);
    expect(cfg.retention.windowDays).toBe(14);
  });

  it("caches the resolved config until reset", async () => {
    process.env.RELAY_RUNTIME_DIR = tempDir;

    const first = await readRuntimeConfig({ cwd: tempDir, loadEnvFiles: false });
    const second = await readRuntimeConfig({ cwd: tempDir, loadEnvFiles: false });
    resetRuntimeConfigCache();
    const third = await readRuntimeConfig({ cwd: tempDir, loadEnvFiles: false });

    expect(second).toBe(first);
    expect(third).not.toBe(first);
    expect(third).toEqual(first);
  });

  it("reports a malformed config file", async () => {
    await writeFile(join(tempDir, "backlog-relay.config.json"), JSON.stringify({ queue: { batchSize: "many" } }), "utf8");
    process.env.RELAY_RUNTIME_DIR = tempDir;

    await expect(readRuntimeConfig({ cwd: tempDir, loadEnvFiles: false, fresh: true })).rejects.toThrow(
      "[config file] Malformed config file:\n- queue.batchSize: Expected number, received string",
    );
  });

  it("requires a telegram token for network commands", () => {
    expect(() => assertTelegramConfigured(buildRuntimeConfig({}))).toThrow(
      "[telegram.token] Telegram token is missing. Set telegram.token or TELEGRAM_BOT_TOKEN.",
    );
    expect(() => assertTelegramConfigured(buildRuntimeConfig({ telegram: { token: "test-token" } }))).not.toThrow();
  });
});
