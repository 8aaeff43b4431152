import { describe, expect, it } from "vitest";
import { resolveLoggerConfig } from "./logger.utils";

describe("logger config", () => {
  it("is silent without transports under test", () => {
    const cfg = resolveLoggerConfig({ NODE_ENV: "test" }, "/tmp/project");
    expect(cfg.level).toBe("silent");
    expect(cfg.targets).toHaveLength(0);
  });

  it("supports explicit level, no pretty, no file logging", () => {
    const cfg = resolveLoggerConfig(
      {
        LOG_LEVEL: "debug",
        RELAY_PRETTY_LOGS: "0",
        RELAY_LOG_TO_FILE: "0",
      },
      "/tmp/project",
    );

    expect(cfg.level).toBe("debug");
    expect(cfg.usePretty).toBe(false);
    expect(cfg.fileLoggingEnabled).toBe(false);
    expect(cfg.targets).toHaveLength(0);
  });

  it("builds pretty and file targets with default path", () => {
    const cfg = resolveLoggerConfig({}, "/tmp/project");

    expect(cfg.level).toBe("info");
    expect(cfg.usePretty).toBe(true);
    expect(cfg.fileLoggingEnabled).toBe(true);
    expect(cfg.logFilePath).toBe("/tmp/project/backlog-relay.log");
    expect(cfg.targets.map((target) => target.target)).toEqual(["pino-pretty", "pino/file"]);
  });

  it("honours a custom log file path", () => {
    const cfg = resolveLoggerConfig({ RELAY_PRETTY_LOGS: "0", RELAY_LOG_FILE: " /var/log/relay.log " }, "/tmp/project");

    expect(cfg.logFilePath).toBe("/var/log/relay.log");
    expect(cfg.targets).toEqual([{ target: "pino/file", options: { destination: "/var/log/relay.log", mkdir: true } }]);
  });
});
