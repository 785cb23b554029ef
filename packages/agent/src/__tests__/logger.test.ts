import { describe, expect, it } from "vitest";
import { ConfigError } from "@boardlink/shared";
import { buildTargets, resolveLogLevel } from "../logger.js";

describe("resolveLogLevel", () => {
  it("prefers the flag over LOG_LEVEL over the config", () => {
    expect(resolveLogLevel("debug", "info", { LOG_LEVEL: "warn" })).toBe("debug");
    expect(resolveLogLevel(undefined, "info", { LOG_LEVEL: "warn" })).toBe("warn");
    expect(resolveLogLevel(undefined, "error", {})).toBe("error");
  });

  it("accepts upper-case level names", () => {
    expect(resolveLogLevel("TRACE", "info", {})).toBe("trace");
  });

  it("rejects an unknown level", () => {
    expect(() => resolveLogLevel("verbose", "info", {})).toThrow(ConfigError);
  });
});

describe("buildTargets", () => {
  it("pretty-prints to stdout outside production", () => {
    const targets = buildTargets({ level: "info", production: false });

    expect(targets).toEqual([
      {
        target: "pino-pretty",
        options: { colorize: true, translateTime: "HH:MM:ss", ignore: "pid,hostname" },
        level: "info",
      },
    ]);
  });

  it("writes JSON to stdout in production and to the log file when set", () => {
    const targets = buildTargets({
      level: "warn",
      production: true,
      logFile: "/var/log/boardlink/agent.log",
    });

    expect(targets).toEqual([
      { target: "pino/file", options: { destination: 1 }, level: "warn" },
      {
        target: "pino/file",
        options: { destination: "/var/log/boardlink/agent.log", mkdir: true },
        level: "warn",
      },
    ]);
  });

  it("skips the file target when log_file is empty", () => {
    expect(buildTargets({ level: "info", production: true, logFile: "" })).toHaveLength(1);
  });
});
