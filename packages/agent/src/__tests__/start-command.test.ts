/**
 * Tests for `boardlink start` option handling and banner.
 */

import { Command } from "commander";
import { describe, expect, it } from "vitest";
import {
  formatBanner,
  resolveStartOptions,
  withStartOptions,
  type StartOptions,
} from "../commands/start.js";

/** Root program wired like the CLI entry, with `start` capturing its options */
function parseStart(argv: string[]): StartOptions {
  const seen: StartOptions[] = [];
  const program = withStartOptions(new Command("boardlink").enablePositionalOptions());
  program.addCommand(
    withStartOptions(new Command("start")).action((_opts: StartOptions, command: Command) => {
      seen.push(resolveStartOptions(command));
    }),
  );
  program.parse(argv, { from: "user" });
  const [options] = seen;
  if (options === undefined) throw new Error("start action did not run");
  return options;
}

describe("resolveStartOptions", () => {
  it("takes options given after the subcommand", () => {
    expect(parseStart(["start", "-c", "/tmp/agent.yaml", "-l", "debug"])).toEqual({
      config: "/tmp/agent.yaml",
      logLevel: "debug",
    });
  });

  it("takes options given before the subcommand", () => {
    expect(parseStart(["--config", "/tmp/agent.yaml", "start"])).toEqual({
      config: "/tmp/agent.yaml",
    });
  });

  it("prefers the subcommand's own value", () => {
    expect(
      parseStart(["-c", "/tmp/root.yaml", "-l", "warn", "start", "-c", "/tmp/start.yaml"]),
    ).toEqual({ config: "/tmp/start.yaml", logLevel: "warn" });
  });

  it("leaves both unset when neither is given", () => {
    expect(parseStart(["start"])).toEqual({});
  });
});

describe("formatBanner", () => {
  it("names the pid and config path", () => {
    const lines = formatBanner("/etc/boardlink/agent.yaml", 42).split("\n");
    expect(lines.slice(1)).toEqual([
      "  pid:     42",
      "  config:  /etc/boardlink/agent.yaml",
    ]);
  });
});
