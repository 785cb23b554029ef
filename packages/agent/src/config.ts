/**
 * Agent configuration.
 *
 * The agent reads one YAML file (default /etc/boardlink/agent.yaml, overridden
 * by `--config` or BOARDLINK_CONFIG). Every key has a default, so a missing
 * file is not an error: the agent runs with the defaults below. Durations in
 * the file are seconds; the Agent converts them to milliseconds for the managers.
 *
 * Layout:
 *   agent:          home directory, logging, certificate policy
 *   control_plane:  procedure namespace and session timers
 *   services:       tunnel binary and reconciliation
 *   webservices:    reverse proxy binary and configuration directory
 *   status_api:     local HTTP status server
 */

import * as fs from "node:fs";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ConfigError } from "@boardlink/shared";
import { isErrnoException } from "@boardlink/core";

/** Default location of the agent config file */
export const DEFAULT_CONFIG_PATH = "/etc/boardlink/agent.yaml";

export const LogLevelSchema = z.enum([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);

export type LogLevel = z.infer<typeof LogLevelSchema>;

const seconds = (fallback: number) => z.number().int().positive().default(fallback);

// ---------------------------------------------------------------------------
// Zod schema for config validation
// ---------------------------------------------------------------------------

const AgentConfigSchema = z.object({
  agent: z
    .object({
      /** Directory holding settings.json and the registries */
      home: z.string().min(1).default("/var/lib/boardlink"),
      log_level: LogLevelSchema.default("info"),
      /** Extra JSON log file; empty disables it */
      log_file: z.string().default(""),
      /** Accept any certificate on wss:// endpoints */
      skip_cert_verify: z.boolean().default(true),
    })
    .default({}),
  control_plane: z
    .object({
      namespace: z.string().min(1).default("iotronic"),
      /** Delay between disconnect and connect on reconnect */
      connection_timer: seconds(10),
      /** Health-check interval */
      alive_timer: seconds(600),
      call_timeout: seconds(30),
    })
    .default({}),
  services: z
    .object({
      tunnel_bin: z.string().min(1).default("/usr/bin/wstun"),
      tunnel_port: z.number().int().min(1).max(65535).default(8080),
      /** 0 disables periodic reconciliation */
      reconcile_interval: z.number().int().nonnegative().default(60),
      restart_dead_tunnels: z.boolean().default(true),
    })
    .default({}),
  webservices: z
    .object({
      proxy: z.literal("nginx").default("nginx"),
      proxy_bin: z.string().min(1).default("nginx"),
      conf_dir: z.string().min(1).default("/etc/nginx/conf.d"),
    })
    .default({}),
  status_api: z
    .object({
      enabled: z.boolean().default(true),
      host: z.string().min(1).default("0.0.0.0"),
      port: z.number().int().min(0).max(65535).default(8080),
    })
    .default({}),
});

/** Validated config, every key populated */
export type AgentConfig = z.infer<typeof AgentConfigSchema>;

/** Config as written in the YAML file, every key optional */
export type AgentConfigInput = z.input<typeof AgentConfigSchema>;

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/** `--config` flag, then BOARDLINK_CONFIG, then the default path */
export function resolveConfigPath(flag?: string): string {
  return flag || process.env.BOARDLINK_CONFIG || DEFAULT_CONFIG_PATH;
}

/** Validate an already-parsed config object */
export function parseConfig(input: unknown, source = "<inline>"): AgentConfig {
  const result = AgentConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    throw new ConfigError(
      `Config file at ${source} has invalid structure: ${result.error.message}`,
      "CONFIG_INVALID",
      { path: source, zodErrors: result.error.issues },
    );
  }
  return result.data;
}

/**
 * Load and validate the config file. A missing file yields the defaults; an
 * empty file is treated the same way.
 *
 * @throws ConfigError CONFIG_CORRUPTED: file exists but is not valid YAML
 * @throws ConfigError CONFIG_INVALID: YAML parses but fails schema validation
 * @throws ConfigError CONFIG_READ_FAILED: file exists but cannot be read
 */
export function loadConfig(configPath: string = DEFAULT_CONFIG_PATH): AgentConfig {
  let raw: string;
  try {
    raw = fs.readFileSync(configPath, "utf-8");
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") {
      return parseConfig({}, configPath);
    }
    throw new ConfigError(
      `Config file at ${configPath} could not be read.`,
      "CONFIG_READ_FAILED",
      { path: configPath, cause: String(err) },
    );
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (err) {
    throw new ConfigError(
      `Config file at ${configPath} is not valid YAML.`,
      "CONFIG_CORRUPTED",
      { path: configPath, parseError: String(err) },
    );
  }

  return parseConfig(parsed, configPath);
}
