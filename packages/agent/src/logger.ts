/**
 * Centralized pino logger factory for the boardlink agent.
 *
 * Multi-transport logging: pretty-printed to stdout in development, JSON to
 * stdout in production (NODE_ENV=production), plus JSON to a log file when
 * `agent.log_file` is set. Managers get child loggers via
 * `logger.child({ module })`.
 *
 * Level precedence: `--log-level` flag, then LOG_LEVEL, then `agent.log_level`.
 */

import { pino, type Logger, type TransportTargetOptions } from "pino";
import { ConfigError } from "@boardlink/shared";
import { LogLevelSchema, type LogLevel } from "./config.js";

/** Whether the agent is running in production mode */
const isProduction = process.env.NODE_ENV === "production";

export interface LoggerOptions {
  level: LogLevel;
  /** JSON log file; empty or undefined disables it */
  logFile?: string;
  /** Defaults to NODE_ENV=production */
  production?: boolean;
}

/**
 * Pick the effective level: flag, then LOG_LEVEL, then config.
 *
 * @throws ConfigError CONFIG_INVALID: the flag or LOG_LEVEL names no pino level
 */
export function resolveLogLevel(
  flag: string | undefined,
  configLevel: LogLevel,
  env: NodeJS.ProcessEnv = process.env,
): LogLevel {
  const requested = flag || env.LOG_LEVEL;
  if (!requested) return configLevel;

  const result = LogLevelSchema.safeParse(requested.toLowerCase());
  if (!result.success) {
    throw new ConfigError(`Unknown log level "${requested}"`, "CONFIG_INVALID", {
      level: requested,
    });
  }
  return result.data;
}

/** Transport targets for the given options */
export function buildTargets(opts: LoggerOptions): TransportTargetOptions[] {
  const production = opts.production ?? isProduction;
  const targets: TransportTargetOptions[] = production
    ? [{ target: "pino/file", options: { destination: 1 }, level: opts.level }]
    : [
        {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss",
            ignore: "pid,hostname",
          },
          level: opts.level,
        },
      ];

  if (opts.logFile) {
    targets.push({
      target: "pino/file",
      options: { destination: opts.logFile, mkdir: true },
      level: opts.level,
    });
  }

  return targets;
}

/**
 * Create the agent's root logger.
 *
 * @param name - Logger name (appears in every entry)
 */
export function createLogger(name: string, opts: LoggerOptions): Logger {
  return pino({
    name,
    level: opts.level,
    transport: { targets: buildTargets(opts) },
  });
}
