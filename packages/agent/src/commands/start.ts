/**
 * `boardlink start` (also the default action): run the agent in the
 * foreground until SIGTERM or SIGINT.
 *
 * Graceful shutdown on SIGTERM/SIGINT:
 *   1. Cancel the health check and close the status API
 *   2. Stop managers in reverse start order
 *   3. Close the control-plane session
 *   4. Exit 0 (or force exit after 30s)
 */

import { Command } from "commander";
import pc from "picocolors";
import type { Logger } from "pino";
import { Agent, type AgentDeps } from "../agent.js";
import { loadConfig, resolveConfigPath, type AgentConfig } from "../config.js";
import { createLogger, resolveLogLevel } from "../logger.js";
import { AGENT_NAME, VERSION } from "../version.js";

/** Graceful shutdown timeout: force exit if cleanup takes longer than this */
const SHUTDOWN_TIMEOUT_MS = 30_000;

export interface StartOptions {
  config?: string;
  logLevel?: string;
}

/** Lines printed before the agent starts */
export function formatBanner(configPath: string, pid: number = process.pid): string {
  return [
    pc.bold(`${AGENT_NAME} ${VERSION}`),
    `  pid:     ${pid}`,
    `  config:  ${configPath}`,
  ].join("\n");
}

/** Add the options `start` understands; the root program carries them too */
export function withStartOptions(command: Command): Command {
  return command
    .option("-c, --config <path>", "agent config file")
    .option("-l, --log-level <level>", "log level (overrides LOG_LEVEL and the config file)");
}

/**
 * Options for `start`, with those given before the subcommand
 * (`boardlink -c x start`) filling in what `start` itself was not given.
 */
export function resolveStartOptions(command: Command): StartOptions {
  return { ...command.parent?.opts<StartOptions>(), ...command.opts<StartOptions>() };
}

export function createStartCommand(): Command {
  return withStartOptions(
    new Command("start").description("Run the board agent in the foreground"),
  ).action(async (_opts: StartOptions, command: Command) => {
    await runStart(resolveStartOptions(command));
  });
}

/**
 * Load config, build the logger and the agent, start it, and install the
 * signal handlers. Resolves once the agent is running.
 */
export async function runStart(opts: StartOptions, deps: AgentDeps = {}): Promise<Agent> {
  const configPath = resolveConfigPath(opts.config);
  process.stdout.write(formatBanner(configPath) + "\n");

  const config: AgentConfig = loadConfig(configPath);
  const logger = createLogger(AGENT_NAME, {
    level: resolveLogLevel(opts.logLevel, config.agent.log_level),
    logFile: config.agent.log_file,
  });

  const agent = new Agent(config, logger, deps);
  installSignalHandlers(agent, logger);
  await agent.start();
  return agent;
}

function installSignalHandlers(agent: Agent, logger: Logger): void {
  let isShuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    // Prevent double-shutdown from multiple signals
    if (isShuttingDown) return;
    isShuttingDown = true;

    logger.info({ signal }, "Shutting down...");

    const forceExitTimer = setTimeout(() => {
      logger.error("Graceful shutdown timed out, forcing exit");
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExitTimer.unref();

    await agent.stop();
    logger.info("Shutdown complete");
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}
