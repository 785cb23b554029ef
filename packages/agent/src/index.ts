#!/usr/bin/env tsx

/**
 * boardlink CLI entry point.
 *
 * Commands:
 *   start: run the agent in the foreground (default when no command is given)
 *   status: query the running agent's status API
 */

import { Command } from "commander";
import { errorMessage } from "@boardlink/shared";
import {
  createStartCommand,
  runStart,
  withStartOptions,
  type StartOptions,
} from "./commands/start.js";
import { createStatusCommand } from "./commands/status.js";
import { VERSION } from "./version.js";

const program = new Command();

withStartOptions(
  program
    .name("boardlink")
    .description("Board agent: control-plane session, tunnels and reverse-proxy routes")
    .version(VERSION)
    .enablePositionalOptions(),
);

program.addCommand(createStartCommand());
program.addCommand(createStatusCommand());

// Default action: run the agent
program.action(async (opts: StartOptions) => {
  await runStart(opts);
});

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(`boardlink: ${errorMessage(err)}`);
  process.exit(1);
});
