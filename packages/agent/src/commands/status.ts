/**
 * `boardlink status`: query the running agent's status API.
 *
 * Reads /api/info from the local status API and prints the board identity and
 * control-plane connection. When the API does not answer, prints an offline
 * message instead (the agent is not running, or the API is disabled).
 */

import { Command } from "commander";
import pc from "picocolors";
import { z } from "zod";
import { ConfigError, errorMessage } from "@boardlink/shared";
import { loadConfig, resolveConfigPath, type AgentConfig } from "../config.js";

/** How long to wait for the status API */
const STATUS_TIMEOUT_MS = 3000;

const AgentInfoSchema = z.object({
  name: z.string(),
  version: z.string(),
  board: z.object({
    uuid: z.string(),
    name: z.string(),
    type: z.string(),
    status: z.string(),
    hostname: z.string(),
  }),
  wamp: z.object({
    connected: z.boolean(),
    state: z.string(),
    session_id: z.string().nullable(),
    url: z.string().nullable(),
    realm: z.string().nullable(),
  }),
});

export type AgentInfo = z.infer<typeof AgentInfoSchema>;

export type StatusResult =
  | { reachable: true; baseUrl: string; info: AgentInfo }
  | { reachable: false; baseUrl: string; error: string };

// ---------------------------------------------------------------------------
// Data Layer
// ---------------------------------------------------------------------------

/** Base URL of the local status API described by `config` */
export function statusApiUrl(config: AgentConfig): string {
  const { host, port } = config.status_api;
  const target = host === "0.0.0.0" || host === "::" ? "127.0.0.1" : host;
  return `http://${target}:${port}`;
}

export async function fetchStatus(
  baseUrl: string,
  timeoutMs: number = STATUS_TIMEOUT_MS,
): Promise<StatusResult> {
  try {
    const response = await fetch(new URL("/api/info", baseUrl), {
      signal: AbortSignal.timeout(timeoutMs),
    });
    if (!response.ok) {
      return { reachable: false, baseUrl, error: `HTTP ${response.status}` };
    }
    const parsed = AgentInfoSchema.safeParse(await response.json());
    if (!parsed.success) {
      return { reachable: false, baseUrl, error: "Unexpected response from status API" };
    }
    return { reachable: true, baseUrl, info: parsed.data };
  } catch (err) {
    return { reachable: false, baseUrl, error: errorMessage(err) };
  }
}

// ---------------------------------------------------------------------------
// Presentation
// ---------------------------------------------------------------------------

export function formatStatus(result: StatusResult): string {
  const lines: string[] = [];
  lines.push("boardlink status");
  lines.push("");

  if (!result.reachable) {
    lines.push(`  Agent:      ${pc.red("\u2717")} Offline (${result.baseUrl})`);
    lines.push(pc.dim(`              ${result.error}`));
    return lines.join("\n");
  }

  const { info } = result;
  lines.push(`  Agent:      ${pc.green("\u2713")} ${info.name} ${info.version} (${result.baseUrl})`);
  lines.push(`  Board:      ${info.board.name} (${info.board.uuid})`);
  lines.push(`  Type:       ${info.board.type}`);
  lines.push(`  Status:     ${info.board.status}`);
  lines.push(`  Host:       ${info.board.hostname}`);
  lines.push("");

  const endpoint = info.wamp.url === null ? "" : ` ${info.wamp.url} (realm ${info.wamp.realm ?? "?"})`;
  if (info.wamp.connected) {
    lines.push(`  Session:    ${pc.green("\u25CF")} connected${endpoint}`);
    lines.push(`  Session ID: ${info.wamp.session_id ?? "-"}`);
  } else {
    lines.push(`  Session:    ${pc.yellow("\u25CB")} ${info.wamp.state}${endpoint}`);
  }

  return lines.join("\n");
}

// ---------------------------------------------------------------------------
// Command Definition
// ---------------------------------------------------------------------------

export interface StatusOptions {
  config?: string;
  url?: string;
  json?: boolean;
}

export function createStatusCommand(): Command {
  return new Command("status")
    .description("Show the running agent's board and connection status")
    .option("-c, --config <path>", "agent config file (locates the status API)")
    .option("--url <url>", "status API base URL")
    .option("--json", "Output as JSON")
    .action(async (opts: StatusOptions) => {
      await runStatus(opts);
    });
}

/**
 * Core status logic. Separated from Commander for testability.
 */
export async function runStatus(opts: StatusOptions = {}): Promise<void> {
  let baseUrl = opts.url;
  if (baseUrl === undefined) {
    try {
      baseUrl = statusApiUrl(loadConfig(resolveConfigPath(opts.config)));
    } catch (err) {
      if (err instanceof ConfigError) {
        console.error(`Config error (${err.code}): ${err.message}`);
      } else {
        console.error("Failed to load config:", err);
      }
      process.exitCode = 1;
      return;
    }
  }

  const result = await fetchStatus(baseUrl);

  if (opts.json) {
    const body = result.reachable
      ? result.info
      : { status: "offline", url: result.baseUrl, error: result.error };
    process.stdout.write(JSON.stringify(body, null, 2) + "\n");
  } else {
    console.log(formatStatus(result));
  }

  if (!result.reachable) {
    process.exitCode = 1;
  }
}
