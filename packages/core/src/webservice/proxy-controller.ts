/**
 * Reverse-proxy process control: configuration test, reload, presence probe.
 */

import { execFile } from "node:child_process";
import { ProcessError } from "@boardlink/shared";

export interface ProxyController {
  /** Proxy kind, reported by ProxyInfo */
  readonly type: string;
  /** @throws ProcessError PROXY_VALIDATION_FAILED */
  test(): Promise<void>;
  /** @throws ProcessError PROXY_RELOAD_FAILED */
  reload(): Promise<void>;
  /** Whether a proxy process is present */
  isRunning(): Promise<boolean>;
}

interface CommandOutcome {
  ok: boolean;
  output: string;
}

function run(command: string, args: string[], timeoutMs: number): Promise<CommandOutcome> {
  return new Promise((resolve) => {
    execFile(command, args, { timeout: timeoutMs }, (error, stdout, stderr) => {
      const output = `${stdout}\n${stderr}`.trim();
      resolve({ ok: error === null, output: output || (error?.message ?? "") });
    });
  });
}

export interface NginxProxyControllerOptions {
  /** nginx binary (default: "nginx") */
  bin?: string;
  /** Process name probed with pgrep (default: "nginx") */
  processName?: string;
  /** Per-command timeout (default: 15s) */
  timeoutMs?: number;
}

export class NginxProxyController implements ProxyController {
  readonly type = "nginx";
  private readonly bin: string;
  private readonly processName: string;
  private readonly timeoutMs: number;

  constructor(options: NginxProxyControllerOptions = {}) {
    this.bin = options.bin ?? "nginx";
    this.processName = options.processName ?? "nginx";
    this.timeoutMs = options.timeoutMs ?? 15_000;
  }

  async test(): Promise<void> {
    const outcome = await run(this.bin, ["-t"], this.timeoutMs);
    if (!outcome.ok) {
      throw new ProcessError(
        `nginx config test failed: ${outcome.output}`,
        "PROXY_VALIDATION_FAILED",
        { bin: this.bin },
      );
    }
  }

  async reload(): Promise<void> {
    const outcome = await run(this.bin, ["-s", "reload"], this.timeoutMs);
    if (!outcome.ok) {
      throw new ProcessError(
        `nginx reload failed: ${outcome.output}`,
        "PROXY_RELOAD_FAILED",
        { bin: this.bin },
      );
    }
  }

  async isRunning(): Promise<boolean> {
    const outcome = await run("pgrep", ["-x", this.processName], this.timeoutMs);
    return outcome.ok;
  }
}
