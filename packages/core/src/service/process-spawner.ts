/**
 * Process control for tunnel clients.
 *
 * Tunnels are spawned detached from the agent's stdio so they outlive an
 * agent crash; the persisted pid lets the next agent adopt or reap them.
 */

import { spawn } from "node:child_process";
import { ProcessError, errorMessage } from "@boardlink/shared";
import { isErrnoException } from "../lib/json-file.js";

export interface ProcessSpawner {
  /**
   * Start `command` and resolve with its pid once the OS has created it.
   *
   * @throws ProcessError PROCESS_SPAWN_FAILED
   */
  spawn(command: string, args: string[]): Promise<number>;
  /** Whether a process with this pid exists */
  isAlive(pid: number): boolean;
  /** Send SIGTERM; a pid that no longer exists is not an error */
  terminate(pid: number): void;
}

export class NodeProcessSpawner implements ProcessSpawner {
  spawn(command: string, args: string[]): Promise<number> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, args, { detached: true, stdio: "ignore" });

      child.once("error", (err) => {
        reject(
          new ProcessError(
            `Failed to start ${command}: ${errorMessage(err)}`,
            "PROCESS_SPAWN_FAILED",
            { command, args },
          ),
        );
      });

      child.once("spawn", () => {
        child.unref();
        if (child.pid === undefined) {
          reject(
            new ProcessError(`No pid for ${command}`, "PROCESS_SPAWN_FAILED", {
              command,
              args,
            }),
          );
          return;
        }
        resolve(child.pid);
      });
    });
  }

  /** Signal 0 checks existence without delivering anything */
  isAlive(pid: number): boolean {
    if (pid <= 0) return false;
    try {
      process.kill(pid, 0);
      return true;
    } catch (err) {
      // EPERM: exists but owned by someone else
      return isErrnoException(err) && err.code === "EPERM";
    }
  }

  terminate(pid: number): void {
    if (pid <= 0) return;
    try {
      process.kill(pid, "SIGTERM");
    } catch (err) {
      if (isErrnoException(err) && err.code === "ESRCH") return;
      throw new ProcessError(
        `Failed to terminate pid ${pid}: ${errorMessage(err)}`,
        "PROCESS_KILL_FAILED",
        { pid },
      );
    }
  }
}
