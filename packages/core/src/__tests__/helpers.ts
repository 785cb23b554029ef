/**
 * Test doubles shared by the core and agent tests: an in-process
 * control-plane transport, a process spawner and proxy controller that touch
 * nothing, a silent logger, and a settings-file factory.
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { pino, type Logger } from "pino";
import { ProcessError, type BoardSettingsInput } from "@boardlink/shared";
import { Board } from "../board.js";
import { FileSettingsStore } from "../settings-store.js";
import type { ProcessSpawner } from "../service/process-spawner.js";
import type { ProxyController } from "../webservice/proxy-controller.js";
import type {
  ControlPlaneTransport,
  ProcedureHandler,
  Registration,
  TopicHandler,
  TransportOpenOptions,
  TransportSession,
} from "../session/transport.js";

export const BOARD_UUID = "0f4c2d2e-board-test";

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}

export function makeTempHome(prefix = "boardlink-test-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

/** Settings with a main-agent endpoint and status "online" */
export function defaultSettings(
  overrides: Partial<BoardSettingsInput["iotronic"]["board"]> = {},
): BoardSettingsInput {
  return {
    iotronic: {
      board: {
        uuid: BOARD_UUID,
        code: "board-code-1",
        name: "bench-board",
        status: "online",
        type: "generic",
        ...overrides,
      },
      wamp: {
        "main-agent": { url: "wss://cp.example.test:8181/", realm: "s4t" },
      },
    },
  };
}

export function writeSettings(home: string, settings: unknown): string {
  const file = path.join(home, "settings.json");
  fs.writeFileSync(file, JSON.stringify(settings, null, 2));
  return file;
}

export function readJson(file: string): unknown {
  return JSON.parse(fs.readFileSync(file, "utf-8"));
}

/** A loaded Board backed by `<home>/settings.json` */
export function createBoard(home: string, settings: unknown = defaultSettings()): Board {
  writeSettings(home, settings);
  const board = new Board(new FileSettingsStore(home), silentLogger());
  board.load();
  return board;
}

// ---------------------------------------------------------------------------
// Fake transport
// ---------------------------------------------------------------------------

export class FakeSession implements TransportSession {
  readonly procedures = new Map<string, ProcedureHandler>();
  readonly topics = new Map<string, TopicHandler>();
  readonly published: Array<{ topic: string; args: unknown[] }> = [];
  closed = false;
  callImpl: (procedure: string, args: unknown[]) => Promise<unknown> = async () => null;

  constructor(
    readonly id: string,
    private readonly onClose: (reason: string) => void,
    /** Verbs whose next registration the router refuses, consumed on use */
    private readonly refuseOnce: Set<string> = new Set(),
  ) {}

  async register(procedure: string, handler: ProcedureHandler): Promise<Registration> {
    const verb = procedure.slice(procedure.lastIndexOf(".") + 1);
    if (this.refuseOnce.delete(verb)) {
      throw new Error("wamp.error.not_authorized");
    }
    if (this.procedures.has(procedure)) {
      throw new Error("wamp.error.procedure_already_exists");
    }
    this.procedures.set(procedure, handler);
    return {
      procedure,
      unregister: async () => {
        this.procedures.delete(procedure);
      },
    };
  }

  async subscribe(topic: string, handler: TopicHandler): Promise<void> {
    this.topics.set(topic, handler);
  }

  async publish(topic: string, args: unknown[]): Promise<void> {
    this.published.push({ topic, args });
  }

  call(procedure: string, args: unknown[]): Promise<unknown> {
    return this.callImpl(procedure, args);
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  /** Deliver an inbound invocation the way the router would */
  async invoke(procedure: string, args: unknown[] = []): Promise<unknown> {
    const handler = this.procedures.get(procedure);
    if (handler === undefined) throw new Error(`no such procedure: ${procedure}`);
    return handler(args);
  }

  /** Simulate the router dropping the session */
  drop(reason = "wamp.close.lost"): void {
    this.onClose(reason);
  }
}

export class FakeTransport implements ControlPlaneTransport {
  readonly sessions: FakeSession[] = [];
  readonly opens: TransportOpenOptions[] = [];
  /** Number of upcoming open() calls that fail */
  failNext = 0;
  /** Verbs whose next registration fails, on whichever session sees it */
  readonly refuseRegisterOnce = new Set<string>();
  private nextId = 1001;

  async open(options: TransportOpenOptions): Promise<TransportSession> {
    this.opens.push(options);
    if (this.failNext > 0) {
      this.failNext--;
      throw new Error("connection refused");
    }
    const session = new FakeSession(
      String(this.nextId++),
      options.onClose,
      this.refuseRegisterOnce,
    );
    this.sessions.push(session);
    return session;
  }

  get current(): FakeSession {
    const session = this.sessions[this.sessions.length - 1];
    if (session === undefined) throw new Error("no session opened yet");
    return session;
  }
}

// ---------------------------------------------------------------------------
// Fake spawner
// ---------------------------------------------------------------------------

export class FakeSpawner implements ProcessSpawner {
  readonly spawned: Array<{ command: string; args: string[]; pid: number }> = [];
  readonly alive = new Set<number>();
  readonly terminated: number[] = [];
  failNext = 0;
  /** Make terminate() fail the way a kill refused with EPERM does */
  failTerminate = false;
  private nextPid = 4000;

  async spawn(command: string, args: string[]): Promise<number> {
    if (this.failNext > 0) {
      this.failNext--;
      throw new ProcessError(`Failed to start ${command}: spawn ENOENT`, "PROCESS_SPAWN_FAILED");
    }
    const pid = this.nextPid++;
    this.spawned.push({ command, args, pid });
    this.alive.add(pid);
    return pid;
  }

  isAlive(pid: number): boolean {
    return this.alive.has(pid);
  }

  terminate(pid: number): void {
    if (this.failTerminate) {
      throw new ProcessError(`Failed to terminate process ${pid}: EPERM`, "PROCESS_KILL_FAILED", {
        pid,
      });
    }
    this.terminated.push(pid);
    this.alive.delete(pid);
  }
}

// ---------------------------------------------------------------------------
// Fake proxy controller
// ---------------------------------------------------------------------------

export class FakeProxy implements ProxyController {
  readonly type = "nginx";
  readonly calls: string[] = [];
  failTest = false;
  failReload = false;
  running = true;

  async test(): Promise<void> {
    this.calls.push("test");
    if (this.failTest) {
      throw new ProcessError("nginx config test failed: emerg", "PROXY_VALIDATION_FAILED");
    }
  }

  async reload(): Promise<void> {
    this.calls.push("reload");
    if (this.failReload) {
      throw new ProcessError("nginx reload failed: no master", "PROXY_RELOAD_FAILED");
    }
  }

  async isRunning(): Promise<boolean> {
    return this.running;
  }
}
