/**
 * Capability registrar.
 *
 * Procedure names embed the session id, so every registration dies with its
 * session. Managers attach a capability table (verb → handler) once; the
 * registrar registers it immediately and re-registers every attached table
 * each time the session manager emits `connected`.
 *
 * Each verb is registered on its own. Verbs the router refused stay pending
 * and are retried every `retryDelayMs` until the session is fully advertised
 * or replaced.
 *
 * Handlers are wrapped: a thrown error (argument validation, registry
 * conflict, process failure) becomes an ERROR result and never reaches the
 * transport.
 */

import type { Logger } from "pino";
import {
  CAPABILITY_VERBS,
  DEFAULT_PROCEDURE_NAMESPACE,
  NetworkError,
  errorMessage,
  failure,
  procedureName,
  type CapabilityHandler,
  type CapabilityResult,
  type CapabilityVerb,
} from "@boardlink/shared";
import type { Board } from "./board.js";
import type { SessionManager } from "./session/session-manager.js";
import type { ProcedureHandler } from "./session/transport.js";

/** Verb → handler table contributed by one manager */
export type CapabilityTable = Partial<Record<CapabilityVerb, CapabilityHandler>>;

export class CapabilityRegistrar {
  private readonly tables = new Map<string, CapabilityTable>();
  /** Names registered on the current session */
  private readonly registered = new Set<string>();
  /** Names with a register call outstanding */
  private readonly registering = new Set<string>();
  private registeredSessionId: string | null = null;
  private listening = false;
  private retryTimer: ReturnType<typeof setTimeout> | null = null;

  private readonly onConnected = (sessionId: string) => {
    this.cancelRetry();
    void this.reregisterAll(sessionId);
  };

  private readonly onDisconnected = () => {
    this.cancelRetry();
    this.registered.clear();
    this.registeredSessionId = null;
  };

  constructor(
    private readonly session: SessionManager,
    private readonly board: Board,
    private readonly logger: Logger,
    private readonly namespace: string = DEFAULT_PROCEDURE_NAMESPACE,
    private readonly retryDelayMs: number = 5_000,
  ) {}

  /** Begin following session (re)connections */
  start(): void {
    if (this.listening) return;
    this.session.on("connected", this.onConnected);
    this.session.on("disconnected", this.onDisconnected);
    this.listening = true;
  }

  stop(): void {
    this.session.off("connected", this.onConnected);
    this.session.off("disconnected", this.onDisconnected);
    this.cancelRetry();
    this.listening = false;
  }

  /**
   * Attach a table and register all of its verbs now.
   *
   * @throws NetworkError: not connected, or the router refused a registration
   */
  async attach(owner: string, table: CapabilityTable): Promise<void> {
    this.tables.set(owner, table);
    const sessionId = this.requireSessionId();
    this.syncSession(sessionId);
    const failures = await this.registerTable(sessionId, table);
    const [first] = failures;
    if (first !== undefined) {
      throw first instanceof NetworkError
        ? first
        : new NetworkError(
            `Failed to register capabilities for ${owner}: ${errorMessage(first)}`,
            "NETWORK_REGISTER_FAILED",
            { owner, failed: failures.length },
          );
    }
    this.logger.info(
      { owner, verbs: verbsOf(table) },
      `Capabilities attached for ${owner}`,
    );
  }

  /** Detach a table and unregister its verbs, best-effort */
  async detach(owner: string): Promise<void> {
    const table = this.tables.get(owner);
    if (table === undefined) return;
    this.tables.delete(owner);

    const sessionId = this.session.sessionId;
    if (sessionId === null) return;

    for (const verb of verbsOf(table)) {
      const name = this.nameFor(sessionId, verb);
      if (!this.registered.has(name)) continue;
      this.registered.delete(name);
      try {
        await this.session.unregister(name);
      } catch (err) {
        this.logger.warn({ err, procedure: name }, "Failed to unregister capability");
      }
    }
  }

  /** Procedure name of `verb` on the current session */
  procedureFor(verb: CapabilityVerb): string {
    return this.nameFor(this.requireSessionId(), verb);
  }

  /** Names registered on the current session */
  get registeredProcedures(): string[] {
    return [...this.registered];
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private async reregisterAll(sessionId: string): Promise<void> {
    if (this.session.sessionId !== sessionId) return;
    this.syncSession(sessionId);
    let pending = 0;
    for (const [owner, table] of this.tables) {
      const failures = await this.registerTable(sessionId, table);
      if (failures.length === 0) {
        this.logger.info({ owner, sessionId }, `Capabilities re-registered for ${owner}`);
      } else {
        pending += failures.length;
        this.logger.error(
          { err: failures[0], owner, sessionId, failed: failures.length },
          "Failed to re-register capabilities",
        );
      }
    }
    if (pending > 0) this.scheduleRetry(sessionId);
  }

  /** Register every verb not yet registered; returns the errors of those that failed */
  private async registerTable(sessionId: string, table: CapabilityTable): Promise<unknown[]> {
    const failures: unknown[] = [];
    for (const verb of verbsOf(table)) {
      const handler = table[verb];
      if (handler === undefined) continue;
      const name = this.nameFor(sessionId, verb);
      if (this.registered.has(name) || this.registering.has(name)) continue;
      this.registering.add(name);
      try {
        await this.session.register(name, this.wrap(verb, handler));
        if (this.registeredSessionId === sessionId) this.registered.add(name);
      } catch (err) {
        this.logger.warn({ err, procedure: name }, "Failed to register capability");
        failures.push(err);
      } finally {
        this.registering.delete(name);
      }
    }
    return failures;
  }

  private scheduleRetry(sessionId: string): void {
    if (!this.listening || this.retryTimer !== null) return;
    this.logger.info(
      { sessionId, retryInMs: this.retryDelayMs },
      "Retrying pending capability registrations",
    );
    this.retryTimer = setTimeout(() => {
      this.retryTimer = null;
      void this.reregisterAll(sessionId);
    }, this.retryDelayMs);
    this.retryTimer.unref();
  }

  private cancelRetry(): void {
    if (this.retryTimer !== null) {
      clearTimeout(this.retryTimer);
      this.retryTimer = null;
    }
  }

  /** Forget names recorded under an older session */
  private syncSession(sessionId: string): void {
    if (this.registeredSessionId !== sessionId) {
      this.registered.clear();
      this.registeredSessionId = sessionId;
    }
  }

  private wrap(verb: CapabilityVerb, handler: CapabilityHandler): ProcedureHandler {
    return async (args): Promise<CapabilityResult> => {
      this.logger.info({ verb }, `RPC ${verb} called`);
      try {
        return await handler(args);
      } catch (err) {
        this.logger.warn({ err, verb }, `RPC ${verb} failed`);
        return failure(errorMessage(err));
      }
    };
  }

  private nameFor(sessionId: string, verb: CapabilityVerb): string {
    return procedureName(this.namespace, sessionId, this.board.uuid, verb);
  }

  private requireSessionId(): string {
    const sessionId = this.session.sessionId;
    if (sessionId === null) {
      throw new NetworkError(
        "Cannot register capabilities without a session",
        "NETWORK_NOT_CONNECTED",
      );
    }
    return sessionId;
  }
}

function verbsOf(table: CapabilityTable): CapabilityVerb[] {
  return CAPABILITY_VERBS.filter((verb) => table[verb] !== undefined);
}
