/**
 * Control-plane session lifecycle.
 *
 * Owns the single transport session, exposes register/call/publish/subscribe
 * over it, and keeps it alive with a periodic health check. Transport loss is
 * only detected here (the transport's close callback); reconnection happens
 * on the next health-check tick: disconnect, wait `connectionTimerMs`, connect.
 *
 * Locking: connect/disconnect hold the write side of the lock; every other
 * operation holds the read side. The `connected` event is emitted after the
 * write side is released so listeners can register procedures from it.
 *
 * Events (EventEmitter is untyped at runtime):
 *   'connected'    → (sessionId: string) => void
 *   'disconnected' → (reason: string) => void
 */

import { EventEmitter } from "node:events";
import type { Logger } from "pino";
import { NetworkError, errorMessage } from "@boardlink/shared";
import type { Board } from "../board.js";
import { RwLock } from "../lib/rw-lock.js";
import { delay, withTimeout } from "../lib/delay.js";
import type {
  ControlPlaneTransport,
  ProcedureHandler,
  Registration,
  TopicHandler,
  TransportSession,
} from "./transport.js";

export type SessionState = "disconnected" | "connecting" | "connected";

export interface SessionManagerOptions {
  /** Accept any certificate on wss:// (default: true) */
  skipCertVerify?: boolean;
  /** Delay between disconnect and connect on reconnect (default: 10s) */
  connectionTimerMs?: number;
  /** Health-check interval (default: 600s) */
  aliveTimerMs?: number;
  /** Outbound call timeout (default: 30s) */
  callTimeoutMs?: number;
}

export class SessionManager extends EventEmitter {
  private readonly lock = new RwLock();
  private readonly options: Required<SessionManagerOptions>;
  private session: TransportSession | null = null;
  private _state: SessionState = "disconnected";
  /** Bumped on every open/close so stale close callbacks are ignored */
  private generation = 0;
  private inFlight: Promise<void> | null = null;
  private readonly registrations = new Map<string, Registration>();

  private healthTimer: ReturnType<typeof setInterval> | null = null;
  private healthAbort: AbortController | null = null;
  private reconnecting = false;

  constructor(
    private readonly board: Board,
    private readonly transport: ControlPlaneTransport,
    private readonly logger: Logger,
    options: SessionManagerOptions = {},
  ) {
    super();
    this.options = {
      skipCertVerify: options.skipCertVerify ?? true,
      connectionTimerMs: options.connectionTimerMs ?? 10_000,
      aliveTimerMs: options.aliveTimerMs ?? 600_000,
      callTimeoutMs: options.callTimeoutMs ?? 30_000,
    };
  }

  get state(): SessionState {
    return this._state;
  }

  get isConnected(): boolean {
    return this._state === "connected";
  }

  get sessionId(): string | null {
    return this.session?.id ?? null;
  }

  /** Procedures currently registered on the live session */
  get registeredProcedures(): string[] {
    return [...this.registrations.keys()];
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  /**
   * Open the session. No-op when connected; joins the in-flight attempt when
   * one is already running.
   *
   * @throws ConfigError CONFIG_ENDPOINT_INVALID: board has no endpoint
   * @throws NetworkError: transport could not open
   */
  connect(): Promise<void> {
    if (this._state === "connected") return Promise.resolve();
    if (this.inFlight === null) {
      this.inFlight = this.openSession().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  /** Close the session if open. Idempotent. */
  async disconnect(reason = "closed by agent"): Promise<void> {
    const wasOpen = await this.lock.write(() => this.disconnectLocked());
    if (wasOpen) {
      this.logger.info({ reason }, "Disconnected from control plane");
      this.emit("disconnected", reason);
    }
  }

  /** Disconnect (best-effort), wait the reconnect delay, connect */
  async reconnect(signal?: AbortSignal): Promise<void> {
    try {
      await this.disconnect("reconnecting");
    } catch (err) {
      this.logger.warn({ err }, "Disconnect before reconnect failed");
    }
    await delay(this.options.connectionTimerMs, signal);
    await this.connect();
  }

  startHealthCheck(): void {
    if (this.healthTimer !== null) return;
    const abort = new AbortController();
    this.healthAbort = abort;
    this.healthTimer = setInterval(() => {
      void this.healthTick(abort.signal);
    }, this.options.aliveTimerMs);
    this.logger.debug(
      { intervalMs: this.options.aliveTimerMs },
      "Health check started",
    );
  }

  /** Cancel the timer and any pending reconnect delay */
  stopHealthCheck(): void {
    if (this.healthTimer !== null) {
      clearInterval(this.healthTimer);
      this.healthTimer = null;
    }
    this.healthAbort?.abort();
    this.healthAbort = null;
  }

  async stop(): Promise<void> {
    this.stopHealthCheck();
    await this.disconnect("agent stopping");
  }

  // -------------------------------------------------------------------------
  // Session operations (read side)
  // -------------------------------------------------------------------------

  async register(procedure: string, handler: ProcedureHandler): Promise<void> {
    await this.lock.read(async () => {
      const session = this.requireSession(procedure);
      const registration = await session.register(procedure, handler);
      this.registrations.set(procedure, registration);
      this.logger.debug({ procedure }, "Registered procedure");
    });
  }

  /** Unregister a procedure registered on the live session; unknown names are ignored */
  async unregister(procedure: string): Promise<void> {
    await this.lock.read(async () => {
      this.requireSession(procedure);
      const registration = this.registrations.get(procedure);
      if (registration === undefined) return;
      this.registrations.delete(procedure);
      await registration.unregister();
      this.logger.debug({ procedure }, "Unregistered procedure");
    });
  }

  async subscribe(topic: string, handler: TopicHandler): Promise<void> {
    await this.lock.read(async () => {
      await this.requireSession(topic).subscribe(topic, handler);
    });
  }

  async publish(topic: string, args: unknown[] = []): Promise<void> {
    await this.lock.read(async () => {
      await this.requireSession(topic).publish(topic, args);
    });
  }

  /** @throws NetworkError NETWORK_TIMEOUT after the call timeout */
  async call(procedure: string, args: unknown[] = []): Promise<unknown> {
    return this.lock.read(() =>
      withTimeout(
        this.requireSession(procedure).call(procedure, args),
        this.options.callTimeoutMs,
        { procedure },
      ),
    );
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private async openSession(): Promise<void> {
    const sessionId = await this.lock.write(() => this.connectLocked());
    if (sessionId !== null) {
      this.emit("connected", sessionId);
    }
  }

  /** Returns the new session id, or null when already connected */
  private async connectLocked(): Promise<string | null> {
    if (this.session !== null) return null;

    const endpoint = this.board.selectedEndpoint();
    this._state = "connecting";
    const generation = ++this.generation;

    this.logger.info(
      { url: endpoint.url, realm: endpoint.realm, kind: endpoint.kind },
      "Connecting to control plane",
    );

    let session: TransportSession;
    try {
      session = await this.transport.open({
        url: endpoint.url,
        realm: endpoint.realm,
        skipCertVerify: this.options.skipCertVerify,
        onClose: (reason) => this.handleTransportClose(generation, reason),
      });
    } catch (err) {
      this._state = "disconnected";
      throw err instanceof NetworkError
        ? err
        : new NetworkError(
            `Failed to connect to control plane: ${errorMessage(err)}`,
            "NETWORK_CONNECT_FAILED",
            { url: endpoint.url, realm: endpoint.realm },
          );
    }

    this.session = session;
    this._state = "connected";
    this.board.setSessionId(session.id);
    this.logger.info({ sessionId: session.id }, "Connected to control plane");
    return session.id;
  }

  private async disconnectLocked(): Promise<boolean> {
    const session = this.session;
    this._state = "disconnected";
    if (session === null) return false;

    this.generation++;
    this.session = null;
    this.registrations.clear();
    this.board.setSessionId(null);

    try {
      await session.close();
    } catch (err) {
      this.logger.warn({ err }, "Error closing control-plane session");
    }
    return true;
  }

  private handleTransportClose(generation: number, reason: string): void {
    if (generation !== this.generation || this.session === null) return;
    this.session = null;
    this._state = "disconnected";
    this.registrations.clear();
    this.board.setSessionId(null);
    this.logger.warn({ reason }, "Control-plane session lost");
    this.emit("disconnected", reason);
  }

  private async healthTick(signal: AbortSignal): Promise<void> {
    if (this._state !== "disconnected" || this.reconnecting) return;
    this.reconnecting = true;
    try {
      this.logger.info("Session down, reconnecting");
      await this.reconnect(signal);
    } catch (err) {
      if (signal.aborted) {
        this.logger.debug("Reconnect cancelled");
      } else {
        this.logger.error({ err }, "Reconnect failed, retrying on next tick");
      }
    } finally {
      this.reconnecting = false;
    }
  }

  private requireSession(target: string): TransportSession {
    if (this.session === null) {
      throw new NetworkError(
        "Not connected to the control plane",
        "NETWORK_NOT_CONNECTED",
        { target },
      );
    }
    return this.session;
  }
}
