/**
 * Agent lifecycle orchestrator.
 *
 * Builds the Board, the session manager, the capability registrar and the
 * three resource managers from the agent config, then runs them in order.
 *
 * Startup sequence (order matters):
 *   1. Load board settings and select the control-plane endpoint
 *   2. Start the local status API
 *   3. Open the control-plane session (retried until it opens)
 *   4. Start the registrar so reconnects re-advertise every capability
 *   5. Start device, service and webservice managers (each attaches its table)
 *   6. Start the session health check
 *
 * Any failure in steps 1, 2, 4 or 5 is fatal: the agent tears down what it
 * started and `start()` rejects. Shutdown runs the reverse order and only logs
 * failures.
 */

import { createServer, type Server } from "node:http";
import type { AddressInfo } from "node:net";
import type { Logger } from "pino";
import { NetworkError } from "@boardlink/shared";
import {
  AutobahnTransport,
  Board,
  CapabilityRegistrar,
  DeviceManager,
  FileSettingsStore,
  NginxProxyController,
  NodeProcessSpawner,
  ServiceManager,
  SessionManager,
  WebServiceManager,
  createDeviceProfileRegistry,
  delay,
  type ControlPlaneTransport,
  type DeviceProfileRegistry,
  type ProcessSpawner,
  type ProxyController,
  type SettingsStore,
} from "@boardlink/core";
import type { AgentConfig } from "./config.js";
import { createApp } from "./rest/app.js";
import type { HostMetrics } from "./rest/routes/status.js";

/** Collaborators that touch the outside world; tests replace them */
export interface AgentDeps {
  settings?: SettingsStore;
  transport?: ControlPlaneTransport;
  spawner?: ProcessSpawner;
  proxy?: ProxyController;
  profiles?: DeviceProfileRegistry;
  metrics?: () => HostMetrics;
}

/** A manager the agent starts and stops */
interface Component {
  name: string;
  start(): Promise<void>;
  stop(): Promise<void>;
}

export class Agent {
  readonly board: Board;
  readonly session: SessionManager;
  readonly registrar: CapabilityRegistrar;
  readonly device: DeviceManager;
  readonly services: ServiceManager;
  readonly webservices: WebServiceManager;

  private readonly components: Component[];
  private running: Component[] = [];
  private server: Server | null = null;
  private readonly abort = new AbortController();
  private stopping: Promise<void> | null = null;

  constructor(
    private readonly config: AgentConfig,
    private readonly logger: Logger,
    private readonly deps: AgentDeps = {},
  ) {
    const { agent, control_plane, services, webservices } = config;

    this.board = new Board(
      deps.settings ?? new FileSettingsStore(agent.home),
      logger.child({ module: "board" }),
    );
    this.session = new SessionManager(
      this.board,
      deps.transport ?? new AutobahnTransport(),
      logger.child({ module: "session" }),
      {
        skipCertVerify: agent.skip_cert_verify,
        connectionTimerMs: control_plane.connection_timer * 1000,
        aliveTimerMs: control_plane.alive_timer * 1000,
        callTimeoutMs: control_plane.call_timeout * 1000,
      },
    );
    this.registrar = new CapabilityRegistrar(
      this.session,
      this.board,
      logger.child({ module: "registrar" }),
      control_plane.namespace,
      control_plane.connection_timer * 1000,
    );
    this.device = new DeviceManager(
      this.board,
      this.registrar,
      deps.profiles ?? createDeviceProfileRegistry(),
      logger.child({ module: "device" }),
    );
    this.services = new ServiceManager(
      this.board,
      this.registrar,
      deps.spawner ?? new NodeProcessSpawner(),
      logger.child({ module: "service" }),
      {
        home: agent.home,
        tunnelBin: services.tunnel_bin,
        tunnelPort: services.tunnel_port,
        reconcileIntervalMs: services.reconcile_interval * 1000,
        restartDeadTunnels: services.restart_dead_tunnels,
      },
    );
    this.webservices = new WebServiceManager(
      this.registrar,
      deps.proxy ??
        new NginxProxyController({ bin: webservices.proxy_bin, processName: webservices.proxy }),
      logger.child({ module: "webservice" }),
      { home: agent.home, confDir: webservices.conf_dir },
    );

    this.components = [
      { name: "device", start: () => this.device.start(), stop: () => this.device.stop() },
      { name: "service", start: () => this.services.start(), stop: () => this.services.stop() },
      {
        name: "webservice",
        start: () => this.webservices.start(),
        stop: () => this.webservices.stop(),
      },
    ];
  }

  /** Address of the status API, once listening */
  get statusAddress(): AddressInfo | null {
    const address = this.server?.address();
    return address !== null && typeof address === "object" ? address : null;
  }

  async start(): Promise<void> {
    try {
      // --- Step 1: Board identity and endpoint selection ---
      this.board.load();
      this.logger.info(
        { uuid: this.board.uuid, status: this.board.status, type: this.board.type },
        `Board ${this.board.name} loaded`,
      );

      // --- Step 2: Status API ---
      if (this.config.status_api.enabled) {
        await this.startStatusServer();
      }

      // --- Step 3: Control-plane session ---
      await this.connectUntilOpen();

      // --- Step 4-5: Registrar and managers ---
      this.registrar.start();
      for (const component of this.components) {
        await component.start();
        this.running.push(component);
      }

      // --- Step 6: Health check ---
      this.session.startHealthCheck();
      this.logger.info(
        { sessionId: this.session.sessionId, procedures: this.registrar.registeredProcedures.length },
        "Agent started",
      );
    } catch (err) {
      this.logger.error({ err }, "Agent startup failed");
      await this.stop();
      throw err;
    }
  }

  /** Tear everything down in reverse order. Never throws; safe to call twice. */
  stop(): Promise<void> {
    if (this.stopping === null) {
      this.stopping = this.shutdown();
    }
    return this.stopping;
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private async shutdown(): Promise<void> {
    this.abort.abort();
    this.session.stopHealthCheck();

    try {
      await this.closeStatusServer();
    } catch (err) {
      this.logger.error({ err }, "Failed to close status API");
    }

    for (const component of [...this.running].reverse()) {
      try {
        await component.stop();
      } catch (err) {
        this.logger.error({ err, component: component.name }, "Failed to stop component");
      }
    }
    this.running = [];
    this.registrar.stop();

    try {
      await this.session.stop();
    } catch (err) {
      this.logger.error({ err }, "Failed to close control-plane session");
    }
    this.logger.info("Agent stopped");
  }

  /** Connect, waiting `connection_timer` between failed attempts */
  private async connectUntilOpen(): Promise<void> {
    const retryMs = this.config.control_plane.connection_timer * 1000;
    for (;;) {
      try {
        await this.session.connect();
        return;
      } catch (err) {
        if (!(err instanceof NetworkError)) throw err;
        this.logger.warn({ err, retryMs }, "Control plane unreachable, retrying");
        await delay(retryMs, this.abort.signal);
      }
    }
  }

  private async startStatusServer(): Promise<void> {
    const { host, port } = this.config.status_api;
    const app = createApp({
      board: this.board,
      session: this.session,
      logger: this.logger.child({ module: "rest" }),
      metrics: this.deps.metrics,
    });
    const server = createServer(app);

    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(port, host, () => {
        server.off("error", reject);
        resolve();
      });
    });

    this.server = server;
    this.logger.info({ host, port: this.statusAddress?.port ?? port }, "Status API listening");
  }

  private async closeStatusServer(): Promise<void> {
    const server = this.server;
    if (server === null) return;
    this.server = null;
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
      server.closeAllConnections();
    });
  }
}
