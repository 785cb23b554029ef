/**
 * Service (tunnel) manager.
 *
 * Each exposed service is one tunnel client process forwarding
 * 127.0.0.1:<localPort> through the tunnel server next to the control plane.
 * The registry (`<home>/services.json`) is rewritten after every mutation.
 *
 * Lock discipline: public methods take the lock; the `*Locked` routines
 * assume the caller already holds the write side and are what shutdown and
 * reconciliation call.
 */

import * as path from "node:path";
import type { Logger } from "pino";
import {
  CapabilityError,
  StorageError,
  exposeServiceArgsSchema,
  parseCapabilityArgs,
  servicesDocumentSchema,
  success,
  unexposeServiceArgsSchema,
  type ServiceInfo,
} from "@boardlink/shared";
import type { Board } from "../board.js";
import type { CapabilityRegistrar, CapabilityTable } from "../registrar.js";
import { RwLock } from "../lib/rw-lock.js";
import { readJsonDocument, writeJsonAtomic } from "../lib/json-file.js";
import type { ProcessSpawner } from "./process-spawner.js";

export const SERVICES_FILENAME = "services.json";
export const SERVICE_CAPABILITY_OWNER = "service";

export interface ServiceManagerOptions {
  /** Agent home; the registry lives here */
  home: string;
  /** Tunnel client binary */
  tunnelBin: string;
  /** Port of the tunnel server on the control-plane host (default: 8080) */
  tunnelPort?: number;
  /** Reconciliation period; 0 disables the timer (default: 60s) */
  reconcileIntervalMs?: number;
  /** Respawn tunnels found dead instead of marking them stopped (default: true) */
  restartDeadTunnels?: boolean;
}

/** What one reconciliation pass changed */
export interface ReconcileReport {
  respawned: string[];
  stopped: string[];
}

/**
 * Tunnel server URL for a control-plane URL: same host, tunnel port,
 * wss when the control plane is wss.
 */
export function deriveTunnelUrl(controlPlaneUrl: string, tunnelPort: number): string {
  const parsed = new URL(controlPlaneUrl);
  const scheme = parsed.protocol === "wss:" ? "wss" : "ws";
  return `${scheme}://${parsed.hostname}:${tunnelPort}`;
}

export class ServiceManager {
  readonly registryPath: string;
  private readonly lock = new RwLock();
  private services: Record<string, ServiceInfo> = {};
  private reconcileTimer: ReturnType<typeof setInterval> | null = null;
  private readonly tunnelPort: number;
  private readonly reconcileIntervalMs: number;
  private readonly restartDeadTunnels: boolean;

  constructor(
    private readonly board: Board,
    private readonly registrar: CapabilityRegistrar,
    private readonly spawner: ProcessSpawner,
    private readonly logger: Logger,
    private readonly options: ServiceManagerOptions,
  ) {
    this.registryPath = path.join(options.home, SERVICES_FILENAME);
    this.tunnelPort = options.tunnelPort ?? 8080;
    this.reconcileIntervalMs = options.reconcileIntervalMs ?? 60_000;
    this.restartDeadTunnels = options.restartDeadTunnels ?? true;
  }

  /** Tunnel server URL derived from the selected control-plane endpoint */
  get tunnelUrl(): string {
    return deriveTunnelUrl(this.board.selectedEndpoint().url, this.tunnelPort);
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  /**
   * Load the registry, reconcile once, advertise capabilities, start the
   * reconciliation timer.
   */
  async start(): Promise<void> {
    this.logger.info(
      { tunnelBin: this.options.tunnelBin, tunnelUrl: this.tunnelUrl },
      "Starting service manager",
    );
    await this.lock.write(() => this.loadLocked());
    const report = await this.reconcile();
    if (report.respawned.length > 0 || report.stopped.length > 0) {
      this.logger.info(report, "Startup reconciliation changed services");
    }
    await this.registrar.attach(SERVICE_CAPABILITY_OWNER, this.capabilities());

    if (this.reconcileIntervalMs > 0) {
      this.reconcileTimer = setInterval(() => {
        void this.reconcileTick();
      }, this.reconcileIntervalMs);
    }
  }

  /** Stop the timer, withdraw capabilities, stop every tunnel. Never throws. */
  async stop(): Promise<void> {
    if (this.reconcileTimer !== null) {
      clearInterval(this.reconcileTimer);
      this.reconcileTimer = null;
    }
    try {
      await this.registrar.detach(SERVICE_CAPABILITY_OWNER);
    } catch (err) {
      this.logger.warn({ err }, "Failed to withdraw service capabilities");
    }
    await this.shutdown();
    this.logger.info("Service manager stopped");
  }

  /** Stop every entry under one write lock; per-entry failures are logged */
  async shutdown(): Promise<void> {
    await this.lock.write(() => {
      for (const name of Object.keys(this.services)) {
        try {
          this.stopServiceLocked(name);
        } catch (err) {
          this.logger.error({ err, name }, "Failed to stop service during shutdown");
        }
      }
    });
  }

  // -------------------------------------------------------------------------
  // Operations
  // -------------------------------------------------------------------------

  /**
   * Start a tunnel for `name` forwarding to 127.0.0.1:`localPort`.
   *
   * @throws CapabilityError SERVICE_ALREADY_EXPOSED
   * @throws ProcessError PROCESS_SPAWN_FAILED: nothing recorded
   * @throws StorageError STORAGE_WRITE_FAILED: entry recorded, not persisted
   */
  async expose(name: string, localPort: number): Promise<ServiceInfo> {
    return this.lock.write(async () => {
      if (this.services[name] !== undefined) {
        throw new CapabilityError(
          `Service ${name} already exposed`,
          "SERVICE_ALREADY_EXPOSED",
          { name },
        );
      }

      const tunnelUrl = this.tunnelUrl;
      const pid = await this.spawnTunnel(tunnelUrl, localPort);
      const info: ServiceInfo = {
        name,
        local_port: localPort,
        public_url: `${tunnelUrl}/${name}`,
        pid,
        status: "running",
      };
      this.services[name] = info;
      this.logger.info({ name, localPort, pid }, `Service ${name} exposed`);
      this.persistLocked();
      return { ...info };
    });
  }

  /**
   * Stop the tunnel for `name` and forget it.
   *
   * @throws CapabilityError SERVICE_NOT_FOUND
   */
  async unexpose(name: string): Promise<void> {
    await this.lock.write(() => this.stopServiceLocked(name));
  }

  /** Snapshot of the registry, sorted by name */
  async list(): Promise<ServiceInfo[]> {
    return this.lock.read(() =>
      Object.values(this.services)
        .map((info) => ({ ...info }))
        .sort((a, b) => a.name.localeCompare(b.name)),
    );
  }

  /**
   * Probe every running entry; respawn or mark dead tunnels stopped.
   * Persists when anything changed.
   */
  async reconcile(): Promise<ReconcileReport> {
    return this.lock.write(() => this.reconcileLocked());
  }

  capabilities(): CapabilityTable {
    return {
      ExposeService: async (args) => {
        const { name, localPort } = parseCapabilityArgs(
          "ExposeService",
          exposeServiceArgsSchema,
          args,
        );
        const info = await this.expose(name, localPort);
        return success(`Service ${name} exposed on port ${localPort}`, {
          public_url: info.public_url,
          pid: info.pid,
        });
      },
      UnexposeService: async (args) => {
        const { name } = parseCapabilityArgs(
          "UnexposeService",
          unexposeServiceArgsSchema,
          args,
        );
        await this.unexpose(name);
        return success(`Service ${name} unexposed`);
      },
      ServicesList: async () =>
        success("Services list retrieved", { services: await this.list() }),
    };
  }

  // -------------------------------------------------------------------------
  // Locked internals
  // -------------------------------------------------------------------------

  private loadLocked(): void {
    const result = readJsonDocument(this.registryPath, servicesDocumentSchema);
    switch (result.status) {
      case "missing":
        this.services = {};
        this.persistLocked();
        return;
      case "ok":
        this.services = result.value.services;
        this.logger.info(
          { count: Object.keys(this.services).length },
          "Services registry loaded",
        );
        return;
      case "corrupted":
        throw new StorageError(
          `Services registry at ${this.registryPath} is not valid JSON: ${result.error}`,
          "STORAGE_CORRUPTED",
          { path: this.registryPath },
        );
      case "invalid":
        throw new StorageError(
          `Services registry at ${this.registryPath} failed validation`,
          "STORAGE_INVALID",
          { path: this.registryPath, zodErrors: result.issues },
        );
    }
  }

  private stopServiceLocked(name: string): void {
    const info = this.services[name];
    if (info === undefined) {
      throw new CapabilityError(`Service ${name} not found`, "SERVICE_NOT_FOUND", {
        name,
      });
    }
    if (info.status === "running") {
      try {
        this.spawner.terminate(info.pid);
      } catch (err) {
        this.logger.warn({ err, name, pid: info.pid }, "Failed to terminate tunnel process");
      }
    }
    delete this.services[name];
    this.logger.info({ name, pid: info.pid }, `Service ${name} unexposed`);
    this.persistLocked();
  }

  private async reconcileLocked(): Promise<ReconcileReport> {
    const report: ReconcileReport = { respawned: [], stopped: [] };

    for (const info of Object.values(this.services)) {
      if (info.status !== "running" || this.spawner.isAlive(info.pid)) continue;

      this.logger.warn({ name: info.name, pid: info.pid }, "Tunnel process is gone");
      if (this.restartDeadTunnels) {
        try {
          info.pid = await this.spawnTunnel(this.tunnelUrl, info.local_port);
          report.respawned.push(info.name);
          this.logger.info({ name: info.name, pid: info.pid }, "Tunnel respawned");
          continue;
        } catch (err) {
          this.logger.error({ err, name: info.name }, "Tunnel respawn failed");
        }
      }
      info.status = "stopped";
      report.stopped.push(info.name);
    }

    if (report.respawned.length > 0 || report.stopped.length > 0) {
      this.persistLocked();
    }
    return report;
  }

  private async reconcileTick(): Promise<void> {
    try {
      await this.reconcile();
    } catch (err) {
      this.logger.error({ err }, "Service reconciliation failed");
    }
  }

  private spawnTunnel(tunnelUrl: string, localPort: number): Promise<number> {
    return this.spawner.spawn(this.options.tunnelBin, [
      "client",
      "-s",
      tunnelUrl,
      "-t",
      `127.0.0.1:${localPort}`,
    ]);
  }

  private persistLocked(): void {
    writeJsonAtomic(this.registryPath, { services: this.services });
  }
}
