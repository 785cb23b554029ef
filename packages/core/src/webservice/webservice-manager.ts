/**
 * WebService (reverse-proxy) manager.
 *
 * Every enabled webservice is one nginx server block in
 * `<confDir>/boardlink_<name>.conf`, and a registry entry in
 * `<home>/webservices.json`. An artifact exists exactly when its entry does;
 * start-up reconciliation restores that after a crash or manual edits.
 *
 * Lock discipline mirrors ServiceManager: public methods lock, `*Locked`
 * routines assume the write side is held.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import type { Logger } from "pino";
import {
  CapabilityError,
  StorageError,
  disableWebServiceArgsSchema,
  enableWebServiceArgsSchema,
  errorMessage,
  parseCapabilityArgs,
  success,
  webServicesDocumentSchema,
  type WebServiceInfo,
} from "@boardlink/shared";
import type { CapabilityRegistrar, CapabilityTable } from "../registrar.js";
import { RwLock } from "../lib/rw-lock.js";
import {
  isErrnoException,
  readJsonDocument,
  writeJsonAtomic,
} from "../lib/json-file.js";
import { artifactName, artifactPath, renderNginxConf } from "./nginx-template.js";
import type { ProxyController } from "./proxy-controller.js";

export const WEBSERVICES_FILENAME = "webservices.json";
export const WEBSERVICE_CAPABILITY_OWNER = "webservice";

export interface WebServiceManagerOptions {
  /** Agent home; the registry lives here */
  home: string;
  /** Directory the proxy includes server blocks from */
  confDir: string;
}

export interface ProxyStatus {
  type: string;
  status: "running" | "stopped";
}

export interface ArtifactReconcileReport {
  regenerated: string[];
  removed: string[];
}

export class WebServiceManager {
  readonly registryPath: string;
  private readonly lock = new RwLock();
  private webservices: Record<string, WebServiceInfo> = {};

  constructor(
    private readonly registrar: CapabilityRegistrar,
    private readonly proxy: ProxyController,
    private readonly logger: Logger,
    private readonly options: WebServiceManagerOptions,
  ) {
    this.registryPath = path.join(options.home, WEBSERVICES_FILENAME);
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  async start(): Promise<void> {
    this.logger.info(
      { proxy: this.proxy.type, confDir: this.options.confDir },
      "Starting webservice manager",
    );

    await this.lock.write(async () => {
      this.loadLocked();
      const report = this.reconcileArtifactsLocked();
      if (report.regenerated.length > 0 || report.removed.length > 0) {
        this.logger.info(report, "Proxy artifacts reconciled");
        await this.applyLocked();
      }
    });

    await this.registrar.attach(WEBSERVICE_CAPABILITY_OWNER, this.capabilities());
  }

  /** Withdraw capabilities and remove every route. Never throws. */
  async stop(): Promise<void> {
    try {
      await this.registrar.detach(WEBSERVICE_CAPABILITY_OWNER);
    } catch (err) {
      this.logger.warn({ err }, "Failed to withdraw webservice capabilities");
    }
    await this.shutdown();
    this.logger.info("Webservice manager stopped");
  }

  /** Remove every artifact and entry, then reload once (best-effort) */
  async shutdown(): Promise<void> {
    await this.lock.write(async () => {
      const names = Object.keys(this.webservices);
      if (names.length === 0) return;
      for (const name of names) {
        try {
          this.removeLocked(name);
        } catch (err) {
          this.logger.error({ err, name }, "Failed to remove webservice during shutdown");
        }
      }
      await this.applyLocked();
    });
  }

  // -------------------------------------------------------------------------
  // Operations
  // -------------------------------------------------------------------------

  /**
   * Publish 127.0.0.1:`localPort` on `publicPort` through the proxy.
   *
   * @throws CapabilityError WEBSERVICE_ALREADY_ENABLED
   * @throws ProcessError PROXY_VALIDATION_FAILED | PROXY_RELOAD_FAILED: artifact removed, nothing recorded
   */
  async enable(
    name: string,
    localPort: number,
    publicPort: number,
    domain = "",
  ): Promise<WebServiceInfo> {
    return this.lock.write(async () => {
      if (this.webservices[name] !== undefined) {
        throw new CapabilityError(
          `Webservice ${name} already enabled`,
          "WEBSERVICE_ALREADY_ENABLED",
          { name },
        );
      }

      const info: WebServiceInfo = {
        name,
        local_port: localPort,
        public_port: publicPort,
        domain,
        status: "enabled",
      };
      this.writeArtifact(info);

      try {
        await this.proxy.test();
        await this.proxy.reload();
      } catch (err) {
        this.deleteArtifact(name);
        throw err;
      }

      this.webservices[name] = info;
      this.logger.info({ name, localPort, publicPort, domain }, `Webservice ${name} enabled`);
      this.persistLocked();
      return { ...info };
    });
  }

  /** Remove the route for `name`. Absent names succeed. */
  async disable(name: string): Promise<void> {
    await this.lock.write(async () => {
      const changed = this.removeLocked(name);
      if (changed) {
        await this.applyLocked();
        this.logger.info({ name }, `Webservice ${name} disabled`);
      }
    });
  }

  /** Snapshot of the registry, sorted by name */
  async list(): Promise<WebServiceInfo[]> {
    return this.lock.read(() =>
      Object.values(this.webservices)
        .map((info) => ({ ...info }))
        .sort((a, b) => a.name.localeCompare(b.name)),
    );
  }

  async proxyInfo(): Promise<ProxyStatus> {
    const running = await this.proxy.isRunning();
    return { type: this.proxy.type, status: running ? "running" : "stopped" };
  }

  /** Restore artifact ⟺ entry agreement; reload when anything changed */
  async reconcile(): Promise<ArtifactReconcileReport> {
    return this.lock.write(async () => {
      const report = this.reconcileArtifactsLocked();
      if (report.regenerated.length > 0 || report.removed.length > 0) {
        await this.applyLocked();
      }
      return report;
    });
  }

  capabilities(): CapabilityTable {
    return {
      EnableWebService: async (args) => {
        const { name, localPort, publicPort, domain } = parseCapabilityArgs(
          "EnableWebService",
          enableWebServiceArgsSchema,
          args,
        );
        const info = await this.enable(name, localPort, publicPort, domain);
        return success(`Webservice ${name} enabled`, { webservice: info });
      },
      DisableWebService: async (args) => {
        const { name } = parseCapabilityArgs(
          "DisableWebService",
          disableWebServiceArgsSchema,
          args,
        );
        await this.disable(name);
        return success(`Webservice ${name} disabled`);
      },
      WebServicesList: async () =>
        success("Webservices list retrieved", { webservices: await this.list() }),
      ProxyInfo: async () => {
        const status = await this.proxyInfo();
        return success("Proxy info retrieved", { ...status });
      },
    };
  }

  // -------------------------------------------------------------------------
  // Locked internals
  // -------------------------------------------------------------------------

  private loadLocked(): void {
    const result = readJsonDocument(this.registryPath, webServicesDocumentSchema);
    switch (result.status) {
      case "missing":
        this.webservices = {};
        this.persistLocked();
        return;
      case "ok":
        this.webservices = result.value.webservices;
        this.logger.info(
          { count: Object.keys(this.webservices).length },
          "Webservices registry loaded",
        );
        return;
      case "corrupted":
        throw new StorageError(
          `Webservices registry at ${this.registryPath} is not valid JSON: ${result.error}`,
          "STORAGE_CORRUPTED",
          { path: this.registryPath },
        );
      case "invalid":
        throw new StorageError(
          `Webservices registry at ${this.registryPath} failed validation`,
          "STORAGE_INVALID",
          { path: this.registryPath, zodErrors: result.issues },
        );
    }
  }

  /** Returns whether anything (artifact or entry) was removed */
  private removeLocked(name: string): boolean {
    const removedArtifact = this.deleteArtifact(name);
    const hadEntry = this.webservices[name] !== undefined;
    if (hadEntry) {
      delete this.webservices[name];
      this.persistLocked();
    }
    return removedArtifact || hadEntry;
  }

  private reconcileArtifactsLocked(): ArtifactReconcileReport {
    const report: ArtifactReconcileReport = { regenerated: [], removed: [] };

    for (const info of Object.values(this.webservices)) {
      if (!fs.existsSync(artifactPath(this.options.confDir, info.name))) {
        this.writeArtifact(info);
        report.regenerated.push(info.name);
      }
    }

    for (const fileName of this.listArtifactFiles()) {
      const name = artifactName(fileName);
      if (name === null || this.webservices[name] !== undefined) continue;
      this.deleteArtifact(name);
      report.removed.push(name);
    }

    return report;
  }

  /** Test then reload; failures are logged, never thrown */
  private async applyLocked(): Promise<void> {
    try {
      await this.proxy.test();
      await this.proxy.reload();
    } catch (err) {
      this.logger.error({ err }, "Proxy reload failed");
    }
  }

  private listArtifactFiles(): string[] {
    try {
      return fs.readdirSync(this.options.confDir);
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") return [];
      throw new StorageError(
        `Cannot list ${this.options.confDir}: ${errorMessage(err)}`,
        "STORAGE_READ_FAILED",
        { path: this.options.confDir },
      );
    }
  }

  private writeArtifact(info: WebServiceInfo): void {
    const file = artifactPath(this.options.confDir, info.name);
    try {
      fs.mkdirSync(this.options.confDir, { recursive: true });
      fs.writeFileSync(file, renderNginxConf(info), "utf-8");
    } catch (err) {
      throw new StorageError(
        `Failed to write proxy config ${file}: ${errorMessage(err)}`,
        "STORAGE_WRITE_FAILED",
        { path: file },
      );
    }
  }

  /** Returns false when there was nothing to delete */
  private deleteArtifact(name: string): boolean {
    const file = artifactPath(this.options.confDir, name);
    try {
      fs.unlinkSync(file);
      return true;
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") return false;
      throw new StorageError(
        `Failed to remove proxy config ${file}: ${errorMessage(err)}`,
        "STORAGE_WRITE_FAILED",
        { path: file },
      );
    }
  }

  private persistLocked(): void {
    writeJsonAtomic(this.registryPath, { webservices: this.webservices });
  }
}
