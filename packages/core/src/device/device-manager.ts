/**
 * Device manager: DevicePing, DeviceInfo and DeviceStatus.
 */

import * as os from "node:os";
import type { Logger } from "pino";
import { success, type CapabilityResult } from "@boardlink/shared";
import type { Board } from "../board.js";
import type { CapabilityRegistrar, CapabilityTable } from "../registrar.js";
import { formatTimestamp } from "../lib/timestamp.js";
import type { DeviceProfile, DeviceProfileRegistry } from "./profiles.js";

export const DEVICE_CAPABILITY_OWNER = "device";

export class DeviceManager {
  private resolved: { boardType: string; profile: DeviceProfile } | null = null;

  constructor(
    private readonly board: Board,
    private readonly registrar: CapabilityRegistrar,
    private readonly profiles: DeviceProfileRegistry,
    private readonly logger: Logger,
  ) {}

  /**
   * Profile for the board's current type. Resolved on first use, since the
   * board is loaded after the manager is built, and again if a settings
   * replacement changes the type.
   */
  get profile(): DeviceProfile {
    const boardType = this.board.type;
    let resolved = this.resolved;
    if (resolved === null || resolved.boardType !== boardType) {
      resolved = { boardType, profile: this.profiles.resolve(boardType) };
      this.resolved = resolved;
    }
    return resolved.profile;
  }

  async start(): Promise<void> {
    this.logger.info({ type: this.profile.type }, "Starting device manager");
    await this.registrar.attach(DEVICE_CAPABILITY_OWNER, this.capabilities());
  }

  async stop(): Promise<void> {
    await this.registrar.detach(DEVICE_CAPABILITY_OWNER);
    this.logger.info("Device manager stopped");
  }

  /** `<hostname> @ <timestamp>` */
  async ping(now: Date = new Date()): Promise<CapabilityResult> {
    return success(`${os.hostname()} @ ${formatTimestamp(now)}`);
  }

  async info(): Promise<CapabilityResult> {
    const data = await this.profile.describe();
    return success("Device info retrieved", {
      ...data,
      board: { uuid: this.board.uuid, name: this.board.name },
    });
  }

  async status(): Promise<CapabilityResult> {
    return success("Device status retrieved", await this.profile.healthCheck());
  }

  capabilities(): CapabilityTable {
    return {
      DevicePing: () => this.ping(),
      DeviceInfo: () => this.info(),
      DeviceStatus: () => this.status(),
    };
  }
}
