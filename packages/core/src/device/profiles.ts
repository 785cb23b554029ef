/**
 * Device profiles: per-board-type knowledge of the hardware.
 *
 * The registry maps a board type to a profile factory. Unknown types fall
 * back to the generic profile.
 */

import * as fs from "node:fs/promises";
import * as os from "node:os";

export interface DeviceProfile {
  /** Board type this profile serves */
  readonly type: string;
  /** Short human-readable hardware model */
  identify(): Promise<string>;
  /** Static facts about the device, served by DeviceInfo */
  describe(): Promise<Record<string, unknown>>;
  /** Live health figures, served by DeviceStatus */
  healthCheck(): Promise<Record<string, unknown>>;
}

export type DeviceProfileFactory = (type: string) => DeviceProfile;

export const GENERIC_PROFILE_TYPE = "generic";

/** Profile that only relies on what the OS reports */
export class GenericDeviceProfile implements DeviceProfile {
  constructor(readonly type: string = GENERIC_PROFILE_TYPE) {}

  async identify(): Promise<string> {
    return `${os.type()} ${os.arch()}`;
  }

  async describe(): Promise<Record<string, unknown>> {
    return {
      type: this.type,
      hostname: os.hostname(),
      model: await this.identify(),
      platform: os.platform(),
      arch: os.arch(),
      release: os.release(),
      cpus: os.cpus().length,
      total_memory: os.totalmem(),
    };
  }

  async healthCheck(): Promise<Record<string, unknown>> {
    return {
      status: "online",
      uptime: Math.floor(os.uptime()),
      load_average: os.loadavg(),
      free_memory: os.freemem(),
      total_memory: os.totalmem(),
    };
  }
}

export const DEVICE_TREE_MODEL_PATH = "/proc/device-tree/model";

/** Raspberry Pi: reads the model string from the device tree */
export class RaspberryDeviceProfile extends GenericDeviceProfile {
  constructor(
    type = "raspberry",
    private readonly modelPath: string = DEVICE_TREE_MODEL_PATH,
  ) {
    super(type);
  }

  async identify(): Promise<string> {
    try {
      const raw = await fs.readFile(this.modelPath, "utf-8");
      // The device tree terminates strings with NUL
      return raw.replace(/\0/g, "").trim() || "Raspberry Pi";
    } catch {
      return "Raspberry Pi";
    }
  }
}

/**
 * Registry of profile factories keyed by board type (case-insensitive).
 */
export class DeviceProfileRegistry {
  private readonly factories = new Map<string, DeviceProfileFactory>();

  register(type: string, factory: DeviceProfileFactory): void {
    this.factories.set(type.toLowerCase(), factory);
  }

  /** Resolve the profile for a board type; falls back to generic */
  resolve(type: string): DeviceProfile {
    const key = type.toLowerCase();
    const factory =
      this.factories.get(key) ?? this.factories.get(GENERIC_PROFILE_TYPE);
    return factory === undefined
      ? new GenericDeviceProfile(type || GENERIC_PROFILE_TYPE)
      : factory(type || GENERIC_PROFILE_TYPE);
  }

  listRegisteredTypes(): string[] {
    return [...this.factories.keys()];
  }
}

/** Registry with the built-in profiles */
export function createDeviceProfileRegistry(): DeviceProfileRegistry {
  const registry = new DeviceProfileRegistry();
  registry.register(GENERIC_PROFILE_TYPE, (type) => new GenericDeviceProfile(type));
  registry.register("raspberry", (type) => new RaspberryDeviceProfile(type));
  return registry;
}
