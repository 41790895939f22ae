import type { DeviceConfig } from "../config";
import { MemoryPool } from "../storage/memory-pool";
import { deviceLogger as logger, logPerformance } from "../utils/logger";
import { MemDevice, type DeviceDump, type Geometry } from "./device";
import { DeviceFile, type AccessMode } from "./device-file";
import { NoSuchDeviceError } from "./errors";

/**
 * Fixed set of devices built once at startup; nothing is added or removed
 * afterwards, only their contents change. Minors run from `firstMinor`.
 */
export class DeviceTable {
  readonly devices: readonly MemDevice[];
  readonly pool: MemoryPool;
  /** geometry every device starts with and returns to on trim */
  readonly defaults: Readonly<Geometry>;
  private readonly firstMinor: number;

  constructor(config: DeviceConfig, pool: MemoryPool = new MemoryPool(config.memoryLimit)) {
    this.pool = pool;
    this.firstMinor = config.firstMinor;

    const defaults = Object.freeze({ quantum: config.quantum, qset: config.qset });
    this.defaults = defaults;
    this.devices = Object.freeze(
      Array.from({ length: config.deviceCount }, (_, i) =>
        new MemDevice(i, config.firstMinor + i, defaults, pool)),
    );

    logger.info({
      devices: config.deviceCount,
      firstMinor: config.firstMinor,
      quantum: config.quantum,
      qset: config.qset,
    }, "Device table initialized");
  }

  get minors(): number[] {
    return this.devices.map(d => d.minor);
  }

  device(minor: number): MemDevice {
    const dev = Number.isInteger(minor) ? this.devices[minor - this.firstMinor] : undefined;
    if (!dev) throw new NoSuchDeviceError(minor);
    return dev;
  }

  /** Write-only opens truncate the device first, under its lock. */
  async open(minor: number, access: AccessMode, signal?: AbortSignal): Promise<DeviceFile> {
    const dev = this.device(minor);
    if (access === "w") await dev.truncate(signal);
    return new DeviceFile(dev, access);
  }

  async inspect(signal?: AbortSignal): Promise<DeviceDump[]> {
    const dumps: DeviceDump[] = [];
    for (const dev of this.devices) dumps.push(await dev.inspect(signal));
    return dumps;
  }

  /** Trim every device; in-flight operations finish first. */
  async shutdown(): Promise<void> {
    const startTime = Date.now();
    await Promise.all(this.devices.map(d => d.shutdown()));
    logPerformance(logger, "device-shutdown", startTime, { inUse: this.pool.inUse });
  }
}
