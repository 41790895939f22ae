// ────────────────  Runtime config (ENV‑driven)  ───────────────────────────

export const DEFAULT_QUANTUM = 4000;
export const DEFAULT_QSET = 1000;
export const DEFAULT_DEVICE_COUNT = 4;
export const DEFAULT_HTTP_PORT = 5500;

export const REST_ROOT = "/v1";
export const WS_PATH = "/ws";

export interface DeviceConfig {
  /** default bytes per quantum */
  quantum: number;
  /** default quanta per set */
  qset: number;
  deviceCount: number;
  /** minor number of device 0 */
  firstMinor: number;
  /** byte budget for the memory pool, 0 = half the V8 heap limit */
  memoryLimit: number;
}

export interface ServerConfig extends DeviceConfig {
  httpPort: number;
}

export class ConfigError extends Error {
  constructor(readonly variable: string, message: string) {
    super(`${variable}: ${message}`);
    this.name = "ConfigError";
  }
}

function readInt(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
  min: number,
  max: number = Number.MAX_SAFE_INTEGER,
): number {
  const raw = env[name]?.trim();
  if (raw === undefined || raw === "") return fallback;

  const value = Number(raw);
  if (!Number.isSafeInteger(value)) {
    throw new ConfigError(name, `expected an integer, got "${raw}"`);
  }
  if (value < min || value > max) {
    throw new ConfigError(name, `expected ${min}..${max}, got ${value}`);
  }
  return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const quantum = readInt(env, "MEMDEV_QUANTUM", DEFAULT_QUANTUM, 1);
  const qset = readInt(env, "MEMDEV_QSET", DEFAULT_QSET, 1);
  if (!Number.isSafeInteger(quantum * qset)) {
    throw new ConfigError("MEMDEV_QSET", `quantum × qset overflows (${quantum} × ${qset})`);
  }

  return {
    quantum,
    qset,
    deviceCount: readInt(env, "MEMDEV_DEVICES", DEFAULT_DEVICE_COUNT, 1),
    firstMinor: readInt(env, "MEMDEV_FIRST_MINOR", 0, 0),
    memoryLimit: readInt(env, "MEMDEV_MEMORY_LIMIT", 0, 0),
    httpPort: readInt(env, "HTTP_PORT", DEFAULT_HTTP_PORT, 0, 65_535),
  };
}
