import { ACCESS_MODES, WHENCES, type AccessMode, type Whence } from "../core/device-file";
import { InvalidArgumentError } from "../core/errors";

/** Shared parsing for query strings (strings) and socket payloads (numbers). */

export function intParam(value: unknown, name: string, fallback?: number, min = 0): number {
  if (value === undefined || value === "") {
    if (fallback === undefined) throw new InvalidArgumentError(`missing ${name}`);
    return fallback;
  }

  const n = typeof value === "string" ? Number(value) : value;
  if (typeof n !== "number" || !Number.isSafeInteger(n) || n < min) {
    throw new InvalidArgumentError(`invalid ${name}: ${String(value)}`);
  }
  return n;
}

export function optionalIntParam(value: unknown, name: string, min = 0): number | undefined {
  return value === undefined ? undefined : intParam(value, name, undefined, min);
}

export function accessParam(value: unknown, fallback: AccessMode = "r"): AccessMode {
  if (value === undefined) return fallback;
  const mode = ACCESS_MODES.find(m => m === value);
  if (!mode) throw new InvalidArgumentError(`invalid access mode: ${String(value)}`);
  return mode;
}

export function whenceParam(value: unknown): Whence {
  if (value === undefined) return "set";
  const whence = WHENCES.find(w => w === value);
  if (!whence) throw new InvalidArgumentError(`invalid whence: ${String(value)}`);
  return whence;
}

export function boolParam(value: unknown): boolean {
  return value === true || value === "true" || value === "1";
}

/** Socket payloads arrive as plain objects; anything else reads as empty. */
export function fieldsOf(payload: unknown): Record<string, unknown> {
  return typeof payload === "object" && payload !== null ? { ...payload } : {};
}

/** Binary socket payloads come through as Buffer, ArrayBuffer or a typed array. */
export function bytesParam(value: unknown, name: string): Uint8Array {
  if (value instanceof Uint8Array) return value;
  if (value instanceof ArrayBuffer) return new Uint8Array(value);
  if (typeof value === "string") return new TextEncoder().encode(value);
  throw new InvalidArgumentError(`invalid ${name}: expected bytes`);
}
