import { getHeapStatistics } from "node:v8";
import type { Quantum, QuantumSet, QuantumSlots } from "./quantum-set";
import { poolLogger as logger } from "../utils/logger";

/** Accounting cost of one set node: a small heap object with two links. */
export const SET_BYTES = 64;
/** Accounting cost of one slot in a slot array. */
export const SLOT_BYTES = 8;

export interface PoolStats {
  inUse: number;
  peak: number;
  limit: number;
  failures: number;
}

/** Budget used when none is configured: half of what V8 lets the heap grow to. */
export function defaultPoolLimit(): number {
  return Math.floor(getHeapStatistics().heap_size_limit / 2);
}

/**
 *  Process-wide allocator shared by every device.
 *  Every alloc* returns `null` instead of throwing: running out is an
 *  ordinary outcome the device reports as ENOMEM.
 *
 *  limit = 0 → defaultPoolLimit().
 */
export class MemoryPool {
  private readonly limit: number;
  private nextHandle = 1;
  private _inUse = 0;
  private peak = 0;
  private failures = 0;

  constructor(limit: number = 0) {
    this.limit = limit > 0 ? limit : defaultPoolLimit();
    logger.debug({ limit }, "Memory pool initialized");
  }

  get inUse() { return this._inUse; }

  /**
   * Check that `bytes` more would fit without taking them; a refusal counts
   * as a failure. Lets a caller turn down a large build before starting it.
   */
  admit(bytes: number, kind: string): boolean {
    if (this.fits(bytes)) return true;
    this.refuse(bytes, kind);
    return false;
  }

  allocSet(): QuantumSet | null {
    if (!this.reserve(SET_BYTES, "set")) return null;
    return { handle: this.nextHandle++, slots: null, next: null };
  }

  allocSlots(qset: number): QuantumSlots | null {
    if (!this.reserve(qset * SLOT_BYTES, "slots")) return null;
    return { handle: this.nextHandle++, items: new Array<Quantum | null>(qset).fill(null) };
  }

  allocQuantum(quantum: number): Quantum | null {
    if (!this.fits(quantum)) {
      this.refuse(quantum, "quantum");
      return null;
    }

    let data: Uint8Array;
    try {
      data = new Uint8Array(quantum);
    } catch (err) {
      if (!(err instanceof RangeError)) throw err;
      this.refuse(quantum, "quantum");
      return null;
    }

    this.take(quantum);
    return { handle: this.nextHandle++, data };
  }

  freeSet(_set: QuantumSet): void { this.give(SET_BYTES); }
  freeSlots(slots: QuantumSlots): void { this.give(slots.items.length * SLOT_BYTES); }
  freeQuantum(q: Quantum): void { this.give(q.data.length); }

  stats(): PoolStats {
    return {
      inUse: this._inUse,
      peak: this.peak,
      limit: this.limit,
      failures: this.failures,
    };
  }

  /* ── accounting ─────────────────────────────────────────── */

  private reserve(bytes: number, kind: string): boolean {
    if (!this.fits(bytes)) {
      this.refuse(bytes, kind);
      return false;
    }
    this.take(bytes);
    return true;
  }

  private fits(bytes: number): boolean {
    return this._inUse + bytes <= this.limit;
  }

  private take(bytes: number): void {
    this._inUse += bytes;
    if (this._inUse > this.peak) this.peak = this._inUse;
  }

  private refuse(bytes: number, kind: string): void {
    this.failures++;
    logger.warn({
      kind,
      bytes,
      inUse: this._inUse,
      limit: this.limit,
    }, "Allocation refused");
  }

  private give(bytes: number): void {
    this._inUse -= bytes;
  }
}
