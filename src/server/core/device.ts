import { EventEmitter } from "events";
import { translate } from "./address";
import { DeviceLock } from "./device-lock";
import {
  AllocationFailureError,
  DeviceBusyError,
  InvalidArgumentError,
} from "./errors";
import { copyFromUser, copyToUser } from "./user-copy";
import { SET_BYTES, type MemoryPool } from "../storage/memory-pool";
import { chainLength, type QuantumSet } from "../storage/quantum-set";
import { createDeviceLogger, type Logger } from "../utils/logger";

/** Block size and blocks-per-set in effect for a device. */
export interface Geometry {
  quantum: number;
  qset: number;
}

export interface ReadOptions {
  signal?: AbortSignal;
  /** Caller buffer to copy into; a fresh one is allocated when omitted. */
  into?: { buffer: Uint8Array; offset?: number };
}

export interface WriteOptions {
  signal?: AbortSignal;
  /** Region of the source to take, default the whole buffer. */
  offset?: number;
  length?: number;
}

export interface ReadResult {
  bytes: Uint8Array;
  /** position after the transfer */
  pos: number;
}

export interface WriteResult {
  written: number;
  pos: number;
}

export interface DeviceStats {
  reads: number;
  writes: number;
  holes: number;
  bytesRead: number;
  bytesWritten: number;
}

export interface DeviceDump {
  index: number;
  minor: number;
  items: number;
  quantum: number;
  qset: number;
  size: number;
  sets: Array<{ handle: number; slots: number | null }>;
  /** occupied slots of the final set only */
  lastSlots: Array<{ slot: number; handle: number }>;
}

const EMPTY = new Uint8Array(0);

function assertPosition(pos: number): void {
  if (!Number.isSafeInteger(pos) || pos < 0) {
    throw new InvalidArgumentError(`invalid position ${pos}`);
  }
}

function assertCount(count: number): void {
  if (!Number.isSafeInteger(count) || count < 0) {
    throw new InvalidArgumentError(`invalid count ${count}`);
  }
}

/**
 *  One independently locked memory device.
 *
 *  read/write each hold the lock for their whole body and move at most one
 *  quantum per call; callers that want more simply call again.
 *
 *  Events (emitted after the lock is released):
 *    "write" { pos, count, size }
 *    "trim"  { size: 0 }
 */
export class MemDevice extends EventEmitter {
  readonly lock = new DeviceLock();
  readonly stats: DeviceStats = { reads: 0, writes: 0, holes: 0, bytesRead: 0, bytesWritten: 0 };

  private data: QuantumSet | null = null;
  private _size = 0;
  private _quantum: number;
  private _qset: number;
  private readonly log: Logger;

  constructor(
    readonly index: number,
    readonly minor: number,
    private readonly defaults: Geometry,
    private readonly pool: MemoryPool,
  ) {
    super();
    this._quantum = defaults.quantum;
    this._qset = defaults.qset;
    this.log = createDeviceLogger(minor);
  }

  get size() { return this._size; }
  get quantum() { return this._quantum; }
  get qset() { return this._qset; }

  /* ── data path ──────────────────────────────────────────── */

  async read(pos: number, count: number, options: ReadOptions = {}): Promise<ReadResult> {
    assertPosition(pos);
    assertCount(count);

    return this.lock.run(() => {
      this.stats.reads++;

      if (pos > this._size) return { bytes: EMPTY, pos };
      if (pos + count > this._size) count = this._size - pos;

      const quantum = this._quantum;
      const { set, slot, offset } = translate(pos, quantum, this._qset);

      const dptr = this.follow(set);
      const q = dptr?.slots?.items[slot];
      if (!q) {
        this.stats.holes++;
        this.log.trace({ pos, set, slot }, "Read hit a hole");
        return { bytes: EMPTY, pos };
      }

      if (count > quantum - offset) count = quantum - offset;

      let bytes: Uint8Array;
      if (options.into) {
        const dstOffset = options.into.offset ?? 0;
        copyToUser(options.into.buffer, dstOffset, q.data, offset, count);
        bytes = options.into.buffer.subarray(dstOffset, dstOffset + count);
      } else {
        bytes = new Uint8Array(count);
        copyToUser(bytes, 0, q.data, offset, count);
      }

      this.stats.bytesRead += count;
      this.log.trace({ pos, count }, "Read");
      return { bytes, pos: pos + count };
    }, options.signal);
  }

  async write(pos: number, source: Uint8Array, options: WriteOptions = {}): Promise<WriteResult> {
    assertPosition(pos);
    const srcOffset = options.offset ?? 0;
    let count = options.length ?? source.length - srcOffset;
    assertCount(count);
    let sizeAfter = 0;

    const result = await this.lock.run(() => {
      this.stats.writes++;

      const quantum = this._quantum;
      const qset = this._qset;
      const { set, slot, offset } = translate(pos, quantum, qset);

      const dptr = this.follow(set);
      if (!dptr) throw this.allocFailed("quantum set", pos);

      if (!dptr.slots) {
        dptr.slots = this.pool.allocSlots(qset);
        if (!dptr.slots) throw this.allocFailed("slot array", pos);
      }

      let q = dptr.slots.items[slot];
      if (!q) {
        q = this.pool.allocQuantum(quantum);
        if (!q) throw this.allocFailed("quantum", pos);
        dptr.slots.items[slot] = q;
      }

      if (count > quantum - offset) count = quantum - offset;

      copyFromUser(q.data, offset, source, srcOffset, count);

      const end = pos + count;
      if (this._size < end) this._size = end;
      sizeAfter = this._size;

      this.stats.bytesWritten += count;
      this.log.trace({ pos, count, size: this._size }, "Write");
      return { written: count, pos: end };
    }, options.signal);

    this.emit("write", { pos, count: result.written, size: sizeAfter });
    return result;
  }

  /** Take the lock and drop everything (open for write-only). */
  async truncate(signal?: AbortSignal): Promise<void> {
    await this.lock.run(() => this.trim(), signal);
    this.emit("trim", { size: 0 });
  }

  /**
   * Change quantum/qset for this device. Only allowed while no set has a
   * slot array, so every slot array stays sized to the qset it was built under.
   */
  async setGeometry(geometry: Partial<Geometry>, signal?: AbortSignal): Promise<Geometry> {
    const quantum = geometry.quantum ?? this._quantum;
    const qset = geometry.qset ?? this._qset;
    if (!Number.isSafeInteger(quantum) || quantum <= 0) {
      throw new InvalidArgumentError(`invalid quantum ${quantum}`);
    }
    if (!Number.isSafeInteger(qset) || qset <= 0) {
      throw new InvalidArgumentError(`invalid qset ${qset}`);
    }
    if (!Number.isSafeInteger(quantum * qset)) {
      throw new InvalidArgumentError(`quantum × qset too large (${quantum} × ${qset})`);
    }

    return this.lock.run(() => {
      if (this.holdsSlots()) {
        throw new DeviceBusyError(`device ${this.minor} holds data; truncate it first`);
      }
      this._quantum = quantum;
      this._qset = qset;
      this.log.info({ quantum, qset }, "Geometry changed");
      return { quantum, qset };
    }, signal);
  }

  /** Snapshot for the memory dump, taken under the lock. */
  async inspect(signal?: AbortSignal): Promise<DeviceDump> {
    return this.lock.run(() => this.dumpLocked(), signal);
  }

  /** Trim under the lock, no cancellation; used when the table shuts down. */
  async shutdown(): Promise<void> {
    await this.lock.run(() => this.trim());
  }

  /* ── lock-held internals ───────────────────────────────── */

  /**
   * Walk to set `n`, creating any missing sets (head included).
   * Returns null when the pool refuses a node; sets created before that stay linked.
   * The whole run of missing sets is priced first, so a far offset is turned
   * down before anything is built.
   */
  private follow(n: number): QuantumSet | null {
    const missing = n + 1 - chainLength(this.data);
    if (missing > 0 && !this.pool.admit(missing * SET_BYTES, "set chain")) return null;

    if (!this.data) {
      const head = this.pool.allocSet();
      if (!head) return null;
      this.data = head;
    }

    let dptr = this.data;
    while (n-- > 0) {
      if (!dptr.next) {
        const next = this.pool.allocSet();
        if (!next) return null;
        dptr.next = next;
      }
      dptr = dptr.next;
    }
    return dptr;
  }

  // sets without a slot array carry no geometry yet
  private holdsSlots(): boolean {
    for (let dptr = this.data; dptr; dptr = dptr.next) {
      if (dptr.slots) return true;
    }
    return false;
  }

  // caller holds the lock
  private trim(): void {
    let sets = 0;
    let quanta = 0;

    for (let dptr = this.data; dptr; dptr = dptr.next) {
      if (dptr.slots) {
        for (const q of dptr.slots.items) {
          if (!q) continue;
          this.pool.freeQuantum(q);
          quanta++;
        }
        this.pool.freeSlots(dptr.slots);
        dptr.slots = null;
      }
      this.pool.freeSet(dptr);
      sets++;
    }

    const freedSize = this._size;
    this.data = null;
    this._size = 0;
    this._quantum = this.defaults.quantum;
    this._qset = this.defaults.qset;

    this.log.info({ sets, quanta, size: freedSize }, "Device trimmed");
  }

  private dumpLocked(): DeviceDump {
    const sets: DeviceDump["sets"] = [];
    const lastSlots: DeviceDump["lastSlots"] = [];

    for (let qs = this.data; qs; qs = qs.next) {
      sets.push({ handle: qs.handle, slots: qs.slots?.handle ?? null });
      if (!qs.next && qs.slots) {
        qs.slots.items.forEach((q, slot) => {
          if (q) lastSlots.push({ slot, handle: q.handle });
        });
      }
    }

    return {
      index: this.index,
      minor: this.minor,
      items: chainLength(this.data),
      quantum: this._quantum,
      qset: this._qset,
      size: this._size,
      sets,
      lastSlots,
    };
  }

  private allocFailed(what: string, pos: number): AllocationFailureError {
    this.log.warn({ what, pos, size: this._size }, "Write aborted: allocation failed");
    return new AllocationFailureError(what);
  }
}
