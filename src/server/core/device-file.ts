import type { MemDevice, ReadOptions, ReadResult, WriteOptions, WriteResult } from "./device";
import { BadFileError, InvalidArgumentError } from "./errors";

/** "w" is write-only, the mode that truncates on open. */
export type AccessMode = "r" | "w" | "rw";
export type Whence = "set" | "cur" | "end";

export const ACCESS_MODES: readonly AccessMode[] = ["r", "w", "rw"];
export const WHENCES: readonly Whence[] = ["set", "cur", "end"];

/**
 * An open file on a device: access mode plus its own position cursor.
 * The cursor only advances by what a call actually transferred.
 */
export class DeviceFile {
  private _pos = 0;
  private released = false;

  constructor(readonly device: MemDevice, readonly access: AccessMode) {}

  get pos() { return this._pos; }
  get open() { return !this.released; }

  async read(count: number, options: ReadOptions = {}): Promise<ReadResult> {
    this.ensureOpen();
    if (this.access === "w") throw new BadFileError("file not open for reading");
    const result = await this.device.read(this._pos, count, options);
    this._pos = result.pos;
    return result;
  }

  async write(data: Uint8Array, options: WriteOptions = {}): Promise<WriteResult> {
    this.ensureOpen();
    if (this.access === "r") throw new BadFileError("file not open for writing");
    const result = await this.device.write(this._pos, data, options);
    this._pos = result.pos;
    return result;
  }

  /** Reposition the cursor. Touches nothing on the device, so no lock. */
  llseek(offset: number, whence: Whence = "set"): number {
    this.ensureOpen();
    if (!Number.isSafeInteger(offset)) {
      throw new InvalidArgumentError(`invalid offset ${offset}`);
    }

    const base = whence === "set" ? 0 : whence === "cur" ? this._pos : this.device.size;
    const next = base + offset;

    if (next < 0) throw new InvalidArgumentError(`seek to negative position ${next}`);
    this._pos = next;
    return next;
  }

  /** Nothing to undo on the device; the file just stops accepting calls. */
  release(): void {
    this.released = true;
  }

  private ensureOpen(): void {
    if (this.released) throw new BadFileError("file already released");
  }
}
