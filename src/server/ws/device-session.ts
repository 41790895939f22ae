import type { Geometry } from "../core/device";
import type { AccessMode, DeviceFile, Whence } from "../core/device-file";
import type { DeviceTable } from "../core/device-table";
import { BadFileError } from "../core/errors";
import { createSessionLogger, type Logger } from "../utils/logger";

/**
 * What one socket holds: at most one open file, plus an AbortController
 * that cancels every lock wait the session still has queued when the
 * socket goes away.
 */
export class DeviceSession {
  private file: DeviceFile | null = null;
  private readonly abort = new AbortController();
  private readonly log: Logger;

  constructor(private readonly table: DeviceTable, readonly id: string) {
    this.log = createSessionLogger(id);
  }

  get minor(): number | null {
    return this.file?.device.minor ?? null;
  }

  get signal(): AbortSignal {
    return this.abort.signal;
  }

  async open(minor: number, access: AccessMode): Promise<{ minor: number; access: AccessMode; size: number }> {
    const file = await this.table.open(minor, access, this.signal);
    this.file?.release();
    this.file = file;

    this.log.debug({ minor, access }, "File opened");
    return { minor, access, size: file.device.size };
  }

  async read(count: number): Promise<{ data: Uint8Array; pos: number }> {
    const { bytes, pos } = await this.current().read(count, { signal: this.signal });
    return { data: bytes, pos };
  }

  async write(data: Uint8Array): Promise<{ written: number; pos: number; size: number }> {
    const file = this.current();
    const { written, pos } = await file.write(data, { signal: this.signal });
    return { written, pos, size: file.device.size };
  }

  seek(offset: number, whence: Whence): { pos: number } {
    return { pos: this.current().llseek(offset, whence) };
  }

  async geometry(geometry: Partial<Geometry>): Promise<Geometry> {
    return this.current().device.setGeometry(geometry, this.signal);
  }

  release(): void {
    if (!this.file) return;
    this.file.release();
    this.log.debug({ minor: this.file.device.minor }, "File released");
    this.file = null;
  }

  /** Socket gone: abandon queued lock waits, drop the file. */
  close(): void {
    this.abort.abort();
    this.release();
  }

  private current(): DeviceFile {
    if (!this.file) throw new BadFileError("no open file");
    return this.file;
  }
}
