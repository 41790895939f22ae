import type { DeviceFile } from "./device-file";

/**
 * Caller-side loops over the one-quantum-per-call data path.
 */

/** Read until `count` bytes are in hand or a call returns nothing (end of data or a hole). */
export async function readRange(file: DeviceFile, count: number, signal?: AbortSignal): Promise<Uint8Array> {
  const out = new Uint8Array(count);
  let done = 0;

  while (done < count) {
    const { bytes } = await file.read(count - done, { signal, into: { buffer: out, offset: done } });
    if (bytes.length === 0) break;
    done += bytes.length;
  }
  return out.subarray(0, done);
}

/** Write every byte of `data`; returns how many calls it took. */
export async function writeAll(file: DeviceFile, data: Uint8Array, signal?: AbortSignal): Promise<number> {
  let done = 0;
  let calls = 0;

  do {
    const { written } = await file.write(data, { signal, offset: done, length: data.length - done });
    done += written;
    calls++;
  } while (done < data.length);

  return calls;
}
