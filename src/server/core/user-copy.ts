import { BoundaryFaultError } from "./errors";

/**
 * Copies across the caller boundary. The caller names a region of its own
 * buffer; a region that does not fit inside that buffer faults before any
 * byte moves.
 */

function checkRegion(buf: Uint8Array, offset: number, count: number, side: string): void {
  if (
    !Number.isInteger(offset) || !Number.isInteger(count) ||
    offset < 0 || count < 0 || offset + count > buf.length
  ) {
    throw new BoundaryFaultError(
      `bad ${side} region [${offset}, ${offset + count}) for a ${buf.length}-byte buffer`,
    );
  }
}

/** device → caller */
export function copyToUser(
  dst: Uint8Array, dstOffset: number,
  src: Uint8Array, srcOffset: number,
  count: number,
): void {
  checkRegion(dst, dstOffset, count, "destination");
  dst.set(src.subarray(srcOffset, srcOffset + count), dstOffset);
}

/** caller → device */
export function copyFromUser(
  dst: Uint8Array, dstOffset: number,
  src: Uint8Array, srcOffset: number,
  count: number,
): void {
  checkRegion(src, srcOffset, count, "source");
  dst.set(src.subarray(srcOffset, srcOffset + count), dstOffset);
}
