import type { DeviceDump } from "./device";

export function formatHandle(handle: number | null): string {
  return handle === null ? "(null)" : `0x${handle.toString(16).padStart(8, "0")}`;
}

/** Text listing of one device: header, one line per set, occupied slots of the last set. */
export function formatDevice(dump: DeviceDump): string {
  let out =
    `Device ${dump.index}: ${dump.items} items (qset=${dump.qset}, quantum=${dump.quantum}), size = ${dump.size}\n`;

  for (const set of dump.sets) {
    out += `  item at ${formatHandle(set.handle)}; qset at ${formatHandle(set.slots)}\n`;
  }
  for (const { slot, handle } of dump.lastSlots) {
    out += `    ${String(slot).padStart(4)}: ${formatHandle(handle)}\n`;
  }
  return out;
}

/**
 * Whole-table listing. With `limit`, devices stop being added once the
 * output is within 80 bytes of it (a device block itself is never cut).
 */
export function formatMemDump(dumps: readonly DeviceDump[], limit?: number): string {
  let out = "";
  for (const dump of dumps) {
    if (limit !== undefined && out.length >= limit - 80) break;
    out += formatDevice(dump);
  }
  return out;
}
