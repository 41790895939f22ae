import type { Server as IOServer } from "socket.io";
import type { DeviceTable } from "../core/device-table";
import { isDeviceError } from "../core/errors";
import { logError, wsLogger as logger } from "../utils/logger";
import {
  accessParam,
  bytesParam,
  fieldsOf,
  intParam,
  optionalIntParam,
  whenceParam,
} from "../utils/params";
import { DeviceSession } from "./device-session";

export type AckResult =
  | ({ ok: true } & Record<string, unknown>)
  | { ok: false; code: string; message: string };

export type AckFn = (result: AckResult) => void;

export const roomFor = (minor: number) => `device:${minor}`;

/** Run one session call and turn its outcome into an acknowledgement. */
export async function settle(
  sessionId: string,
  op: string,
  fn: () => object | Promise<object>,
): Promise<AckResult> {
  try {
    return { ok: true, ...(await fn()) };
  } catch (error) {
    if (isDeviceError(error)) {
      logger.debug({ session: sessionId, op, code: error.code }, error.message);
      return { ok: false, code: error.code, message: error.message };
    }
    logError(logger, error, { session: sessionId, op });
    return { ok: false, code: "EIO", message: "internal error" };
  }
}

/**
 *  One socket = one DeviceSession.
 *    open {minor, access}  read {count}  write {data}
 *    seek {offset, whence} geometry {quantum?, qset?}  release
 *  Every event is acknowledged; writes and truncations broadcast "size"
 *  to the device's room.
 */
export function attachDeviceSessions(io: IOServer, table: DeviceTable): void {
  for (const dev of table.devices) {
    const room = roomFor(dev.minor);
    dev.on("write", ({ size }: { size: number }) => io.to(room).emit("size", { minor: dev.minor, size }));
    dev.on("trim", () => io.to(room).emit("size", { minor: dev.minor, size: 0 }));
  }

  io.on("connection", socket => {
    const session = new DeviceSession(table, socket.id);

    logger.info({
      socketId: socket.id,
      totalSockets: io.engine.clientsCount,
      remoteAddress: socket.handshake.address,
    }, "Socket connected");

    const handle = (
      event: string,
      fn: (fields: Record<string, unknown>) => object | Promise<object>,
    ) => {
      socket.on(event, (payload: unknown, ack?: unknown) => {
        const reply: AckFn = result => {
          if (typeof ack === "function") ack(result);
        };
        void settle(session.id, event, () => fn(fieldsOf(payload))).then(reply);
      });
    };

    handle("open", async fields => {
      const previous = session.minor;
      const opened = await session.open(intParam(fields.minor, "minor"), accessParam(fields.access));
      if (previous !== null && previous !== opened.minor) await socket.leave(roomFor(previous));
      await socket.join(roomFor(opened.minor));
      return opened;
    });

    handle("read", fields => session.read(intParam(fields.count, "count")));
    handle("write", fields => session.write(bytesParam(fields.data, "data")));
    handle("seek", fields => session.seek(intParam(fields.offset, "offset", undefined, Number.MIN_SAFE_INTEGER), whenceParam(fields.whence)));
    handle("geometry", fields => session.geometry({
      quantum: optionalIntParam(fields.quantum, "quantum", 1),
      qset: optionalIntParam(fields.qset, "qset", 1),
    }));
    handle("release", () => {
      session.release();
      return {};
    });

    socket.on("disconnect", reason => {
      session.close();
      logger.info({
        socketId: socket.id,
        totalSockets: io.engine.clientsCount,
        reason,
      }, "Socket disconnected");
    });
  });
}
