import express, { type NextFunction, type Request, type Response } from "express";
import type { DeviceTable } from "../core/device-table";
import { isDeviceError, type DeviceErrorCode } from "../core/errors";
import { formatMemDump } from "../core/mem-dump";
import { readRange, writeAll } from "../core/transfer";
import { httpLogger as logger, logError } from "../utils/logger";
import { boolParam, fieldsOf, intParam, optionalIntParam } from "../utils/params";

/** Largest range a single GET may ask for. */
export const MAX_HTTP_READ = 16 * 1024 * 1024;
/** Default cap on the text memory dump, one page's worth. */
export const MEMDUMP_LIMIT = 4096;

const STATUS_BY_CODE: Record<DeviceErrorCode, number> = {
  EINVAL: 400,
  EFAULT: 400,
  ENODEV: 404,
  EBADF: 409,
  EBUSY: 409,
  ENOMEM: 507,
  ERESTARTSYS: 503,
};

export function statusFor(error: unknown): number {
  return isDeviceError(error) ? STATUS_BY_CODE[error.code] : 500;
}

/** Aborts once the client goes away before we answered. */
function abortOnClose(res: Response): AbortSignal {
  const ctrl = new AbortController();
  res.on("close", () => {
    if (!res.writableFinished) ctrl.abort();
  });
  return ctrl.signal;
}

type Handler = (req: Request, res: Response) => Promise<void>;

const wrap = (fn: Handler) => (req: Request, res: Response, next: NextFunction) => {
  fn(req, res).catch(next);
};

export function createDeviceRouter(table: DeviceTable): express.Router {
  const router = express.Router();
  const startedAt = Date.now();

  // Health / metrics
  router.get("/status", (_req, res) => {
    res.json({
      quantum: table.defaults.quantum,
      qset: table.defaults.qset,
      deviceCount: table.devices.length,
      devices: table.minors,
      pool: table.pool.stats(),
      uptimeSec: Math.floor((Date.now() - startedAt) / 1000),
    });
  });

  router.get("/devices", wrap(async (_req, res) => {
    const dumps = await table.inspect(abortOnClose(res));
    res.json(dumps.map(d => ({ ...d, stats: table.device(d.minor).stats })));
  }));

  router.get("/memdump", wrap(async (req, res) => {
    // below 81 the dump could never hold a device
    const limit = intParam(req.query.limit, "limit", MEMDUMP_LIMIT, 81);
    const dumps = await table.inspect(abortOnClose(res));
    res.type("text/plain").send(formatMemDump(dumps, limit));
  }));

  // Random-access bytes
  router.get("/devices/:minor/data", wrap(async (req, res) => {
    const minor = intParam(req.params.minor, "minor");
    const offset = intParam(req.query.offset, "offset", 0);
    const len = intParam(req.query.len, "len", undefined, 1);
    if (len > MAX_HTTP_READ) {
      logger.warn({ minor, offset, len }, "Read range too large");
      res.status(400).json({ error: "EINVAL", message: `len exceeds ${MAX_HTTP_READ}` });
      return;
    }

    const signal = abortOnClose(res);
    const file = await table.open(minor, "r", signal);
    try {
      file.llseek(offset, "set");
      const bytes = await readRange(file, len, signal);
      res.type("application/octet-stream").send(Buffer.from(bytes.buffer, bytes.byteOffset, bytes.length));
    } finally {
      file.release();
    }
  }));

  router.put("/devices/:minor/data", express.raw({ type: () => true, limit: MAX_HTTP_READ }), wrap(async (req, res) => {
    const minor = intParam(req.params.minor, "minor");
    const offset = intParam(req.query.offset, "offset", 0);
    const truncate = boolParam(req.query.truncate);
    const body: unknown = req.body;
    const data = body instanceof Uint8Array ? body : new Uint8Array(0);

    const signal = abortOnClose(res);
    const file = await table.open(minor, truncate ? "w" : "rw", signal);
    try {
      file.llseek(offset, "set");
      const calls = await writeAll(file, data, signal);
      logger.debug({ minor, offset, bytes: data.length, calls }, "Range written");
      res.json({ written: data.length, pos: file.pos, size: file.device.size });
    } finally {
      file.release();
    }
  }));

  router.delete("/devices/:minor/data", wrap(async (req, res) => {
    const minor = intParam(req.params.minor, "minor");
    const file = await table.open(minor, "w", abortOnClose(res));
    file.release();
    res.status(204).end();
  }));

  router.put("/devices/:minor/geometry", express.json(), wrap(async (req, res) => {
    const minor = intParam(req.params.minor, "minor");
    const fields = fieldsOf(req.body);
    const geometry = await table.device(minor).setGeometry({
      quantum: optionalIntParam(fields.quantum, "quantum", 1),
      qset: optionalIntParam(fields.qset, "qset", 1),
    }, abortOnClose(res));
    res.json(geometry);
  }));

  router.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const status = statusFor(err);
    if (status >= 500 && !isDeviceError(err)) {
      logError(logger, err, { method: req.method, url: req.originalUrl });
    }
    if (res.headersSent) return;

    res.status(status).json(isDeviceError(err)
      ? { error: err.code, message: err.message }
      : { error: "EIO", message: "internal error" });
  });

  return router;
}
