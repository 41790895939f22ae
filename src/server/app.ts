// ===========================================================================
//  src/server/app.ts   (HTTP + WS façade over the memory devices)
// ===========================================================================

import express from "express";
import helmet from "helmet";
import compression from "compression";
import { createServer } from "node:http";
import { Server as IOServer } from "socket.io";
import pinoHttp from "pino-http";

import { loadConfig, REST_ROOT, WS_PATH } from "./config";
import { DeviceTable } from "./core/device-table";
import { createDeviceRouter } from "./http/device-router";
import { attachDeviceSessions } from "./ws/attach";
import {
  logger,
  httpLogger,
  startupLogger,
  logError,
  logPerformance,
} from "./utils/logger";

const startTime = Date.now();

try {
  const config = loadConfig();

  startupLogger.info({
    ...config,
    REST_ROOT,
    WS_PATH,
    NODE_ENV: process.env.NODE_ENV,
  }, "Starting memdev server");

  // ────────────────  Instantiate domain objects  ────────────────────────────
  const table = new DeviceTable(config);

  // ────────────────  Express / REST  ────────────────────────────────────────
  const app = express();
  const http = createServer(app);

  app.use(pinoHttp({
    logger: httpLogger,
    autoLogging: {
      ignore: (req) => req.url?.startsWith(`${REST_ROOT}/status`) ?? false,
    },
    customLogLevel: (_req, res, err) => {
      if (res.statusCode >= 400 && res.statusCode < 500) return "warn";
      if (res.statusCode >= 500 || err) return "error";
      return "debug";
    },
    serializers: {
      req: (req: { method?: string; url?: string }) => ({
        method: req.method,
        url: req.url,
      }),
      res: (res: { statusCode?: number }) => ({
        statusCode: res.statusCode,
      }),
    },
  }));

  app
    .use(helmet())
    .use(compression());

  app.use(REST_ROOT, createDeviceRouter(table));

  // ────────────────  WebSocket layer  ───────────────────────────────────────
  const io = new IOServer(http, {
    path: WS_PATH,
    cors: { origin: "*" },
    serveClient: false,
    pingInterval: 25_000,
    pingTimeout: 20_000,
  });

  attachDeviceSessions(io, table);

  // ────────────────  Startup  ───────────────────────────────────────────────
  http.listen(config.httpPort, () => {
    logPerformance(startupLogger, "server-startup", startTime);
    startupLogger.info({
      port: config.httpPort,
      wsPath: WS_PATH,
      restRoot: REST_ROOT,
      minors: table.minors,
    }, `Server listening on port ${config.httpPort}`);
  });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info({ signal }, "Shutting down");

    try {
      await new Promise<void>(resolve => io.close(() => resolve()));
      await table.shutdown();
      logger.info("Cleanup completed successfully");
      process.exit(0);
    } catch (error) {
      logError(logger, error, { context: "shutdown" });
      process.exit(1);
    }
  };

  process.once("SIGTERM", () => void shutdown("SIGTERM"));
  process.once("SIGINT", () => void shutdown("SIGINT"));

} catch (error) {
  logError(startupLogger, error, { context: "startup-failure" });
  process.exit(1);
}
