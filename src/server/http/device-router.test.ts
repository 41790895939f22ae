import { createServer, type Server } from "node:http";
import express from "express";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { DeviceConfig } from "../config";
import { DeviceTable } from "../core/device-table";
import {
  AllocationFailureError,
  CancelledError,
  DeviceBusyError,
  InvalidArgumentError,
  NoSuchDeviceError,
} from "../core/errors";
import { createDeviceRouter, statusFor } from "./device-router";

const config: DeviceConfig = {
  quantum: 4,
  qset: 2,
  deviceCount: 2,
  firstMinor: 0,
  memoryLimit: 0,
};

describe("statusFor", () => {
  it("maps device errors onto HTTP status codes", () => {
    expect(statusFor(new InvalidArgumentError("bad"))).toBe(400);
    expect(statusFor(new NoSuchDeviceError(9))).toBe(404);
    expect(statusFor(new DeviceBusyError("busy"))).toBe(409);
    expect(statusFor(new AllocationFailureError("quantum"))).toBe(507);
    expect(statusFor(new CancelledError())).toBe(503);
  });

  it("treats anything else as a server error", () => {
    expect(statusFor(new Error("boom"))).toBe(500);
    expect(statusFor("boom")).toBe(500);
  });
});

describe("device routes", () => {
  let table: DeviceTable;
  let server: Server;
  let base: string;

  beforeEach(async () => {
    table = new DeviceTable(config);
    const app = express();
    app.use("/v1", createDeviceRouter(table));

    server = createServer(app);
    await new Promise<void>(resolve => server.listen(0, "127.0.0.1", resolve));
    const addr = server.address();
    if (!addr || typeof addr === "string") throw new Error("server has no TCP address");
    base = `http://127.0.0.1:${addr.port}/v1`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
  });

  const put = (path: string, body: string) =>
    fetch(`${base}${path}`, {
      method: "PUT",
      headers: { "content-type": "application/octet-stream" },
      body,
    });

  it("writes a raw body and reads a range of it back", async () => {
    const written = await put("/devices/0/data", "hello world");
    expect(written.status).toBe(200);
    expect(await written.json()).toEqual({ written: 11, pos: 11, size: 11 });

    const read = await fetch(`${base}/devices/0/data?offset=6&len=5`);
    expect(read.status).toBe(200);
    expect(read.headers.get("content-type")).toBe("application/octet-stream");
    expect(await read.text()).toBe("world");
  });

  it("writes at an offset", async () => {
    await put("/devices/1/data", "abcdefgh");
    const res = await put("/devices/1/data?offset=2", "XY");
    expect(await res.json()).toEqual({ written: 2, pos: 4, size: 8 });

    const read = await fetch(`${base}/devices/1/data?len=8`);
    expect(await read.text()).toBe("abXYefgh");
  });

  it("truncates before writing when asked", async () => {
    await put("/devices/0/data", "abcdef");
    const res = await put("/devices/0/data?truncate=true", "xy");
    expect(await res.json()).toEqual({ written: 2, pos: 2, size: 2 });

    const read = await fetch(`${base}/devices/0/data?len=6`);
    expect(await read.text()).toBe("xy");
  });

  it("rejects a read range over the per-request cap", async () => {
    const res = await fetch(`${base}/devices/0/data?len=16777217`);
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "EINVAL", message: "len exceeds 16777216" });
  });

  it("rejects a missing len", async () => {
    const res = await fetch(`${base}/devices/0/data`);
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "EINVAL", message: "missing len" });
  });

  it("answers 404 for an unknown minor", async () => {
    const res = await fetch(`${base}/devices/9/data?len=1`);
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "ENODEV", message: "no device with minor 9" });
  });

  it("trims a device on DELETE", async () => {
    await put("/devices/0/data", "abcdef");
    expect(table.device(0).size).toBe(6);

    const res = await fetch(`${base}/devices/0/data`, { method: "DELETE" });
    expect(res.status).toBe(204);
    expect(table.device(0).size).toBe(0);

    const devices = await fetch(`${base}/devices`);
    const dumps: unknown = await devices.json();
    expect(dumps).toMatchObject([{ minor: 0, items: 0, size: 0 }, { minor: 1, items: 0 }]);
    expect(table.pool.inUse).toBe(0);
  });

  it("refuses a geometry change once the device holds data", async () => {
    const geometry = (minor: number, body: object) =>
      fetch(`${base}/devices/${minor}/geometry`, {
        method: "PUT",
        headers: { "content-type": "application/json" },
        body: JSON.stringify(body),
      });

    const ok = await geometry(1, { quantum: 8 });
    expect(await ok.json()).toEqual({ quantum: 8, qset: 2 });

    await put("/devices/0/data", "a");
    const busy = await geometry(0, { quantum: 8 });
    expect(busy.status).toBe(409);
    expect(await busy.json()).toMatchObject({ error: "EBUSY" });
  });

  it("reports the default geometry and device count on /status", async () => {
    const res = await fetch(`${base}/status`);
    expect(await res.json()).toMatchObject({
      quantum: 4,
      qset: 2,
      deviceCount: 2,
      devices: [0, 1],
      pool: { inUse: 0, failures: 0 },
    });
  });

  it("caps the memory dump at the requested limit", async () => {
    const full = await fetch(`${base}/memdump`);
    expect(await full.text()).toBe(
      "Device 0: 0 items (qset=2, quantum=4), size = 0\n" +
      "Device 1: 0 items (qset=2, quantum=4), size = 0\n",
    );

    // one device block already brings the output within 80 bytes of 81
    const capped = await fetch(`${base}/memdump?limit=81`);
    expect(await capped.text()).toBe("Device 0: 0 items (qset=2, quantum=4), size = 0\n");

    const tooSmall = await fetch(`${base}/memdump?limit=80`);
    expect(tooSmall.status).toBe(400);
  });
});
