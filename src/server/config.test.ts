import { describe, expect, it } from "vitest";
import { ConfigError, loadConfig } from "./config";

describe("loadConfig", () => {
  it("falls back to the defaults", () => {
    expect(loadConfig({})).toEqual({
      quantum: 4000,
      qset: 1000,
      deviceCount: 4,
      firstMinor: 0,
      memoryLimit: 0,
      httpPort: 5500,
    });
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      MEMDEV_QUANTUM: "512",
      MEMDEV_QSET: " 64 ",
      MEMDEV_DEVICES: "2",
      MEMDEV_FIRST_MINOR: "3",
      MEMDEV_MEMORY_LIMIT: "1048576",
      HTTP_PORT: "0",
    });
    expect(config).toEqual({
      quantum: 512,
      qset: 64,
      deviceCount: 2,
      firstMinor: 3,
      memoryLimit: 1_048_576,
      httpPort: 0,
    });
  });

  it("names the variable that is wrong", () => {
    expect(() => loadConfig({ MEMDEV_QUANTUM: "lots" })).toThrow('MEMDEV_QUANTUM: expected an integer, got "lots"');
    expect(() => loadConfig({ MEMDEV_DEVICES: "0" })).toThrow(ConfigError);
    expect(() => loadConfig({ HTTP_PORT: "70000" })).toThrow("HTTP_PORT: expected 0..65535, got 70000");
  });

  it("rejects a geometry whose set size overflows", () => {
    try {
      loadConfig({ MEMDEV_QUANTUM: String(2 ** 40), MEMDEV_QSET: String(2 ** 20) });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      expect(err).toMatchObject({ variable: "MEMDEV_QSET" });
    }
  });
});
