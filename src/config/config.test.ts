import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ConfigError } from "../sensorcast/errors.js";
import { loadConfig, parseConfig } from "./config.js";

function configErrorOf(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigError) {
      return err;
    }
    throw err;
  }
  throw new Error("expected a ConfigError");
}

describe("parseConfig", () => {
  it("accepts a full config", () => {
    const raw = {
      enabled: false,
      port: 9000,
      network: { bindAddress: "0.0.0.0", allowPublic: true },
      sensors: { samplingPeriodUs: 100_000 },
      scans: { intervalMs: 30_000 },
      location: { pollIntervalMs: 1_000, maxAccuracyMeters: null },
      logging: { level: "debug" },
    };
    expect(parseConfig(raw)).toEqual(raw);
  });

  it("reports the path of an invalid value", () => {
    const err = configErrorOf(() => parseConfig({ scans: { intervalMs: -5 } }, "test.json"));
    expect(err.path).toBe("scans.intervalMs");
    expect(err.message.startsWith("test.json: scans.intervalMs: ")).toBe(true);
  });

  it("rejects unknown keys", () => {
    const err = configErrorOf(() => parseConfig({ port: 1, tls: true }));
    expect(err.path).toBe("<root>");
  });

  it("rejects a non-boolean enabled flag", () => {
    expect(configErrorOf(() => parseConfig({ enabled: "no" })).path).toBe("enabled");
  });

  it("rejects logging options other than the level", () => {
    const err = configErrorOf(() => parseConfig({ logging: { level: "info", pretty: true } }));
    expect(err.path).toBe("logging");
  });

  it("rejects an unknown log level", () => {
    expect(configErrorOf(() => parseConfig({ logging: { level: "loud" } })).path).toBe("logging.level");
  });
});

describe("loadConfig", () => {
  let dir = "";

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "sensorcast-config-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("reads and validates a JSON file", async () => {
    const file = path.join(dir, "sensorcast.json");
    await fs.writeFile(file, JSON.stringify({ port: 8081, location: { maxAccuracyMeters: 25 } }));
    await expect(loadConfig(file)).resolves.toEqual({ port: 8081, location: { maxAccuracyMeters: 25 } });
  });

  it("treats a missing file as an empty config", async () => {
    await expect(loadConfig(path.join(dir, "missing.json"))).resolves.toEqual({});
  });

  it("rejects malformed JSON", async () => {
    const file = path.join(dir, "broken.json");
    await fs.writeFile(file, "{ port: ");
    await expect(loadConfig(file)).rejects.toBeInstanceOf(ConfigError);
  });
});
