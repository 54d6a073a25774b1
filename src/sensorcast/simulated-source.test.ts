import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import type { LocationFix, RadioScanResults, SensorReading } from "./domain.js";
import { SIMULATED_SENSORS, createSimulatedCapabilitySource } from "./simulated-source.js";

describe("createSimulatedCapabilitySource", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("samples subscribed sensors at the requested period until unsubscribed", () => {
    const source = createSimulatedCapabilitySource({ now: () => 1_000 });
    expect(source.sensors.listSensors()).toEqual(SIMULATED_SENSORS);
    const readings: SensorReading[] = [];
    const subscription = source.sensors.subscribe(
      { type: "light", name: "Simulated Light Sensor" },
      (_sensor, value) => readings.push(value),
      100_000,
    );
    vi.advanceTimersByTime(300);
    expect(readings).toHaveLength(3);
    expect(readings[0]).toEqual({ values: [300 + 50 * Math.sin(0.1)], accuracy: 3, timestamp: 1_000 });

    subscription.unsubscribe();
    vi.advanceTimersByTime(300);
    expect(readings).toHaveLength(3);
  });

  it("walks around the origin and remembers the last fix", async () => {
    const source = createSimulatedCapabilitySource({
      origin: { latitude: 10, longitude: 20 },
      locationIntervalMs: 1_000,
    });
    await expect(source.location.getLastKnownLocation()).resolves.toBeNull();
    const fixes: LocationFix[] = [];
    const subscription = source.location.requestUpdates((value) => fixes.push(value));
    vi.advanceTimersByTime(2_000);
    subscription.cancel();
    expect(fixes).toHaveLength(2);
    await expect(source.location.getLastKnownLocation()).resolves.toBe(fixes[1]);
  });

  it("reports a scan start and completion through the listener", () => {
    const source = createSimulatedCapabilitySource({ now: () => 7, scanDurationMs: 200 });
    const started: string[] = [];
    const completed: RadioScanResults[] = [];
    source.scans.setListener({
      onScanStarted: (radio) => started.push(radio),
      onScanCompleted: (completion) => completed.push(completion),
      onScanFailed: () => {},
    });

    expect(source.scans.startScan("bluetooth")).toEqual({ started: true });
    expect(source.scans.startScan("bluetooth")).toEqual({
      started: false,
      reason: "bluetooth scan already running",
    });
    vi.advanceTimersByTime(200);
    expect(started).toEqual(["bluetooth"]);
    expect(completed).toEqual([
      {
        radio: "bluetooth",
        results: [{ name: "sim-beacon", address: "02:00:00:00:10:01", rssi: -60, timestamp: 7 }],
      },
    ]);
  });

  it("drops a cancelled scan", () => {
    const source = createSimulatedCapabilitySource({ scanDurationMs: 200 });
    const completed: RadioScanResults[] = [];
    source.scans.setListener({
      onScanStarted: () => {},
      onScanCompleted: (completion) => completed.push(completion),
      onScanFailed: () => {},
    });
    source.scans.startScan("wifi");
    source.scans.cancelScan("wifi");
    vi.advanceTimersByTime(500);
    expect(completed).toEqual([]);
    expect(source.scans.startScan("wifi")).toEqual({ started: true });
  });
});
