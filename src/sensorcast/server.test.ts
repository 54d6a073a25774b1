import { afterEach, describe, expect, it, vi } from "vitest";
import WebSocket from "ws";

import type { ConnectionSummary, SensorServer, ServerConfigInput } from "./domain.js";
import { ConfigError } from "./errors.js";
import { createSensorServer } from "./server.js";
import { createFakeSource, fix, reading, silentLogger } from "./test-helpers.js";

const servers: SensorServer[] = [];
const clients: WebSocket[] = [];

afterEach(async () => {
  for (const ws of clients.splice(0)) {
    ws.terminate();
  }
  for (const server of servers.splice(0)) {
    await server.stop();
  }
});

const decodeRawData = (data: WebSocket.RawData): string => {
  if (Buffer.isBuffer(data)) {
    return data.toString("utf8");
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString("utf8");
  }
  return Buffer.from(data).toString("utf8");
};

function createMessageQueue(ws: WebSocket) {
  const queued: string[] = [];
  const waiters: Array<(value: string) => void> = [];
  ws.on("message", (data: WebSocket.RawData) => {
    const text = decodeRawData(data);
    const waiter = waiters.shift();
    if (waiter) {
      waiter(text);
      return;
    }
    queued.push(text);
  });
  return {
    next: (): Promise<string> => {
      const head = queued.shift();
      return head !== undefined
        ? Promise.resolve(head)
        : new Promise((resolve) => waiters.push(resolve));
    },
    size: () => queued.length,
  };
}

function waitForOpen(ws: WebSocket): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      cleanup();
      reject(new Error("WebSocket open timeout"));
    }, 2000);
    const cleanup = () => {
      clearTimeout(timer);
      ws.off("open", handleOpen);
      ws.off("error", handleError);
    };
    const handleOpen = () => {
      cleanup();
      resolve();
    };
    const handleError = (err: Error) => {
      cleanup();
      reject(err);
    };
    ws.once("open", handleOpen);
    ws.once("error", handleError);
  });
}

function waitForClose(ws: WebSocket): Promise<{ code: number; reason: string }> {
  return new Promise((resolve) => {
    ws.once("close", (code, reason) => resolve({ code, reason: reason.toString("utf8") }));
  });
}

async function setupServer(config: ServerConfigInput = {}) {
  const fake = createFakeSource();
  const onConnectionsChange = vi.fn<(connections: ConnectionSummary[]) => void>();
  const server = createSensorServer({
    config: { port: 0, location: { pollIntervalMs: 60_000 }, ...config },
    source: fake.source,
    logger: silentLogger,
    onConnectionsChange,
  });
  await server.start();
  servers.push(server);
  const port = server.getPort();

  const connect = (resource: string) => {
    const ws = new WebSocket(`ws://127.0.0.1:${port}${resource}`);
    ws.on("error", () => {});
    clients.push(ws);
    return { ws, messages: createMessageQueue(ws), closed: waitForClose(ws) };
  };

  return { fake, server, port, connect, onConnectionsChange };
}

describe("sensor server", () => {
  it("shares one hardware subscription between clients and releases it once", async () => {
    const { fake, server, connect } = await setupServer();
    const a = connect("/sensor/connect?type=accelerometer");
    const b = connect("/sensor/connect?type=accelerometer");
    await Promise.all([waitForOpen(a.ws), waitForOpen(b.ws)]);
    expect(fake.subscribeCalls).toEqual(["accelerometer"]);
    expect(fake.samplingPeriods).toEqual([200_000]);

    fake.emitReading("accelerometer", reading([0.1, 0.2, 9.8], 1234));
    const [frameA, frameB] = await Promise.all([a.messages.next(), b.messages.next()]);
    expect(frameA).toBe(frameB);
    expect(JSON.parse(frameA)).toEqual({
      type: "accelerometer",
      name: "Test Accelerometer",
      values: [0.1, 0.2, 9.8],
      accuracy: 3,
      timestamp: 1234,
    });

    a.ws.close();
    b.ws.close();
    await Promise.all([a.closed, b.closed]);
    await vi.waitFor(() => expect(server.getConnectionCount()).toBe(0));
    expect(fake.unsubscribeCalls).toEqual(["accelerometer"]);
  });

  it("closes a one-entry list request with 4007", async () => {
    const { fake, connect } = await setupServer();
    const client = connect(`/sensors/connect?types=${encodeURIComponent('["accelerometer"]')}`);
    await expect(client.closed).resolves.toEqual({
      code: 4007,
      reason: "At least two sensor types must be specified",
    });
    expect(fake.subscribeCalls).toEqual([]);
  });

  it("closes an unknown sensor with 4001", async () => {
    const { connect } = await setupServer();
    const client = connect("/sensor/connect?type=bogus_sensor");
    await expect(client.closed).resolves.toEqual({
      code: 4001,
      reason: "Sensor of type bogus_sensor not found",
    });
  });

  it("closes an unsupported path with 4002", async () => {
    const { connect } = await setupServer();
    const client = connect("/camera");
    await expect(client.closed).resolves.toEqual({ code: 4002, reason: "unsupported request" });
  });

  it("closes with 4009 when location permission is missing", async () => {
    const { fake, connect } = await setupServer();
    fake.setLocationPermission({ granted: false, reason: "Location disabled" });
    const client = connect("/gps");
    await expect(client.closed).resolves.toEqual({ code: 4009, reason: "Location disabled" });
    expect(fake.locationStats().requests).toBe(0);
  });

  it("sends the last known fix on connect and on request", async () => {
    const { fake, connect } = await setupServer();
    fake.setLastKnown(fix({ timestamp: 55 }));
    const client = connect("/gps");
    await waitForOpen(client.ws);
    const expected = {
      type: "gps",
      name: "Global Positioning System",
      latitude: 1.5,
      longitude: 2.5,
      altitude: 10,
      bearing: 90,
      accuracy: 4,
      speed: 0.5,
      timestamp: 55,
      lastKnownLocation: true,
    };
    expect(JSON.parse(await client.messages.next())).toEqual(expected);

    client.ws.send("getLastKnownLocation");
    expect(JSON.parse(await client.messages.next())).toEqual(expected);

    fake.pushFix(fix({ timestamp: 60 }));
    expect(JSON.parse(await client.messages.next())).toEqual({
      ...expected,
      timestamp: 60,
      lastKnownLocation: false,
    });
  });

  it("tags every frame of a list connection with its capability", async () => {
    const { fake, connect } = await setupServer();
    const client = connect(
      `/sensors/connect?types=${encodeURIComponent('["accelerometer","gyroscope"]')}`,
    );
    await waitForOpen(client.ws);
    expect(fake.subscribeCalls).toEqual(["accelerometer", "gyroscope"]);

    fake.emitReading("gyroscope", reading([1], 5));
    fake.emitReading("accelerometer", reading([2], 6));
    expect(JSON.parse(await client.messages.next())).toMatchObject({ type: "gyroscope", values: [1] });
    expect(JSON.parse(await client.messages.next())).toMatchObject({
      type: "accelerometer",
      values: [2],
    });
  });

  it("streams scan results to scan subscribers", async () => {
    const { fake, connect } = await setupServer();
    const client = connect("/sensor/connect?type=wifi_scan");
    await waitForOpen(client.ws);
    expect(fake.startScanCalls).toEqual(["wifi"]);

    const net = { bssid: "02:00:00:00:00:01", ssid: "test-net", rssi: -40, frequency: 2412, timestamp: 8 };
    fake.scanStarted("wifi");
    fake.scanCompleted({ radio: "wifi", results: [net] });
    expect(JSON.parse(await client.messages.next())).toEqual({ type: "wifi_scan", values: [net] });
  });

  it("keeps scanning while any client holds a scan and stops after the last leaves", async () => {
    const { fake, server, connect } = await setupServer({ scans: { intervalMs: 100 } });
    // A refused start leaves the radio idle, so every tick asks again.
    fake.setNextStartResult({ started: false, reason: "radio busy" });
    const a = connect("/sensor/connect?type=wifi_scan");
    const b = connect("/sensor/connect?type=wifi_scan");
    await Promise.all([waitForOpen(a.ws), waitForOpen(b.ws)]);
    expect(fake.startScanCalls).toEqual(["wifi"]);

    a.ws.close();
    await a.closed;
    await vi.waitFor(() => expect(server.getConnectionCount()).toBe(1));
    const afterFirstLeft = fake.startScanCalls.length;
    await vi.waitFor(() => expect(fake.startScanCalls.length).toBeGreaterThan(afterFirstLeft));

    b.ws.close();
    await b.closed;
    await vi.waitFor(() => expect(server.getConnectionCount()).toBe(0));
    const afterLastLeft = fake.startScanCalls.length;
    await new Promise((resolve) => setTimeout(resolve, 350));
    expect(fake.startScanCalls.length).toBe(afterLastLeft);
  });

  it("answers last-known requests on a list that includes gps only", async () => {
    const { fake, connect } = await setupServer();
    fake.setLastKnown(fix({ timestamp: 70 }));
    const withGps = connect(`/sensors/connect?types=${encodeURIComponent('["accelerometer","gps"]')}`);
    const withoutGps = connect("/sensor/connect?type=accelerometer");
    await Promise.all([waitForOpen(withGps.ws), waitForOpen(withoutGps.ws)]);
    const expected = {
      type: "gps",
      name: "Global Positioning System",
      latitude: 1.5,
      longitude: 2.5,
      altitude: 10,
      bearing: 90,
      accuracy: 4,
      speed: 0.5,
      timestamp: 70,
      lastKnownLocation: true,
    };
    expect(JSON.parse(await withGps.messages.next())).toEqual(expected);

    withGps.ws.send("getLastKnownLocation");
    withoutGps.ws.send("getLastKnownLocation");
    expect(JSON.parse(await withGps.messages.next())).toEqual(expected);

    // The accelerometer-only client's next frame is the reading, not a location reply.
    fake.emitReading("accelerometer", reading([1], 71));
    expect(JSON.parse(await withoutGps.messages.next())).toMatchObject({
      type: "accelerometer",
      timestamp: 71,
    });
  });

  it("broadcasts touch events to every connection", async () => {
    const { server, connect } = await setupServer();
    const sensorClient = connect("/sensor/connect?type=gyroscope");
    const touchClient = connect("/touchscreen");
    await Promise.all([waitForOpen(sensorClient.ws), waitForOpen(touchClient.ws)]);

    await server.publishTouch({ action: "UP", x: 3, y: 4, timestamp: 9 });
    const expected = { type: "touchscreen", action: "ACTION_UP", x: 3, y: 4, timestamp: 9 };
    expect(JSON.parse(await sensorClient.messages.next())).toEqual(expected);
    expect(JSON.parse(await touchClient.messages.next())).toEqual(expected);
  });

  it("lets the host close a connection with 4005", async () => {
    const { server, connect, onConnectionsChange } = await setupServer();
    const client = connect("/touchscreen");
    await waitForOpen(client.ws);

    const [summary] = server.listConnections();
    expect(summary).toMatchObject({
      remoteAddress: "127.0.0.1",
      capabilities: ["touchscreen"],
      attachment: "touch",
    });
    expect(onConnectionsChange).toHaveBeenLastCalledWith([summary]);

    expect(server.closeConnection(summary?.id ?? "")).toBe(true);
    expect(server.closeConnection("missing")).toBe(false);
    await expect(client.closed).resolves.toEqual({
      code: 4005,
      reason: "Connection closed by host user",
    });
    expect(server.getConnectionCount()).toBe(0);
    expect(onConnectionsChange).toHaveBeenLastCalledWith([]);
  });

  it("serves the capability catalogue and port over HTTP", async () => {
    const { port } = await setupServer();
    const sensors = await fetch(`http://127.0.0.1:${port}/sensors`);
    expect(sensors.status).toBe(200);
    expect(await sensors.json()).toEqual([
      { name: "Test Accelerometer", type: "accelerometer" },
      { name: "Test Gyroscope", type: "gyroscope" },
      { name: "WiFi Scanner", type: "wifi_scan" },
      { name: "Bluetooth Scanner", type: "bluetooth_scan" },
      { name: "Network Scanner", type: "network_scan" },
    ]);

    const wsport = await fetch(`http://127.0.0.1:${port}/wsport`);
    expect(await wsport.json()).toEqual({ portNo: port });

    const missing = await fetch(`http://127.0.0.1:${port}/nope`);
    expect(missing.status).toBe(404);
    expect(await missing.json()).toEqual({ error: "not_found", message: "Not found" });
  });

  it("closes every connection with 4004 on stop and releases hardware", async () => {
    const { fake, server, connect } = await setupServer();
    const client = connect("/sensor/connect?type=accelerometer");
    await waitForOpen(client.ws);

    await server.stop();
    await expect(client.closed).resolves.toEqual({ code: 4004, reason: "Server stopped" });
    expect(fake.unsubscribeCalls).toEqual(["accelerometer"]);
    expect(server.isRunning()).toBe(false);
    expect(fake.hasScanListener()).toBe(false);
    await expect(server.start()).rejects.toThrow("server was stopped; create a new instance");
  });

  it("fails to start on a busy port without reporting itself running", async () => {
    const { port } = await setupServer();
    const fake = createFakeSource();
    const second = createSensorServer({ config: { port }, source: fake.source, logger: silentLogger });
    await expect(second.start()).rejects.toMatchObject({ code: "EADDRINUSE" });
    expect(second.isRunning()).toBe(false);
    expect(fake.hasScanListener()).toBe(false);
  });

  it("refuses to bind a public address unless allowed", () => {
    const { source } = createFakeSource();
    expect(() =>
      createSensorServer({
        config: { network: { bindAddress: "0.0.0.0" } },
        source,
        logger: silentLogger,
      }),
    ).toThrow(ConfigError);
  });
});
