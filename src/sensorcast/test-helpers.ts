import type {
  CapabilitySource,
  Connection,
  LocationFix,
  LocationListener,
  Logger,
  PermissionStatus,
  RadioScanResults,
  ScanRadio,
  ScanSourceListener,
  ScanStartResult,
  SendResult,
  SensorDescriptor,
  SensorListener,
  SensorReading,
} from "./domain.js";

export type LogEntry = { level: "debug" | "info" | "warn" | "error"; event: unknown; meta: unknown };

export function createRecordingLogger(): Logger & { entries: LogEntry[]; events(level: LogEntry["level"]): unknown[] } {
  const entries: LogEntry[] = [];
  const record =
    (level: LogEntry["level"]) =>
    (event?: unknown, meta?: unknown) => {
      entries.push({ level, event, meta });
    };
  return {
    entries,
    debug: record("debug"),
    info: record("info"),
    warn: record("warn"),
    error: record("error"),
    events: (level) => entries.filter((entry) => entry.level === level).map((entry) => entry.event),
  };
}

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};

export class FakeConnection implements Connection {
  readonly sent: string[] = [];
  closed: { code: number; reason: string } | null = null;
  open = true;
  failWrites = false;

  constructor(
    readonly id: string,
    readonly remoteAddress = "127.0.0.1",
  ) {}

  isOpen() {
    return this.open;
  }

  send(data: string): Promise<SendResult> {
    if (this.failWrites) {
      return Promise.resolve({ ok: false, error: new Error("broken pipe") });
    }
    this.sent.push(data);
    return Promise.resolve({ ok: true });
  }

  close(code: number, reason: string) {
    this.open = false;
    this.closed = { code, reason };
  }

  frames(): unknown[] {
    return this.sent.map((frame) => JSON.parse(frame));
  }
}

export const ACCELEROMETER: SensorDescriptor = { type: "accelerometer", name: "Test Accelerometer" };
export const GYROSCOPE: SensorDescriptor = { type: "gyroscope", name: "Test Gyroscope" };

export function reading(values: number[], timestamp = 1_000, accuracy = 3): SensorReading {
  return { values, accuracy, timestamp };
}

export function fix(overrides: Partial<LocationFix> = {}): LocationFix {
  return {
    latitude: 1.5,
    longitude: 2.5,
    altitude: 10,
    bearing: 90,
    accuracy: 4,
    speed: 0.5,
    timestamp: 2_000,
    ...overrides,
  };
}

/** In-process stand-in for the host platform with hooks to drive each collaborator. */
export function createFakeSource(sensors: SensorDescriptor[] = [ACCELEROMETER, GYROSCOPE]) {
  const sensorListeners = new Map<string, SensorListener>();
  const subscribeCalls: string[] = [];
  const unsubscribeCalls: string[] = [];
  const samplingPeriods: number[] = [];

  let locationPermission: PermissionStatus = { granted: true };
  let locationListener: LocationListener | null = null;
  let lastKnown: LocationFix | null = null;
  let locationRequests = 0;
  let locationCancels = 0;

  let scanPermission: PermissionStatus = { granted: true };
  let scanListener: ScanSourceListener | null = null;
  const startScanCalls: ScanRadio[] = [];
  const cancelScanCalls: ScanRadio[] = [];
  let nextStartResult: ScanStartResult = { started: true };

  const source: CapabilitySource = {
    sensors: {
      listSensors: () => sensors,
      subscribe(sensor, listener, samplingPeriodUs) {
        subscribeCalls.push(sensor.type);
        samplingPeriods.push(samplingPeriodUs);
        sensorListeners.set(sensor.type, listener);
        return {
          unsubscribe() {
            unsubscribeCalls.push(sensor.type);
            sensorListeners.delete(sensor.type);
          },
        };
      },
    },
    location: {
      checkPermission: () => locationPermission,
      requestUpdates(listener) {
        locationRequests += 1;
        locationListener = listener;
        return {
          cancel() {
            locationCancels += 1;
            locationListener = null;
          },
        };
      },
      getLastKnownLocation: () => Promise.resolve(lastKnown),
    },
    scans: {
      checkPermission: () => scanPermission,
      setListener(listener) {
        scanListener = listener;
      },
      startScan(radio) {
        startScanCalls.push(radio);
        return nextStartResult;
      },
      cancelScan(radio) {
        cancelScanCalls.push(radio);
      },
    },
  };

  return {
    source,
    subscribeCalls,
    unsubscribeCalls,
    samplingPeriods,
    startScanCalls,
    cancelScanCalls,
    emitReading(type: string, value: SensorReading) {
      const listener = sensorListeners.get(type);
      const sensor = sensors.find((entry) => entry.type === type);
      if (!listener || !sensor) {
        throw new Error(`sensor ${type} is not subscribed`);
      }
      listener(sensor, value);
    },
    isSensorActive: (type: string) => sensorListeners.has(type),
    pushFix(value: LocationFix) {
      locationListener?.(value);
    },
    setLastKnown(value: LocationFix | null) {
      lastKnown = value;
    },
    setLocationPermission(status: PermissionStatus) {
      locationPermission = status;
    },
    setScanPermission(status: PermissionStatus) {
      scanPermission = status;
    },
    setNextStartResult(result: ScanStartResult) {
      nextStartResult = result;
    },
    locationStats: () => ({ requests: locationRequests, cancels: locationCancels }),
    hasScanListener: () => scanListener !== null,
    scanStarted(radio: ScanRadio) {
      scanListener?.onScanStarted(radio);
    },
    scanCompleted(completion: RadioScanResults) {
      scanListener?.onScanCompleted(completion);
    },
    scanFailed(radio: ScanRadio, reason: string) {
      scanListener?.onScanFailed(radio, reason);
    },
  };
}

export async function flushMicrotasks(count = 20) {
  for (let i = 0; i < count; i += 1) {
    await Promise.resolve();
  }
}
