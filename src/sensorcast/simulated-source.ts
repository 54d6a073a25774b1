import type {
  BluetoothScanResult,
  CapabilitySource,
  LocationFix,
  LocationListener,
  LocationSource,
  ScanRadio,
  ScanSource,
  ScanSourceListener,
  SensorDescriptor,
  SensorSource,
  WifiScanResult,
} from "./domain.js";

export const SIMULATED_SENSORS: readonly SensorDescriptor[] = [
  { type: "accelerometer", name: "Simulated Accelerometer" },
  { type: "gyroscope", name: "Simulated Gyroscope" },
  { type: "light", name: "Simulated Light Sensor" },
];

const MIN_SAMPLE_INTERVAL_MS = 10;

export type SimulatedSourceOptions = {
  now?: () => number;
  /** Origin of the simulated walk. */
  origin?: { latitude: number; longitude: number };
  locationIntervalMs?: number;
  scanDurationMs?: number;
};

function sampleValues(type: string, t: number): number[] {
  const phase = t / 1000;
  switch (type) {
    case "accelerometer":
      return [Math.sin(phase), Math.cos(phase), 9.81];
    case "gyroscope":
      return [0.1 * Math.sin(phase / 2), 0.1 * Math.cos(phase / 2), 0];
    default:
      return [300 + 50 * Math.sin(phase / 10)];
  }
}

function createSimulatedSensors(now: () => number): SensorSource {
  return {
    listSensors: () => SIMULATED_SENSORS.map((sensor) => ({ ...sensor })),
    subscribe(sensor, listener, samplingPeriodUs) {
      const intervalMs = Math.max(MIN_SAMPLE_INTERVAL_MS, Math.round(samplingPeriodUs / 1000));
      const timer = setInterval(() => {
        const timestamp = now();
        listener(sensor, { values: sampleValues(sensor.type, timestamp), accuracy: 3, timestamp });
      }, intervalMs);
      timer.unref();
      return { unsubscribe: () => clearInterval(timer) };
    },
  };
}

function createSimulatedLocation(
  now: () => number,
  origin: { latitude: number; longitude: number },
  intervalMs: number,
): LocationSource {
  let step = 0;
  let lastFix: LocationFix | null = null;

  function nextFix(): LocationFix {
    step += 1;
    const angle = step / 20;
    return {
      latitude: origin.latitude + 0.0005 * Math.sin(angle),
      longitude: origin.longitude + 0.0005 * Math.cos(angle),
      altitude: 12,
      bearing: (angle * 180) / Math.PI,
      accuracy: 5,
      speed: 1.4,
      timestamp: now(),
    };
  }

  return {
    checkPermission: () => ({ granted: true }),
    requestUpdates(listener: LocationListener) {
      const timer = setInterval(() => {
        lastFix = nextFix();
        listener(lastFix);
      }, intervalMs);
      timer.unref();
      return { cancel: () => clearInterval(timer) };
    },
    getLastKnownLocation: () => Promise.resolve(lastFix),
  };
}

function createSimulatedScans(now: () => number, scanDurationMs: number): ScanSource {
  let listener: ScanSourceListener | null = null;
  const running = new Map<ScanRadio, NodeJS.Timeout>();

  function wifiResults(timestamp: number): WifiScanResult[] {
    return [
      { bssid: "02:00:00:00:00:01", ssid: "sim-net-1", rssi: -48, frequency: 2412, timestamp },
      { bssid: "02:00:00:00:00:02", ssid: "sim-net-2", rssi: -71, frequency: 5180, timestamp },
    ];
  }

  function bluetoothResults(timestamp: number): BluetoothScanResult[] {
    return [{ name: "sim-beacon", address: "02:00:00:00:10:01", rssi: -60, timestamp }];
  }

  return {
    checkPermission: () => ({ granted: true }),
    setListener(next) {
      listener = next;
    },
    startScan(radio) {
      if (running.has(radio)) {
        return { started: false, reason: `${radio} scan already running` };
      }
      const started = setTimeout(() => listener?.onScanStarted(radio), 0);
      started.unref();
      const timer = setTimeout(() => {
        running.delete(radio);
        const timestamp = now();
        if (radio === "wifi") {
          listener?.onScanCompleted({ radio, results: wifiResults(timestamp) });
        } else {
          listener?.onScanCompleted({ radio, results: bluetoothResults(timestamp) });
        }
      }, scanDurationMs);
      timer.unref();
      running.set(radio, timer);
      return { started: true };
    },
    cancelScan(radio) {
      const timer = running.get(radio);
      if (timer) {
        clearTimeout(timer);
        running.delete(radio);
      }
    },
  };
}

/** Synthetic hardware for running the server without a device. */
export function createSimulatedCapabilitySource(
  options: SimulatedSourceOptions = {},
): CapabilitySource {
  const now = options.now ?? Date.now;
  return {
    sensors: createSimulatedSensors(now),
    location: createSimulatedLocation(
      now,
      options.origin ?? { latitude: 0, longitude: 0 },
      options.locationIntervalMs ?? 1_000,
    ),
    scans: createSimulatedScans(now, options.scanDurationMs ?? 500),
  };
}
