import type { DeepPartial } from "./utils/deep-merge.js";

export type Logger = Pick<typeof console, "info" | "warn" | "error"> &
  Partial<Pick<typeof console, "debug">>;

export type PermissionStatus = { granted: true } | { granted: false; reason: string };

// ---------------------------------------------------------------------------
// Capability source (implemented by the host platform)
// ---------------------------------------------------------------------------

export type SensorDescriptor = {
  /** Stable machine name clients request, e.g. `accelerometer`. */
  type: string;
  /** Human label reported in every event. */
  name: string;
};

export type SensorReading = {
  values: number[];
  accuracy: number;
  /** Epoch milliseconds. */
  timestamp: number;
};

export type SensorListener = (sensor: SensorDescriptor, reading: SensorReading) => void;

export interface SensorSubscription {
  unsubscribe(): void;
}

export interface SensorSource {
  listSensors(): SensorDescriptor[];
  subscribe(
    sensor: SensorDescriptor,
    listener: SensorListener,
    samplingPeriodUs: number,
  ): SensorSubscription;
}

export type LocationFix = {
  latitude: number;
  longitude: number;
  altitude: number;
  bearing: number;
  accuracy: number;
  speed: number;
  /** Epoch milliseconds. */
  timestamp: number;
  /** Optional platform-accuracy fields, forwarded verbatim. */
  extras?: Record<string, number>;
};

export type LocationListener = (fix: LocationFix) => void;

export interface LocationSubscription {
  cancel(): void;
}

export interface LocationSource {
  checkPermission(): PermissionStatus;
  requestUpdates(listener: LocationListener): LocationSubscription;
  getLastKnownLocation(): Promise<LocationFix | null>;
}

export type ScanRadio = "wifi" | "bluetooth";

export type WifiScanResult = {
  bssid: string;
  ssid: string;
  rssi: number;
  frequency: number;
  timestamp: number;
};

export type BluetoothScanResult = {
  name: string;
  address: string;
  rssi: number;
  timestamp: number;
};

export type NetworkScanData = {
  timestamp: number;
  wifiResults: WifiScanResult[];
  bluetoothResults: BluetoothScanResult[];
};

export type RadioScanResults =
  | { radio: "wifi"; results: WifiScanResult[] }
  | { radio: "bluetooth"; results: BluetoothScanResult[] };

export type ScanStartResult = { started: true } | { started: false; reason: string };

export interface ScanSourceListener {
  onScanStarted(radio: ScanRadio): void;
  onScanCompleted(completion: RadioScanResults): void;
  onScanFailed(radio: ScanRadio, reason: string): void;
}

export interface ScanSource {
  checkPermission(): PermissionStatus;
  setListener(listener: ScanSourceListener | null): void;
  startScan(radio: ScanRadio): ScanStartResult;
  cancelScan(radio: ScanRadio): void;
}

export interface CapabilitySource {
  sensors: SensorSource;
  location: LocationSource;
  scans: ScanSource;
}

// ---------------------------------------------------------------------------
// Capabilities and attachments
// ---------------------------------------------------------------------------

export type ScanKind = "wifi_scan" | "bluetooth_scan" | "network_scan";

export type SensorCapability = { kind: "sensor"; name: string; sensor: SensorDescriptor };
export type ScanCapability = { kind: "scan"; name: ScanKind };

export type Capability =
  | SensorCapability
  | ScanCapability
  | { kind: "location"; name: string }
  | { kind: "touch"; name: string };

/** Set once when a connection is accepted, never changed afterwards. */
export type Attachment =
  | { type: "single"; capability: SensorCapability }
  | { type: "list"; capabilities: Capability[] }
  | { type: "location" }
  | { type: "touch" }
  | { type: "scan"; capability: ScanCapability };

export type DeliveryShape = "bare" | "tagged";

// ---------------------------------------------------------------------------
// Connections and events
// ---------------------------------------------------------------------------

export type SendResult = { ok: true } | { ok: false; error: Error };

export interface Connection {
  readonly id: string;
  readonly remoteAddress: string;
  isOpen(): boolean;
  /** Queues a text frame; the promise settles when the frame is flushed or fails. Never rejects. */
  send(data: string): Promise<SendResult>;
  close(code: number, reason: string): void;
}

export type EventPayload = Record<string, unknown>;

export type CapabilityEvent = {
  capability: string;
  payload: EventPayload;
  timestamp: number;
};

export type TouchAction = "DOWN" | "MOVE" | "UP";

export type TouchEvent = {
  action: TouchAction;
  x: number;
  y: number;
  timestamp: number;
};

export type ConnectionSummary = {
  id: string;
  remoteAddress: string;
  capabilities: string[];
  attachment: Attachment["type"];
};

// ---------------------------------------------------------------------------
// Server
// ---------------------------------------------------------------------------

export interface ServerConfig {
  port: number;
  network: {
    bindAddress: string;
    allowPublic: boolean;
  };
  sensors: {
    samplingPeriodUs: number;
  };
  scans: {
    intervalMs: number;
  };
  location: {
    pollIntervalMs: number;
    /** Push updates less accurate than this are dropped; `null` keeps all. */
    maxAccuracyMeters: number | null;
  };
}

export type ServerConfigInput = DeepPartial<ServerConfig>;

export interface ServerOptions {
  config?: ServerConfigInput;
  source: CapabilitySource;
  logger?: Logger;
  onConnectionsChange?: (connections: ConnectionSummary[]) => void;
}

export interface SensorServer {
  start(): Promise<void>;
  stop(): Promise<void>;
  isRunning(): boolean;
  getPort(): number;
  getConnectionCount(): number;
  listConnections(): ConnectionSummary[];
  /** Closes a connection on behalf of the host user. */
  closeConnection(id: string): boolean;
  publishTouch(event: TouchEvent): Promise<void>;
}
