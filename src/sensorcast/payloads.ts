import {
  BLUETOOTH_SCAN,
  LOCATION_CAPABILITY,
  LOCATION_LABEL,
  NETWORK_SCAN,
  TOUCH_CAPABILITY,
  WIFI_SCAN,
} from "./capabilities.js";
import type {
  BluetoothScanResult,
  CapabilityEvent,
  LocationFix,
  NetworkScanData,
  SensorDescriptor,
  SensorReading,
  TouchEvent,
  WifiScanResult,
} from "./domain.js";

export function sensorEvent(sensor: SensorDescriptor, reading: SensorReading): CapabilityEvent {
  return {
    capability: sensor.type,
    timestamp: reading.timestamp,
    payload: {
      type: sensor.type,
      name: sensor.name,
      values: reading.values,
      accuracy: reading.accuracy,
      timestamp: reading.timestamp,
    },
  };
}

export function locationEvent(fix: LocationFix, lastKnownLocation = false): CapabilityEvent {
  return {
    capability: LOCATION_CAPABILITY,
    timestamp: fix.timestamp,
    payload: {
      ...fix.extras,
      type: LOCATION_CAPABILITY,
      name: LOCATION_LABEL,
      latitude: fix.latitude,
      longitude: fix.longitude,
      altitude: fix.altitude,
      bearing: fix.bearing,
      accuracy: fix.accuracy,
      speed: fix.speed,
      timestamp: fix.timestamp,
      lastKnownLocation,
    },
  };
}

const TOUCH_ACTIONS = {
  DOWN: "ACTION_DOWN",
  MOVE: "ACTION_MOVE",
  UP: "ACTION_UP",
} as const;

export function touchEvent(event: TouchEvent): CapabilityEvent {
  return {
    capability: TOUCH_CAPABILITY,
    timestamp: event.timestamp,
    payload: {
      type: TOUCH_CAPABILITY,
      action: TOUCH_ACTIONS[event.action],
      x: event.x,
      y: event.y,
      timestamp: event.timestamp,
    },
  };
}

export function wifiScanEvent(results: WifiScanResult[], timestamp: number): CapabilityEvent {
  return { capability: WIFI_SCAN, timestamp, payload: { type: WIFI_SCAN, values: results } };
}

export function bluetoothScanEvent(
  results: BluetoothScanResult[],
  timestamp: number,
): CapabilityEvent {
  return {
    capability: BLUETOOTH_SCAN,
    timestamp,
    payload: { type: BLUETOOTH_SCAN, values: results },
  };
}

export function networkScanEvent(data: NetworkScanData): CapabilityEvent {
  return {
    capability: NETWORK_SCAN,
    timestamp: data.timestamp,
    payload: { type: NETWORK_SCAN, values: data },
  };
}
