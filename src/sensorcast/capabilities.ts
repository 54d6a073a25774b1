import type {
  Attachment,
  Capability,
  ScanCapability,
  ScanKind,
  ScanRadio,
  SensorCapability,
  SensorSource,
} from "./domain.js";

export const LOCATION_CAPABILITY = "gps";
export const TOUCH_CAPABILITY = "touchscreen";
export const WIFI_SCAN = "wifi_scan";
export const BLUETOOTH_SCAN = "bluetooth_scan";
export const NETWORK_SCAN = "network_scan";

export const LOCATION_LABEL = "Global Positioning System";

const SCAN_LABELS: Record<ScanKind, string> = {
  wifi_scan: "WiFi Scanner",
  bluetooth_scan: "Bluetooth Scanner",
  network_scan: "Network Scanner",
};

/** Radios a scan capability keeps busy. */
export const SCAN_RADIOS: Record<ScanKind, readonly ScanRadio[]> = {
  wifi_scan: ["wifi"],
  bluetooth_scan: ["bluetooth"],
  network_scan: ["wifi", "bluetooth"],
};

export function isScanKind(name: string): name is ScanKind {
  return name === WIFI_SCAN || name === BLUETOOTH_SCAN || name === NETWORK_SCAN;
}

export function resolveScanCapability(name: string): ScanCapability | undefined {
  const normalized = name.trim().toLowerCase();
  return isScanKind(normalized) ? { kind: "scan", name: normalized } : undefined;
}

export function resolveSensorCapability(
  name: string,
  sensors: SensorSource,
): SensorCapability | undefined {
  const normalized = name.trim().toLowerCase();
  const sensor = sensors.listSensors().find((entry) => entry.type.toLowerCase() === normalized);
  return sensor ? { kind: "sensor", name: sensor.type, sensor } : undefined;
}

/**
 * Resolves any capability name a multi-capability request may carry. Lookup is
 * case-insensitive; reserved names win over hardware sensors that share them.
 */
export function resolveCapability(name: string, sensors: SensorSource): Capability | undefined {
  const normalized = name.trim().toLowerCase();
  if (normalized === LOCATION_CAPABILITY) {
    return { kind: "location", name: LOCATION_CAPABILITY };
  }
  if (normalized === TOUCH_CAPABILITY) {
    return { kind: "touch", name: TOUCH_CAPABILITY };
  }
  return resolveScanCapability(normalized) ?? resolveSensorCapability(normalized, sensors);
}

export function capabilitiesOf(attachment: Attachment): Capability[] {
  switch (attachment.type) {
    case "single":
      return [attachment.capability];
    case "list":
      return attachment.capabilities;
    case "location":
      return [{ kind: "location", name: LOCATION_CAPABILITY }];
    case "touch":
      return [{ kind: "touch", name: TOUCH_CAPABILITY }];
    case "scan":
      return [attachment.capability];
  }
}

export function capabilityNamesOf(attachment: Attachment): string[] {
  return capabilitiesOf(attachment).map((capability) => capability.name);
}

export type CatalogueEntry = { name: string; type: string };

/** Everything a client may request through `/sensor/connect`. */
export function listCapabilities(sensors: SensorSource): CatalogueEntry[] {
  const entries: CatalogueEntry[] = sensors
    .listSensors()
    .map((sensor) => ({ name: sensor.name, type: sensor.type }));
  for (const kind of [WIFI_SCAN, BLUETOOTH_SCAN, NETWORK_SCAN] as const) {
    entries.push({ name: SCAN_LABELS[kind], type: kind });
  }
  return entries;
}
