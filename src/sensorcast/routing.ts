/**
 * Connection routing
 *
 * Turns the resource descriptor of a freshly upgraded WebSocket into the
 * connection's Attachment. Every rejection is a ConnectionRejectedError that
 * carries the close code; nothing here touches the subscription registry.
 *
 *   /sensor/connect?type=<name>               one hardware sensor or one scan
 *   /sensors/connect?types=["a","b",...]      two or more capabilities of any kind
 *   /gps                                      location
 *   /touchscreen                              touch stream
 */
import {
  resolveCapability,
  resolveScanCapability,
  resolveSensorCapability,
} from "./capabilities.js";
import type { Attachment, Capability, CapabilitySource, Logger } from "./domain.js";
import { CloseCode, ConnectionRejectedError } from "./errors.js";

export const PATH_SINGLE_CAPABILITY = "/sensor/connect";
export const PATH_CAPABILITY_LIST = "/sensors/connect";
export const PATH_LOCATION = "/gps";
export const PATH_TOUCH = "/touchscreen";

const DEFAULT_LOCATION_DENIED_REASON =
  "Location permission required. Please enable it in your device's App Settings.";
const DEFAULT_SCAN_DENIED_REASON = "Scanning requires location and nearby-device permissions.";

export type RouteContext = {
  source: CapabilitySource;
  logger?: Logger;
};

function parseRequestUrl(resource: string): URL {
  try {
    return new URL(resource, "ws://localhost");
  } catch {
    throw new ConnectionRejectedError(CloseCode.UNSUPPORTED_REQUEST, "unsupported request");
  }
}

/** `null` when the value is not a JSON array of strings. */
export function parseCapabilityArray(raw: string): string[] | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!Array.isArray(parsed)) {
    return null;
  }
  const names: string[] = [];
  for (const entry of parsed) {
    if (typeof entry !== "string") {
      return null;
    }
    names.push(entry);
  }
  return names;
}

function requireLocationPermission(ctx: RouteContext) {
  const status = ctx.source.location.checkPermission();
  if (!status.granted) {
    throw new ConnectionRejectedError(
      CloseCode.PERMISSION_DENIED,
      status.reason || DEFAULT_LOCATION_DENIED_REASON,
    );
  }
}

function requireScanPermission(ctx: RouteContext) {
  const status = ctx.source.scans.checkPermission();
  if (!status.granted) {
    throw new ConnectionRejectedError(
      CloseCode.PERMISSION_DENIED,
      status.reason || DEFAULT_SCAN_DENIED_REASON,
    );
  }
}

function routeSingleCapability(params: URLSearchParams, ctx: RouteContext): Attachment {
  const raw = params.get("type");
  if (raw === null) {
    throw new ConnectionRejectedError(CloseCode.PARAMETER_MISSING, "<type> param required");
  }
  if (raw.trim() === "") {
    throw new ConnectionRejectedError(CloseCode.NO_CAPABILITY_SPECIFIED, "No sensor specified");
  }

  const scan = resolveScanCapability(raw);
  if (scan) {
    requireScanPermission(ctx);
    return { type: "scan", capability: scan };
  }

  const sensor = resolveSensorCapability(raw, ctx.source.sensors);
  if (!sensor) {
    throw new ConnectionRejectedError(
      CloseCode.CAPABILITY_NOT_FOUND,
      `Sensor of type ${raw} not found`,
    );
  }
  return { type: "single", capability: sensor };
}

function routeCapabilityList(params: URLSearchParams, ctx: RouteContext): Attachment {
  const raw = params.get("types");
  if (raw === null) {
    throw new ConnectionRejectedError(CloseCode.PARAMETER_MISSING, "<types> parameter required");
  }
  const requested = parseCapabilityArray(raw);
  if (requested === null) {
    throw new ConnectionRejectedError(
      CloseCode.INVALID_ARRAY,
      `Syntax error : ${raw} is not valid JSON array`,
    );
  }
  if (requested.length === 0) {
    throw new ConnectionRejectedError(CloseCode.NO_CAPABILITY_SPECIFIED, "No sensor specified");
  }
  if (requested.length === 1) {
    throw new ConnectionRejectedError(
      CloseCode.TOO_FEW_CAPABILITIES,
      "At least two sensor types must be specified",
    );
  }

  const capabilities: Capability[] = [];
  const seen = new Set<string>();
  for (const name of requested) {
    const capability = resolveCapability(name, ctx.source.sensors);
    if (!capability) {
      ctx.logger?.warn("capability_not_found", { name });
      continue;
    }
    if (seen.has(capability.name)) {
      continue;
    }
    seen.add(capability.name);
    capabilities.push(capability);
  }

  if (capabilities.length === 0) {
    throw new ConnectionRejectedError(
      CloseCode.NO_CAPABILITY_SPECIFIED,
      "No valid sensors found in request",
    );
  }
  if (capabilities.some((capability) => capability.kind === "location")) {
    requireLocationPermission(ctx);
  }
  if (capabilities.some((capability) => capability.kind === "scan")) {
    requireScanPermission(ctx);
  }
  return { type: "list", capabilities };
}

export function resolveAttachment(resource: string, ctx: RouteContext): Attachment {
  const url = parseRequestUrl(resource);
  switch (url.pathname.toLowerCase()) {
    case PATH_SINGLE_CAPABILITY:
      return routeSingleCapability(url.searchParams, ctx);
    case PATH_CAPABILITY_LIST:
      return routeCapabilityList(url.searchParams, ctx);
    case PATH_LOCATION:
      requireLocationPermission(ctx);
      return { type: "location" };
    case PATH_TOUCH:
      return { type: "touch" };
    default:
      throw new ConnectionRejectedError(CloseCode.UNSUPPORTED_REQUEST, "unsupported request");
  }
}
