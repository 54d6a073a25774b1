import type { SensorcastConfig, SensorcastLogLevel } from "../config/types.sensorcast.js";
import type { ServerConfig } from "./domain.js";
import { isLogLevel, LOG_LEVEL_ENV } from "../logging.js";
import { deepMerge } from "./utils/deep-merge.js";

export type ResolvedSensorcastConfig = ServerConfig & {
  enabled: boolean;
  logging: {
    level: SensorcastLogLevel;
  };
};

export const DEFAULT_PORT = 8080;

const DEFAULTS: ResolvedSensorcastConfig = {
  enabled: true,
  port: DEFAULT_PORT,
  network: {
    bindAddress: "127.0.0.1",
    allowPublic: false,
  },
  sensors: {
    samplingPeriodUs: 200_000,
  },
  scans: {
    intervalMs: 15_000,
  },
  location: {
    pollIntervalMs: 500,
    maxAccuracyMeters: 10,
  },
  logging: {
    level: "info",
  },
};

export function defaultServerConfig(): ServerConfig {
  const { enabled: _enabled, logging: _logging, ...server } = structuredClone(DEFAULTS);
  return server;
}

export function resolveSensorcastConfig(input: SensorcastConfig = {}): ResolvedSensorcastConfig {
  const merged = deepMerge(structuredClone(DEFAULTS), input);
  const envLevel = process.env[LOG_LEVEL_ENV]?.trim().toLowerCase();
  if (input.logging?.level === undefined && envLevel && isLogLevel(envLevel)) {
    merged.logging.level = envLevel;
  }
  return merged;
}
