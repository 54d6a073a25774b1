import { pino, type Logger as PinoLogger } from "pino";

import { normalizeLogLevel, type LogLevel } from "./levels.js";

export const LOG_LEVEL_ENV = "SENSORCAST_LOG_LEVEL";

export type LoggerSettings = {
  level?: LogLevel;
};

let root: PinoLogger | null = null;
let override: PinoLogger | null = null;
let settings: LoggerSettings = {};

function resolveLevel(): LogLevel {
  return settings.level ?? normalizeLogLevel(process.env[LOG_LEVEL_ENV]);
}

export function getLogger(): PinoLogger {
  if (override) {
    return override;
  }
  if (!root) {
    root = pino({ name: "sensorcast", level: resolveLevel() });
  }
  return root;
}

export function getChildLogger(bindings: Record<string, unknown>): PinoLogger {
  return getLogger().child(bindings);
}

/** Applies settings to the root logger, now or when it is first created. */
export function configureLogger(next: LoggerSettings) {
  settings = { ...next };
  if (root) {
    root.level = resolveLevel();
  }
}

export function getLoggerLevel(): LogLevel {
  return normalizeLogLevel(getLogger().level, resolveLevel());
}

/** Tests route output through their own pino instance. */
export function setLoggerOverride(logger: PinoLogger | null) {
  override = logger;
}

export function resetLogger() {
  root = null;
  override = null;
  settings = {};
}
