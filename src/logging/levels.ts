import type { LevelWithSilent } from "pino";

export type LogLevel = LevelWithSilent;

export const LOG_LEVELS: readonly LogLevel[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function normalizeLogLevel(value: string | undefined, fallback: LogLevel = "info"): LogLevel {
  const candidate = value?.trim().toLowerCase();
  return candidate && isLogLevel(candidate) ? candidate : fallback;
}
