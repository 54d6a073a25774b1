import type { Logger as PinoLogger } from "pino";

import { getLogger } from "./logger.js";

export type SubsystemLogger = {
  subsystem: string;
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
  child(name: string): SubsystemLogger;
};

function toBindings(meta: unknown): Record<string, unknown> {
  if (meta === undefined) {
    return {};
  }
  if (meta instanceof Error) {
    return { err: meta };
  }
  if (typeof meta === "object" && meta !== null && !Array.isArray(meta)) {
    return { ...meta };
  }
  return { detail: meta };
}

/**
 * Event-style logger: `log.info("scan_cycle_started", { radio })`. The pino
 * instance is looked up per call so overrides installed later still apply.
 */
export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  let cachedRoot: PinoLogger | null = null;
  let cachedChild: PinoLogger | null = null;

  const target = (): PinoLogger => {
    const current = getLogger();
    if (cachedRoot !== current || !cachedChild) {
      cachedRoot = current;
      cachedChild = current.child({ subsystem });
    }
    return cachedChild;
  };

  return {
    subsystem,
    debug: (message, meta) => target().debug(toBindings(meta), message),
    info: (message, meta) => target().info(toBindings(meta), message),
    warn: (message, meta) => target().warn(toBindings(meta), message),
    error: (message, meta) => target().error(toBindings(meta), message),
    child: (name) => createSubsystemLogger(`${subsystem}/${name}`),
  };
}
