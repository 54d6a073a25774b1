#!/usr/bin/env node
import { parseArgs } from "node:util";

import { loadConfig } from "./config/config.js";
import { createSubsystemLogger } from "./logging.js";
import { describeError } from "./sensorcast/errors.js";
import { startSensorcastService } from "./sensorcast/service.js";
import { createSimulatedCapabilitySource } from "./sensorcast/simulated-source.js";

const log = createSubsystemLogger("cli");

function parsePort(raw: string | undefined): number | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 0 || port > 65_535) {
    throw new Error(`Invalid --port value: ${raw}`);
  }
  return port;
}

async function main(argv: string[]) {
  const { values } = parseArgs({
    args: argv,
    options: {
      config: { type: "string", short: "c" },
      port: { type: "string", short: "p" },
    },
  });
  const fileConfig = values.config ? await loadConfig(values.config) : {};
  const port = parsePort(values.port);
  const config = port === undefined ? fileConfig : { ...fileConfig, port };

  const service = await startSensorcastService({
    config,
    source: createSimulatedCapabilitySource(),
  });
  if (!service) {
    log.info("nothing_to_run", { reason: "enabled is false in config" });
    return;
  }

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    log.info("shutdown_requested", { signal });
    service
      .stop()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        log.error("shutdown_failed", { error: describeError(err) });
        process.exit(1);
      });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main(process.argv.slice(2)).catch((err: unknown) => {
  log.error("startup_failed", { error: describeError(err) });
  process.exitCode = 1;
});
