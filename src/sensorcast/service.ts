import type { SensorcastConfig } from "../config/config.js";
import { configureLogger, createSubsystemLogger } from "../logging.js";
import { resolveSensorcastConfig } from "./config.js";
import type { CapabilitySource, ConnectionSummary, Logger, SensorServer } from "./domain.js";
import { createSensorServer } from "./server.js";

export type SensorcastServiceHandle = {
  server: SensorServer;
  stop: () => Promise<void>;
};

export async function startSensorcastService(params: {
  config?: SensorcastConfig;
  source: CapabilitySource;
  logger?: Logger;
  onConnectionsChange?: (connections: ConnectionSummary[]) => void;
}): Promise<SensorcastServiceHandle | null> {
  const input = params.config ?? {};
  const { enabled, logging, ...resolved } = resolveSensorcastConfig(input);
  configureLogger({ level: logging.level });
  const logger = params.logger ?? createSubsystemLogger("sensorcast");
  if (!enabled) {
    logger.info("service_disabled");
    return null;
  }
  const randomizePort = Boolean(process.env.VITEST_WORKER_ID) && input.port === undefined;
  const serverConfig = randomizePort ? { ...resolved, port: 0 } : resolved;
  const server = createSensorServer({
    config: serverConfig,
    source: params.source,
    logger,
    onConnectionsChange: params.onConnectionsChange,
  });
  await server.start();
  logger.info("service_listening", {
    bindAddress: serverConfig.network.bindAddress,
    port: server.getPort(),
  });
  return {
    server,
    stop: () => server.stop(),
  };
}
