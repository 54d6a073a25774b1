export {
  BLUETOOTH_SCAN,
  LOCATION_CAPABILITY,
  NETWORK_SCAN,
  TOUCH_CAPABILITY,
  WIFI_SCAN,
  listCapabilities,
  resolveCapability,
  type CatalogueEntry,
} from "./sensorcast/capabilities.js";
export { loadConfig, parseConfig, type SensorcastConfig } from "./config/config.js";
export {
  defaultServerConfig,
  resolveSensorcastConfig,
  type ResolvedSensorcastConfig,
} from "./sensorcast/config.js";
export type * from "./sensorcast/domain.js";
export {
  CloseCode,
  ConfigError,
  ConnectionRejectedError,
  truncateCloseReason,
} from "./sensorcast/errors.js";
export { resolveAttachment } from "./sensorcast/routing.js";
export { createSensorServer } from "./sensorcast/server.js";
export { startSensorcastService, type SensorcastServiceHandle } from "./sensorcast/service.js";
export { createSimulatedCapabilitySource } from "./sensorcast/simulated-source.js";
export { createSubsystemLogger, resetLogger, setLoggerOverride } from "./logging.js";
