export { isLogLevel, normalizeLogLevel, type LogLevel } from "./logging/levels.js";
export {
  LOG_LEVEL_ENV,
  configureLogger,
  getChildLogger,
  getLogger,
  getLoggerLevel,
  resetLogger,
  setLoggerOverride,
  type LoggerSettings,
} from "./logging/logger.js";
export { createSubsystemLogger, type SubsystemLogger } from "./logging/subsystem.js";
