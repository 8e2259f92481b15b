/**
 * Utility exports
 */

// Logger
export {
  LOG_LEVELS,
  isLogLevel,
  createLogger,
  createChildLogger,
  getLogger,
  setLogger,
  initializeLogging,
  logEvent,
  logTiming,
  type LogLevel,
  type LoggerConfig,
} from "./logger.js";

// Errors
export {
  PlannerError,
  ConfigError,
  FileSystemError,
  ProviderError,
  ValidationError,
  LocationNotFoundError,
  isPlannerError,
  isNotFoundError,
  formatError,
  errorMessage,
  type ConfigIssue,
} from "./errors.js";

// Async utilities
export { sleep, createMutex, truncate, type Mutex } from "./async.js";

// File utilities
export { ensureDir, writeTextFile, writeJsonFile } from "./files.js";
