export {
  type LogLevel,
  type LogEntry,
  type LogTransport,
  type InventoryLogger,
  type InventoryLoggerOptions,
  type LoggerOptions,
  LOG_LEVELS,
  isLevelEnabled,
  formatLogLine,
  SecretMask,
  ConsoleTransport,
  FileTransport,
  InventoryLoggerImpl,
  createInventoryLogger,
  getInventoryLogger,
  setGlobalInventoryLogger,
} from "./logger.js";
