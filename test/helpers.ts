import { InventoryLoggerImpl, type LogEntry, type LogLevel, type LogTransport } from "../src/logging/index.js";

/** Logger whose transport keeps every entry in memory. */
export function createCapturingLogger(level: LogLevel = "debug"): {
  logger: InventoryLoggerImpl;
  entries: LogEntry[];
} {
  const entries: LogEntry[] = [];
  const transport: LogTransport = {
    name: "memory",
    write: (entry) => {
      entries.push(entry);
    },
  };
  return { logger: new InventoryLoggerImpl({ subsystem: "test", level, transports: [transport] }), entries };
}
