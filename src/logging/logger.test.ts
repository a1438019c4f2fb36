/**
 * Inventory Logging Tests
 */

import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, it, expect, vi, afterEach } from "vitest";
import {
  ConsoleTransport,
  FileTransport,
  InventoryLoggerImpl,
  SecretMask,
  createInventoryLogger,
  formatLogLine,
  getInventoryLogger,
  isLevelEnabled,
  setGlobalInventoryLogger,
  type LogEntry,
  type LogTransport,
} from "./logger.js";

function memoryTransport(): LogTransport & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return {
    name: "memory",
    entries,
    write(entry) {
      entries.push(entry);
    },
  };
}

/** Sets `isTTY` on a standard stream; returns a restore function. */
function setTTY(stream: NodeJS.WriteStream, isTTY: boolean): () => void {
  const saved = Object.getOwnPropertyDescriptor(stream, "isTTY");
  Object.defineProperty(stream, "isTTY", { value: isTTY, configurable: true });
  return () => {
    if (saved) Object.defineProperty(stream, "isTTY", saved);
    else Reflect.deleteProperty(stream, "isTTY");
  };
}

const entry: LogEntry = {
  timestamp: new Date("2024-03-01T12:00:00.000Z"),
  level: "warn",
  subsystem: "inventory/collector",
  message: "Attempt 1 failed",
};

describe("isLevelEnabled", () => {
  it("should enable levels at or above the minimum", () => {
    expect(isLevelEnabled("warn", "info")).toBe(true);
    expect(isLevelEnabled("info", "info")).toBe(true);
    expect(isLevelEnabled("debug", "info")).toBe(false);
    expect(isLevelEnabled("error", "debug")).toBe(true);
  });
});

describe("formatLogLine", () => {
  it("should prefix the ISO timestamp", () => {
    expect(formatLogLine(entry)).toBe("2024-03-01T12:00:00.000Z WARN  [inventory/collector] Attempt 1 failed");
  });

  it("should append the entity and metadata", () => {
    const line = formatLogLine({ ...entry, entity: "/v1/pods", metadata: { offset: 1000 } }, { timestamps: false });
    expect(line).toBe('WARN  [inventory/collector] Attempt 1 failed (entity=/v1/pods) {"offset":1000}');
  });

  it("should leave out empty metadata", () => {
    expect(formatLogLine({ ...entry, metadata: {} }, { timestamps: false })).toBe(
      "WARN  [inventory/collector] Attempt 1 failed",
    );
  });

  it("should color the level when asked", () => {
    expect(formatLogLine({ ...entry, level: "error" }, { colors: true, timestamps: false })).toBe(
      "\x1b[31mERROR\x1b[0m [inventory/collector] Attempt 1 failed",
    );
  });
});

describe("SecretMask", () => {
  it("should mask every occurrence of each secret", () => {
    const mask = new SecretMask(["test-secret", "a.b+c"]);
    expect(mask.text("test-secret and a.b+c and test-secret")).toBe("[REDACTED] and [REDACTED] and [REDACTED]");
  });

  it("should ignore empty secrets", () => {
    expect(new SecretMask([""]).text("unchanged")).toBe("unchanged");
  });

  it("should mask strings nested in objects and arrays", () => {
    const mask = new SecretMask(["test-secret"]);
    expect(mask.record({ headers: ["Bearer test-secret"], auth: { token: "test-secret" }, attempts: 2 })).toEqual({
      headers: ["Bearer [REDACTED]"],
      auth: { token: "[REDACTED]" },
      attempts: 2,
    });
  });
});

describe("InventoryLoggerImpl", () => {
  it("should drop entries below its level", () => {
    const transport = memoryTransport();
    const logger = new InventoryLoggerImpl({ subsystem: "t", level: "warn", transports: [transport] });

    logger.info("hidden");
    logger.error("shown");

    expect(transport.entries.map((e) => e.message)).toEqual(["shown"]);
  });

  it("should extend the subsystem for child loggers", () => {
    const transport = memoryTransport();
    const logger = new InventoryLoggerImpl({ subsystem: "inventory/cli", transports: [transport] });

    logger.child("collector").info("hello");

    expect(transport.entries[0].subsystem).toBe("inventory/cli/collector");
  });

  it("should tag entries with the entity and keep it in children", () => {
    const transport = memoryTransport();
    const logger = new InventoryLoggerImpl({ subsystem: "t", transports: [transport] });

    logger.forEntity("/v1/clusters").child("retry").info("fetching");

    expect(transport.entries[0].entity).toBe("/v1/clusters");
    expect(transport.entries[0].subsystem).toBe("t/retry");
  });

  it("should mask secrets in messages and metadata", () => {
    const transport = memoryTransport();
    const logger = new InventoryLoggerImpl({ subsystem: "t", transports: [transport], secrets: ["test-secret"] });

    logger.info("token test-secret rejected", { auth: { header: "Bearer test-secret" }, attempts: 2 });

    expect(transport.entries[0].message).toBe("token [REDACTED] rejected");
    expect(transport.entries[0].metadata).toEqual({ auth: { header: "Bearer [REDACTED]" }, attempts: 2 });
  });

  it("should keep masking in derived loggers", () => {
    const transport = memoryTransport();
    const logger = new InventoryLoggerImpl({ subsystem: "t", transports: [transport], secrets: ["test-secret"] });

    logger.child("x").forEntity("/v1/nodes").warn("test-secret");

    expect(transport.entries[0].message).toBe("[REDACTED]");
  });

  it("should keep logging when a transport throws", () => {
    const stderr = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    const transport = memoryTransport();
    const broken: LogTransport = {
      name: "broken",
      write() {
        throw new Error("disk full");
      },
    };
    const logger = new InventoryLoggerImpl({ subsystem: "t", transports: [broken, transport] });

    logger.info("still here");

    expect(transport.entries).toHaveLength(1);
    expect(stderr).toHaveBeenCalledWith('log transport "broken" failed: disk full\n');
    stderr.mockRestore();
  });
});

describe("ConsoleTransport", () => {
  const info: LogEntry = { timestamp: entry.timestamp, level: "info", subsystem: "t", message: "hi" };

  it("should write to stderr through console.error", () => {
    new ConsoleTransport({ colors: false }).write(info);

    expect(console.error).toHaveBeenCalledWith("2024-03-01T12:00:00.000Z INFO  [t] hi");
    expect(console.log).not.toHaveBeenCalled();
  });

  it("should respect its own minimum level", () => {
    new ConsoleTransport({ minLevel: "error" }).write(info);

    expect(console.error).not.toHaveBeenCalled();
  });

  it("should color output when stderr is a terminal, whatever stdout is", () => {
    const restoreStdout = setTTY(process.stdout, false);
    const restoreStderr = setTTY(process.stderr, true);
    try {
      new ConsoleTransport().write(info);
    } finally {
      restoreStderr();
      restoreStdout();
    }

    expect(console.error).toHaveBeenCalledWith("\x1b[2m2024-03-01T12:00:00.000Z\x1b[0m \x1b[32mINFO \x1b[0m [t] hi");
  });

  it("should write plain lines when stderr is redirected", () => {
    const restoreStdout = setTTY(process.stdout, true);
    const restoreStderr = setTTY(process.stderr, false);
    try {
      new ConsoleTransport().write(info);
    } finally {
      restoreStderr();
      restoreStdout();
    }

    expect(console.error).toHaveBeenCalledWith("2024-03-01T12:00:00.000Z INFO  [t] hi");
  });
});

describe("FileTransport", () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it("should append lines at or above its level", async () => {
    dir = await mkdtemp(join(tmpdir(), "kube-inventory-log-"));
    const filePath = join(dir, "inventory.log");
    const transport = new FileTransport(filePath, "info");

    transport.write({ ...entry, level: "info", subsystem: "t", message: "one" });
    transport.write({ ...entry, level: "debug", subsystem: "t", message: "skipped" });
    transport.write({ ...entry, level: "warn", subsystem: "t", message: "two" });
    await transport.close();

    expect(await readFile(filePath, "utf-8")).toBe(
      "2024-03-01T12:00:00.000Z INFO  [t] one\n2024-03-01T12:00:00.000Z WARN  [t] two\n",
    );
  });

  it("should report a file that cannot be opened", async () => {
    const stderr = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    dir = await mkdtemp(join(tmpdir(), "kube-inventory-log-"));
    const transport = new FileTransport(join(dir, "missing", "inventory.log"));

    transport.write({ ...entry, message: "lost" });
    await transport.close();

    await vi.waitFor(() =>
      expect(stderr).toHaveBeenCalledWith(expect.stringMatching(/^log transport "file" failed: ENOENT/)),
    );
    stderr.mockRestore();
  });
});

describe("createInventoryLogger", () => {
  it("should prefix the subsystem", () => {
    expect(createInventoryLogger("cli").subsystem).toBe("inventory/cli");
  });

  it("should serve the global logger and its children", () => {
    const logger = createInventoryLogger("global-test");
    setGlobalInventoryLogger(logger);

    expect(getInventoryLogger()).toBe(logger);
    expect(getInventoryLogger("assembler").subsystem).toBe("inventory/global-test/assembler");
  });
});
