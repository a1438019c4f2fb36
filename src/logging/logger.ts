/**
 * Inventory Logging
 *
 * Leveled logger with a subsystem path (`inventory/cli/collector`), an
 * optional entity (the collection or API endpoint a line is about), console
 * and file transports, and masking of secrets such as the API token.
 */

import { createWriteStream, type WriteStream } from "node:fs";

// =============================================================================
// Logger Types
// =============================================================================

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogEntry = {
  timestamp: Date;
  level: LogLevel;
  subsystem: string;
  message: string;
  /** Collection or endpoint the entry is about. */
  entity?: string;
  metadata?: Record<string, unknown>;
};

export interface LogTransport {
  readonly name: string;
  write(entry: LogEntry): void;
  close?(): Promise<void>;
}

export interface InventoryLogger {
  readonly subsystem: string;

  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;

  child(name: string): InventoryLogger;
  forEntity(entity: string): InventoryLogger;
}

export function isLevelEnabled(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(minLevel);
}

// =============================================================================
// Formatting
// =============================================================================

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: "\x1b[36m",
  info: "\x1b[32m",
  warn: "\x1b[33m",
  error: "\x1b[31m",
};
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

/**
 * `<timestamp> <LEVEL> [subsystem] message (entity=...) {metadata}`
 */
export function formatLogLine(entry: LogEntry, options: { colors?: boolean; timestamps?: boolean } = {}): string {
  const { colors = false, timestamps = true } = options;
  const paint = (code: string, text: string) => (colors ? `${code}${text}${RESET}` : text);

  const parts: string[] = [];
  if (timestamps) parts.push(paint(DIM, entry.timestamp.toISOString()));
  parts.push(paint(LEVEL_COLORS[entry.level], entry.level.toUpperCase().padEnd(5)));
  parts.push(`[${entry.subsystem}]`, entry.message);
  if (entry.entity) parts.push(paint(DIM, `(entity=${entry.entity})`));
  if (entry.metadata && Object.keys(entry.metadata).length > 0) {
    parts.push(paint(DIM, JSON.stringify(entry.metadata)));
  }
  return parts.join(" ");
}

// =============================================================================
// Secret masking
// =============================================================================

const MASK = "[REDACTED]";

/** Replaces literal secret values in strings, at any depth of the metadata. */
export class SecretMask {
  private readonly secrets: string[];

  constructor(secrets: readonly string[] = []) {
    this.secrets = secrets.filter((secret) => secret.length > 0);
  }

  get values(): readonly string[] {
    return this.secrets;
  }

  text(value: string): string {
    return this.secrets.reduce((result, secret) => result.split(secret).join(MASK), value);
  }

  value(value: unknown): unknown {
    if (typeof value === "string") return this.text(value);
    if (Array.isArray(value)) return value.map((item) => this.value(item));
    if (typeof value === "object" && value !== null) return this.record(Object.fromEntries(Object.entries(value)));
    return value;
  }

  record(meta: Record<string, unknown>): Record<string, unknown> {
    return Object.fromEntries(Object.entries(meta).map(([key, item]) => [key, this.value(item)]));
  }
}

// =============================================================================
// Transports
// =============================================================================

function reportTransportFailure(transport: string, err: unknown): void {
  const reason = err instanceof Error ? err.message : String(err);
  process.stderr.write(`log transport "${transport}" failed: ${reason}\n`);
}

/** Writes to stderr; stdout carries command output such as `assemble --stdout`. */
export class ConsoleTransport implements LogTransport {
  readonly name = "console";
  private readonly minLevel: LogLevel;
  private readonly colors: boolean;

  constructor(options: { minLevel?: LogLevel; colors?: boolean } = {}) {
    this.minLevel = options.minLevel ?? "info";
    this.colors = options.colors ?? process.stderr.isTTY ?? false;
  }

  write(entry: LogEntry): void {
    if (!isLevelEnabled(entry.level, this.minLevel)) return;
    console.error(formatLogLine(entry, { colors: this.colors }));
  }
}

/** Appends plain lines to `filePath`. */
export class FileTransport implements LogTransport {
  readonly name = "file";
  private readonly stream: WriteStream;

  constructor(
    readonly filePath: string,
    private readonly minLevel: LogLevel = "info",
  ) {
    this.stream = createWriteStream(filePath, { flags: "a" });
    this.stream.on("error", (err) => reportTransportFailure(this.name, err));
  }

  write(entry: LogEntry): void {
    if (!isLevelEnabled(entry.level, this.minLevel)) return;
    this.stream.write(`${formatLogLine(entry)}\n`);
  }

  /** Resolves once buffered lines are on disk; a failed stream was already reported. */
  close(): Promise<void> {
    if (this.stream.destroyed) return Promise.resolve();
    return new Promise((resolve) => {
      this.stream.once("error", () => resolve());
      this.stream.end(() => resolve());
    });
  }
}

// =============================================================================
// Logger
// =============================================================================

export type InventoryLoggerOptions = {
  subsystem: string;
  level?: LogLevel;
  transports?: LogTransport[];
  secrets?: readonly string[];
  entity?: string;
};

export class InventoryLoggerImpl implements InventoryLogger {
  readonly subsystem: string;
  private readonly level: LogLevel;
  private readonly transports: LogTransport[];
  private readonly mask: SecretMask;
  private readonly entity?: string;

  constructor(options: InventoryLoggerOptions) {
    this.subsystem = options.subsystem;
    this.level = options.level ?? "info";
    this.transports = options.transports ?? [new ConsoleTransport({ minLevel: this.level })];
    this.mask = new SecretMask(options.secrets);
    this.entity = options.entity;
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log("warn", message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log("error", message, meta);
  }

  child(name: string): InventoryLogger {
    return this.derive({ subsystem: `${this.subsystem}/${name}` });
  }

  forEntity(entity: string): InventoryLogger {
    return this.derive({ entity });
  }

  /** Flush and close every transport. */
  async close(): Promise<void> {
    for (const transport of this.transports) {
      await transport.close?.();
    }
  }

  private derive(overrides: Partial<InventoryLoggerOptions>): InventoryLogger {
    return new InventoryLoggerImpl({
      subsystem: this.subsystem,
      level: this.level,
      transports: this.transports,
      secrets: this.mask.values,
      entity: this.entity,
      ...overrides,
    });
  }

  private log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!isLevelEnabled(level, this.level)) return;

    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      subsystem: this.subsystem,
      message: this.mask.text(message),
      entity: this.entity,
      metadata: meta ? this.mask.record(meta) : undefined,
    };

    for (const transport of this.transports) {
      try {
        transport.write(entry);
      } catch (err) {
        reportTransportFailure(transport.name, err);
      }
    }
  }
}

// =============================================================================
// Logger Factory
// =============================================================================

export type LoggerOptions = {
  level?: LogLevel;
  /** Also append log lines to this file. */
  filePath?: string;
  /** Literal values masked in every line, e.g. the API token. */
  secrets?: readonly string[];
};

export function createInventoryLogger(subsystem: string, options: LoggerOptions = {}): InventoryLoggerImpl {
  const level = options.level ?? "info";
  const transports: LogTransport[] = [new ConsoleTransport({ minLevel: level })];
  if (options.filePath) transports.push(new FileTransport(options.filePath, level));

  return new InventoryLoggerImpl({
    subsystem: `inventory/${subsystem}`,
    level,
    transports,
    secrets: options.secrets,
  });
}

let globalLogger: InventoryLogger | null = null;

export function getInventoryLogger(subsystem?: string): InventoryLogger {
  if (!globalLogger) {
    globalLogger = createInventoryLogger("core");
  }
  return subsystem ? globalLogger.child(subsystem) : globalLogger;
}

export function setGlobalInventoryLogger(logger: InventoryLogger): void {
  globalLogger = logger;
}
