/**
 * Error types surfaced by collection loading, collection from the API, and configuration.
 *
 * Malformed records and unresolved references are not errors: the first are
 * skipped and counted, the second become stubs or standalone pods.
 */

import type { EntityKind } from "./records.js";

export type CollectionFailure = {
  entity: EntityKind;
  reason: string;
};

/** One input collection could not be read or does not have the expected shape. */
export class CollectionUnavailableError extends Error {
  constructor(
    public readonly entity: EntityKind,
    public readonly reason: string,
  ) {
    super(`${entity}: ${reason}`);
    this.name = "CollectionUnavailableError";
  }
}

/** Assembly aborted; lists every collection that failed to load. */
export class InputUnavailableError extends Error {
  readonly failures: CollectionFailure[];

  constructor(failures: CollectionFailure[]) {
    const lines = failures.map((f) => `  - ${f.entity}: ${f.reason}`);
    super(`Inventory input unavailable (${failures.length} collection(s) failed):\n${lines.join("\n")}`);
    this.name = "InputUnavailableError";
    this.failures = failures;
  }

  get entities(): EntityKind[] {
    return this.failures.map((f) => f.entity);
  }
}

/** Non-2xx response from the inventory API. */
export class InventoryApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly url: string,
    public readonly retryAfter?: string,
  ) {
    super(message);
    this.name = "InventoryApiError";
  }
}

/** A collection could not be fetched after all retries. */
export class CollectorError extends Error {
  constructor(
    message: string,
    public readonly endpoint: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "CollectorError";
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}:\n${issues.map((i) => `  - ${i}`).join("\n")}` : message);
    this.name = "ConfigError";
  }
}

/** Render an unknown thrown value as a one-line message. */
export function formatErrorMessage(error: unknown): string {
  if (error === null || error === undefined) return "Unknown error";
  if (typeof error === "string") return error;
  if (error instanceof InventoryApiError) return `(HTTP ${error.statusCode}) ${error.message}`;
  if (error instanceof Error) return error.message;
  return String(error);
}
