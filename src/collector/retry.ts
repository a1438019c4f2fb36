/**
 * Retry with exponential backoff for inventory API requests.
 */

import { InventoryApiError } from "../errors.js";
import type { RetryConfig } from "../config.js";

export type RetryOptions = Partial<RetryConfig> & {
  /** Called before each wait; `attempt` is the attempt that just failed. */
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
  /** Injected in tests. */
  sleep?: (ms: number) => Promise<void>;
};

export const RETRY_DEFAULTS: RetryConfig = {
  maxAttempts: 3,
  minDelayMs: 1000,
  maxDelayMs: 30_000,
  jitterFactor: 0,
};

const RETRYABLE_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EPIPE",
  "EAI_AGAIN",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_SOCKET",
]);

const RETRYABLE_MESSAGES = [
  "too many requests",
  "rate limit",
  "temporarily unavailable",
  "service unavailable",
  "connection reset",
  "socket hang up",
  "network error",
  "fetch failed",
  "timed out",
];

function errorCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null) return undefined;
  const code = "code" in error ? error.code : undefined;
  if (typeof code === "string") return code;
  // fetch wraps socket errors: TypeError("fetch failed", { cause })
  const cause = "cause" in error ? error.cause : undefined;
  return cause !== error ? errorCode(cause) : undefined;
}

// =============================================================================
// Error Checking
// =============================================================================

/**
 * 429, 5xx, timeouts and connection-level failures are retried; other 4xx and
 * response parsing errors are not.
 */
export function shouldRetryError(error: unknown): boolean {
  if (error instanceof InventoryApiError) {
    return error.statusCode === 429 || (error.statusCode >= 500 && error.statusCode < 600);
  }
  if (error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError")) {
    return true;
  }

  const code = errorCode(error);
  if (code && RETRYABLE_CODES.has(code)) return true;

  const message = error instanceof Error ? error.message.toLowerCase() : "";
  return RETRYABLE_MESSAGES.some((pattern) => message.includes(pattern));
}

/** Retry-After as milliseconds (delta-seconds or HTTP date), or null. */
export function getRetryAfterMs(error: unknown, now: number = Date.now()): number | null {
  if (!(error instanceof InventoryApiError) || !error.retryAfter) return null;

  const seconds = Number(error.retryAfter);
  if (!Number.isNaN(seconds)) return Math.max(0, seconds * 1000);

  const date = new Date(error.retryAfter);
  if (!Number.isNaN(date.getTime())) {
    return Math.max(0, date.getTime() - now);
  }
  return null;
}

export function backoffDelay(attempt: number, config: RetryConfig, random: () => number = Math.random): number {
  const baseDelay = config.minDelayMs * 2 ** (attempt - 1);
  const cappedDelay = Math.min(baseDelay, config.maxDelayMs);
  if (config.jitterFactor === 0) return cappedDelay;
  const jitter = cappedDelay * config.jitterFactor * (random() * 2 - 1);
  return Math.max(config.minDelayMs, cappedDelay + jitter);
}

// =============================================================================
// Retry Execution
// =============================================================================

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const config: RetryConfig = {
    maxAttempts: options.maxAttempts ?? RETRY_DEFAULTS.maxAttempts,
    minDelayMs: options.minDelayMs ?? RETRY_DEFAULTS.minDelayMs,
    maxDelayMs: options.maxDelayMs ?? RETRY_DEFAULTS.maxDelayMs,
    jitterFactor: options.jitterFactor ?? RETRY_DEFAULTS.jitterFactor,
  };
  const sleep = options.sleep ?? defaultSleep;

  let lastError: unknown;

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (attempt >= config.maxAttempts) break;
      if (!shouldRetryError(error)) break;

      const delayMs = getRetryAfterMs(error) ?? backoffDelay(attempt, config);
      options.onRetry?.({ attempt, delayMs, error });
      await sleep(delayMs);
    }
  }

  throw lastError;
}
