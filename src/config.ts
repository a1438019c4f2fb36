/**
 * Configuration
 *
 * Schema-based configuration with defaults, read from environment variables
 * by the CLI.
 */

import { z } from "zod";
import { ConfigError } from "./errors.js";
import { LOG_LEVELS, type LoggerOptions, type LogLevel } from "./logging/index.js";

// =============================================================================
// Schemas
// =============================================================================

export const retryConfigSchema = z.object({
  maxAttempts: z.number().int().positive().default(3),
  minDelayMs: z.number().nonnegative().default(1000),
  maxDelayMs: z.number().nonnegative().default(30_000),
  jitterFactor: z.number().min(0).max(1).default(0),
});

export const loggingConfigSchema = z.object({
  level: z.enum(LOG_LEVELS).default("info"),
  filePath: z.string().optional(),
});

export const inventoryConfigSchema = z.object({
  apiEndpoint: z.string().url().optional(),
  apiToken: z.string().min(1).optional(),
  /** HTTP(S) proxy for every API request. */
  proxyUrl: z.string().url().optional(),
  dataDir: z.string().min(1).default("."),
  outputDir: z.string().min(1).optional(),
  maxConcurrentRequests: z.number().int().positive().default(100),
  pageLimit: z.number().int().positive().default(1000),
  requestTimeoutMs: z.number().int().positive().default(30_000),
  namespacesTimeoutMs: z.number().int().positive().default(300_000),
  retry: retryConfigSchema.default({}),
  logging: loggingConfigSchema.default({}),
});

export type RetryConfig = z.infer<typeof retryConfigSchema>;
export type InventoryConfig = z.infer<typeof inventoryConfigSchema>;
export type InventoryConfigInput = z.input<typeof inventoryConfigSchema>;

/** Endpoint and token present; required by the collector. */
export type ApiConfig = InventoryConfig & { apiEndpoint: string; apiToken: string };

// =============================================================================
// Loading
// =============================================================================

export function parseConfig(input: InventoryConfigInput = {}): InventoryConfig {
  const result = inventoryConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new ConfigError("Invalid configuration", issues);
  }

  return result.data;
}

/** Logger options for `config`; the API token is masked in every line. */
export function loggerOptions(config: InventoryConfig): LoggerOptions {
  return { ...config.logging, secrets: config.apiToken ? [config.apiToken] : [] };
}

function intFromEnv(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  return Number(value);
}

function logLevelFromEnv(value: string | undefined): LogLevel | undefined {
  const level = nonEmpty(value)?.toLowerCase();
  if (level === undefined) return undefined;
  const match = LOG_LEVELS.find((candidate) => candidate === level);
  if (!match) {
    throw new ConfigError("Invalid configuration", [
      `KUBE_INVENTORY_LOG_LEVEL: expected one of ${LOG_LEVELS.join(", ")}, got "${value}"`,
    ]);
  }
  return match;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === "" ? undefined : value;
}

/**
 * Build configuration from environment variables:
 * `KUBE_INVENTORY_API_ENDPOINT`, `KUBE_INVENTORY_API_TOKEN`, `KUBE_INVENTORY_PROXY_URL`,
 * `KUBE_INVENTORY_DATA_DIR`, `KUBE_INVENTORY_OUTPUT_DIR`,
 * `KUBE_INVENTORY_MAX_CONCURRENT`, `KUBE_INVENTORY_LOG_LEVEL`,
 * `KUBE_INVENTORY_LOG_FILE`.
 */
export function loadConfigFromEnv(
  env: Record<string, string | undefined> = process.env,
  overrides: InventoryConfigInput = {},
): InventoryConfig {
  return parseConfig({
    apiEndpoint: nonEmpty(env.KUBE_INVENTORY_API_ENDPOINT),
    apiToken: nonEmpty(env.KUBE_INVENTORY_API_TOKEN),
    proxyUrl: nonEmpty(env.KUBE_INVENTORY_PROXY_URL),
    dataDir: nonEmpty(env.KUBE_INVENTORY_DATA_DIR),
    outputDir: nonEmpty(env.KUBE_INVENTORY_OUTPUT_DIR),
    maxConcurrentRequests: intFromEnv(env.KUBE_INVENTORY_MAX_CONCURRENT),
    ...overrides,
    logging: {
      level: logLevelFromEnv(env.KUBE_INVENTORY_LOG_LEVEL),
      filePath: nonEmpty(env.KUBE_INVENTORY_LOG_FILE),
      ...overrides.logging,
    },
  });
}

export function requireApiCredentials(config: InventoryConfig): ApiConfig {
  const { apiEndpoint, apiToken } = config;
  if (!apiEndpoint || !apiToken) {
    const missing: string[] = [];
    if (!apiEndpoint) missing.push("KUBE_INVENTORY_API_ENDPOINT is not set");
    if (!apiToken) missing.push("KUBE_INVENTORY_API_TOKEN is not set");
    throw new ConfigError("Missing API credentials", missing);
  }
  return { ...config, apiEndpoint, apiToken };
}

export function resolveOutputDir(config: InventoryConfig): string {
  return config.outputDir ?? config.dataDir;
}
