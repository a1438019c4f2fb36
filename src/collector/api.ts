/**
 * Inventory API: request helpers
 *
 * Authenticated JSON requests against the inventory API using native
 * `fetch()` with a Bearer token, plus offset pagination. With a proxy
 * configured, requests go through undici's `fetch` and a `ProxyAgent`.
 */

import { ProxyAgent, fetch as proxiedFetch, type Dispatcher } from "undici";
import type { ApiConfig } from "../config.js";
import { InventoryApiError } from "../errors.js";

export type RequestOptions = {
  params?: Record<string, string | number>;
  /** Default 30 s. */
  timeoutMs?: number;
};

export type InventoryApi = {
  baseUrl: string;
  token: string;
  /** Set when requests go through a proxy. */
  dispatcher?: Dispatcher;
};

export function createInventoryApi(config: Pick<ApiConfig, "apiEndpoint" | "apiToken" | "proxyUrl">): InventoryApi {
  return {
    baseUrl: config.apiEndpoint,
    token: config.apiToken,
    dispatcher: config.proxyUrl ? new ProxyAgent(config.proxyUrl) : undefined,
  };
}

/** Resolve `path` against the API base and append query parameters. */
export function buildUrl(baseUrl: string, path: string, params?: Record<string, string | number>): string {
  const url = new URL(path, baseUrl);
  for (const [key, value] of Object.entries(params ?? {})) {
    url.searchParams.set(key, String(value));
  }
  return url.toString();
}

// =============================================================================
// Core Request
// =============================================================================

/**
 * GET `path` and return the parsed JSON body.
 * Non-2xx responses throw `InventoryApiError` with the status and any Retry-After value.
 */
export async function inventoryRequest(api: InventoryApi, path: string, opts: RequestOptions = {}): Promise<unknown> {
  const url = buildUrl(api.baseUrl, path, opts.params);
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), opts.timeoutMs ?? 30_000);

  const init = {
    method: "GET",
    headers: {
      Authorization: `Bearer ${api.token}`,
      Accept: "application/json",
    },
    signal: controller.signal,
  };

  try {
    const res = api.dispatcher
      ? await proxiedFetch(url, { ...init, dispatcher: api.dispatcher })
      : await fetch(url, init);

    if (!res.ok) {
      const body = await res.text().catch(() => "");
      const detail = extractErrorMessage(body) ?? res.statusText;
      throw new InventoryApiError(
        `Inventory API error: HTTP ${res.status}${detail ? ` ${detail}` : ""}`,
        res.status,
        url,
        res.headers.get("retry-after") ?? undefined,
      );
    }

    return await res.json();
  } finally {
    clearTimeout(timer);
  }
}

function extractErrorMessage(body: string): string | undefined {
  if (!body) return undefined;
  try {
    const parsed: unknown = JSON.parse(body);
    if (typeof parsed === "object" && parsed !== null) {
      const message = "message" in parsed ? parsed.message : "error" in parsed ? parsed.error : undefined;
      if (typeof message === "string") return message;
    }
  } catch {
    // plain-text error body
  }
  return body.slice(0, 200);
}

// =============================================================================
// Paginated List
// =============================================================================

export type PageFetcher = (params: Record<string, number>) => Promise<unknown>;

/**
 * Fetch every page of an offset-paginated list, accumulating items under
 * `listKey`. Pages are requested with `pagination.limit` and
 * `pagination.offset`; a page shorter than the limit ends the list. A single
 * object under `listKey` counts as one item.
 */
export async function listPaginated(fetchPage: PageFetcher, listKey: string, limit = 1000): Promise<unknown[]> {
  const items: unknown[] = [];
  let offset = 0;

  for (;;) {
    const data = await fetchPage({ "pagination.limit": limit, "pagination.offset": offset });
    const page = extractItems(data, listKey);
    items.push(...page);

    if (page.length < limit) break;
    offset += limit;
  }

  return items;
}

export function extractItems(data: unknown, listKey: string): unknown[] {
  if (typeof data !== "object" || data === null) return [];
  const value: unknown = listKey in data ? Reflect.get(data, listKey) : undefined;
  if (Array.isArray(value)) return value;
  if (typeof value === "object" && value !== null) return [value];
  return [];
}
