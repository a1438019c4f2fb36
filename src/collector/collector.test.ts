import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { createCapturingLogger } from "../../test/helpers.js";
import { assembleFromDocuments } from "../assembler/index.js";
import { parseConfig, requireApiCredentials, type ApiConfig } from "../config.js";
import { CollectorError } from "../errors.js";
import { InventoryCollector } from "./collector.js";

// ── Fake inventory API ──────────────────────────────────────────────────────

type Route = (url: URL) => Response | Promise<Response>;

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

function page<T>(items: T[], url: URL): T[] {
  const limit = Number(url.searchParams.get("pagination.limit"));
  const offset = Number(url.searchParams.get("pagination.offset"));
  return items.slice(offset, offset + limit);
}

const CLUSTERS = [{ id: "c1", name: "prod" }, { id: "c2" }, { id: "c3" }];

const ROUTES: Record<string, Route> = {
  "/v1/clusters": (url) => jsonResponse({ clusters: page(CLUSTERS, url) }),
  "/v1/namespaces": () => jsonResponse({ namespaces: [{ metadata: { id: "ns1", name: "web", clusterId: "c1" } }] }),
  "/v1/deployments": (url) =>
    jsonResponse({ deployments: page([{ id: "d1", clusterId: "c1", namespace: "web" }], url) }),
  "/v1/pods": (url) =>
    jsonResponse({
      pods: page(
        [
          {
            id: "p1",
            clusterId: "c1",
            namespace: "web",
            deploymentId: "d1",
            liveInstances: [{ instanceId: { containerRuntime: "containerd", id: "cid1", node: "node-a" } }],
          },
        ],
        url,
      ),
    }),
  "/v1/nodes/c1": () => jsonResponse({ nodes: [{ id: "n1", clusterId: "c1", name: "node-a" }] }),
  "/v1/nodes/c2": () => jsonResponse({ nodes: { id: "n2", clusterId: "c2" } }),
  "/v1/nodes/c3": () => jsonResponse({}),
};

function makeConfig(): ApiConfig {
  return requireApiCredentials(
    parseConfig({
      apiEndpoint: "https://inventory.example.test",
      apiToken: "test-secret",
      pageLimit: 2,
      maxConcurrentRequests: 2,
      retry: { minDelayMs: 10 },
    }),
  );
}

function requestUrl(input: Parameters<typeof fetch>[0]): URL {
  if (input instanceof URL) return input;
  return new URL(typeof input === "string" ? input : input.url);
}

// =============================================================================
// InventoryCollector
// =============================================================================

describe("InventoryCollector", () => {
  let fetchMock: MockInstance<typeof fetch>;
  let routes: Record<string, Route>;
  const sleep = vi.fn(async (_ms: number) => {});

  beforeEach(() => {
    routes = { ...ROUTES };
    fetchMock = vi.spyOn(globalThis, "fetch").mockImplementation(async (input) => {
      const url = requestUrl(input);
      const route = routes[url.pathname];
      return route ? route(url) : jsonResponse({ message: "not found" }, 404);
    });
  });

  afterEach(() => {
    fetchMock.mockRestore();
  });

  function makeCollector() {
    const { logger, entries } = createCapturingLogger();
    return { collector: new InventoryCollector(makeConfig(), { logger, sleep }), entries };
  }

  it("follows pagination until a short page", async () => {
    const { collector } = makeCollector();

    await expect(collector.fetchClusters()).resolves.toEqual(CLUSTERS);
    const offsets = fetchMock.mock.calls.map(([input]) => requestUrl(input).searchParams.get("pagination.offset"));
    expect(offsets).toEqual(["0", "2"]);
  });

  it("fetches namespaces in one unpaginated call", async () => {
    const { collector } = makeCollector();

    await collector.fetchNamespaces();
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(requestUrl(fetchMock.mock.calls[0][0]).search).toBe("");
  });

  it("collects all collections with nodes keyed by cluster id", async () => {
    const { collector } = makeCollector();
    const documents = await collector.collect();

    expect(documents.clusters).toEqual({ clusters: CLUSTERS });
    expect(documents.nodes).toEqual({
      c1: { nodes: [{ id: "n1", clusterId: "c1", name: "node-a" }] },
      c2: { nodes: [{ id: "n2", clusterId: "c2" }] },
      c3: { nodes: [] },
    });
    expect(documents.deployments).toEqual({ deployments: [{ id: "d1", clusterId: "c1", namespace: "web" }] });
  });

  it("produces documents the assembler accepts", async () => {
    const { collector } = makeCollector();
    const { statistics } = assembleFromDocuments(await collector.collect(), {
      logger: createCapturingLogger().logger,
    });

    expect(statistics.clusters).toBe(3);
    expect(statistics.nodes).toBe(2);
    expect(statistics.pods).toBe(1);
    expect(statistics.unresolved_node_refs).toBe(0);
  });

  it("retries a transient failure and logs a warning", async () => {
    let calls = 0;
    routes["/v1/namespaces"] = () => {
      calls++;
      return calls === 1 ? jsonResponse({ message: "busy" }, 503) : ROUTES["/v1/namespaces"](new URL("http://x"));
    };
    const { collector, entries } = makeCollector();

    await expect(collector.fetchNamespaces()).resolves.toHaveLength(1);
    expect(sleep).toHaveBeenCalledWith(10);
    const warning = entries.find((e) => e.level === "warn");
    expect(warning?.message).toBe(
      "Attempt 1 failed: (HTTP 503) Inventory API error: HTTP 503 busy; retrying in 10ms",
    );
    expect(warning?.entity).toBe("/v1/namespaces");
  });

  it("fails the run when a collection cannot be fetched", async () => {
    routes["/v1/pods"] = () => jsonResponse({ message: "forbidden" }, 403);
    const { collector } = makeCollector();

    const error = await collector.collect().catch((e: unknown) => e);
    expect(error).toBeInstanceOf(CollectorError);
    if (error instanceof CollectorError) {
      expect(error.endpoint).toBe("/v1/pods");
      expect(error.message).toBe("Failed to fetch /v1/pods: (HTTP 403) Inventory API error: HTTP 403 forbidden");
    }
  });

  it("names every failed endpoint when several fail", async () => {
    routes["/v1/pods"] = () => jsonResponse({ message: "forbidden" }, 403);
    routes["/v1/deployments"] = () => jsonResponse({ message: "gone" }, 410);
    const { collector } = makeCollector();

    const error = await collector.collect().catch((e: unknown) => e);
    expect(error).toBeInstanceOf(CollectorError);
    if (error instanceof CollectorError) {
      expect(error.endpoint).toBe("/v1/deployments, /v1/pods");
    }
  });

  it("fails the run when one cluster's nodes cannot be fetched", async () => {
    delete routes["/v1/nodes/c2"];
    const { collector } = makeCollector();

    await expect(collector.collect()).rejects.toThrow("Failed to fetch /v1/nodes/c2");
  });

  it("never logs the API token", async () => {
    const { collector, entries } = makeCollector();
    await collector.collect();

    const text = entries.map((e) => `${e.message} ${JSON.stringify(e.metadata ?? {})}`).join("\n");
    expect(text.includes("test-secret")).toBe(false);
  });
});
