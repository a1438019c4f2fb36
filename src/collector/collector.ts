/**
 * Inventory Collector
 *
 * Fetches the five entity collections from the inventory API and returns
 * them in the persisted document format:
 *
 *   GET /v1/clusters              (paginated)  → { clusters: [...] }
 *   GET /v1/namespaces            (one call)   → { namespaces: [...] }
 *   GET /v1/deployments           (paginated)  → { deployments: [...] }
 *   GET /v1/pods                  (paginated)  → { pods: [...] }
 *   GET /v1/nodes/{clusterId}     (per cluster) → { "<clusterId>": { nodes: [...] } }
 *
 * A collection that cannot be fetched after retries fails the whole run;
 * the assembler is never handed a truncated collection.
 */

import type { CollectionDocuments } from "../collections.js";
import type { ApiConfig } from "../config.js";
import { CollectorError, formatErrorMessage } from "../errors.js";
import { getInventoryLogger, type InventoryLogger } from "../logging/index.js";
import { createInventoryApi, extractItems, inventoryRequest, listPaginated, type InventoryApi } from "./api.js";
import { RequestLimiter, processPooled } from "./pool.js";
import { withRetry } from "./retry.js";

export type CollectorOptions = {
  logger?: InventoryLogger;
  /** Injected in tests to skip backoff waits. */
  sleep?: (ms: number) => Promise<void>;
};

export class InventoryCollector {
  private readonly api: InventoryApi;
  private readonly limiter: RequestLimiter;
  private readonly logger: InventoryLogger;

  constructor(
    private readonly config: ApiConfig,
    private readonly options: CollectorOptions = {},
  ) {
    this.api = createInventoryApi(config);
    this.limiter = new RequestLimiter(config.maxConcurrentRequests);
    this.logger = options.logger ?? getInventoryLogger("collector");
  }

  // ─── Endpoints ─────────────────────────────────────────────────────────────

  fetchClusters(): Promise<unknown[]> {
    return this.fetchPaginated("/v1/clusters", "clusters");
  }

  fetchDeployments(): Promise<unknown[]> {
    return this.fetchPaginated("/v1/deployments", "deployments");
  }

  fetchPods(): Promise<unknown[]> {
    return this.fetchPaginated("/v1/pods", "pods");
  }

  /** Not paginated; the endpoint can be slow, hence the longer timeout. */
  async fetchNamespaces(): Promise<unknown[]> {
    this.logger.info("Fetching namespaces (this may take a while)");
    const data = await this.request("/v1/namespaces", { timeoutMs: this.config.namespacesTimeoutMs });
    const namespaces = extractItems(data, "namespaces");
    this.logger.info(`Fetched ${namespaces.length} namespaces`);
    return namespaces;
  }

  async fetchNodes(clusterId: string): Promise<unknown[]> {
    this.logger.debug(`Fetching nodes for cluster ${clusterId}`);
    const data = await this.request(`/v1/nodes/${encodeURIComponent(clusterId)}`);
    return extractItems(data, "nodes");
  }

  // ─── Collection run ────────────────────────────────────────────────────────

  async collect(): Promise<CollectionDocuments> {
    const startedAt = Date.now();
    this.logger.info(`Collecting inventory from ${this.config.apiEndpoint}`);

    const [clusters, namespaces, deployments, pods] = await settleAll([
      this.fetchClusters(),
      this.fetchNamespaces(),
      this.fetchDeployments(),
      this.fetchPods(),
    ]);

    const clusterIds = clusters.flatMap((cluster) => {
      const id = typeof cluster === "object" && cluster !== null ? Reflect.get(cluster, "id") : undefined;
      return typeof id === "string" && id !== "" ? [id] : [];
    });

    const nodeGroups = await processPooled(
      clusterIds,
      async (clusterId) => ({ clusterId, nodes: await this.fetchNodes(clusterId) }),
      this.config.maxConcurrentRequests,
    );

    const nodes: Record<string, { nodes: unknown[] }> = {};
    let nodeCount = 0;
    for (const group of nodeGroups) {
      nodes[group.clusterId] = { nodes: group.nodes };
      nodeCount += group.nodes.length;
    }

    this.logger.info("Inventory collected", {
      clusters: clusters.length,
      nodes: nodeCount,
      namespaces: namespaces.length,
      deployments: deployments.length,
      pods: pods.length,
      durationMs: Date.now() - startedAt,
    });

    return {
      clusters: { clusters },
      nodes,
      namespaces: { namespaces },
      deployments: { deployments },
      pods: { pods },
    };
  }

  /** Release the proxy connection pool, if any. */
  async close(): Promise<void> {
    await this.api.dispatcher?.close();
  }

  // ─── Internals ─────────────────────────────────────────────────────────────

  private async fetchPaginated(path: string, listKey: string): Promise<unknown[]> {
    this.logger.info(`Fetching ${listKey}`);
    const items = await listPaginated((params) => this.request(path, { params }), listKey, this.config.pageLimit);
    this.logger.info(`Fetched ${items.length} ${listKey}`);
    return items;
  }

  private async request(
    path: string,
    opts: { params?: Record<string, number>; timeoutMs?: number } = {},
  ): Promise<unknown> {
    const log = this.logger.forEntity(path);
    try {
      return await this.limiter.run(() =>
        withRetry(
          () => {
            log.debug("Request", opts.params);
            return inventoryRequest(this.api, path, {
              params: opts.params,
              timeoutMs: opts.timeoutMs ?? this.config.requestTimeoutMs,
            });
          },
          {
            ...this.config.retry,
            sleep: this.options.sleep,
            onRetry: ({ attempt, delayMs, error }) =>
              log.warn(`Attempt ${attempt} failed: ${formatErrorMessage(error)}; retrying in ${delayMs}ms`),
          },
        ),
      );
    } catch (error) {
      log.error(`All attempts failed: ${formatErrorMessage(error)}`);
      throw new CollectorError(`Failed to fetch ${path}: ${formatErrorMessage(error)}`, path, error);
    }
  }
}

/**
 * Await every promise; if any rejected, throw one CollectorError naming all
 * failed endpoints once the others have settled.
 */
async function settleAll(promises: Promise<unknown[]>[]): Promise<unknown[][]> {
  const results = await Promise.allSettled(promises);
  const failures: CollectorError[] = [];
  const values: unknown[][] = [];

  for (const result of results) {
    if (result.status === "fulfilled") {
      values.push(result.value);
    } else if (result.reason instanceof CollectorError) {
      failures.push(result.reason);
    } else {
      throw result.reason;
    }
  }

  if (failures.length === 1) throw failures[0];
  if (failures.length > 1) {
    throw new CollectorError(
      failures.map((f) => f.message).join("; "),
      failures.map((f) => f.endpoint).join(", "),
      failures,
    );
  }
  return values;
}
