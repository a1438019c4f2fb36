/**
 * Inventory Builder: join/stub engine
 *
 * Places every node, namespace, deployment and pod record under its parent.
 * Parents are looked up or created on demand: whichever of "the parent's own
 * record" and "a child referencing it" is visited first, both meet at the same
 * draft node. A draft created for a reference alone is a stub (empty `info`)
 * and stays for the lifetime of the builder.
 *
 * One builder serves one assembly; nothing is shared between builders.
 */

import type {
  ClusterRecord,
  DeploymentRecord,
  NamespaceRecord,
  NodeRecord,
  PodRecord,
} from "../records.js";
import type {
  ClusterInfo,
  ClusterNode,
  CombinedInventory,
  DeploymentInfo,
  DeploymentNode,
  InventoryInput,
  InventoryNode,
  InventoryPod,
  NamespaceInfo,
  NamespaceNode,
} from "../types.js";
import { text, toInventoryPod } from "./containers.js";

// ── Drafts (mutable, builder-owned) ─────────────────────────────────────────

export type DeploymentDraft = {
  info: DeploymentInfo;
  pods: InventoryPod[];
};

export type NamespaceDraft = {
  info: NamespaceInfo;
  deployments: Map<string, DeploymentDraft>;
  standalonePods: InventoryPod[];
};

export type ClusterDraft = {
  info: ClusterInfo;
  nodes: InventoryNode[];
  namespaces: Map<string, NamespaceDraft>;
};

function lookupOrCreate<K, V>(map: Map<K, V>, key: K, create: () => V): V {
  const existing = map.get(key);
  if (existing !== undefined) return existing;
  const created = create();
  map.set(key, created);
  return created;
}

// ── Record → info conversion ────────────────────────────────────────────────

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Own copy of a label-style map; anything but an object reads as empty. */
function mapOf(value: unknown): Record<string, unknown> {
  return isObject(value) ? Object.fromEntries(Object.entries(value)) : {};
}

export function clusterInfo(record: ClusterRecord): ClusterInfo {
  const info: ClusterInfo = {};
  if (record.name !== undefined) info.name = record.name;
  if (record.type !== undefined) info.type = record.type;
  info.labels = mapOf(record.labels);
  return info;
}

export function namespaceInfo(record: NamespaceRecord): NamespaceInfo {
  return {
    id: record.metadata.id,
    labels: mapOf(record.metadata.labels),
    annotations: mapOf(record.metadata.annotations),
  };
}

export function deploymentInfo(record: DeploymentRecord): DeploymentInfo {
  const info: DeploymentInfo = { id: record.id };
  if (record.name !== undefined) info.name = record.name;
  if (record.created !== undefined) info.created = record.created;
  return info;
}

export function toInventoryNode(record: NodeRecord): InventoryNode {
  return {
    id: record.id,
    name: text(record.name),
    labels: mapOf(record.labels),
    taints: Array.isArray(record.taints) ? [...record.taints] : [],
  };
}

// =============================================================================
// Builder
// =============================================================================

export class InventoryBuilder {
  private readonly clusters = new Map<string, ClusterDraft>();
  private readonly deploymentIds = new Set<string>();

  // ─── Lookup-or-create ──────────────────────────────────────────────────────

  cluster(clusterId: string): ClusterDraft {
    return lookupOrCreate(this.clusters, clusterId, () => ({
      info: {},
      nodes: [],
      namespaces: new Map(),
    }));
  }

  namespace(clusterId: string, name: string): NamespaceDraft {
    return lookupOrCreate(this.cluster(clusterId).namespaces, name, () => ({
      info: {},
      deployments: new Map(),
      standalonePods: [],
    }));
  }

  deployment(clusterId: string, namespace: string, deploymentId: string): DeploymentDraft {
    return lookupOrCreate(this.namespace(clusterId, namespace).deployments, deploymentId, () => ({
      info: {},
      pods: [],
    }));
  }

  // ─── Records ───────────────────────────────────────────────────────────────

  /**
   * Declare which deployment ids exist. Pods are resolved against this set,
   * so it must hold the complete Deployment collection before any pod is added.
   */
  registerDeployments(records: readonly DeploymentRecord[]): void {
    for (const record of records) this.deploymentIds.add(record.id);
  }

  addCluster(record: ClusterRecord): void {
    this.cluster(record.id).info = clusterInfo(record);
  }

  addNode(record: NodeRecord): void {
    this.cluster(record.clusterId).nodes.push(toInventoryNode(record));
  }

  addNamespace(record: NamespaceRecord): void {
    const { clusterId, name } = record.metadata;
    this.namespace(clusterId, name).info = namespaceInfo(record);
  }

  addDeployment(record: DeploymentRecord): void {
    this.deploymentIds.add(record.id);
    this.deployment(record.clusterId, record.namespace, record.id).info = deploymentInfo(record);
  }

  /**
   * Pods follow their own `clusterId`/`namespace`. A pod whose deployment id is
   * absent or names no known deployment goes to `standalone_pods`.
   */
  addPod(record: PodRecord): void {
    const pod = toInventoryPod(record);
    const deploymentId = text(record.deploymentId);

    if (deploymentId && this.deploymentIds.has(deploymentId)) {
      this.deployment(record.clusterId, record.namespace, deploymentId).pods.push(pod);
    } else {
      this.namespace(record.clusterId, record.namespace).standalonePods.push(pod);
    }
  }

  /** Add all five collections. */
  populate(input: InventoryInput): this {
    this.registerDeployments(input.deployments);
    for (const record of input.clusters) this.addCluster(record);
    for (const record of input.nodes) this.addNode(record);
    for (const record of input.namespaces) this.addNamespace(record);
    for (const record of input.deployments) this.addDeployment(record);
    for (const record of input.pods) this.addPod(record);
    return this;
  }

  // ─── Output ────────────────────────────────────────────────────────────────

  /**
   * Freeze the drafts into a plain inventory. Mapping keys and leaf lists are
   * sorted so the result does not depend on record order; container order is
   * kept as given. Every call returns a fresh copy that shares nothing with
   * the builder or the input records. Mappings are built with
   * `Object.fromEntries`, so an id such as `__proto__` stays an own key.
   */
  build(): CombinedInventory {
    return Object.fromEntries(
      sortedEntries(this.clusters).map(([clusterId, draft]): [string, ClusterNode] => [
        clusterId,
        {
          info: structuredClone(draft.info),
          nodes: sortLeaves(draft.nodes),
          namespaces: Object.fromEntries(
            sortedEntries(draft.namespaces).map(([name, namespace]): [string, NamespaceNode] => [
              name,
              buildNamespace(namespace),
            ]),
          ),
        },
      ]),
    );
  }
}

function buildNamespace(draft: NamespaceDraft): NamespaceNode {
  return {
    info: structuredClone(draft.info),
    deployments: Object.fromEntries(
      sortedEntries(draft.deployments).map(([id, deployment]): [string, DeploymentNode] => [
        id,
        { info: structuredClone(deployment.info), pods: sortLeaves(deployment.pods) },
      ]),
    ),
    standalone_pods: sortLeaves(draft.standalonePods),
  };
}

function sortedEntries<V>(map: Map<string, V>): Array<[string, V]> {
  return [...map.entries()].sort(([a], [b]) => compareStrings(a, b));
}

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Sort by id; records sharing an id are ordered by their serialized content. */
function sortLeaves<T extends { id: string }>(items: readonly T[]): T[] {
  return items
    .map((item) => ({ item, serialized: JSON.stringify(item) }))
    .sort((a, b) => compareStrings(a.item.id, b.item.id) || compareStrings(a.serialized, b.serialized))
    .map(({ item }) => structuredClone(item));
}
