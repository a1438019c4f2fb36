/**
 * Inventory statistics, computed from the finished hierarchy.
 *
 * Everything except `malformed_records` is derived by one walk over the
 * inventory, so the counts describe the structure that was actually produced.
 */

import type { CombinedInventory, InventoryPod, InventoryStatistics } from "../types.js";

export function emptyStatistics(): InventoryStatistics {
  return {
    clusters: 0,
    nodes: 0,
    namespaces: 0,
    deployments: 0,
    pods: 0,
    standalone_pods: 0,
    cluster_stubs: 0,
    namespace_stubs: 0,
    deployment_stubs: 0,
    unresolved_node_refs: 0,
    cluster_mismatches: 0,
    malformed_records: 0,
  };
}

function isStub(info: object): boolean {
  return Object.keys(info).length === 0;
}

export function computeStatistics(inventory: CombinedInventory, malformedRecords = 0): InventoryStatistics {
  const stats = emptyStatistics();
  stats.malformed_records = malformedRecords;

  // namespace name → clusters holding a Namespace record of that name
  const definedNamespaces = new Map<string, Set<string>>();
  // pods sitting in namespace stubs, checked once the walk is done
  const stubPods: Array<{ clusterId: string; namespace: string; pods: number }> = [];

  for (const [clusterId, cluster] of Object.entries(inventory)) {
    stats.clusters++;
    if (isStub(cluster.info)) stats.cluster_stubs++;
    stats.nodes += cluster.nodes.length;

    const nodeNames = new Set<string>();
    for (const node of cluster.nodes) {
      if (node.name !== null) nodeNames.add(node.name);
    }
    const countUnresolved = (pods: readonly InventoryPod[]) => {
      for (const pod of pods) {
        if (pod.node !== null && !nodeNames.has(pod.node)) stats.unresolved_node_refs++;
      }
    };

    for (const [name, namespace] of Object.entries(cluster.namespaces)) {
      stats.namespaces++;
      let podsHere = namespace.standalone_pods.length;

      for (const deployment of Object.values(namespace.deployments)) {
        stats.deployments++;
        if (isStub(deployment.info)) stats.deployment_stubs++;
        podsHere += deployment.pods.length;
        countUnresolved(deployment.pods);
      }

      stats.standalone_pods += namespace.standalone_pods.length;
      stats.pods += podsHere;
      countUnresolved(namespace.standalone_pods);

      if (isStub(namespace.info)) {
        stats.namespace_stubs++;
        if (podsHere > 0) stubPods.push({ clusterId, namespace: name, pods: podsHere });
      } else {
        const clusters = definedNamespaces.get(name) ?? new Set<string>();
        clusters.add(clusterId);
        definedNamespaces.set(name, clusters);
      }
    }
  }

  for (const { clusterId, namespace, pods } of stubPods) {
    const definedIn = definedNamespaces.get(namespace);
    if (definedIn && !definedIn.has(clusterId)) stats.cluster_mismatches += pods;
  }

  return stats;
}

/** Anomaly counters with a non-zero value, keyed by statistic name. */
export function anomalyCounts(stats: InventoryStatistics): Partial<InventoryStatistics> {
  const keys = [
    "cluster_stubs",
    "namespace_stubs",
    "deployment_stubs",
    "standalone_pods",
    "unresolved_node_refs",
    "cluster_mismatches",
    "malformed_records",
  ] as const;

  const result: Partial<InventoryStatistics> = {};
  for (const key of keys) {
    if (stats[key] > 0) result[key] = stats[key];
  }
  return result;
}
