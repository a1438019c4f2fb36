/**
 * Inventory types: assembled hierarchy, statistics, and assembly input.
 */

import type {
  ClusterRecord,
  DeploymentRecord,
  MalformedRecord,
  NamespaceRecord,
  NodeRecord,
  PodRecord,
} from "./records.js";

/* ---------- Assembly input ---------- */

export type InventoryInput = {
  clusters: readonly ClusterRecord[];
  nodes: readonly NodeRecord[];
  namespaces: readonly NamespaceRecord[];
  deployments: readonly DeploymentRecord[];
  pods: readonly PodRecord[];
  /** Records already rejected while parsing the collections. */
  malformed?: readonly MalformedRecord[];
};

/* ---------- Hierarchy ---------- */

/**
 * Empty for a stub; never filled with fabricated values. Descriptive fields
 * are carried over as the record holds them.
 */
export type ClusterInfo = {
  name?: unknown;
  type?: unknown;
  labels?: Record<string, unknown>;
};

export type NamespaceInfo = {
  id?: string;
  labels?: Record<string, unknown>;
  annotations?: Record<string, unknown>;
};

export type DeploymentInfo = {
  id?: string;
  name?: unknown;
  created?: unknown;
};

export type InventoryNode = {
  id: string;
  /** Pods reference nodes by this name; a non-string name reads as null. */
  name: string | null;
  labels: Record<string, unknown>;
  taints: unknown[];
};

export type Container = {
  name: string | null;
  id: string | null;
  runtime: string | null;
};

export type InventoryPod = {
  id: string;
  name: string | null;
  node: string | null;
  containers: Container[];
};

export type DeploymentNode = {
  info: DeploymentInfo;
  pods: InventoryPod[];
};

export type NamespaceNode = {
  info: NamespaceInfo;
  deployments: Record<string, DeploymentNode>;
  standalone_pods: InventoryPod[];
};

export type ClusterNode = {
  info: ClusterInfo;
  nodes: InventoryNode[];
  namespaces: Record<string, NamespaceNode>;
};

/** Cluster id → cluster subtree. */
export type CombinedInventory = Record<string, ClusterNode>;

/* ---------- Statistics ---------- */

export type InventoryStatistics = {
  clusters: number;
  nodes: number;
  namespaces: number;
  deployments: number;
  pods: number;
  standalone_pods: number;
  cluster_stubs: number;
  namespace_stubs: number;
  deployment_stubs: number;
  /** Pods naming a node that is not attached to their cluster. */
  unresolved_node_refs: number;
  /** Pods sitting in a namespace stub whose name is defined in another cluster. */
  cluster_mismatches: number;
  malformed_records: number;
};

export type AssemblyResult = {
  inventory: CombinedInventory;
  statistics: InventoryStatistics;
  malformed: MalformedRecord[];
};
