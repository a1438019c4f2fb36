/**
 * kube-inventory: Main Entry Point
 *
 * Re-exports the public API: record schemas, collection loading, assembly,
 * collection from the inventory API, storage, and configuration.
 */

// Core types
export type {
  InventoryInput,
  ClusterInfo,
  NamespaceInfo,
  DeploymentInfo,
  InventoryNode,
  Container,
  InventoryPod,
  DeploymentNode,
  NamespaceNode,
  ClusterNode,
  CombinedInventory,
  InventoryStatistics,
  AssemblyResult,
} from "./src/types.js";

// Records
export {
  ClusterRecordSchema,
  NodeRecordSchema,
  NamespaceRecordSchema,
  DeploymentRecordSchema,
  PodRecordSchema,
  ENTITY_KINDS,
  validateRecord,
  partitionRecords,
} from "./src/records.js";
export type {
  ClusterRecord,
  NodeRecord,
  NamespaceRecord,
  DeploymentRecord,
  PodRecord,
  EntityKind,
  RecordOf,
  MalformedRecord,
  RecordValidation,
} from "./src/records.js";

// Collections
export {
  COLLECTION_FILES,
  extractCollection,
  parseCollections,
  readCollectionDocuments,
  loadCollections,
} from "./src/collections.js";
export type { CollectionDocuments, ParsedCollections, LoadedDocuments } from "./src/collections.js";

// Assembly
export {
  assembleInventory,
  assembleFromDocuments,
  InventoryBuilder,
  computeStatistics,
  emptyStatistics,
  anomalyCounts,
  flattenContainers,
  podNodeName,
  toInventoryPod,
} from "./src/assembler/index.js";
export type { AssembleOptions } from "./src/assembler/index.js";

// Collector
export { InventoryCollector } from "./src/collector/collector.js";
export type { CollectorOptions } from "./src/collector/collector.js";
export { buildUrl, inventoryRequest, listPaginated, extractItems } from "./src/collector/api.js";
export { withRetry, shouldRetryError, backoffDelay } from "./src/collector/retry.js";
export { RequestLimiter, processPooled } from "./src/collector/pool.js";

// Storage
export { saveCollections, saveInventory, serializeInventory, inventoryFileName } from "./src/storage/json-store.js";

// Configuration
export { parseConfig, loadConfigFromEnv, requireApiCredentials, resolveOutputDir } from "./src/config.js";
export type { InventoryConfig, InventoryConfigInput, ApiConfig, RetryConfig } from "./src/config.js";

// Errors
export {
  CollectionUnavailableError,
  InputUnavailableError,
  InventoryApiError,
  CollectorError,
  ConfigError,
  formatErrorMessage,
} from "./src/errors.js";
export type { CollectionFailure } from "./src/errors.js";

// Logging
export { createInventoryLogger, getInventoryLogger, setGlobalInventoryLogger } from "./src/logging/index.js";
export type { InventoryLogger, LogLevel } from "./src/logging/index.js";

export { VERSION } from "./src/version.js";
