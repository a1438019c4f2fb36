/**
 * Collection documents: reading the five persisted JSON documents and
 * turning them into validated record sets.
 *
 * Document shape: `{ "<plural entity>": [ ...records ] }`. The nodes document
 * may instead be keyed by cluster id (`{ "<clusterId>": { "nodes": [...] } }`),
 * which is how the collector writes it.
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { CollectionUnavailableError, InputUnavailableError, type CollectionFailure } from "./errors.js";
import { ENTITY_KINDS, partitionRecords, type EntityKind, type MalformedRecord } from "./records.js";
import type { InventoryInput } from "./types.js";

export type CollectionDocuments = Record<EntityKind, unknown>;

export type ParsedCollections = Required<InventoryInput> & {
  malformed: MalformedRecord[];
};

export const COLLECTION_FILES: Record<EntityKind, string> = {
  clusters: "clusters.json",
  nodes: "nodes.json",
  namespaces: "namespaces.json",
  deployments: "deployments.json",
  pods: "pods.json",
};

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// =============================================================================
// Extraction
// =============================================================================

/**
 * Pull the raw record array out of one collection document.
 * Records are not validated here; only the document's shape is.
 */
export function extractCollection(kind: EntityKind, document: unknown): unknown[] {
  if (!isObject(document)) {
    throw new CollectionUnavailableError(kind, "document is not a JSON object");
  }

  const records = document[kind];
  if (Array.isArray(records)) return records;

  if (kind === "nodes" && records === undefined) {
    return extractGroupedNodes(document);
  }

  if (records === undefined) {
    throw new CollectionUnavailableError(kind, `missing top-level "${kind}" key`);
  }
  throw new CollectionUnavailableError(kind, `"${kind}" is not an array`);
}

/** Nodes grouped by cluster id; nodes without `clusterId` inherit the group key. */
function extractGroupedNodes(document: Record<string, unknown>): unknown[] {
  const nodes: unknown[] = [];

  for (const [clusterId, group] of Object.entries(document)) {
    if (group === null) {
      throw new CollectionUnavailableError("nodes", `node list for cluster "${clusterId}" was not retrieved`);
    }
    if (!isObject(group) || !Array.isArray(group.nodes)) {
      throw new CollectionUnavailableError("nodes", `cluster "${clusterId}" has no "nodes" array`);
    }

    for (const node of group.nodes) {
      nodes.push(isObject(node) && node.clusterId === undefined ? { ...node, clusterId } : node);
    }
  }

  return nodes;
}

// =============================================================================
// Parsing
// =============================================================================

/**
 * Validate all five collections. Every unusable collection is gathered before
 * throwing, so the error names all of them at once. Malformed records are
 * skipped and returned in `malformed`.
 */
export function parseCollections(
  documents: Partial<CollectionDocuments>,
  priorFailures: readonly CollectionFailure[] = [],
): ParsedCollections {
  const failures: CollectionFailure[] = [...priorFailures];
  const failed = new Set(failures.map((f) => f.entity));
  const raw: Partial<Record<EntityKind, unknown[]>> = {};

  for (const kind of ENTITY_KINDS) {
    if (failed.has(kind)) continue;
    if (!(kind in documents)) {
      failures.push({ entity: kind, reason: "no document supplied" });
      continue;
    }
    try {
      raw[kind] = extractCollection(kind, documents[kind]);
    } catch (error) {
      if (!(error instanceof CollectionUnavailableError)) throw error;
      failures.push({ entity: error.entity, reason: error.reason });
    }
  }

  if (failures.length > 0) {
    throw new InputUnavailableError(sortFailures(failures));
  }

  const clusters = partitionRecords("clusters", raw.clusters ?? []);
  const nodes = partitionRecords("nodes", raw.nodes ?? []);
  const namespaces = partitionRecords("namespaces", raw.namespaces ?? []);
  const deployments = partitionRecords("deployments", raw.deployments ?? []);
  const pods = partitionRecords("pods", raw.pods ?? []);

  return {
    clusters: clusters.records,
    nodes: nodes.records,
    namespaces: namespaces.records,
    deployments: deployments.records,
    pods: pods.records,
    malformed: [
      ...clusters.malformed,
      ...nodes.malformed,
      ...namespaces.malformed,
      ...deployments.malformed,
      ...pods.malformed,
    ],
  };
}

function sortFailures(failures: CollectionFailure[]): CollectionFailure[] {
  return [...failures].sort((a, b) => ENTITY_KINDS.indexOf(a.entity) - ENTITY_KINDS.indexOf(b.entity));
}

// =============================================================================
// Loading from disk
// =============================================================================

export type LoadedDocuments = {
  documents: Partial<CollectionDocuments>;
  failures: CollectionFailure[];
};

/** Read the five documents from `dir`. Unreadable or unparsable files become failures. */
export async function readCollectionDocuments(dir: string): Promise<LoadedDocuments> {
  const documents: Partial<CollectionDocuments> = {};
  const failures: CollectionFailure[] = [];

  await Promise.all(
    ENTITY_KINDS.map(async (kind) => {
      const filePath = join(dir, COLLECTION_FILES[kind]);
      let text: string;
      try {
        text = await readFile(filePath, "utf-8");
      } catch (error) {
        const code = isObject(error) && typeof error.code === "string" ? error.code : undefined;
        failures.push({
          entity: kind,
          reason: code === "ENOENT" ? `file not found: ${filePath}` : `cannot read ${filePath}: ${String(error)}`,
        });
        return;
      }
      try {
        documents[kind] = JSON.parse(text);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        failures.push({ entity: kind, reason: `invalid JSON in ${filePath}: ${message}` });
      }
    }),
  );

  return { documents, failures };
}

export async function loadCollections(dir: string): Promise<ParsedCollections> {
  const { documents, failures } = await readCollectionDocuments(dir);
  return parseCollections(documents, failures);
}
