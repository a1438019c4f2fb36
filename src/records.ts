/**
 * Input record schemas for the five inventory collections.
 *
 * Only the join keys are checked. Descriptive fields are listed for reference
 * but accept any JSON value; they are normalised during assembly. Unknown
 * fields are allowed.
 */

import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Check } from "@sinclair/typebox/value";
import { Errors } from "@sinclair/typebox/errors";

const Key = Type.String({ minLength: 1 });
const Descriptive = Type.Optional(Type.Unknown());

// ── Entities ────────────────────────────────────────────────────────────────

export const ClusterRecordSchema = Type.Object({
  id: Key,
  name: Descriptive,
  type: Descriptive,
  labels: Descriptive,
});

export const NodeRecordSchema = Type.Object({
  id: Key,
  clusterId: Key,
  name: Descriptive,
  labels: Descriptive,
  taints: Descriptive,
});

export const NamespaceRecordSchema = Type.Object({
  metadata: Type.Object({
    id: Key,
    name: Key,
    clusterId: Key,
    labels: Descriptive,
    annotations: Descriptive,
  }),
});

export const DeploymentRecordSchema = Type.Object({
  id: Key,
  clusterId: Key,
  namespace: Key,
  name: Descriptive,
  created: Descriptive,
});

/** `deploymentId` is a reference, not a key: anything but a known id makes the pod standalone. */
export const PodRecordSchema = Type.Object({
  id: Key,
  clusterId: Key,
  namespace: Key,
  name: Descriptive,
  deploymentId: Descriptive,
  liveInstances: Descriptive,
});

export type ClusterRecord = Static<typeof ClusterRecordSchema>;
export type NodeRecord = Static<typeof NodeRecordSchema>;
export type NamespaceRecord = Static<typeof NamespaceRecordSchema>;
export type DeploymentRecord = Static<typeof DeploymentRecordSchema>;
export type PodRecord = Static<typeof PodRecordSchema>;

// ── Entity kinds ────────────────────────────────────────────────────────────

export const ENTITY_KINDS = ["clusters", "nodes", "namespaces", "deployments", "pods"] as const;

export type EntityKind = (typeof ENTITY_KINDS)[number];

export type RecordOf<K extends EntityKind> = {
  clusters: ClusterRecord;
  nodes: NodeRecord;
  namespaces: NamespaceRecord;
  deployments: DeploymentRecord;
  pods: PodRecord;
}[K];

const SCHEMAS: { [K in EntityKind]: TSchema } = {
  clusters: ClusterRecordSchema,
  nodes: NodeRecordSchema,
  namespaces: NamespaceRecordSchema,
  deployments: DeploymentRecordSchema,
  pods: PodRecordSchema,
};

/** A record skipped because it lacks a field the assembler joins on. */
export type MalformedRecord = {
  entity: EntityKind;
  /** Position of the record in its source collection. */
  index: number;
  errors: string[];
};

export type RecordValidation<K extends EntityKind> =
  | { valid: true; record: RecordOf<K> }
  | { valid: false; errors: string[] };

function isRecordOf<K extends EntityKind>(kind: K, value: unknown): value is RecordOf<K> {
  return Check(SCHEMAS[kind], value);
}

// =============================================================================
// Validation
// =============================================================================

export function validateRecord<K extends EntityKind>(kind: K, value: unknown): RecordValidation<K> {
  if (isRecordOf(kind, value)) {
    return { valid: true, record: value };
  }

  const errors: string[] = [];
  for (const error of Errors(SCHEMAS[kind], value)) {
    const path = error.path || "(root)";
    errors.push(`${path}: ${error.message}`);
  }
  return { valid: false, errors: errors.length > 0 ? errors : ["Record does not match schema"] };
}

/**
 * Split raw values into valid records and malformed entries.
 * Record order is preserved.
 */
export function partitionRecords<K extends EntityKind>(
  kind: K,
  values: readonly unknown[],
): { records: RecordOf<K>[]; malformed: MalformedRecord[] } {
  const records: RecordOf<K>[] = [];
  const malformed: MalformedRecord[] = [];

  values.forEach((value, index) => {
    const result = validateRecord(kind, value);
    if (result.valid) {
      records.push(result.record);
    } else {
      malformed.push({ entity: kind, index, errors: result.errors });
    }
  });

  return { records, malformed };
}
