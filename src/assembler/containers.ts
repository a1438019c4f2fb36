/**
 * Pod → container flattening.
 *
 * Live instances arrive as raw values: any instance field that is missing,
 * null or not a string reads as null, and an instance without `instanceId`
 * still yields a container.
 */

import type { PodRecord } from "../records.js";
import type { Container, InventoryPod } from "../types.js";

type InstanceFields = {
  containerName: string | null;
  id: string | null;
  node: string | null;
  runtime: string | null;
};

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function text(value: unknown): string | null {
  return typeof value === "string" ? value : null;
}

function readInstance(instance: unknown): InstanceFields {
  const fields = isObject(instance) ? instance : {};
  const instanceId = isObject(fields.instanceId) ? fields.instanceId : {};
  return {
    containerName: text(fields.containerName),
    id: text(instanceId.id),
    node: text(instanceId.node),
    runtime: text(instanceId.containerRuntime),
  };
}

function readInstances(liveInstances: unknown): InstanceFields[] {
  return Array.isArray(liveInstances) ? liveInstances.map(readInstance) : [];
}

/**
 * One container per live instance, in source order.
 * Instances carry no container name of their own in most inventories, so the
 * instance's node name stands in when `containerName` is absent.
 */
export function flattenContainers(liveInstances: unknown = []): Container[] {
  return readInstances(liveInstances).map((instance) => ({
    name: instance.containerName ?? instance.node,
    id: instance.id,
    runtime: instance.runtime,
  }));
}

/** Node of the last instance that names one. */
export function podNodeName(liveInstances: unknown = []): string | null {
  let node: string | null = null;
  for (const instance of readInstances(liveInstances)) {
    if (instance.node !== null) node = instance.node;
  }
  return node;
}

export function toInventoryPod(pod: PodRecord): InventoryPod {
  return {
    id: pod.id,
    name: text(pod.name),
    node: podNodeName(pod.liveInstances),
    containers: flattenContainers(pod.liveInstances),
  };
}
