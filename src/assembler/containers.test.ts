import { describe, it, expect } from "vitest";
import { flattenContainers, podNodeName, toInventoryPod } from "./containers.js";

describe("flattenContainers", () => {
  it("maps one container per live instance in source order", () => {
    const containers = flattenContainers([
      { instanceId: { containerRuntime: "containerd", id: "cid1", node: "n1" } },
      { instanceId: { containerRuntime: "docker", id: "cid2", node: "n2" }, containerName: "sidecar" },
    ]);
    expect(containers).toEqual([
      { name: "n1", id: "cid1", runtime: "containerd" },
      { name: "sidecar", id: "cid2", runtime: "docker" },
    ]);
  });

  it("uses null for fields an instance does not carry", () => {
    expect(flattenContainers([{ instanceId: {} }])).toEqual([{ name: null, id: null, runtime: null }]);
  });

  it("reads null, missing and non-string instance fields as null", () => {
    expect(
      flattenContainers([
        { instanceId: { id: "x", node: null }, containerName: null },
        { containerName: "c" },
        { instanceId: { id: 42, containerRuntime: "docker" } },
        "not an instance",
      ]),
    ).toEqual([
      { name: null, id: "x", runtime: null },
      { name: "c", id: null, runtime: null },
      { name: null, id: null, runtime: "docker" },
      { name: null, id: null, runtime: null },
    ]);
  });

  it("treats a non-list liveInstances value as no instances", () => {
    expect(flattenContainers({ instanceId: { id: "x" } })).toEqual([]);
    expect(flattenContainers(null)).toEqual([]);
  });

  it("returns an empty list when the pod has no live instances", () => {
    expect(flattenContainers()).toEqual([]);
    expect(flattenContainers([])).toEqual([]);
  });
});

describe("podNodeName", () => {
  it("takes the node of the last instance that names one", () => {
    expect(
      podNodeName([{ instanceId: { node: "n1" } }, { instanceId: { node: "n2" } }, { instanceId: { id: "x" } }]),
    ).toBe("n2");
  });

  it("skips instances whose node is null", () => {
    expect(podNodeName([{ instanceId: { node: "n1" } }, { instanceId: { node: null } }])).toBe("n1");
  });

  it("is null when no instance names a node", () => {
    expect(podNodeName([{ instanceId: { id: "x" } }])).toBeNull();
    expect(podNodeName()).toBeNull();
  });
});

describe("toInventoryPod", () => {
  it("drops join keys and keeps identity, node and containers", () => {
    const pod = toInventoryPod({
      id: "p1",
      name: "api-0",
      clusterId: "c1",
      namespace: "web",
      deploymentId: "d1",
      liveInstances: [{ instanceId: { containerRuntime: "containerd", id: "cid1", node: "n1" } }],
    });
    expect(pod).toEqual({
      id: "p1",
      name: "api-0",
      node: "n1",
      containers: [{ name: "n1", id: "cid1", runtime: "containerd" }],
    });
  });

  it("uses null for a pod without a name", () => {
    expect(toInventoryPod({ id: "p1", clusterId: "c1", namespace: "web", name: null })).toEqual({
      id: "p1",
      name: null,
      node: null,
      containers: [],
    });
  });
});
