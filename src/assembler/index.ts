/**
 * Inventory assembly: five flat collections in, one hierarchy plus statistics out.
 *
 * Assembly is synchronous and pure: each call owns a fresh builder, performs
 * no I/O, and returns newly allocated output.
 */

import { parseCollections, type CollectionDocuments } from "../collections.js";
import { getInventoryLogger, type InventoryLogger } from "../logging/index.js";
import type { AssemblyResult, InventoryInput } from "../types.js";
import { InventoryBuilder } from "./builder.js";
import { anomalyCounts, computeStatistics } from "./statistics.js";

export type AssembleOptions = {
  logger?: InventoryLogger;
};

export function assembleInventory(input: InventoryInput, options: AssembleOptions = {}): AssemblyResult {
  const logger = options.logger ?? getInventoryLogger("assembler");

  const inventory = new InventoryBuilder().populate(input).build();
  const malformed = [...(input.malformed ?? [])];
  const statistics = computeStatistics(inventory, malformed.length);

  logger.info("Inventory assembled", {
    clusters: statistics.clusters,
    nodes: statistics.nodes,
    namespaces: statistics.namespaces,
    deployments: statistics.deployments,
    pods: statistics.pods,
  });

  const anomalies = anomalyCounts(statistics);
  if (Object.keys(anomalies).length > 0) {
    logger.warn("Inventory has unresolved references or skipped records", anomalies);
  }
  for (const entry of malformed) {
    logger.debug(`Skipped malformed ${entry.entity} record #${entry.index}`, { errors: entry.errors });
  }

  return { inventory, statistics, malformed };
}

/**
 * Validate raw collection documents and assemble them.
 * Throws `InputUnavailableError` when any collection is unusable; no partial
 * inventory is produced in that case.
 */
export function assembleFromDocuments(
  documents: Partial<CollectionDocuments>,
  options: AssembleOptions = {},
): AssemblyResult {
  return assembleInventory(parseCollections(documents), options);
}

export { InventoryBuilder } from "./builder.js";
export { computeStatistics, emptyStatistics, anomalyCounts } from "./statistics.js";
export { flattenContainers, podNodeName, toInventoryPod } from "./containers.js";
