/**
 * kube-inventory: CLI Commands
 *
 * `kube-inventory collect | assemble | run | stats`
 */

import type { Command } from "commander";
import { assembleFromDocuments, assembleInventory } from "./assembler/index.js";
import { InventoryCollector, type CollectorOptions } from "./collector/collector.js";
import { loadCollections, type CollectionDocuments } from "./collections.js";
import { requireApiCredentials, resolveOutputDir, type InventoryConfig } from "./config.js";
import { CollectorError, ConfigError, InputUnavailableError, formatErrorMessage } from "./errors.js";
import type { InventoryLogger } from "./logging/index.js";
import { saveCollections, saveInventory, serializeInventory } from "./storage/json-store.js";
import type { AssemblyResult, InventoryStatistics } from "./types.js";

// =============================================================================
// Types
// =============================================================================

export type CliContext = {
  program: Command;
  config: InventoryConfig;
  logger: InventoryLogger;
  /** Command output; defaults to stdout. */
  write?: (text: string) => void;
  collector?: CollectorOptions;
};

// =============================================================================
// Helpers
// =============================================================================

const STATISTIC_LABELS: ReadonlyArray<[keyof InventoryStatistics, string]> = [
  ["clusters", "Clusters"],
  ["nodes", "Nodes"],
  ["namespaces", "Namespaces"],
  ["deployments", "Deployments"],
  ["pods", "Pods"],
  ["standalone_pods", "Standalone pods"],
  ["cluster_stubs", "Cluster stubs"],
  ["namespace_stubs", "Namespace stubs"],
  ["deployment_stubs", "Deployment stubs"],
  ["unresolved_node_refs", "Unresolved node refs"],
  ["cluster_mismatches", "Cluster mismatches"],
  ["malformed_records", "Malformed records"],
];

/** One `Label  value` line per statistic, labels padded to a common width. */
export function formatStatistics(stats: InventoryStatistics): string {
  const width = Math.max(...STATISTIC_LABELS.map(([, label]) => label.length));
  return STATISTIC_LABELS.map(([key, label]) => `${label.padEnd(width)}  ${stats[key]}`).join("\n");
}

/** Log a command failure and mark the process as failed. */
function fail(ctx: CliContext, error: unknown): void {
  if (error instanceof InputUnavailableError) {
    ctx.logger.error("Assembly aborted; input collections unavailable", {
      failed: error.failures.map((f) => `${f.entity}: ${f.reason}`),
    });
  } else if (error instanceof CollectorError) {
    ctx.logger.error(`Collection failed (${error.endpoint}): ${error.message}`);
  } else if (error instanceof ConfigError) {
    ctx.logger.error(error.message);
  } else {
    ctx.logger.error(`Unexpected failure: ${formatErrorMessage(error)}`);
  }
  process.exitCode = 1;
}

/** One collection run; the collector is closed whether or not it succeeds. */
async function collect(ctx: CliContext): Promise<CollectionDocuments> {
  const collector = new InventoryCollector(requireApiCredentials(ctx.config), {
    logger: ctx.logger.child("collector"),
    ...ctx.collector,
  });
  try {
    return await collector.collect();
  } finally {
    await collector.close();
  }
}

// =============================================================================
// CLI Registration
// =============================================================================

export function registerInventoryCli(ctx: CliContext): void {
  const write = ctx.write ?? ((text: string) => process.stdout.write(`${text}\n`));
  const { program, config, logger } = ctx;

  const report = (result: AssemblyResult) => {
    write(formatStatistics(result.statistics));
  };

  // ---------------------------------------------------------------------------
  // collect
  // ---------------------------------------------------------------------------
  program
    .command("collect")
    .description("Fetch the five inventory collections and save them as JSON")
    .option("-o, --out <dir>", "directory for the collection documents", config.dataDir)
    .action(async (opts: { out: string }) => {
      try {
        const documents = await collect(ctx);
        const paths = await saveCollections(opts.out, documents);
        logger.info(`Saved ${paths.length} collection documents to ${opts.out}`);
      } catch (error) {
        fail(ctx, error);
      }
    });

  // ---------------------------------------------------------------------------
  // assemble
  // ---------------------------------------------------------------------------
  program
    .command("assemble")
    .description("Assemble saved collections into one hierarchical inventory")
    .option("-d, --data <dir>", "directory holding the collection documents", config.dataDir)
    .option("-o, --out <dir>", "directory for the inventory file", resolveOutputDir(config))
    .option("--stdout", "print the inventory instead of writing a file")
    .action(async (opts: { data: string; out: string; stdout?: boolean }) => {
      try {
        const collections = await loadCollections(opts.data);
        const result = assembleInventory(collections, { logger: logger.child("assembler") });

        if (opts.stdout) {
          write(serializeInventory(result).trimEnd());
          return;
        }
        const filePath = await saveInventory(opts.out, result);
        write(`Inventory written to ${filePath}`);
        report(result);
      } catch (error) {
        fail(ctx, error);
      }
    });

  // ---------------------------------------------------------------------------
  // run
  // ---------------------------------------------------------------------------
  program
    .command("run")
    .description("Collect, save, and assemble in one pass")
    .option("-o, --out <dir>", "directory for collection documents and the inventory", config.dataDir)
    .action(async (opts: { out: string }) => {
      try {
        const documents = await collect(ctx);
        await saveCollections(opts.out, documents);

        const result = assembleFromDocuments(documents, { logger: logger.child("assembler") });
        const filePath = await saveInventory(opts.out, result);
        write(`Inventory written to ${filePath}`);
        report(result);
      } catch (error) {
        fail(ctx, error);
      }
    });

  // ---------------------------------------------------------------------------
  // stats
  // ---------------------------------------------------------------------------
  program
    .command("stats")
    .description("Assemble saved collections in memory and print statistics only")
    .option("-d, --data <dir>", "directory holding the collection documents", config.dataDir)
    .option("--json", "print statistics as JSON")
    .action(async (opts: { data: string; json?: boolean }) => {
      try {
        const collections = await loadCollections(opts.data);
        const result = assembleInventory(collections, { logger: logger.child("assembler") });
        write(opts.json ? JSON.stringify(result.statistics, null, 2) : formatStatistics(result.statistics));
      } catch (error) {
        fail(ctx, error);
      }
    });
}
