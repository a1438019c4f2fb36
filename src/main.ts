#!/usr/bin/env node
/**
 * kube-inventory entrypoint.
 */

import { Command } from "commander";
import { registerInventoryCli } from "./cli.js";
import { loadConfigFromEnv, loggerOptions, type InventoryConfig } from "./config.js";
import { formatErrorMessage } from "./errors.js";
import { createInventoryLogger, setGlobalInventoryLogger } from "./logging/index.js";
import { VERSION } from "./version.js";

async function main(argv: string[]): Promise<void> {
  let config: InventoryConfig;
  try {
    config = loadConfigFromEnv();
  } catch (error) {
    console.error(formatErrorMessage(error));
    process.exitCode = 1;
    return;
  }

  const logger = createInventoryLogger("cli", loggerOptions(config));
  setGlobalInventoryLogger(logger);

  const program = new Command("kube-inventory")
    .description("Collect cluster inventory and assemble it into one hierarchy")
    .version(VERSION);

  registerInventoryCli({ program, config, logger });

  try {
    await program.parseAsync(argv);
  } finally {
    await logger.close();
  }
}

main(process.argv).catch((error: unknown) => {
  console.error(formatErrorMessage(error));
  process.exitCode = 1;
});
