#!/usr/bin/env node
/**
 * OpenClash debug collector – CLI
 * Restarts OpenClash, captures the first seconds of API logs, runs the vendor
 * debug script and packs everything into one archive.
 */

import { program } from "commander";
import { runCollectCommand } from "./adapters/controllers/collect.controller.js";

process.on("SIGTERM", () => process.exit(143));

program
  .name("openclash-debug")
  .description("Collect OpenClash startup API logs and debug output into one archive")
  .version("1.0.0")
  .option("-c, --config <path>", "Config file path (default: CONFIG_PATH or config/config.yaml)")
  .action(async (opts: { config?: string }) => {
    process.exitCode = await runCollectCommand(opts);
  });

program.parseAsync(process.argv).catch((e: unknown) => {
  console.error(`ERROR: ${e instanceof Error ? e.message : String(e)}`);
  process.exit(1);
});
