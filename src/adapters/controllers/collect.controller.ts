/**
 * Collect command: loads the configuration, acquires the secret, runs the
 * stages and turns the report into console output and an exit code.
 */

import { loadConfig } from "../../infrastructure/utils/config.utils.js";
import { systemClock } from "../../infrastructure/utils/time.utils.js";
import { ConsoleLogger } from "../../infrastructure/services/console-logger.service.js";
import { JsonLogger } from "../../infrastructure/services/json-logger.service.js";
import { MultiLogger } from "../../infrastructure/services/multi-logger.service.js";
import { CredentialService } from "../../infrastructure/services/credential.service.js";
import { ClashApiService } from "../../infrastructure/services/clash-api.service.js";
import { ChildProcessRunner } from "../../infrastructure/services/child-process-runner.service.js";
import { TarArchiveService } from "../../infrastructure/services/tar-archive.service.js";
import {
  CollectDebugBundleUseCase,
  CollectorServices,
} from "../../core/use-cases/collect-debug-bundle.use-case.js";
import { CollectionReport } from "../../core/domain/entities/collection-report.entity.js";
import { Config } from "../../core/domain/entities/config.entity.js";
import { ILogger } from "../../core/domain/services/logger.service.js";
import { IConfigService } from "../../core/domain/services/config.service.js";
import { ICredentialService } from "../../core/domain/services/credential.service.js";

const RULE = "=========================================================";

export interface CollectCommandOptions {
  config?: string;
}

/** Seams for the services the command builds; production wiring by default. */
export interface CollectCommandDeps {
  loadConfig: (path?: string) => IConfigService;
  createLogger: (config: Config) => ILogger;
  createCredentials: (logger: ILogger) => ICredentialService;
  createServices: (config: Config, secret: string) => Omit<CollectorServices, "logger">;
}

function createLogger(config: Config): ILogger {
  const consoleLogger = new ConsoleLogger();
  if (!config.logging.jsonLogPath) return consoleLogger;
  return new MultiLogger([consoleLogger, new JsonLogger(config.logging.jsonLogPath)]);
}

const defaultDeps: CollectCommandDeps = {
  loadConfig,
  createLogger,
  createCredentials: (logger) => new CredentialService(logger),
  createServices: (config, secret) => ({
    api: new ClashApiService({ url: config.api.url, secret }),
    runner: new ChildProcessRunner(),
    archiver: new TarArchiveService(),
    clock: systemClock,
  }),
};

function printBanner() {
  console.log(RULE);
  console.log("        OpenClash Advanced Debug Log Collector");
  console.log(RULE);
}

function printSummary(report: CollectionReport) {
  if (report.archivePath) {
    console.log(RULE);
    console.log("  Debug package is ready!");
    console.log(`  You can download it from: ${report.archivePath}`);
    console.log("  Use SCP or a tool like WinSCP to get the file.");
    console.log(RULE);
  }
  if (report.status === "completed" && report.errors.length > 0) {
    console.log(
      `Finished with ${report.errors.length} warning(s): ${report.errors.map((e) => e.kind).join(", ")}`,
    );
  }
}

/** Runs one collection and returns the process exit code. */
export async function runCollectCommand(
  opts: CollectCommandOptions,
  overrides: Partial<CollectCommandDeps> = {},
): Promise<number> {
  const deps: CollectCommandDeps = { ...defaultDeps, ...overrides };
  // Archive name carries the invocation time, not the packaging time.
  const startedAt = new Date();
  let configService: IConfigService;
  try {
    configService = deps.loadConfig(opts.config);
  } catch (e) {
    console.error(`ERROR: ${e instanceof Error ? e.message : String(e)}`);
    return 1;
  }

  const config = configService.getConfig();
  const logger = deps.createLogger(config);
  printBanner();
  const source = configService.getSourcePath();
  logger.info(source ? `Using configuration from ${source}` : "Using built-in configuration defaults.");

  const secret = await deps.createCredentials(logger).acquire();
  const services = deps.createServices(config, secret);

  try {
    const useCase = new CollectDebugBundleUseCase(config, { ...services, logger });
    const report = await useCase.execute(startedAt);
    printSummary(report);
    if (report.status === "completed") logger.info("Collection finished.");
    return report.exitCode;
  } catch (e) {
    logger.error(`Unexpected failure: ${e instanceof Error ? e.message : String(e)}`);
    return 1;
  } finally {
    await services.api.close();
    await logger.close();
  }
}
