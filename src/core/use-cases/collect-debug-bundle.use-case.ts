import { Config } from "../domain/entities/config.entity.js";
import { CollectionReport } from "../domain/entities/collection-report.entity.js";
import { CollectorError } from "../domain/entities/collector-error.entity.js";
import { IClashApiService } from "../domain/services/clash-api.service.js";
import { ICommandRunner } from "../domain/services/command-runner.service.js";
import { IArchiveService } from "../domain/services/archive.service.js";
import { ILogger } from "../domain/services/logger.service.js";
import { Clock } from "../domain/services/clock.service.js";
import { VerifyApiAccessUseCase } from "./verify-api-access.use-case.js";
import { RestartServiceUseCase } from "./restart-service.use-case.js";
import { AwaitAvailabilityUseCase } from "./await-availability.use-case.js";
import { CaptureLogsUseCase } from "./capture-logs.use-case.js";
import { SplitDebugLogsUseCase } from "./split-debug-logs.use-case.js";
import { RunVendorDebugUseCase } from "./run-vendor-debug.use-case.js";
import { PackageLogsUseCase } from "./package-logs.use-case.js";

export interface CollectorServices {
  api: IClashApiService;
  runner: ICommandRunner;
  archiver: IArchiveService;
  logger: ILogger;
  clock: Clock;
}

/**
 * Runs the stages strictly in order. Only the initial access check can stop
 * the run; every later failure is recorded on the report and replaced by an
 * empty file so the next stage sees the same inputs.
 */
export class CollectDebugBundleUseCase {
  private verifyAccess: VerifyApiAccessUseCase;
  private restart: RestartServiceUseCase;
  private awaitAvailability: AwaitAvailabilityUseCase;
  private capture: CaptureLogsUseCase;
  private split: SplitDebugLogsUseCase;
  private vendorDebug: RunVendorDebugUseCase;
  private packageLogs: PackageLogsUseCase;

  constructor(
    private config: Config,
    services: CollectorServices,
  ) {
    const { api, runner, archiver, logger, clock } = services;
    this.verifyAccess = new VerifyApiAccessUseCase(api, logger);
    this.restart = new RestartServiceUseCase(runner, logger, clock);
    this.awaitAvailability = new AwaitAvailabilityUseCase(api, logger, clock);
    this.capture = new CaptureLogsUseCase(api, logger);
    this.split = new SplitDebugLogsUseCase(logger);
    this.vendorDebug = new RunVendorDebugUseCase(runner, logger);
    this.packageLogs = new PackageLogsUseCase(archiver, logger);
  }

  async execute(startedAt: Date = new Date()): Promise<CollectionReport> {
    const { api, service, capture, paths, vendor } = this.config;
    const errors: CollectorError[] = [];

    const access = await this.verifyAccess.execute({
      scratchDir: paths.scratchDir,
      timeoutMs: api.probeTimeoutMs,
    });
    if (access.error) {
      return {
        status: access.outcome === "AuthFailed" ? "auth_failed" : "connect_failed",
        exitCode: 1,
        captureSkipped: false,
        errors: [access.error],
      };
    }

    await this.restart.execute({
      command: service.restartCommand,
      settleMs: service.settleMs,
    });

    const availability = await this.awaitAvailability.execute({
      readyTimeoutMs: service.readyTimeoutMs,
      pollIntervalMs: service.pollIntervalMs,
      pollTimeoutMs: api.pollTimeoutMs,
    });
    const captureSkipped = availability.state !== "ready";
    if (availability.error) errors.push(availability.error);
    if (captureSkipped) {
      await this.capture.writePlaceholder(paths.fullApiLog);
    } else {
      await this.capture.execute({
        destination: paths.fullApiLog,
        durationMs: capture.durationMs,
      });
    }

    const split = await this.split.execute({
      source: paths.fullApiLog,
      destination: paths.debugApiLog,
      marker: capture.debugMarker,
    });
    if (split.error) errors.push(split.error);

    const debug = await this.vendorDebug.execute({
      script: vendor.debugScript,
      outputPath: paths.systemDebugLog,
    });
    if (debug.error) errors.push(debug.error);

    const pkg = await this.packageLogs.execute({
      files: [paths.fullApiLog, paths.debugApiLog, paths.systemDebugLog],
      archiveDir: paths.archiveDir,
      archivePrefix: paths.archivePrefix,
      startedAt,
    });
    if (pkg.error) errors.push(pkg.error);

    return {
      status: "completed",
      exitCode: 0,
      captureSkipped,
      archivePath: pkg.archivePath,
      errors,
    };
  }
}
