import { existsSync } from "node:fs";
import { rm } from "node:fs/promises";
import { ICommandRunner } from "../domain/services/command-runner.service.js";
import { ILogger } from "../domain/services/logger.service.js";
import { CollectorError } from "../domain/entities/collector-error.entity.js";

export interface RunVendorDebugRequest {
  script: string;
  /** Where the script always writes; not configurable on the script side. */
  outputPath: string;
}

export interface RunVendorDebugResult {
  produced: boolean;
  exitCode: number | null;
  error?: CollectorError;
}

export class RunVendorDebugUseCase {
  constructor(
    private runner: ICommandRunner,
    private logger: ILogger,
  ) {}

  async execute(request: RunVendorDebugRequest): Promise<RunVendorDebugResult> {
    this.logger.info("Running the standard OpenClash debug script...");
    // A leftover from an earlier run must not pass the existence check.
    await rm(request.outputPath, { force: true });

    const result = await this.runner.run(request.script);

    if (!existsSync(request.outputPath)) {
      const error = new CollectorError(
        "ExternalScriptOutputMissing",
        `The OpenClash debug script did not create the expected log file at ${request.outputPath}.`,
      );
      this.logger.error(error.message);
      this.logger.error(
        `Please check if the script ${request.script} exists and is executable.`,
      );
      return { produced: false, exitCode: result.exitCode, error };
    }

    this.logger.info(`Standard debug log created at ${request.outputPath}`);
    return { produced: true, exitCode: result.exitCode };
  }
}
