import { existsSync } from "node:fs";
import { rm } from "node:fs/promises";
import { join, resolve } from "node:path";
import { IArchiveService } from "../domain/services/archive.service.js";
import { ILogger } from "../domain/services/logger.service.js";
import { CollectorError } from "../domain/entities/collector-error.entity.js";
import { archiveTimestamp } from "../../infrastructure/utils/time.utils.js";

export interface PackageLogsRequest {
  files: string[];
  archiveDir: string;
  archivePrefix: string;
  /** Taken when the run started, not when packaging begins. */
  startedAt: Date;
}

export type PackageStatus = "created" | "incomplete" | "failed";

export interface PackageLogsResult {
  status: PackageStatus;
  archivePath?: string;
  /** Whether the temporary log files were removed afterwards. */
  cleanedUp: boolean;
  error?: CollectorError;
}

export function archiveFileName(prefix: string, startedAt: Date): string {
  return `${prefix}_${archiveTimestamp(startedAt)}.tar.gz`;
}

export class PackageLogsUseCase {
  constructor(
    private archiver: IArchiveService,
    private logger: ILogger,
  ) {}

  async execute(request: PackageLogsRequest): Promise<PackageLogsResult> {
    this.logger.info("Packaging logs into a compressed archive...");

    const missing = request.files.filter((f) => !existsSync(f));
    if (missing.length > 0) {
      const error = new CollectorError(
        "ArchiveIncomplete",
        `One or more log files were not found (${missing.join(", ")}). Cannot create archive.`,
      );
      this.logger.error(error.message);
      await this.cleanup(request.files);
      return { status: "incomplete", cleanedUp: true, error };
    }

    const archivePath = resolve(
      join(request.archiveDir, archiveFileName(request.archivePrefix, request.startedAt)),
    );
    try {
      await this.archiver.createArchive(archivePath, request.files);
    } catch (e) {
      // Partial archive and raw logs are both left for manual recovery.
      const msg = e instanceof Error ? e.message : String(e);
      const error = new CollectorError(
        "ArchiveCreationFailure",
        `Failed to create the archive at ${archivePath}. ${msg}`,
        { cause: e },
      );
      this.logger.error(error.message);
      this.logger.error(`Temporary log files were kept: ${request.files.join(", ")}`);
      return { status: "failed", cleanedUp: false, error };
    }

    this.logger.info("Successfully created debug package!");
    await this.cleanup(request.files);
    return { status: "created", archivePath, cleanedUp: true };
  }

  private async cleanup(files: string[]): Promise<void> {
    this.logger.info("Cleaning up temporary files...");
    await Promise.all(files.map((f) => rm(f, { force: true })));
  }
}
