import { writeFile } from "node:fs/promises";
import {
  IClashApiService,
  StreamToFileResult,
} from "../domain/services/clash-api.service.js";
import { ILogger } from "../domain/services/logger.service.js";
import { seconds } from "../../infrastructure/utils/time.utils.js";

export interface CaptureLogsRequest {
  destination: string;
  durationMs: number;
}

export class CaptureLogsUseCase {
  constructor(
    private api: IClashApiService,
    private logger: ILogger,
  ) {}

  /** Holds the log stream open for durationMs; the file exists afterwards either way. */
  async execute(request: CaptureLogsRequest): Promise<StreamToFileResult> {
    this.logger.info(
      `API is online! Capturing initial logs for ${seconds(request.durationMs)} seconds...`,
    );
    const result = await this.api.streamToFile(
      request.destination,
      request.durationMs,
    );
    if (result.endedBy === "error") {
      this.logger.error(
        `Log capture ended early after ${result.bytesWritten} bytes: ${result.errorMessage ?? "unknown error"}.`,
      );
    } else {
      this.logger.info(
        `Initial API log capture complete (${result.bytesWritten} bytes). Saved to ${request.destination}`,
      );
    }
    return result;
  }

  /** Empty stand-in so the later stages see the same files as after a capture. */
  async writePlaceholder(destination: string): Promise<void> {
    await writeFile(destination, "");
  }
}
