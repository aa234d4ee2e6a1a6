import { randomUUID } from "node:crypto";
import { readFile, rm } from "node:fs/promises";
import { join } from "node:path";
import { IClashApiService } from "../domain/services/clash-api.service.js";
import { ILogger } from "../domain/services/logger.service.js";
import {
  ProbeOutcome,
  ProbeResult,
  UNAUTHORIZED_MARKER,
  classifyProbe,
} from "../domain/entities/probe-result.entity.js";
import { CollectorError } from "../domain/entities/collector-error.entity.js";

export interface VerifyApiAccessRequest {
  scratchDir: string;
  timeoutMs: number;
}

export interface VerifyApiAccessResult {
  outcome: ProbeOutcome;
  probe: ProbeResult;
  error?: CollectorError;
}

/**
 * Single probe of the log endpoint before anything disruptive happens.
 * The body is staged in a scratch file only long enough to look for the
 * unauthorized marker.
 */
export class VerifyApiAccessUseCase {
  constructor(
    private api: IClashApiService,
    private logger: ILogger,
  ) {}

  async execute(request: VerifyApiAccessRequest): Promise<VerifyApiAccessResult> {
    this.logger.info("Testing API connectivity and authentication...");

    const scratch = join(request.scratchDir, `openclash_probe_${randomUUID()}.body`);
    let probe: ProbeResult;
    try {
      const res = await this.api.streamToFile(scratch, request.timeoutMs);
      const body = await readFile(scratch, "utf-8");
      probe = {
        httpStatus: res.statusCode,
        bodyContainsUnauthorizedMarker: body.includes(UNAUTHORIZED_MARKER),
      };
    } finally {
      await rm(scratch, { force: true });
    }

    const outcome = classifyProbe(probe);
    switch (outcome) {
      case "AuthFailed": {
        const error = new CollectorError(
          "AuthenticationError",
          "Authentication failed. The secret you provided is incorrect.",
        );
        this.logger.error(error.message);
        return { outcome, probe, error };
      }
      case "ConnectFailed": {
        const error = new CollectorError(
          "ConnectivityError",
          `Could not connect to OpenClash API (HTTP Status: ${probe.httpStatus}).`,
        );
        this.logger.error(error.message);
        this.logger.error(
          "Please ensure OpenClash is running and the API is accessible before running this tool.",
        );
        return { outcome, probe, error };
      }
      case "Ok":
        this.logger.info("API connection and authentication successful.");
        return { outcome, probe };
    }
  }
}
