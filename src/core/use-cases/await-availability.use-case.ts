import { IClashApiService } from "../domain/services/clash-api.service.js";
import { ILogger } from "../domain/services/logger.service.js";
import { Clock } from "../domain/services/clock.service.js";
import { CollectorError } from "../domain/entities/collector-error.entity.js";
import { seconds } from "../../infrastructure/utils/time.utils.js";

export interface AwaitAvailabilityRequest {
  readyTimeoutMs: number;
  pollIntervalMs: number;
  pollTimeoutMs: number;
}

export type AvailabilityState = "ready" | "timed_out";

export interface AwaitAvailabilityResult {
  state: AvailabilityState;
  attempts: number;
  elapsedMs: number;
  lastStatus: number | null;
  error?: CollectorError;
}

/**
 * Waiting -> Ready on the first HTTP 200. No probe or sleep ever runs past
 * readyTimeoutMs measured from the first tick.
 */
export class AwaitAvailabilityUseCase {
  constructor(
    private api: IClashApiService,
    private logger: ILogger,
    private clock: Clock,
  ) {}

  async execute(request: AwaitAvailabilityRequest): Promise<AwaitAvailabilityResult> {
    const { readyTimeoutMs, pollIntervalMs, pollTimeoutMs } = request;
    this.logger.info("Starting log capture process. This will wait for the API to come online...");
    this.logger.info(`(This may take up to ${seconds(readyTimeoutMs)} seconds)`);

    const start = this.clock.now();
    let attempts = 0;
    let lastStatus: number | null = null;

    for (;;) {
      const elapsedMs = this.clock.now() - start;
      const remaining = readyTimeoutMs - elapsedMs;
      if (remaining <= 0) {
        const error = new CollectorError(
          "AvailabilityTimeout",
          `OpenClash API did not become available after ${seconds(readyTimeoutMs)} seconds.`,
        );
        this.logger.error(error.message);
        this.logger.error("Skipping initial API log capture.");
        return { state: "timed_out", attempts, elapsedMs, lastStatus, error };
      }

      attempts += 1;
      lastStatus = await this.api.checkStatus(Math.min(pollTimeoutMs, remaining));
      if (lastStatus === 200) {
        return {
          state: "ready",
          attempts,
          elapsedMs: this.clock.now() - start,
          lastStatus,
        };
      }

      const left = readyTimeoutMs - (this.clock.now() - start);
      if (left <= 0) continue;
      const wait = Math.min(pollIntervalMs, left);
      this.logger.info(
        `API not ready yet (Status: ${lastStatus}). Retrying in ${seconds(wait)} second(s)...`,
      );
      await this.clock.sleep(wait);
    }
  }
}
