import { ILogger } from "../../core/domain/services/logger.service.js";

/** Operator-facing progress lines: INFO to stdout, ERROR to stderr. */
export class ConsoleLogger implements ILogger {
  info(message: string): void {
    console.log(`INFO: ${message}`);
  }

  error(message: string): void {
    console.error(`ERROR: ${message}`);
  }

  async close(): Promise<void> {}
}
