import { ILogger } from "../../core/domain/services/logger.service.js";

export class MultiLogger implements ILogger {
  constructor(private loggers: ILogger[]) {}

  info(message: string): void {
    for (const l of this.loggers) l.info(message);
  }

  error(message: string): void {
    for (const l of this.loggers) l.error(message);
  }

  async close(): Promise<void> {
    await Promise.all(this.loggers.map((l) => l.close()));
  }
}
