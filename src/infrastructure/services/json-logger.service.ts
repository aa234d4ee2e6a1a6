import { createWriteStream, mkdirSync, existsSync, WriteStream } from "node:fs";
import { dirname } from "node:path";
import {
  ILogger,
  LogLevel,
} from "../../core/domain/services/logger.service.js";

export class JsonLogger implements ILogger {
  private logStream: WriteStream | null = null;

  constructor(logPath: string) {
    const dir = dirname(logPath);
    if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
    this.logStream = createWriteStream(logPath, { flags: "a" });
  }

  private write(level: LogLevel, message: string): void {
    if (this.logStream?.writable) {
      const entry = { timestamp: new Date().toISOString(), level, message };
      this.logStream.write(JSON.stringify(entry) + "\n");
    }
  }

  info(message: string): void {
    this.write("info", message);
  }

  error(message: string): void {
    this.write("error", message);
  }

  close(): Promise<void> {
    const stream = this.logStream;
    this.logStream = null;
    if (!stream) return Promise.resolve();
    return new Promise((resolve) => stream.end(() => resolve()));
  }
}
