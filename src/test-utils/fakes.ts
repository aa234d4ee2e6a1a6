import { writeFileSync } from "node:fs";
import {
  IClashApiService,
  StreamEnd,
  StreamToFileResult,
} from "../core/domain/services/clash-api.service.js";
import {
  CommandResult,
  ICommandRunner,
} from "../core/domain/services/command-runner.service.js";
import { Clock } from "../core/domain/services/clock.service.js";
import { ILogger, LogLevel } from "../core/domain/services/logger.service.js";

/** Virtual time: sleeping advances the clock instantly. */
export class FakeClock implements Clock {
  sleeps: number[] = [];

  constructor(public time = 0) {}

  now(): number {
    return this.time;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.time += ms;
  }
}

export class RecordingLogger implements ILogger {
  lines: { level: LogLevel; message: string }[] = [];

  info(message: string): void {
    this.lines.push({ level: "info", message });
  }

  error(message: string): void {
    this.lines.push({ level: "error", message });
  }

  async close(): Promise<void> {}

  messages(level: LogLevel): string[] {
    return this.lines.filter((l) => l.level === level).map((l) => l.message);
  }
}

export interface FakeStreamResponse {
  statusCode: number;
  body: string;
  endedBy?: StreamEnd;
  errorMessage?: string;
}

/**
 * Scripted API. Responses are consumed in order and the last one repeats.
 * A stream that ends by deadline advances the clock by the full deadline.
 */
export class FakeClashApi implements IClashApiService {
  streamCalls: { destination: string; deadlineMs: number }[] = [];
  statusCalls: number[] = [];
  closed = false;

  constructor(
    private streams: FakeStreamResponse[],
    private statuses: number[],
    private clock?: FakeClock,
  ) {}

  async streamToFile(
    destination: string,
    deadlineMs: number,
  ): Promise<StreamToFileResult> {
    const index = Math.min(this.streamCalls.length, this.streams.length - 1);
    const response = this.streams[index];
    this.streamCalls.push({ destination, deadlineMs });
    writeFileSync(destination, response.body);
    const endedBy = response.endedBy ?? "deadline";
    if (endedBy === "deadline" && this.clock) this.clock.time += deadlineMs;
    const result: StreamToFileResult = {
      statusCode: response.statusCode,
      bytesWritten: Buffer.byteLength(response.body),
      endedBy,
    };
    if (response.errorMessage !== undefined) result.errorMessage = response.errorMessage;
    return result;
  }

  async checkStatus(timeoutMs: number): Promise<number> {
    const index = Math.min(this.statusCalls.length, this.statuses.length - 1);
    this.statusCalls.push(timeoutMs);
    return this.statuses[index];
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export class FakeCommandRunner implements ICommandRunner {
  calls: { command: string; args: string[] }[] = [];

  constructor(
    private handlers: Record<string, () => number | null> = {},
  ) {}

  async run(command: string, args: string[] = []): Promise<CommandResult> {
    this.calls.push({ command, args });
    const handler = this.handlers[command];
    const exitCode = handler ? handler() : 0;
    return { command: [command, ...args].join(" "), exitCode };
  }
}
