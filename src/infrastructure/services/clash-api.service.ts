/**
 * Clash control API client.
 * The /logs endpoint never finishes on its own, so every request runs under an
 * AbortController deadline; hitting the deadline after the headers arrived is
 * a normal end, not a failure.
 * Uses undici with its own Agent so the connect timeout follows the deadline
 * instead of Node's default 10s connect limit.
 */

import { createWriteStream, type WriteStream } from "node:fs";
import { once } from "node:events";
import { fetch, Agent } from "undici";
import {
  IClashApiService,
  StreamEnd,
  StreamToFileResult,
} from "../../core/domain/services/clash-api.service.js";

export interface ClashApiOptions {
  url: string;
  /** Empty string sends no Authorization header. */
  secret: string;
}

function describeError(err: unknown): string {
  const message = err instanceof Error ? err.message : String(err);
  const cause =
    err instanceof Error && err.cause instanceof Error
      ? err.cause.message
      : err instanceof Error && err.cause
        ? String(err.cause)
        : "";
  return cause ? `${message} (${cause})` : message;
}

/** Resolves once the file is closed, also when a write error already destroyed it. */
function endStream(out: WriteStream): Promise<void> {
  if (out.destroyed) return Promise.resolve();
  return new Promise((resolve) => {
    out.once("close", () => resolve());
    out.end();
  });
}

export class ClashApiService implements IClashApiService {
  private dispatcher = new Agent({
    connectTimeout: 5000,
    // The deadline controller bounds the body instead.
    bodyTimeout: 0,
  });

  constructor(private options: ClashApiOptions) {}

  buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = { Accept: "application/json" };
    if (this.options.secret.length > 0) {
      headers["Authorization"] = `Bearer ${this.options.secret}`;
    }
    return headers;
  }

  async streamToFile(
    destination: string,
    deadlineMs: number,
  ): Promise<StreamToFileResult> {
    const controller = new AbortController();
    const writeFailure: { error?: Error } = {};
    const out = createWriteStream(destination, { flags: "w" });
    // A failed write (ENOSPC on a full /tmp) stops the read instead of escaping.
    out.on("error", (err) => {
      writeFailure.error ??= err;
      controller.abort();
    });
    try {
      await once(out, "open");
    } catch (err) {
      return {
        statusCode: 0,
        bytesWritten: 0,
        endedBy: "error",
        errorMessage: `cannot open ${destination}: ${describeError(err)}`,
      };
    }

    const timer = setTimeout(() => controller.abort(), deadlineMs);
    let statusCode = 0;
    let bytesWritten = 0;
    let endedBy: StreamEnd = "complete";
    let errorMessage: string | undefined;

    try {
      const res = await fetch(this.options.url, {
        method: "GET",
        headers: this.buildHeaders(),
        signal: controller.signal,
        dispatcher: this.dispatcher,
      });
      statusCode = res.status;
      if (res.body) {
        for await (const chunk of res.body) {
          const buf = Buffer.from(chunk);
          bytesWritten += buf.length;
          if (!out.write(buf)) {
            await once(out, "drain", { signal: controller.signal });
          }
        }
      }
    } catch (err) {
      if (controller.signal.aborted) {
        endedBy = "deadline";
      } else {
        endedBy = "error";
        errorMessage = describeError(err);
      }
    } finally {
      clearTimeout(timer);
    }

    await endStream(out);
    if (writeFailure.error) {
      return {
        statusCode,
        bytesWritten,
        endedBy: "error",
        errorMessage: `cannot write ${destination}: ${describeError(writeFailure.error)}`,
      };
    }
    return errorMessage === undefined
      ? { statusCode, bytesWritten, endedBy }
      : { statusCode, bytesWritten, endedBy, errorMessage };
  }

  async checkStatus(timeoutMs: number): Promise<number> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    try {
      const res = await fetch(this.options.url, {
        method: "GET",
        headers: this.buildHeaders(),
        signal: controller.signal,
        dispatcher: this.dispatcher,
      });
      await res.body?.cancel();
      return res.status;
    } catch {
      return 0;
    } finally {
      clearTimeout(timer);
      controller.abort();
    }
  }

  async close(): Promise<void> {
    await this.dispatcher.destroy();
  }
}
