import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { CaptureLogsUseCase } from "./capture-logs.use-case.js";
import { FakeClashApi, RecordingLogger } from "../../test-utils/fakes.js";

describe("CaptureLogsUseCase", () => {
  let dir: string;
  let logger: RecordingLogger;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "capture-logs-"));
    logger = new RecordingLogger();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("reports a completed capture with its size", async () => {
    const api = new FakeClashApi([{ statusCode: 200, body: '{"type":"debug"}\n' }], [200]);
    const destination = join(dir, "full.log");

    const result = await new CaptureLogsUseCase(api, logger).execute({
      destination,
      durationMs: 20000,
    });

    expect(result.endedBy).toBe("deadline");
    expect(api.streamCalls).toEqual([{ destination, deadlineMs: 20000 }]);
    expect(logger.messages("info")).toEqual([
      "API is online! Capturing initial logs for 20 seconds...",
      `Initial API log capture complete (17 bytes). Saved to ${destination}`,
    ]);
    expect(logger.messages("error")).toEqual([]);
  });

  it("reports a failed capture as an error only", async () => {
    const api = new FakeClashApi(
      [{ statusCode: 200, body: "", endedBy: "error", errorMessage: "cannot write full.log: ENOSPC" }],
      [200],
    );

    await new CaptureLogsUseCase(api, logger).execute({
      destination: join(dir, "full.log"),
      durationMs: 20000,
    });

    expect(logger.messages("info")).toEqual([
      "API is online! Capturing initial logs for 20 seconds...",
    ]);
    expect(logger.messages("error")).toEqual([
      "Log capture ended early after 0 bytes: cannot write full.log: ENOSPC.",
    ]);
  });

  it("writes an empty placeholder", async () => {
    const destination = join(dir, "full.log");

    await new CaptureLogsUseCase(new FakeClashApi([{ statusCode: 200, body: "x" }], [200]), logger)
      .writePlaceholder(destination);

    expect(readFileSync(destination, "utf-8")).toBe("");
  });
});
