import { describe, it, expect } from "vitest";
import { Readable, Writable } from "node:stream";
import { CredentialService, SECRET_PROMPT } from "./credential.service.js";
import { RecordingLogger } from "../../test-utils/fakes.js";

function collector(): { stream: Writable; text: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      chunks.push(String(chunk));
      callback();
    },
  });
  return { stream, text: () => chunks.join("") };
}

describe("CredentialService", () => {
  it("reads and trims the secret typed at the prompt", async () => {
    const output = collector();
    const service = new CredentialService(new RecordingLogger(), {
      input: Readable.from(["  test-secret  \n"]),
      output: output.stream,
      env: {},
    });

    expect(await service.acquire()).toBe("test-secret");
    expect(output.text()).toContain(SECRET_PROMPT);
  });

  it("accepts an empty answer as no secret", async () => {
    const service = new CredentialService(new RecordingLogger(), {
      input: Readable.from(["\n"]),
      output: collector().stream,
      env: {},
    });

    expect(await service.acquire()).toBe("");
  });

  it("treats end of input as no secret", async () => {
    const service = new CredentialService(new RecordingLogger(), {
      input: Readable.from([]),
      output: collector().stream,
      env: {},
    });

    expect(await service.acquire()).toBe("");
  });

  it("skips the prompt when the environment provides the secret", async () => {
    const logger = new RecordingLogger();
    const output = collector();
    const service = new CredentialService(logger, {
      input: Readable.from([]),
      output: output.stream,
      env: { OPENCLASH_API_SECRET: "test-secret\n" },
    });

    expect(await service.acquire()).toBe("test-secret");
    expect(output.text()).toBe("");
    expect(logger.messages("info")).toEqual([
      "Using API secret from OPENCLASH_API_SECRET.",
    ]);
  });
});
