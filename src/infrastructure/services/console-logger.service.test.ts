import { describe, it, expect, vi, afterEach } from "vitest";
import { ConsoleLogger } from "./console-logger.service.js";

describe("ConsoleLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prefixes progress lines with INFO on stdout", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});

    new ConsoleLogger().info("Filtering API logs...");

    expect(log).toHaveBeenCalledWith("INFO: Filtering API logs...");
  });

  it("prefixes failures with ERROR on stderr", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});

    new ConsoleLogger().error("Failed to create the archive.");

    expect(error).toHaveBeenCalledWith("ERROR: Failed to create the archive.");
  });
});
