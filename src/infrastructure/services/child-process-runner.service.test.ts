import { describe, it, expect } from "vitest";
import { ChildProcessRunner } from "./child-process-runner.service.js";

describe("ChildProcessRunner", () => {
  const runner = new ChildProcessRunner({ inheritOutput: false });

  it("returns the exit code of the child", async () => {
    const result = await runner.run("/bin/sh", ["-c", "exit 3"]);

    expect(result).toEqual({
      command: "/bin/sh -c exit 3",
      exitCode: 3,
      errorMessage: undefined,
    });
  });

  it("returns 0 for a successful command", async () => {
    const result = await runner.run("/bin/sh", ["-c", "true"]);

    expect(result.exitCode).toBe(0);
  });

  it("resolves with a null exit code when the program does not exist", async () => {
    const result = await runner.run("/nonexistent/openclash_debug.sh");

    expect(result.exitCode).toBeNull();
    expect(result.command).toBe("/nonexistent/openclash_debug.sh");
    expect(result.errorMessage).toContain("ENOENT");
  });
});
