import { spawn } from "node:child_process";
import {
  CommandResult,
  ICommandRunner,
} from "../../core/domain/services/command-runner.service.js";

export interface ChildProcessRunnerOptions {
  /** Forward the child's stdout/stderr to ours. Default: true. */
  inheritOutput?: boolean;
}

/**
 * Runs external programs (init scripts, vendor tooling) without a shell and
 * without stdin. Never rejects: spawn failures come back as a null exit code.
 */
export class ChildProcessRunner implements ICommandRunner {
  constructor(private options: ChildProcessRunnerOptions = {}) {}

  run(command: string, args: string[] = []): Promise<CommandResult> {
    const displayCmd = [command, ...args].join(" ");
    const output = this.options.inheritOutput === false ? "ignore" : "inherit";

    return new Promise<CommandResult>((resolve) => {
      let settled = false;
      const finish = (result: CommandResult) => {
        if (settled) return;
        settled = true;
        resolve(result);
      };

      const child = spawn(command, args, {
        shell: false,
        stdio: ["ignore", output, output],
      });

      child.on("error", (err) => {
        finish({ command: displayCmd, exitCode: null, errorMessage: err.message });
      });

      child.on("close", (code, signal) => {
        finish({
          command: displayCmd,
          exitCode: code,
          errorMessage: signal ? `terminated by ${signal}` : undefined,
        });
      });
    });
  }
}
