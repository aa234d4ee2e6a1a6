import { ICommandRunner, CommandResult } from "../domain/services/command-runner.service.js";
import { ILogger } from "../domain/services/logger.service.js";
import { Clock } from "../domain/services/clock.service.js";
import { seconds } from "../../infrastructure/utils/time.utils.js";

export interface RestartServiceRequest {
  /** Executable followed by its arguments. */
  command: string[];
  settleMs: number;
}

/**
 * The restart result is informational only; the availability poll that
 * follows decides whether the service actually came back.
 */
export class RestartServiceUseCase {
  constructor(
    private runner: ICommandRunner,
    private logger: ILogger,
    private clock: Clock,
  ) {}

  async execute(request: RestartServiceRequest): Promise<CommandResult> {
    const [executable, ...args] = request.command;
    this.logger.info("Restarting OpenClash service...");
    const result = await this.runner.run(executable, args);
    if (result.exitCode !== 0) {
      const reason = result.errorMessage ?? `exit code ${result.exitCode}`;
      this.logger.error(`Restart command "${result.command}" did not succeed (${reason}).`);
    }

    if (request.settleMs > 0) {
      this.logger.info(
        `Waiting ${seconds(request.settleMs)} seconds for OpenClash to initialize...`,
      );
      await this.clock.sleep(request.settleMs);
    }
    return result;
  }
}
