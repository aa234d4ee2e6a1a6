export interface CommandResult {
  command: string;
  /** null when the process could not be started or was killed by a signal. */
  exitCode: number | null;
  errorMessage?: string;
}

export interface ICommandRunner {
  run(command: string, args?: string[]): Promise<CommandResult>;
}
