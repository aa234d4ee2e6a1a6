export type LogLevel = "info" | "error";

export interface ILogger {
  info(message: string): void;
  error(message: string): void;
  close(): Promise<void>;
}
