/** How a bounded read of the API ended. */
export type StreamEnd = "complete" | "deadline" | "error";

export interface StreamToFileResult {
  /** 0 when no response headers were received. */
  statusCode: number;
  bytesWritten: number;
  endedBy: StreamEnd;
  errorMessage?: string;
}

export interface IClashApiService {
  /**
   * GET the log endpoint and write the body to `destination` until the stream
   * ends or `deadlineMs` elapses. The destination file exists afterwards
   * unless it could not be opened; open and write failures end as "error".
   */
  streamToFile(
    destination: string,
    deadlineMs: number,
  ): Promise<StreamToFileResult>;

  /** GET the log endpoint, discard the body and return the status (0 on transport failure). */
  checkStatus(timeoutMs: number): Promise<number>;

  close(): Promise<void>;
}
